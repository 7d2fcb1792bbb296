import type { FetchResult, TextFetcher } from '../types.js';
import type { RunLogger } from './logger.js';
import { cleanUrl } from './url.js';

interface RequestOptions {
  timeoutMs?: number;
  maxBytes?: number;
  headers?: Record<string, string>;
}

function normalizeHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

function mergeHeaders(...headersList: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const headers of headersList) {
    if (!headers) {
      continue;
    }
    for (const [key, value] of Object.entries(headers)) {
      merged[key] = value;
    }
  }
  return merged;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Single-attempt GET with a hard timeout. There is no retry and no backoff: a
 * failed board is skipped until the next scheduled run.
 */
export class HttpClient implements TextFetcher {
  private readonly defaultTimeoutMs: number;

  constructor(
    defaultTimeoutMs = 30000,
    private readonly logger?: RunLogger,
  ) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  async request(rawUrl: string, options: RequestOptions = {}): Promise<FetchResult> {
    const url = cleanUrl(rawUrl);
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal,
        headers: mergeHeaders(
          {
            'user-agent': 'Mozilla/5.0 (compatible; EmployerJobMonitor/0.1)',
            accept: 'application/json, text/html, */*',
          },
          options.headers,
        ),
      });

      const headers = normalizeHeaders(response.headers);
      const text = await response.text();
      const maxBytes = options.maxBytes ?? 5_000_000;

      return {
        status: response.status,
        url: response.url || url,
        headers,
        body: text.length > maxBytes ? text.slice(0, maxBytes) : text,
        contentType: headers['content-type'] ?? '',
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  async requestMaybe(rawUrl: string, options: RequestOptions = {}): Promise<FetchResult | null> {
    try {
      return await this.request(rawUrl, options);
    } catch (error) {
      await this.logger?.warn(`Request failed for ${rawUrl}: ${String(error)}`);
      return null;
    }
  }

  async fetchText(url: string): Promise<string | null> {
    const result = await this.requestMaybe(url);
    if (!result) {
      return null;
    }
    if (!isSuccess(result.status)) {
      await this.logger?.warn(`Request for ${url} returned HTTP ${result.status}`);
      return null;
    }
    return result.body;
  }
}
