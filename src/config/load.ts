import { readFile } from 'node:fs/promises';
import { ZodError } from 'zod';
import type { RelevancePolicy } from '../scoring/relevance.js';
import type { EmployerSource } from '../types.js';
import { PatternError, literalPattern, regexPattern } from './patterns.js';
import type { TitlePattern } from './patterns.js';
import { monitorConfigFileSchema } from './schema.js';
import type { CompanyEntry, MonitorConfigFile, TitlePatternInput } from './schema.js';

export interface NotificationSettings {
  email?: string;
  sendEmpty: boolean;
}

export interface MonitorConfig {
  notification: NotificationSettings;
  companies: CompanyEntry[];
  sources: EmployerSource[];
  /** Companies that name no Greenhouse board, Lever slug or careers URL. */
  unreachableCompanies: string[];
  policy: RelevancePolicy;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function compileTitlePattern(input: TitlePatternInput): TitlePattern {
  if (typeof input === 'string') {
    return regexPattern(input);
  }
  if ('literal' in input) {
    return literalPattern(input.literal);
  }
  return regexPattern(input.regex);
}

/**
 * Expands companies into source descriptors. API boards come first; a careers
 * page is only scraped for a company without any API board.
 */
export function buildEmployerSources(companies: CompanyEntry[]): {
  sources: EmployerSource[];
  unreachable: string[];
} {
  const sources: EmployerSource[] = [];
  const unreachable: string[] = [];

  for (const company of companies) {
    if (company.greenhouse_id) {
      sources.push({ employerName: company.name, sourceKind: 'greenhouse', sourceIdentifier: company.greenhouse_id });
    }
    if (company.lever_id) {
      sources.push({ employerName: company.name, sourceKind: 'lever', sourceIdentifier: company.lever_id });
    }
    if (!company.greenhouse_id && !company.lever_id) {
      if (company.careers_url) {
        sources.push({ employerName: company.name, sourceKind: 'careers_page', sourceIdentifier: company.careers_url });
      } else {
        unreachable.push(company.name);
      }
    }
  }

  return { sources, unreachable };
}

export function buildMonitorConfig(file: MonitorConfigFile): MonitorConfig {
  let highPriority: TitlePattern[];
  let mediumPriority: TitlePattern[];
  try {
    highPriority = file.title_patterns.high_priority.map(compileTitlePattern);
    mediumPriority = file.title_patterns.medium_priority.map(compileTitlePattern);
  } catch (error) {
    if (error instanceof PatternError) {
      throw new ConfigError(error.message);
    }
    throw error;
  }

  const { sources, unreachable } = buildEmployerSources(file.companies);

  return {
    notification: {
      email: file.notification.email,
      sendEmpty: file.notification.send_empty,
    },
    companies: file.companies,
    sources,
    unreachableCompanies: unreachable,
    policy: {
      highPriority,
      mediumPriority,
      requiredKeywords: file.required_keywords,
      excludeKeywords: file.exclude_keywords,
      preferredLocations: file.locations.preferred,
      excludedLocations: file.locations.exclude,
    },
  };
}

export function parseMonitorConfig(raw: unknown): MonitorConfig {
  const parsed = monitorConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  return buildMonitorConfig(parsed.data);
}

export async function loadMonitorConfig(filePath: string): Promise<MonitorConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config ${filePath}: ${String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config ${filePath} is not valid JSON: ${String(error)}`);
  }

  return parseMonitorConfig(raw);
}
