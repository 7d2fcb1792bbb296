import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import nodemailer from 'nodemailer';
import { displayLocation, reasonsSummary } from '../report/format.js';
import { topByRelevance } from '../ranking/aggregate.js';
import type { ScoredPosting } from '../types.js';
import { dateStamp, formatTimestamp } from '../utils/text.js';

export const EMAIL_LIMIT = 15;

export interface EmailRequest {
  to: string;
  subject: string;
  body: string;
  timestamp: string;
}

export interface SmtpSettings {
  host?: string;
  port?: string;
  user?: string;
  pass?: string;
  from?: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function digestSubject(count: number, generatedAt: Date): string {
  if (count === 0) {
    return 'Job Monitor: No New Jobs Today';
  }
  return `Job Monitor: ${count} New Jobs Found - ${dateStamp(generatedAt)}`;
}

export function renderDigestHtml(postings: readonly ScoredPosting[], generatedAt: Date): string {
  if (postings.length === 0) {
    return `<!doctype html>
<html>
  <body style="font-family: Arial, sans-serif;">
    <h2>Job Monitor - No New Jobs Today</h2>
    <p>No new matching jobs found. Keep checking!</p>
  </body>
</html>`;
  }

  const items = topByRelevance(postings, EMAIL_LIMIT)
    .map(
      (posting) => `    <div style="margin: 15px 0; padding: 10px; border-left: 3px solid #2563eb;">
      <h3 style="margin: 0;"><a href="${escapeHtml(posting.url)}" style="color: #2563eb;">${escapeHtml(posting.title)}</a></h3>
      <p style="margin: 5px 0; color: #333;"><strong>${escapeHtml(posting.employer_name)}</strong> - ${escapeHtml(
        displayLocation(posting),
      )}</p>
      <p style="margin: 5px 0; color: #666; font-size: 12px;">Score: ${posting.relevance_score} | Keywords: ${escapeHtml(
        reasonsSummary(posting),
      )}</p>
    </div>`,
    )
    .join('\n');

  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
  </head>
  <body style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
    <h2 style="color: #2563eb;">Job Monitor - ${postings.length} New Jobs Found!</h2>
    <p style="color: #666;">Generated: ${escapeHtml(formatTimestamp(generatedAt))}</p>
    <hr>
${items}
    <hr>
    <p style="color: #666; font-size: 12px;">This email was generated by your Job Monitor.</p>
  </body>
</html>`;
}

export function renderDigestText(postings: readonly ScoredPosting[], generatedAt: Date): string {
  const lines = [`Job Monitor - ${formatTimestamp(generatedAt)}`, ''];
  if (postings.length === 0) {
    lines.push('No new matching jobs found. Keep checking!');
    return lines.join('\n');
  }

  for (const posting of topByRelevance(postings, EMAIL_LIMIT)) {
    lines.push(`- ${posting.title} | ${posting.employer_name} | ${displayLocation(posting)}`);
    lines.push(`  Score: ${posting.relevance_score} (${reasonsSummary(posting)})`);
    lines.push(`  ${posting.url}`);
  }
  return lines.join('\n');
}

/** Hand-off file for a scheduler step that sends the mail itself. */
export async function writeEmailRequest(filePath: string, request: EmailRequest): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(request, null, 2)}\n`, 'utf8');
}

export async function sendDigestEmail(
  smtp: SmtpSettings,
  message: { to: string; subject: string; html: string; text: string },
): Promise<{ sent: boolean; reason?: string }> {
  const { host, port, user, pass, from } = smtp;
  if (!host || !port || !user || !pass || !from) {
    return { sent: false, reason: 'Missing SMTP environment variables.' };
  }

  const parsedPort = Number(port);
  if (!Number.isFinite(parsedPort)) {
    return { sent: false, reason: `Invalid SMTP port: ${port}` };
  }

  const transporter = nodemailer.createTransport({
    host,
    port: parsedPort,
    secure: parsedPort === 465,
    auth: {
      user,
      pass,
    },
  });

  await transporter.sendMail({
    from,
    to: message.to,
    subject: message.subject,
    html: message.html,
    text: message.text,
  });

  return { sent: true };
}
