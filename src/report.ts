/**
 * Run reports
 *
 * Turns the results and stats of a run into the files handed to the user:
 * the valid addresses as CSV, plus a summary as text and/or JSON.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { stringify } from 'csv-stringify/sync';
import type { Stats, VerificationMode, VerificationResult } from './types';
import { VERIFICATION_STATUSES } from './types';
import { VERSION } from './version';

export type ReportFormat = 'text' | 'json' | 'both';

/**
 * File names written by writeReports
 */
export const REPORT_FILES = {
  validCsv: 'valid_emails.csv',
  text: 'email_report.txt',
  json: 'email_report.json',
} as const;

const GENERATOR = `bulk-mail-verifier v${VERSION}`;

const MODE_LABELS: Record<VerificationMode, string> = {
  smtp: 'SMTP',
  api: 'API',
};

/**
 * Summary written to email_report.json
 */
export interface JsonReport {
  total_emails: number;
  valid_emails: number;
  invalid_emails: number;
  inconclusive_emails: number;
  success_percentage: number;
  counts: Stats['counts'];
  verification_mode: string;
  generator: string;
}

/**
 * Distinct valid addresses, in result order
 */
export function validAddresses(results: readonly VerificationResult[]): string[] {
  const seen = new Set<string>();
  for (const result of results) {
    if (result.status === 'valid') {
      seen.add(result.candidate.address);
    }
  }
  return [...seen];
}

/**
 * Renders valid addresses as a one-column CSV with an "Email" header
 */
export function formatValidCsv(results: readonly VerificationResult[]): string {
  return stringify(
    validAddresses(results).map((email) => ({ email })),
    { header: true, columns: [{ key: 'email', header: 'Email' }] }
  );
}

/**
 * Renders the plain-text summary
 *
 * @example
 * ```ts
 * formatTextReport(stats, 'smtp').split('\n')[3]; // 'Total emails: 3'
 * ```
 */
export function formatTextReport(stats: Stats, mode: VerificationMode): string {
  const lines = [
    'Email Verification Report',
    '=========================',
    '',
    `Total emails: ${stats.total}`,
    `Valid emails: ${stats.valid}`,
    `Invalid emails: ${stats.invalid}`,
    `Inconclusive emails: ${stats.inconclusive}`,
    `Success rate: ${stats.successRate}%`,
    '',
    'By status:',
    ...VERIFICATION_STATUSES.map((status) => `  ${status}: ${stats.counts[status]}`),
    '',
    `Verification mode: ${MODE_LABELS[mode]}`,
    `Generated by: ${GENERATOR}`,
  ];
  return lines.join('\n') + '\n';
}

export function buildJsonReport(stats: Stats, mode: VerificationMode): JsonReport {
  return {
    total_emails: stats.total,
    valid_emails: stats.valid,
    invalid_emails: stats.invalid,
    inconclusive_emails: stats.inconclusive,
    success_percentage: stats.successRate,
    counts: { ...stats.counts },
    verification_mode: MODE_LABELS[mode],
    generator: GENERATOR,
  };
}

/**
 * Options for writeReports
 */
export interface WriteReportsOptions {
  results: readonly VerificationResult[];
  stats: Stats;
  mode: VerificationMode;
  /** Which summaries to write (default: 'both') */
  format?: ReportFormat;
}

/**
 * Writes the valid-address CSV and the requested summaries into `dir`
 *
 * @returns Paths of the files written
 */
export async function writeReports(dir: string, options: WriteReportsOptions): Promise<string[]> {
  const { results, stats, mode, format = 'both' } = options;
  await mkdir(dir, { recursive: true });

  const files: Array<[string, string]> = [[REPORT_FILES.validCsv, formatValidCsv(results)]];
  if (format === 'text' || format === 'both') {
    files.push([REPORT_FILES.text, formatTextReport(stats, mode)]);
  }
  if (format === 'json' || format === 'both') {
    files.push([REPORT_FILES.json, JSON.stringify(buildJsonReport(stats, mode), null, 4) + '\n']);
  }

  const written: string[] = [];
  for (const [name, content] of files) {
    const path = join(dir, name);
    await writeFile(path, content, 'utf8');
    written.push(path);
  }
  return written;
}
