import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  validAddresses,
  formatValidCsv,
  formatTextReport,
  buildJsonReport,
  writeReports,
} from '../src/report';
import { summarize } from '../src/aggregator';
import { createCandidate } from '../src/validators/format';
import type { VerificationResult, VerificationStatus } from '../src/types';
import { VERSION } from '../src/version';

function result(raw: string, status: VerificationStatus): VerificationResult {
  return { candidate: createCandidate(raw), status, latencyMs: 1 };
}

const results: VerificationResult[] = [
  result('alice@example.com', 'valid'),
  result('not-an-email', 'invalid_syntax'),
  result('Bob@Example.org', 'valid'),
  result('alice@EXAMPLE.com', 'valid'),
  result('carol@example.net', 'ambiguous'),
];

const stats = summarize(results);

describe('validAddresses', () => {
  it('should list each valid address once, in result order', () => {
    expect(validAddresses(results)).toEqual(['alice@example.com', 'Bob@example.org']);
  });
});

describe('formatValidCsv', () => {
  it('should write an Email header and one address per row', () => {
    expect(formatValidCsv(results)).toBe('Email\nalice@example.com\nBob@example.org\n');
  });

  it('should write only the header when nothing is valid', () => {
    expect(formatValidCsv([result('x@example.com', 'timeout')])).toBe('Email\n');
  });
});

describe('formatTextReport', () => {
  it('should summarize the run', () => {
    const lines = formatTextReport(stats, 'smtp').split('\n');

    expect(lines.slice(0, 8)).toEqual([
      'Email Verification Report',
      '=========================',
      '',
      'Total emails: 5',
      'Valid emails: 3',
      'Invalid emails: 1',
      'Inconclusive emails: 1',
      'Success rate: 60%',
    ]);
    expect(lines).toContain('  ambiguous: 1');
    expect(lines).toContain('Verification mode: SMTP');
    expect(lines).toContain(`Generated by: bulk-mail-verifier v${VERSION}`);
  });

  it('should name the API mode', () => {
    expect(formatTextReport(stats, 'api')).toContain('Verification mode: API\n');
  });
});

describe('buildJsonReport', () => {
  it('should carry the totals and per-status counts', () => {
    const report = buildJsonReport(stats, 'api');

    expect(report).toEqual({
      total_emails: 5,
      valid_emails: 3,
      invalid_emails: 1,
      inconclusive_emails: 1,
      success_percentage: 60,
      counts: {
        valid: 3,
        invalid_syntax: 1,
        no_mx_record: 0,
        mailbox_rejected: 0,
        ambiguous: 1,
        timeout: 0,
        api_error: 0,
        unknown: 0,
      },
      verification_mode: 'API',
      generator: `bulk-mail-verifier v${VERSION}`,
    });
  });
});

describe('writeReports', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bulk-verify-report-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the CSV and both summaries by default', async () => {
    const out = join(dir, 'both');
    const written = await writeReports(out, { results, stats, mode: 'smtp' });

    expect(written).toEqual([
      join(out, 'valid_emails.csv'),
      join(out, 'email_report.txt'),
      join(out, 'email_report.json'),
    ]);
    expect(await readFile(join(out, 'valid_emails.csv'), 'utf8')).toBe(
      'Email\nalice@example.com\nBob@example.org\n'
    );
    const json: unknown = JSON.parse(await readFile(join(out, 'email_report.json'), 'utf8'));
    expect(json).toMatchObject({ total_emails: 5, verification_mode: 'SMTP' });
  });

  it('should write only the requested summary', async () => {
    const out = join(dir, 'json-only');
    const written = await writeReports(out, { results, stats, mode: 'smtp', format: 'json' });

    expect(written).toEqual([join(out, 'valid_emails.csv'), join(out, 'email_report.json')]);
  });
});
