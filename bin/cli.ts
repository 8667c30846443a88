#!/usr/bin/env node

/**
 * Bulk Mail Verifier CLI
 *
 * Verifies every address found in a CSV or message file and writes reports.
 *
 * Usage:
 *   bulk-verify contacts.csv
 *   bulk-verify contacts.csv --concurrency 20 --output-dir reports
 *   bulk-verify inbox.eml --api --api-token <token>
 *   bulk-verify contacts.csv --json
 */

import {
  VerificationOrchestrator,
  loadConfig,
  loadEnvFile,
  readCandidates,
  writeReports,
  VERSION,
} from '../src/index';
import type { ReportFormat } from '../src/report';
import type { Stats, VerificationResult, VerificationStatus, VerifyOptions } from '../src/types';

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
};

const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'both'];

/**
 * Command line arguments
 */
export interface CliArgs {
  input: string;
  api: boolean;
  apiToken?: string;
  concurrency?: number;
  timeout?: number;
  outputDir: string;
  reportFormat: ReportFormat;
  json: boolean;
  help: boolean;
  version: boolean;
  /** Problems found while parsing, reported before anything runs */
  errors: string[];
}

function parseInteger(flag: string, value: string | undefined, errors: string[]): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    errors.push(`${flag} expects a positive integer`);
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Parses command line arguments
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    input: '',
    api: false,
    outputDir: '.',
    reportFormat: 'both',
    json: false,
    help: false,
    version: false,
    errors: [],
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (!arg) {
      i++;
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--json' || arg === '-j') {
      result.json = true;
    } else if (arg === '--api') {
      result.api = true;
    } else if (arg === '--api-token') {
      i++;
      result.apiToken = args[i];
    } else if (arg === '--concurrency' || arg === '-c') {
      i++;
      result.concurrency = parseInteger(arg, args[i], result.errors);
    } else if (arg === '--timeout' || arg === '-t') {
      i++;
      result.timeout = parseInteger(arg, args[i], result.errors);
    } else if (arg === '--output-dir' || arg === '-o') {
      i++;
      result.outputDir = args[i] ?? result.outputDir;
    } else if (arg === '--report-format') {
      i++;
      const format = REPORT_FORMATS.find((candidate) => candidate === args[i]);
      if (format) {
        result.reportFormat = format;
      } else {
        result.errors.push(`--report-format expects one of: ${REPORT_FORMATS.join(', ')}`);
      }
    } else if (arg.startsWith('-')) {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (!result.input) {
      result.input = arg;
    } else {
      result.errors.push(`Unexpected argument: ${arg}`);
    }

    i++;
  }

  return result;
}

/**
 * Prints help message
 */
function printHelp(): void {
  console.log(`
${colors.bold}Bulk Mail Verifier${colors.reset}

Verify every address in a CSV or message file through format validation,
MX lookup, and SMTP probing (or a remote verification API).

${colors.bold}USAGE${colors.reset}
  bulk-verify <input> [options]

  A .csv input contributes the first column of each row; rows starting
  with '#' are skipped. Any other file is scanned for addresses.

${colors.bold}OPTIONS${colors.reset}
  -h, --help                Show this help message
  -v, --version             Show version number
  -j, --json                Print results and stats as JSON
  --api                     Verify through the remote API instead of SMTP
  --api-token <token>       API token (default: $VERIFIER_API_TOKEN)
  -c, --concurrency <n>     Addresses verified in parallel (default: 10)
  -t, --timeout <ms>        SMTP timeout in milliseconds (default: 10000)
  -o, --output-dir <dir>    Where reports are written (default: .)
  --report-format <fmt>     text, json or both (default: both)

${colors.bold}EXAMPLES${colors.reset}
  ${colors.dim}# Verify a list over SMTP${colors.reset}
  bulk-verify contacts.csv

  ${colors.dim}# Use the verification API${colors.reset}
  bulk-verify contacts.csv --api --api-token <token>

  ${colors.dim}# Machine-readable output${colors.reset}
  bulk-verify contacts.csv --json
`);
}

/**
 * Color for each status
 */
function statusColor(status: VerificationStatus): string {
  switch (status) {
    case 'valid':
      return colors.green;
    case 'invalid_syntax':
    case 'no_mx_record':
    case 'mailbox_rejected':
      return colors.red;
    default:
      return colors.yellow;
  }
}

/**
 * Formats one result as a table row
 */
function formatRow(result: VerificationResult): string {
  const icon = result.status === 'valid'
    ? `${colors.green}✓${colors.reset}`
    : `${statusColor(result.status)}✗${colors.reset}`;
  const email = result.candidate.raw.trim().padEnd(40).slice(0, 40);
  const status = `${statusColor(result.status)}${result.status.padEnd(17)}${colors.reset}`;
  const reason = (result.reason ?? '').split('\n')[0] ?? '';

  return `${icon} ${email}${status}${colors.dim}${reason.slice(0, 60)}${colors.reset}`;
}

/**
 * Formats the end-of-run summary
 */
function formatSummary(stats: Stats): string {
  return `\n${colors.dim}Summary: ${colors.reset}`
    + `${colors.green}${stats.valid}${colors.reset} valid, `
    + `${colors.red}${stats.invalid}${colors.reset} invalid, `
    + `${colors.yellow}${stats.inconclusive}${colors.reset} inconclusive `
    + `of ${stats.total} (${stats.successRate}% valid)`;
}

/**
 * Merges environment settings with command line flags (flags win)
 */
function buildOptions(args: CliArgs): VerifyOptions {
  const options: VerifyOptions = { ...loadConfig(), mode: args.api ? 'api' : 'smtp' };
  if (args.apiToken !== undefined) options.apiToken = args.apiToken;
  if (args.concurrency !== undefined) options.concurrency = args.concurrency;
  if (args.timeout !== undefined) options.smtpTimeout = args.timeout;
  return options;
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (args.errors.length > 0 || !args.input) {
    for (const message of args.errors) {
      console.error(`${colors.red}Error: ${message}${colors.reset}`);
    }
    if (!args.input) {
      console.error(`${colors.red}Error: Please provide an input file${colors.reset}`);
    }
    console.error(`\nUsage: bulk-verify <input> [options]`);
    console.error(`\nRun 'bulk-verify --help' for more information.`);
    process.exit(1);
  }

  try {
    loadEnvFile();
    const options = buildOptions(args);
    const orchestrator = new VerificationOrchestrator({
      ...options,
      onResult: args.json ? undefined : (result) => console.log(formatRow(result)),
    });

    const emails = await readCandidates(args.input);

    if (!args.json) {
      console.log(`\n${colors.cyan}Verifying ${emails.length} email addresses...${colors.reset}\n`);
    }

    const { results, stats } = await orchestrator.run(emails);
    const written = await writeReports(args.outputDir, {
      results,
      stats,
      mode: orchestrator.mode,
      format: args.reportFormat,
    });

    if (args.json) {
      console.log(JSON.stringify({ results, stats, reports: written }, null, 2));
    } else {
      console.log(formatSummary(stats));
      console.log(`${colors.dim}Reports:${colors.reset} ${written.join(', ')}`);
    }
  } catch (error) {
    console.error(`${colors.red}Error:${colors.reset}`, error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
