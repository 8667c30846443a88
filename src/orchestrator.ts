/**
 * Bulk verification
 *
 * Runs every candidate through syntax → domain → mailbox with a bounded
 * number in flight. Each distinct address is verified once; its result is
 * handed to every input occurrence of that address.
 */

import pLimit from 'p-limit';
import type { Logger } from 'pino';
import type {
  Candidate,
  RunOutput,
  VerificationMode,
  VerificationResult,
  VerificationStatus,
  Verifier,
  VerifyOptions,
} from './types';
import { checkSyntax, createCandidate } from './validators/format';
import { DEFAULT_DNS_TIMEOUT, DomainResolver } from './validators/dns';
import {
  DEFAULT_HELO_NAME,
  DEFAULT_SENDER,
  DEFAULT_SMTP_PORT,
  DEFAULT_SMTP_TIMEOUT,
} from './validators/smtp';
import { DEFAULT_API_BASE_URL, DEFAULT_API_TIMEOUT, ApiVerifier } from './verifiers/api';
import { SmtpVerifier } from './verifiers/smtp';
import { DomainCache } from './cache';
import { ResultAggregator } from './aggregator';
import { ConfigurationError, errorMessage } from './errors';
import { createLogger } from './logger';

/**
 * Default number of candidates in flight
 */
export const DEFAULT_CONCURRENCY = 10;

type ResolvedOptions = Required<Omit<VerifyOptions, 'apiToken' | 'onResult' | 'logger'>>;

/**
 * Default options for bulk verification
 */
export const DEFAULT_OPTIONS: Readonly<ResolvedOptions> = Object.freeze({
  mode: 'smtp',
  concurrency: DEFAULT_CONCURRENCY,
  dnsTimeout: DEFAULT_DNS_TIMEOUT,
  smtpTimeout: DEFAULT_SMTP_TIMEOUT,
  smtpPort: DEFAULT_SMTP_PORT,
  senderEmail: DEFAULT_SENDER,
  heloName: DEFAULT_HELO_NAME,
  apiBaseUrl: DEFAULT_API_BASE_URL,
  apiTimeout: DEFAULT_API_TIMEOUT,
});

const MODES: readonly VerificationMode[] = ['smtp', 'api'];

/**
 * Fills every unset option from DEFAULT_OPTIONS
 */
function withDefaults(options: VerifyOptions): ResolvedOptions {
  return {
    mode: options.mode ?? DEFAULT_OPTIONS.mode,
    concurrency: options.concurrency ?? DEFAULT_OPTIONS.concurrency,
    dnsTimeout: options.dnsTimeout ?? DEFAULT_OPTIONS.dnsTimeout,
    smtpTimeout: options.smtpTimeout ?? DEFAULT_OPTIONS.smtpTimeout,
    smtpPort: options.smtpPort ?? DEFAULT_OPTIONS.smtpPort,
    senderEmail: options.senderEmail ?? DEFAULT_OPTIONS.senderEmail,
    heloName: options.heloName ?? DEFAULT_OPTIONS.heloName,
    apiBaseUrl: options.apiBaseUrl ?? DEFAULT_OPTIONS.apiBaseUrl,
    apiTimeout: options.apiTimeout ?? DEFAULT_OPTIONS.apiTimeout,
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Rejects settings that would make the whole run meaningless
 */
function validateOptions(opts: ResolvedOptions, apiToken: string | undefined): void {
  if (!MODES.includes(opts.mode)) {
    throw new ConfigurationError(`Unknown verification mode: ${String(opts.mode)}`);
  }
  if (!isPositiveInteger(opts.concurrency)) {
    throw new ConfigurationError(
      `Concurrency limit must be a positive integer, got ${opts.concurrency}`
    );
  }
  for (const key of ['dnsTimeout', 'smtpTimeout', 'apiTimeout', 'smtpPort'] as const) {
    if (!isPositiveInteger(opts[key])) {
      throw new ConfigurationError(`${key} must be a positive integer, got ${opts[key]}`);
    }
  }
  if (opts.mode === 'api' && !apiToken) {
    throw new ConfigurationError('API mode requires an API token');
  }
}

/**
 * Verifies a batch of addresses with one strategy
 *
 * All configuration problems surface from the constructor, before any
 * network activity. `run` itself never rejects because of a candidate.
 *
 * @example
 * ```ts
 * const orchestrator = new VerificationOrchestrator({ concurrency: 20 });
 * const { results, stats } = await orchestrator.run([
 *   'user1@example.com',
 *   'not-an-email',
 * ]);
 * console.log(`${stats.valid}/${stats.total} valid`);
 * ```
 */
export class VerificationOrchestrator {
  readonly mode: VerificationMode;
  private readonly opts: ResolvedOptions;
  private readonly verifier: Verifier;
  private readonly onResult?: (result: VerificationResult) => void;
  private readonly log: Logger;
  private readonly parentLogger?: Logger;

  constructor(options: VerifyOptions = {}) {
    const { apiToken, onResult, logger } = options;
    const opts = withDefaults(options);

    this.log = createLogger('orchestrator', logger);

    try {
      validateOptions(opts, apiToken);
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, 'invalid configuration');
      throw error;
    }

    this.opts = opts;
    this.mode = opts.mode;
    this.onResult = onResult;
    this.verifier = opts.mode === 'api'
      ? new ApiVerifier({
          token: apiToken ?? '',
          baseUrl: opts.apiBaseUrl,
          timeout: opts.apiTimeout,
          logger,
        })
      : new SmtpVerifier({
          port: opts.smtpPort,
          timeout: opts.smtpTimeout,
          senderEmail: opts.senderEmail,
          heloName: opts.heloName,
          logger,
        });
    this.parentLogger = logger;
  }

  /**
   * Verifies every address and returns one result per input entry
   *
   * Results are in completion order. Domains are resolved once per run.
   *
   * @param emails - Raw addresses; duplicates are verified once
   */
  async run(emails: readonly string[]): Promise<RunOutput> {
    const groups = new Map<string, Candidate[]>();
    for (const raw of emails) {
      const candidate = createCandidate(raw);
      const group = groups.get(candidate.address);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(candidate.address, [candidate]);
      }
    }

    const resolver = new DomainResolver({
      timeout: this.opts.dnsTimeout,
      cache: new DomainCache(),
      logger: this.parentLogger,
    });
    const aggregator = new ResultAggregator();
    const results: VerificationResult[] = [];
    const limit = pLimit(this.opts.concurrency);

    this.log.info(
      { mode: this.mode, total: emails.length, unique: groups.size, concurrency: this.opts.concurrency },
      'verification started'
    );

    await Promise.all(
      [...groups.values()].map((occurrences) =>
        limit(async () => {
          const [first] = occurrences;
          if (!first) return;

          const verdict = await this.verifyCandidate(first, resolver);
          aggregator.record(verdict, occurrences.length);

          for (const candidate of occurrences) {
            const result: VerificationResult = Object.freeze({ ...verdict, candidate });
            results.push(result);
            this.emit(result);
          }
        })
      )
    );

    const stats = aggregator.snapshot();
    this.log.info(
      { total: stats.total, valid: stats.valid, invalid: stats.invalid, inconclusive: stats.inconclusive },
      'verification finished'
    );

    return { results, stats };
  }

  /**
   * Runs the pipeline for one candidate; never rejects
   */
  private async verifyCandidate(
    candidate: Candidate,
    resolver: DomainResolver
  ): Promise<VerificationResult> {
    const startTime = Date.now();
    const finish = (status: VerificationStatus, reason: string): VerificationResult => ({
      candidate,
      status,
      reason,
      latencyMs: Date.now() - startTime,
    });

    try {
      const problem = checkSyntax(candidate);
      if (problem) {
        return finish('invalid_syntax', `Invalid email format (${problem})`);
      }

      const domain = await resolver.resolve(candidate.domain);
      if (!domain.ok) {
        return finish(domain.error, domain.reason);
      }

      const outcome = await this.verifier.verify(candidate, domain.hosts);
      this.log.debug(
        { email: candidate.address, status: outcome.status, code: outcome.responseCode, host: outcome.host },
        'candidate verified'
      );
      return finish(outcome.status, outcome.reason);
    } catch (error) {
      this.log.warn({ email: candidate.address, err: errorMessage(error) }, 'verification crashed');
      return finish('unknown', `Unexpected error: ${errorMessage(error)}`);
    }
  }

  private emit(result: VerificationResult): void {
    if (!this.onResult) return;
    try {
      this.onResult(result);
    } catch (error) {
      this.log.warn({ err: errorMessage(error) }, 'onResult callback threw');
    }
  }
}

/**
 * Verifies multiple email addresses
 *
 * Shorthand for `new VerificationOrchestrator(options).run(emails)`.
 *
 * @param emails - Array of email addresses to verify
 * @param options - Optional verification settings
 *
 * @example
 * ```ts
 * const { results, stats } = await verifyEmails([
 *   'user1@example.com',
 *   'user2@example.com',
 * ]);
 * ```
 */
export async function verifyEmails(
  emails: readonly string[],
  options: VerifyOptions = {}
): Promise<RunOutput> {
  return new VerificationOrchestrator(options).run(emails);
}
