/**
 * DNS resolution for email domains
 *
 * Looks up MX records and classifies failures. There is no A-record
 * fallback: a domain without mail exchangers is reported as such.
 */

import dns from 'dns';
import { promisify } from 'util';
import type { Logger } from 'pino';
import type { DomainCacheEntry, DomainResolution, MxRecord } from '../types';
import { DomainCache } from '../cache';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';

const resolveMx = promisify(dns.resolveMx);

/**
 * Default timeout for DNS lookups (5 seconds)
 */
export const DEFAULT_DNS_TIMEOUT = 5000;

/**
 * Resolver error codes that mean "could not find out" rather than "no such domain"
 */
const TIMEOUT_CODES = new Set(['ETIMEOUT', 'ECONNREFUSED']);

const TIMED_OUT = Symbol('timed-out');

/**
 * Runs a lookup, settling with TIMED_OUT if it takes longer than `timeout`
 */
async function withTimeout<T>(
  lookupFn: () => Promise<T>,
  timeout: number
): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      lookupFn(),
      new Promise<typeof TIMED_OUT>((resolve) => {
        timer = setTimeout(() => resolve(TIMED_OUT), timeout);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Looks up MX records for a domain
 *
 * Records are sorted by priority (lower is preferred). A null MX
 * (RFC 7505, exchange ".") means the domain accepts no mail.
 *
 * @param domain - The domain to look up
 * @param timeout - Timeout in milliseconds
 *
 * @example
 * ```ts
 * const resolution = await lookupMx('example.com');
 * if (resolution.ok) {
 *   console.log(resolution.hosts[0].exchange);
 * }
 * ```
 */
export async function lookupMx(
  domain: string,
  timeout: number = DEFAULT_DNS_TIMEOUT
): Promise<DomainResolution> {
  let records: dns.MxRecord[] | typeof TIMED_OUT;

  try {
    records = await withTimeout(() => resolveMx(domain), timeout);
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && TIMEOUT_CODES.has(code)) {
      return { ok: false, error: 'timeout', reason: `DNS lookup failed (${code})` };
    }
    // ENOTFOUND, ENODATA, ESERVFAIL...: no usable mail target either way
    return {
      ok: false,
      error: 'no_mx_record',
      reason: `No MX records (${code ?? errorMessage(error)})`,
    };
  }

  if (records === TIMED_OUT) {
    return { ok: false, error: 'timeout', reason: `DNS lookup timed out after ${timeout}ms` };
  }

  const hosts: MxRecord[] = records
    .filter((record) => record.exchange !== '' && record.exchange !== '.')
    .sort((a, b) => a.priority - b.priority)
    .map((record) => ({
      exchange: record.exchange,
      priority: record.priority,
    }));

  if (hosts.length === 0) {
    return {
      ok: false,
      error: 'no_mx_record',
      reason: records.length > 0 ? 'Domain does not accept mail (null MX)' : 'No MX records',
    };
  }

  return { ok: true, hosts };
}

/**
 * Options for DomainResolver
 */
export interface DomainResolverOptions {
  /** Timeout per lookup in milliseconds (default: 5000) */
  timeout?: number;
  /** Cache to use; one per run */
  cache?: DomainCache;
  logger?: Logger;
}

/**
 * Resolves domains through a run-scoped cache
 *
 * Each domain is looked up at most once; later candidates on the same
 * domain reuse the stored outcome, failures included.
 */
export class DomainResolver {
  private readonly timeout: number;
  private readonly cache: DomainCache;
  private readonly log: Logger;

  constructor(options: DomainResolverOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_DNS_TIMEOUT;
    this.cache = options.cache ?? new DomainCache();
    this.log = createLogger('dns', options.logger);
  }

  /**
   * Resolves the mail exchangers of a domain
   *
   * @param domain - Domain part of an address (case-insensitive)
   */
  async resolve(domain: string): Promise<DomainCacheEntry> {
    return this.cache.getOrResolve(domain, async (key) => {
      const resolution = await lookupMx(key, this.timeout);
      if (resolution.ok) {
        this.log.debug(
          { domain: key, hosts: resolution.hosts.map((host) => host.exchange) },
          'resolved mail exchangers'
        );
      } else {
        this.log.debug({ domain: key, error: resolution.error }, resolution.reason);
      }
      return resolution;
    });
  }
}
