import axios, { type AxiosResponse } from 'axios';
import type { Logger } from 'pino';
import type { Candidate, ProbeOutcome, VerificationStatus, Verifier } from '../types';
import { ConfigurationError, errorMessage } from '../errors';
import { createLogger } from '../logger';

/**
 * Default endpoint of the verification service
 */
export const DEFAULT_API_BASE_URL = 'https://verifyright.co/verify';

/**
 * Default request timeout (10 seconds)
 */
export const DEFAULT_API_TIMEOUT = 10000;

export interface ApiVerifierOptions {
  token: string;
  /** Base URL; the address is appended as the last path segment */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  logger?: Logger;
}

/**
 * Verdicts accepted in the `status` field of the response body
 */
const STATUS_VALUES: ReadonlyMap<unknown, VerificationStatus> = new Map<unknown, VerificationStatus>([
  [true, 'valid'],
  ['valid', 'valid'],
  [false, 'mailbox_rejected'],
  ['invalid', 'mailbox_rejected'],
  [null, 'ambiguous'],
  ['unknown', 'ambiguous'],
  ['catch_all', 'ambiguous'],
  ['risky', 'ambiguous'],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Characters encodeURIComponent escapes that a path segment may carry as is
 */
const PATH_SAFE_ESCAPES = /%(?:40|2B|24|26|2C|3B|3D|3A)/g;

/**
 * Escapes an address for use as one URL path segment
 *
 * '@', '+' and the other RFC 3986 sub-delimiters stay literal; '/', '?',
 * '#', '%' and whitespace are percent-encoded.
 *
 * @example
 * ```ts
 * toPathSegment('user+tag@example.com'); // 'user+tag@example.com'
 * toPathSegment('a/b@example.com'); // 'a%2Fb@example.com'
 * ```
 */
export function toPathSegment(value: string): string {
  return encodeURIComponent(value).replace(PATH_SAFE_ESCAPES, (escape) => decodeURIComponent(escape));
}

/**
 * Checks mailboxes through a remote verification API
 *
 * One GET per address: `{baseUrl}/{email}?token={token}`. Any failure of
 * the service itself is reported as 'api_error', never thrown.
 *
 * @example
 * ```ts
 * const verifier = new ApiVerifier({ token: process.env.VERIFIER_API_TOKEN ?? '' });
 * const outcome = await verifier.verify(createCandidate('user@example.com'));
 * ```
 */
export class ApiVerifier implements Verifier {
  readonly mode = 'api' as const;
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly log: Logger;

  constructor(options: ApiVerifierOptions) {
    if (!options.token) {
      throw new ConfigurationError('API mode requires an API token');
    }
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_API_TIMEOUT;
    this.log = createLogger('api', options.logger);
  }

  async verify(candidate: Candidate): Promise<ProbeOutcome> {
    const url = `${this.baseUrl}/${toPathSegment(candidate.address)}`;

    let response: AxiosResponse<unknown>;
    try {
      response = await axios.get<unknown>(url, {
        params: { token: this.token },
        timeout: this.timeout,
        // Status codes are classified below rather than thrown
        validateStatus: () => true,
      });
    } catch (error) {
      const timedOut = axios.isAxiosError(error)
        && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
      const reason = timedOut
        ? `API request timed out after ${this.timeout}ms`
        : `API request failed: ${errorMessage(error)}`;

      this.log.warn({ email: candidate.address, err: errorMessage(error) }, reason);
      return { status: 'api_error', reason, error: 'network_failure' };
    }

    const { status: httpStatus, data } = response;

    if (httpStatus === 401 || httpStatus === 403) {
      return {
        status: 'api_error',
        reason: `API rejected the token (HTTP ${httpStatus})`,
        responseCode: httpStatus,
        error: 'unauthorized',
      };
    }

    if (httpStatus < 200 || httpStatus >= 300) {
      return {
        status: 'api_error',
        reason: `API error: HTTP ${httpStatus}`,
        responseCode: httpStatus,
        error: 'network_failure',
      };
    }

    const verdict = isRecord(data) && 'status' in data ? STATUS_VALUES.get(data.status) : undefined;

    if (verdict === undefined) {
      this.log.warn({ email: candidate.address, httpStatus }, 'unrecognized API response body');
      return {
        status: 'api_error',
        reason: 'Malformed API response',
        responseCode: httpStatus,
        error: 'invalid_response',
      };
    }

    return {
      status: verdict,
      reason: verdict === 'valid'
        ? 'Valid according to API'
        : verdict === 'mailbox_rejected'
          ? 'Invalid according to API'
          : 'API could not determine validity',
      responseCode: httpStatus,
      error: verdict === 'mailbox_rejected' ? 'rejected' : verdict === 'ambiguous' ? 'ambiguous' : undefined,
    };
  }
}
