import type { Logger } from 'pino';

/**
 * Terminal classification of a single candidate
 */
export type VerificationStatus =
  | 'valid'             // RCPT TO (or the API) accepted the mailbox
  | 'invalid_syntax'    // failed the format check, no network work done
  | 'no_mx_record'      // domain has no mail exchangers or does not exist
  | 'mailbox_rejected'  // 5xx to RCPT TO, or the API says invalid
  | 'ambiguous'         // 4xx / greylisting, or the API cannot tell
  | 'timeout'           // no host answered within the timeouts
  | 'api_error'         // remote verification endpoint failed
  | 'unknown';          // hosts answered but the dialogue could not complete

/**
 * Every status, in reporting order
 */
export const VERIFICATION_STATUSES = [
  'valid',
  'invalid_syntax',
  'no_mx_record',
  'mailbox_rejected',
  'ambiguous',
  'timeout',
  'api_error',
  'unknown',
] as const satisfies readonly VerificationStatus[];

/**
 * How mailboxes are checked once the domain resolves
 */
export type VerificationMode = 'smtp' | 'api';

export type DomainErrorKind = 'no_mx_record' | 'timeout';

export type MailboxErrorKind = 'rejected' | 'ambiguous' | 'connection_failed' | 'timeout';

export type ApiErrorKind = 'network_failure' | 'invalid_response' | 'unauthorized';

/**
 * An input address as extracted, plus its normalized form
 */
export interface Candidate {
  /** The string exactly as it was received */
  readonly raw: string;
  /** Trimmed, with the domain part lower-cased; used for de-duplication */
  readonly address: string;
  readonly localPart: string | null;
  readonly domain: string | null;
}

/**
 * Internal representation of an MX record
 */
export interface MxRecord {
  exchange: string;
  priority: number;
}

/**
 * Outcome of resolving the mail exchangers of a domain
 */
export type DomainResolution =
  | { ok: true; hosts: readonly MxRecord[] }
  | { ok: false; error: DomainErrorKind; reason: string };

/**
 * A resolution stored in the per-run domain cache
 */
export type DomainCacheEntry = Readonly<DomainResolution & {
  domain: string;
  /** Epoch milliseconds of the lookup */
  resolvedAt: number;
}>;

/**
 * What a verification strategy reports for one mailbox
 */
export interface ProbeOutcome {
  status: VerificationStatus;
  reason: string;
  /** SMTP reply code of the deciding command, or HTTP status in API mode */
  responseCode?: number;
  /** The MX host that decided the outcome */
  host?: string;
  error?: MailboxErrorKind | ApiErrorKind;
}

/**
 * A mailbox verification strategy, chosen once per orchestrator
 */
export interface Verifier {
  readonly mode: VerificationMode;
  verify(candidate: Candidate, hosts: readonly MxRecord[]): Promise<ProbeOutcome>;
}

/**
 * Final result for one candidate
 */
export interface VerificationResult {
  readonly candidate: Candidate;
  readonly status: VerificationStatus;
  /** Human-readable explanation of the status */
  readonly reason?: string;
  /** Time spent in the pipeline, in milliseconds */
  readonly latencyMs: number;
}

/**
 * Summary counts folded from the results of a run
 */
export interface Stats {
  readonly total: number;
  readonly counts: Readonly<Record<VerificationStatus, number>>;
  readonly valid: number;
  /** invalid_syntax + no_mx_record + mailbox_rejected */
  readonly invalid: number;
  /** ambiguous + timeout + api_error + unknown */
  readonly inconclusive: number;
  /** Percentage of valid results, two decimals */
  readonly successRate: number;
}

/**
 * Options for a verification run
 */
export interface VerifyOptions {
  /** Mailbox strategy (default: 'smtp') */
  mode?: VerificationMode;

  /** Maximum number of candidates in flight (default: 10) */
  concurrency?: number;

  /** Timeout for DNS lookups in milliseconds (default: 5000) */
  dnsTimeout?: number;

  /** Timeout for SMTP connect and each command in milliseconds (default: 10000) */
  smtpTimeout?: number;

  /** SMTP port to connect to (default: 25) */
  smtpPort?: number;

  /** The sender email to use in SMTP MAIL FROM (default: test@example.com) */
  senderEmail?: string;

  /** Client name announced in EHLO/HELO (default: localhost) */
  heloName?: string;

  /** Token for the verification API; required in 'api' mode */
  apiToken?: string;

  /** Base URL of the verification API (default: https://verifyright.co/verify) */
  apiBaseUrl?: string;

  /** Timeout for the API request in milliseconds (default: 10000) */
  apiTimeout?: number;

  /** Called with each result as soon as it is produced */
  onResult?: (result: VerificationResult) => void;

  /** Logger to use instead of the package logger */
  logger?: Logger;
}

/**
 * What a run hands to reporting
 */
export interface RunOutput {
  /** One result per input candidate, in completion order */
  results: VerificationResult[];
  stats: Stats;
}
