import type { Logger } from 'pino';
import type { Candidate, MxRecord, ProbeOutcome, Verifier } from '../types';
import { probeHosts, type SmtpResult } from '../validators/smtp';

export interface SmtpVerifierOptions {
  port?: number;
  timeout?: number;
  senderEmail?: string;
  heloName?: string;
  logger?: Logger;
}

/**
 * Checks mailboxes by talking SMTP to the domain's mail exchangers
 */
export class SmtpVerifier implements Verifier {
  readonly mode = 'smtp' as const;
  private readonly options: SmtpVerifierOptions;

  constructor(options: SmtpVerifierOptions = {}) {
    this.options = options;
  }

  async verify(candidate: Candidate, hosts: readonly MxRecord[]): Promise<ProbeOutcome> {
    if (hosts.length === 0) {
      return { status: 'unknown', reason: 'No mail exchanger to probe' };
    }

    const result = await probeHosts(
      hosts.map((mx) => mx.exchange),
      candidate.address,
      this.options
    );

    return toOutcome(result);
  }
}

/**
 * Maps a host-level SMTP result to a terminal outcome
 */
export function toOutcome(result: SmtpResult): ProbeOutcome {
  const base = {
    reason: result.responseMessage,
    responseCode: result.responseCode,
    host: result.host || undefined,
  };

  switch (result.status) {
    case 'accepted':
      return { ...base, status: 'valid' };
    case 'rejected':
      return { ...base, status: 'mailbox_rejected', error: 'rejected' };
    case 'deferred':
      return { ...base, status: 'ambiguous', error: 'ambiguous' };
    case 'failed':
      return result.failure === 'protocol'
        ? { ...base, status: 'unknown', error: 'connection_failed' }
        : { ...base, status: 'timeout', error: 'timeout' };
  }
}
