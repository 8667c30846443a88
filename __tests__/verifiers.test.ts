import { describe, it, expect, vi } from 'vitest';
import net from 'net';
import { SmtpVerifier, toOutcome } from '../src/verifiers/smtp';
import { createCandidate } from '../src/validators/format';
import type { SmtpResult } from '../src/validators/smtp';

vi.mock('net', () => ({
  default: {
    Socket: vi.fn(),
  },
}));

function smtpResult(overrides: Partial<SmtpResult>): SmtpResult {
  return {
    host: 'mx.example.com',
    status: 'failed',
    answered: false,
    responseMessage: '',
    responseTime: 5,
    ...overrides,
  };
}

describe('toOutcome', () => {
  it('should map accepted to valid', () => {
    expect(toOutcome(smtpResult({ status: 'accepted', responseCode: 250, responseMessage: '250 OK' })))
      .toEqual({ status: 'valid', reason: '250 OK', responseCode: 250, host: 'mx.example.com' });
  });

  it('should map rejected to mailbox_rejected', () => {
    expect(toOutcome(smtpResult({ status: 'rejected', responseCode: 550 })).status).toBe('mailbox_rejected');
  });

  it('should map deferred to ambiguous', () => {
    expect(toOutcome(smtpResult({ status: 'deferred', responseCode: 451 })).status).toBe('ambiguous');
  });

  it('should map a protocol failure to unknown', () => {
    expect(toOutcome(smtpResult({ failure: 'protocol' })).status).toBe('unknown');
  });

  it('should map timeouts and unreachable hosts to timeout', () => {
    expect(toOutcome(smtpResult({ failure: 'timeout' })).status).toBe('timeout');
    expect(toOutcome(smtpResult({ failure: 'connection_failed' })).status).toBe('timeout');
  });

  it('should drop an empty host', () => {
    expect(toOutcome(smtpResult({ host: '', failure: 'timeout' })).host).toBeUndefined();
  });
});

describe('SmtpVerifier', () => {
  it('should report unknown without connecting when there are no hosts', async () => {
    const verifier = new SmtpVerifier();

    const outcome = await verifier.verify(createCandidate('user@example.com'), []);

    expect(outcome).toEqual({ status: 'unknown', reason: 'No mail exchanger to probe' });
    expect(net.Socket).not.toHaveBeenCalled();
  });
});
