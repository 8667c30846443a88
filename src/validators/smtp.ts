/**
 * SMTP validation for email verification
 *
 * Connects to the mail server and performs an SMTP handshake
 * to verify if the mailbox exists without actually sending email.
 * No DATA command is ever issued.
 */

import net from 'net';
import type { Logger } from 'pino';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';

/**
 * Default SMTP port
 */
export const DEFAULT_SMTP_PORT = 25;

/**
 * Default timeout for the connection and for each command (10 seconds)
 */
export const DEFAULT_SMTP_TIMEOUT = 10000;

/**
 * Default sender email for MAIL FROM command
 */
export const DEFAULT_SENDER = 'test@example.com';

/**
 * Default client name for EHLO/HELO
 */
export const DEFAULT_HELO_NAME = 'localhost';

/**
 * Upper bound on waiting for the reply to QUIT
 */
const QUIT_TIMEOUT = 2000;

/**
 * SMTP response code categories
 */
const RESPONSE_CODES = {
  SUCCESS: 2,      // 2xx - success
  TEMPORARY: 4,    // 4xx - temporary failure
  PERMANENT: 5,    // 5xx - permanent failure
} as const;

/**
 * Status of an SMTP probe against one host
 */
export type SmtpStatus =
  | 'accepted'    // 2xx to RCPT TO
  | 'rejected'    // 5xx to RCPT TO
  | 'deferred'    // 4xx to RCPT TO (greylisting, rate limiting)
  | 'failed';     // the dialogue did not reach a RCPT TO verdict

/**
 * Why a probe failed before reaching a verdict
 */
export type SmtpFailure =
  | 'connection_failed'  // refused, reset or closed
  | 'timeout'            // connect or a command exceeded its timeout
  | 'protocol';          // unexpected reply before RCPT TO

/**
 * A complete (possibly multi-line) SMTP reply
 */
export interface SmtpReply {
  code: number | null;
  message: string;
}

/**
 * Result of an SMTP probe
 */
export interface SmtpResult {
  host: string;
  status: SmtpStatus;
  failure?: SmtpFailure;
  /** Whether the host sent at least one SMTP reply */
  answered: boolean;
  responseCode?: number;
  responseMessage: string;
  /** Time taken for the SMTP probe in milliseconds */
  responseTime: number;
}

/**
 * Raised inside a probe to abort the current host
 */
class ProbeAbort extends Error {
  readonly failure: SmtpFailure;
  readonly code?: number;

  constructor(failure: SmtpFailure, message: string, code?: number) {
    super(message);
    this.name = 'ProbeAbort';
    this.failure = failure;
    this.code = code;
  }
}

/**
 * Gets the category of an SMTP response code
 *
 * @param code - The SMTP response code
 * @returns The category (2, 4, or 5) or null if invalid
 */
function getResponseCategory(code: number | null): number | null {
  if (code === null) return null;
  const category = Math.floor(code / 100);
  return [2, 4, 5].includes(category) ? category : null;
}

function isSuccess(reply: SmtpReply): boolean {
  return getResponseCategory(reply.code) === RESPONSE_CODES.SUCCESS;
}

/**
 * Converts the RCPT TO reply code to a status
 */
function codeToStatus(code: number | null): SmtpStatus {
  switch (getResponseCategory(code)) {
    case RESPONSE_CODES.SUCCESS:
      return 'accepted';
    case RESPONSE_CODES.PERMANENT:
      return 'rejected';
    case RESPONSE_CODES.TEMPORARY:
      return 'deferred';
    default:
      return 'failed';
  }
}

/**
 * Line-oriented reader over one SMTP connection
 *
 * Listens from the moment the socket is created, so a banner that
 * arrives together with the connect event is queued rather than lost.
 */
class SmtpSession {
  answered = false;

  private buffer = '';
  private pendingLines: string[] = [];
  private replies: SmtpReply[] = [];
  private closed: ProbeAbort | null = null;
  private waiter: {
    resolve: (reply: SmtpReply) => void;
    reject: (error: ProbeAbort) => void;
    timer: NodeJS.Timeout;
  } | null = null;

  constructor(private readonly socket: net.Socket) {
    socket.on('data', (data: Buffer | string) => this.onData(data.toString()));
    socket.on('error', (err: Error) => this.onClosed(new ProbeAbort('connection_failed', err.message)));
    socket.on('close', () => this.onClosed(new ProbeAbort('connection_failed', 'Connection closed by remote host')));
  }

  /**
   * Opens the TCP connection
   */
  connect(port: number, host: string, timeout: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onTimeout = () => {
        cleanup();
        reject(new ProbeAbort('timeout', 'Connection timeout'));
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ProbeAbort('connection_failed', err.message));
      };
      const cleanup = () => {
        this.socket.removeListener('timeout', onTimeout);
        this.socket.removeListener('error', onError);
      };

      this.socket.setTimeout(timeout);
      this.socket.once('timeout', onTimeout);
      this.socket.once('error', onError);
      this.socket.connect(port, host, () => {
        cleanup();
        // Command round-trips carry their own timers from here on
        this.socket.setTimeout(0);
        resolve();
      });
    });
  }

  /**
   * Waits for the next complete reply
   */
  read(timeout: number): Promise<SmtpReply> {
    const queued = this.replies.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(this.closed);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new ProbeAbort('timeout', `No reply within ${timeout}ms`));
      }, timeout);
      this.waiter = { resolve, reject, timer };
    });
  }

  /**
   * Sends a command and waits for its reply
   */
  command(line: string, timeout: number): Promise<SmtpReply> {
    if (this.closed) {
      return Promise.reject(this.closed);
    }
    this.socket.write(`${line}\r\n`);
    return this.read(timeout);
  }

  get isOpen(): boolean {
    return this.closed === null && !this.socket.destroyed;
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const rawLine of lines) {
      const line = rawLine.replace(/\r$/, '');
      const match = /^(\d{3})([ -]?)(.*)$/.exec(line);

      if (!match) {
        this.pendingLines = [];
        this.push({ code: null, message: line });
        continue;
      }

      this.pendingLines.push(line);
      // "250-..." continues a multi-line reply; "250 ..." ends it
      if (match[2] !== '-') {
        const message = this.pendingLines.join('\n');
        this.pendingLines = [];
        this.push({ code: parseInt(match[1] ?? '', 10), message });
      }
    }
  }

  private push(reply: SmtpReply): void {
    this.answered = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(reply);
    } else {
      this.replies.push(reply);
    }
  }

  private onClosed(reason: ProbeAbort): void {
    if (this.closed) return;
    this.closed = reason;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(reason);
    }
  }
}

function expectSuccess(reply: SmtpReply, step: string): void {
  if (!isSuccess(reply)) {
    throw new ProbeAbort('protocol', `${step} refused: ${reply.message}`, reply.code ?? undefined);
  }
}

/**
 * Options for SMTP probe
 */
export interface SmtpProbeOptions {
  /** The MX host to connect to */
  host: string;
  /** The port to connect to (default: 25) */
  port?: number;
  /** Connect and per-command timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** The sender email address for MAIL FROM (default: test@example.com) */
  senderEmail?: string;
  /** Client name for EHLO/HELO (default: localhost) */
  heloName?: string;
  /** The recipient email address to verify */
  recipientEmail: string;
  logger?: Logger;
}

/**
 * Performs an SMTP probe to verify if an email address exists
 *
 * The probe performs the following steps:
 * 1. Connect to the MX server
 * 2. Receive the banner (220)
 * 3. Send EHLO (HELO if EHLO is refused)
 * 4. Send MAIL FROM
 * 5. Send RCPT TO (the actual verification)
 * 6. Send QUIT and close, whatever happened after connecting
 *
 * @param options - The probe options
 * @returns SmtpResult with the verification status
 *
 * @example
 * ```ts
 * const result = await smtpProbe({
 *   host: 'mx.example.com',
 *   recipientEmail: 'user@example.com',
 * });
 *
 * if (result.status === 'accepted') {
 *   console.log('Email exists!');
 * }
 * ```
 */
export async function smtpProbe(options: SmtpProbeOptions): Promise<SmtpResult> {
  const {
    host,
    port = DEFAULT_SMTP_PORT,
    timeout = DEFAULT_SMTP_TIMEOUT,
    senderEmail = DEFAULT_SENDER,
    heloName = DEFAULT_HELO_NAME,
    recipientEmail,
  } = options;
  const log = createLogger('smtp', options.logger);

  const startTime = Date.now();
  const socket = new net.Socket();
  const session = new SmtpSession(socket);
  let connected = false;

  try {
    await session.connect(port, host, timeout);
    connected = true;

    expectSuccess(await session.read(timeout), 'Banner');

    const ehlo = await session.command(`EHLO ${heloName}`, timeout);
    if (!isSuccess(ehlo)) {
      expectSuccess(await session.command(`HELO ${heloName}`, timeout), 'HELO');
    }

    expectSuccess(await session.command(`MAIL FROM:<${senderEmail}>`, timeout), 'MAIL FROM');

    const rcptTo = await session.command(`RCPT TO:<${recipientEmail}>`, timeout);
    const status = codeToStatus(rcptTo.code);

    log.debug({ host, code: rcptTo.code, status }, 'RCPT TO answered');

    return {
      host,
      status,
      failure: status === 'failed' ? 'protocol' : undefined,
      answered: true,
      responseCode: rcptTo.code ?? undefined,
      responseMessage: rcptTo.message,
      responseTime: Date.now() - startTime,
    };
  } catch (err) {
    const abort = err instanceof ProbeAbort
      ? err
      : new ProbeAbort('connection_failed', errorMessage(err));

    log.debug({ host, failure: abort.failure, err: abort.message }, 'probe aborted');

    return {
      host,
      status: 'failed',
      failure: abort.failure,
      answered: session.answered,
      responseCode: abort.code,
      responseMessage: abort.message,
      responseTime: Date.now() - startTime,
    };
  } finally {
    if (connected && session.isOpen) {
      try {
        await session.command('QUIT', Math.min(timeout, QUIT_TIMEOUT));
      } catch (err) {
        log.debug({ host, err: errorMessage(err) }, 'no reply to QUIT');
      }
    }
    socket.destroy();
  }
}

/**
 * Options for probing a list of hosts
 */
export interface ProbeHostsOptions {
  port?: number;
  timeout?: number;
  senderEmail?: string;
  heloName?: string;
  logger?: Logger;
}

/**
 * Probes MX hosts in priority order until one gives a verdict
 *
 * The first host that completes the dialogue up to RCPT TO decides.
 * Hosts that cannot be reached, time out, or refuse the dialogue before
 * RCPT TO are skipped. When none decides, the result is 'failed' with
 * failure 'protocol' if some host answered and failed for a reason
 * other than a timeout, and 'timeout' otherwise.
 *
 * @param mxHosts - Array of MX hostnames in priority order
 * @param recipientEmail - The email address to verify
 * @param options - Additional options
 */
export async function probeHosts(
  mxHosts: readonly string[],
  recipientEmail: string,
  options: ProbeHostsOptions = {}
): Promise<SmtpResult> {
  const startTime = Date.now();
  let answeredWithoutVerdict = false;
  let lastMessage = 'No MX hosts to probe';

  for (const host of mxHosts) {
    const result = await smtpProbe({ ...options, host, recipientEmail });

    if (result.status !== 'failed') {
      return result;
    }

    if (result.answered && result.failure !== 'timeout') {
      answeredWithoutVerdict = true;
    }
    lastMessage = `${host}: ${result.responseMessage}`;
  }

  return {
    host: mxHosts[mxHosts.length - 1] ?? '',
    status: 'failed',
    failure: answeredWithoutVerdict ? 'protocol' : 'timeout',
    answered: answeredWithoutVerdict,
    responseMessage: mxHosts.length > 1 ? `All MX hosts failed (last: ${lastMessage})` : lastMessage,
    responseTime: Date.now() - startTime,
  };
}
