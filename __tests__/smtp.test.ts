import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import net from 'net';
import { smtpProbe, probeHosts } from '../src/validators/smtp';
import { MockSocket, dialogue, type ConnectBehavior } from './helpers/mock-socket';

// Mock the net module
vi.mock('net', () => ({
  default: {
    Socket: vi.fn(),
  },
}));

/**
 * Hands out one scripted socket per connection attempt
 */
function useSockets(...scripts: Array<{ replies?: string[]; behavior?: ConnectBehavior }>): MockSocket[] {
  const sockets = scripts.map(({ replies = [], behavior }) => new MockSocket(replies, behavior));
  let next = 0;
  vi.mocked(net.Socket).mockImplementation(function () {
    const socket = sockets[next++] ?? new MockSocket([], 'refused');
    return socket as unknown as net.Socket;
  });
  return sockets;
}

describe('SMTP Validators', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('smtpProbe', () => {
    it('should return accepted for 250 response to RCPT TO', async () => {
      const [socket] = useSockets({ replies: dialogue('250 Accepted') });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('accepted');
      expect(result.responseCode).toBe(250);
      expect(result.responseMessage).toBe('250 Accepted');
      expect(result.answered).toBe(true);
      expect(result.failure).toBeUndefined();
      expect(socket?.host).toBe('mx.example.com');
    });

    it('should send EHLO, MAIL FROM, RCPT TO and QUIT in order', async () => {
      const [socket] = useSockets({ replies: dialogue('250 Accepted') });

      await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(socket?.commands).toEqual([
        'EHLO localhost',
        'MAIL FROM:<test@example.com>',
        'RCPT TO:<user@example.com>',
        'QUIT',
      ]);
      expect(socket?.destroyed).toBe(true);
    });

    it('should use the configured sender and client name', async () => {
      const [socket] = useSockets({ replies: dialogue('250 Accepted') });

      await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
        senderEmail: 'probe@sender.test',
        heloName: 'verifier.sender.test',
      });

      expect(socket?.commands.slice(0, 2)).toEqual([
        'EHLO verifier.sender.test',
        'MAIL FROM:<probe@sender.test>',
      ]);
    });

    it('should read a multi-line EHLO reply to its last line', async () => {
      useSockets({
        replies: [
          '220 mx.example.com ESMTP ready',
          '250-mx.example.com Hello\r\n250-PIPELINING\r\n250-8BITMIME\r\n250 SIZE 35882577',
          '250 OK',
          '250 Accepted',
        ],
      });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('accepted');
    });

    it('should fall back to HELO when EHLO is refused', async () => {
      const [socket] = useSockets({
        replies: [
          '220 mx.example.com ESMTP ready',
          '502 Command not implemented',
          '250 mx.example.com',
          '250 OK',
          '250 Accepted',
        ],
      });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('accepted');
      expect(socket?.commands.slice(0, 2)).toEqual(['EHLO localhost', 'HELO localhost']);
    });

    it('should return rejected for 550 response to RCPT TO', async () => {
      const [socket] = useSockets({ replies: dialogue('550 User not found') });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'nonexistent@example.com',
      });

      expect(result.status).toBe('rejected');
      expect(result.responseCode).toBe(550);
      expect(result.responseMessage).toBe('550 User not found');
      expect(socket?.commands).toEqual([
        'EHLO localhost',
        'MAIL FROM:<test@example.com>',
        'RCPT TO:<nonexistent@example.com>',
        'QUIT',
      ]);
      expect(socket?.destroyed).toBe(true);
    });

    it('should handle 553 rejection', async () => {
      useSockets({ replies: dialogue('553 Mailbox name not allowed') });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'invalid@example.com',
      });

      expect(result.status).toBe('rejected');
      expect(result.responseCode).toBe(553);
    });

    it('should return deferred for 4xx response', async () => {
      const [socket] = useSockets({ replies: dialogue('450 Greylisted, try again later') });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('deferred');
      expect(result.responseCode).toBe(450);
      expect(socket?.commands.at(-1)).toBe('QUIT');
      expect(socket?.destroyed).toBe(true);
    });

    it('should fail with protocol when the banner is not 2xx', async () => {
      const [socket] = useSockets({ replies: ['554 No SMTP service here'] });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('protocol');
      expect(result.answered).toBe(true);
      expect(result.responseCode).toBe(554);
      expect(result.responseMessage).toBe('Banner refused: 554 No SMTP service here');
      expect(socket?.commands).toEqual(['QUIT']);
    });

    it('should fail with protocol when MAIL FROM is refused', async () => {
      const [socket] = useSockets({
        replies: [
          '220 mx.example.com ESMTP ready',
          '250 mx.example.com',
          '530 Authentication required',
        ],
      });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('protocol');
      expect(result.responseMessage).toBe('MAIL FROM refused: 530 Authentication required');
      expect(socket?.commands).not.toContain('RCPT TO:<user@example.com>');
    });

    it('should fail with timeout on connection timeout', async () => {
      const [socket] = useSockets({ behavior: 'timeout' });

      const result = await smtpProbe({
        host: 'slow.example.com',
        recipientEmail: 'user@example.com',
        timeout: 100,
      });

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('timeout');
      expect(result.answered).toBe(false);
      expect(result.responseMessage).toBe('Connection timeout');
      expect(socket?.written).toEqual([]);
      expect(socket?.destroyed).toBe(true);
    });

    it('should fail with connection_failed on connection error', async () => {
      useSockets({ behavior: 'refused' });

      const result = await smtpProbe({
        host: 'unreachable.example.com',
        recipientEmail: 'user@example.com',
      });

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('connection_failed');
      expect(result.answered).toBe(false);
      expect(result.responseMessage).toBe('connect ECONNREFUSED unreachable.example.com:25');
    });

    it('should fail with timeout when a command gets no reply', async () => {
      const [socket] = useSockets({ replies: ['220 mx.example.com ESMTP ready'] });

      const result = await smtpProbe({
        host: 'mx.example.com',
        recipientEmail: 'user@example.com',
        timeout: 50,
      });

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('timeout');
      expect(result.answered).toBe(true);
      expect(result.responseMessage).toBe('No reply within 50ms');
      expect(socket?.commands).toEqual(['EHLO localhost', 'QUIT']);
    });
  });

  describe('probeHosts', () => {
    it('should try the next host when one cannot be reached', async () => {
      useSockets({ behavior: 'refused' }, { replies: dialogue('250 Accepted') });

      const result = await probeHosts(
        ['mx1.example.com', 'mx2.example.com'],
        'user@example.com'
      );

      expect(result.status).toBe('accepted');
      expect(result.host).toBe('mx2.example.com');
      expect(net.Socket).toHaveBeenCalledTimes(2);
    });

    it('should stop on first rejected response', async () => {
      useSockets({ replies: dialogue('550 User not found') }, { replies: dialogue('250 Accepted') });

      const result = await probeHosts(
        ['mx1.example.com', 'mx2.example.com'],
        'nonexistent@example.com'
      );

      expect(result.status).toBe('rejected');
      expect(result.host).toBe('mx1.example.com');
      expect(net.Socket).toHaveBeenCalledTimes(1);
    });

    it('should report timeout if no host answers', async () => {
      useSockets({ behavior: 'timeout' }, { behavior: 'refused' });

      const result = await probeHosts(
        ['mx1.example.com', 'mx2.example.com'],
        'user@example.com',
        { timeout: 100 }
      );

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('timeout');
      expect(result.answered).toBe(false);
      expect(result.responseMessage).toBe(
        'All MX hosts failed (last: mx2.example.com: connect ECONNREFUSED mx2.example.com:25)'
      );
    });

    it('should report protocol if a host answered but could not finish', async () => {
      useSockets({ replies: ['554 No SMTP service here'] }, { behavior: 'timeout' });

      const result = await probeHosts(
        ['mx1.example.com', 'mx2.example.com'],
        'user@example.com',
        { timeout: 100 }
      );

      expect(result.status).toBe('failed');
      expect(result.failure).toBe('protocol');
      expect(result.answered).toBe(true);
    });

    it('should dial a refusing host again on every call', async () => {
      const sockets = useSockets(
        { behavior: 'refused' },
        { behavior: 'refused' },
        { behavior: 'refused' },
        { behavior: 'refused' }
      );

      const results = [];
      for (let i = 0; i < 4; i++) {
        results.push(await probeHosts(['mx1.example.com'], `user${i}@example.com`));
      }

      expect(net.Socket).toHaveBeenCalledTimes(4);
      expect(sockets.map((socket) => socket.host)).toEqual([
        'mx1.example.com',
        'mx1.example.com',
        'mx1.example.com',
        'mx1.example.com',
      ]);
      expect(results.at(-1)?.responseMessage).toBe('mx1.example.com: connect ECONNREFUSED mx1.example.com:25');
    });
  });
});
