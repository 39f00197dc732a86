/**
 * Unit tests for the nodemailer-backed SMTP mailer.
 */

import { describe, expect, it, vi } from 'vitest';
import { ErrorCodes, TransientError } from '../../../src/utils/errors.js';
import {
  SmtpMailer,
  exponentialDelays,
  isSmtpRejection,
  type SmtpMailerOptions,
} from '../../../src/services/mailer/smtp.js';
import type { OutboundMail } from '../../../src/services/intake/types.js';

const transport = vi.hoisted(() => {
  const sendMail = vi.fn(async (_options: Record<string, unknown>) => ({ messageId: '<sent-1@example.test>' }));
  const close = vi.fn();
  const createTransport = vi.fn((_options: Record<string, unknown>) => ({ sendMail, close }));
  return { sendMail, close, createTransport };
});

vi.mock('nodemailer', () => ({
  default: { createTransport: transport.createTransport },
}));

const OPTIONS: SmtpMailerOptions = {
  host: 'smtp.example.test',
  port: 587,
  secure: false,
  user: 'trips@example.test',
  password: 'test-password',
  from: 'trips@example.test',
  retryDelaysMs: [1, 1],
};

const MAIL: OutboundMail = {
  to: 'alice@example.com',
  subject: 'Re: Booking - Travel Itinerary',
  body: 'Your travel itinerary has been processed.\n',
  inReplyTo: '<m1@example.com>',
  references: '<m1@example.com>',
  attachment: { filename: 'itinerary-7.ics', contentType: 'text/calendar', content: 'BEGIN:VCALENDAR' },
};

function smtpError(message: string, fields: { code?: string; responseCode?: number }): Error {
  return Object.assign(new Error(message), fields);
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected promise to reject');
    },
    (err: unknown) => err,
  );
}

describe('SmtpMailer', () => {
  it('creates the transport with timeouts', () => {
    new SmtpMailer({ ...OPTIONS, connectTimeoutMs: 5_000, socketTimeoutMs: 20_000 });

    expect(transport.createTransport).toHaveBeenCalledWith({
      host: 'smtp.example.test',
      port: 587,
      secure: false,
      auth: { user: 'trips@example.test', pass: 'test-password' },
      connectionTimeout: 5_000,
      greetingTimeout: 5_000,
      socketTimeout: 20_000,
    });
  });

  it('sends a threaded, auto-submitted reply with its attachment', async () => {
    const mailer = new SmtpMailer(OPTIONS);

    await mailer.send(MAIL);

    expect(transport.sendMail).toHaveBeenCalledWith({
      from: 'trips@example.test',
      to: 'alice@example.com',
      subject: 'Re: Booking - Travel Itinerary',
      text: 'Your travel itinerary has been processed.\n',
      inReplyTo: '<m1@example.com>',
      references: '<m1@example.com>',
      headers: { 'Auto-Submitted': 'auto-replied' },
      attachments: [{ filename: 'itinerary-7.ics', content: 'BEGIN:VCALENDAR', contentType: 'text/calendar' }],
    });
  });

  it('sends no attachments when the mail has none', async () => {
    const mailer = new SmtpMailer(OPTIONS);
    await mailer.send({ to: 'alice@example.com', subject: 's', body: 'b' });

    const [options] = transport.sendMail.mock.calls[0];
    expect(options.attachments).toBeUndefined();
  });

  it('retries transport errors and succeeds', async () => {
    transport.sendMail.mockRejectedValueOnce(smtpError('Greeting never received', { code: 'ETIMEDOUT' }));
    const mailer = new SmtpMailer(OPTIONS);

    await mailer.send(MAIL);

    expect(transport.sendMail).toHaveBeenCalledTimes(2);
  });

  it('gives up after every attempt failed', async () => {
    transport.sendMail
      .mockRejectedValueOnce(smtpError('Connection closed', { code: 'ECONNECTION' }))
      .mockRejectedValueOnce(smtpError('Connection closed', { code: 'ECONNECTION' }))
      .mockRejectedValueOnce(smtpError('Connection closed', { code: 'ECONNECTION' }));
    const mailer = new SmtpMailer(OPTIONS);

    const error = await captureError(mailer.send(MAIL));

    expect(error).toBeInstanceOf(TransientError);
    if (!(error instanceof TransientError)) return;
    expect(error.code).toBe(ErrorCodes.MAILER_TRANSPORT);
    expect(error.message).toBe('SMTP send failed after 3 attempts: Connection closed');
    expect(transport.sendMail).toHaveBeenCalledTimes(3);
  });

  it('does not retry a rejected recipient but leaves it to the attempt budget', async () => {
    transport.sendMail.mockRejectedValueOnce(smtpError('Mailbox unavailable', { code: 'EENVELOPE', responseCode: 550 }));
    const mailer = new SmtpMailer(OPTIONS);

    const error = await captureError(mailer.send(MAIL));

    expect(error).toBeInstanceOf(TransientError);
    if (!(error instanceof TransientError)) return;
    expect(error.code).toBe(ErrorCodes.MAILER_REJECTED);
    expect(error.message).toBe('SMTP rejected message: Mailbox unavailable');
    expect(transport.sendMail).toHaveBeenCalledTimes(1);
  });

  it('stops retrying when the signal aborts during a backoff', async () => {
    transport.sendMail.mockRejectedValueOnce(smtpError('Greeting never received', { code: 'ETIMEDOUT' }));
    const mailer = new SmtpMailer({ ...OPTIONS, retryDelaysMs: [60_000] });
    const controller = new AbortController();

    const pending = captureError(mailer.send(MAIL, controller.signal));
    await vi.waitFor(() => {
      expect(transport.sendMail).toHaveBeenCalledTimes(1);
    });
    controller.abort();
    const error = await pending;

    expect(error).toBeInstanceOf(TransientError);
    if (!(error instanceof TransientError)) return;
    expect(error.code).toBe(ErrorCodes.MAILER_TRANSPORT);
    expect(error.message).toBe('SMTP send aborted after 1 of 2 attempts: Greeting never received');
    expect(transport.sendMail).toHaveBeenCalledTimes(1);
  });

  it('closes the transport', () => {
    const mailer = new SmtpMailer(OPTIONS);
    mailer.close();
    expect(transport.close).toHaveBeenCalledTimes(1);
  });
});

describe('isSmtpRejection', () => {
  it('recognises envelope and 55x errors', () => {
    expect(isSmtpRejection(smtpError('x', { code: 'EENVELOPE' }))).toBe(true);
    expect(isSmtpRejection(smtpError('x', { responseCode: 553 }))).toBe(true);
  });

  it('leaves 4xx and network errors to the retry loop', () => {
    expect(isSmtpRejection(smtpError('x', { responseCode: 421 }))).toBe(false);
    expect(isSmtpRejection(smtpError('x', { code: 'ECONNECTION' }))).toBe(false);
    expect(isSmtpRejection('boom')).toBe(false);
  });
});

describe('exponentialDelays', () => {
  it('doubles from the base delay', () => {
    expect(exponentialDelays(3, 2_000)).toEqual([2_000, 4_000, 8_000]);
    expect(exponentialDelays(0, 2_000)).toEqual([]);
  });
});
