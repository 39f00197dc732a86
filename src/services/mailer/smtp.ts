/**
 * @fileoverview SMTP mailer backed by nodemailer.
 *
 * Transport failures (connection, greeting, socket timeouts, 4xx replies)
 * are retried with backoff inside one send call. Envelope rejections and
 * 55x recipient errors are not retried here; they surface as transient
 * MAILER_REJECTED failures so the message's attempt budget decides.
 * An abort during a backoff ends the call at once.
 */

import nodemailer, { type Transporter } from 'nodemailer';
import { ErrorCodes, TransientError, errorMessage } from '../../utils/errors.js';
import { sleep } from '../../utils/delay.js';
import { silentLogger, type AppLogger } from '../../utils/observability/index.js';
import type { Mailer, OutboundMail } from '../intake/types.js';

export type SmtpMailerOptions = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from: string;
  connectTimeoutMs?: number;
  socketTimeoutMs?: number;
  /** Delays between attempts; attempts = delays + 1. */
  retryDelaysMs?: number[];
  logger?: AppLogger;
};

/** Reply codes meaning the server refused the recipient or envelope. */
const PERMANENT_RESPONSE_CODES = new Set([550, 551, 552, 553, 554]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function responseCode(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('responseCode' in err)) return undefined;
  return typeof err.responseCode === 'number' ? err.responseCode : undefined;
}

export function isSmtpRejection(err: unknown): boolean {
  if (errorCode(err) === 'EENVELOPE') return true;
  const status = responseCode(err);
  return status !== undefined && PERMANENT_RESPONSE_CODES.has(status);
}

/** Exponential delays: base, 2·base, 4·base... one per retry. */
export function exponentialDelays(retries: number, baseDelayMs: number): number[] {
  return Array.from({ length: Math.max(0, retries) }, (_, index) => baseDelayMs * 2 ** index);
}

export class SmtpMailer implements Mailer {
  private readonly transporter: Transporter;
  private readonly retryDelaysMs: number[];
  private readonly logger: AppLogger;

  constructor(private readonly options: SmtpMailerOptions) {
    const connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.transporter = nodemailer.createTransport({
      host: options.host,
      port: options.port,
      secure: options.secure,
      auth: {
        user: options.user,
        pass: options.password,
      },
      connectionTimeout: connectTimeoutMs,
      greetingTimeout: connectTimeoutMs,
      socketTimeout: options.socketTimeoutMs ?? 30_000,
    });
    this.retryDelaysMs = options.retryDelaysMs ?? [2_000, 4_000];
    this.logger = (options.logger ?? silentLogger).child({ component: 'smtp' });
  }

  async send(mail: OutboundMail, signal?: AbortSignal): Promise<void> {
    const totalAttempts = this.retryDelaysMs.length + 1;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      try {
        const info = await this.transporter.sendMail({
          from: this.options.from,
          to: mail.to,
          subject: mail.subject,
          text: mail.body,
          inReplyTo: mail.inReplyTo,
          references: mail.references,
          headers: { 'Auto-Submitted': 'auto-replied' },
          attachments: mail.attachment
            ? [{
                filename: mail.attachment.filename,
                content: mail.attachment.content,
                contentType: mail.attachment.contentType,
              }]
            : undefined,
        });
        this.logger.info('smtp_sent', { to: mail.to, attempt, messageId: info.messageId });
        return;
      } catch (err) {
        if (isSmtpRejection(err)) {
          this.logger.warn('smtp_rejected', { to: mail.to, error: errorMessage(err), responseCode: responseCode(err) });
          throw new TransientError(`SMTP rejected message: ${errorMessage(err)}`, ErrorCodes.MAILER_REJECTED, {
            responseCode: responseCode(err),
          });
        }

        if (attempt >= totalAttempts) {
          throw new TransientError(
            `SMTP send failed after ${totalAttempts} attempts: ${errorMessage(err)}`,
            ErrorCodes.MAILER_TRANSPORT,
            { errorCode: errorCode(err) },
          );
        }

        const waitMs = this.retryDelaysMs[attempt - 1];
        this.logger.warn('smtp_send_retry', {
          to: mail.to,
          attempt,
          totalAttempts,
          retryInMs: waitMs,
          errorCode: errorCode(err),
          error: errorMessage(err),
        });
        if (!(await sleep(waitMs, signal))) {
          throw new TransientError(
            `SMTP send aborted after ${attempt} of ${totalAttempts} attempts: ${errorMessage(err)}`,
            ErrorCodes.MAILER_TRANSPORT,
            { errorCode: errorCode(err) },
          );
        }
      }
    }
  }

  close(): void {
    this.transporter.close();
  }
}
