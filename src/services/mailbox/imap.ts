/**
 * @fileoverview IMAP mailbox backed by imapflow.
 *
 * Message ids are UIDs rendered as strings. IDLE is driven by hand
 * (auto-idle disabled) so the monitor decides when to wait and for how
 * long; the wait is broken with a NOOP on timeout or abort.
 */

import { ImapFlow } from 'imapflow';
import { ErrorCodes, TransientError, errorMessage } from '../../utils/errors.js';
import { silentLogger, type AppLogger } from '../../utils/observability/index.js';
import type { FetchedMessage, Mailbox, MessageId } from '../intake/types.js';
import { parseSource } from './parse.js';

export type ImapMailboxOptions = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  mailbox: string;
  /** When false, checkPushSupport always reports false. */
  idleEnabled?: boolean;
  logger?: AppLogger;
};

type ExistsEvent = {
  path: string;
  count: number;
  prevCount: number;
};

function mailboxError(operation: string, err: unknown): TransientError {
  if (err instanceof TransientError) return err;
  return new TransientError(`IMAP ${operation} failed: ${errorMessage(err)}`, ErrorCodes.MAILBOX_IO, { operation });
}

function toUid(id: MessageId): number {
  const uid = Number(id);
  if (!Number.isInteger(uid) || uid <= 0) {
    throw new TransientError(`Invalid message id: ${id}`, ErrorCodes.MAILBOX_IO);
  }
  return uid;
}

export class ImapMailbox implements Mailbox {
  private client: ImapFlow | null = null;
  private readonly handled = new Set<MessageId>();
  private readonly logger: AppLogger;

  constructor(private readonly options: ImapMailboxOptions) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'imap' });
  }

  async reconnect(): Promise<void> {
    await this.close();

    const client = new ImapFlow({
      host: this.options.host,
      port: this.options.port,
      secure: this.options.secure,
      auth: {
        user: this.options.user,
        pass: this.options.password,
      },
      logger: false,
      disableAutoIdle: true,
    });

    client.on('error', (err: Error) => {
      this.logger.warn('imap_client_error', { error: err.message });
    });
    client.on('close', () => {
      if (this.client === client) {
        this.client = null;
        this.logger.info('imap_connection_closed');
      }
    });

    try {
      await client.connect();
      await client.mailboxOpen(this.options.mailbox);
    } catch (err) {
      client.close();
      throw mailboxError('connect', err);
    }

    this.client = client;
    this.handled.clear();
    this.logger.info('imap_connected', { host: this.options.host, mailbox: this.options.mailbox });
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;
    try {
      await client.logout();
    } catch (err) {
      this.logger.debug('imap_logout_failed', { error: errorMessage(err) });
      client.close();
    }
  }

  async checkPushSupport(): Promise<boolean> {
    if (this.options.idleEnabled === false) return false;
    const client = this.requireClient();
    return client.capabilities.has('IDLE');
  }

  async searchUnseen(): Promise<MessageId[]> {
    const client = this.requireClient();
    try {
      const result = await client.search({ seen: false }, { uid: true });
      const uids = Array.isArray(result) ? result : [];
      return uids.map((uid) => String(uid));
    } catch (err) {
      throw mailboxError('search', err);
    }
  }

  async fetch(id: MessageId): Promise<FetchedMessage> {
    const client = this.requireClient();
    const uid = toUid(id);

    let source: Buffer | undefined;
    try {
      const message = await client.fetchOne(String(uid), { source: true }, { uid: true });
      source = message ? message.source : undefined;
    } catch (err) {
      throw mailboxError('fetch', err);
    }

    if (!source) {
      throw new TransientError(`Message ${id} not found in ${this.options.mailbox}`, ErrorCodes.MAILBOX_IO);
    }
    return parseSource(id, source);
  }

  async markHandled(id: MessageId): Promise<void> {
    if (this.handled.has(id)) return;
    const client = this.requireClient();
    try {
      await client.messageFlagsAdd(String(toUid(id)), ['\\Seen'], { uid: true });
    } catch (err) {
      throw mailboxError('mark handled', err);
    }
    this.handled.add(id);
  }

  async waitForNotification(timeoutMs: number, signal?: AbortSignal): Promise<{ notified: boolean }> {
    const client = this.requireClient();
    if (signal?.aborted) return { notified: false };

    let notified = false;
    let breaking = false;

    const breakIdle = (): void => {
      if (breaking) return;
      breaking = true;
      client.noop().catch((err: unknown) => {
        this.logger.debug('imap_idle_break_failed', { error: errorMessage(err) });
      });
    };
    const onExists = (event: ExistsEvent): void => {
      if (event.count > event.prevCount) {
        notified = true;
        breakIdle();
      }
    };

    const timer = setTimeout(breakIdle, timeoutMs);
    signal?.addEventListener('abort', breakIdle, { once: true });
    client.on('exists', onExists);

    try {
      await client.idle();
      return { notified };
    } catch (err) {
      throw mailboxError('idle', err);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', breakIdle);
      client.off('exists', onExists);
    }
  }

  private requireClient(): ImapFlow {
    if (!this.client) {
      throw new TransientError('IMAP client is not connected', ErrorCodes.MAILBOX_IO);
    }
    return this.client;
  }
}
