/**
 * @fileoverview Mailbox monitor.
 *
 * Owns the single mailbox connection and turns it into a stream of
 * "new messages" callbacks, in one of two modes:
 *
 * - event: wait on server push (IDLE), re-issued before the server-side
 *   expiry with a safety margin; every wake (notification or timeout)
 *   sweeps the unseen set.
 * - poll: sweep the unseen set on a fixed interval.
 *
 * Mode is chosen after every (re)connect by probing push support.
 * Mailbox I/O errors drop the connection and trigger bounded reconnects with
 * exponential backoff; running out of attempts rejects start() with a
 * FatalError. Repeated processing failures within a window degrade event
 * mode to poll mode until the next reconnect.
 *
 * Shutdown is observed at every suspension point: the notification wait,
 * the poll sleep and the reconnect backoff.
 */

import { ErrorCodes, FatalError, errorMessage } from '../../utils/errors.js';
import { sleep } from '../../utils/delay.js';
import { silentLogger, type AppLogger } from '../../utils/observability/index.js';
import type { BatchResult, Mailbox, MessageId } from './types.js';

export type NewMessagesHandler = (ids: MessageId[], signal: AbortSignal) => Promise<BatchResult>;

export type MonitorState =
  | { kind: 'idle' }
  | { kind: 'connecting'; attempt: number }
  | { kind: 'event' }
  | { kind: 'poll'; reason: string }
  | { kind: 'shutting_down' };

export type ConnectionStatus = 'disconnected' | 'connected' | 'degraded';

export type ConnectionState = {
  status: ConnectionStatus;
  retries: number;
  lastError?: string;
};

export type MonitorStatus = {
  mode: MonitorState['kind'];
  connection: ConnectionState;
  cycles: number;
  lastCycleAt: number | null;
};

export type MailboxMonitorOptions = {
  /** Allow event mode when the server supports it. */
  pushEnabled?: boolean;
  pollIntervalMs?: number;
  idleRenewMs?: number;
  idleMaxMs?: number;
  idleSafetyMarginMs?: number;
  reconnectMaxAttempts?: number;
  reconnectBaseDelayMs?: number;
  reconnectMaxDelayMs?: number;
  /** 0 disables jitter; 0.2 spreads each delay over ±20%. */
  reconnectJitter?: number;
  processingErrorThreshold?: number;
  processingErrorWindowMs?: number;
  logger?: AppLogger;
  now?: () => number;
  random?: () => number;
};

type ResolvedOptions = Required<Omit<MailboxMonitorOptions, 'logger'>>;

const DEFAULTS: ResolvedOptions = {
  pushEnabled: true,
  pollIntervalMs: 30_000,
  idleRenewMs: 5 * 60 * 1000,
  idleMaxMs: 29 * 60 * 1000,
  idleSafetyMarginMs: 60 * 1000,
  reconnectMaxAttempts: 5,
  reconnectBaseDelayMs: 5_000,
  reconnectMaxDelayMs: 5 * 60 * 1000,
  reconnectJitter: 0,
  processingErrorThreshold: 3,
  processingErrorWindowMs: 10 * 60 * 1000,
  now: Date.now,
  random: Math.random,
};

export type BackoffOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
};

/**
 * Delay before reconnect attempt `attempt` (1-based): base·2^(attempt-1),
 * spread by ±jitter, capped at maxDelayMs.
 */
export function computeBackoff(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
  const exponential = options.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const spread = options.jitter > 0 ? 1 + options.jitter * (random() * 2 - 1) : 1;
  return Math.round(Math.min(options.maxDelayMs, exponential * spread));
}

export class MailboxMonitor {
  private readonly options: ResolvedOptions;
  private readonly logger: AppLogger;

  private state: MonitorState = { kind: 'idle' };
  private connection: ConnectionState = { status: 'disconnected', retries: 0 };
  private controller: AbortController | null = null;
  private processingErrors: number[] = [];
  private cycles = 0;
  private lastCycleAt: number | null = null;
  private lastCycleDurationMs = 0;

  constructor(
    private readonly mailbox: Mailbox,
    options: MailboxMonitorOptions = {},
  ) {
    this.options = resolveOptions(options);
    this.logger = (options.logger ?? silentLogger).child({ component: 'monitor' });
  }

  /**
   * Run until stop() is called. Resolves on shutdown; rejects with a
   * FatalError once reconnect attempts are exhausted.
   */
  async start(onNewMessages: NewMessagesHandler): Promise<void> {
    if (this.controller) {
      throw new Error('Mailbox monitor is already running');
    }
    const controller = new AbortController();
    this.controller = controller;
    this.connection = { status: 'disconnected', retries: 0 };
    const { signal } = controller;

    this.logger.info('monitor_started', {
      pushEnabled: this.options.pushEnabled,
      pollIntervalMs: this.options.pollIntervalMs,
      idleWaitMs: this.idleWaitMs(),
    });

    try {
      while (!signal.aborted) {
        const connected = await this.connect(signal);
        if (!connected) break;

        try {
          await this.runSession(onNewMessages, signal);
        } catch (err) {
          if (signal.aborted) break;
          await this.backOffAfterFailure('monitor_connection_lost', err, signal);
        }
      }
    } finally {
      this.state = { kind: 'shutting_down' };
      await this.closeMailbox();
      this.connection = { ...this.connection, status: 'disconnected' };
      this.controller = null;
      this.logger.info('monitor_stopped', { cycles: this.cycles });
    }
  }

  /** Request shutdown; start() resolves once the current step yields. */
  stop(): void {
    if (!this.controller || this.controller.signal.aborted) return;
    this.state = { kind: 'shutting_down' };
    this.controller.abort();
  }

  getStatus(): MonitorStatus {
    return {
      mode: this.state.kind,
      connection: { ...this.connection },
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
    };
  }

  /** Wait budget for one IDLE: the renew interval, never past the server expiry minus the margin. */
  idleWaitMs(): number {
    return Math.min(this.options.idleRenewMs, this.options.idleMaxMs - this.options.idleSafetyMarginMs);
  }

  // -------------------------------------------------------------------------
  // Connecting
  // -------------------------------------------------------------------------

  private async connect(signal: AbortSignal): Promise<boolean> {
    while (!signal.aborted) {
      this.state = { kind: 'connecting', attempt: this.connection.retries + 1 };
      try {
        await this.mailbox.reconnect();
        this.connection = { ...this.connection, status: 'connected' };
        this.logger.info('monitor_connected', { attempt: this.connection.retries + 1 });
        return true;
      } catch (err) {
        await this.backOffAfterFailure('monitor_connect_failed', err, signal);
      }
    }
    return false;
  }

  /**
   * Count one failed connect or lost session against the reconnect budget.
   * The count survives successful logins and is cleared only by a completed
   * sweep, so a session that dies right after connecting still backs off and
   * eventually fails fatally.
   *
   * @throws FatalError once reconnectMaxAttempts failures have accumulated
   */
  private async backOffAfterFailure(event: string, err: unknown, signal: AbortSignal): Promise<void> {
    const retries = this.connection.retries + 1;
    this.connection = { status: 'disconnected', retries, lastError: errorMessage(err) };

    if (retries >= this.options.reconnectMaxAttempts) {
      this.logger.error('monitor_reconnect_exhausted', { attempts: retries, error: errorMessage(err) });
      throw new FatalError(
        `Mailbox reconnect failed after ${retries} attempts: ${errorMessage(err)}`,
        ErrorCodes.RECONNECT_EXHAUSTED,
        { attempts: retries },
      );
    }

    const delayMs = computeBackoff(retries, {
      baseDelayMs: this.options.reconnectBaseDelayMs,
      maxDelayMs: this.options.reconnectMaxDelayMs,
      jitter: this.options.reconnectJitter,
    }, this.options.random);
    this.logger.warn(event, { attempt: retries, retryInMs: delayMs, error: errorMessage(err) });
    await sleep(delayMs, signal);
  }

  // -------------------------------------------------------------------------
  // Session
  // -------------------------------------------------------------------------

  private async selectMode(): Promise<void> {
    this.processingErrors = [];

    if (!this.options.pushEnabled) {
      this.state = { kind: 'poll', reason: 'push disabled' };
    } else {
      let supported = false;
      try {
        supported = await this.mailbox.checkPushSupport();
      } catch (err) {
        this.logger.warn('monitor_push_check_failed', { error: errorMessage(err) });
      }
      this.state = supported ? { kind: 'event' } : { kind: 'poll', reason: 'push unsupported' };
    }

    this.logger.info('monitor_mode_selected', {
      mode: this.state.kind,
      reason: this.state.kind === 'poll' ? this.state.reason : undefined,
    });
  }

  /** Runs until aborted; mailbox I/O errors propagate to trigger a reconnect. */
  private async runSession(onNewMessages: NewMessagesHandler, signal: AbortSignal): Promise<void> {
    await this.selectMode();
    await this.sweep(onNewMessages, signal, 'startup');

    while (!signal.aborted) {
      if (this.state.kind === 'event') {
        const { notified } = await this.mailbox.waitForNotification(this.idleWaitMs(), signal);
        if (signal.aborted) break;
        await this.sweep(onNewMessages, signal, notified ? 'notification' : 'idle_timeout');
      } else {
        const remaining = this.options.pollIntervalMs - this.lastCycleDurationMs;
        await sleep(Math.max(0, remaining), signal);
        if (signal.aborted) break;
        await this.sweep(onNewMessages, signal, 'poll');
      }
    }
  }

  /**
   * One discovery cycle: search, deliver, then search once more and deliver
   * only ids that appeared while the first batch was processed.
   */
  private async sweep(onNewMessages: NewMessagesHandler, signal: AbortSignal, trigger: string): Promise<void> {
    const startedAt = this.options.now();
    const ids = await this.mailbox.searchUnseen();
    this.logger.debug('monitor_sweep', { trigger, unseen: ids.length });

    await this.deliver(onNewMessages, ids, signal);

    if (ids.length > 0 && !signal.aborted) {
      const offered = new Set(ids);
      const fresh = (await this.mailbox.searchUnseen()).filter((id) => !offered.has(id));
      if (fresh.length > 0) {
        this.logger.info('monitor_late_arrivals', { count: fresh.length });
        await this.deliver(onNewMessages, fresh, signal);
      }
    }

    if (this.connection.retries > 0) {
      this.connection = { ...this.connection, retries: 0 };
    }
    this.cycles++;
    this.lastCycleAt = this.options.now();
    this.lastCycleDurationMs = this.lastCycleAt - startedAt;
  }

  private async deliver(onNewMessages: NewMessagesHandler, ids: MessageId[], signal: AbortSignal): Promise<void> {
    let result: BatchResult;
    try {
      result = await onNewMessages(ids, signal);
    } catch (err) {
      this.logger.error('monitor_batch_error', { error: err });
      this.recordProcessingError(errorMessage(err));
      return;
    }

    if (result.offered === 0) return;

    const failed = result.transientFailures + result.permanentFailures;
    if (failed === result.offered) {
      this.recordProcessingError(`all ${failed} offered messages failed`);
    } else {
      this.processingErrors = [];
    }
  }

  private recordProcessingError(reason: string): void {
    const now = this.options.now();
    const windowStart = now - this.options.processingErrorWindowMs;
    this.processingErrors = this.processingErrors.filter((at) => at > windowStart);
    this.processingErrors.push(now);

    this.logger.warn('monitor_processing_error', {
      reason,
      recentErrors: this.processingErrors.length,
      threshold: this.options.processingErrorThreshold,
    });

    if (this.processingErrors.length < this.options.processingErrorThreshold) return;
    this.processingErrors = [];

    if (this.state.kind === 'event') {
      this.state = { kind: 'poll', reason: 'repeated processing errors' };
      this.connection = { ...this.connection, status: 'degraded' };
      this.logger.warn('monitor_degraded_to_poll', { windowMs: this.options.processingErrorWindowMs });
    }
  }

  private async closeMailbox(): Promise<void> {
    try {
      await this.mailbox.close();
    } catch (err) {
      this.logger.warn('monitor_close_failed', { error: errorMessage(err) });
    }
  }
}

function resolveOptions(options: MailboxMonitorOptions): ResolvedOptions {
  return {
    pushEnabled: options.pushEnabled ?? DEFAULTS.pushEnabled,
    pollIntervalMs: options.pollIntervalMs ?? DEFAULTS.pollIntervalMs,
    idleRenewMs: options.idleRenewMs ?? DEFAULTS.idleRenewMs,
    idleMaxMs: options.idleMaxMs ?? DEFAULTS.idleMaxMs,
    idleSafetyMarginMs: options.idleSafetyMarginMs ?? DEFAULTS.idleSafetyMarginMs,
    reconnectMaxAttempts: options.reconnectMaxAttempts ?? DEFAULTS.reconnectMaxAttempts,
    reconnectBaseDelayMs: options.reconnectBaseDelayMs ?? DEFAULTS.reconnectBaseDelayMs,
    reconnectMaxDelayMs: options.reconnectMaxDelayMs ?? DEFAULTS.reconnectMaxDelayMs,
    reconnectJitter: options.reconnectJitter ?? DEFAULTS.reconnectJitter,
    processingErrorThreshold: options.processingErrorThreshold ?? DEFAULTS.processingErrorThreshold,
    processingErrorWindowMs: options.processingErrorWindowMs ?? DEFAULTS.processingErrorWindowMs,
    now: options.now ?? DEFAULTS.now,
    random: options.random ?? DEFAULTS.random,
  };
}
