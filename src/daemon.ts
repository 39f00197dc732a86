/**
 * @fileoverview Daemon assembly.
 *
 * Maps configuration onto the intake components and their collaborators.
 * Nothing below src/services reads config; this is the only place the two
 * meet.
 */

import type { AppConfig } from './config.js';
import { PdfDocumentExtractor } from './services/extractor/pdf.js';
import { ReplyRateLimiter } from './services/intake/auto-reply-guard.js';
import { processBatch } from './services/intake/batch.js';
import { createIntakeContext, type IntakeContext } from './services/intake/context.js';
import { FailureTracker } from './services/intake/failure-tracker.js';
import { MailboxMonitor } from './services/intake/monitor.js';
import { createStateStores, type StateStores } from './services/intake/state-store.js';
import { ImapMailbox } from './services/mailbox/imap.js';
import { SmtpMailer, exponentialDelays } from './services/mailer/smtp.js';
import { AnthropicReasoner } from './services/reasoner/index.js';
import type { AppLogger } from './utils/observability/index.js';

export type Daemon = {
  context: IntakeContext;
  monitor: MailboxMonitor;
  /** Resolves on graceful stop; rejects with FatalError when reconnects are exhausted. */
  run(): Promise<void>;
  stop(): void;
  /** Release stores and transports once run() has settled. */
  dispose(): void;
};

function requireValue(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

export function createDaemon(config: AppConfig, logger: AppLogger): Daemon {
  const stores: StateStores = config.state.provider === 'sqlite'
    ? createStateStores({
        provider: 'sqlite',
        sqlitePath: config.state.sqlitePath,
        attemptTtlMs: config.state.attemptTtlMs,
      })
    : createStateStores({ provider: 'memory' });

  const smtpUser = requireValue(config.smtp.user, 'SMTP_USER');
  const ownAddress = config.smtp.from ?? smtpUser;

  const mailbox = new ImapMailbox({
    host: requireValue(config.imap.host, 'IMAP_HOST'),
    port: config.imap.port,
    secure: config.imap.secure,
    user: requireValue(config.imap.user, 'IMAP_USER'),
    password: requireValue(config.imap.password, 'IMAP_PASSWORD'),
    mailbox: config.imap.mailbox,
    idleEnabled: config.imap.idleEnabled,
    logger,
  });

  const mailer = new SmtpMailer({
    host: requireValue(config.smtp.host, 'SMTP_HOST'),
    port: config.smtp.port,
    secure: config.smtp.secure,
    user: smtpUser,
    password: requireValue(config.smtp.password, 'SMTP_PASSWORD'),
    from: ownAddress,
    connectTimeoutMs: config.smtp.connectTimeoutMs,
    socketTimeoutMs: config.smtp.socketTimeoutMs,
    retryDelaysMs: exponentialDelays(config.smtp.maxRetries, config.smtp.retryBaseDelayMs),
    logger,
  });

  const reasoner = new AnthropicReasoner({
    apiKey: requireValue(config.reasoner.apiKey, 'ANTHROPIC_API_KEY'),
    model: config.reasoner.model,
    maxTokens: config.reasoner.maxTokens,
    timeoutMs: config.reasoner.timeoutMs,
    maxRetries: config.reasoner.maxRetries,
    logger,
  });

  const context = createIntakeContext({
    mailbox,
    mailer,
    reasoner,
    extractor: new PdfDocumentExtractor(logger),
    limiter: new ReplyRateLimiter({
      maxReplies: config.intake.replyRateMax,
      windowMs: config.intake.replyRateWindowMs,
      store: stores.ledger,
    }),
    tracker: new FailureTracker({
      maxAttempts: config.intake.maxAttempts,
      parseFailurePolicy: config.intake.parseFailurePolicy,
      store: stores.attempts,
    }),
    logger,
    settings: {
      ownAddress,
      defaultReplyTo: config.intake.defaultReplyTo,
      artifactDir: config.intake.artifactDir,
    },
  });

  const monitor = new MailboxMonitor(mailbox, {
    pushEnabled: config.imap.idleEnabled,
    pollIntervalMs: config.monitor.pollIntervalMs,
    idleRenewMs: config.imap.idleRenewMs,
    idleMaxMs: config.imap.idleMaxMs,
    idleSafetyMarginMs: config.imap.idleSafetyMarginMs,
    reconnectMaxAttempts: config.monitor.reconnectMaxAttempts,
    reconnectBaseDelayMs: config.monitor.reconnectBaseDelayMs,
    reconnectMaxDelayMs: config.monitor.reconnectMaxDelayMs,
    reconnectJitter: config.monitor.reconnectJitter,
    processingErrorThreshold: config.monitor.processingErrorThreshold,
    processingErrorWindowMs: config.monitor.processingErrorWindowMs,
    logger,
  });

  return {
    context,
    monitor,
    run: () => monitor.start((ids, signal) => processBatch(context, ids, {
      interMessageDelayMs: config.monitor.interMessageDelayMs,
      signal,
    })),
    stop: () => monitor.stop(),
    dispose: () => {
      mailer.close();
      stores.attempts.close();
      stores.ledger.close();
    },
  };
}
