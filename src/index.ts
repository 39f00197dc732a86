/**
 * @fileoverview Entry point for the tripmail daemon.
 *
 * Validates configuration, assembles the intake daemon and runs the mailbox
 * monitor until SIGINT/SIGTERM. A fatal monitor failure (reconnects
 * exhausted) ends the process with a non-zero exit code so the supervisor
 * can restart it.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();

import { createDaemon } from './daemon.js';
import { FatalError } from './utils/errors.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const logger = createLogger({ service: 'tripmail' });

logger.info('config_check', {
  nodeEnv: config.nodeEnv,
  imapHost: config.imap.host,
  imapMailbox: config.imap.mailbox,
  idleEnabled: config.imap.idleEnabled,
  smtpHost: config.smtp.host,
  reasonerModel: config.reasoner.model,
  maxAttempts: config.intake.maxAttempts,
  parseFailurePolicy: config.intake.parseFailurePolicy,
  replyRateMax: config.intake.replyRateMax,
  stateStore: config.state.provider,
  logLevel: config.logging.level,
  hasDefaultReplyTo: !!config.intake.defaultReplyTo,
});

const daemon = createDaemon(config, logger);

let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });
  daemon.stop();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

void daemon.run()
  .then(() => {
    logger.info('daemon_stopped');
  })
  .catch((err: unknown) => {
    if (err instanceof FatalError) {
      logger.error('daemon_fatal', { code: err.code, error: err.message });
    } else {
      logger.error('daemon_crashed', { error: err });
    }
    process.exitCode = 1;
  })
  .finally(() => {
    daemon.dispose();
  });
