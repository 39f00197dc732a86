/**
 * @fileoverview Intake context.
 *
 * Everything one pipeline run needs, owned by a single object that is
 * passed explicitly into each invocation. The attempt records and the reply
 * ledger live behind the tracker and the limiter held here, never in
 * module-level singletons.
 */

import { silentLogger, type AppLogger } from '../../utils/observability/index.js';
import { ReplyRateLimiter } from './auto-reply-guard.js';
import { FailureTracker } from './failure-tracker.js';
import type {
  DocumentExtractor,
  Mailbox,
  Mailer,
  MessageId,
  ProcessingOutcome,
  Reasoner,
} from './types.js';

export type IntakeSettings = {
  /** Our outbound address; mail from it is never answered. */
  ownAddress: string;
  /** Used when the sender cannot be replied to and no forwarder is found. */
  defaultReplyTo?: string;
  /** When set, generated calendars are written here. */
  artifactDir?: string;
};

export type IntakeContext = {
  mailbox: Mailbox;
  mailer: Mailer;
  extractor: DocumentExtractor;
  reasoner: Reasoner;
  limiter: ReplyRateLimiter;
  tracker: FailureTracker;
  logger: AppLogger;
  settings: IntakeSettings;
  /** Terminal outcomes whose acknowledgement failed, retried when the id is offered again. */
  pendingAcks: Map<MessageId, ProcessingOutcome>;
};

export type IntakeContextInput = {
  mailbox: Mailbox;
  mailer: Mailer;
  extractor: DocumentExtractor;
  reasoner: Reasoner;
  settings: IntakeSettings;
  limiter?: ReplyRateLimiter;
  tracker?: FailureTracker;
  logger?: AppLogger;
};

export function createIntakeContext(input: IntakeContextInput): IntakeContext {
  return {
    mailbox: input.mailbox,
    mailer: input.mailer,
    extractor: input.extractor,
    reasoner: input.reasoner,
    limiter: input.limiter ?? new ReplyRateLimiter(),
    tracker: input.tracker ?? new FailureTracker(),
    logger: input.logger ?? silentLogger,
    settings: input.settings,
    pendingAcks: new Map(),
  };
}
