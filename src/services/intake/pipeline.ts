/**
 * @fileoverview Message pipeline.
 *
 * Drives one message to a terminal ProcessingOutcome:
 *
 *   fetch → guard → reply address → intake rate check → attachment text
 *     → reasoning call → result extraction → calendar validation
 *     → rate reservation → send → acknowledge
 *
 * Every step that can fail is caught here and turned into an outcome;
 * processMessage never rejects. Transient and permanent failures are both
 * routed through the FailureTracker. Success, Skipped and PermanentFailure
 * acknowledge the message; TransientFailure leaves it unseen so the monitor
 * offers it again.
 */

import { classifyFailure, errorMessage } from '../../utils/errors.js';
import { safeSnippet, withMessageRun, type AppLogger } from '../../utils/observability/index.js';
import { buildItineraryPrompt } from '../reasoner/prompts/itinerary.js';
import { validateCalendar, type CalendarValidation } from './artifact-validator.js';
import { writeCalendarArtifact } from './artifacts.js';
import { classifyAutoReply } from './auto-reply-guard.js';
import type { IntakeContext } from './context.js';
import { extractItineraryResult } from './output-extractor.js';
import { resolveReplyAddress } from './reply-address.js';
import { composeFallbackNotice, composeItineraryReply } from './reply-composer.js';
import type {
  FetchedMessage,
  InboundMessage,
  ItineraryResult,
  MessageId,
  ProcessingOutcome,
} from './types.js';

/** Fields the fallback path needs; available as soon as the fetch succeeded. */
type ReplyableMessage = Pick<InboundMessage, 'from' | 'subject' | 'body' | 'headers'>;

// ---------------------------------------------------------------------------
// Outcome constructors
// ---------------------------------------------------------------------------

function success(replySent: boolean, calendarAttached: boolean): ProcessingOutcome {
  return Object.freeze({ status: 'success', replySent, calendarAttached });
}

function transientFailure(reason: string, attempts: number): ProcessingOutcome {
  return Object.freeze({ status: 'transient_failure', reason, attempts });
}

function permanentFailure(reason: string, fallbackSent: boolean): ProcessingOutcome {
  return Object.freeze({ status: 'permanent_failure', reason, fallbackSent });
}

function skipped(reason: string): ProcessingOutcome {
  return Object.freeze({ status: 'skipped', reason });
}

// ---------------------------------------------------------------------------
// Terminal handling
// ---------------------------------------------------------------------------

/**
 * Mark the message handled. A failed acknowledgement parks the outcome in
 * pendingAcks so only the acknowledgement is retried next time.
 */
async function acknowledge(
  ctx: IntakeContext,
  log: AppLogger,
  id: MessageId,
  outcome: ProcessingOutcome,
): Promise<ProcessingOutcome> {
  try {
    await ctx.mailbox.markHandled(id);
    ctx.pendingAcks.delete(id);
  } catch (err) {
    ctx.pendingAcks.set(id, outcome);
    log.warn('acknowledge_failed', { status: outcome.status, error: errorMessage(err) });
  }
  return outcome;
}

async function finishSkipped(
  ctx: IntakeContext,
  log: AppLogger,
  id: MessageId,
  reason: string,
): Promise<ProcessingOutcome> {
  ctx.tracker.clear(id);
  log.info('message_skipped', { reason });
  return acknowledge(ctx, log, id, skipped(reason));
}

/**
 * Send the one-off fallback notice for a poisoned message, if anyone can
 * and may receive it. Failures are logged, never retried.
 */
async function sendFallbackNotice(
  ctx: IntakeContext,
  log: AppLogger,
  message: ReplyableMessage,
): Promise<boolean> {
  const verdict = classifyAutoReply(message, ctx.settings.ownAddress);
  if (verdict.skip) {
    log.info('fallback_suppressed', { reason: verdict.reason });
    return false;
  }

  const to = resolveReplyAddress(message, ctx.settings.defaultReplyTo);
  if (!to) {
    log.info('fallback_suppressed', { reason: 'No reply address' });
    return false;
  }

  const slot = ctx.limiter.tryAcquire(to);
  if (!slot.allowed) {
    log.warn('fallback_suppressed', { reason: slot.reason });
    return false;
  }

  try {
    await ctx.mailer.send(composeFallbackNotice(message, to));
    log.info('fallback_sent', { to });
    return true;
  } catch (err) {
    ctx.limiter.release(slot.reservation);
    log.warn('fallback_send_failed', { to, error: errorMessage(err) });
    return false;
  }
}

async function poison(
  ctx: IntakeContext,
  log: AppLogger,
  id: MessageId,
  message: ReplyableMessage | null,
  reason: string,
): Promise<ProcessingOutcome> {
  log.warn('message_poisoned', { reason });

  const fallbackSent = message ? await sendFallbackNotice(ctx, log, message) : false;
  ctx.tracker.clear(id);
  return acknowledge(ctx, log, id, permanentFailure(reason, fallbackSent));
}

async function handleFailure(
  ctx: IntakeContext,
  log: AppLogger,
  id: MessageId,
  step: string,
  err: unknown,
  message: ReplyableMessage | null,
): Promise<ProcessingOutcome> {
  const failure = classifyFailure(err);
  const decision = ctx.tracker.recordFailure(id, failure);

  log.warn('pipeline_step_failed', {
    step,
    kind: failure.kind,
    code: failure.code,
    error: failure.reason,
    attempts: decision.attempts,
    action: decision.action,
  });

  if (decision.action === 'retry') {
    return transientFailure(failure.reason, decision.attempts);
  }
  return poison(ctx, log, id, message, decision.reason);
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

async function extractAttachmentTexts(
  ctx: IntakeContext,
  log: AppLogger,
  fetched: FetchedMessage,
): Promise<string[]> {
  const texts: string[] = [];
  for (const attachment of fetched.attachments) {
    try {
      texts.push(await ctx.extractor.extract(attachment.content));
    } catch (err) {
      log.warn('attachment_extraction_failed', {
        filename: attachment.filename,
        error: errorMessage(err),
      });
      texts.push('');
    }
  }
  return texts;
}

function toInboundMessage(fetched: FetchedMessage, attachmentTexts: string[]): InboundMessage {
  return Object.freeze({
    id: fetched.id,
    subject: fetched.subject,
    from: fetched.from,
    to: fetched.to,
    date: fetched.date,
    headers: Object.freeze({ ...fetched.headers }),
    body: fetched.body,
    attachmentTexts: Object.freeze([...attachmentTexts]),
  });
}

function retainArtifact(
  ctx: IntakeContext,
  log: AppLogger,
  id: MessageId,
  content: string,
  validation: CalendarValidation,
): void {
  const dir = ctx.settings.artifactDir;
  if (!dir) return;
  try {
    const filePath = writeCalendarArtifact(dir, id, content, validation);
    log.debug('artifact_written', { path: filePath, valid: validation.valid });
  } catch (err) {
    log.warn('artifact_write_failed', { error: errorMessage(err) });
  }
}

type CalendarDecision = {
  calendar?: string;
  calendarInvalid: boolean;
};

function decideCalendar(
  ctx: IntakeContext,
  log: AppLogger,
  id: MessageId,
  result: ItineraryResult,
): CalendarDecision {
  if (!result.icsContent.trim()) {
    return { calendarInvalid: false };
  }

  const validation = validateCalendar(result.icsContent);
  retainArtifact(ctx, log, id, result.icsContent, validation);

  if (!validation.valid) {
    log.warn('calendar_invalid', { reason: validation.reason });
    return { calendarInvalid: true };
  }
  return { calendar: result.icsContent, calendarInvalid: false };
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

async function runPipeline(ctx: IntakeContext, id: MessageId): Promise<ProcessingOutcome> {
  const log = ctx.logger.child({ component: 'pipeline' });

  const pending = ctx.pendingAcks.get(id);
  if (pending) {
    log.info('acknowledge_retry', { status: pending.status });
    return acknowledge(ctx, log, id, pending);
  }

  // 1. Fetch
  let fetched: FetchedMessage;
  try {
    fetched = await ctx.mailbox.fetch(id);
  } catch (err) {
    return handleFailure(ctx, log, id, 'fetch', err, null);
  }
  log.debug('message_fetched', {
    subject: safeSnippet(fetched.subject, 80),
    attachments: fetched.attachments.length,
  });

  if (ctx.tracker.isExhausted(id)) {
    const record = ctx.tracker.get(id);
    return poison(ctx, log, id, fetched, `Attempt budget already exhausted; last failure: ${record?.lastReason ?? 'unknown'}`);
  }

  // 2. Content classification, before anything is spent on the message
  const verdict = classifyAutoReply(fetched, ctx.settings.ownAddress);
  if (verdict.skip) {
    return finishSkipped(ctx, log, id, verdict.reason);
  }

  const replyTo = resolveReplyAddress(fetched, ctx.settings.defaultReplyTo);
  if (!replyTo) {
    return finishSkipped(ctx, log, id, 'No reply address could be determined');
  }

  const intakeRate = ctx.limiter.check(replyTo);
  if (!intakeRate.allowed) {
    return finishSkipped(ctx, log, id, intakeRate.reason);
  }

  // 3. Attachment text
  const message = toInboundMessage(fetched, await extractAttachmentTexts(ctx, log, fetched));

  // 4. Reasoning call
  let raw: string;
  try {
    raw = await ctx.reasoner.complete(buildItineraryPrompt(message));
  } catch (err) {
    return handleFailure(ctx, log, id, 'reason', err, message);
  }

  // 5. Structured result
  let result: ItineraryResult;
  try {
    result = extractItineraryResult(raw);
  } catch (err) {
    return handleFailure(ctx, log, id, 'extract', err, message);
  }

  log.info('message_classified', { messageType: result.messageType, reason: result.messageTypeReason });
  if (result.messageType === 'AUTO_REPLY' || result.messageType === 'BOUNCE') {
    return finishSkipped(ctx, log, id, `Reasoning classified message as ${result.messageType}`);
  }

  // 6. Calendar artifact
  const { calendar, calendarInvalid } = decideCalendar(ctx, log, id, result);

  // 7. Rate check again, recorded atomically with the decision
  const slot = ctx.limiter.tryAcquire(replyTo);
  if (!slot.allowed) {
    return finishSkipped(ctx, log, id, slot.reason);
  }

  // 8. Send
  try {
    await ctx.mailer.send(composeItineraryReply({
      message,
      to: replyTo,
      summary: result.emailSummary,
      calendar,
      calendarInvalid,
    }));
  } catch (err) {
    ctx.limiter.release(slot.reservation);
    return handleFailure(ctx, log, id, 'send', err, message);
  }

  // 9. Acknowledge
  ctx.tracker.recordSuccess(id);
  log.info('reply_sent', { to: replyTo, calendarAttached: calendar !== undefined });
  return acknowledge(ctx, log, id, success(true, calendar !== undefined));
}

/** The same context with every send bound to `signal`. */
function bindSendSignal(ctx: IntakeContext, signal: AbortSignal): IntakeContext {
  const { mailer } = ctx;
  return { ...ctx, mailer: { send: (mail) => mailer.send(mail, signal) } };
}

/**
 * Process one message to a terminal outcome. Never rejects.
 *
 * `signal` (shutdown) shortens mail retry backoffs; it does not abandon
 * the message between steps.
 */
export async function processMessage(
  ctx: IntakeContext,
  id: MessageId,
  signal?: AbortSignal,
): Promise<ProcessingOutcome> {
  const runCtx = signal ? bindSendSignal(ctx, signal) : ctx;
  return withMessageRun(id, async () => {
    try {
      return await runPipeline(runCtx, id);
    } catch (err) {
      // Only reachable through a collaborator or store throwing where none is expected.
      const log = ctx.logger.child({ component: 'pipeline' });
      log.error('pipeline_unexpected_error', { error: err });
      const failure = classifyFailure(err);
      return transientFailure(failure.reason, ctx.tracker.get(id)?.count ?? 0);
    }
  });
}
