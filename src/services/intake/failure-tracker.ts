/**
 * @fileoverview Per-message retry accounting and poison detection.
 *
 * Every transient or permanent failure the pipeline produces passes through
 * recordFailure, so retry budgeting lives in one place. Permanent failures
 * poison on first occurrence. Transient failures poison once the attempt
 * count reaches maxAttempts.
 *
 * Parse failures (malformed reasoning output) count toward the normal budget
 * by default. With the 'poison-on-repeat' policy a second consecutive parse
 * failure with the same fingerprint poisons immediately.
 */

import { ErrorCodes, type ClassifiedFailure } from '../../utils/errors.js';
import { MemoryAttemptStore, type AttemptStore } from './state-store.js';
import type { AttemptRecord, FailureDecision, MessageId } from './types.js';

export type ParseFailurePolicy = 'count' | 'poison-on-repeat';

export type FailureTrackerOptions = {
  maxAttempts?: number;
  parseFailurePolicy?: ParseFailurePolicy;
  now?: () => number;
  store?: AttemptStore;
};

const PARSE_FAILURE_CODES: ReadonlySet<string> = new Set([
  ErrorCodes.OUTPUT_EXTRACTION_FAILED,
  ErrorCodes.OUTPUT_SCHEMA_INVALID,
]);

function isRepeatedParseFailure(previous: AttemptRecord | undefined, failure: ClassifiedFailure): boolean {
  if (!previous || !failure.fingerprint) return false;
  if (!PARSE_FAILURE_CODES.has(failure.code)) return false;
  return previous.lastCode === failure.code && previous.lastFingerprint === failure.fingerprint;
}

export class FailureTracker {
  readonly maxAttempts: number;
  readonly parseFailurePolicy: ParseFailurePolicy;
  private readonly now: () => number;
  private readonly store: AttemptStore;

  constructor(options: FailureTrackerOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.parseFailurePolicy = options.parseFailurePolicy ?? 'count';
    this.now = options.now ?? Date.now;
    this.store = options.store ?? new MemoryAttemptStore();
  }

  /**
   * Record one failed attempt and decide whether the message gets another.
   */
  recordFailure(id: MessageId, failure: ClassifiedFailure): FailureDecision {
    const previous = this.store.get(id);
    const attempts = (previous?.count ?? 0) + 1;

    this.store.set(id, {
      count: attempts,
      lastAttemptAt: this.now(),
      lastReason: failure.reason,
      lastCode: failure.code,
      lastFingerprint: failure.fingerprint,
    });

    if (failure.kind === 'permanent') {
      return { action: 'poison', attempts, reason: `Permanent failure: ${failure.reason}` };
    }

    if (this.parseFailurePolicy === 'poison-on-repeat' && isRepeatedParseFailure(previous, failure)) {
      return { action: 'poison', attempts, reason: `Repeated identical parse failure: ${failure.reason}` };
    }

    if (attempts >= this.maxAttempts) {
      return {
        action: 'poison',
        attempts,
        reason: `Exceeded ${this.maxAttempts} attempts; last failure: ${failure.reason}`,
      };
    }

    return { action: 'retry', attempts };
  }

  /** A success after earlier failures resets the history. */
  recordSuccess(id: MessageId): void {
    this.store.delete(id);
  }

  /** Drop the record for a message that reached a terminal outcome. */
  clear(id: MessageId): void {
    this.store.delete(id);
  }

  get(id: MessageId): AttemptRecord | undefined {
    return this.store.get(id);
  }

  /** True when the next outcome for this message must be poisoning. */
  isExhausted(id: MessageId): boolean {
    const record = this.store.get(id);
    return record !== undefined && record.count >= this.maxAttempts;
  }
}
