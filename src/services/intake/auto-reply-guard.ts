/**
 * @fileoverview Auto-reply and loop prevention.
 *
 * Two independent checks stand between an inbound message and an automated
 * reply:
 *
 * 1. classifyAutoReply: a pure header/sender/subject heuristic run before any
 *    reasoning call (RFC 3834 headers, list and bulk markers, bounce senders,
 *    self-loops, out-of-office subjects).
 * 2. ReplyRateLimiter: a per-recipient sliding window consulted at intake
 *    and again, atomically with recording, right before a send.
 */

import { normalizeAddress } from './address.js';
import { MemoryReplyLedgerStore, type ReplyLedgerStore } from './state-store.js';
import type { HeaderMap, InboundMessage } from './types.js';

export type AutoReplyCategory =
  | 'auto_submitted'
  | 'precedence'
  | 'empty_return_path'
  | 'auto_response_suppress'
  | 'autoreply_header'
  | 'mailing_list'
  | 'automated_sender'
  | 'self_loop'
  | 'subject';

export type AutoReplyVerdict =
  | { skip: false }
  | { skip: true; category: AutoReplyCategory; reason: string };

const SKIP_PRECEDENCE = ['bulk', 'junk', 'list', 'auto_reply'];

const AUTOMATED_SENDER_PATTERNS = [
  'mailer-daemon',
  'mail-daemon',
  'postmaster',
  'bounce',
  'returned',
  'undeliverable',
  'mail delivery',
  'delivery status',
];

const AUTO_REPLY_SUBJECT_PATTERNS = [
  'automatic reply',
  'auto-reply',
  'autoreply',
  'out of office',
  'out of the office',
  'away from',
  'on vacation',
  'delivery status notification',
  'delivery failure',
  'undeliverable',
  'returned mail',
  'mail delivery failed',
  'failure notice',
  'delayed mail',
  'could not be delivered',
  'read receipt',
  'read: ',
];

/** First value of a header, trimmed; '' when absent. Keys are lowercase. */
function header(headers: HeaderMap, name: string): string {
  const values = headers[name];
  return values && values.length > 0 ? values[0].trim() : '';
}

function hasHeader(headers: HeaderMap, name: string): boolean {
  const values = headers[name];
  return values !== undefined && values.length > 0;
}

function skip(category: AutoReplyCategory, reason: string): AutoReplyVerdict {
  return { skip: true, category, reason };
}

/**
 * Decide whether an inbound message must not receive an automated reply.
 * Any single indicator is enough.
 *
 * @param ownAddress - the daemon's outbound address, for self-loop detection
 */
export function classifyAutoReply(
  message: Pick<InboundMessage, 'headers' | 'from' | 'subject'>,
  ownAddress?: string,
): AutoReplyVerdict {
  const { headers } = message;

  const autoSubmitted = header(headers, 'auto-submitted').toLowerCase();
  if (autoSubmitted && autoSubmitted !== 'no') {
    return skip('auto_submitted', `Auto-Submitted header: ${autoSubmitted}`);
  }

  const precedence = header(headers, 'precedence').toLowerCase();
  if (SKIP_PRECEDENCE.includes(precedence)) {
    return skip('precedence', `Precedence header: ${precedence}`);
  }

  if (hasHeader(headers, 'return-path')) {
    const returnPath = header(headers, 'return-path');
    if (returnPath.replace(/[<>\s]/g, '') === '') {
      return skip('empty_return_path', 'Empty Return-Path (bounce indicator)');
    }
  }

  if (hasHeader(headers, 'x-auto-response-suppress')) {
    return skip('auto_response_suppress', 'X-Auto-Response-Suppress header present');
  }

  for (const name of ['x-autoreply', 'x-autorespond']) {
    const value = header(headers, name).toLowerCase();
    if (value && value !== 'no' && value !== 'false') {
      return skip('autoreply_header', `${name} header: ${value}`);
    }
  }

  if (hasHeader(headers, 'list-id') || hasHeader(headers, 'list-unsubscribe')) {
    return skip('mailing_list', 'Mailing list headers present');
  }

  const from = message.from.toLowerCase();
  const senderPattern = AUTOMATED_SENDER_PATTERNS.find((pattern) => from.includes(pattern));
  if (senderPattern) {
    return skip('automated_sender', `Bounce sender pattern: ${senderPattern}`);
  }

  if (ownAddress && normalizeAddress(message.from) === normalizeAddress(ownAddress)) {
    return skip('self_loop', 'Self-loop detected (from own address)');
  }

  const subject = message.subject.toLowerCase();
  const subjectPattern = AUTO_REPLY_SUBJECT_PATTERNS.find((pattern) => subject.includes(pattern));
  if (subjectPattern) {
    return skip('subject', `Auto-reply subject pattern: ${subjectPattern}`);
  }

  return { skip: false };
}

// ---------------------------------------------------------------------------
// Rate limiting
// ---------------------------------------------------------------------------

export type RateDecision =
  | { allowed: true }
  | { allowed: false; reason: string; count: number };

export type RateReservation = {
  address: string;
  reservedAt: number;
};

export type ReplyRateLimiterOptions = {
  maxReplies?: number;
  windowMs?: number;
  now?: () => number;
  store?: ReplyLedgerStore;
};

/**
 * Sliding-window reply limiter keyed by normalized recipient address.
 * Entries older than the window are pruned when an address is next consulted.
 */
export class ReplyRateLimiter {
  readonly maxReplies: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly store: ReplyLedgerStore;

  constructor(options: ReplyRateLimiterOptions = {}) {
    this.maxReplies = options.maxReplies ?? 3;
    this.windowMs = options.windowMs ?? 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
    this.store = options.store ?? new MemoryReplyLedgerStore();
  }

  /** Whether a reply to `address` would be allowed now. Records nothing. */
  check(address: string): RateDecision {
    return this.evaluate(normalizeAddress(address), this.now());
  }

  /**
   * Check and record in one step. Returns the reservation on success so a
   * failed send can hand the slot back with {@link release}.
   */
  tryAcquire(address: string): { allowed: true; reservation: RateReservation } | { allowed: false; reason: string; count: number } {
    const normalized = normalizeAddress(address);
    const now = this.now();
    const decision = this.evaluate(normalized, now);
    if (!decision.allowed) return decision;

    this.store.append(normalized, now);
    return { allowed: true, reservation: { address: normalized, reservedAt: now } };
  }

  release(reservation: RateReservation): void {
    this.store.remove(reservation.address, reservation.reservedAt);
  }

  clear(): void {
    this.store.clear();
  }

  private evaluate(address: string, now: number): RateDecision {
    // An entry exactly windowMs old has left the window.
    const recent = this.store.timestamps(address, now - this.windowMs + 1);
    if (recent.length >= this.maxReplies) {
      return {
        allowed: false,
        count: recent.length,
        reason: `Rate limit exceeded: ${recent.length} replies in ${Math.round(this.windowMs / 1000)}s`,
      };
    }
    return { allowed: true };
  }
}
