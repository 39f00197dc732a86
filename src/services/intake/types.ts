/**
 * @fileoverview Intake type definitions.
 *
 * Shared types for the mailbox monitor, the message pipeline and the
 * collaborators they consume.
 */

import type { ClassifiedFailure } from '../../utils/errors.js';

/** Opaque mailbox identifier, stable within one mailbox session. */
export type MessageId = string;

/** Header name (lowercased) → every value it carried, in order. */
export type HeaderMap = Readonly<Record<string, readonly string[]>>;

/** Attachment bytes as delivered by the mailbox, before text extraction. */
export type RawAttachment = {
  filename: string;
  contentType: string;
  content: Buffer;
};

/** What Mailbox.fetch returns: the message plus its undecoded attachments. */
export type FetchedMessage = {
  id: MessageId;
  subject: string;
  from: string;
  to: string;
  date: string;
  headers: HeaderMap;
  body: string;
  attachments: RawAttachment[];
};

/** Message after attachment extraction. Frozen once built. */
export type InboundMessage = Readonly<{
  id: MessageId;
  subject: string;
  from: string;
  to: string;
  date: string;
  headers: HeaderMap;
  body: string;
  attachmentTexts: readonly string[];
}>;

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type ProcessingOutcome =
  | Readonly<{ status: 'success'; replySent: boolean; calendarAttached: boolean }>
  | Readonly<{ status: 'transient_failure'; reason: string; attempts: number }>
  | Readonly<{ status: 'permanent_failure'; reason: string; fallbackSent: boolean }>
  | Readonly<{ status: 'skipped'; reason: string }>;

/** Per-batch tally handed back to the monitor. */
export type BatchResult = {
  offered: number;
  succeeded: number;
  skipped: number;
  transientFailures: number;
  permanentFailures: number;
};

// ---------------------------------------------------------------------------
// Retry and rate state
// ---------------------------------------------------------------------------

export type AttemptRecord = {
  count: number;
  lastAttemptAt: number;
  lastReason: string;
  lastCode: string;
  lastFingerprint?: string;
};

export type FailureDecision =
  | { action: 'retry'; attempts: number }
  | { action: 'poison'; attempts: number; reason: string };

export type { ClassifiedFailure };

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface Mailbox {
  /** Whether the server supports push notification (IDLE). */
  checkPushSupport(): Promise<boolean>;
  fetch(id: MessageId): Promise<FetchedMessage>;
  searchUnseen(): Promise<MessageId[]>;
  /**
   * Block until the server reports new mail, the timeout elapses or the
   * signal aborts. Only a real notification yields `notified: true`.
   */
  waitForNotification(timeoutMs: number, signal?: AbortSignal): Promise<{ notified: boolean }>;
  /** Idempotent: a second call for the same id has no effect. */
  markHandled(id: MessageId): Promise<void>;
  /** Drop any existing session and open a new one. Also used for the first connect. */
  reconnect(): Promise<void>;
  close(): Promise<void>;
}

export type OutboundAttachment = {
  filename: string;
  contentType: string;
  content: string | Buffer;
};

export type OutboundMail = {
  to: string;
  subject: string;
  body: string;
  attachment?: OutboundAttachment;
  inReplyTo?: string;
  references?: string;
};

export interface Mailer {
  /** `signal` cuts short any retry backoff inside the call. */
  send(mail: OutboundMail, signal?: AbortSignal): Promise<void>;
  close?(): void;
}

export interface DocumentExtractor {
  /** Returns '' for unsupported or corrupt input; never rejects. */
  extract(content: Buffer): Promise<string>;
}

export interface Reasoner {
  complete(prompt: string): Promise<string>;
}

// ---------------------------------------------------------------------------
// Structured reasoning result
// ---------------------------------------------------------------------------

export const MESSAGE_TYPES = ['TRAVEL_ITINERARY', 'AUTO_REPLY', 'BOUNCE', 'NON_TRAVEL'] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export type ItineraryResult = {
  messageType: MessageType;
  messageTypeReason?: string;
  icsContent: string;
  emailSummary: string;
};
