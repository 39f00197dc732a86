/**
 * Reply destination resolution.
 *
 * Booking confirmations usually come from do-not-reply or system senders.
 * When such a message was forwarded, the reply goes to the forwarder named
 * in the forwarded header block; otherwise to the configured default.
 */

import { findAddress } from './address.js';
import type { InboundMessage } from './types.js';

const DO_NOT_REPLY_INDICATORS = [
  'noreply',
  'no-reply',
  'do-not-reply',
  'donotreply',
  'auto-confirm',
  'automated',
  'system',
  'notification',
];

const BOOKING_SYSTEM_DOMAINS = [
  'american.airlines',
  'delta.com',
  'united.com',
  'southwest.com',
  'jetblue.com',
  'aa.com',
  'ual.com',
  'expedia.com',
  'travelocity.com',
];

const FORWARD_INDICATORS = ['fw:', 'fwd:', 'forwarded'];

/** How far into the body the forwarded `From:` line is looked for. */
const FORWARD_HEADER_LINES = 10;

export function isSystemSender(from: string): boolean {
  const lower = from.toLowerCase();
  return (
    DO_NOT_REPLY_INDICATORS.some((indicator) => lower.includes(indicator)) ||
    BOOKING_SYSTEM_DOMAINS.some((domain) => lower.includes(domain))
  );
}

function forwarderAddress(message: Pick<InboundMessage, 'subject' | 'body'>): string | null {
  const subject = message.subject.toLowerCase();
  if (!FORWARD_INDICATORS.some((indicator) => subject.includes(indicator))) return null;

  const lines = message.body.split(/\r?\n/).slice(0, FORWARD_HEADER_LINES);
  for (const line of lines) {
    if (!line.toLowerCase().includes('from:')) continue;
    const address = findAddress(line);
    if (address) return address;
  }
  return null;
}

/**
 * Where the reply for `message` should go, or null when nobody can be replied to.
 */
export function resolveReplyAddress(
  message: Pick<InboundMessage, 'from' | 'subject' | 'body'>,
  defaultReplyTo?: string,
): string | null {
  if (!isSystemSender(message.from)) {
    return message.from;
  }

  const forwarder = forwarderAddress(message);
  if (forwarder) return forwarder;

  return defaultReplyTo || null;
}
