/**
 * Reply and fallback-notice composition.
 */

import type { InboundMessage, OutboundMail } from './types.js';

const MAX_SUBJECT_LENGTH = 100;

/** Collapse whitespace (including folded header newlines) and cap the length. */
export function cleanSubject(subject: string): string {
  return subject.replace(/\s+/g, ' ').trim().slice(0, MAX_SUBJECT_LENGTH);
}

function threading(message: Pick<InboundMessage, 'headers'>): Pick<OutboundMail, 'inReplyTo' | 'references'> {
  const messageId = message.headers['message-id']?.[0]?.trim();
  if (!messageId) return {};
  const previous = message.headers['references']?.[0]?.trim();
  return {
    inReplyTo: messageId,
    references: previous ? `${previous} ${messageId}` : messageId,
  };
}

export type ItineraryReplyInput = {
  message: Pick<InboundMessage, 'id' | 'subject' | 'headers'>;
  to: string;
  summary: string;
  /** Valid calendar text to attach; omitted when the artifact was invalid or empty. */
  calendar?: string;
  /** Set when a calendar was produced but failed validation. */
  calendarInvalid?: boolean;
};

export function composeItineraryReply(input: ItineraryReplyInput): OutboundMail {
  const { message, to, summary, calendar, calendarInvalid } = input;

  const sections = ['Your travel itinerary has been processed.', '', summary.trim()];

  if (calendar) {
    sections.push(
      '',
      'CALENDAR ATTACHMENT:',
      'The attached .ics file contains your travel events with their local time zones. Open it to add them to your calendar.',
    );
  } else if (calendarInvalid) {
    sections.push(
      '',
      'CALENDAR NOTE:',
      'We were unable to generate a valid calendar attachment for this itinerary. Please add the events to your calendar manually using the information above.',
    );
  }

  const mail: OutboundMail = {
    to,
    subject: `Re: ${cleanSubject(message.subject)} - Travel Itinerary`,
    body: `${sections.join('\n')}\n`,
    ...threading(message),
  };

  if (calendar) {
    mail.attachment = {
      filename: `itinerary-${message.id}.ics`,
      contentType: 'text/calendar',
      content: calendar,
    };
  }

  return mail;
}

const FALLBACK_BODY = [
  'We received your travel-related email but encountered an error while processing it.',
  '',
  'We were unable to extract the travel information and generate a calendar attachment for this email.',
  '',
  'You can forward the email again if you believe it was a temporary issue, or add the events to your calendar manually using the original email.',
  '',
].join('\n');

export function composeFallbackNotice(
  message: Pick<InboundMessage, 'subject' | 'headers'>,
  to: string,
): OutboundMail {
  return {
    to,
    subject: `Re: ${cleanSubject(message.subject)} - Processing Error`,
    body: FALLBACK_BODY,
    ...threading(message),
  };
}
