/**
 * Itinerary extraction prompt.
 */

import type { InboundMessage } from '../../intake/types.js';

/** Attachment text below this length is left out of the prompt. */
const MIN_ATTACHMENT_TEXT = 50;

function attachmentSection(texts: readonly string[]): string {
  const usable = texts.map((text) => text.trim()).filter((text) => text.length >= MIN_ATTACHMENT_TEXT);
  if (usable.length === 0) return '';

  return usable
    .map((text, index) => `\n\nATTACHMENT ${index + 1} CONTENT:\n${text}`)
    .join('');
}

/**
 * Build the reasoning prompt for one inbound message.
 */
export function buildItineraryPrompt(
  message: Pick<InboundMessage, 'subject' | 'from' | 'date' | 'body' | 'attachmentTexts'>,
): string {
  return `You are a travel itinerary processing assistant. You detect every kind of travel-related booking or appointment in an email and turn it into calendar events.

EMAIL METADATA:
Subject: ${message.subject}
From: ${message.from}
Date: ${message.date}

EMAIL BODY CONTENT:
${message.body}${attachmentSection(message.attachmentTexts)}

TASK: Extract ALL travel-related events and services, then output a JSON object with timezone-aware .ics calendar content and a short email summary.

Look for any scheduled service with a time and place: flights, trains, ferries, rental cars, transfers, hotels and other lodging, restaurant reservations, tours, meetings at venues, shows and events.

CALENDAR REQUIREMENTS:
1. Identify the local timezone of every location (BOS=America/New_York, DFW=America/Chicago, etc.)
2. Include a VTIMEZONE definition for each timezone used
3. Use DTSTART/DTEND with TZID parameters in the local time of each event
4. Give every VEVENT a unique UID and a descriptive SUMMARY and LOCATION
5. Put confirmation numbers, seats and other details in DESCRIPTION

SUMMARY REQUIREMENTS:
- One bullet per flight leg: "Day Date: FlightNumber Origin→Destination (Departure Time TZ → Arrival Time TZ) | Seat | Confirmation"
- Hotels, cars and other services concise but complete
- Consistent timezone abbreviations (CT, ET, PT, MT, etc.)

MESSAGE CLASSIFICATION (DO THIS FIRST):
- "TRAVEL_ITINERARY": travel bookings, reservations or event information to process
- "AUTO_REPLY": out-of-office reply, vacation auto-response or automatic acknowledgment
- "BOUNCE": delivery failure notification, undeliverable mail or system error message
- "NON_TRAVEL": regular email without travel information (not an auto-reply or bounce)

OUTPUT FORMAT:
Return ONLY a valid JSON object with these fields:

{
  "message_type": "TRAVEL_ITINERARY | AUTO_REPLY | BOUNCE | NON_TRAVEL",
  "message_type_reason": "[brief explanation of the classification]",
  "ics_content": "[complete .ics file; empty VCALENDAR if not TRAVEL_ITINERARY]",
  "email_summary": "[travel digest, or a brief explanation if not travel-related]"
}

If message_type is AUTO_REPLY or BOUNCE: set ics_content to an empty VCALENDAR and explain briefly in email_summary.
If message_type is NON_TRAVEL: still turn any dated events (meetings, appointments) into ICS content.`;
}
