/**
 * @fileoverview Calendar artifact validation.
 *
 * Only syntax is checked: the payload must parse as iCalendar and its
 * top-level component must be VCALENDAR. No error ever escapes.
 */

import ICAL from 'ical.js';
import { errorMessage } from '../../utils/errors.js';

export type CalendarValidation =
  | { valid: true }
  | { valid: false; reason: string };

/** ical.js returns jCal: `[name, properties, components]`, or a list of them. */
function topComponentName(parsed: unknown): string | null {
  if (!Array.isArray(parsed) || parsed.length === 0) return null;
  const head: unknown = parsed[0];
  if (typeof head === 'string') return head;
  return topComponentName(head);
}

export function validateCalendar(text: string): CalendarValidation {
  if (!text.trim()) {
    return { valid: false, reason: 'Calendar content is empty' };
  }

  try {
    const parsed: unknown = ICAL.parse(text);
    const name = topComponentName(parsed);
    if (name !== 'vcalendar') {
      return { valid: false, reason: `Top-level component is ${name ?? 'missing'}, expected VCALENDAR` };
    }
    return { valid: true };
  } catch (err) {
    return { valid: false, reason: errorMessage(err) };
  }
}
