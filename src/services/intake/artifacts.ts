/**
 * Generated-calendar retention.
 *
 * Valid calendars are written as `.ics`; invalid ones as `.ics.invalid`
 * with the validation error prepended as a comment line.
 */

import fs from 'fs';
import path from 'path';
import type { CalendarValidation } from './artifact-validator.js';
import type { MessageId } from './types.js';

function safeId(id: MessageId): string {
  return id.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Write one calendar artifact and return its path.
 * Existing files are never overwritten; a numeric suffix is added instead.
 */
export function writeCalendarArtifact(
  dir: string,
  id: MessageId,
  content: string,
  validation: CalendarValidation,
  now: number = Date.now(),
): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const extension = validation.valid ? '.ics' : '.ics.invalid';
  const payload = validation.valid ? content : `# ICS VALIDATION ERROR: ${validation.reason}\n\n${content}`;
  const base = `itinerary_${now}_${safeId(id)}`;

  let filePath = path.join(dir, `${base}${extension}`);
  for (let counter = 1; fs.existsSync(filePath); counter++) {
    filePath = path.join(dir, `${base}_${counter}${extension}`);
  }

  fs.writeFileSync(filePath, payload, 'utf-8');
  return filePath;
}
