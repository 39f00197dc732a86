/**
 * @fileoverview Structured-result extraction from free-form reasoning output.
 *
 * Reasoning responses arrive as text that is usually, but not always, a bare
 * JSON object. Commentary around the object, markdown or tilde code fences
 * and fences missing their closing marker are all tolerated. Extraction
 * either yields a complete object or throws an ExtractionError; it never
 * returns a partial result.
 */

import { ErrorCodes, ExtractionError, fingerprintText } from '../../utils/errors.js';
import { MESSAGE_TYPES, type ItineraryResult, type MessageType } from './types.js';

/** Opening marker, optional language tag, body, then the same marker again. */
const FENCE_PATTERN = /(```|~~~)[A-Za-z0-9_+-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?[ \t]*\1/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Body of the first complete fence, or null when no opening/closing pair exists. */
function stripFence(text: string): string | null {
  const match = FENCE_PATTERN.exec(text);
  if (!match) return null;
  return match[2].trim();
}

function braceSpan(text: string): string | null {
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first === -1 || last <= first) return null;
  return text.slice(first, last + 1);
}

/**
 * Pull a JSON object out of a reasoning response.
 *
 * Order: direct parse, fenced block, then the span from the first `{` to
 * the last `}`.
 *
 * @throws ExtractionError when no strategy yields an object
 */
export function extractStructured(raw: string): Record<string, unknown> {
  const trimmed = raw.trim();

  const direct = tryParseObject(trimmed);
  if (direct) return direct;

  const fenced = stripFence(trimmed);
  if (fenced !== null) {
    const fromFence = tryParseObject(fenced);
    if (fromFence) return fromFence;
  }

  const span = braceSpan(trimmed);
  if (span !== null) {
    const fromSpan = tryParseObject(span);
    if (fromSpan) return fromSpan;
  }

  throw new ExtractionError(
    `Could not extract a JSON object from reasoning response (length: ${raw.length})`,
    fingerprintText(trimmed),
  );
}

function toMessageType(value: unknown): MessageType {
  return MESSAGE_TYPES.find((type) => type === value) ?? 'TRAVEL_ITINERARY';
}

/**
 * Extract and shape an itinerary result.
 *
 * `ics_content` and `email_summary` must be strings; `message_type`
 * falls back to TRAVEL_ITINERARY when missing or unrecognised.
 */
export function extractItineraryResult(raw: string): ItineraryResult {
  const payload = extractStructured(raw);

  const missing: string[] = [];
  if (typeof payload.ics_content !== 'string') missing.push('ics_content');
  if (typeof payload.email_summary !== 'string') missing.push('email_summary');

  if (typeof payload.ics_content !== 'string' || typeof payload.email_summary !== 'string') {
    throw new ExtractionError(
      `Reasoning result is missing required fields: ${missing.join(', ')}`,
      fingerprintText(raw.trim()),
      ErrorCodes.OUTPUT_SCHEMA_INVALID,
    );
  }

  return {
    messageType: toMessageType(payload.message_type),
    messageTypeReason: typeof payload.message_type_reason === 'string' ? payload.message_type_reason : undefined,
    icsContent: payload.ics_content,
    emailSummary: payload.email_summary,
  };
}
