/**
 * RFC 822 source → FetchedMessage.
 */

import { simpleParser, type AddressObject, type ParsedMail } from 'mailparser';
import { ErrorCodes, PermanentError, errorMessage } from '../../utils/errors.js';
import type { FetchedMessage, HeaderMap, MessageId, RawAttachment } from '../intake/types.js';

/**
 * Header lines keyed by lowercase name; repeated headers keep every value
 * in arrival order. Folded continuation lines are unfolded.
 */
export function buildHeaderMap(lines: ReadonlyArray<{ key: string; line: string }>): HeaderMap {
  const headers: Record<string, string[]> = {};
  for (const { key, line } of lines) {
    const colon = line.indexOf(':');
    const value = (colon === -1 ? '' : line.slice(colon + 1)).replace(/\r?\n[ \t]+/g, ' ').trim();
    const name = key.toLowerCase();
    (headers[name] ??= []).push(value);
  }
  return headers;
}

function addressText(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) return '';
  const list = Array.isArray(value) ? value : [value];
  return list.map((entry) => entry.text).join(', ');
}

/** Plain body, falling back to tag-stripped HTML when the message has no text part. */
function bodyText(parsed: ParsedMail): string {
  const text = parsed.text?.trim();
  if (text) return text;
  if (typeof parsed.html === 'string') {
    return parsed.html.replace(/<[^>]+>/g, ' ').replace(/\s{2,}/g, ' ').trim();
  }
  return '';
}

export async function parseSource(id: MessageId, source: Buffer): Promise<FetchedMessage> {
  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(source);
  } catch (err) {
    throw new PermanentError(`Message source could not be parsed: ${errorMessage(err)}`, ErrorCodes.MESSAGE_UNPARSEABLE, { id });
  }

  const attachments: RawAttachment[] = parsed.attachments.map((attachment) => ({
    filename: attachment.filename ?? 'attachment',
    contentType: attachment.contentType,
    content: attachment.content,
  }));

  return {
    id,
    subject: parsed.subject ?? '',
    from: addressText(parsed.from),
    to: addressText(parsed.to),
    date: (parsed.date ?? new Date()).toISOString(),
    headers: buildHeaderMap(parsed.headerLines),
    body: bodyText(parsed),
    attachments,
  };
}
