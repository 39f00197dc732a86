/**
 * Log payload redaction.
 *
 * Field names decide the treatment: credentials are replaced outright,
 * message content (bodies, prompts, summaries, calendars) is reduced to
 * its length, and every other string has its e-mail addresses masked.
 */

type FieldKind = 'secret' | 'content' | 'plain';

const SECRET_FIELD = /(token|secret|password|passwd|api[_-]?key|authorization|cookie|credential|auth[_-]?pass)/i;
const CONTENT_FIELD = /^(body|content|text|html|prompt|raw|summary|emailSummary|icsContent|attachmentTexts|response)$/i;
const ADDRESS = /([A-Z0-9._%+-])[A-Z0-9._%+-]*@([A-Z0-9.-]+\.[A-Z]{2,})/gi;
const MAX_DEPTH = 6;

function fieldKind(key: string | undefined): FieldKind {
  if (key === undefined) return 'plain';
  if (SECRET_FIELD.test(key)) return 'secret';
  if (CONTENT_FIELD.test(key)) return 'content';
  return 'plain';
}

function redactText(kind: FieldKind, text: string): string {
  switch (kind) {
    case 'secret':
      return '[REDACTED]';
    case 'content':
      return `[REDACTED_TEXT len=${text.length}]`;
    case 'plain':
      return redactAddress(text);
  }
}

function redactFields(value: object, depth: number): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).map(([key, child]) => [key, redactField(key, child, depth)]),
  );
}

function redactField(key: string | undefined, value: unknown, depth: number): unknown {
  if (value === null || value === undefined) return value;

  const kind = fieldKind(key);
  if (kind === 'secret') return '[REDACTED]';
  if (depth > MAX_DEPTH) return '[TRUNCATED]';

  if (typeof value === 'string') return redactText(kind, value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactText(kind, value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (Array.isArray(value)) {
    if (kind === 'content') return `[REDACTED_ARRAY len=${value.length}]`;
    return value.map((item) => redactField(key, item, depth + 1));
  }

  if (typeof value === 'object') return redactFields(value, depth + 1);

  return String(value);
}

/**
 * Mask every e-mail address in a string down to its first character and domain:
 * `alice@example.com` becomes `a***@example.com`.
 */
export function redactAddress(value: string): string {
  return value.replace(ADDRESS, (_match, first: string, domain: string) => `${first}***@${domain}`);
}

export function redactSecrets(data: Record<string, unknown>): Record<string, unknown> {
  return redactFields(data, 1);
}

/** Single-line, bounded excerpt of free text such as a subject line. */
export function safeSnippet(value: string, maxLength = 140): string {
  const line = value.replace(/\s+/g, ' ').trim();
  if (line.length <= maxLength) return line;
  return `${line.slice(0, maxLength)}...(truncated)`;
}
