/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the daemon requires.
 *
 * Core intake components never read this module; createDaemon in
 * src/daemon.ts maps it onto their constructor options.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers to make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read an optional env var restricted to a fixed set of values. */
function optionalEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = process.env[key];
  const match = allowed.find((value) => value === raw);
  return match ?? defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

export const PARSE_FAILURE_POLICIES = ['count', 'poison-on-repeat'] as const;
export const STATE_STORE_PROVIDERS = ['memory', 'sqlite'] as const;

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  nodeEnv: optional('NODE_ENV', 'development'),

  /** Inbound mailbox (IMAP) */
  imap: {
    host: required('IMAP_HOST'),
    port: optionalInt('IMAP_PORT', 993),
    secure: optionalBool('IMAP_SECURE', true),
    user: required('IMAP_USER'),
    password: required('IMAP_PASSWORD'),
    mailbox: optional('IMAP_MAILBOX', 'INBOX'),
    /** Allow IDLE when the server advertises it */
    idleEnabled: optionalBool('IMAP_IDLE_ENABLED', true),
    /** Server-side IDLE expiry (RFC 2177 recommends re-issuing before 29 minutes) */
    idleMaxMs: optionalInt('IMAP_IDLE_MAX_MS', 29 * 60 * 1000),
    /** How often to re-issue IDLE even when the server would allow longer */
    idleRenewMs: optionalInt('IMAP_IDLE_RENEW_MS', 5 * 60 * 1000),
    /** Margin kept between our re-issue and the server expiry */
    idleSafetyMarginMs: optionalInt('IMAP_IDLE_SAFETY_MARGIN_MS', 60 * 1000),
  },

  /** Outbound mail (SMTP) */
  smtp: {
    host: required('SMTP_HOST'),
    port: optionalInt('SMTP_PORT', 587),
    secure: optionalBool('SMTP_SECURE', false),
    user: required('SMTP_USER'),
    password: required('SMTP_PASSWORD'),
    /** Address replies are sent from; also the self-loop guard address */
    from: process.env.SMTP_FROM || process.env.SMTP_USER,
    connectTimeoutMs: optionalInt('SMTP_CONNECT_TIMEOUT_MS', 10_000),
    socketTimeoutMs: optionalInt('SMTP_SOCKET_TIMEOUT_MS', 30_000),
    maxRetries: optionalInt('SMTP_MAX_RETRIES', 2),
    retryBaseDelayMs: optionalInt('SMTP_RETRY_BASE_DELAY_MS', 2_000),
  },

  /** External reasoning service (Anthropic Messages API) */
  reasoner: {
    apiKey: required('ANTHROPIC_API_KEY'),
    model: optional('REASONER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    maxTokens: optionalInt('REASONER_MAX_TOKENS', 8000),
    timeoutMs: optionalInt('REASONER_TIMEOUT_MS', 120_000),
    maxRetries: optionalInt('REASONER_MAX_RETRIES', 2),
  },

  /** Mailbox monitor */
  monitor: {
    pollIntervalMs: optionalInt('POLL_INTERVAL_MS', 30_000),
    reconnectMaxAttempts: optionalInt('RECONNECT_MAX_ATTEMPTS', 5),
    reconnectBaseDelayMs: optionalInt('RECONNECT_BASE_DELAY_MS', 5_000),
    reconnectMaxDelayMs: optionalInt('RECONNECT_MAX_DELAY_MS', 5 * 60 * 1000),
    reconnectJitter: optionalFloat('RECONNECT_JITTER', 0.2),
    processingErrorThreshold: optionalInt('PROCESSING_ERROR_THRESHOLD', 3),
    processingErrorWindowMs: optionalInt('PROCESSING_ERROR_WINDOW_MS', 10 * 60 * 1000),
    interMessageDelayMs: optionalInt('INTER_MESSAGE_DELAY_MS', 1_000),
  },

  /** Per-message processing */
  intake: {
    maxAttempts: optionalInt('MAX_ATTEMPTS_PER_MESSAGE', 3),
    parseFailurePolicy: optionalEnum('PARSE_FAILURE_POLICY', PARSE_FAILURE_POLICIES, 'count'),
    replyRateMax: optionalInt('REPLY_RATE_MAX', 3),
    replyRateWindowMs: optionalInt('REPLY_RATE_WINDOW_MS', 60 * 60 * 1000),
    defaultReplyTo: process.env.DEFAULT_REPLY_TO,
    artifactDir: process.env.ARTIFACT_DIR,
  },

  /** Retry and rate state */
  state: {
    provider: optionalEnum('STATE_STORE', STATE_STORE_PROVIDERS, 'memory'),
    sqlitePath: dbPath('STATE_SQLITE_PATH', '/app/data/state.db', './data/state.db'),
    attemptTtlMs: optionalInt('ATTEMPT_TTL_MS', 7 * 24 * 60 * 60 * 1000),
  },

  /** Read by the observability module directly; surfaced here for the startup log */
  logging: {
    level: optional('LOG_LEVEL', 'info'),
    file: process.env.APP_LOG_FILE,
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Credentials
  if (!config.imap.host) errors.push('IMAP_HOST is required');
  if (!config.imap.user) errors.push('IMAP_USER is required');
  if (!config.imap.password) errors.push('IMAP_PASSWORD is required');
  if (!config.smtp.host) errors.push('SMTP_HOST is required');
  if (!config.smtp.user) errors.push('SMTP_USER is required');
  if (!config.smtp.password) errors.push('SMTP_PASSWORD is required');
  if (!config.reasoner.apiKey) errors.push('ANTHROPIC_API_KEY is required');

  // Numeric bounds
  if (config.imap.port < 1 || config.imap.port > 65535) {
    errors.push(`IMAP_PORT must be 1-65535, got ${config.imap.port}`);
  }
  if (config.smtp.port < 1 || config.smtp.port > 65535) {
    errors.push(`SMTP_PORT must be 1-65535, got ${config.smtp.port}`);
  }
  if (config.imap.idleMaxMs - config.imap.idleSafetyMarginMs < 10_000) {
    errors.push('IMAP_IDLE_MAX_MS must exceed IMAP_IDLE_SAFETY_MARGIN_MS by at least 10000');
  }
  if (config.imap.idleRenewMs < 10_000) {
    errors.push(`IMAP_IDLE_RENEW_MS must be >= 10000, got ${config.imap.idleRenewMs}`);
  }
  if (config.monitor.pollIntervalMs < 1000) {
    errors.push(`POLL_INTERVAL_MS must be >= 1000, got ${config.monitor.pollIntervalMs}`);
  }
  if (config.monitor.reconnectMaxAttempts < 1) {
    errors.push(`RECONNECT_MAX_ATTEMPTS must be >= 1, got ${config.monitor.reconnectMaxAttempts}`);
  }
  if (config.monitor.reconnectMaxDelayMs < config.monitor.reconnectBaseDelayMs) {
    errors.push('RECONNECT_MAX_DELAY_MS must be >= RECONNECT_BASE_DELAY_MS');
  }
  if (config.monitor.reconnectJitter < 0 || config.monitor.reconnectJitter > 1) {
    errors.push(`RECONNECT_JITTER must be 0-1, got ${config.monitor.reconnectJitter}`);
  }
  if (config.monitor.processingErrorThreshold < 1) {
    errors.push(`PROCESSING_ERROR_THRESHOLD must be >= 1, got ${config.monitor.processingErrorThreshold}`);
  }
  if (config.intake.maxAttempts < 1) {
    errors.push(`MAX_ATTEMPTS_PER_MESSAGE must be >= 1, got ${config.intake.maxAttempts}`);
  }
  if (config.intake.replyRateMax < 1) {
    errors.push(`REPLY_RATE_MAX must be >= 1, got ${config.intake.replyRateMax}`);
  }
  if (config.intake.replyRateWindowMs < 1000) {
    errors.push(`REPLY_RATE_WINDOW_MS must be >= 1000, got ${config.intake.replyRateWindowMs}`);
  }
  if (config.reasoner.timeoutMs < 1000) {
    errors.push(`REASONER_TIMEOUT_MS must be >= 1000, got ${config.reasoner.timeoutMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
