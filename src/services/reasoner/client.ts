/**
 * Anthropic-backed reasoner.
 *
 * One `messages.create` call per prompt with its own timeout and SDK retry
 * budget. SDK errors are mapped onto the intake error taxonomy so the
 * failure tracker can budget them.
 */

import Anthropic, { APIConnectionError, APIConnectionTimeoutError, APIError } from '@anthropic-ai/sdk';
import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { ErrorCodes, TransientError, errorMessage } from '../../utils/errors.js';
import { silentLogger, type AppLogger } from '../../utils/observability/index.js';
import type { Reasoner } from '../intake/types.js';

export type AnthropicReasonerOptions = {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  logger?: AppLogger;
};

/** Service-side trouble (5xx, 408, 429, auth) as opposed to a refused request. */
function isServiceStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status >= 500 || status === 429 || status === 408 || status === 401 || status === 403;
}

/**
 * Map an SDK error onto the intake taxonomy. Every remote failure is
 * transient: it counts against the message's attempt budget like any
 * other, and only the code tells a refused request from a service fault.
 */
export function toReasonerError(err: unknown, timeoutMs: number): TransientError {
  if (err instanceof APIConnectionTimeoutError) {
    return new TransientError(`Reasoning call timed out after ${timeoutMs}ms`, ErrorCodes.REASONER_TIMEOUT);
  }
  if (err instanceof APIConnectionError) {
    return new TransientError(`Reasoning service unreachable: ${err.message}`, ErrorCodes.REASONER_TRANSPORT);
  }
  if (err instanceof APIError) {
    if (isServiceStatus(err.status)) {
      return new TransientError(
        `Reasoning service error ${err.status ?? 'unknown'}: ${err.message}`,
        ErrorCodes.REASONER_TRANSPORT,
        { status: err.status },
      );
    }
    return new TransientError(
      `Reasoning service rejected the request (${err.status}): ${err.message}`,
      ErrorCodes.REASONER_REJECTED,
      { status: err.status },
    );
  }
  return new TransientError(`Reasoning call failed: ${errorMessage(err)}`, ErrorCodes.REASONER_TRANSPORT);
}

export class AnthropicReasoner implements Reasoner {
  private readonly client: Anthropic;
  private readonly logger: AppLogger;

  constructor(private readonly options: AnthropicReasonerOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
    this.logger = (options.logger ?? silentLogger).child({ component: 'reasoner' });
  }

  async complete(prompt: string): Promise<string> {
    const startTime = Date.now();

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: this.options.timeoutMs, maxRetries: this.options.maxRetries },
      );
    } catch (err) {
      const mapped = toReasonerError(err, this.options.timeoutMs);
      this.logger.warn('reasoner_call_failed', {
        code: mapped.code,
        error: mapped.message,
        durationMs: Date.now() - startTime,
      });
      throw mapped;
    }

    const text = response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    this.logger.info('reasoner_call_completed', {
      model: this.options.model,
      stopReason: response.stop_reason,
      responseLength: text.length,
      durationMs: Date.now() - startTime,
    });

    if (response.stop_reason === 'max_tokens') {
      this.logger.warn('reasoner_output_truncated', { maxTokens: this.options.maxTokens });
    }

    return text;
  }
}
