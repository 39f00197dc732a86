/**
 * Sequential batch processing.
 *
 * Messages of one batch go through the pipeline strictly one at a time, so
 * attempt records and the reply ledger are never touched concurrently.
 */

import { sleep } from '../../utils/delay.js';
import type { IntakeContext } from './context.js';
import { processMessage } from './pipeline.js';
import type { BatchResult, MessageId } from './types.js';

export type BatchOptions = {
  /** Pause between two messages of the same batch. */
  interMessageDelayMs?: number;
  /** Stops the batch between messages; never interrupts one mid-run. */
  signal?: AbortSignal;
};

export function emptyBatchResult(): BatchResult {
  return { offered: 0, succeeded: 0, skipped: 0, transientFailures: 0, permanentFailures: 0 };
}

export async function processBatch(
  ctx: IntakeContext,
  ids: readonly MessageId[],
  options: BatchOptions = {},
): Promise<BatchResult> {
  const result = emptyBatchResult();
  const delayMs = options.interMessageDelayMs ?? 0;

  for (const [index, id] of ids.entries()) {
    if (options.signal?.aborted) break;
    if (index > 0 && delayMs > 0) {
      await sleep(delayMs, options.signal);
      if (options.signal?.aborted) break;
    }

    result.offered++;
    const outcome = await processMessage(ctx, id, options.signal);
    switch (outcome.status) {
      case 'success':
        result.succeeded++;
        break;
      case 'skipped':
        result.skipped++;
        break;
      case 'transient_failure':
        result.transientFailures++;
        break;
      case 'permanent_failure':
        result.permanentFailures++;
        break;
    }
  }

  if (result.offered === 0) {
    ctx.logger.debug('batch_complete', { ...result });
  } else {
    ctx.logger.info('batch_complete', { ...result });
  }
  return result;
}
