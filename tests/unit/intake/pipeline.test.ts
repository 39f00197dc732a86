/**
 * Unit tests for the message pipeline.
 *
 * Collaborators are in-process fakes; every scenario drives processMessage
 * and asserts the outcome together with its side effects (mail sent,
 * acknowledgement, attempt records).
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { ErrorCodes, PermanentError, TransientError } from '../../../src/utils/errors.js';
import { processMessage } from '../../../src/services/intake/pipeline.js';
import { toReasonerError } from '../../../src/services/reasoner/client.js';
import { APIError } from '../../mocks/anthropic.js';
import { buildMessage, createTestContext, itineraryJson, VALID_ICS } from '../../helpers/fakes.js';

function timeoutError(): TransientError {
  return new TransientError('Reasoning call timed out after 1000ms', ErrorCodes.REASONER_TIMEOUT);
}

describe('processMessage', () => {
  describe('success', () => {
    it('replies with the calendar attached and acknowledges', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({ status: 'success', replySent: true, calendarAttached: true });
      expect(Object.isFrozen(outcome)).toBe(true);
      expect(reasoner.complete).toHaveBeenCalledTimes(1);
      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0].to).toBe('Alice Traveller <alice@example.com>');
      expect(mailer.sent[0].subject).toBe('Re: Your trip to Chicago - Travel Itinerary');
      expect(mailer.sent[0].attachment?.content).toBe(VALID_ICS);
      expect(mailer.sent[0].inReplyTo).toBe('<booking-1@example.com>');
      expect(mailbox.handled).toEqual(['101']);
      expect(ctx.tracker.get('101')).toBeUndefined();
    });

    it('includes message content and long attachment text in the prompt', async () => {
      const { ctx, mailbox, reasoner } = createTestContext();
      const attachmentText = 'Hotel confirmation 7781 for two nights at the Lakeside Inn, Chicago.';
      mailbox.add(buildMessage({
        attachments: [{ filename: 'hotel.pdf', contentType: 'application/pdf', content: Buffer.from(attachmentText) }],
      }));

      await processMessage(ctx, '101');

      expect(reasoner.prompts[0]).toContain('Flight XY123 departs Boston at 10:00 on 10 March.');
      expect(reasoner.prompts[0]).toContain(attachmentText);
    });

    it('still succeeds when attachment extraction fails', async () => {
      const { ctx, mailbox, extractor } = createTestContext();
      extractor.extract.mockRejectedValueOnce(new Error('corrupt'));
      mailbox.add(buildMessage({
        attachments: [{ filename: 'x.pdf', contentType: 'application/pdf', content: Buffer.from('%PDF-') }],
      }));

      const outcome = await processMessage(ctx, '101');
      expect(outcome.status).toBe('success');
    });

    it('sends the summary without attachment when the calendar is invalid', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue(itineraryJson({ ics_content: 'BEGIN:VEVENT\r\nEND:VEVENT' }));
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({ status: 'success', replySent: true, calendarAttached: false });
      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0].attachment).toBeUndefined();
      expect(mailer.sent[0].body).toContain('CALENDAR NOTE:');
      expect(mailbox.handled).toEqual(['101']);
    });

    it('sends only the summary when no calendar was produced', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue(itineraryJson({ ics_content: '', email_summary: 'Nothing to schedule' }));
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({ status: 'success', replySent: true, calendarAttached: false });
      expect(mailer.sent[0].body).toBe('Your travel itinerary has been processed.\n\nNothing to schedule\n');
    });

    it('processes a non-travel result like an itinerary', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue(itineraryJson({ message_type: 'NON_TRAVEL' }));
      mailbox.add(buildMessage());

      expect((await processMessage(ctx, '101')).status).toBe('success');
      expect(mailer.sent).toHaveLength(1);
    });

    it('retains valid and invalid calendars when an artifact directory is set', async () => {
      const artifactDir = fs.mkdtempSync(path.join(os.tmpdir(), 'artifacts-'));
      try {
        const { ctx, mailbox, reasoner } = createTestContext({ settings: { artifactDir } });
        reasoner.enqueue(itineraryJson(), itineraryJson({ ics_content: 'not a calendar' }));
        mailbox.add(buildMessage({ id: '1' }));
        mailbox.add(buildMessage({ id: '2' }));

        await processMessage(ctx, '1');
        await processMessage(ctx, '2');

        const files = fs.readdirSync(artifactDir).sort();
        expect(files).toHaveLength(2);
        expect(files.filter((f) => f.endsWith('_1.ics'))).toHaveLength(1);
        const invalid = files.find((f) => f.endsWith('_2.ics.invalid'));
        expect(invalid).toBeDefined();
        if (!invalid) return;
        const content = fs.readFileSync(path.join(artifactDir, invalid), 'utf-8');
        expect(content.startsWith('# ICS VALIDATION ERROR: ')).toBe(true);
        expect(content.endsWith('\n\nnot a calendar')).toBe(true);
      } finally {
        fs.rmSync(artifactDir, { recursive: true, force: true });
      }
    });
  });

  describe('skipped', () => {
    it('skips an auto-submitted message without calling the reasoner', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      mailbox.add(buildMessage({
        headers: { 'message-id': ['<ooo@example.com>'], 'auto-submitted': ['auto-replied'] },
      }));

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({ status: 'skipped', reason: 'Auto-Submitted header: auto-replied' });
      expect(reasoner.complete).not.toHaveBeenCalled();
      expect(mailer.send).not.toHaveBeenCalled();
      expect(ctx.tracker.get('101')).toBeUndefined();
      expect(mailbox.handled).toEqual(['101']);
    });

    it('skips when the reasoner classifies an auto-reply', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue(itineraryJson({ message_type: 'AUTO_REPLY', ics_content: '' }));
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({ status: 'skipped', reason: 'Reasoning classified message as AUTO_REPLY' });
      expect(mailer.sent).toHaveLength(0);
      expect(mailbox.handled).toEqual(['101']);
    });

    it('skips a system sender when no reply address can be found', async () => {
      const { ctx, mailbox, reasoner } = createTestContext();
      mailbox.add(buildMessage({ from: 'Bookings <noreply@united.com>' }));

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({ status: 'skipped', reason: 'No reply address could be determined' });
      expect(reasoner.complete).not.toHaveBeenCalled();
    });

    it('replies to the default address for a system sender when configured', async () => {
      const { ctx, mailbox, mailer } = createTestContext({ settings: { defaultReplyTo: 'ops@example.test' } });
      mailbox.add(buildMessage({ from: 'Bookings <noreply@united.com>' }));

      expect((await processMessage(ctx, '101')).status).toBe('success');
      expect(mailer.sent[0].to).toBe('ops@example.test');
    });

    it('skips once the sender has reached the reply rate limit', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext({ limiter: { maxReplies: 1 } });
      mailbox.add(buildMessage({ id: '1' }));
      mailbox.add(buildMessage({ id: '2' }));

      expect((await processMessage(ctx, '1')).status).toBe('success');
      const second = await processMessage(ctx, '2');

      expect(second).toEqual({ status: 'skipped', reason: 'Rate limit exceeded: 1 replies in 3600s' });
      expect(reasoner.complete).toHaveBeenCalledTimes(1);
      expect(mailer.sent).toHaveLength(1);
      expect(mailbox.handled).toEqual(['1', '2']);
    });

    it('clears earlier failures when a message ends up skipped', async () => {
      const { ctx, mailbox, reasoner } = createTestContext();
      reasoner.enqueue(timeoutError(), itineraryJson({ message_type: 'BOUNCE' }));
      mailbox.add(buildMessage());

      expect((await processMessage(ctx, '101')).status).toBe('transient_failure');
      expect(ctx.tracker.get('101')?.count).toBe(1);
      expect((await processMessage(ctx, '101')).status).toBe('skipped');
      expect(ctx.tracker.get('101')).toBeUndefined();
    });
  });

  describe('failures', () => {
    it('poisons after three timeouts and sends exactly one fallback notice', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext({ tracker: { maxAttempts: 3 } });
      reasoner.enqueue(timeoutError(), timeoutError(), timeoutError());
      mailbox.add(buildMessage());

      const first = await processMessage(ctx, '101');
      expect(first).toEqual({
        status: 'transient_failure',
        reason: 'Reasoning call timed out after 1000ms',
        attempts: 1,
      });
      expect(mailbox.handled).toEqual([]);

      const second = await processMessage(ctx, '101');
      expect(second).toEqual({
        status: 'transient_failure',
        reason: 'Reasoning call timed out after 1000ms',
        attempts: 2,
      });
      expect(mailer.sent).toHaveLength(0);

      const third = await processMessage(ctx, '101');
      expect(third).toEqual({
        status: 'permanent_failure',
        reason: 'Exceeded 3 attempts; last failure: Reasoning call timed out after 1000ms',
        fallbackSent: true,
      });
      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0].subject).toBe('Re: Your trip to Chicago - Processing Error');
      expect(mailbox.handled).toEqual(['101']);
      expect(ctx.tracker.get('101')).toBeUndefined();
      expect(reasoner.complete).toHaveBeenCalledTimes(3);
    });

    it('retries malformed reasoning output as a transient failure', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue('I could not find any travel details.');
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({
        status: 'transient_failure',
        reason: 'Could not extract a JSON object from reasoning response (length: 36)',
        attempts: 1,
      });
      expect(ctx.tracker.get('101')?.lastCode).toBe(ErrorCodes.OUTPUT_EXTRACTION_FAILED);
      expect(mailer.sent).toHaveLength(0);
      expect(mailbox.handled).toEqual([]);
    });

    it('poisons a repeated identical parse failure under poison-on-repeat', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext({
        tracker: { maxAttempts: 5, parseFailurePolicy: 'poison-on-repeat' },
      });
      reasoner.enqueue('no json', 'no json');
      mailbox.add(buildMessage());

      expect((await processMessage(ctx, '101')).status).toBe('transient_failure');
      const outcome = await processMessage(ctx, '101');

      expect(outcome.status).toBe('permanent_failure');
      expect(mailer.sent).toHaveLength(1);
    });

    it('poisons a permanent error immediately', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue(new PermanentError('Unsupported message content', ErrorCodes.MESSAGE_UNPARSEABLE));
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({
        status: 'permanent_failure',
        reason: 'Permanent failure: Unsupported message content',
        fallbackSent: true,
      });
      expect(mailer.sent).toHaveLength(1);
      expect(mailbox.handled).toEqual(['101']);
    });

    it('poisons an unparseable message without a fallback notice', async () => {
      const { ctx, mailbox, mailer } = createTestContext();
      mailbox.fetch.mockRejectedValueOnce(new PermanentError('Message source could not be parsed', ErrorCodes.MESSAGE_UNPARSEABLE));

      const outcome = await processMessage(ctx, '55');

      expect(outcome).toEqual({
        status: 'permanent_failure',
        reason: 'Permanent failure: Message source could not be parsed',
        fallbackSent: false,
      });
      expect(mailer.send).not.toHaveBeenCalled();
      expect(mailbox.handled).toEqual(['55']);
    });

    it('budgets a request the reasoning service refused', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      const refused = toReasonerError(new APIError(400, 'Bad request'), 1_000);
      reasoner.enqueue(refused, refused, refused);
      mailbox.add(buildMessage());

      const first = await processMessage(ctx, '101');
      expect(first).toEqual({
        status: 'transient_failure',
        reason: 'Reasoning service rejected the request (400): Bad request',
        attempts: 1,
      });
      expect(mailer.sent).toHaveLength(0);
      expect(mailbox.handled).toEqual([]);

      expect((await processMessage(ctx, '101')).status).toBe('transient_failure');
      const third = await processMessage(ctx, '101');
      expect(third.status).toBe('permanent_failure');
      expect(mailer.sent).toHaveLength(1);
      expect(mailbox.handled).toEqual(['101']);
    });

    it('budgets a reply the mail server refused', async () => {
      const { ctx, mailbox, mailer } = createTestContext();
      mailer.send.mockRejectedValueOnce(new TransientError('SMTP rejected message: Mailbox unavailable', ErrorCodes.MAILER_REJECTED));
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({
        status: 'transient_failure',
        reason: 'SMTP rejected message: Mailbox unavailable',
        attempts: 1,
      });
      expect(mailbox.handled).toEqual([]);
    });

    it('treats a fetch error as transient', async () => {
      const { ctx, mailbox } = createTestContext();
      mailbox.fetch.mockRejectedValueOnce(new TransientError('socket closed', ErrorCodes.MAILBOX_IO));

      const outcome = await processMessage(ctx, '55');

      expect(outcome).toEqual({ status: 'transient_failure', reason: 'socket closed', attempts: 1 });
      expect(mailbox.handled).toEqual([]);
    });

    it('hands the rate slot back when the send fails', async () => {
      const { ctx, mailbox, mailer } = createTestContext({ limiter: { maxReplies: 1 } });
      mailer.send.mockRejectedValueOnce(new TransientError('connection reset', ErrorCodes.MAILER_TRANSPORT));
      mailbox.add(buildMessage());

      const first = await processMessage(ctx, '101');
      expect(first).toEqual({ status: 'transient_failure', reason: 'connection reset', attempts: 1 });
      expect(mailbox.handled).toEqual([]);

      const second = await processMessage(ctx, '101');
      expect(second).toEqual({ status: 'success', replySent: true, calendarAttached: true });
      expect(ctx.tracker.get('101')).toBeUndefined();
    });

    it('poisons on entry when the attempt budget is already spent', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext({ tracker: { maxAttempts: 2 } });
      const failure = { kind: 'transient' as const, code: ErrorCodes.MAILBOX_IO, reason: 'socket closed' };
      ctx.tracker.recordFailure('101', failure);
      ctx.tracker.recordFailure('101', failure);
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({
        status: 'permanent_failure',
        reason: 'Attempt budget already exhausted; last failure: socket closed',
        fallbackSent: true,
      });
      expect(reasoner.complete).not.toHaveBeenCalled();
      expect(mailer.sent[0].subject).toBe('Re: Your trip to Chicago - Processing Error');
    });

    it('reports no fallback when the notice cannot be sent', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      reasoner.enqueue(new PermanentError('Unsupported message content', ErrorCodes.MESSAGE_UNPARSEABLE));
      mailer.send.mockRejectedValueOnce(new Error('smtp down'));
      mailbox.add(buildMessage());

      const outcome = await processMessage(ctx, '101');

      expect(outcome).toEqual({
        status: 'permanent_failure',
        reason: 'Permanent failure: Unsupported message content',
        fallbackSent: false,
      });
      expect(mailbox.handled).toEqual(['101']);
    });
  });

  describe('shutdown signal', () => {
    it('passes the signal to every send', async () => {
      const { ctx, mailbox, mailer } = createTestContext();
      const controller = new AbortController();
      mailbox.add(buildMessage());

      await processMessage(ctx, '101', controller.signal);

      expect(mailer.send).toHaveBeenCalledTimes(1);
      expect(mailer.send.mock.calls[0][1]).toBe(controller.signal);
    });

    it('sends without a signal when none is given', async () => {
      const { ctx, mailbox, mailer } = createTestContext();
      mailbox.add(buildMessage());

      await processMessage(ctx, '101');

      expect(mailer.send.mock.calls[0][1]).toBeUndefined();
    });
  });

  describe('acknowledgement', () => {
    it('retries only the acknowledgement after it failed', async () => {
      const { ctx, mailbox, mailer, reasoner } = createTestContext();
      mailbox.markHandled.mockRejectedValueOnce(new Error('connection lost'));
      mailbox.add(buildMessage());

      const first = await processMessage(ctx, '101');
      expect(first).toEqual({ status: 'success', replySent: true, calendarAttached: true });
      expect(ctx.pendingAcks.get('101')).toEqual(first);
      expect(mailbox.handled).toEqual([]);

      const second = await processMessage(ctx, '101');
      expect(second).toEqual(first);
      expect(reasoner.complete).toHaveBeenCalledTimes(1);
      expect(mailer.sent).toHaveLength(1);
      expect(mailbox.markHandled).toHaveBeenCalledTimes(2);
      expect(mailbox.handled).toEqual(['101']);
      expect(ctx.pendingAcks.size).toBe(0);
    });

    it('never rejects when the tracker store throws', async () => {
      const { ctx, mailbox } = createTestContext();
      mailbox.add(buildMessage());
      ctx.tracker.isExhausted = () => {
        throw new Error('store unavailable');
      };

      const outcome = await processMessage(ctx, '101');
      expect(outcome).toEqual({ status: 'transient_failure', reason: 'store unavailable', attempts: 0 });
    });
  });
});
