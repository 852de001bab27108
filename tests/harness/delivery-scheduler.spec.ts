import { describe, it, expect, vi, afterEach } from 'vitest';
import { DeliveryScheduler, type DeliverySchedulerOptions } from '../../src/services/delivery-scheduler.js';
import { DeliveryTracker } from '../../src/services/delivery-tracker.js';
import { createSeededRandom } from '../../src/services/delay-policy.js';
import { DispatchError, SessionConflictError } from '../../src/types/errors.js';
import type {
    ChatId,
    DeliveryPlan,
    DeliverySink,
    MessageChunk,
    SinkResult,
    StreamingDeliveryPlan,
} from '../../src/types/delivery.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
    scrubSensitiveText: (s: string) => s,
}));

const toChunks = (texts: string[]): MessageChunk[] =>
    texts.map((text, index) => ({ index, text, separator: '', estimatedDelayMs: 100 }));

const createPlan = (
    texts: string[],
    overrides: Partial<Omit<DeliveryPlan, 'chunks'>> = {},
): DeliveryPlan => ({
    planId: 'plan-1',
    requestId: 'req-1',
    chatId: 'chat-1',
    chunks: toChunks(texts),
    modePolicy: 'answer_safe',
    kind: 'answer',
    createdAt: new Date(0).toISOString(),
    ...overrides,
});

const createStreamingPlan = (chunks: AsyncIterable<MessageChunk>): StreamingDeliveryPlan => ({
    planId: 'plan-stream',
    requestId: 'req-stream',
    chatId: 'chat-1',
    chunks,
    modePolicy: 'answer_safe',
    kind: 'answer',
    createdAt: new Date(0).toISOString(),
});

/** Virtual clock: sleeping advances time instantly. */
const createClock = () => {
    const clock = { now: 0 };
    return {
        clock,
        sleep: vi.fn(async (ms: number) => {
            clock.now += ms;
        }),
        now: () => clock.now,
    };
};

const createSink = (clock: { now: number }) => {
    const events: string[] = [];
    const sendChunk = vi.fn<DeliverySink['sendChunk']>(async (_chatId, chunk): Promise<SinkResult> => {
        events.push(`send:${chunk.index}@${clock.now}`);
        return { status: 'ack' };
    });
    const setTyping = vi.fn<DeliverySink['setTyping']>(async (_chatId: ChatId, active: boolean) => {
        events.push(`typing:${active}@${clock.now}`);
    });
    const sink: DeliverySink = { sendChunk, setTyping };
    return { sink, sendChunk, setTyping, events };
};

const createGate = () => {
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
        open = resolve;
    });
    return { gate, open };
};

const setup = (overrides: Partial<DeliverySchedulerOptions> = {}) => {
    const { clock, sleep, now } = createClock();
    const sinkParts = createSink(clock);
    const tracker = new DeliveryTracker();
    const scheduler = new DeliveryScheduler(sinkParts.sink, {
        delay: { strategy: 'constant', minMs: 100, maxMs: 100, msPerChar: 0 },
        retryBackoffMs: 10,
        dispatchTimeoutMs: 0,
        tracker,
        sleep,
        now,
        ...overrides,
    });
    return { ...sinkParts, clock, sleep, tracker, scheduler };
};

describe('DeliveryScheduler', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('sends chunks in order, bracketed by typing, at least 100ms apart', async () => {
        const { scheduler, events } = setup();

        const outcome = await scheduler.deliver(createPlan(['one', 'two', 'three']));

        expect(outcome).toMatchObject({ status: 'completed', deliveredCount: 3, durationMs: 300 });
        expect(events).toEqual([
            'typing:true@0',
            'send:0@100',
            'typing:false@100',
            'typing:true@100',
            'send:1@200',
            'typing:false@200',
            'typing:true@200',
            'send:2@300',
            'typing:false@300',
        ]);
    });

    it('idles and waits the first-message delay before the first chunk', async () => {
        const { scheduler, events } = setup({ firstMessageDelayMs: 500, typingIdleMs: 50 });

        await scheduler.deliver(createPlan(['one', 'two']));

        expect(events.filter((event) => event.startsWith('send'))).toEqual(['send:0@650', 'send:1@800']);
    });

    it('skips typing signals when disabled', async () => {
        const { scheduler, setTyping } = setup({ typingEnabled: false });

        const outcome = await scheduler.deliver(createPlan(['one', 'two']));

        expect(outcome.status).toBe('completed');
        expect(setTyping).not.toHaveBeenCalled();
    });

    it('stops at the next chunk boundary when cancelled, reporting what was delivered', async () => {
        const { scheduler, sendChunk } = setup();
        sendChunk.mockImplementation(async (chatId, chunk) => {
            if (chunk.index === 1) scheduler.cancel(chatId);
            return { status: 'ack' };
        });

        const outcome = await scheduler.deliver(createPlan(['a', 'b', 'c', 'd']));

        expect(outcome).toMatchObject({ status: 'cancelled', reason: 'cancel_requested', deliveredCount: 2 });
        expect(sendChunk).toHaveBeenCalledTimes(2);
    });

    it('retries transient failures with backoff', async () => {
        const { scheduler, sendChunk, sleep, tracker } = setup();
        sendChunk
            .mockResolvedValueOnce({ status: 'transient', reason: 'rate limited' })
            .mockRejectedValueOnce(new Error('socket hang up'));

        const outcome = await scheduler.deliver(createPlan(['one', 'two']));

        expect(outcome).toMatchObject({ status: 'completed', deliveredCount: 2 });
        expect(sendChunk).toHaveBeenCalledTimes(4);
        expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 10, 20, 100]);
        expect(tracker.getMetrics()).toMatchObject({ totalSent: 2, totalFailed: 0, totalRetries: 2 });
    });

    it('fails on a permanent error without retrying', async () => {
        const { scheduler, sendChunk, tracker } = setup();
        sendChunk
            .mockResolvedValueOnce({ status: 'ack' })
            .mockResolvedValueOnce({ status: 'permanent', reason: 'bot was blocked by the user' });

        const outcome = await scheduler.deliver(createPlan(['one', 'two', 'three']));

        expect(outcome.status).toBe('failed');
        expect(outcome.deliveredCount).toBe(1);
        if (outcome.status === 'failed') {
            expect(outcome.error).toBeInstanceOf(DispatchError);
            expect(outcome.error).toMatchObject({ kind: 'permanent', message: 'bot was blocked by the user' });
        }
        expect(sendChunk).toHaveBeenCalledTimes(2);
        expect(tracker.getMetrics()).toMatchObject({ totalSent: 1, totalFailed: 1 });
    });

    it('fails once transient retries are exhausted', async () => {
        const { scheduler, sendChunk } = setup({ retryCount: 2 });
        sendChunk.mockResolvedValue({ status: 'transient', reason: 'server error' });

        const outcome = await scheduler.deliver(createPlan(['one', 'two']));

        expect(outcome).toMatchObject({ status: 'failed', deliveredCount: 0 });
        if (outcome.status === 'failed') {
            expect(outcome.error).toMatchObject({ kind: 'transient', message: 'server error' });
        }
        expect(sendChunk).toHaveBeenCalledTimes(3);
    });

    it('aborts a dispatch that outlives the timeout and retries it as a transient failure', async () => {
        const { scheduler, sendChunk, tracker } = setup({ dispatchTimeoutMs: 20 });
        sendChunk.mockImplementationOnce(
            (_chatId, _chunk, _context, signal) =>
                new Promise<SinkResult>((_resolve, reject) => {
                    signal?.addEventListener('abort', () => reject(new Error('request aborted')));
                }),
        );

        const outcome = await scheduler.deliver(createPlan(['only']));

        expect(outcome.status).toBe('completed');
        expect(sendChunk).toHaveBeenCalledTimes(2);
        expect(sendChunk.mock.calls[0]?.[3]?.aborted).toBe(true);
        const [record] = tracker.getMetrics().recentRecords;
        expect(record?.attempts).toHaveLength(2);
        expect(record?.attempts[0]?.error).toBe('Attempt timed out after 20ms.');
        expect(record?.state).toBe('sent');
    });

    it('never overlaps sends when a timed-out dispatch is acknowledged late', async () => {
        const { scheduler, sendChunk, tracker } = setup({ dispatchTimeoutMs: 20 });
        const sent: number[] = [];
        let inFlight = 0;
        let maxInFlight = 0;
        sendChunk.mockImplementation(async (_chatId, chunk) => {
            inFlight += 1;
            maxInFlight = Math.max(maxInFlight, inFlight);
            if (sent.length === 0) await new Promise((resolve) => setTimeout(resolve, 60));
            sent.push(chunk.index);
            inFlight -= 1;
            return { status: 'ack' };
        });

        const outcome = await scheduler.deliver(createPlan(['one', 'two']));

        expect(outcome).toMatchObject({ status: 'completed', deliveredCount: 2 });
        expect(sent).toEqual([0, 1]);
        expect(maxInFlight).toBe(1);
        const [first] = tracker.getMetrics().recentRecords;
        expect(first).toMatchObject({ chunkIndex: 0, state: 'sent' });
        expect(first?.attempts[0]?.error).toBe('Attempt timed out after 20ms.');
    });

    it('supersedes an active reply-safe session, cancelling it exactly once', async () => {
        const { scheduler, sendChunk } = setup();
        const { gate, open } = createGate();
        sendChunk.mockImplementationOnce(async () => {
            await gate;
            return { status: 'ack' };
        });

        const first = await scheduler.start(
            createPlan(['first-a', 'first-b', 'first-c'], { planId: 'plan-1', modePolicy: 'reply_safe' }),
        );
        await vi.waitFor(() => expect(sendChunk).toHaveBeenCalledTimes(1));
        const requestCancel = vi.spyOn(first, 'requestCancel');

        const second = scheduler.deliver(createPlan(['second'], { planId: 'plan-2' }));
        await vi.waitFor(() => expect(requestCancel).toHaveBeenCalledTimes(1));
        open();

        await expect(first.finished).resolves.toMatchObject({
            status: 'cancelled',
            reason: 'superseded',
            deliveredCount: 1,
        });
        await expect(second).resolves.toMatchObject({ status: 'completed', planId: 'plan-2', deliveredCount: 1 });
        expect(requestCancel).toHaveBeenCalledTimes(1);
        expect(sendChunk.mock.calls.map(([, chunk]) => chunk.text)).toEqual(['first-a', 'second']);
    });

    it('rejects a new plan while an answer-safe session is active', async () => {
        const { scheduler, sendChunk } = setup();
        const { gate, open } = createGate();
        sendChunk.mockImplementationOnce(async () => {
            await gate;
            return { status: 'ack' };
        });

        const first = await scheduler.start(createPlan(['first'], { modePolicy: 'answer_safe' }));

        await expect(scheduler.start(createPlan(['second'], { planId: 'plan-2' }))).rejects.toBeInstanceOf(
            SessionConflictError,
        );
        open();
        await expect(first.finished).resolves.toMatchObject({ status: 'completed', deliveredCount: 1 });
    });

    it('keeps exactly one session per chat in the registry while delivering', async () => {
        const { scheduler, sendChunk } = setup();
        const { gate, open } = createGate();
        sendChunk.mockImplementationOnce(async () => {
            await gate;
            return { status: 'ack' };
        });

        const session = await scheduler.start(createPlan(['one', 'two', 'three']));
        await vi.waitFor(() => expect(sendChunk).toHaveBeenCalledTimes(1));

        expect(scheduler.registry.size).toBe(1);
        expect(scheduler.registry.list()).toEqual([
            expect.objectContaining({ sessionId: session.id, status: 'sending', cursor: 0, totalChunks: 3 }),
        ]);

        open();
        await session.finished;
        expect(scheduler.registry.has('chat-1')).toBe(false);
    });

    it('cancels every active session on cancelAll', async () => {
        const { scheduler, sendChunk } = setup();
        const { gate, open } = createGate();
        sendChunk.mockImplementation(async () => {
            await gate;
            return { status: 'ack' };
        });

        await scheduler.start(createPlan(['a', 'b'], { chatId: 'chat-1' }));
        await scheduler.start(createPlan(['a', 'b'], { chatId: 'chat-2' }));
        await vi.waitFor(() => expect(sendChunk).toHaveBeenCalledTimes(2));

        const outcomes = scheduler.cancelAll();
        open();

        await expect(outcomes).resolves.toEqual([
            expect.objectContaining({ chatId: 'chat-1', status: 'cancelled', reason: 'shutdown', deliveredCount: 1 }),
            expect.objectContaining({ chatId: 'chat-2', status: 'cancelled', reason: 'shutdown', deliveredCount: 1 }),
        ]);
    });

    it('delivers chunks from a streaming plan as they arrive', async () => {
        const { scheduler, sendChunk } = setup();
        async function* chunks(): AsyncGenerator<MessageChunk> {
            yield* toChunks(['streamed one', 'streamed two']);
        }
        const outcome = await scheduler.deliver(createStreamingPlan(chunks()));

        expect(outcome).toMatchObject({ status: 'completed', deliveredCount: 2 });
        expect(sendChunk.mock.calls.map(([, chunk]) => chunk.text)).toEqual(['streamed one', 'streamed two']);
    });

    it('fails a streaming session whose source breaks off and leaves typing hidden', async () => {
        const { scheduler, events } = setup();
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        async function* chunks(): AsyncGenerator<MessageChunk> {
            yield* toChunks(['streamed one']);
            throw new Error('model connection lost');
        }

        const outcome = await scheduler.deliver(createStreamingPlan(chunks()));

        expect(outcome).toMatchObject({ status: 'failed', deliveredCount: 1 });
        if (outcome.status === 'failed') {
            expect(outcome.error.message).toBe('model connection lost');
        }
        expect(events).toEqual(['typing:true@0', 'send:0@100', 'typing:false@100', 'typing:false@100']);
        expect(scheduler.registry.has('chat-1')).toBe(false);
        expect(consoleError).toHaveBeenCalledTimes(1);
    });

    it('stops a streaming session cancelled while its source is idle', async () => {
        const { scheduler, sendChunk } = setup();
        const { gate, open } = createGate();
        let closed = false;
        async function* chunks(): AsyncGenerator<MessageChunk> {
            try {
                yield* toChunks(['streamed one']);
                await gate;
                yield* toChunks(['never sent']);
            } finally {
                closed = true;
            }
        }

        const session = await scheduler.start(createStreamingPlan(chunks()));
        await vi.waitFor(() => expect(sendChunk).toHaveBeenCalledTimes(1));

        expect(scheduler.cancel('chat-1', 'interrupted')).toBe(true);
        await expect(session.finished).resolves.toMatchObject({
            status: 'cancelled',
            reason: 'interrupted',
            deliveredCount: 1,
        });
        expect(closed).toBe(false);

        open();
        await vi.waitFor(() => expect(closed).toBe(true));
        expect(sendChunk).toHaveBeenCalledTimes(1);
    });

    it('produces the same pacing for the same seed', async () => {
        const run = async (): Promise<string[]> => {
            const { scheduler, events } = setup({
                delay: { strategy: 'uniform', minMs: 100, maxMs: 900, msPerChar: 0 },
                randomFactory: () => createSeededRandom(7),
            });
            await scheduler.deliver(createPlan(['a', 'b', 'c']));
            return events.filter((event) => event.startsWith('send'));
        };

        expect(await run()).toEqual(await run());
    });
});
