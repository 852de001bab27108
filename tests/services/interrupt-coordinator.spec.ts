import { describe, it, expect, vi, afterEach } from 'vitest';
import { InterruptCoordinator } from '../../src/services/interrupt-coordinator.js';
import { ModeSelector } from '../../src/services/mode-selector.js';
import { SessionRegistry } from '../../src/services/session-registry.js';
import { DeliverySession } from '../../src/services/delivery-session.js';
import type {
    ConversationTurn,
    DeliveryPlan,
    InterruptEvent,
    ModePolicy,
} from '../../src/types/delivery.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
    scrubSensitiveText: (s: string) => s,
}));

const event = (rawText: string, messageId?: number): InterruptEvent => ({
    chatId: 'chat-1',
    arrivalTime: 0,
    rawText,
    messageId,
});

const plan = (requestId: string, modePolicy: ModePolicy): DeliveryPlan => ({
    planId: 'plan-1',
    requestId,
    chatId: 'chat-1',
    chunks: [],
    modePolicy,
    kind: 'answer',
    createdAt: new Date(0).toISOString(),
});

/** Handler whose turns stay in flight until released. */
const createHandler = () => {
    const turns: ConversationTurn[] = [];
    const releases: Array<() => void> = [];
    const rejections: Array<(err: Error) => void> = [];
    const handler = vi.fn(
        (turn: ConversationTurn) =>
            new Promise<void>((resolve, reject) => {
                turns.push(turn);
                releases.push(resolve);
                rejections.push(reject);
            }),
    );
    return {
        handler,
        turns,
        release: (index: number) => releases[index]?.(),
        fail: (index: number, err: Error) => rejections[index]?.(err),
    };
};

describe('InterruptCoordinator', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('dispatches an event immediately when the chat is idle', () => {
        const { handler, turns } = createHandler();
        const coordinator = new InterruptCoordinator(new SessionRegistry(), new ModeSelector(), handler);

        expect(coordinator.submit(event('hello', 1))).toBe('dispatched');

        expect(handler).toHaveBeenCalledTimes(1);
        expect(turns[0]).toMatchObject({
            kind: 'answer',
            mergedCount: 1,
            context: { chatId: 'chat-1', replyToMessageId: undefined },
            event: { rawText: 'hello', messageId: 1 },
        });
        expect(coordinator.isBusy('chat-1')).toBe(true);
    });

    it('lets a turn that quotes an earlier message be interrupted under auto', () => {
        const { handler, turns } = createHandler();
        const coordinator = new InterruptCoordinator(new SessionRegistry(), new ModeSelector('auto'), handler);

        expect(coordinator.submit({ ...event('what about this?', 5), replyToMessageId: 2 })).toBe('dispatched');
        expect(turns[0]?.context).toEqual({ chatId: 'chat-1', replyToMessageId: 2 });
        expect(coordinator.submit(event('never mind', 6))).toBe('cancelled');
    });

    it('queues events behind an answer-safe turn and runs them in order', async () => {
        const { handler, turns, release } = createHandler();
        const coordinator = new InterruptCoordinator(new SessionRegistry(), new ModeSelector(), handler);

        coordinator.submit(event('one', 1));
        expect(coordinator.submit(event('two', 2))).toBe('queued');
        expect(coordinator.submit(event('three', 3))).toBe('queued');
        expect(coordinator.getQueuedCount('chat-1')).toBe(2);

        release(0);
        await vi.waitFor(() => expect(turns).toHaveLength(2));
        expect(turns[1]).toMatchObject({ kind: 'answer', event: { rawText: 'two' } });

        release(1);
        await vi.waitFor(() => expect(turns).toHaveLength(3));
        expect(turns[2]).toMatchObject({ kind: 'answer', event: { rawText: 'three' } });

        release(2);
        await vi.waitFor(() => expect(coordinator.isBusy('chat-1')).toBe(false));
        expect(handler).toHaveBeenCalledTimes(3);
    });

    it('cancels an active reply-safe session once and queues replies to it', async () => {
        const registry = new SessionRegistry();
        const { handler, turns, release } = createHandler();
        const coordinator = new InterruptCoordinator(registry, new ModeSelector('reply_safe'), handler);

        coordinator.submit(event('one', 1));
        const session = new DeliverySession(plan(turns[0]?.turnId ?? '', 'reply_safe'));
        registry.register(session);
        const requestCancel = vi.spyOn(session, 'requestCancel');

        expect(coordinator.submit(event('two', 2))).toBe('cancelled');
        expect(coordinator.submit(event('three', 3))).toBe('queued');

        expect(requestCancel).toHaveBeenCalledTimes(1);
        expect(session.cancelReason).toBe('interrupted');
        expect(coordinator.getQueuedCount('chat-1')).toBe(2);

        registry.remove(session);
        release(0);
        await vi.waitFor(() => expect(turns).toHaveLength(2));
        expect(turns[1]).toMatchObject({
            kind: 'reply',
            replyTo: { turnId: turns[0]?.turnId, planId: 'plan-1', messageId: 2 },
            context: { chatId: 'chat-1', replyToMessageId: 2 },
            event: { rawText: 'two' },
        });
    });

    it('cancels a reply-safe delivery that starts after the interruption arrived', () => {
        const registry = new SessionRegistry();
        const { handler, turns } = createHandler();
        const coordinator = new InterruptCoordinator(registry, new ModeSelector('reply_safe'), handler);

        coordinator.submit(event('one', 1));
        expect(coordinator.submit(event('two', 2))).toBe('cancelled');

        const session = new DeliverySession(plan(turns[0]?.turnId ?? '', 'reply_safe'));
        registry.register(session);

        expect(session.cancelRequested).toBe(true);
        expect(session.cancelReason).toBe('interrupted');
    });

    it('leaves sessions of other requests alone', () => {
        const registry = new SessionRegistry();
        const { handler } = createHandler();
        const coordinator = new InterruptCoordinator(registry, new ModeSelector('reply_safe'), handler);

        coordinator.submit(event('one', 1));
        coordinator.submit(event('two', 2));

        const unrelated = new DeliverySession(plan('proactive-request', 'reply_safe'));
        registry.register(unrelated);

        expect(unrelated.cancelRequested).toBe(false);
    });

    it('merges overflow into the last queued turn so no event is lost', async () => {
        const { handler, turns, release } = createHandler();
        const coordinator = new InterruptCoordinator(new SessionRegistry(), new ModeSelector(), handler, {
            maxQueuedPerChat: 2,
        });

        coordinator.submit(event('one', 1));
        coordinator.submit(event('two', 2));
        coordinator.submit(event('three', 3));
        expect(coordinator.submit(event('four', 4))).toBe('queued');
        expect(coordinator.getQueuedCount('chat-1')).toBe(2);

        release(0);
        await vi.waitFor(() => expect(turns).toHaveLength(2));
        release(1);
        await vi.waitFor(() => expect(turns).toHaveLength(3));

        expect(turns[2]).toMatchObject({
            mergedCount: 2,
            event: { rawText: 'three\nfour', messageId: 4 },
        });
    });

    it('keeps draining the queue after a failed turn', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const { handler, turns, fail } = createHandler();
        const coordinator = new InterruptCoordinator(new SessionRegistry(), new ModeSelector(), handler);

        coordinator.submit(event('one', 1));
        coordinator.submit(event('two', 2));
        fail(0, new Error('model offline'));

        await vi.waitFor(() => expect(turns).toHaveLength(2));
        expect(error).toHaveBeenCalledWith(
            `[InterruptCoordinator] Turn ${turns[0]?.turnId} for chat chat-1 failed:`,
            'model offline',
        );
    });

    it('stops watching new sessions once disposed', () => {
        const registry = new SessionRegistry();
        const { handler, turns } = createHandler();
        const coordinator = new InterruptCoordinator(registry, new ModeSelector('reply_safe'), handler);

        coordinator.submit(event('one', 1));
        coordinator.submit(event('two', 2));
        coordinator.dispose();

        const session = new DeliverySession(plan(turns[0]?.turnId ?? '', 'reply_safe'));
        registry.register(session);

        expect(session.cancelRequested).toBe(false);
    });
});
