import type {
    AnyDeliveryPlan,
    ChatId,
    DelaySpec,
    DeliveryOutcome,
    DeliverySink,
    DispatchContext,
    MessageChunk,
    SinkResult,
} from '../types/delivery.js';
import { DispatchError, SessionConflictError } from '../types/errors.js';
import { AttemptTimeoutError, withRetry } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';
import { createDelayPolicy, validateDelaySpec, type DelayPolicy, type RandomSource } from './delay-policy.js';
import { DeliverySession, plannedChunkCount } from './delivery-session.js';
import { SessionRegistry } from './session-registry.js';
import { TypingIndicatorController } from './typing-indicator.js';
import type { DeliveryTracker } from './delivery-tracker.js';

export interface DeliverySchedulerOptions {
    delay: DelaySpec;
    typingEnabled: boolean;
    /** Pause with the indicator hidden before each chunk's typing phase. */
    typingIdleMs: number;
    /** Head start before the first chunk of every session. */
    firstMessageDelayMs: number;
    /** Retries after the first attempt for transient dispatch failures. */
    retryCount: number;
    retryBackoffMs: number;
    retryBackoffFactor: number;
    retryMaxDelayMs: number;
    /** A dispatch running longer counts as a transient failure. 0 disables the timeout. */
    dispatchTimeoutMs: number;
    registry?: SessionRegistry;
    tracker?: DeliveryTracker;
    /** Fresh random source per session. */
    randomFactory?: () => RandomSource;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

const DEFAULTS: Omit<DeliverySchedulerOptions, 'delay' | 'registry' | 'tracker' | 'randomFactory' | 'sleep' | 'now'> = {
    typingEnabled: true,
    typingIdleMs: 0,
    firstMessageDelayMs: 0,
    retryCount: 2,
    retryBackoffMs: 1000,
    retryBackoffFactor: 2,
    retryMaxDelayMs: 15_000,
    dispatchTimeoutMs: 15_000,
};

function toDispatchError(err: unknown): DispatchError {
    if (err instanceof AttemptTimeoutError) {
        return new DispatchError('transient', err.message, { timedOut: true });
    }
    return DispatchError.from(err);
}

/**
 * Chunks of the session's plan. A streaming plan stops as soon as cancellation
 * is requested, even while its source has not produced the next chunk yet.
 */
async function* chunksUntilCancelled(session: DeliverySession): AsyncGenerator<MessageChunk> {
    const { chunks } = session.plan;
    if (!(Symbol.asyncIterator in chunks)) {
        yield* chunks;
        return;
    }

    const iterator = chunks[Symbol.asyncIterator]();
    const cancelled = session.cancelled.then(() => null);
    const logLateFailure = (err: unknown): void => {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[DeliveryScheduler] Stream of cancelled session ${session.id} failed: ${reason}`);
    };
    let exhausted = false;

    try {
        for (;;) {
            const pending = iterator.next();
            const next = await Promise.race([pending, cancelled]);
            if (next === null) {
                pending.catch(logLateFailure);
                return;
            }
            if (next.done) {
                exhausted = true;
                return;
            }
            yield next.value;
        }
    } finally {
        // not awaited: an idle source would hold up the cancellation
        if (!exhausted) iterator.return?.().catch(logLateFailure);
    }
}

/**
 * Releases the chunks of a plan one at a time with typing signals and
 * human-paced delays.
 *
 * Per chunk: honor a pending cancellation, idle, show typing, wait the policy
 * delay, dispatch (retrying transient failures), hide typing. Cancellation is
 * only checked before a chunk starts; a chunk that started is always finished.
 * A dispatch that times out is aborted and awaited before anything else is
 * sent, so at most one sink call per session is ever in flight.
 */
export class DeliveryScheduler {
    readonly #sink: DeliverySink;
    readonly #registry: SessionRegistry;
    readonly #typing: TypingIndicatorController;
    readonly #tracker?: DeliveryTracker;
    readonly #delaySpec: DelaySpec;
    readonly #options: typeof DEFAULTS;
    readonly #randomFactory: () => RandomSource;
    readonly #sleep: (ms: number) => Promise<void>;
    readonly #now: () => number;

    constructor(sink: DeliverySink, options: Partial<DeliverySchedulerOptions> & Pick<DeliverySchedulerOptions, 'delay'>) {
        this.#sink = sink;
        this.#registry = options.registry ?? new SessionRegistry();
        this.#tracker = options.tracker;
        this.#delaySpec = validateDelaySpec({ ...options.delay });
        this.#options = {
            typingEnabled: options.typingEnabled ?? DEFAULTS.typingEnabled,
            typingIdleMs: Math.max(0, options.typingIdleMs ?? DEFAULTS.typingIdleMs),
            firstMessageDelayMs: Math.max(0, options.firstMessageDelayMs ?? DEFAULTS.firstMessageDelayMs),
            retryCount: Math.max(0, Math.floor(options.retryCount ?? DEFAULTS.retryCount)),
            retryBackoffMs: Math.max(0, options.retryBackoffMs ?? DEFAULTS.retryBackoffMs),
            retryBackoffFactor: options.retryBackoffFactor ?? DEFAULTS.retryBackoffFactor,
            retryMaxDelayMs: options.retryMaxDelayMs ?? DEFAULTS.retryMaxDelayMs,
            dispatchTimeoutMs: Math.max(0, options.dispatchTimeoutMs ?? DEFAULTS.dispatchTimeoutMs),
        };
        this.#randomFactory = options.randomFactory ?? (() => Math.random);
        this.#sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
        this.#now = options.now ?? (() => Date.now());
        this.#typing = new TypingIndicatorController(sink, {
            enabled: this.#options.typingEnabled,
            idleMs: this.#options.typingIdleMs,
            sleep: this.#sleep,
        });
    }

    get registry(): SessionRegistry {
        return this.#registry;
    }

    /**
     * Claim the chat and begin delivering `plan` in the background.
     *
     * An active `reply_safe` session for the chat is cancelled (once) and awaited
     * first; an active `answer_safe` session makes this throw {@link SessionConflictError}.
     */
    async start(plan: AnyDeliveryPlan): Promise<DeliverySession> {
        return this.#registry.withChatLock(plan.chatId, async () => {
            const active = this.#registry.get(plan.chatId);
            if (active) {
                if (active.plan.modePolicy !== 'reply_safe') {
                    throw new SessionConflictError(plan.chatId, active.id);
                }
                if (active.requestCancel('superseded')) {
                    void logThought(
                        `[DeliveryScheduler] Session ${active.id} for chat ${plan.chatId} superseded by plan ${plan.planId}.`,
                    );
                }
                await active.finished;
            }

            const session = new DeliverySession(plan);
            this.#registry.register(session);
            void this.#run(session);
            return session;
        });
    }

    /** Start `plan` and wait for its terminal outcome. */
    async deliver(plan: AnyDeliveryPlan): Promise<DeliveryOutcome> {
        const session = await this.start(plan);
        return session.finished;
    }

    /** Request cancellation of the chat's active session. False when there is none or it was already requested. */
    cancel(chatId: ChatId, reason = 'cancel_requested'): boolean {
        return this.#registry.get(chatId)?.requestCancel(reason) ?? false;
    }

    /** Request cancellation of every active session and wait for them to stop. */
    async cancelAll(reason = 'shutdown'): Promise<DeliveryOutcome[]> {
        const sessions = this.#registry.sessions();
        for (const session of sessions) {
            session.requestCancel(reason);
        }
        return Promise.all(sessions.map((session) => session.finished));
    }

    async #run(session: DeliverySession): Promise<void> {
        const startedAt = this.#now();
        const policy = createDelayPolicy(this.#delaySpec, this.#randomFactory());
        let outcome: DeliveryOutcome;

        try {
            outcome = await this.#drive(session, policy, startedAt);
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            console.error(`[DeliveryScheduler] Session ${session.id} aborted:`, error.message);
            await this.#typing.hide(session.chatId);
            if (!session.isTerminal) session.transition('failed');
            outcome = this.#outcome(session, startedAt, { status: 'failed', error });
        }

        this.#registry.remove(session);
        void logThought(
            `[DeliveryScheduler] Session ${session.id} for chat ${session.chatId} ended ${outcome.status} after ${outcome.deliveredCount} chunk(s).`,
        );
        session.settle(outcome);
    }

    async #drive(session: DeliverySession, policy: DelayPolicy, startedAt: number): Promise<DeliveryOutcome> {
        const { chatId } = session;

        if (this.#options.firstMessageDelayMs > 0) {
            await this.#sleep(this.#options.firstMessageDelayMs);
        }

        for await (const chunk of chunksUntilCancelled(session)) {
            if (session.cancelRequested) {
                session.transition('cancelled');
                return this.#outcome(session, startedAt, {
                    status: 'cancelled',
                    reason: session.cancelReason ?? 'cancel_requested',
                });
            }

            await this.#typing.idle();
            session.transition('typing_shown');
            await this.#typing.show(chatId);
            await this.#sleep(policy.nextDelay(chunk));

            session.transition('sending');
            const error = await this.#dispatch(session, chunk);
            await this.#typing.hide(chatId);

            if (error) {
                session.transition('failed');
                void logThought(
                    `[DeliveryScheduler] Session ${session.id} failed on chunk ${chunk.index} (${error.kind}): ${error.message}`,
                );
                return this.#outcome(session, startedAt, { status: 'failed', error });
            }

            session.advance();
        }

        if (session.cancelRequested && plannedChunkCount(session.plan) === undefined) {
            // the stream was abandoned while waiting for its next chunk
            session.transition('cancelled');
            return this.#outcome(session, startedAt, {
                status: 'cancelled',
                reason: session.cancelReason ?? 'cancel_requested',
            });
        }

        session.transition('completed');
        return this.#outcome(session, startedAt, { status: 'completed' });
    }

    /** Send one chunk with retries. Returns the terminal error, or null once the sink acknowledged it. */
    async #dispatch(session: DeliverySession, chunk: MessageChunk): Promise<DispatchError | null> {
        const { plan } = session;
        const context: DispatchContext = {
            planId: plan.planId,
            requestId: plan.requestId,
            kind: plan.kind,
            replyTo: plan.replyTo,
        };
        const recordId = this.#tracker?.createRecord(session.id, session.chatId, chunk.index);
        // Set when the sink acknowledged an attempt after it had timed out.
        let lateAck: SinkResult | undefined;

        const result = await withRetry(
            async (signal): Promise<SinkResult> => {
                if (lateAck) return lateAck;
                const sent = await this.#sink.sendChunk(session.chatId, chunk, context, signal);
                if (sent.status !== 'ack') {
                    throw new DispatchError(sent.status, sent.reason);
                }
                if (signal.aborted) lateAck = sent;
                return sent;
            },
            {
                maxAttempts: this.#options.retryCount + 1,
                baseDelayMs: this.#options.retryBackoffMs,
                backoffFactor: this.#options.retryBackoffFactor,
                maxDelayMs: this.#options.retryMaxDelayMs,
                attemptTimeoutMs: this.#options.dispatchTimeoutMs,
                shouldRetry: (err) => toDispatchError(err).kind === 'transient',
                onAttempt: () => {
                    if (recordId) this.#tracker?.recordAttemptStart(recordId);
                },
                onFailure: (_attempt, err) => {
                    if (recordId) this.#tracker?.recordFailure(recordId, toDispatchError(err).message);
                },
                sleep: this.#sleep,
                label: `sink:${session.chatId}:${chunk.index}`,
            },
        );

        if (result.ok || lateAck) {
            if (recordId) this.#tracker?.recordSuccess(recordId);
            return null;
        }

        if (recordId) this.#tracker?.markFailed(recordId);
        return toDispatchError(result.cause ?? result.error);
    }

    #outcome(
        session: DeliverySession,
        startedAt: number,
        result: { status: 'completed' } | { status: 'cancelled'; reason: string } | { status: 'failed'; error: Error },
    ): DeliveryOutcome {
        return {
            ...result,
            sessionId: session.id,
            planId: session.plan.planId,
            chatId: session.chatId,
            deliveredCount: session.deliveredCount,
            durationMs: this.#now() - startedAt,
        };
    }
}
