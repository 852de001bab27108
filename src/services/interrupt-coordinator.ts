import { randomUUID } from 'node:crypto';
import type {
    ChatContext,
    ConversationTurn,
    InterruptEvent,
    ModePolicy,
    ReplyReference,
} from '../types/delivery.js';
import { logThought } from '../utils/logger.js';
import type { DeliverySession } from './delivery-session.js';
import type { ModeSelector } from './mode-selector.js';
import { chatKey, type SessionRegistry } from './session-registry.js';

/** Processes one turn end to end: generate, plan, deliver. Resolves when the delivery is over. */
export type TurnHandler = (turn: ConversationTurn) => Promise<void>;

/**
 * - `dispatched`: no turn was in flight; the event started a new turn.
 * - `cancelled`: the in-flight `reply_safe` delivery was asked to stop; the event runs next as a reply.
 * - `queued`: the event waits for the in-flight turn to finish.
 */
export type InterruptDecision = 'dispatched' | 'cancelled' | 'queued';

export interface InterruptCoordinatorOptions {
    /** Queued turns per chat before new events are merged into the last one. */
    maxQueuedPerChat: number;
}

interface ChatState {
    active: ConversationTurn;
    policy: ModePolicy;
    cancelRequested: boolean;
    queue: ConversationTurn[];
}

const DEFAULT_MAX_QUEUED = 5;

/**
 * Routes inbound user activity for chats that already have a turn in flight.
 *
 * A turn is in flight from the moment its event is dispatched until its handler
 * settles, which covers response generation as well as delivery. Every submitted
 * event ends up in exactly one turn: it either starts one, or is queued (merged
 * into the last queued turn once the queue is full).
 */
export class InterruptCoordinator {
    readonly #registry: SessionRegistry;
    readonly #modeSelector: ModeSelector;
    readonly #handler: TurnHandler;
    readonly #maxQueued: number;
    readonly #chats: Map<string, ChatState> = new Map();
    readonly #unsubscribe: () => void;

    constructor(
        registry: SessionRegistry,
        modeSelector: ModeSelector,
        handler: TurnHandler,
        options: Partial<InterruptCoordinatorOptions> = {},
    ) {
        this.#registry = registry;
        this.#modeSelector = modeSelector;
        this.#handler = handler;
        this.#maxQueued = Math.max(1, Math.floor(options.maxQueuedPerChat ?? DEFAULT_MAX_QUEUED));
        this.#unsubscribe = registry.on('session:started', (session) => this.#onSessionStarted(session));
    }

    submit(event: InterruptEvent): InterruptDecision {
        const key = chatKey(event.chatId);
        const state = this.#chats.get(key);

        if (!state) {
            const turn = this.#createTurn(event, 'answer');
            this.#begin(key, turn);
            return 'dispatched';
        }

        const session = this.#registry.get(event.chatId);
        const policy = session?.plan.modePolicy ?? state.policy;

        if (policy === 'reply_safe') {
            const replyTo: ReplyReference = {
                turnId: state.active.turnId,
                planId: session?.plan.planId,
                messageId: event.messageId ?? state.active.event.messageId,
            };
            this.#enqueue(state, this.#createTurn(event, 'reply', replyTo));

            if (state.cancelRequested) return 'queued';
            state.cancelRequested = true;
            session?.requestCancel('interrupted');
            void logThought(
                `[InterruptCoordinator] Chat ${key} interrupted; ${session ? `session ${session.id}` : 'pending delivery'} cancelled.`,
            );
            return 'cancelled';
        }

        this.#enqueue(state, this.#createTurn(event, 'answer'));
        return 'queued';
    }

    getQueuedCount(chatId: InterruptEvent['chatId']): number {
        return this.#chats.get(chatKey(chatId))?.queue.length ?? 0;
    }

    isBusy(chatId: InterruptEvent['chatId']): boolean {
        return this.#chats.has(chatKey(chatId));
    }

    /** Stop reacting to new sessions. Turns already in flight run to completion. */
    dispose(): void {
        this.#unsubscribe();
    }

    #createTurn(event: InterruptEvent, kind: ConversationTurn['kind'], replyTo?: ReplyReference): ConversationTurn {
        // a reply answers the interrupting message; an answer follows whatever the user quoted
        const context: ChatContext = {
            chatId: event.chatId,
            replyToMessageId: kind === 'reply' ? replyTo?.messageId : event.replyToMessageId,
        };
        return { turnId: randomUUID(), event, context, kind, replyTo, mergedCount: 1 };
    }

    #enqueue(state: ChatState, turn: ConversationTurn): void {
        const last = state.queue[state.queue.length - 1];
        if (!last || state.queue.length < this.#maxQueued) {
            state.queue.push(turn);
            return;
        }

        const merged: ConversationTurn = {
            ...last,
            event: {
                ...last.event,
                rawText: [last.event.rawText, turn.event.rawText].filter(Boolean).join('\n'),
                messageId: turn.event.messageId ?? last.event.messageId,
            },
            kind: last.kind === 'reply' || turn.kind === 'reply' ? 'reply' : 'answer',
            replyTo: last.replyTo ?? turn.replyTo,
            context: turn.kind === 'reply' || turn.context.replyToMessageId !== undefined ? turn.context : last.context,
            mergedCount: last.mergedCount + turn.mergedCount,
        };
        state.queue[state.queue.length - 1] = merged;
    }

    #begin(key: string, turn: ConversationTurn): void {
        const state: ChatState = {
            active: turn,
            policy: this.#modeSelector.modeFor(turn.context),
            cancelRequested: false,
            queue: this.#chats.get(key)?.queue ?? [],
        };
        this.#chats.set(key, state);
        void this.#runTurn(key, turn);
    }

    async #runTurn(key: string, turn: ConversationTurn): Promise<void> {
        try {
            await this.#handler(turn);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            console.error(`[InterruptCoordinator] Turn ${turn.turnId} for chat ${key} failed:`, reason);
            void logThought(`[InterruptCoordinator] Turn ${turn.turnId} for chat ${key} failed: ${reason}`);
        }

        const state = this.#chats.get(key);
        const next = state?.queue.shift();
        if (!next) {
            this.#chats.delete(key);
            return;
        }
        this.#begin(key, next);
    }

    /** A reply-safe interruption may arrive before the turn's delivery started. */
    #onSessionStarted(session: DeliverySession): void {
        const state = this.#chats.get(chatKey(session.chatId));
        if (state?.cancelRequested && session.plan.requestId === state.active.turnId) {
            session.requestCancel('interrupted');
        }
    }
}
