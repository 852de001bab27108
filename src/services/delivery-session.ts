import { randomUUID } from 'node:crypto';
import type {
    AnyDeliveryPlan,
    ChatId,
    DeliveryOutcome,
    SessionSnapshot,
    SessionStatus,
} from '../types/delivery.js';
import { TERMINAL_STATUSES } from '../types/delivery.js';

const ALLOWED_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
    pending: ['typing_shown', 'completed', 'cancelled', 'failed'],
    typing_shown: ['sending', 'failed'],
    sending: ['typing_shown', 'completed', 'cancelled', 'failed'],
    completed: [],
    cancelled: [],
    failed: [],
};

export function plannedChunkCount(plan: AnyDeliveryPlan): number | undefined {
    const chunks = plan.chunks;
    return Symbol.asyncIterator in chunks ? undefined : chunks.length;
}

/**
 * Runtime state of one plan being delivered to one chat.
 *
 * Only the scheduler moves the cursor and status; anyone holding the session may
 * request cancellation, which the scheduler honors at the next chunk boundary.
 */
export class DeliverySession {
    readonly id: string = randomUUID();
    readonly plan: AnyDeliveryPlan;
    readonly startedAt: string = new Date().toISOString();
    readonly finished: Promise<DeliveryOutcome>;
    /** Resolves with the reason once cancellation is requested. */
    readonly cancelled: Promise<string>;

    #status: SessionStatus = 'pending';
    #cursor = 0;
    #cancelReason: string | null = null;
    #settle: (outcome: DeliveryOutcome) => void = () => undefined;
    #signalCancel: (reason: string) => void = () => undefined;

    constructor(plan: AnyDeliveryPlan) {
        this.plan = plan;
        this.finished = new Promise<DeliveryOutcome>((resolve) => {
            this.#settle = resolve;
        });
        this.cancelled = new Promise<string>((resolve) => {
            this.#signalCancel = resolve;
        });
    }

    get chatId(): ChatId {
        return this.plan.chatId;
    }

    get status(): SessionStatus {
        return this.#status;
    }

    /** Index of the next chunk to send. */
    get cursor(): number {
        return this.#cursor;
    }

    get deliveredCount(): number {
        return this.#cursor;
    }

    get cancelRequested(): boolean {
        return this.#cancelReason !== null;
    }

    get cancelReason(): string | null {
        return this.#cancelReason;
    }

    get isTerminal(): boolean {
        return TERMINAL_STATUSES.has(this.#status);
    }

    /** Returns true only for the request that actually flagged the session. */
    requestCancel(reason = 'cancel_requested'): boolean {
        if (this.isTerminal || this.#cancelReason !== null) return false;
        this.#cancelReason = reason;
        this.#signalCancel(reason);
        return true;
    }

    transition(next: SessionStatus): void {
        if (!ALLOWED_TRANSITIONS[this.#status].includes(next)) {
            throw new Error(`[DeliverySession] Illegal transition ${this.#status} -> ${next} (${this.id}).`);
        }
        this.#status = next;
    }

    advance(): void {
        this.#cursor++;
    }

    settle(outcome: DeliveryOutcome): void {
        this.#settle(outcome);
    }

    snapshot(): SessionSnapshot {
        return {
            sessionId: this.id,
            planId: this.plan.planId,
            requestId: this.plan.requestId,
            chatId: this.plan.chatId,
            status: this.#status,
            modePolicy: this.plan.modePolicy,
            kind: this.plan.kind,
            cursor: this.#cursor,
            deliveredCount: this.#cursor,
            totalChunks: plannedChunkCount(this.plan),
            cancelRequested: this.cancelRequested,
            startedAt: this.startedAt,
        };
    }
}
