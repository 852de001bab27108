import type { ChatId, DeliverySink } from '../types/delivery.js';
import { logThought } from '../utils/logger.js';

export interface TypingIndicatorOptions {
    enabled: boolean;
    /** Pause with the indicator hidden before it is shown. */
    idleMs: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Brackets each chunk with the sink's "composing" signal.
 *
 * Typing signals are cosmetic: a failing `setTyping` is logged and never fails the delivery.
 */
export class TypingIndicatorController {
    readonly #sink: DeliverySink;
    readonly #enabled: boolean;
    readonly #idleMs: number;
    readonly #sleep: (ms: number) => Promise<void>;

    constructor(sink: DeliverySink, options: Partial<TypingIndicatorOptions> = {}) {
        this.#sink = sink;
        this.#enabled = options.enabled ?? true;
        this.#idleMs = Math.max(0, Math.floor(options.idleMs ?? 0));
        this.#sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    }

    get enabled(): boolean {
        return this.#enabled;
    }

    get idleMs(): number {
        return this.#idleMs;
    }

    async idle(): Promise<void> {
        if (this.#idleMs > 0) {
            await this.#sleep(this.#idleMs);
        }
    }

    async show(chatId: ChatId): Promise<void> {
        await this.#signal(chatId, true);
    }

    async hide(chatId: ChatId): Promise<void> {
        await this.#signal(chatId, false);
    }

    async #signal(chatId: ChatId, active: boolean): Promise<void> {
        if (!this.#enabled) return;
        try {
            await this.#sink.setTyping(chatId, active);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            console.warn(`[TypingIndicator] setTyping(${active}) failed for chat ${chatId}: ${reason}`);
            void logThought(`[TypingIndicator] setTyping(${active}) failed for chat ${chatId}: ${reason}`);
        }
    }
}
