import type { ChatId, SessionSnapshot } from '../types/delivery.js';
import type { DeliverySession } from './delivery-session.js';

export type RegistryEventType = 'session:started' | 'session:terminated';

export type RegistryListener = (session: DeliverySession) => void;

export function chatKey(chatId: ChatId): string {
    return String(chatId);
}

/**
 * Chat-keyed registry of active delivery sessions. At most one session per chat.
 *
 * Lookups and removals are plain map operations; multi-step claims (check the
 * current occupant, wait for it, register a new one) go through {@link withChatLock},
 * which serializes callers per chat.
 */
export class SessionRegistry {
    readonly #sessions: Map<string, DeliverySession> = new Map();
    readonly #locks: Map<string, Promise<void>> = new Map();
    readonly #listeners: Map<RegistryEventType, Set<RegistryListener>> = new Map();

    get size(): number {
        return this.#sessions.size;
    }

    get(chatId: ChatId): DeliverySession | undefined {
        return this.#sessions.get(chatKey(chatId));
    }

    has(chatId: ChatId): boolean {
        return this.#sessions.has(chatKey(chatId));
    }

    list(): SessionSnapshot[] {
        return [...this.#sessions.values()].map((session) => session.snapshot());
    }

    sessions(): DeliverySession[] {
        return [...this.#sessions.values()];
    }

    /** Run `fn` exclusively for this chat; later callers wait for earlier ones. */
    async withChatLock<T>(chatId: ChatId, fn: () => Promise<T>): Promise<T> {
        const key = chatKey(chatId);
        const previous = this.#locks.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.#locks.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.#locks.get(key) === tail) {
                this.#locks.delete(key);
            }
        }
    }

    register(session: DeliverySession): void {
        const key = chatKey(session.chatId);
        const occupant = this.#sessions.get(key);
        if (occupant && occupant !== session) {
            throw new Error(`[SessionRegistry] Chat ${key} already has active session ${occupant.id}.`);
        }
        this.#sessions.set(key, session);
        this.#emit('session:started', session);
    }

    /** Remove `session` if it is still the registered one. */
    remove(session: DeliverySession): boolean {
        const key = chatKey(session.chatId);
        if (this.#sessions.get(key) !== session) return false;
        this.#sessions.delete(key);
        this.#emit('session:terminated', session);
        return true;
    }

    on(type: RegistryEventType, listener: RegistryListener): () => void {
        let listeners = this.#listeners.get(type);
        if (!listeners) {
            listeners = new Set();
            this.#listeners.set(type, listeners);
        }
        listeners.add(listener);
        return () => {
            listeners?.delete(listener);
        };
    }

    #emit(type: RegistryEventType, session: DeliverySession): void {
        for (const listener of this.#listeners.get(type) ?? []) {
            try {
                listener(session);
            } catch (err) {
                console.error(`[SessionRegistry] Listener for '${type}' threw:`, err);
            }
        }
    }
}
