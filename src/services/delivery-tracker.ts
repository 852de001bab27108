import { randomUUID } from 'node:crypto';
import type {
    DeliveryRecord,
    DeliveryAttempt,
    ReliabilityMetrics,
} from '../types/reliability.js';
import type { ChatId } from '../types/delivery.js';
import { logThought } from '../utils/logger.js';

const MAX_HISTORY = 200;

/**
 * Dispatch history for the control plane: one record per chunk the scheduler
 * hands to the sink, holding each attempt's timing and error. Only the newest
 * records are kept.
 */
export class DeliveryTracker {
    readonly #records: DeliveryRecord[] = [];

    /** Open a record for chunk `chunkIndex` of a session. */
    createRecord(sessionId: string, chatId: ChatId, chunkIndex: number): string {
        const id = randomUUID();
        this.#records.push({
            id,
            sessionId,
            chatId,
            chunkIndex,
            state: 'pending',
            attempts: [],
            createdAt: new Date().toISOString(),
        });

        // drop the oldest
        if (this.#records.length > MAX_HISTORY) {
            this.#records.splice(0, this.#records.length - MAX_HISTORY);
        }

        return id;
    }

    /** A `sendChunk` call is about to be made (or a late acknowledgement reused). */
    recordAttemptStart(recordId: string): void {
        const record = this.#findRecord(recordId);
        if (!record) return;

        const attempt: DeliveryAttempt = {
            attemptNumber: record.attempts.length + 1,
            startedAt: new Date().toISOString(),
        };

        record.attempts.push(attempt);
        record.state = record.attempts.length === 1 ? 'sending' : 'retrying';
    }

    /** The sink acknowledged the chunk. */
    recordSuccess(recordId: string): void {
        const record = this.#findRecord(recordId);
        if (!record) return;

        this.#closeLastAttempt(record);
        record.state = 'sent';
        record.resolvedAt = new Date().toISOString();
    }

    /** The current attempt failed or timed out; the scheduler may still retry. */
    recordFailure(recordId: string, error: string): void {
        const record = this.#findRecord(recordId);
        if (!record) return;

        const last = this.#closeLastAttempt(record);
        if (last) last.error = error;
    }

    /** The chunk will not be retried again and its session fails. */
    markFailed(recordId: string): void {
        const record = this.#findRecord(recordId);
        if (!record) return;

        record.state = 'failed';
        record.resolvedAt = new Date().toISOString();

        void logThought(
            `[DeliveryTracker] Chunk ${record.chunkIndex} of session ${record.sessionId} FAILED after ${record.attempts.length} attempt(s) to chat ${record.chatId}.`,
        );
    }

    /** Totals over settled chunks, plus the newest `limit` records. */
    getMetrics(limit = 50): ReliabilityMetrics {
        const settled = this.#records.filter((record) => record.state === 'sent' || record.state === 'failed');
        const attempts = settled.reduce((sum, record) => sum + record.attempts.length, 0);

        const totalSent = settled.filter((record) => record.state === 'sent').length;
        const totalFailed = settled.length - totalSent;
        const totalRetries = attempts - settled.filter((record) => record.attempts.length > 0).length;
        const averageAttempts = settled.length > 0 ? attempts / settled.length : 0;

        return {
            totalSent,
            totalFailed,
            totalRetries,
            averageAttempts: Math.round(averageAttempts * 100) / 100,
            recentRecords: limit > 0 ? this.#records.slice(-limit) : [],
        };
    }

    #findRecord(id: string): DeliveryRecord | undefined {
        // newest records are the ones still in flight
        for (let i = this.#records.length - 1; i >= 0; i--) {
            const record = this.#records[i];
            if (record?.id === id) return record;
        }
        return undefined;
    }

    #closeLastAttempt(record: DeliveryRecord): DeliveryAttempt | undefined {
        const last = record.attempts[record.attempts.length - 1];
        if (last && !last.completedAt) {
            last.completedAt = new Date().toISOString();
            last.durationMs = new Date(last.completedAt).getTime() - new Date(last.startedAt).getTime();
        }
        return last;
    }
}
