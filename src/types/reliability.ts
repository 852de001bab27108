/** Delivery lifecycle states for a single outbound chunk. */
export type DeliveryState = 'pending' | 'sending' | 'retrying' | 'sent' | 'failed';

/** A single tracked send attempt. */
export interface DeliveryAttempt {
    attemptNumber: number;
    startedAt: string;
    completedAt?: string;
    error?: string;
    durationMs?: number;
}

/** Full delivery record for one chunk of one session. */
export interface DeliveryRecord {
    id: string;
    sessionId: string;
    chatId: string | number;
    chunkIndex: number;
    state: DeliveryState;
    attempts: DeliveryAttempt[];
    createdAt: string;
    resolvedAt?: string;
}

/** Summary telemetry counters for reliability reporting. */
export interface ReliabilityMetrics {
    totalSent: number;
    totalFailed: number;
    totalRetries: number;
    averageAttempts: number;
    /** Delivery records for the most recent N chunks. */
    recentRecords: DeliveryRecord[];
}
