import type { SessionSnapshot } from './delivery.js';
import type { ReliabilityMetrics } from './reliability.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    delivery: {
        activeSessions: number;
        totalSent: number;
        totalFailed: number;
    };
}

// ── Sessions ────────────────────────────────────────────────────────────────

export interface SessionListData {
    sessions: Array<SessionSnapshot & { queuedTurns: number }>;
}

export interface SessionCancelData {
    chatId: string;
    cancelRequested: boolean;
    sessionId: string | null;
}

export interface ReliabilityData {
    delivery: ReliabilityMetrics | null;
}
