import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { SessionRegistry } from '../../services/session-registry.js';
import type { DeliveryTracker } from '../../services/delivery-tracker.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    registry: SessionRegistry;
    tracker?: DeliveryTracker;
}

/** GET /health — Returns process health and a delivery summary. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const metrics = deps.tracker?.getMetrics(0);
        const totalSent = metrics?.totalSent ?? 0;
        const totalFailed = metrics?.totalFailed ?? 0;

        const data: HealthData = {
            // Degraded once more than a quarter of recently resolved chunks failed.
            status: totalFailed > 0 && totalFailed * 4 > totalSent + totalFailed ? 'degraded' : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            delivery: {
                activeSessions: deps.registry.size,
                totalSent,
                totalFailed,
            },
        };

        sendOk(res, data);
    };
}

/** GET /health/live — Liveness probe. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { status: 'live' });
    };
}
