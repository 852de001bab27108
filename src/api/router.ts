import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleLiveness, type HealthDeps } from './handlers/health.js';
import { handleCancelSession, handleListSessions, type SessionDeps } from './handlers/sessions.js';
import { requestLogger, requireSignature, sendError, sendOk, setRawRequestBody } from './shared.js';
import type { ReliabilityData } from '../types/api.js';
import type { DeliveryScheduler } from '../services/delivery-scheduler.js';
import type { DeliveryTracker } from '../services/delivery-tracker.js';
import type { InterruptCoordinator } from '../services/interrupt-coordinator.js';
import { logThought } from '../utils/logger.js';
import { getConfigValue } from '../config/config-loader.js';

export interface ApiServerDeps {
    scheduler: DeliveryScheduler;
    tracker?: DeliveryTracker;
    coordinator?: InterruptCoordinator;
}

const DEFAULT_PORT = 3100;

/**
 * Build the Control Plane HTTP API.
 *
 * Endpoints:
 *   GET  /health                     — Process health and delivery summary
 *   GET  /health/live                — Liveness probe
 *   GET  /sessions                   — Active delivery sessions
 *   GET  /reliability                — Per-chunk delivery metrics
 *   POST /sessions/:chatId/cancel    — Cancel a chat's active delivery (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const healthDeps: HealthDeps = { registry: deps.scheduler.registry, tracker: deps.tracker };
    const sessionDeps: SessionDeps = { scheduler: deps.scheduler, coordinator: deps.coordinator };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(healthDeps));
    app.get('/health/live', handleLiveness());
    app.get('/sessions', handleListSessions(sessionDeps));
    app.get('/reliability', (req, res) => {
        const requestedLimit = Number(req.query.limit ?? 50);
        const limit = Number.isFinite(requestedLimit) && requestedLimit > 0
            ? Math.min(200, Math.floor(requestedLimit))
            : 50;
        const data: ReliabilityData = { delivery: deps.tracker?.getMetrics(limit) ?? null };
        sendOk(res, data);
    });

    // Protected endpoints
    app.post('/sessions/:chatId/cancel', requireSignature, handleCancelSession(sessionDeps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Create the control plane and start listening on `API_PORT`. */
export function startApiServer(deps: ApiServerDeps): Server {
    const port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT;
    const server = createServer(createApiApp(deps));

    server.listen(port, () => {
        console.log(`[API] Control plane listening on http://localhost:${port}`);
        void logThought(`[API] HTTP server started on port ${port}.`);
    });

    return server;
}
