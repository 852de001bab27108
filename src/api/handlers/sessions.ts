import type { Request, Response } from 'express';
import type { SessionCancelData, SessionListData } from '../../types/api.js';
import type { DeliveryScheduler } from '../../services/delivery-scheduler.js';
import type { InterruptCoordinator } from '../../services/interrupt-coordinator.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface SessionDeps {
    scheduler: DeliveryScheduler;
    coordinator?: InterruptCoordinator;
}

/** GET /sessions — Snapshot of every active delivery session. */
export function handleListSessions(deps: SessionDeps) {
    return (_req: Request, res: Response): void => {
        const data: SessionListData = {
            sessions: deps.scheduler.registry.list().map((snapshot) => ({
                ...snapshot,
                queuedTurns: deps.coordinator?.getQueuedCount(snapshot.chatId) ?? 0,
            })),
        };
        sendOk(res, data);
    };
}

/** POST /sessions/:chatId/cancel — Request cancellation of a chat's active session. */
export function handleCancelSession(deps: SessionDeps) {
    return (req: Request, res: Response): void => {
        const chatId = req.params.chatId;
        if (!chatId) {
            sendError(res, 'chatId is required.', 400);
            return;
        }

        try {
            const session = deps.scheduler.registry.get(chatId);
            if (!session) {
                sendError(res, `No active session for chat ${chatId}.`, 404);
                return;
            }

            const body: unknown = req.body;
            const reason =
                typeof body === 'object' && body !== null && 'reason' in body && typeof body.reason === 'string'
                    ? body.reason
                    : 'operator_cancel';
            const cancelRequested = deps.scheduler.cancel(chatId, reason);
            void logThought(`[API] Cancellation of session ${session.id} for chat ${chatId} requested (${reason}).`);

            const data: SessionCancelData = { chatId, cancelRequested, sessionId: session.id };
            sendOk(res, data, 202);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}
