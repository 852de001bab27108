import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { ConfigError, SessionConflictError } from '../types/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { getConfigValue } from '../config/config-loader.js';

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
}

function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    if ('rawBody' in req && typeof req.rawBody === 'string') {
        payloads.add(req.rawBody);
    }

    if (req.body === undefined) {
        payloads.add('');
        return [...payloads];
    }

    payloads.add(JSON.stringify(req.body));
    payloads.add(stableStringify(req.body));
    return [...payloads];
}

/** `verify` hook for `express.json()`: keeps the exact bytes that were signed. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    Object.assign(req, { rawBody: buffer.toString('utf8') });
}

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on state-changing requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, API_SECRET)>`
 *
 * If API_SECRET is not configured, all signed requests are rejected.
 */
export function requireSignature(req: Request, res: Response, next: NextFunction): void {
    const apiSecret = getConfigValue('API_SECRET') ?? '';

    if (!apiSecret) {
        void logThought('[API] Signed request rejected: API_SECRET not configured.');
        sendError(res, 'Signed API endpoints are unavailable (missing API_SECRET).', 503);
        return;
    }

    const signatureHeader = req.headers['x-signature'];
    if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
        void logThought('[API] Signed request rejected: missing or malformed X-Signature header.');
        sendError(res, 'Missing or malformed X-Signature header.', 401);
        return;
    }

    const providedHex = signatureHeader.slice('sha256='.length);
    if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
        void logThought('[API] Signed request rejected: malformed signature digest.');
        sendError(res, 'Malformed signature digest.', 401);
        return;
    }
    const provided = Buffer.from(providedHex, 'hex');
    const signatureMatches = getSignaturePayloadCandidates(req).some((payload) => {
        const expected = createHmac('sha256', apiSecret).update(payload).digest();
        return provided.length === expected.length && timingSafeEqual(provided, expected);
    });

    if (!signatureMatches) {
        void logThought('[API] Signed request rejected: signature mismatch.');
        sendError(res, 'Invalid signature.', 403);
        return;
    }

    next();
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof ConfigError) {
        return { status: 400, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof SessionConflictError) {
        return { status: 409, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    console.log(`[API] [${correlationId}] ${req.method} ${req.path}`);
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
