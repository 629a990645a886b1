import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import { ConfigError, PipelineError, ToolNotFoundError } from '../core/errors.js';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

const rawBodies = new WeakMap<IncomingMessage, string>();

/** `verify` hook for `express.json()`: keeps the exact request bytes for signature checks. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    rawBodies.set(req, buffer.toString('utf8'));
}

function signaturePayload(req: Request): string {
    return rawBodies.get(req) ?? '';
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
 * Validate the `X-Signature` header on control requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, secret)>`; a
 * request without a body is signed over the empty string. Without a
 * configured secret every signed route answers 503.
 */
export function createSignatureGuard(secret: string | undefined): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!secret) {
            void logThought('[API] Signed request rejected: AETHER_API_SECRET not configured.');
            sendError(res, 'Signed API endpoints are unavailable (missing AETHER_API_SECRET).', 503);
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
        const expected = createHmac('sha256', secret).update(signaturePayload(req)).digest();
        if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
            void logThought('[API] Signed request rejected: signature mismatch.');
            sendError(res, 'Invalid signature.', 403);
            return;
        }

        next();
    };
}

/** Signature header value for `payload`; used by clients and tests. */
export function signPayload(secret: string, payload: string): string {
    return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof ConfigError) {
        return { status: 422, message: scrubSensitiveText(err.describe()) };
    }
    if (err instanceof ToolNotFoundError) {
        return { status: 424, message: scrubSensitiveText(err.describe()) };
    }
    if (err instanceof PipelineError) {
        return { status: 500, message: scrubSensitiveText(err.describe()) };
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
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
