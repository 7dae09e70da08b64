import { z } from "zod";
import { errorFields, type ILogger } from "../config/logger";
import { isEngineError, type EngineErrorKind } from "../errors/engine-errors";

const STATUS_BY_KIND: Record<EngineErrorKind, number> = {
    NotFound: 404,
    InvalidScore: 400,
    Inconsistent: 500,
    DuplicateSession: 409,
    AlreadyAnswered: 409,
    IllegalTransition: 409,
    InvalidToken: 401,
    ExpiredToken: 401,
    ConsumedToken: 401,
    DependencyUnavailable: 503
};

// The candidate never learns whether the link existed, expired or was used
export const JOIN_REJECTION = { error: 'Invalid or expired join link' } as const;

const JOIN_FAILURE_KINDS: EngineErrorKind[] = ['InvalidToken', 'ExpiredToken', 'ConsumedToken', 'NotFound'];

/**
 * Positive integer id from a route parameter.
 */
export const idParam = z.coerce.number().int().positive();

// The part of an express Response the error helpers write to
export interface ErrorResponse {
    status(code: number): ErrorResponse;
    json(body: unknown): unknown;
}

export function statusForKind(kind: EngineErrorKind): number {
    return STATUS_BY_KIND[kind];
}

/**
 * Operator-facing error response: carries the taxonomy kind.
 */
export function sendError(res: ErrorResponse, error: unknown, logger: ILogger, operation: string): void {
    if (error instanceof z.ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            details: error.errors
        });
        return;
    }

    if (isEngineError(error)) {
        const status = statusForKind(error.kind);
        const fields = { operation, ...errorFields(error), details: error.details };
        if (status >= 500) {
            logger.error(fields, `${operation} failed`);
        } else {
            logger.warn(fields, `${operation} failed`);
        }
        res.status(status).json({ error: error.message, kind: error.kind });
        return;
    }

    logger.error({ operation, ...errorFields(error) }, `${operation} failed`);
    res.status(500).json({
        error: `${operation} failed`,
        message: error instanceof Error ? error.message : 'Unknown error'
    });
}

/**
 * Candidate-facing join error response: one generic rejection for every
 * token problem.
 */
export function sendJoinError(res: ErrorResponse, error: unknown, logger: ILogger): void {
    if (error instanceof z.ZodError || (isEngineError(error) && JOIN_FAILURE_KINDS.includes(error.kind))) {
        logger.warn({ ...errorFields(error) }, 'Join attempt rejected');
        res.status(401).json(JOIN_REJECTION);
        return;
    }
    sendError(res, error, logger, 'Join interview');
}
