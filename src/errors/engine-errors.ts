/**
 * Engine Errors
 *
 * Every failure the engine raises on purpose carries a `kind` from this
 * taxonomy. Routes and workers switch on the kind; nothing in the engine
 * rewrites or hides an integrity or state-machine error on its way out.
 */

export type EngineErrorKind =
    | 'NotFound'
    | 'InvalidScore'
    | 'Inconsistent'
    | 'DuplicateSession'
    | 'AlreadyAnswered'
    | 'IllegalTransition'
    | 'InvalidToken'
    | 'ExpiredToken'
    | 'ConsumedToken'
    | 'DependencyUnavailable';

export abstract class EngineError extends Error {
    abstract readonly kind: EngineErrorKind;

    constructor(message: string, readonly details: Record<string, unknown> = {}) {
        super(message);
        this.name = new.target.name;
    }
}

export class NotFoundError extends EngineError {
    readonly kind = 'NotFound';

    constructor(entity: string, id: number | string) {
        super(`${entity} ${id} not found`, { entity, id });
    }
}

export class InvalidScoreError extends EngineError {
    readonly kind = 'InvalidScore';

    constructor(field: string, value: unknown, expected: string) {
        super(`Invalid ${field}: ${String(value)} (expected ${expected})`, { field, value });
    }
}

export class InconsistentError extends EngineError {
    readonly kind = 'Inconsistent';
}

export class DuplicateSessionError extends EngineError {
    readonly kind = 'DuplicateSession';

    constructor(interviewId: number) {
        super(`Interview ${interviewId} already has a chat session`, { interviewId });
    }
}

export class AlreadyAnsweredError extends EngineError {
    readonly kind = 'AlreadyAnswered';

    constructor(turnId: number) {
        super(`Chat turn ${turnId} is already answered`, { turnId });
    }
}

export class IllegalTransitionError extends EngineError {
    readonly kind = 'IllegalTransition';

    constructor(entity: 'Interview' | 'Application', from: string, event: string, reason?: string) {
        super(
            `${entity} cannot apply ${event} from ${from}${reason ? `: ${reason}` : ''}`,
            { entity, from, event, reason }
        );
    }
}

export class InvalidTokenError extends EngineError {
    readonly kind = 'InvalidToken';
}

export class ExpiredTokenError extends EngineError {
    readonly kind = 'ExpiredToken';
}

export class ConsumedTokenError extends EngineError {
    readonly kind = 'ConsumedToken';
}

export class DependencyUnavailableError extends EngineError {
    readonly kind = 'DependencyUnavailable';

    constructor(dependency: string, cause: unknown) {
        super(
            `${dependency} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`,
            { dependency }
        );
    }
}

export function isEngineError(error: unknown): error is EngineError {
    return error instanceof EngineError;
}
