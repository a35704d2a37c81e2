/**
 * Workflow error taxonomy.
 *
 * Each error carries a stable `code` (surfaced to callers as the turn's
 * error kind) and the HTTP status the ingress layer answers with. Messages
 * never include patient data.
 */

export type WorkflowErrorCode =
    | 'InvalidTransition'
    | 'StaleSession'
    | 'NotFound'
    | 'ValidationFailed';

export abstract class WorkflowError extends Error {
    abstract readonly code: WorkflowErrorCode;
    abstract readonly statusCode: number;
}

/**
 * The event names a transition the current state does not define.
 * Fatal to the turn; the session is left untouched.
 */
export class InvalidTransitionError extends WorkflowError {
    override readonly code = 'InvalidTransition';
    override readonly statusCode = 409;

    constructor(
        public readonly fromState: string,
        public readonly intent: string
    ) {
        super(`No transition for intent ${intent} from state ${fromState}`);
        this.name = 'InvalidTransitionError';
    }
}

/**
 * A concurrent or late mutation was detected. The caller must reload and retry.
 */
export class StaleSessionError extends WorkflowError {
    override readonly code = 'StaleSession';
    override readonly statusCode = 409;

    constructor(public readonly sessionId: string, reason: string) {
        super(`Session ${sessionId} is stale: ${reason}`);
        this.name = 'StaleSessionError';
    }
}

export class NotFoundError extends WorkflowError {
    override readonly code = 'NotFound';
    override readonly statusCode = 404;

    constructor(public readonly resource: 'session' | 'escalation', public readonly id: string) {
        super(`Unknown ${resource}: ${id}`);
        this.name = 'NotFoundError';
    }
}

export class InputValidationError extends WorkflowError {
    override readonly code = 'ValidationFailed';
    override readonly statusCode = 400;

    constructor(
        public readonly context: string,
        public readonly issues: readonly { path: string; message: string }[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'InputValidationError';
    }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
    return error instanceof WorkflowError;
}
