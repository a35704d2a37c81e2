import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { isWorkflowError } from '../errors/workflowErrors.js';
import type { SessionController } from '../controller/sessionController.js';
import type { EscalationCoordinator } from '../escalation/coordinator.js';
import type { EscalationCase } from '../escalation/types.js';
import type { CallBreakerState } from '../evaluators/callBreaker.js';
import { logger } from '../logging/logger.js';
import { validate } from '../validation/zod-middleware.js';
import { EscalationIdParamSchema, ResolveEscalationSchema } from '../validation/schema.js';
import type { EvaluatorName, TurnErrorKind } from '../workflow/types.js';

/**
 * HTTP ingress for conversation turns and reviewer actions.
 *
 *   POST /v1/refill/turns
 *   POST /v1/escalations/:id/acknowledge
 *   POST /v1/escalations/:id/resolve
 *   GET  /health
 */

const TURN_ERROR_STATUS: Record<TurnErrorKind, number> = {
    InvalidTransition: 409,
    StaleSession: 409,
    NotFound: 404,
    ValidationFailed: 400,
    InternalError: 500
};

export interface BreakerStateSource {
    breakerStates(): Partial<Record<EvaluatorName, CallBreakerState>>;
}

export interface RefillAppDeps {
    readonly controller: SessionController;
    readonly coordinator: EscalationCoordinator;
    readonly health: BreakerStateSource;
    /** Per-turn deadline; the turn is aborted and answered StaleSession when it passes. */
    readonly turnDeadlineMs?: number;
}

const httpLog = logger.child({ component: 'http' });

/** Reviewer-facing view; the context package stays with the notification. */
function caseView(escalation: EscalationCase) {
    return {
        escalationId: escalation.escalationId,
        sessionId: escalation.sessionId,
        status: escalation.status,
        reasonCode: escalation.reasonCode,
        targetRole: escalation.targetRole,
        acknowledgedAt: escalation.acknowledgedAt,
        resolvedAt: escalation.resolvedAt
    };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

export function createRefillApp(deps: RefillAppDeps): Express {
    const app = express();
    app.use(express.json({ limit: '64kb' }));

    app.post('/v1/refill/turns', route(async (req, res) => {
        const signal = AbortSignal.timeout(deps.turnDeadlineMs ?? 15_000);
        const output = await deps.controller.handleTurn(req.body, { signal });
        const status = output.error === undefined ? 200 : TURN_ERROR_STATUS[output.error];
        res.status(status).json(output);
    }));

    app.post('/v1/escalations/:id/acknowledge', route(async (req, res) => {
        const escalationId = validate(EscalationIdParamSchema, req.params['id'], 'EscalationId');
        const escalation = await deps.coordinator.acknowledge(escalationId, deps.controller);
        res.status(200).json(caseView(escalation));
    }));

    app.post('/v1/escalations/:id/resolve', route(async (req, res) => {
        const escalationId = validate(EscalationIdParamSchema, req.params['id'], 'EscalationId');
        const { resolution } = validate(ResolveEscalationSchema, req.body, 'ResolveEscalation');
        const escalation = await deps.coordinator.resolve(escalationId, resolution);
        res.status(200).json(caseView(escalation));
    }));

    app.get('/health', (_req, res) => {
        const breakers = deps.health.breakerStates();
        const degraded = Object.values(breakers).some(state => state !== 'CLOSED');
        res.status(200).json({ status: degraded ? 'degraded' : 'ok', breakers });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (isWorkflowError(err)) {
            httpLog.warn({ code: err.code, reason: err.message }, 'Request rejected');
            res.status(err.statusCode).json({ error: err.code, message: err.message });
            return;
        }
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'ValidationFailed', message: 'Malformed JSON body' });
            return;
        }
        const sanitized = ErrorSanitizer.sanitize(err, 'RefillRouter');
        res.status(500).json({ error: 'InternalError', message: sanitized.publicMessage, incidentId: sanitized.incidentId });
    });

    return app;
}
