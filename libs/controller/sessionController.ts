/**
 * Session Controller
 *
 * Runs one conversation turn end to end:
 *   validate → lock → load/create → replay check → engine loop
 *   → compare-and-put → audit append → escalation case → reviewer notify
 *
 * The session write is the commit point. Nothing is audited or escalated for
 * a turn whose session write failed. A turn whose audit append failed is
 * rolled back by writing the previous snapshot over it. The escalation case
 * travels in the turn receipt and is stored only after the audit entries
 * landed; a retry of the same turnSequence stores it if that step failed.
 */

import type { WorkflowConfig } from '../bootstrap/config/workflow-config.js';
import type { AuditLog } from '../audit/auditLog.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { StaleSessionError, isWorkflowError } from '../errors/workflowErrors.js';
import type { EscalationCoordinator, HandoffCompleter, HandoffOutcome } from '../escalation/coordinator.js';
import type { EscalationCase } from '../escalation/types.js';
import type { EvaluationRequest } from '../evaluators/contracts.js';
import { getTurnLogger, logger } from '../logging/logger.js';
import { KeyedMutex } from '../session/lock.js';
import { acknowledgementToken, auditToken, createSession, turnToken } from '../session/session.js';
import type { SessionStore } from '../session/store.js';
import { validate } from '../validation/zod-middleware.js';
import { TurnInputSchema } from '../validation/schema.js';
import { mergeTurnEntities } from '../workflow/collectPlanner.js';
import { appendBounded, applyDirectives, type AuditDirective, type DirectiveEffects } from '../workflow/sessionReducer.js';
import type { WorkflowState } from '../workflow/states.js';
import { advance, continuesWithinTurn } from '../workflow/transitionEngine.js';
import type {
    AuditEntryDraft,
    EvaluatorName,
    EvaluatorVerdict,
    TransitionEvent,
    TurnInput,
    TurnOutput,
    VerdictMap,
    WorkflowSession
} from '../workflow/types.js';

/** Engine steps allowed in one turn; the longest nominal path takes six. */
const MAX_STEPS_PER_TURN = 10;

/**
 * The slice of the evaluator invoker the controller needs.
 */
export interface VerdictSource {
    invokeAll(names: readonly EvaluatorName[], request: EvaluationRequest, signal: AbortSignal): Promise<VerdictMap>;
}

export interface SessionControllerDeps {
    readonly store: SessionStore;
    readonly auditLog: AuditLog;
    readonly evaluators: VerdictSource;
    readonly coordinator: EscalationCoordinator;
    readonly config: WorkflowConfig;
    readonly now?: () => Date;
    readonly mutex?: KeyedMutex;
}

export interface TurnOptions {
    readonly signal?: AbortSignal;
}

interface EngineOutcome {
    readonly session: WorkflowSession;
    readonly verdicts: VerdictMap;
    readonly audits: readonly AuditEntryDraft[];
    readonly escalation: { readonly request: NonNullable<DirectiveEffects['escalation']>; readonly from: WorkflowState } | null;
    readonly prompt: string | null;
}

/**
 * A failure after the turn's session write stuck. The caller reports the
 * committed state with the underlying error.
 */
class CommittedTurnFailure extends Error {
    constructor(readonly committedState: WorkflowState, cause: unknown) {
        super('Turn committed but not completed', { cause });
        this.name = 'CommittedTurnFailure';
    }
}

function sessionIdOf(payload: unknown): string {
    if (typeof payload === 'object' && payload !== null && 'sessionId' in payload && typeof payload.sessionId === 'string') {
        return payload.sessionId;
    }
    return '';
}

function toDraft(
    directive: AuditDirective,
    sessionId: string,
    turnSequence: number,
    token: string,
    timestamp: string
): AuditEntryDraft {
    return {
        token,
        sessionId,
        turnSequence,
        fromState: directive.fromState,
        toState: directive.toState,
        trigger: directive.trigger,
        actor: directive.actor,
        timestamp
    };
}

export class SessionController implements HandoffCompleter {
    private readonly store: SessionStore;
    private readonly auditLog: AuditLog;
    private readonly evaluators: VerdictSource;
    private readonly coordinator: EscalationCoordinator;
    private readonly config: WorkflowConfig;
    private readonly now: () => Date;
    private readonly mutex: KeyedMutex;
    private readonly log = logger.child({ component: 'session-controller' });

    constructor(deps: SessionControllerDeps) {
        this.store = deps.store;
        this.auditLog = deps.auditLog;
        this.evaluators = deps.evaluators;
        this.coordinator = deps.coordinator;
        this.config = deps.config;
        this.now = deps.now ?? (() => new Date());
        this.mutex = deps.mutex ?? new KeyedMutex();
    }

    /**
     * Processes one turn. Never throws: failures are reported in
     * `TurnOutput.error` with the session's last committed state.
     */
    async handleTurn(payload: unknown, options: TurnOptions = {}): Promise<TurnOutput> {
        let input: TurnInput;
        try {
            input = validate(TurnInputSchema, payload, 'TurnInput');
        } catch (error) {
            return this.failure(sessionIdOf(payload), 'COLLECT_REQUEST', error);
        }

        const signal = options.signal ?? new AbortController().signal;
        const release = await this.mutex.acquire(input.sessionId);
        let committedState: WorkflowState = 'COLLECT_REQUEST';
        try {
            const session = await this.load(input.sessionId);
            committedState = session.currentState;
            return await this.runTurn(session, input, signal);
        } catch (error) {
            if (error instanceof CommittedTurnFailure) {
                return this.failure(input.sessionId, error.committedState, error.cause);
            }
            return this.failure(input.sessionId, committedState, error);
        } finally {
            release();
        }
    }

    /**
     * Moves a session from ESCALATE_HANDOFF to ESCALATION_COMPLETE on
     * reviewer acknowledgement. Called by the escalation coordinator.
     */
    async completeHandoff(sessionId: string, escalationId: string): Promise<HandoffOutcome> {
        return this.mutex.runExclusive(sessionId, async () => {
            const session = await this.store.get(sessionId);
            if (session === null) {
                return 'SESSION_EXPIRED';
            }

            const token = acknowledgementToken(sessionId, escalationId);
            if (session.currentState === 'ESCALATION_COMPLETE') {
                // A previous acknowledgement committed the session; make sure its audit landed.
                if (session.escalationId === escalationId) {
                    await this.appendAudits([{
                        token,
                        sessionId,
                        turnSequence: session.turnSequence,
                        fromState: 'ESCALATE_HANDOFF',
                        toState: 'ESCALATION_COMPLETE',
                        trigger: { kind: 'HANDOFF_ACK', escalationId },
                        actor: 'reviewer',
                        timestamp: session.updatedAt
                    }]);
                }
                return 'ALREADY_COMPLETE';
            }
            if (session.escalationId !== escalationId) {
                throw new StaleSessionError(sessionId, `escalation ${escalationId} is not the session's open handoff`);
            }

            const event: TransitionEvent = {
                intent: 'HandoffAcknowledged',
                extractedEntities: {},
                evaluatorVerdicts: {},
                turnSequence: session.turnSequence
            };
            const transition = advance(session, event, this.config);
            const reduced = applyDirectives(session, transition.nextState, transition.directives, this.config.maxClarificationRetries);

            const timestamp = this.now().toISOString();
            const drafts = reduced.effects.audits.map((directive, index) =>
                toDraft(directive, sessionId, session.turnSequence, index === 0 ? token : `${token}:${index}`, timestamp));

            try {
                await this.commitAudited(session, { ...reduced.session, updatedAt: timestamp }, drafts);
            } catch (error) {
                throw error instanceof CommittedTurnFailure ? error.cause : error;
            }

            this.log.info({ sessionId, escalationId }, 'Handoff acknowledged');
            return 'COMPLETED';
        });
    }

    private async load(sessionId: string): Promise<WorkflowSession> {
        const stored = await this.store.get(sessionId);
        return stored ?? createSession(sessionId, this.now(), this.config.sessionTtlMs);
    }

    private async runTurn(session: WorkflowSession, input: TurnInput, signal: AbortSignal): Promise<TurnOutput> {
        const turnLog = getTurnLogger(input.sessionId, input.turnSequence);

        if (input.turnSequence === session.turnSequence && session.lastTurn?.sequence === input.turnSequence) {
            await this.appendAudits(session.lastTurn.auditEntries);
            if (session.lastTurn.escalation !== undefined) {
                await this.escalate(session.lastTurn.escalation);
            }
            turnLog.info({ state: session.currentState }, 'Replayed turn');
            return session.lastTurn.response;
        }
        if (input.turnSequence <= session.turnSequence) {
            throw new StaleSessionError(
                input.sessionId,
                `turn ${input.turnSequence} is older than committed turn ${session.turnSequence}`
            );
        }

        const timestamp = this.now().toISOString();
        const withHistory: WorkflowSession = {
            ...session,
            confidenceHistory: appendBounded(session.confidenceHistory, input.confidence ?? 0, this.config.confidenceHistoryLimit),
            transcript: appendBounded(session.transcript, input.rawUtterance, this.config.transcriptLimit)
        };

        const outcome = await this.runEngine(withHistory, input, signal, timestamp);
        const token = turnToken(input.sessionId, input.turnSequence);

        const escalation: EscalationCase | null = outcome.escalation === null
            ? null
            : this.coordinator.prepareCase(
                outcome.session,
                outcome.escalation.request,
                outcome.verdicts,
                outcome.escalation.from,
                token
            );

        const finalState = outcome.session.currentState;
        const orderId = finalState === 'DISPENSED' ? outcome.session.orderId : null;
        const response: TurnOutput = {
            sessionId: input.sessionId,
            nextState: finalState,
            ...(outcome.prompt !== null ? { userPrompt: outcome.prompt } : {}),
            ...(escalation !== null ? { escalationId: escalation.escalationId } : {}),
            ...(orderId !== null ? { orderId } : {})
        };

        if (signal.aborted) {
            throw new StaleSessionError(input.sessionId, `turn ${input.turnSequence} was aborted`);
        }

        await this.commitAudited(session, {
            ...outcome.session,
            escalationId: escalation?.escalationId ?? outcome.session.escalationId,
            turnSequence: input.turnSequence,
            lastTurn: {
                sequence: input.turnSequence,
                response,
                auditEntries: outcome.audits,
                ...(escalation !== null ? { escalation } : {})
            },
            updatedAt: timestamp
        }, outcome.audits);

        if (escalation !== null) {
            try {
                await this.escalate(escalation);
            } catch (error) {
                throw new CommittedTurnFailure(finalState, error);
            }
        }

        turnLog.info({
            from: session.currentState,
            to: finalState,
            transitions: outcome.audits.length,
            escalationId: escalation?.escalationId
        }, 'Turn committed');
        return response;
    }

    /** Stores the turn's case and notifies the reviewer. Safe to repeat. */
    private async escalate(candidate: EscalationCase): Promise<void> {
        let stored: EscalationCase;
        try {
            stored = await this.coordinator.openCase(candidate);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'EscalationRepository.createIfAbsent');
        }
        await this.coordinator.notify(stored);
    }

    private async runEngine(
        initial: WorkflowSession,
        input: TurnInput,
        signal: AbortSignal,
        timestamp: string
    ): Promise<EngineOutcome> {
        let session = initial;
        let verdicts: Partial<Record<EvaluatorName, EvaluatorVerdict>> = {};
        const audits: AuditEntryDraft[] = [];
        let escalation: EngineOutcome['escalation'] = null;
        let prompt: string | null = null;

        for (let step = 0; ; step++) {
            if (step >= MAX_STEPS_PER_TURN) {
                throw new Error(`Turn did not settle within ${MAX_STEPS_PER_TURN} engine steps`);
            }
            if (signal.aborted) {
                throw new StaleSessionError(input.sessionId, `turn ${input.turnSequence} was aborted`);
            }

            const event: TransitionEvent = {
                intent: input.intent,
                ...(input.confidence !== undefined ? { confidence: input.confidence } : {}),
                extractedEntities: input.extractedEntities,
                evaluatorVerdicts: verdicts,
                turnSequence: input.turnSequence,
                rawUtterance: input.rawUtterance
            };

            const previous = session.currentState;
            const transition = advance(session, event, this.config);
            const reduced = applyDirectives(session, transition.nextState, transition.directives, this.config.maxClarificationRetries);
            session = reduced.session;

            for (const directive of reduced.effects.audits) {
                const token = auditToken(input.sessionId, input.turnSequence, audits.length);
                audits.push(toDraft(directive, input.sessionId, input.turnSequence, token, timestamp));
            }
            if (reduced.effects.escalation !== null) {
                escalation = { request: reduced.effects.escalation, from: previous };
            }
            if (reduced.effects.prompt !== null) {
                prompt = reduced.effects.prompt;
            }

            if (reduced.effects.invoke.length > 0) {
                const request: EvaluationRequest = {
                    sessionId: input.sessionId,
                    turnSequence: input.turnSequence,
                    idempotencyKey: turnToken(input.sessionId, input.turnSequence),
                    patientRef: session.patientRef,
                    entities: mergeTurnEntities(session, event).entities
                };
                const fresh = await this.evaluators.invokeAll(reduced.effects.invoke, request, signal);
                verdicts = { ...verdicts, ...fresh };
            }

            if (!continuesWithinTurn(previous, transition)) break;
        }

        return { session, verdicts, audits, escalation, prompt };
    }

    /**
     * Writes the next session version and then its audit entries. When the
     * append fails the previous snapshot is written back over the new
     * version; if that write fails too the error carries the committed state.
     */
    private async commitAudited(
        previous: WorkflowSession,
        next: WorkflowSession,
        audits: readonly AuditEntryDraft[]
    ): Promise<void> {
        const committed = await this.commit(previous, next);
        try {
            await this.appendAudits(audits);
        } catch (error) {
            if (await this.revert(previous, committed)) {
                throw error;
            }
            throw new CommittedTurnFailure(committed.currentState, error);
        }
    }

    /**
     * Writes the next session version. A lost compare-and-put means another
     * writer committed first.
     */
    private async commit(previous: WorkflowSession, next: WorkflowSession): Promise<WorkflowSession> {
        const ttlMs = this.config.sessionTtlMs;
        const stored: WorkflowSession = {
            ...next,
            version: previous.version + 1,
            ttlDeadline: new Date(this.now().getTime() + ttlMs).toISOString()
        };

        let written: boolean;
        try {
            written = await this.store.compareAndPut(
                previous.sessionId,
                previous.version === 0 ? null : previous.version,
                stored,
                ttlMs
            );
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'SessionStore.compareAndPut');
        }
        if (!written) {
            throw new StaleSessionError(previous.sessionId, `version ${previous.version} was superseded`);
        }
        return stored;
    }

    /** Puts the pre-turn snapshot back on top of a version whose audit append failed. */
    private async revert(previous: WorkflowSession, committed: WorkflowSession): Promise<boolean> {
        const restored: WorkflowSession = {
            ...previous,
            version: committed.version + 1,
            ttlDeadline: committed.ttlDeadline
        };
        try {
            const written = await this.store.compareAndPut(
                previous.sessionId,
                committed.version,
                restored,
                this.config.sessionTtlMs
            );
            if (!written) {
                this.log.error({ sessionId: previous.sessionId, version: committed.version }, 'Rollback lost to a concurrent write');
            }
            return written;
        } catch (error) {
            this.log.error({
                sessionId: previous.sessionId,
                error: error instanceof Error ? error.message : String(error)
            }, 'Rollback of unaudited turn failed');
            return false;
        }
    }

    private async appendAudits(entries: readonly AuditEntryDraft[]): Promise<void> {
        for (const entry of entries) {
            try {
                const outcome = await this.auditLog.append(entry);
                if (outcome === 'DUPLICATE_TOKEN') {
                    this.log.debug({ token: entry.token }, 'Audit entry already recorded');
                }
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'AuditLog.append');
            }
        }
    }

    private failure(sessionId: string, state: WorkflowState, error: unknown): TurnOutput {
        if (isWorkflowError(error)) {
            this.log.warn({ sessionId, code: error.code, reason: error.message }, 'Turn rejected');
            return { sessionId, nextState: state, error: error.code };
        }
        const sanitized = ErrorSanitizer.sanitize(error, 'SessionController.handleTurn');
        return {
            sessionId,
            nextState: state,
            userPrompt: sanitized.publicMessage,
            error: 'InternalError'
        };
    }
}
