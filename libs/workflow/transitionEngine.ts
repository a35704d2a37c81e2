/**
 * Transition Engine
 *
 * `advance(session, event, config)` maps (state, event, verdicts) to the next
 * state and an ordered directive list. It is pure: no I/O, no clock, no
 * randomness. The session controller applies the directives.
 *
 * Evaluation order for one step:
 *   1. Reject intents the current state does not accept.
 *   2. Circuit breakers (guarded states only).
 *   3. StatusInquiry: status prompt, no transition.
 *   4. Nominal transition for the current state.
 */

import type { EngineConfig } from '../bootstrap/config/workflow-config.js';
import { InvalidTransitionError } from '../errors/workflowErrors.js';
import { evaluateBreakers } from '../safety/breakerPolicy.js';
import { mergeTurnEntities, planCollect } from './collectPlanner.js';
import { Prompts } from './prompts.js';
import { isAutomatic, isTerminal, type WorkflowState } from './states.js';
import type {
    AuditTrigger,
    BreakerTrip,
    Directive,
    DirectiveType,
    EvaluatorName,
    EvaluatorVerdict,
    Intent,
    TransitionEvent,
    TransitionResult,
    WorkflowSession
} from './types.js';

export const SAFETY_EVALUATORS: readonly EvaluatorName[] = ['interaction', 'allergy', 'controlled', 'dosage'];
export const BACKEND_EVALUATORS: readonly EvaluatorName[] = ['inventory'];

const DIRECTIVE_ORDER: readonly DirectiveType[] = [
    'INVOKE_EVALUATOR',
    'PERSIST_ENTITY',
    'CONFIRM_SLOT',
    'SET_CANDIDATES',
    'CONFIRM_IDENTITY',
    'CLARIFY',
    'RESET_RETRY',
    'RECORD_ORDER',
    'REQUEST_ESCALATION',
    'EMIT_AUDIT',
    'EMIT_PROMPT'
];

const COLLECTING: ReadonlySet<Intent> = new Set<Intent>(['RequestRefill', 'Clarification']);

function accepts(state: WorkflowState, intent: Intent): boolean {
    if (intent === 'StatusInquiry') return true;
    if (isTerminal(state)) return false;
    if (state === 'ESCALATE_HANDOFF') return intent === 'HandoffAcknowledged';
    return COLLECTING.has(intent);
}

function ordered(directives: readonly Directive[]): readonly Directive[] {
    return Object.freeze(
        [...directives].sort((a, b) => DIRECTIVE_ORDER.indexOf(a.type) - DIRECTIVE_ORDER.indexOf(b.type))
    );
}

function result(nextState: WorkflowState, directives: readonly Directive[]): TransitionResult {
    return Object.freeze({ nextState, directives: ordered(directives) });
}

function audit(from: WorkflowState, to: WorkflowState, trigger: AuditTrigger, actor: string): Directive {
    return { type: 'EMIT_AUDIT', fromState: from, toState: to, trigger, actor };
}

function invoke(evaluators: readonly EvaluatorName[]): Directive[] {
    return evaluators.map((evaluator): Directive => ({ type: 'INVOKE_EVALUATOR', evaluator }));
}

function missing(event: TransitionEvent, names: readonly EvaluatorName[]): EvaluatorName[] {
    return names.filter(name => event.evaluatorVerdicts[name] === undefined);
}

function escalateOnTrip(session: WorkflowSession, event: TransitionEvent, trip: BreakerTrip): TransitionResult {
    const from = session.currentState;
    // Keep what the patient already told us for the reviewer, unless the
    // whole utterance is untrusted.
    const persisted = from === 'COLLECT_REQUEST' && trip.reasonCode !== 'LOW_CONFIDENCE'
        ? mergeTurnEntities(session, event).directives
        : [];
    return result('ESCALATE_HANDOFF', [
        ...persisted,
        { type: 'REQUEST_ESCALATION', reasonCode: trip.reasonCode, trip },
        audit(from, 'ESCALATE_HANDOFF', { kind: 'BREAKER', reasonCode: trip.reasonCode, rule: trip.rule }, 'circuit-breaker'),
        { type: 'EMIT_PROMPT', prompt: Prompts.escalated() }
    ]);
}

function evaluatorEscalation(evaluator: EvaluatorName, verdict: EvaluatorVerdict): BreakerTrip {
    return verdict.reasonCode === undefined
        ? { reasonCode: 'EVALUATOR_ESCALATION', rule: 8, evaluator }
        : { reasonCode: 'EVALUATOR_ESCALATION', rule: 8, evaluator, verdictReason: verdict.reasonCode };
}

function collectStep(session: WorkflowSession, event: TransitionEvent, config: EngineConfig): TransitionResult {
    const plan = planCollect(session, event, config);
    switch (plan.kind) {
        case 'CLARIFY':
            return result('COLLECT_REQUEST', plan.directives);
        case 'INVOKE':
            return result('COLLECT_REQUEST', invoke(plan.evaluators));
        case 'BLOCKED':
            return escalateOnTrip(session, event, evaluatorEscalation(plan.evaluator, plan.verdict));
        case 'COMPLETE':
            return result('SAFETY_CHECK', [
                ...plan.directives,
                audit('COLLECT_REQUEST', 'SAFETY_CHECK',
                    { kind: 'EVENT', intent: event.intent, condition: 'IDENTITY_CONFIRMED_ENTITIES_COMPLETE' }, 'patient')
            ]);
    }
}

function safetyStep(session: WorkflowSession, event: TransitionEvent): TransitionResult {
    const needed = missing(event, SAFETY_EVALUATORS);
    if (needed.length > 0) return result('SAFETY_CHECK', invoke(needed));

    for (const name of SAFETY_EVALUATORS) {
        const verdict = event.evaluatorVerdicts[name];
        if (verdict !== undefined && verdict.status !== 'PASS') {
            return escalateOnTrip(session, event, evaluatorEscalation(name, verdict));
        }
    }

    return result('BACKEND_CHECK', [
        audit('SAFETY_CHECK', 'BACKEND_CHECK',
            { kind: 'EVENT', intent: event.intent, condition: 'ALL_SAFETY_EVALUATORS_PASS' }, 'system')
    ]);
}

function backendStep(session: WorkflowSession, event: TransitionEvent): TransitionResult {
    const inventory = event.evaluatorVerdicts.inventory;
    if (inventory === undefined) return result('BACKEND_CHECK', invoke(BACKEND_EVALUATORS));

    const detail = inventory.detail;
    if (inventory.status !== 'PASS' || detail?.kind !== 'inventory') {
        return escalateOnTrip(session, event, evaluatorEscalation('inventory', inventory));
    }

    if (detail.priorAuthRequired) {
        return result('PA_APPROVAL_NEEDED', [
            audit('BACKEND_CHECK', 'PA_APPROVAL_NEEDED',
                { kind: 'EVENT', intent: event.intent, condition: 'PRIOR_AUTHORIZATION_REQUIRED' }, 'system')
        ]);
    }

    if (!detail.available) {
        return escalateOnTrip(session, event, {
            reasonCode: 'EVALUATOR_ESCALATION',
            rule: 8,
            evaluator: 'inventory',
            verdictReason: 'OUT_OF_STOCK'
        });
    }

    const orderId = detail.orderId ?? `RX-${session.sessionId}-${event.turnSequence}`;
    return result('DISPENSED', [
        { type: 'RECORD_ORDER', orderId },
        audit('BACKEND_CHECK', 'DISPENSED',
            { kind: 'EVENT', intent: event.intent, condition: 'INVENTORY_AVAILABLE' }, 'system'),
        { type: 'EMIT_PROMPT', prompt: Prompts.dispensed(orderId) }
    ]);
}

function priorAuthStep(): TransitionResult {
    const reasonCode = 'PRIOR_AUTHORIZATION_REQUIRED';
    return result('ESCALATE_HANDOFF', [
        { type: 'REQUEST_ESCALATION', reasonCode },
        audit('PA_APPROVAL_NEEDED', 'ESCALATE_HANDOFF', { kind: 'ROUTING', reasonCode }, 'system'),
        { type: 'EMIT_PROMPT', prompt: Prompts.escalated() }
    ]);
}

function handoffStep(session: WorkflowSession, event: TransitionEvent): TransitionResult {
    if (session.escalationId === null) {
        throw new InvalidTransitionError(session.currentState, event.intent);
    }
    return result('ESCALATION_COMPLETE', [
        audit('ESCALATE_HANDOFF', 'ESCALATION_COMPLETE',
            { kind: 'HANDOFF_ACK', escalationId: session.escalationId }, 'reviewer')
    ]);
}

/**
 * Computes one step of the workflow.
 *
 * When verdicts the current state needs are missing, the result holds only
 * INVOKE_EVALUATOR directives and the unchanged state; call again with the
 * verdicts added.
 *
 * @throws InvalidTransitionError when the state defines no transition for the intent
 */
export function advance(session: WorkflowSession, event: TransitionEvent, config: EngineConfig): TransitionResult {
    const state = session.currentState;
    if (!accepts(state, event.intent)) {
        throw new InvalidTransitionError(state, event.intent);
    }

    const trip = evaluateBreakers(session, event, config);
    if (trip) return escalateOnTrip(session, event, trip);

    if (event.intent === 'StatusInquiry') {
        return result(state, [{ type: 'EMIT_PROMPT', prompt: Prompts.status(state) }]);
    }

    switch (state) {
        case 'COLLECT_REQUEST':
            return collectStep(session, event, config);
        case 'SAFETY_CHECK':
            return safetyStep(session, event);
        case 'BACKEND_CHECK':
            return backendStep(session, event);
        case 'PA_APPROVAL_NEEDED':
            return priorAuthStep();
        case 'ESCALATE_HANDOFF':
            return handoffStep(session, event);
        case 'DISPENSED':
        case 'ESCALATION_COMPLETE':
            throw new InvalidTransitionError(state, event.intent);
    }
}

/** True when the controller should keep stepping within the same turn. */
export function continuesWithinTurn(previous: WorkflowState, result: TransitionResult): boolean {
    const invoking = result.directives.some(d => d.type === 'INVOKE_EVALUATOR');
    return invoking || (result.nextState !== previous && isAutomatic(result.nextState));
}
