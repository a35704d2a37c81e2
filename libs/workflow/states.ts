/**
 * Closed set of workflow states.
 *
 * COLLECT_REQUEST → SAFETY_CHECK → BACKEND_CHECK → {DISPENSED | PA_APPROVAL_NEEDED}
 *   → ESCALATE_HANDOFF → ESCALATION_COMPLETE
 */
export const WORKFLOW_STATES = [
    'COLLECT_REQUEST',
    'SAFETY_CHECK',
    'BACKEND_CHECK',
    'DISPENSED',
    'PA_APPROVAL_NEEDED',
    'ESCALATE_HANDOFF',
    'ESCALATION_COMPLETE'
] as const;

export type WorkflowState = typeof WORKFLOW_STATES[number];

const TERMINAL_STATES: ReadonlySet<WorkflowState> = new Set<WorkflowState>(['DISPENSED', 'ESCALATION_COMPLETE']);

/**
 * States the engine passes through without waiting for another user turn.
 */
const AUTOMATIC_STATES: ReadonlySet<WorkflowState> = new Set<WorkflowState>([
    'SAFETY_CHECK',
    'BACKEND_CHECK',
    'PA_APPROVAL_NEEDED'
]);

/**
 * States in which the circuit breaker policy is evaluated.
 */
const GUARDED_STATES: ReadonlySet<WorkflowState> = new Set<WorkflowState>([
    'COLLECT_REQUEST',
    'SAFETY_CHECK',
    'BACKEND_CHECK'
]);

/**
 * States whose transitions gate on the event's confidence score.
 */
const CONFIDENCE_GATED_STATES: ReadonlySet<WorkflowState> = new Set<WorkflowState>([
    'COLLECT_REQUEST',
    'SAFETY_CHECK'
]);

export function isWorkflowState(value: string): value is WorkflowState {
    return (WORKFLOW_STATES as readonly string[]).includes(value);
}

export function assertWorkflowState(value: string): WorkflowState {
    if (isWorkflowState(value)) {
        return value;
    }

    throw new Error(`Invalid WorkflowState: ${value}`);
}

export function isTerminal(state: WorkflowState): boolean {
    return TERMINAL_STATES.has(state);
}

export function isAutomatic(state: WorkflowState): boolean {
    return AUTOMATIC_STATES.has(state);
}

export function isGuarded(state: WorkflowState): boolean {
    return GUARDED_STATES.has(state);
}

export function isConfidenceGated(state: WorkflowState): boolean {
    return CONFIDENCE_GATED_STATES.has(state);
}
