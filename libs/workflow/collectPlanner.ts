import type { EngineConfig } from '../bootstrap/config/workflow-config.js';
import { Prompts } from './prompts.js';
import { isValidSlotValue, normalizeEntities } from './slots.js';
import type { Directive, EvaluatorName, EvaluatorVerdict, TransitionEvent, WorkflowSession } from './types.js';

/**
 * COLLECT_REQUEST planning.
 *
 * Decides what the collection step needs next: a clarification, more
 * evaluator verdicts, an escalation, or nothing (ready for SAFETY_CHECK).
 * Shared by the transition engine and by the retry-budget breaker rule, which
 * must know which clarification a turn would ask for before it is asked.
 */

export const CONFIDENCE_RETRY_KEY = 'confidence:COLLECT_REQUEST';
export const slotRetryKey = (slot: string): string => `slot:${slot}`;

const MAX_CANDIDATES = 3;

export type CollectPlan =
    | { readonly kind: 'CLARIFY'; readonly retryKey: string; readonly directives: readonly Directive[] }
    | { readonly kind: 'INVOKE'; readonly evaluators: readonly EvaluatorName[] }
    | { readonly kind: 'BLOCKED'; readonly evaluator: EvaluatorName; readonly verdict: EvaluatorVerdict }
    | { readonly kind: 'COMPLETE'; readonly directives: readonly Directive[] };

export interface EntityMerge {
    readonly entities: Readonly<Record<string, string>>;
    readonly drugConfirmed: boolean;
    readonly candidates: readonly string[] | null;
    /** Candidates are waiting and this turn neither picked one nor named a new drug. */
    readonly selectionPending: boolean;
    readonly directives: readonly Directive[];
}

function pickCandidate(
    candidates: readonly string[],
    selection: string | undefined,
    drug: string | undefined
): string | undefined {
    if (selection !== undefined && /^\d+$/.test(selection)) {
        const index = Number(selection) - 1;
        if (index >= 0 && index < candidates.length) return candidates[index];
    }
    for (const named of [selection, drug]) {
        if (named === undefined) continue;
        const match = candidates.find(c => c.toLowerCase() === named.toLowerCase());
        if (match !== undefined) return match;
    }
    return undefined;
}

/**
 * Folds this turn's entities into the session's collected slots.
 * Invalid values are ignored; a changed drug loses its confirmation.
 */
export function mergeTurnEntities(session: WorkflowSession, event: TransitionEvent): EntityMerge {
    const { slots, selection } = normalizeEntities(event.extractedEntities);
    const entities: Record<string, string> = { ...session.collectedEntities };
    const directives: Directive[] = [];
    let drugConfirmed = session.confirmedSlots.includes('drug');
    let candidates = session.pendingCandidates;
    let selectionPending = false;

    if (candidates !== null) {
        const picked = pickCandidate(candidates, selection, slots['drug']);
        if (picked !== undefined) {
            entities['drug'] = picked;
            drugConfirmed = true;
            candidates = null;
            delete slots['drug'];
            directives.push(
                { type: 'PERSIST_ENTITY', slot: 'drug', value: picked },
                { type: 'CONFIRM_SLOT', slot: 'drug' },
                { type: 'SET_CANDIDATES', candidates: null }
            );
        } else if (isValidSlotValue('drug', slots['drug'])) {
            candidates = null;
            directives.push({ type: 'SET_CANDIDATES', candidates: null });
        } else {
            selectionPending = true;
        }
    }

    for (const [slot, value] of Object.entries(slots)) {
        if (!isValidSlotValue(slot, value) || entities[slot] === value) continue;
        entities[slot] = value;
        if (slot === 'drug') drugConfirmed = false;
        directives.push({ type: 'PERSIST_ENTITY', slot, value });
    }

    return { entities, drugConfirmed, candidates, selectionPending, directives };
}

function retryResets(session: WorkflowSession, merge: EntityMerge, exceptKey?: string): Directive[] {
    const resets: Directive[] = [];
    for (const [key, count] of Object.entries(session.retryCounts)) {
        if (count === 0 || key === exceptKey) continue;
        if (key === CONFIDENCE_RETRY_KEY) {
            resets.push({ type: 'RESET_RETRY', retryKey: key });
            continue;
        }
        const slot = key.startsWith('slot:') ? key.slice('slot:'.length) : undefined;
        if (slot === undefined || !isValidSlotValue(slot, merge.entities[slot])) continue;
        if (slot === 'drug' && !merge.drugConfirmed && merge.candidates !== null) continue;
        resets.push({ type: 'RESET_RETRY', retryKey: key });
    }
    return resets;
}

function clarify(retryKey: string, prompt: string, directives: readonly Directive[]): CollectPlan {
    return {
        kind: 'CLARIFY',
        retryKey,
        directives: [
            ...directives,
            { type: 'CLARIFY', retryKey, prompt },
            { type: 'EMIT_PROMPT', prompt }
        ]
    };
}

function identityDirectives(session: WorkflowSession, merge: EntityMerge, verdict: EvaluatorVerdict | undefined): Directive[] {
    if (session.identityConfirmed || verdict?.status !== 'PASS') return [];
    if (verdict.detail?.kind === 'identity') {
        const { patientRef, activeMedications } = verdict.detail;
        return [activeMedications === undefined
            ? { type: 'CONFIRM_IDENTITY', patientRef }
            : { type: 'CONFIRM_IDENTITY', patientRef, activeMedications }];
    }
    return [{ type: 'CONFIRM_IDENTITY', patientRef: merge.entities['patient_id'] ?? null }];
}

export function planCollect(session: WorkflowSession, event: TransitionEvent, config: EngineConfig): CollectPlan {
    const confidence = event.confidence ?? 0;
    if (confidence < config.confidence.clarifyBelow) {
        return clarify(CONFIDENCE_RETRY_KEY, Prompts.rephrase(), []);
    }

    const merge = mergeTurnEntities(session, event);

    if (merge.selectionPending && merge.candidates !== null) {
        const key = slotRetryKey('drug');
        return clarify(key, Prompts.selectCandidate(merge.candidates), [
            ...merge.directives,
            ...retryResets(session, merge, key)
        ]);
    }

    const missing = config.requiredSlots.find(slot => !isValidSlotValue(slot, merge.entities[slot]));
    if (missing !== undefined) {
        const key = slotRetryKey(missing);
        return clarify(key, Prompts.missingSlot(missing), [
            ...merge.directives,
            ...retryResets(session, merge, key)
        ]);
    }

    const verdicts = event.evaluatorVerdicts;
    const needed: EvaluatorName[] = [];
    if (!session.identityConfirmed && verdicts.identity === undefined) needed.push('identity');
    if (!merge.drugConfirmed && verdicts.disambiguation === undefined) needed.push('disambiguation');
    if (needed.length > 0) {
        return { kind: 'INVOKE', evaluators: needed };
    }

    const identity = verdicts.identity;
    const disambiguation = verdicts.disambiguation;
    const drugDirectives: Directive[] = [];

    if (!merge.drugConfirmed && disambiguation?.status === 'PASS') {
        const detail = disambiguation.detail;
        if (detail?.kind === 'disambiguation' && detail.resolution === 'NEEDS_SELECTION') {
            const key = slotRetryKey('drug');
            return clarify(key, Prompts.selectCandidate(detail.candidates.slice(0, MAX_CANDIDATES)), [
                ...merge.directives,
                { type: 'SET_CANDIDATES', candidates: detail.candidates.slice(0, MAX_CANDIDATES) },
                ...identityDirectives(session, merge, identity),
                ...retryResets(session, merge, key)
            ]);
        }
        if (detail?.kind === 'disambiguation' && detail.resolution === 'AUTO_CONFIRMED'
            && detail.candidate !== merge.entities['drug']) {
            drugDirectives.push({ type: 'PERSIST_ENTITY', slot: 'drug', value: detail.candidate });
        }
        drugDirectives.push({ type: 'CONFIRM_SLOT', slot: 'drug' });
    }

    if (identity !== undefined && identity.status !== 'PASS') {
        return { kind: 'BLOCKED', evaluator: 'identity', verdict: identity };
    }
    if (!merge.drugConfirmed && disambiguation !== undefined) {
        const detail = disambiguation.detail;
        const unresolved = detail?.kind === 'disambiguation' && detail.resolution === 'UNRESOLVED';
        if (disambiguation.status !== 'PASS' || unresolved) {
            return { kind: 'BLOCKED', evaluator: 'disambiguation', verdict: disambiguation };
        }
    }

    return {
        kind: 'COMPLETE',
        directives: [
            ...merge.directives,
            ...drugDirectives,
            ...identityDirectives(session, merge, identity),
            ...Object.entries(session.retryCounts)
                .filter(([, count]) => count > 0)
                .map(([retryKey]): Directive => ({ type: 'RESET_RETRY', retryKey }))
        ]
    };
}
