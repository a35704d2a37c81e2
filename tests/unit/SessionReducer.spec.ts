import { describe, it } from 'node:test';
import assert from 'node:assert';
import { appendBounded, applyDirectives } from '../../libs/workflow/sessionReducer.js';
import { session } from './helpers/fixtures.js';

describe('applyDirectives', () => {
    it('counts clarifications up to the retry budget', () => {
        const s = session({ retryCounts: { 'slot:qty': 2 } });
        const clarify = { type: 'CLARIFY', retryKey: 'slot:qty', prompt: 'How many?' } as const;

        const once = applyDirectives(s, 'COLLECT_REQUEST', [clarify], 3);
        assert.deepStrictEqual(once.session.retryCounts, { 'slot:qty': 3 });

        const twice = applyDirectives(once.session, 'COLLECT_REQUEST', [clarify], 3);
        assert.deepStrictEqual(twice.session.retryCounts, { 'slot:qty': 3 });
    });

    it('removes a reset retry key', () => {
        const s = session({ retryCounts: { 'slot:qty': 2, 'slot:drug': 1 } });
        const { session: next } = applyDirectives(s, 'COLLECT_REQUEST', [{ type: 'RESET_RETRY', retryKey: 'slot:qty' }], 3);
        assert.deepStrictEqual(next.retryCounts, { 'slot:drug': 1 });
    });

    it('un-confirms a slot whose value is replaced', () => {
        const s = session({ collectedEntities: { drug: 'Lisinopril' }, confirmedSlots: ['drug'] });
        const { session: next } = applyDirectives(s, 'COLLECT_REQUEST', [
            { type: 'PERSIST_ENTITY', slot: 'drug', value: 'Metformin' }
        ], 3);
        assert.deepStrictEqual(next.collectedEntities, { drug: 'Metformin' });
        assert.deepStrictEqual(next.confirmedSlots, []);
    });

    it('confirms identity and keeps a known patient reference when none is given', () => {
        const s = session({ patientRef: 'P-1001' });
        const { session: next } = applyDirectives(s, 'COLLECT_REQUEST', [{ type: 'CONFIRM_IDENTITY', patientRef: null }], 3);
        assert.strictEqual(next.identityConfirmed, true);
        assert.strictEqual(next.patientRef, 'P-1001');
    });

    it('records the active medications reported with the identity', () => {
        const { session: next } = applyDirectives(session(), 'COLLECT_REQUEST', [
            { type: 'CONFIRM_IDENTITY', patientRef: 'P-1001', activeMedications: ['Metformin'] }
        ], 3);
        assert.deepStrictEqual(next.activeMedications, ['Metformin']);

        const { session: kept } = applyDirectives(next, 'COLLECT_REQUEST', [{ type: 'CONFIRM_IDENTITY', patientRef: null }], 3);
        assert.deepStrictEqual(kept.activeMedications, ['Metformin']);
    });

    it('leaves the input session untouched', () => {
        const s = session();
        const { session: next } = applyDirectives(s, 'SAFETY_CHECK', [
            { type: 'PERSIST_ENTITY', slot: 'qty', value: '30' },
            { type: 'SET_CANDIDATES', candidates: ['A', 'B'] }
        ], 3);
        assert.strictEqual(s.currentState, 'COLLECT_REQUEST');
        assert.deepStrictEqual(s.collectedEntities, {});
        assert.strictEqual(next.currentState, 'SAFETY_CHECK');
        assert.deepStrictEqual(next.pendingCandidates, ['A', 'B']);
    });

    it('returns the side effects the controller carries out', () => {
        const { session: next, effects } = applyDirectives(session({ currentState: 'BACKEND_CHECK' }), 'ESCALATE_HANDOFF', [
            { type: 'INVOKE_EVALUATOR', evaluator: 'inventory' },
            { type: 'RECORD_ORDER', orderId: 'ORD-1' },
            { type: 'REQUEST_ESCALATION', reasonCode: 'BACKEND_UNAVAILABLE', trip: { reasonCode: 'BACKEND_UNAVAILABLE', rule: 6 } },
            {
                type: 'EMIT_AUDIT',
                fromState: 'BACKEND_CHECK',
                toState: 'ESCALATE_HANDOFF',
                trigger: { kind: 'BREAKER', reasonCode: 'BACKEND_UNAVAILABLE', rule: 6 },
                actor: 'circuit-breaker'
            },
            { type: 'EMIT_PROMPT', prompt: 'first' },
            { type: 'EMIT_PROMPT', prompt: 'last' }
        ], 3);

        assert.strictEqual(next.orderId, 'ORD-1');
        assert.deepStrictEqual(effects.invoke, ['inventory']);
        assert.deepStrictEqual(effects.escalation, { reasonCode: 'BACKEND_UNAVAILABLE', trip: { reasonCode: 'BACKEND_UNAVAILABLE', rule: 6 } });
        assert.strictEqual(effects.audits.length, 1);
        assert.strictEqual(effects.prompt, 'last');
    });
});

describe('appendBounded', () => {
    it('keeps the newest entries', () => {
        assert.deepStrictEqual(appendBounded([1, 2, 3], 4, 3), [2, 3, 4]);
        assert.deepStrictEqual(appendBounded([], 'a', 5), ['a']);
    });
});
