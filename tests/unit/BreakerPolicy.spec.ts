import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_WORKFLOW_CONFIG } from '../../libs/bootstrap/config/workflow-config.js';
import { BREAKER_RULES, evaluateBreakers } from '../../libs/safety/breakerPolicy.js';
import { PASS, event, readyToCollect, session } from './helpers/fixtures.js';

const config = DEFAULT_WORKFLOW_CONFIG;
const atSafety = readyToCollect({ currentState: 'SAFETY_CHECK' });

describe('Circuit breaker policy', () => {
    it('evaluates rules in a fixed order', () => {
        assert.deepStrictEqual(BREAKER_RULES.map(rule => rule.reasonCode), [
            'LOW_CONFIDENCE',
            'IDENTITY_VERIFICATION_FAILED',
            'MAJOR_DRUG_INTERACTION',
            'ALLERGY_MATCH',
            'CONTROLLED_SUBSTANCE',
            'BACKEND_UNAVAILABLE',
            'MAX_RETRIES_EXCEEDED',
            'EVALUATOR_ESCALATION'
        ]);
    });

    it('does not apply outside guarded states', () => {
        for (const state of ['PA_APPROVAL_NEEDED', 'ESCALATE_HANDOFF', 'DISPENSED'] as const) {
            assert.strictEqual(evaluateBreakers(readyToCollect({ currentState: state }), event({ confidence: 0 }), config), null);
        }
    });

    it('lets low confidence win over a failed verdict', () => {
        const trip = evaluateBreakers(session(), event({
            confidence: 0.5,
            evaluatorVerdicts: { identity: { status: 'FAIL', reasonCode: 'IDENTITY_NOT_FOUND' } }
        }), config);
        assert.deepStrictEqual(trip, { reasonCode: 'LOW_CONFIDENCE', rule: 1 });
        assert.ok(Object.isFrozen(trip));
    });

    it('does not trip at exactly the escalation threshold', () => {
        assert.strictEqual(evaluateBreakers(session(), event({ confidence: 0.7 }), config), null);
    });

    it('reports the allergy before the controlled substance', () => {
        const trip = evaluateBreakers(atSafety, event({
            evaluatorVerdicts: {
                interaction: PASS,
                allergy: { status: 'FAIL', reasonCode: 'ALLERGY_MATCH' },
                controlled: { status: 'REQUIRES_ESCALATION', reasonCode: 'CONTROLLED_SUBSTANCE' }
            }
        }), config);
        assert.deepStrictEqual(trip, { reasonCode: 'ALLERGY_MATCH', rule: 4, evaluator: 'allergy', verdictReason: 'ALLERGY_MATCH' });
    });

    it('trips on a controlled substance', () => {
        const trip = evaluateBreakers(atSafety, event({
            evaluatorVerdicts: { controlled: { status: 'REQUIRES_ESCALATION', reasonCode: 'CONTROLLED_SUBSTANCE' } }
        }), config);
        assert.deepStrictEqual(trip, { reasonCode: 'CONTROLLED_SUBSTANCE', rule: 5, evaluator: 'controlled', verdictReason: 'CONTROLLED_SUBSTANCE' });
    });

    it('reports an unavailable evaluator before other escalations', () => {
        const trip = evaluateBreakers(atSafety, event({
            evaluatorVerdicts: {
                allergy: { status: 'UNAVAILABLE', reasonCode: 'TIMEOUT' },
                dosage: { status: 'FAIL', reasonCode: 'DOSE_OUT_OF_RANGE' }
            }
        }), config);
        assert.deepStrictEqual(trip, { reasonCode: 'BACKEND_UNAVAILABLE', rule: 6, evaluator: 'allergy', verdictReason: 'TIMEOUT' });
    });

    it('sends any other blocking verdict to evaluator escalation', () => {
        const trip = evaluateBreakers(atSafety, event({
            evaluatorVerdicts: { interaction: { status: 'FAIL', reasonCode: 'MODERATE_DRUG_INTERACTION' } }
        }), config);
        assert.deepStrictEqual(trip, {
            reasonCode: 'EVALUATOR_ESCALATION',
            rule: 8,
            evaluator: 'interaction',
            verdictReason: 'MODERATE_DRUG_INTERACTION'
        });
    });

    describe('retry budget', () => {
        const exhausted = session({ retryCounts: { 'confidence:COLLECT_REQUEST': 3 } });

        it('trips when another clarification would exceed the budget', () => {
            assert.deepStrictEqual(evaluateBreakers(exhausted, event({ confidence: 0.8 }), config), {
                reasonCode: 'MAX_RETRIES_EXCEEDED',
                rule: 7
            });
        });

        it('allows the last clarification within the budget', () => {
            const s = session({ retryCounts: { 'confidence:COLLECT_REQUEST': 2 } });
            assert.strictEqual(evaluateBreakers(s, event({ confidence: 0.8 }), config), null);
        });

        it('ignores non-collecting intents', () => {
            assert.strictEqual(evaluateBreakers(exhausted, event({ intent: 'StatusInquiry', confidence: 0.8 }), config), null);
        });

        it('ignores a spent budget the turn does not draw on', () => {
            assert.strictEqual(evaluateBreakers(exhausted, event({ confidence: 0.9, extractedEntities: { drug: 'Lisinopril' } }), config), null);
        });
    });
});
