import { describe, it } from 'node:test';
import assert from 'node:assert';
import { InputValidationError } from '../../libs/errors/workflowErrors.js';
import { decodeSession, encodeSession } from '../../libs/session/codec.js';
import { acknowledgementToken, auditToken, createSession, isExpired, turnToken } from '../../libs/session/session.js';
import { T0, readyToCollect } from './helpers/fixtures.js';

describe('Session codec', () => {
    it('round-trips a session with a recorded turn', () => {
        const original = readyToCollect({
            currentState: 'ESCALATE_HANDOFF',
            retryCounts: { 'slot:qty': 1 },
            confidenceHistory: [0.91, 0.88],
            transcript: ['refill my lisinopril'],
            escalationId: 'esc-1',
            version: 4,
            lastTurn: {
                sequence: 0,
                response: { sessionId: 'sess-1', nextState: 'ESCALATE_HANDOFF', escalationId: 'esc-1' },
                auditEntries: [{
                    token: 'sess-1:0:0',
                    sessionId: 'sess-1',
                    turnSequence: 0,
                    fromState: 'SAFETY_CHECK',
                    toState: 'ESCALATE_HANDOFF',
                    trigger: { kind: 'BREAKER', reasonCode: 'ALLERGY_MATCH', rule: 4 },
                    actor: 'circuit-breaker',
                    timestamp: T0.toISOString()
                }]
            }
        });

        assert.deepStrictEqual(decodeSession(encodeSession(original)), original);
    });

    it('accepts an already parsed payload', () => {
        const original = createSession('sess-2', T0, 1000);
        assert.deepStrictEqual(decodeSession(JSON.parse(encodeSession(original))), original);
    });

    it('reads a stored session written before active medications were kept', () => {
        const { activeMedications: _dropped, ...older } = createSession('sess-4', T0, 1000);
        assert.deepStrictEqual(decodeSession(JSON.stringify(older)).activeMedications, []);
    });

    it('rejects a stored session with an unknown state', () => {
        const corrupt = { ...createSession('sess-3', T0, 1000), currentState: 'CANCELLED' };
        assert.throws(
            () => decodeSession(JSON.stringify(corrupt)),
            (err: unknown) => err instanceof InputValidationError
                && err.context === 'StoredSession'
                && err.issues.some(issue => issue.path === 'currentState')
        );
    });
});

describe('Session factory', () => {
    it('starts before the first turn', () => {
        const s = createSession('sess-4', T0, 300_000);
        assert.strictEqual(s.currentState, 'COLLECT_REQUEST');
        assert.strictEqual(s.turnSequence, -1);
        assert.strictEqual(s.version, 0);
        assert.strictEqual(s.ttlDeadline, '2026-03-01T10:05:00.000Z');
    });

    it('expires at the deadline', () => {
        const s = createSession('sess-5', T0, 1000);
        assert.strictEqual(isExpired(s, new Date(T0.getTime() + 999)), false);
        assert.strictEqual(isExpired(s, new Date(T0.getTime() + 1000)), true);
    });

    it('derives idempotency tokens', () => {
        assert.strictEqual(turnToken('sess-1', 3), 'sess-1:3');
        assert.strictEqual(auditToken('sess-1', 3, 1), 'sess-1:3:1');
        assert.strictEqual(acknowledgementToken('sess-1', 'esc-1'), 'sess-1:ack:esc-1');
    });
});
