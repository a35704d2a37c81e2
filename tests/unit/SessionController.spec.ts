import { describe, it } from 'node:test';
import assert from 'node:assert';
import { verifyAuditChain } from '../../libs/audit/integrity.js';
import { StaleSessionError } from '../../libs/errors/workflowErrors.js';
import { T0 } from './helpers/fixtures.js';
import { createHarness, turn } from './helpers/harness.js';

const DISPENSED_PROMPT = 'Your refill has been placed. Order reference: ORD-77.';

describe('SessionController.handleTurn', () => {
    it('rejects a malformed payload without touching the store', async () => {
        const { controller, store } = createHarness();

        const output = await controller.handleTurn({ sessionId: 'sess-1', intent: 'RequestRefill' });

        assert.deepStrictEqual(output, { sessionId: 'sess-1', nextState: 'COLLECT_REQUEST', error: 'ValidationFailed' });
        assert.strictEqual(await store.get('sess-1'), null);
    });

    it('rejects an intent the state does not accept', async () => {
        const { controller, store } = createHarness();

        const output = await controller.handleTurn(turn(0, { intent: 'CancelRequest' }));

        assert.deepStrictEqual(output, { sessionId: 'sess-1', nextState: 'COLLECT_REQUEST', error: 'InvalidTransition' });
        assert.strictEqual(await store.get('sess-1'), null);
    });

    it('creates the session on its first turn and commits version 1', async () => {
        const { controller, store, clock } = createHarness();

        const output = await controller.handleTurn(turn(0));
        const stored = await store.get('sess-1');

        assert.deepStrictEqual(output, {
            sessionId: 'sess-1',
            nextState: 'DISPENSED',
            userPrompt: DISPENSED_PROMPT,
            orderId: 'ORD-77'
        });
        assert.strictEqual(stored?.version, 1);
        assert.strictEqual(stored?.turnSequence, 0);
        assert.strictEqual(stored?.updatedAt, clock.now.toISOString());
        assert.strictEqual(stored?.ttlDeadline, '2026-03-01T10:05:00.000Z');
        assert.deepStrictEqual(stored?.confidenceHistory, [0.97]);
    });

    it('answers a repeated turn with the recorded response', async () => {
        const { controller, auditLog, registry } = createHarness();

        const first = await controller.handleTurn(turn(0));
        const again = await controller.handleTurn(turn(0, { rawUtterance: 'something else entirely' }));

        assert.deepStrictEqual(again, first);
        assert.strictEqual(registry.inventory.requests.length, 1);
        assert.strictEqual((await auditLog.listBySession('sess-1')).length, 3);
    });

    it('rejects a turn older than the committed one', async () => {
        const { controller } = createHarness();
        await controller.handleTurn(turn(0, { confidence: 0.8 }));
        await controller.handleTurn(turn(1, { confidence: 0.8 }));

        const output = await controller.handleTurn(turn(0, { confidence: 0.8 }));

        assert.deepStrictEqual(output, { sessionId: 'sess-1', nextState: 'COLLECT_REQUEST', error: 'StaleSession' });
    });

    it('reports StaleSession when another writer committed first', async () => {
        const { controller } = createHarness({
            wrapStore: store => ({
                get: id => store.get(id),
                put: (session, ttl) => store.put(session, ttl),
                delete: id => store.delete(id),
                compareAndPut: async () => false
            })
        });

        const output = await controller.handleTurn(turn(0));

        assert.strictEqual(output.error, 'StaleSession');
        assert.strictEqual(output.nextState, 'COLLECT_REQUEST');
    });

    it('rolls the session back when the audit append fails', async () => {
        const { controller, auditLog, store } = createHarness({
            wrapAuditLog: log => ({
                append: async () => { throw new Error('connection reset'); },
                listBySession: id => log.listBySession(id)
            })
        });

        const output = await controller.handleTurn(turn(0));
        const stored = await store.get('sess-1');

        assert.deepStrictEqual(output, {
            sessionId: 'sess-1',
            nextState: 'COLLECT_REQUEST',
            userPrompt: 'An internal system error occurred. Please retry; reference: AuditLog.append',
            error: 'InternalError'
        });
        assert.strictEqual(stored?.currentState, 'COLLECT_REQUEST');
        assert.strictEqual(stored?.turnSequence, -1);
        assert.strictEqual(stored?.version, 2);
        assert.deepStrictEqual(await auditLog.listBySession('sess-1'), []);
    });

    it('commits a rolled back turn when the client retries it', async () => {
        let failures = 1;
        const { controller, auditLog, store, registry } = createHarness({
            wrapAuditLog: log => ({
                append: async entry => {
                    if (failures > 0) {
                        failures -= 1;
                        throw new Error('connection reset');
                    }
                    return log.append(entry);
                },
                listBySession: id => log.listBySession(id)
            })
        });

        const failed = await controller.handleTurn(turn(0));
        assert.strictEqual(failed.error, 'InternalError');

        const retried = await controller.handleTurn(turn(0));
        assert.strictEqual(retried.nextState, 'DISPENSED');
        assert.strictEqual(retried.orderId, 'ORD-77');
        assert.strictEqual(registry.inventory.requests.length, 2);
        assert.strictEqual((await store.get('sess-1'))?.version, 3);

        const records = await auditLog.listBySession('sess-1');
        assert.deepStrictEqual(records.map(r => r.idempotencyToken), ['sess-1:0:0', 'sess-1:0:1', 'sess-1:0:2']);
        assert.strictEqual(verifyAuditChain(records).valid, true);
    });

    it('reports the committed state when the rollback also fails', async () => {
        let writes = 0;
        const { controller, store } = createHarness({
            wrapStore: inner => ({
                get: id => inner.get(id),
                put: (session, ttl) => inner.put(session, ttl),
                delete: id => inner.delete(id),
                compareAndPut: async (id, expected, session, ttl) => {
                    writes += 1;
                    return writes === 1 ? inner.compareAndPut(id, expected, session, ttl) : false;
                }
            }),
            wrapAuditLog: log => ({
                append: async () => { throw new Error('connection reset'); },
                listBySession: id => log.listBySession(id)
            })
        });

        const output = await controller.handleTurn(turn(0));

        assert.deepStrictEqual(output, {
            sessionId: 'sess-1',
            nextState: 'DISPENSED',
            userPrompt: 'An internal system error occurred. Please retry; reference: AuditLog.append',
            error: 'InternalError'
        });
        assert.strictEqual((await store.get('sess-1'))?.currentState, 'DISPENSED');
    });

    it('leaves no escalation case behind when the session write is lost', async () => {
        let writes = 0;
        const harness = createHarness({
            verdicts: { allergy: { status: 'FAIL', reasonCode: 'ALLERGY_MATCH', detail: { kind: 'allergy', severity: 'major' } } },
            wrapStore: inner => ({
                get: id => inner.get(id),
                put: (session, ttl) => inner.put(session, ttl),
                delete: id => inner.delete(id),
                compareAndPut: async (id, expected, session, ttl) => {
                    writes += 1;
                    return writes === 1 ? false : inner.compareAndPut(id, expected, session, ttl);
                }
            })
        });

        const lost = await harness.controller.handleTurn(turn(0));
        assert.deepStrictEqual(lost, { sessionId: 'sess-1', nextState: 'COLLECT_REQUEST', error: 'StaleSession' });
        assert.deepStrictEqual(await harness.escalations.listUndelivered(10), []);
        assert.strictEqual(await harness.coordinator.redeliverPending(), 0);
        assert.deepStrictEqual(harness.inbox.messages, []);

        const retried = await harness.controller.handleTurn(turn(0));
        assert.strictEqual(retried.nextState, 'ESCALATE_HANDOFF');
        assert.strictEqual(retried.escalationId, '00000000-0000-4000-8000-000000000002');
        assert.strictEqual(await harness.escalations.findById('00000000-0000-4000-8000-000000000001'), null);
        assert.strictEqual(harness.inbox.messages.length, 1);

        const acknowledged = await harness.coordinator.acknowledge('00000000-0000-4000-8000-000000000002', harness.controller);
        assert.strictEqual(acknowledged.status, 'ACKNOWLEDGED');
        assert.strictEqual((await harness.store.get('sess-1'))?.currentState, 'ESCALATION_COMPLETE');
    });

    it('stores the escalation case on retry when storing it failed after commit', async () => {
        let failures = 1;
        const harness = createHarness({
            verdicts: { allergy: { status: 'FAIL', reasonCode: 'ALLERGY_MATCH', detail: { kind: 'allergy', severity: 'major' } } },
            wrapEscalations: repository => ({
                createIfAbsent: async escalation => {
                    if (failures > 0) {
                        failures -= 1;
                        throw new Error('connection reset');
                    }
                    return repository.createIfAbsent(escalation);
                },
                findById: id => repository.findById(id),
                markNotified: (id, at) => repository.markNotified(id, at),
                markAcknowledged: (id, at) => repository.markAcknowledged(id, at),
                markResolved: (id, resolution, at) => repository.markResolved(id, resolution, at),
                listUndelivered: limit => repository.listUndelivered(limit)
            })
        });

        const failed = await harness.controller.handleTurn(turn(0));
        assert.deepStrictEqual(failed, {
            sessionId: 'sess-1',
            nextState: 'ESCALATE_HANDOFF',
            userPrompt: 'An internal system error occurred. Please retry; reference: EscalationRepository.createIfAbsent',
            error: 'InternalError'
        });
        assert.strictEqual(await harness.escalations.findById('00000000-0000-4000-8000-000000000001'), null);

        const replayed = await harness.controller.handleTurn(turn(0));
        assert.strictEqual(replayed.escalationId, '00000000-0000-4000-8000-000000000001');
        const stored = await harness.escalations.findById('00000000-0000-4000-8000-000000000001');
        assert.strictEqual(stored?.status, 'PENDING');
        assert.strictEqual(stored?.notifiedAt, T0.toISOString());
        assert.strictEqual(harness.inbox.messages.length, 1);
    });

    it('abandons a turn whose deadline has passed', async () => {
        const { controller, store } = createHarness();
        const aborted = new AbortController();
        aborted.abort();

        const output = await controller.handleTurn(turn(0), { signal: aborted.signal });

        assert.strictEqual(output.error, 'StaleSession');
        assert.strictEqual(await store.get('sess-1'), null);
    });

    it('bounds the transcript and confidence history', async () => {
        const { controller, store } = createHarness();
        for (let seq = 0; seq < 7; seq++) {
            await controller.handleTurn(turn(seq, { rawUtterance: `utterance ${seq}`, intent: 'StatusInquiry' }));
        }
        const stored = await store.get('sess-1');
        assert.deepStrictEqual(stored?.transcript, ['utterance 2', 'utterance 3', 'utterance 4', 'utterance 5', 'utterance 6']);
        assert.strictEqual(stored?.confidenceHistory.length, 7);
        assert.strictEqual(stored?.currentState, 'COLLECT_REQUEST');
    });
});

describe('SessionController.completeHandoff', () => {
    it('reports an expired session', async () => {
        const { controller } = createHarness();
        assert.strictEqual(await controller.completeHandoff('sess-missing', 'esc-1'), 'SESSION_EXPIRED');
    });

    it('refuses an escalation that is not the session\'s handoff', async () => {
        const { controller } = createHarness();
        await controller.handleTurn(turn(0, { confidence: 0.4 }));

        await assert.rejects(controller.completeHandoff('sess-1', 'esc-other'), StaleSessionError);
    });

    it('moves the session to ESCALATION_COMPLETE once', async () => {
        const { controller, store, auditLog } = createHarness();
        const output = await controller.handleTurn(turn(0, { confidence: 0.4 }));
        const escalationId = output.escalationId ?? '';

        assert.strictEqual(await controller.completeHandoff('sess-1', escalationId), 'COMPLETED');
        assert.strictEqual(await controller.completeHandoff('sess-1', escalationId), 'ALREADY_COMPLETE');

        const stored = await store.get('sess-1');
        assert.strictEqual(stored?.currentState, 'ESCALATION_COMPLETE');
        assert.strictEqual(stored?.version, 2);

        const records = await auditLog.listBySession('sess-1');
        assert.deepStrictEqual(records.map(r => `${r.fromState}->${r.toState}`), [
            'COLLECT_REQUEST->ESCALATE_HANDOFF',
            'ESCALATE_HANDOFF->ESCALATION_COMPLETE'
        ]);
        assert.strictEqual(records[1]?.idempotencyToken, `sess-1:ack:${escalationId}`);
    });
});
