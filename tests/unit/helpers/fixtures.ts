import type pg from 'pg';
import type { DbClient, TxClient } from '../../../libs/db/index.js';
import type { DbRole } from '../../../libs/db/roles.js';
import type { Evaluator, EvaluationRequest } from '../../../libs/evaluators/contracts.js';
import { createSession } from '../../../libs/session/session.js';
import type {
    EvaluatorName,
    EvaluatorVerdict,
    TransitionEvent,
    WorkflowSession
} from '../../../libs/workflow/types.js';

export const T0 = new Date('2026-03-01T10:00:00.000Z');

export const PASS: EvaluatorVerdict = { status: 'PASS' };

export function session(overrides: Partial<WorkflowSession> = {}): WorkflowSession {
    return { ...createSession('sess-1', T0, 300_000), turnSequence: 0, ...overrides };
}

export function event(overrides: Partial<TransitionEvent> = {}): TransitionEvent {
    return {
        intent: 'RequestRefill',
        confidence: 0.95,
        extractedEntities: {},
        evaluatorVerdicts: {},
        turnSequence: 1,
        ...overrides
    };
}

/** Identity and drug already settled, both required slots filled. */
export function readyToCollect(overrides: Partial<WorkflowSession> = {}): WorkflowSession {
    return session({
        identityConfirmed: true,
        patientRef: 'P-1001',
        collectedEntities: { drug: 'Lisinopril', qty: '30' },
        confirmedSlots: ['drug'],
        ...overrides
    });
}

/**
 * Evaluator that answers from a fixed verdict (or a function of the request)
 * and records every request it saw.
 */
export class ScriptedEvaluator implements Evaluator {
    readonly requests: EvaluationRequest[] = [];

    constructor(
        private readonly answer: EvaluatorVerdict | ((request: EvaluationRequest, signal: AbortSignal) => Promise<EvaluatorVerdict>)
    ) { }

    async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<EvaluatorVerdict> {
        this.requests.push(request);
        return typeof this.answer === 'function' ? this.answer(request, signal) : this.answer;
    }
}

export type ScriptedRegistry = Record<EvaluatorName, ScriptedEvaluator>;

/** Every evaluator passes unless overridden. Inventory reports stock and an order id. */
export function scriptedRegistry(overrides: Partial<Record<EvaluatorName, EvaluatorVerdict>> = {}): ScriptedRegistry {
    const defaults: Record<EvaluatorName, EvaluatorVerdict> = {
        identity: { status: 'PASS', detail: { kind: 'identity', patientRef: 'P-1001' } },
        disambiguation: {
            status: 'PASS',
            detail: { kind: 'disambiguation', resolution: 'AUTO_CONFIRMED', candidate: 'Lisinopril', score: 0.98 }
        },
        interaction: PASS,
        allergy: PASS,
        controlled: PASS,
        dosage: PASS,
        inventory: {
            status: 'PASS',
            detail: { kind: 'inventory', available: true, priorAuthRequired: false, orderId: 'ORD-77' }
        }
    };
    const pick = (name: EvaluatorName) => new ScriptedEvaluator(overrides[name] ?? defaults[name]);
    return {
        identity: pick('identity'),
        disambiguation: pick('disambiguation'),
        interaction: pick('interaction'),
        allergy: pick('allergy'),
        controlled: pick('controlled'),
        dosage: pick('dosage'),
        inventory: pick('inventory')
    };
}

// --- Database stand-in ---

export interface RecordedQuery {
    readonly role: DbRole | 'tx';
    readonly text: string;
    readonly params: readonly unknown[];
}

export interface ScriptedResult {
    readonly rows: readonly object[];
    readonly rowCount?: number;
}

export type QueryScript = (text: string, params: readonly unknown[]) => ScriptedResult;

/**
 * In-process DbClient: every statement is recorded and answered by the
 * script. Row typing is the caller's responsibility, as with a real driver.
 */
export function scriptedDb(script: QueryScript): { client: DbClient; queries: RecordedQuery[]; transactions: DbRole[] } {
    const queries: RecordedQuery[] = [];
    const transactions: DbRole[] = [];

    function respond<T extends pg.QueryResultRow>(role: DbRole | 'tx', text: string, params: unknown[] = []): pg.QueryResult<T> {
        queries.push({ role, text, params });
        const result = script(text, params);
        const rows = result.rows as T[];
        return { rows, rowCount: result.rowCount ?? rows.length, command: '', oid: 0, fields: [] };
    }

    const client: DbClient = {
        queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(role: DbRole, text: string, params?: unknown[]) =>
            respond<T>(role, text, params),
        transactionAsRole: async <T>(role: DbRole, callback: (tx: TxClient) => Promise<T>): Promise<T> => {
            transactions.push(role);
            const tx: TxClient = {
                query: async <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    respond<R>('tx', text, params)
            };
            return callback(tx);
        }
    };
    return { client, queries, transactions };
}
