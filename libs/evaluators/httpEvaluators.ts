import { z } from 'zod';
import type { DisambiguationThresholds } from '../bootstrap/config/workflow-config.js';
import { DisambiguationEvaluator, type DisambiguationResolver } from '../safety/disambiguation.js';
import { validate } from '../validation/zod-middleware.js';
import {
    VERDICT_REASON_CODES,
    type DisambiguationCandidate,
    type EvaluatorName,
    type EvaluatorVerdict
} from '../workflow/types.js';
import type { EvaluationRequest, Evaluator, EvaluatorRegistry } from './contracts.js';

/**
 * HTTP adapters for remotely hosted evaluators and the drug index.
 *
 * Requests carry the turn's idempotency key so a retried turn does not
 * repeat a side effect on the remote end (inventory reservation in
 * particular). Responses are validated before they are trusted.
 */

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const SeveritySchema = z.enum(['none', 'minor', 'moderate', 'major']);

const VerdictDetailSchema = z.union([
    z.object({ kind: z.literal('identity'), patientRef: z.string().min(1), activeMedications: z.array(z.string().min(1)).optional() }),
    z.object({ kind: z.literal('disambiguation'), resolution: z.literal('AUTO_CONFIRMED'), candidate: z.string(), score: z.number() }),
    z.object({ kind: z.literal('disambiguation'), resolution: z.literal('NEEDS_SELECTION'), candidates: z.array(z.string()) }),
    z.object({ kind: z.literal('disambiguation'), resolution: z.literal('UNRESOLVED'), topScore: z.number().nullable() }),
    z.object({ kind: z.literal('interaction'), severity: SeveritySchema, description: z.string().optional() }),
    z.object({ kind: z.literal('allergy'), severity: SeveritySchema, substance: z.string().optional() }),
    z.object({ kind: z.literal('controlled'), schedule: z.enum(['I', 'II', 'III', 'IV', 'V']).nullable() }),
    z.object({ kind: z.literal('dosage'), requested: z.string(), minDose: z.number().optional(), maxDose: z.number().optional() }),
    z.object({ kind: z.literal('inventory'), available: z.boolean(), priorAuthRequired: z.boolean(), orderId: z.string().optional() })
]);

const ReasonSchema = z.enum(VERDICT_REASON_CODES);

export const VerdictResponseSchema: z.ZodType<EvaluatorVerdict, z.ZodTypeDef, unknown> = z.union([
    z.object({
        status: z.literal('PASS'),
        reasonCode: ReasonSchema.optional(),
        detail: VerdictDetailSchema.optional()
    }),
    z.object({
        status: z.enum(['FAIL', 'REQUIRES_ESCALATION', 'UNAVAILABLE']),
        reasonCode: ReasonSchema,
        detail: VerdictDetailSchema.optional()
    })
]);

const CandidatesResponseSchema = z.object({
    candidates: z.array(z.object({ candidate: z.string().min(1), score: z.number().min(0).max(1) }))
});

export class RemoteEvaluatorError extends Error {
    constructor(public readonly evaluator: string, public readonly status: number) {
        super(`Remote evaluator ${evaluator} answered HTTP ${status}`);
        this.name = 'RemoteEvaluatorError';
    }
}

async function postJson(
    fetchImpl: FetchLike,
    url: string,
    body: unknown,
    idempotencyKey: string | undefined,
    signal: AbortSignal,
    label: string
): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (idempotencyKey !== undefined) {
        headers['Idempotency-Key'] = idempotencyKey;
    }
    const res = await fetchImpl(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal
    });
    if (!res.ok) {
        throw new RemoteEvaluatorError(label, res.status);
    }
    const payload: unknown = await res.json();
    return payload;
}

export class HttpEvaluator implements Evaluator {
    constructor(
        private readonly name: EvaluatorName,
        private readonly baseUrl: string,
        private readonly fetchImpl: FetchLike = fetch
    ) { }

    async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<EvaluatorVerdict> {
        const payload = await postJson(
            this.fetchImpl,
            `${this.baseUrl}/v1/evaluate/${this.name}`,
            request,
            request.idempotencyKey,
            signal,
            this.name
        );
        return validate(VerdictResponseSchema, payload, `EvaluatorResponse:${this.name}`);
    }
}

export class HttpDisambiguationResolver implements DisambiguationResolver {
    constructor(
        private readonly baseUrl: string,
        private readonly fetchImpl: FetchLike = fetch
    ) { }

    async resolve(drugText: string, signal: AbortSignal): Promise<readonly DisambiguationCandidate[]> {
        const payload = await postJson(
            this.fetchImpl,
            `${this.baseUrl}/v1/drugs/resolve`,
            { query: drugText },
            undefined,
            signal,
            'drug-index'
        );
        return validate(CandidatesResponseSchema, payload, 'DrugIndexResponse').candidates;
    }
}

/**
 * Registry wiring every evaluator to one evaluation service, with
 * disambiguation policy applied locally over the remote drug index.
 */
export function createHttpEvaluatorRegistry(
    evaluatorBaseUrl: string,
    drugIndexBaseUrl: string,
    thresholds: DisambiguationThresholds,
    fetchImpl: FetchLike = fetch
): EvaluatorRegistry {
    const remote = (name: EvaluatorName): Evaluator => new HttpEvaluator(name, evaluatorBaseUrl, fetchImpl);
    const registry: Record<EvaluatorName, Evaluator> = {
        identity: remote('identity'),
        disambiguation: new DisambiguationEvaluator(new HttpDisambiguationResolver(drugIndexBaseUrl, fetchImpl), thresholds),
        interaction: remote('interaction'),
        allergy: remote('allergy'),
        controlled: remote('controlled'),
        dosage: remote('dosage'),
        inventory: remote('inventory')
    };
    return registry;
}
