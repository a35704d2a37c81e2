import type { WorkflowConfig } from '../bootstrap/config/workflow-config.js';
import { logger } from '../logging/logger.js';
import { EVALUATOR_NAMES, type EvaluatorName, type EvaluatorVerdict, type VerdictMap } from '../workflow/types.js';
import { CallBreaker, CircuitOpenError, type CallBreakerState } from './callBreaker.js';
import type { EvaluationRequest, Evaluator, EvaluatorRegistry } from './contracts.js';

/**
 * Evaluator Invoker
 *
 * Runs evaluators behind a per-call timeout and a per-evaluator call breaker.
 * Never rejects: a timeout, an error or an open breaker becomes an
 * UNAVAILABLE verdict, which the breaker policy turns into an escalation.
 * A call cancelled by the caller's signal never counts against the breaker.
 */

const BACKEND_EVALUATORS: ReadonlySet<EvaluatorName> = new Set<EvaluatorName>(['inventory']);

class EvaluatorTimeoutError extends Error {
    constructor(public readonly evaluator: EvaluatorName, public readonly timeoutMs: number) {
        super(`Evaluator ${evaluator} timed out after ${timeoutMs}ms`);
        this.name = 'EvaluatorTimeoutError';
    }
}

export type InvokerConfig = Pick<WorkflowConfig, 'evaluatorTimeoutMs' | 'backendTimeoutMs' | 'callBreaker'>;

export class EvaluatorInvoker {
    private readonly breakers = new Map<EvaluatorName, CallBreaker>();
    private readonly log = logger.child({ component: 'evaluator-invoker' });

    constructor(
        private readonly registry: EvaluatorRegistry,
        private readonly config: InvokerConfig,
        now: () => number = Date.now
    ) {
        for (const name of EVALUATOR_NAMES) {
            this.breakers.set(name, new CallBreaker(name, config.callBreaker, now));
        }
    }

    timeoutFor(name: EvaluatorName): number {
        return BACKEND_EVALUATORS.has(name) ? this.config.backendTimeoutMs : this.config.evaluatorTimeoutMs;
    }

    async invoke(name: EvaluatorName, request: EvaluationRequest, signal: AbortSignal): Promise<EvaluatorVerdict> {
        const evaluator = this.registry[name];
        const breaker = this.breakerFor(name);
        const timeoutMs = this.timeoutFor(name);

        try {
            return await breaker.execute(() => this.callWithTimeout(name, evaluator, request, signal, timeoutMs), signal);
        } catch (error) {
            if (signal.aborted) {
                this.log.debug({ evaluator: name }, 'Evaluator call cancelled by caller');
                return { status: 'UNAVAILABLE', reasonCode: 'EVALUATOR_ERROR', detail: { kind: 'unavailable', cause: 'ERROR' } };
            }
            if (error instanceof CircuitOpenError) {
                this.log.warn({ evaluator: name, retryAfterMs: error.retryAfterMs }, 'Evaluator circuit open');
                return { status: 'UNAVAILABLE', reasonCode: 'CIRCUIT_OPEN', detail: { kind: 'unavailable', cause: 'CIRCUIT_OPEN' } };
            }
            if (error instanceof EvaluatorTimeoutError) {
                this.log.warn({ evaluator: name, timeoutMs }, 'Evaluator timed out');
                return { status: 'UNAVAILABLE', reasonCode: 'TIMEOUT', detail: { kind: 'unavailable', cause: 'TIMEOUT', timeoutMs } };
            }
            this.log.warn({
                evaluator: name,
                error: error instanceof Error ? error.message : String(error)
            }, 'Evaluator failed');
            return { status: 'UNAVAILABLE', reasonCode: 'EVALUATOR_ERROR', detail: { kind: 'unavailable', cause: 'ERROR' } };
        }
    }

    /**
     * Invokes the named evaluators concurrently.
     */
    async invokeAll(
        names: readonly EvaluatorName[],
        request: EvaluationRequest,
        signal: AbortSignal
    ): Promise<VerdictMap> {
        const verdicts = await Promise.all(
            names.map(async name => [name, await this.invoke(name, request, signal)] as const)
        );
        const map: Partial<Record<EvaluatorName, EvaluatorVerdict>> = {};
        for (const [name, verdict] of verdicts) {
            map[name] = verdict;
        }
        return map;
    }

    breakerStates(): Partial<Record<EvaluatorName, CallBreakerState>> {
        const states: Partial<Record<EvaluatorName, CallBreakerState>> = {};
        for (const [name, breaker] of this.breakers) {
            states[name] = breaker.getState();
        }
        return states;
    }

    private breakerFor(name: EvaluatorName): CallBreaker {
        const breaker = this.breakers.get(name);
        if (!breaker) {
            throw new Error(`No call breaker registered for evaluator ${name}`);
        }
        return breaker;
    }

    private async callWithTimeout(
        name: EvaluatorName,
        evaluator: Evaluator,
        request: EvaluationRequest,
        parent: AbortSignal,
        timeoutMs: number
    ): Promise<EvaluatorVerdict> {
        const controller = new AbortController();
        const onAbort = () => controller.abort(parent.reason);
        if (parent.aborted) {
            controller.abort(parent.reason);
        } else {
            parent.addEventListener('abort', onAbort, { once: true });
        }

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new EvaluatorTimeoutError(name, timeoutMs));
            }, timeoutMs);
        });

        try {
            return await Promise.race([evaluator.evaluate(request, controller.signal), timeout]);
        } finally {
            clearTimeout(timer);
            parent.removeEventListener('abort', onAbort);
        }
    }
}

