/**
 * Dependency call breaker.
 *
 * CLOSED: calls pass; consecutive failures are counted.
 * OPEN: calls are refused until the recovery window has elapsed.
 * HALF_OPEN: a single trial call is let through; success closes the breaker,
 * failure re-opens it.
 *
 * A call that fails after its caller's signal aborted says nothing about the
 * dependency and is not counted.
 */

export type CallBreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CallBreakerOptions {
    readonly failureThreshold: number;
    readonly recoveryTimeoutMs: number;
}

export class CircuitOpenError extends Error {
    constructor(public readonly dependency: string, public readonly retryAfterMs: number) {
        super(`Circuit for ${dependency} is OPEN. Retry after ${retryAfterMs}ms`);
        this.name = 'CircuitOpenError';
    }
}

export class CallBreaker {
    private state: CallBreakerState = 'CLOSED';
    private failureCount = 0;
    private openedAt = 0;
    private trialInFlight = false;

    constructor(
        private readonly dependency: string,
        private readonly options: CallBreakerOptions,
        private readonly now: () => number = Date.now
    ) { }

    /** Current state, promoting OPEN to HALF_OPEN once the recovery window has passed. */
    getState(): CallBreakerState {
        if (this.state === 'OPEN' && this.now() - this.openedAt >= this.options.recoveryTimeoutMs) {
            this.state = 'HALF_OPEN';
        }
        return this.state;
    }

    async execute<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const state = this.getState();
        if (state === 'OPEN' || (state === 'HALF_OPEN' && this.trialInFlight)) {
            const elapsed = this.now() - this.openedAt;
            throw new CircuitOpenError(this.dependency, Math.max(this.options.recoveryTimeoutMs - elapsed, 0));
        }

        const isTrial = state === 'HALF_OPEN';
        if (isTrial) this.trialInFlight = true;

        try {
            const result = await task();
            this.onSuccess();
            return result;
        } catch (error) {
            if (signal?.aborted !== true) {
                this.onFailure(isTrial);
            }
            throw error;
        } finally {
            if (isTrial) this.trialInFlight = false;
        }
    }

    private onSuccess(): void {
        this.state = 'CLOSED';
        this.failureCount = 0;
    }

    private onFailure(isTrial: boolean): void {
        this.failureCount += 1;
        if (isTrial || this.failureCount >= this.options.failureThreshold) {
            this.state = 'OPEN';
            this.openedAt = this.now();
        }
    }
}
