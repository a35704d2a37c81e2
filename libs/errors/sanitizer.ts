import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps internal failures in a generic, PHI-free message and an incident ID
 * that correlates the public error with the full details written to the log.
 */

export class RefillSystemError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SAFETY' | 'OPS' | 'DATA' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'RefillSystemError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized RefillSystemError.
     */
    sanitize: (err: unknown, contextLabel: string): RefillSystemError => {
        if (err instanceof RefillSystemError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            const code: unknown = Reflect.get(err, 'code');
            sqlState = typeof code === 'string' ? code : undefined;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new RefillSystemError(
            `An internal system error occurred. Please retry; reference: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, sqlState }
        );
    }
};
