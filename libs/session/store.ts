import type { WorkflowSession } from '../workflow/types.js';

/**
 * Session persistence contract.
 *
 * `compareAndPut` is the only write the controller uses: it stores the
 * session only if the stored version still equals `expectedVersion`
 * (`null` meaning "must not exist") and reports whether it did.
 * Implementations store `session.version` as given; the caller increments it.
 */
export interface SessionStore {
    get(sessionId: string): Promise<WorkflowSession | null>;
    put(session: WorkflowSession, ttlMs: number): Promise<void>;
    compareAndPut(
        sessionId: string,
        expectedVersion: number | null,
        session: WorkflowSession,
        ttlMs: number
    ): Promise<boolean>;
    delete(sessionId: string): Promise<void>;
}
