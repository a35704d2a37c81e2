import { LRUCache } from 'lru-cache';
import type { WorkflowSession } from '../workflow/types.js';
import { decodeSession, encodeSession } from './codec.js';
import { isExpired } from './session.js';
import type { SessionStore } from './store.js';

export interface InMemorySessionStoreOptions {
    /** Upper bound on live sessions; least recently used are evicted first. */
    readonly maxSessions?: number;
    readonly defaultTtlMs?: number;
    readonly now?: () => Date;
}

/**
 * Single-process session store.
 *
 * Entries are kept serialized so callers never share a mutable object with
 * the store, and every read goes through the same codec as the PostgreSQL
 * store. Expiry is enforced both by the cache TTL and by the session's own
 * deadline.
 */
export class InMemorySessionStore implements SessionStore {
    private readonly cache: LRUCache<string, string>;
    private readonly now: () => Date;

    constructor(options: InMemorySessionStoreOptions = {}) {
        this.cache = new LRUCache<string, string>({
            max: options.maxSessions ?? 10_000,
            ttl: options.defaultTtlMs ?? 5 * 60 * 1000,
            updateAgeOnGet: false
        });
        this.now = options.now ?? (() => new Date());
    }

    async get(sessionId: string): Promise<WorkflowSession | null> {
        return this.read(sessionId);
    }

    /** Synchronous so a compare-and-put cannot interleave with another write. */
    private read(sessionId: string): WorkflowSession | null {
        const raw = this.cache.get(sessionId);
        if (raw === undefined) return null;

        const session = decodeSession(raw);
        if (isExpired(session, this.now())) {
            this.cache.delete(sessionId);
            return null;
        }
        return session;
    }

    async put(session: WorkflowSession, ttlMs: number): Promise<void> {
        this.cache.set(session.sessionId, encodeSession(session), { ttl: ttlMs });
    }

    async compareAndPut(
        sessionId: string,
        expectedVersion: number | null,
        session: WorkflowSession,
        ttlMs: number
    ): Promise<boolean> {
        const current = this.read(sessionId);
        const currentVersion = current === null ? null : current.version;
        if (currentVersion !== expectedVersion) {
            return false;
        }
        this.cache.set(sessionId, encodeSession(session), { ttl: ttlMs });
        return true;
    }

    async delete(sessionId: string): Promise<void> {
        this.cache.delete(sessionId);
    }

    get size(): number {
        return this.cache.size;
    }
}
