/**
 * Audit Immutability Guard
 * Protected environments must run on the append-only PostgreSQL audit store.
 */

const PROTECTED_ENVS = new Set(['production', 'staging']);

export type AuditBackend = 'postgres' | 'memory';

export function enforceAuditImmutability(backend: AuditBackend, env: NodeJS.ProcessEnv = process.env): void {
    const nodeEnv = env.NODE_ENV ?? 'development';
    if (!PROTECTED_ENVS.has(nodeEnv)) {
        return;
    }

    if (backend !== 'postgres') {
        throw new Error('In-memory audit log is not permitted in production/staging');
    }
    if (env.AUDIT_APPEND_ONLY !== 'true') {
        throw new Error('AUDIT_APPEND_ONLY must be enabled in production/staging');
    }
}
