export const DB_ROLES = [
    'refill_workflow',
    'refill_auditor',
    'refill_readonly'
] as const;

export type DbRole = typeof DB_ROLES[number];

export function isDbRole(role: string): role is DbRole {
    return (DB_ROLES as readonly string[]).includes(role);
}

export function assertDbRole(role: string): DbRole {
    if (isDbRole(role)) {
        return role;
    }

    throw new Error(`Invalid DbRole: ${role}`);
}
