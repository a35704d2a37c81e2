import type { GuardRule } from '../config-guard.js';

/**
 * Database Configuration Guards
 * Connection parameters for the session, audit and escalation stores.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: () => Number.isInteger(Number(process.env.DB_PORT)),
        message: 'DB_PORT must be an integer',
    },

    // TLS is mandatory wherever real patient data flows
    {
        type: 'assert',
        check: () =>
            !['production', 'staging'].includes(process.env.NODE_ENV ?? '') ||
            !!process.env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];
