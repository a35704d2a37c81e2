/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output: credentials and patient identifiers.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Patient / PHI (Root and Nested)
    'patientRef', '*.patientRef',
    'patient_id', '*.patient_id',
    'mrn', '*.mrn',
    'rawUtterance', '*.rawUtterance',
    'transcript', '*.transcript',
    'collectedEntities', '*.collectedEntities',
    'extractedEntities', '*.extractedEntities',
    'contextPackage', '*.contextPackage',
    'conversationExcerpt', '*.conversationExcerpt'
];

export const REDACT_CENSOR = '[REDACTED]';
