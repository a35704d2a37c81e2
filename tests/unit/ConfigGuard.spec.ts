import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard, type GuardRule } from '../../libs/bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../../libs/bootstrap/config/db-config.js';

describe('ConfigGuard', () => {
    it('collects every violation instead of stopping at the first', () => {
        const rules: GuardRule[] = [
            { type: 'required', name: 'EVALUATOR_BASE_URL' },
            { type: 'required', name: 'DRUG_INDEX_BASE_URL' },
            { type: 'forbidIf', name: 'STORE_BACKEND', when: () => true, message: 'memory store in production' },
            { type: 'assert', check: () => false, message: 'PORT must be numeric' }
        ];

        assert.deepStrictEqual(ConfigGuard.collectViolations(rules, { DRUG_INDEX_BASE_URL: '   ' }), [
            'FATAL CONFIG: Required env var EVALUATOR_BASE_URL is missing',
            'FATAL CONFIG: Required env var DRUG_INDEX_BASE_URL is missing',
            'FATAL CONFIG: memory store in production (Rule: STORE_BACKEND)',
            'FATAL CONFIG: PORT must be numeric'
        ]);
    });

    it('reports a check that throws as a violation', () => {
        const rules: GuardRule[] = [
            { type: 'assert', check: () => { throw new Error('boom'); }, message: 'unused' }
        ];
        assert.deepStrictEqual(ConfigGuard.collectViolations(rules, {}), ['Check failed for rule: boom']);
    });

    it('passes a complete database configuration', () => {
        const env = {
            DB_HOST: 'localhost',
            DB_PORT: '5432',
            DB_USER: 'refill',
            DB_PASSWORD: 'test-password',
            DB_NAME: 'refill'
        };
        const required = DB_CONFIG_GUARDS.filter(rule => rule.type === 'required');
        assert.deepStrictEqual(ConfigGuard.collectViolations(required, env), []);
        assert.strictEqual(ConfigGuard.collectViolations(required, {}).length, 5);
    });
});
