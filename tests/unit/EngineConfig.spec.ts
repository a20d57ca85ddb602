/**
 * Unit Tests: Engine Configuration
 *
 * @see libs/config/engineConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from '../../libs/config/engineConfig.js';
import { ReboundError } from '../../libs/errors/sanitizer.js';

describe('loadEngineConfig', () => {
    it('should use defaults when nothing is set', () => {
        assert.deepStrictEqual(loadEngineConfig({}), DEFAULT_ENGINE_CONFIG);
    });

    it('should read overrides from the environment', () => {
        const config = loadEngineConfig({
            REBOUND_LEDGER_CAPACITY: '50',
            REBOUND_ATTEMPT_DISCOUNT: '0.5',
            REBOUND_ESCALATION_HISTORY: '0'
        });

        assert.strictEqual(config.ledgerCapacity, 50);
        assert.strictEqual(config.attemptDiscount, 0.5);
        assert.strictEqual(config.escalationHistory, 0);
        assert.strictEqual(config.timeWeight, 1000);
    });

    it('should treat blank values as unset', () => {
        const config = loadEngineConfig({ REBOUND_RECENT_LIMIT: '  ' });
        assert.strictEqual(config.recentLimit, 10);
    });

    it('should ignore unrelated variables', () => {
        const config = loadEngineConfig({ LOG_LEVEL: 'debug', PATH: '/usr/bin' });
        assert.deepStrictEqual(config, DEFAULT_ENGINE_CONFIG);
    });

    it('should reject invalid values as a configuration error', () => {
        assert.throws(
            () => loadEngineConfig({ REBOUND_LEDGER_CAPACITY: 'lots' }),
            (err: unknown) => {
                assert.ok(err instanceof ReboundError);
                assert.strictEqual(err.category, 'CONFIG');
                assert.strictEqual(err.contextLabel, 'EngineConfig');
                return true;
            }
        );
        assert.throws(() => loadEngineConfig({ REBOUND_ATTEMPT_DISCOUNT: '1.5' }), ReboundError);
        assert.throws(() => loadEngineConfig({ REBOUND_LEDGER_CAPACITY: '0' }), ReboundError);
    });

    it('should return a frozen configuration', () => {
        assert.ok(Object.isFrozen(loadEngineConfig({})));
    });
});
