/**
 * Rebound Recovery Engine Tests
 *
 * End-to-end decisions through the facade: classify, record, select,
 * escalate, with a fixed clock and an in-memory escalation sink.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { RecoveryEngine } from '../libs/recovery/recoveryEngine.js';
import { ResourceProbe } from '../libs/recovery/resourceProbe.js';
import { EscalationSink } from '../libs/recovery/escalationReporter.js';
import { EscalationRecord } from '../libs/recovery/recoveryTypes.js';
import { DEFAULT_ENGINE_CONFIG } from '../libs/config/engineConfig.js';
import { ReboundError } from '../libs/errors/sanitizer.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const stubProbe: ResourceProbe = {
    capture: () => ({ status: 'available', memoryPercent: 37.5, cpuPercent: 12 })
};

class MemorySink implements EscalationSink {
    readonly records: EscalationRecord[] = [];

    publish(record: EscalationRecord): void {
        this.records.push(record);
    }
}

describe('RecoveryEngine', () => {
    let engine: RecoveryEngine;
    let sink: MemorySink;

    beforeEach(() => {
        let next = 0;
        sink = new MemorySink();
        engine = new RecoveryEngine({
            probe: stubProbe,
            sink,
            clock: () => NOW,
            idGenerator: () => `inc-${++next}`
        });
    });

    describe('evaluateFailure', () => {
        it('should back off on a rate-limited directory brute force', () => {
            const decision = engine.evaluateFailure(
                'gobuster',
                { message: 'rate limit exceeded (429)' },
                { target: 'https://app.example.test', parameters: { threads: '50' } }
            );

            assert.strictEqual(decision.incident.errorKind, 'rate_limited');
            assert.strictEqual(decision.strategy.action, 'retry_with_backoff');
            assert.deepStrictEqual(decision.strategy.actionParameters, { initial_delay: 30, max_delay: 300 });
            assert.strictEqual(decision.escalation, undefined);
            assert.deepStrictEqual(
                engine.adjustParameters('gobuster', decision.incident.errorKind, { threads: '50' }),
                { threads: '5', 'rate-limit': '10' }
            );
        });

        it('should record a complete incident', () => {
            const { incident } = engine.evaluateFailure(
                'nmap',
                { message: 'Connection timed out', stackTrace: 'at scan (scanner.ts:10)' },
                { target: '10.0.0.1', parameters: { ports: '1-1000' }, attemptCount: 2 }
            );

            assert.deepStrictEqual(incident, {
                incidentId: 'inc-1',
                toolName: 'nmap',
                target: '10.0.0.1',
                parameters: { ports: '1-1000' },
                errorKind: 'timeout',
                errorMessage: 'Connection timed out',
                attemptCount: 2,
                timestamp: '2026-03-01T12:00:00.000Z',
                stackTrace: 'at scan (scanner.ts:10)',
                systemResources: { status: 'available', memoryPercent: 37.5, cpuPercent: 12 },
                previousIncidentIds: []
            });
            assert.ok(Object.isFrozen(incident));
            assert.strictEqual(engine.ledger.get('inc-1'), incident);
        });

        it('should let an exception tag override the message', () => {
            const decision = engine.evaluateFailure('nuclei', {
                message: 'something odd happened',
                exceptionKind: 'connectivity'
            });

            assert.strictEqual(decision.incident.errorKind, 'network_unreachable');
            assert.strictEqual(decision.incident.target, 'unknown');
            assert.strictEqual(decision.strategy.action, 'retry_with_backoff');
        });

        it('should link incidents of the same tool and target', () => {
            const first = engine.evaluateFailure('nmap', { message: 'timed out' }, { target: '10.0.0.1' });
            engine.evaluateFailure('nmap', { message: 'timed out' }, { target: '10.0.0.2' });
            const third = engine.evaluateFailure('nmap', { message: 'timed out' }, { target: '10.0.0.1', attemptCount: 2 });

            assert.deepStrictEqual(first.incident.previousIncidentIds, []);
            assert.deepStrictEqual(third.incident.previousIncidentIds, ['inc-1']);
        });

        it('should keep incident parameters apart from the caller\'s objects', () => {
            const body = { a: 'original' };

            const { incident } = engine.evaluateFailure(
                'ffuf',
                { message: 'timed out' },
                { parameters: { body } }
            );
            body.a = 'mutated';

            assert.deepStrictEqual(incident.parameters, { body: { a: 'original' } });
            assert.deepStrictEqual(engine.ledger.get(incident.incidentId)?.parameters, { body: { a: 'original' } });
            assert.ok(Object.isFrozen(incident.parameters.body));
        });

        it('should reject parameters that cannot be copied', () => {
            assert.throws(
                () => engine.evaluateFailure('ffuf', { message: 'timed out' }, { parameters: { onLine: () => undefined } }),
                (err: unknown) => err instanceof ReboundError && err.category === 'INPUT'
            );
            assert.strictEqual(engine.ledger.size, 0);
        });

        it('should scrub credentials from stored messages', () => {
            const { incident } = engine.evaluateFailure('hydra', {
                message: 'login failed: password=test-secret'
            });

            assert.strictEqual(incident.errorKind, 'authentication_failed');
            assert.strictEqual(incident.errorMessage, 'login failed: password=[REDACTED]');
        });
    });

    describe('escalation', () => {
        it('should escalate a permission failure with the catalog message', () => {
            const decision = engine.evaluateFailure(
                'masscan',
                { message: 'Permission denied' },
                { target: '10.0.0.0/24' }
            );

            assert.strictEqual(decision.strategy.action, 'escalate_to_human');
            assert.strictEqual(decision.escalation?.urgency, 'medium');
            assert.strictEqual(decision.escalation?.summary, 'Privilege escalation required');
            assert.deepStrictEqual(sink.records, [decision.escalation]);
        });

        it('should not freeze caller objects passed as parameters', () => {
            const headers: Record<string, string> = { Accept: 'application/json' };

            const decision = engine.evaluateFailure(
                'masscan',
                { message: 'Permission denied' },
                { parameters: { headers } }
            );
            headers.Cookie = 'session=test';

            assert.ok(decision.escalation);
            assert.ok(!Object.isFrozen(headers));
            assert.deepStrictEqual(decision.escalation.context.parameters, { headers: { Accept: 'application/json' } });
        });

        it('should escalate with high urgency once every strategy is spent', () => {
            engine.evaluateFailure('nmap', { message: 'timed out' }, { target: '10.0.0.1' });
            const decision = engine.evaluateFailure(
                'nmap',
                { message: 'timed out again' },
                { target: '10.0.0.1', attemptCount: 4 }
            );

            assert.deepStrictEqual(decision.strategy.actionParameters, {
                message: 'All recovery strategies exhausted for nmap',
                urgency: 'high'
            });
            assert.strictEqual(decision.escalation?.urgency, 'high');
            assert.strictEqual(decision.escalation?.summary, 'All recovery strategies exhausted for nmap');
            assert.deepStrictEqual(decision.escalation?.context.recentErrors, ['timed out']);
        });

        it('should keep deciding when the sink fails', () => {
            const failing = new RecoveryEngine({
                probe: stubProbe,
                sink: {
                    publish: () => {
                        throw new Error('pager service offline');
                    }
                }
            });

            const decision = failing.evaluateFailure('prowler', { message: 'authentication failed' });

            assert.strictEqual(decision.strategy.action, 'escalate_to_human');
            assert.strictEqual(decision.escalation?.urgency, 'high');
        });

        it('should escalate explicitly with default medium urgency', () => {
            const { incident } = engine.evaluateFailure('nikto', { message: 'malformed response' });

            const record = engine.escalate(incident);

            assert.strictEqual(record.urgency, 'medium');
            assert.strictEqual(record.summary, 'parsing_error on nikto against unknown');
            assert.strictEqual(sink.records.length, 1);
        });
    });

    describe('invalid input', () => {
        it('should reject an empty tool name without recording anything', () => {
            assert.throws(() => engine.evaluateFailure('', { message: 'timed out' }), ReboundError);
            assert.strictEqual(engine.ledger.size, 0);
        });

        it('should reject an attempt count below one', () => {
            assert.throws(
                () => engine.evaluateFailure('nmap', { message: 'timed out' }, { attemptCount: 0 }),
                (err: unknown) => err instanceof ReboundError && err.category === 'INPUT'
            );
            assert.strictEqual(engine.ledger.size, 0);
        });
    });

    describe('queries', () => {
        it('should return only the strategy from handleFailure', () => {
            const strategy = engine.handleFailure('ffuf', { message: 'too many requests' });
            assert.strictEqual(strategy.action, 'retry_with_backoff');
            assert.strictEqual(engine.ledger.size, 1);
        });

        it('should suggest alternatives under constraints', () => {
            assert.strictEqual(engine.getAlternative('nmap'), 'rustscan');
            assert.strictEqual(engine.getAlternative('masscan', ['require_no_privileges']), 'rustscan');
            assert.strictEqual(engine.getAlternative('not-a-tool'), undefined);
        });

        it('should summarize the ledger', () => {
            engine.evaluateFailure('nmap', { message: 'timed out' });
            engine.evaluateFailure('gobuster', { message: 'HTTP 429' });
            engine.evaluateFailure('gobuster', { message: 'throttled by WAF' });

            const stats = engine.getStatistics();

            assert.strictEqual(stats.total, 3);
            assert.deepStrictEqual(stats.byKind, { timeout: 1, rate_limited: 2 });
            assert.deepStrictEqual(stats.byTool, { nmap: 1, gobuster: 2 });
            assert.strictEqual(stats.recentCount, 3);
            assert.deepStrictEqual(stats.recent.map(r => r.incidentId), ['inc-1', 'inc-2', 'inc-3']);
        });

        it('should size its ledger from configuration', () => {
            const small = new RecoveryEngine({
                config: { ...DEFAULT_ENGINE_CONFIG, ledgerCapacity: 2 },
                probe: stubProbe
            });

            for (let i = 0; i < 5; i++) {
                small.evaluateFailure('nmap', { message: 'timed out' });
            }

            assert.strictEqual(small.ledger.capacity, 2);
            assert.strictEqual(small.getStatistics().total, 2);
        });
    });
});
