import { describe, it } from 'node:test';
import assert from 'node:assert';
import { pino } from 'pino';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';

describe('Log Redaction', () => {
    it('should redact oracle material and credentials', () => {
        const lines: string[] = [];
        const testLogger = pino({
            redact: {
                paths: REDACT_KEYS,
                censor: REDACT_CENSOR
            }
        }, { write: (msg: string) => { lines.push(msg); } });

        testLogger.info({
            proof: '0xabc',
            password: 'test-secret',
            nested: {
                verificationKey: 'test-secret',
                other: 'safe'
            },
            requestId: '42'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log: unknown = JSON.parse(lines[0] ?? '{}');
        assert.ok(typeof log === 'object' && log !== null);
        assert.strictEqual(Reflect.get(log, 'proof'), REDACT_CENSOR);
        assert.strictEqual(Reflect.get(log, 'password'), REDACT_CENSOR);
        assert.deepStrictEqual(Reflect.get(log, 'nested'), { verificationKey: REDACT_CENSOR, other: 'safe' });
        assert.strictEqual(Reflect.get(log, 'requestId'), '42');
    });
});
