import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR } from '../../libs/logging/redactionConfig.js';
import { createLogger } from '../../libs/logging/logger.js';
import { Writable } from 'node:stream';

describe('Log Redaction', () => {
    it('should redact credentials inside logged attribute payloads', () => {
        const lines: string[] = [];
        const stream = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                lines.push(chunk.toString());
                callback();
            }
        });

        const testLogger = createLogger('info', stream);

        testLogger.info({
            token: 'test-token',
            attributes: {
                title: 'Hello',
                password: 'test-password',
                passwordConfirmation: 'test-password'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log = JSON.parse(lines[0] ?? '{}');
        assert.strictEqual(log.token, REDACT_CENSOR);
        assert.strictEqual(log.attributes.password, REDACT_CENSOR);
        assert.strictEqual(log.attributes.passwordConfirmation, REDACT_CENSOR);
        assert.strictEqual(log.attributes.title, 'Hello');
        assert.strictEqual(log.visible, 'ok');
        assert.strictEqual(log.system, 'prepro');
    });
});
