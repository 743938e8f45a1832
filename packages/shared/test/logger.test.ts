/**
 * @description: Validates that the shared logger scrubs identifiers and interaction tokens.
 * @scope: test
 * @module: LoggerTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import { transports } from 'winston';

import { createModuleLogger, logger, sanitizeLogData } from '../src/logger.js';

test('sanitizeLogData redacts snowflake identifiers in strings and nested objects', () => {
    assert.equal(
        sanitizeLogData('guild 123456789012345678 channel 234567890123456789'),
        'guild [REDACTED_ID] channel [REDACTED_ID]'
    );

    assert.deepEqual(
        sanitizeLogData({ guildId: '123456789012345678', meta: { ids: ['234567890123456789', 'short-1'] } }),
        { guildId: '[REDACTED_ID]', meta: { ids: ['[REDACTED_ID]', 'short-1'] } }
    );
});

test('sanitizeLogData hides interaction tokens embedded in API routes', () => {
    assert.equal(
        sanitizeLogData('PATCH /webhooks/42/test-token.part_2/messages/@original'),
        'PATCH /webhooks/42/[REDACTED_TOKEN]/messages/@original'
    );
    assert.equal(
        sanitizeLogData('POST /interactions/7/test-token/callback'),
        'POST /interactions/7/[REDACTED_TOKEN]/callback'
    );
});

test('sanitizeLogData scrubs a copy of an error and leaves the original untouched', () => {
    class CodedError extends Error {
        constructor(message: string, public readonly code: number) {
            super(message);
            this.name = 'CodedError';
        }
    }
    const error = new CodedError('failed for 123456789012345678', 10007);
    const sanitized = sanitizeLogData(error);

    assert.notEqual(sanitized, error);
    assert.ok(sanitized instanceof CodedError);
    assert.equal(sanitized.message, 'failed for [REDACTED_ID]');
    assert.equal(sanitized.code, 10007);
    assert.equal(sanitized.name, 'CodedError');
    assert.equal(sanitized.stack?.includes('123456789012345678'), false);
    assert.equal(error.message, 'failed for 123456789012345678');
    assert.equal(error.stack?.includes('123456789012345678'), true);
});

test('logger pipeline applies sanitizer and module tag before emitting', async () => {
    const captured: string[] = [];
    const streamTransport = new transports.Stream({
        stream: new Writable({
            write(chunk: Buffer | string, _encoding, callback) {
                captured.push(chunk.toString());
                callback();
            }
        })
    });

    logger.add(streamTransport);
    try {
        createModuleLogger('loggerTest').info('Routing interaction 123456789012345678');
        await new Promise((resolve) => setImmediate(resolve));
    } finally {
        logger.remove(streamTransport);
    }

    const output = captured.join(' ');
    assert.ok(output.includes('[loggerTest]'), 'Module tag should be rendered');
    assert.ok(output.includes('Routing interaction [REDACTED_ID]'));
    assert.equal(output.match(/\b\d{17,19}\b/), null);
});
