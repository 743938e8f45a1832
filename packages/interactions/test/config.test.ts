/**
 * @description: Covers environment parsing defaults and the YAML permission configuration.
 * @scope: test
 * @module: ConfigTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadEnvironment, readInteractionConfig } from '../src/config/env.js';
import { EMPTY_PERMISSION_SNAPSHOT, loadPermissionConfig, parsePermissionConfig } from '../src/config/permissionConfig.js';

test('readInteractionConfig falls back to defaults', () => {
    assert.deepEqual(readInteractionConfig({}), {
        token: null,
        apiVersion: '10',
        restRetries: 0,
        restTimeoutMs: 15000,
        permissionConfigPath: null,
        blacklistDbPath: 'data/blacklist.db',
        defaultAllowedMentions: undefined
    });
});

test('readInteractionConfig reads overrides and ignores invalid numbers', () => {
    const config = readInteractionConfig({
        DISCORD_TOKEN: ' test-token ',
        DISCORD_API_VERSION: '9',
        DISCORD_REST_RETRIES: '3',
        DISCORD_REST_TIMEOUT_MS: 'soon',
        PERMISSION_CONFIG_PATH: 'config/permissions.yaml',
        BLACKLIST_DB_PATH: '/var/lib/slashkit/blacklist.db',
        ALLOWED_MENTIONS_PARSE: 'users, Roles,bogus,users'
    });

    assert.equal(config.token, 'test-token');
    assert.equal(config.apiVersion, '9');
    assert.equal(config.restRetries, 3);
    assert.equal(config.restTimeoutMs, 15000);
    assert.equal(config.permissionConfigPath, 'config/permissions.yaml');
    assert.equal(config.blacklistDbPath, '/var/lib/slashkit/blacklist.db');
    assert.deepEqual(config.defaultAllowedMentions, { parse: ['users', 'roles'] });
});

test('an empty ALLOWED_MENTIONS_PARSE disables every mention', () => {
    assert.deepEqual(readInteractionConfig({ ALLOWED_MENTIONS_PARSE: '' }).defaultAllowedMentions, { parse: [] });
    assert.equal(readInteractionConfig({ DISCORD_REST_RETRIES: '-1' }).restRetries, 0);
});

test('loadEnvironment reads a .env file without overriding injected variables', () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), 'slashkit-env-'));
    const envPath = path.join(dir, '.env');
    writeFileSync(envPath, 'SLASHKIT_TEST_FROM_FILE=file\nSLASHKIT_TEST_INJECTED=file\n');
    process.env.SLASHKIT_TEST_INJECTED = 'injected';

    try {
        loadEnvironment(envPath);
        assert.equal(process.env.SLASHKIT_TEST_FROM_FILE, 'file');
        assert.equal(process.env.SLASHKIT_TEST_INJECTED, 'injected');

        // A missing file is not an error.
        loadEnvironment(path.join(dir, 'missing.env'));
    } finally {
        delete process.env.SLASHKIT_TEST_FROM_FILE;
        delete process.env.SLASHKIT_TEST_INJECTED;
        rmSync(dir, { recursive: true, force: true });
    }
});

test('parsePermissionConfig returns a frozen snapshot of quoted and safe numeric ids', () => {
    const snapshot = parsePermissionConfig([
        'permission:',
        '  owners:',
        '    - "1180000000000002001"',
        '    - 42',
        '    - 1180000000000002002',
        '    - not-an-id',
        '  subOwners: []'
    ].join('\n'));

    assert.deepEqual(snapshot, { owners: ['1180000000000002001', '42'], subOwners: [] });
    assert.ok(Object.isFrozen(snapshot));
    assert.ok(Object.isFrozen(snapshot.owners));
});

test('parsePermissionConfig treats a missing section as empty and rejects bad shapes', () => {
    assert.equal(parsePermissionConfig(''), EMPTY_PERMISSION_SNAPSHOT);
    assert.equal(parsePermissionConfig('other: true'), EMPTY_PERMISSION_SNAPSHOT);
    assert.deepEqual(parsePermissionConfig('permission:\n  owners: ["7"]'), { owners: ['7'], subOwners: [] });
    assert.throws(() => parsePermissionConfig('permission: 5'), /permission must be a mapping/);
    assert.throws(() => parsePermissionConfig('permission:\n  owners: "7"'), /permission.owners must be a list/);
    assert.throws(() => parsePermissionConfig('- just\n- a list'), /must be a mapping/);
});

test('loadPermissionConfig reads the example file', () => {
    const examplePath = fileURLToPath(new URL('../config/permissions.example.yaml', import.meta.url));

    assert.deepEqual(loadPermissionConfig(examplePath), {
        owners: ['100000000000000001'],
        subOwners: ['100000000000000002', '100000000000000003']
    });
    assert.equal(loadPermissionConfig(null), EMPTY_PERMISSION_SNAPSHOT);
});
