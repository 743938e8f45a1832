/**
 * @description: Exercises handler dispatch, permission refusals and error propagation in the router.
 * @scope: test
 * @module: InteractionRouterTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { InteractionType } from 'discord.js';

import { ComponentContext } from '../src/context/ComponentContext.js';
import { PermissionLevel, PermissionResolver } from '../src/permissions/PermissionResolver.js';
import { DEFAULT_DENIED_MESSAGE, InteractionRouter } from '../src/router/InteractionRouter.js';
import { MemoryStateCache } from '../src/state/StateCache.js';
import { basePayload, componentPayload, slashPayload } from './helpers/fixtures.js';
import { createRecordingFactory } from './helpers/recordingTransport.js';

const OWNER_ID = '1180000000000003001';

const createRouter = () => {
    const { factory, transports } = createRecordingFactory();
    const cache = new MemoryStateCache();
    const permissions = new PermissionResolver(
        { owners: [OWNER_ID], subOwners: [] },
        { isBanned: async () => false },
        cache
    );
    const router = new InteractionRouter({ dependencies: { transportFactory: factory, cache }, permissions });
    return { router, transports };
};

const asOwner = { member: { user: { id: OWNER_ID, username: 'owner' }, roles: [] } };

test('slash commands are dispatched by name', async () => {
    const { router, transports } = createRouter();
    const seen: string[] = [];
    router.command('ping', async (context) => {
        seen.push(context.content);
        await context.send('pong');
    });

    await router.handle(slashPayload('ping'));

    assert.deepEqual(seen, ['/ping']);
    assert.deepEqual(transports[0]?.methods, ['postInitialResponse', 'getInitialResponse']);
});

test('unknown commands and unsupported interaction types are left unanswered', async () => {
    const { router, transports } = createRouter();

    const unknown = await router.handle(slashPayload('missing'));
    const ping = await router.handle(basePayload({ type: InteractionType.Ping }));

    assert.equal(unknown.responded, false);
    assert.equal(ping.responded, false);
    assert.deepEqual(transports.map((transport) => transport.calls.length), [0, 0]);
});

test('restricted handlers refuse lower-ranked invokers with a hidden reply', async () => {
    const { router, transports } = createRouter();
    let ran = 0;
    router.command('shutdown', () => {
        ran += 1;
    }, PermissionLevel.Owner);

    await router.handle(slashPayload('shutdown'));
    assert.equal(ran, 0);
    assert.deepEqual(transports[0]?.calls[0], {
        method: 'postInitialResponse',
        args: [{ content: DEFAULT_DENIED_MESSAGE, flags: 64 }]
    });

    await router.handle(slashPayload('shutdown', [], asOwner));
    assert.equal(ran, 1);
    assert.equal(transports[1]?.calls.length, 0);
});

test('component handlers match the longest custom-id prefix', async () => {
    const { router } = createRouter();
    const hits: string[] = [];
    router
        .component('vote:', (context) => {
            hits.push(`vote ${context.customId}`);
        })
        .component('vote:admin:', (context) => {
            hits.push(`admin ${context.customId}`);
        }, PermissionLevel.Owner);

    await router.handle(componentPayload('vote:yes'));
    const denied = await router.handle(componentPayload('vote:admin:reset'));
    await router.handle(componentPayload('vote:admin:reset', asOwner));
    await router.handle(componentPayload('poll:1'));

    assert.deepEqual(hits, ['vote vote:yes', 'admin vote:admin:reset']);
    assert.ok(denied instanceof ComponentContext);
    assert.equal(denied.responded, true);
});

test('handler errors are rethrown to the caller', async () => {
    const { router } = createRouter();
    router.command('boom', () => {
        throw new Error('handler exploded');
    });

    await assert.rejects(router.handle(slashPayload('boom')), /handler exploded/);
});

test('rethrown handler errors keep their identity and original message after logging', async () => {
    const { router } = createRouter();
    const failure = new Error('Unknown member 1180000000000004001');
    router.command('lookup', () => {
        throw failure;
    });

    let caught: unknown;
    await router.handle(slashPayload('lookup')).catch((error: unknown) => {
        caught = error;
    });
    await new Promise((resolve) => setImmediate(resolve));

    assert.equal(caught, failure);
    assert.equal(failure.message, 'Unknown member 1180000000000004001');
});

test('guild administrators pass admin-restricted handlers from the payload permission bits alone', async () => {
    const { router, transports } = createRouter();
    let ran = 0;
    router.command('purge', () => {
        ran += 1;
    }, PermissionLevel.Administrator);

    await router.handle(slashPayload('purge', [], {
        member: { user: { id: '1180000000000004002', username: 'admin' }, roles: [], permissions: '8' }
    }));
    await router.handle(slashPayload('purge'));

    assert.equal(ran, 1);
    assert.equal(transports[0]?.calls.length, 0);
    assert.deepEqual(transports[1]?.calls[0], {
        method: 'postInitialResponse',
        args: [{ content: DEFAULT_DENIED_MESSAGE, flags: 64 }]
    });
});

test('registration rejects duplicates and restricted handlers without a resolver', () => {
    const { router } = createRouter();
    router.command('ping', () => undefined);
    assert.throws(() => router.command('ping', () => undefined), /already registered/);

    const open = new InteractionRouter({
        dependencies: { transportFactory: createRecordingFactory().factory, cache: new MemoryStateCache() }
    });
    assert.throws(() => open.component('x', () => undefined, PermissionLevel.Member), /permission resolver is required/);
});
