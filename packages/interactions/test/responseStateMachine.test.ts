/**
 * @description: Verifies route selection and flag transitions of the interaction response state machine.
 * @scope: test
 * @module: ResponseStateMachineTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { InteractionResponseType } from 'discord.js';

import { ResponseStateMachine, planResponse } from '../src/state/ResponseStateMachine.js';
import type { OutboundMessage } from '../src/state/ResponseStateMachine.js';
import { APPLICATION_ID, INTERACTION_ID, TOKEN } from './helpers/fixtures.js';
import { RecordingTransport } from './helpers/recordingTransport.js';

const identity = { interactionId: INTERACTION_ID, token: TOKEN, applicationId: APPLICATION_ID };
const plain: OutboundMessage = { payload: { content: 'hello' }, form: null };

const createMachine = () => {
    const transport = new RecordingTransport(identity);
    return { transport, machine: new ResponseStateMachine(transport, 'test interaction') };
};

test('planResponse maps every phase to a single route', () => {
    assert.deepEqual(planResponse('message', 'fresh', false), { deferFirst: null, route: 'initial-message' });
    assert.deepEqual(planResponse('message', 'deferred', false), { deferFirst: null, route: 'edit-original' });
    assert.deepEqual(planResponse('message', 'responded', true), { deferFirst: null, route: 'followup' });
    assert.deepEqual(planResponse('update', 'fresh', false), { deferFirst: null, route: 'initial-update' });
    assert.deepEqual(planResponse('update', 'deferred', true), { deferFirst: null, route: 'edit-message' });
    assert.deepEqual(planResponse('update', 'responded', false), { deferFirst: null, route: 'followup' });
});

test('planResponse defers first when a fresh response carries attachments', () => {
    assert.deepEqual(planResponse('message', 'fresh', true), {
        deferFirst: InteractionResponseType.DeferredChannelMessageWithSource,
        route: 'edit-original'
    });
    assert.deepEqual(planResponse('update', 'fresh', true), {
        deferFirst: InteractionResponseType.DeferredMessageUpdate,
        route: 'edit-message'
    });
});

test('defer sends type 5 with the ephemeral flag only when hidden', async () => {
    const { transport, machine } = createMachine();
    await machine.defer(InteractionResponseType.DeferredChannelMessageWithSource, true);

    assert.deepEqual(transport.calls, [{ method: 'postDeferredResponse', args: [{ type: 5, data: { flags: 64 } }] }]);
    assert.equal(machine.deferred, true);
    assert.equal(machine.responded, false);
    assert.equal(machine.phase, 'deferred');

    const other = createMachine();
    await other.machine.defer(InteractionResponseType.DeferredMessageUpdate);
    assert.deepEqual(other.transport.calls[0]?.args, [{ type: 6 }]);
});

test('respond walks fresh, then follow-up without touching the flags again', async () => {
    const { transport, machine } = createMachine();

    await machine.respond(plain);
    assert.deepEqual(transport.methods, ['postInitialResponse', 'getInitialResponse']);
    assert.equal(machine.phase, 'responded');
    assert.equal(machine.deferred, false);

    await machine.respond({ payload: { content: 'again' }, form: null });
    assert.deepEqual(transport.methods, ['postInitialResponse', 'getInitialResponse', 'postFollowup']);
    assert.equal(machine.deferred, false);
    assert.equal(machine.responded, true);
});

test('respond after defer edits the original response', async () => {
    const { transport, machine } = createMachine();
    await machine.defer(InteractionResponseType.DeferredChannelMessageWithSource);
    await machine.respond(plain);

    assert.deepEqual(transport.methods, ['postDeferredResponse', 'editInitialResponse']);
    assert.deepEqual(transport.calls[1]?.args, [{ content: 'hello' }, null]);
    assert.equal(machine.deferred, true);
    assert.equal(machine.responded, true);
});

test('update routes fresh to the components callback and deferred to the host message', async () => {
    const target = { channelId: '10', messageId: '20' };

    const fresh = createMachine();
    assert.equal(await fresh.machine.update(plain, target), null);
    assert.deepEqual(fresh.transport.methods, ['postInitialComponentsResponse']);
    assert.equal(fresh.machine.responded, true);

    const deferred = createMachine();
    await deferred.machine.defer(InteractionResponseType.DeferredMessageUpdate);
    await deferred.machine.update(plain, target);
    assert.deepEqual(deferred.transport.calls[1], {
        method: 'editMessage',
        args: ['10', '20', { content: 'hello' }, null]
    });
});

test('a failed call leaves the flags untouched', async () => {
    const { transport, machine } = createMachine();
    const failure = new Error('Unknown interaction');
    transport.failOn('postInitialResponse', failure);

    await assert.rejects(machine.respond(plain), (error: unknown) => error === failure);
    assert.equal(machine.phase, 'fresh');
    assert.deepEqual(transport.methods, ['postInitialResponse']);
});

test('flags set by a successful defer survive a failed follow-on call', async () => {
    const { transport, machine } = createMachine();
    transport.failOn('editInitialResponse', new Error('Invalid Form Body'));
    const form = new FormData();

    await assert.rejects(machine.respond({ payload: { content: 'file' }, form }), /Invalid Form Body/);
    assert.deepEqual(transport.methods, ['postDeferredResponse', 'editInitialResponse']);
    assert.equal(machine.deferred, true);
    assert.equal(machine.responded, false);
});

test('edit and delete target the original or a follow-up by id', async () => {
    const { transport, machine } = createMachine();

    await machine.edit('@original', plain);
    await machine.edit('555', plain);
    await machine.delete('@original');
    await machine.delete('555');

    assert.deepEqual(transport.calls, [
        { method: 'editInitialResponse', args: [{ content: 'hello' }, null] },
        { method: 'editFollowup', args: ['555', { content: 'hello' }, null] },
        { method: 'deleteInitialResponse', args: [] },
        { method: 'deleteFollowup', args: ['555'] }
    ]);
    assert.equal(machine.phase, 'fresh');
});
