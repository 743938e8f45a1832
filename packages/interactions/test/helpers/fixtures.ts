/**
 * @description: Builders for inbound interaction payloads used across the test suites.
 * @scope: test
 * @module: InteractionFixtures
 */
import { ComponentType, InteractionType } from 'discord.js';

export const APPLICATION_ID = '1180000000000000100';
export const INTERACTION_ID = '1180000000000000200';
export const GUILD_ID = '1180000000000000300';
export const CHANNEL_ID = '1180000000000000400';
export const USER_ID = '1180000000000000500';
export const HOST_MESSAGE_ID = '1180000000000000600';
export const ORIGINAL_MESSAGE_ID = '1180000000000000700';
export const TOKEN = 'test-interaction-token';

export const testUser = { id: USER_ID, username: 'tester' };

type RawPayload = Record<string, unknown>;

export function basePayload(overrides: RawPayload = {}): RawPayload {
    return {
        id: INTERACTION_ID,
        application_id: APPLICATION_ID,
        token: TOKEN,
        version: 1,
        type: InteractionType.Ping,
        guild_id: GUILD_ID,
        channel_id: CHANNEL_ID,
        member: { user: testUser, nick: null, roles: [], permissions: '0' },
        locale: 'en-US',
        ...overrides
    };
}

export function slashPayload(name: string, options: unknown[] = [], overrides: RawPayload = {}): RawPayload {
    return basePayload({
        type: InteractionType.ApplicationCommand,
        data: { id: '1180000000000000900', name, type: 1, options },
        ...overrides
    });
}

export function componentPayload(customId: string, overrides: RawPayload = {}): RawPayload {
    return basePayload({
        type: InteractionType.MessageComponent,
        data: { custom_id: customId, component_type: ComponentType.Button },
        message: { id: HOST_MESSAGE_ID, channel_id: CHANNEL_ID, content: 'Pick one' },
        ...overrides
    });
}
