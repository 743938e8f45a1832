/**
 * @module: InteractionContext
 * @scope: core
 * @risk: high
 *
 * @description
 * Materializes one inbound interaction into an addressable object (origin,
 * invoker, identity) and exposes the only operations a handler may perform on
 * it: defer, send, edit and delete. Each operation validates its options,
 * packs attachments, and lets the response state machine pick the call.
 *
 * @impact
 * Attachments passed to an operation are always closed when the operation
 * settles, including when validation fails before any call is made.
 */

import { InteractionResponseType, SnowflakeUtil } from 'discord.js';
import type { APIAllowedMentions } from 'discord.js';
import { ORIGINAL_RESPONSE } from '../http/InteractionTransport.js';
import type { InteractionTransportFactory } from '../http/InteractionTransport.js';
import { InteractionMessage } from '../message/InteractionMessage.js';
import { packageAttachments, withAttachments } from '../payload/attachments.js';
import { collectAttachments, normalizeMessageOptions } from '../payload/messageOptions.js';
import type { InteractionEditOptions, InteractionSendOptions, MessageContentOptions } from '../payload/messageOptions.js';
import { ResponseStateMachine } from '../state/ResponseStateMachine.js';
import type { OutboundMessage, ResponsePhase } from '../state/ResponseStateMachine.js';
import type { InteractionStateCache } from '../state/StateCache.js';
import type { InteractionPayload, RawChannel, RawGuild, RawUser } from '../types.js';

export interface InteractionContextDependencies {
  transportFactory: InteractionTransportFactory;
  cache: InteractionStateCache;
  defaultAllowedMentions?: APIAllowedMentions;
}

export type InteractionInvoker =
  | {
      kind: 'member';
      guildId: string;
      user: RawUser;
      nick: string | null;
      roleIds: readonly string[];
      /** Permission bitfield computed by Discord for the invoking channel. */
      permissions: bigint | null;
    }
  | { kind: 'user'; user: RawUser };

export interface DeferOptions {
  hidden?: boolean;
}

const parsePermissions = (value: string | undefined): bigint | null => {
  if (!value || !/^\d+$/.test(value)) {
    return null;
  }
  return BigInt(value);
};

function resolveInvoker(payload: InteractionPayload): InteractionInvoker {
  const member = payload.member;
  if (payload.guild_id && member?.user) {
    return {
      kind: 'member',
      guildId: payload.guild_id,
      user: member.user,
      nick: member.nick ?? null,
      roleIds: [...member.roles],
      permissions: parsePermissions(member.permissions)
    };
  }

  const user = payload.user ?? member?.user;
  if (!user) {
    // parseInteractionPayload rejects this shape; reaching here means the
    // payload was built by hand.
    throw new TypeError('Interaction payload carries no invoking user');
  }
  return { kind: 'user', user };
}

export class InteractionContext {
  readonly id: string;
  readonly applicationId: string;
  readonly token: string;
  readonly type: number;
  readonly version: number | null;
  readonly createdAt: Date;
  readonly guildId: string | null;
  readonly channelId: string | null;
  readonly guild: RawGuild | null;
  readonly channel: RawChannel | null;
  readonly author: InteractionInvoker;
  readonly locale: string | null;

  protected readonly cache: InteractionStateCache;
  protected readonly responder: ResponseStateMachine;
  private readonly defaultAllowedMentions?: APIAllowedMentions;

  constructor(payload: InteractionPayload, dependencies: InteractionContextDependencies) {
    this.id = payload.id;
    this.applicationId = payload.application_id;
    this.token = payload.token;
    this.type = payload.type;
    this.version = payload.version ?? null;
    this.createdAt = new Date(SnowflakeUtil.timestampFrom(payload.id));
    this.locale = payload.locale ?? null;

    this.cache = dependencies.cache;
    this.defaultAllowedMentions = dependencies.defaultAllowedMentions;

    this.guildId = payload.guild_id ?? null;
    this.channelId = payload.channel_id ?? null;
    this.guild = this.guildId ? dependencies.cache.getGuild(this.guildId) ?? null : null;
    this.channel = this.channelId ? dependencies.cache.getChannel(this.channelId) ?? null : null;
    this.author = resolveInvoker(payload);

    const transport = dependencies.transportFactory({
      interactionId: payload.id,
      token: payload.token,
      applicationId: payload.application_id
    });
    this.responder = new ResponseStateMachine(transport, `interaction ${payload.id}`);
  }

  /** True once a deferred acknowledgement was accepted by Discord. */
  get deferred(): boolean {
    return this.responder.deferred;
  }

  /** True once the initial response (or its deferred edit) was accepted. */
  get responded(): boolean {
    return this.responder.responded;
  }

  get phase(): ResponsePhase {
    return this.responder.phase;
  }

  async defer(options: DeferOptions = {}): Promise<void> {
    await this.responder.defer(InteractionResponseType.DeferredChannelMessageWithSource, options.hidden ?? false);
  }

  /**
   * Sends the initial response the first time, a follow-up afterwards.
   */
  async send(input: string | InteractionSendOptions): Promise<InteractionMessage> {
    const options: InteractionSendOptions = typeof input === 'string' ? { content: input } : input;
    const raw = await this.withOutboundMessage(options, (message) =>
      this.responder.respond(message, options.hidden ?? false)
    );
    return InteractionMessage.fromResponse(raw);
  }

  /**
   * Edits the original response, or the follow-up with the given id.
   */
  async edit(input: string | InteractionEditOptions, messageId: string = ORIGINAL_RESPONSE): Promise<InteractionMessage> {
    const options: InteractionEditOptions = typeof input === 'string' ? { content: input } : input;
    const raw = await this.withOutboundMessage(options, (message) => this.responder.edit(messageId, message));
    return InteractionMessage.fromResponse(raw);
  }

  async delete(messageId: string = ORIGINAL_RESPONSE): Promise<void> {
    await this.responder.delete(messageId);
  }

  /**
   * Validates and packs the options, then hands the outbound message to
   * `dispatch`. Attachments are released when it settles.
   */
  protected async withOutboundMessage<T>(
    options: MessageContentOptions & Pick<InteractionSendOptions, 'tts' | 'hidden'>,
    dispatch: (message: OutboundMessage) => Promise<T>
  ): Promise<T> {
    return withAttachments(collectAttachments(options), async () => {
      const { payload, attachments } = normalizeMessageOptions(options, {
        allowedMentions: this.defaultAllowedMentions
      });
      const form = await packageAttachments(attachments, payload);
      return dispatch({ payload, form });
    });
  }
}
