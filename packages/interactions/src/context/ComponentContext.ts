/**
 * @description: Context for a message component click, able to rewrite the message hosting the component.
 * @scope: core
 * @module: ComponentContext
 * @risk: high - Updates target an existing message; the wrong route posts a new one instead.
 */

import { ComponentType, InteractionResponseType } from 'discord.js';
import { InteractionMessage } from '../message/InteractionMessage.js';
import type { InteractionUpdateOptions } from '../payload/messageOptions.js';
import type { ComponentInteractionPayload } from '../types.js';
import { InteractionContext } from './InteractionContext.js';
import type { DeferOptions, InteractionContextDependencies } from './InteractionContext.js';

const SELECT_MENU_TYPES: ReadonlySet<number> = new Set<number>([
  ComponentType.StringSelect,
  ComponentType.UserSelect,
  ComponentType.RoleSelect,
  ComponentType.MentionableSelect,
  ComponentType.ChannelSelect
]);

export class ComponentContext extends InteractionContext {
  readonly customId: string;
  readonly componentType: number;
  /** Selected values for select menus; empty for every other component. */
  readonly values: readonly string[];
  /** Snapshot of the message hosting the component at click time. */
  readonly message: InteractionMessage;

  constructor(payload: ComponentInteractionPayload, dependencies: InteractionContextDependencies) {
    super(payload, dependencies);
    this.customId = payload.data.custom_id;
    this.componentType = payload.data.component_type;
    this.values = SELECT_MENU_TYPES.has(this.componentType) ? [...(payload.data.values ?? [])] : [];
    this.message = new InteractionMessage(payload.message);
  }

  get isSelectMenu(): boolean {
    return SELECT_MENU_TYPES.has(this.componentType);
  }

  /**
   * Acknowledges the click without sending a message; a later `update`
   * edits the hosting message.
   */
  async deferUpdate(options: DeferOptions = {}): Promise<void> {
    await this.responder.defer(InteractionResponseType.DeferredMessageUpdate, options.hidden ?? false);
  }

  /**
   * Rewrites the hosting message the first time, posts a follow-up afterwards.
   * Resolves with null when Discord answered the update callback without a
   * message body.
   */
  async update(input: string | InteractionUpdateOptions): Promise<InteractionMessage | null> {
    const options: InteractionUpdateOptions = typeof input === 'string' ? { content: input } : input;
    const raw = await this.withOutboundMessage(options, (message) =>
      this.responder.update(message, { channelId: this.message.channelId, messageId: this.message.id })
    );
    return raw === null ? null : InteractionMessage.fromResponse(raw);
  }
}
