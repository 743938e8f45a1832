/**
 * @description: Read-only view of a message returned by an interaction response call.
 * @scope: interface
 * @module: InteractionMessage
 * @risk: low - Only fields present in the response are exposed.
 */

import { MessageFlags, SnowflakeUtil } from 'discord.js';
import { parseMessage } from '../context/parsePayload.js';
import type { RawAttachment, RawMessage, RawUser } from '../types.js';

export class InteractionMessage {
  readonly id: string;
  readonly channelId: string;
  readonly content: string;
  readonly flags: number;
  readonly author: RawUser | null;
  readonly embeds: readonly unknown[];
  readonly components: readonly unknown[];
  readonly attachments: readonly RawAttachment[];

  constructor(data: RawMessage) {
    this.id = data.id;
    this.channelId = data.channel_id;
    this.content = data.content ?? '';
    this.flags = data.flags ?? 0;
    this.author = data.author ?? null;
    this.embeds = data.embeds ?? [];
    this.components = data.components ?? [];
    this.attachments = data.attachments ?? [];
  }

  /**
   * Validates a response body returned by the REST client.
   */
  static fromResponse(raw: unknown): InteractionMessage {
    return new InteractionMessage(parseMessage(raw, ''));
  }

  get createdAt(): Date {
    return new Date(SnowflakeUtil.timestampFrom(this.id));
  }

  get ephemeral(): boolean {
    return (this.flags & MessageFlags.Ephemeral) === MessageFlags.Ephemeral;
  }
}
