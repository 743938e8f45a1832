/**
 * @description: Builds the minimal JSON body sent with every interaction response call.
 * @scope: core
 * @module: PayloadBuilder
 * @risk: moderate - Extra keys (even null ones) change how Discord edits an existing message.
 */

import { MessageFlags } from 'discord.js';
import type { APIActionRowComponent, APIAllowedMentions, APIEmbed, APIMessageActionRowComponent } from 'discord.js';

export type MessageComponentRow = APIActionRowComponent<APIMessageActionRowComponent>;

export interface ResponsePayloadFields {
  content?: string | null;
  tts?: boolean;
  embeds?: APIEmbed[] | null;
  hidden?: boolean;
  allowedMentions?: APIAllowedMentions | null;
  components?: MessageComponentRow[] | null;
}

/**
 * Wire shape of a message body. Every key is optional: only supplied fields
 * are ever present.
 */
export interface ResponsePayload {
  content?: string;
  tts?: boolean;
  embeds?: APIEmbed[];
  allowed_mentions?: APIAllowedMentions;
  flags?: number;
  components?: MessageComponentRow[];
}

/**
 * Copies each supplied field onto the payload, skipping empty values: an empty
 * string, `false`, an empty list or an empty allowed-mentions object is
 * treated the same as a field that was never passed.
 */
export function buildResponsePayload(fields: ResponsePayloadFields): ResponsePayload {
  const payload: ResponsePayload = {};

  if (fields.content) {
    payload.content = fields.content;
  }
  if (fields.tts) {
    payload.tts = true;
  }
  if (fields.embeds && fields.embeds.length > 0) {
    payload.embeds = fields.embeds;
  }
  if (fields.allowedMentions && Object.keys(fields.allowedMentions).length > 0) {
    payload.allowed_mentions = fields.allowedMentions;
  }
  if (fields.hidden) {
    payload.flags = MessageFlags.Ephemeral;
  }
  if (fields.components && fields.components.length > 0) {
    payload.components = fields.components;
  }

  return payload;
}
