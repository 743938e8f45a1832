/**
 * @description: Validates caller-facing message options and turns them into a wire payload plus attachments.
 * @scope: core
 * @module: MessageOptions
 * @risk: moderate - Exclusivity checks must run before anything reaches the network.
 */

import type { APIAllowedMentions, APIEmbed } from 'discord.js';
import { InvalidArgumentError } from '../errors.js';
import { resolveAllowedMentions } from './allowedMentions.js';
import type { InteractionAttachment } from './attachments.js';
import { buildResponsePayload } from './payloadBuilder.js';
import type { MessageComponentRow, ResponsePayload } from './payloadBuilder.js';

/**
 * Anything that serializes itself, such as discord.js builders.
 */
export interface JSONEncodable<T> {
  toJSON(): T;
}

export type EmbedLike = APIEmbed | JSONEncodable<APIEmbed>;
export type ComponentRowLike = MessageComponentRow | JSONEncodable<MessageComponentRow>;

export interface MessageContentOptions {
  content?: string | null;
  embed?: EmbedLike;
  embeds?: EmbedLike[];
  file?: InteractionAttachment;
  files?: InteractionAttachment[];
  allowedMentions?: APIAllowedMentions;
  components?: ComponentRowLike[];
}

export interface InteractionSendOptions extends MessageContentOptions {
  tts?: boolean;
  /** Only the invoking user sees the message. */
  hidden?: boolean;
}

export interface InteractionUpdateOptions extends MessageContentOptions {
  tts?: boolean;
}

export type InteractionEditOptions = MessageContentOptions;

export interface NormalizationDefaults {
  allowedMentions?: APIAllowedMentions;
}

export interface NormalizedMessage {
  payload: ResponsePayload;
  attachments: InteractionAttachment[];
}

function isJSONEncodable<T>(value: T | JSONEncodable<T>): value is JSONEncodable<T> {
  const candidate: unknown = value;
  return typeof candidate === 'object'
    && candidate !== null
    && 'toJSON' in candidate
    && typeof candidate.toJSON === 'function';
}

const encode = <T>(value: T | JSONEncodable<T>): T => (isJSONEncodable(value) ? value.toJSON() : value);

/**
 * Every attachment referenced by the options, whether or not they are valid
 * together. Used to release them on every path.
 */
export function collectAttachments(options: MessageContentOptions): InteractionAttachment[] {
  return [
    ...(options.file ? [options.file] : []),
    ...(options.files ?? [])
  ];
}

export function assertExclusiveFields(options: MessageContentOptions): void {
  if (options.file !== undefined && options.files !== undefined) {
    throw new InvalidArgumentError('Cannot pass both file and files');
  }
  if (options.embed !== undefined && options.embeds !== undefined) {
    throw new InvalidArgumentError('Cannot pass both embed and embeds');
  }
}

export function normalizeMessageOptions(
  options: InteractionSendOptions,
  defaults: NormalizationDefaults = {}
): NormalizedMessage {
  assertExclusiveFields(options);

  const embedList = options.embed !== undefined ? [options.embed] : options.embeds;
  const payload = buildResponsePayload({
    content: options.content,
    tts: options.tts,
    embeds: embedList?.map((embed) => encode<APIEmbed>(embed)),
    hidden: options.hidden,
    allowedMentions: resolveAllowedMentions(defaults.allowedMentions, options.allowedMentions),
    components: options.components?.map((row) => encode<MessageComponentRow>(row))
  });

  return { payload, attachments: collectAttachments(options) };
}
