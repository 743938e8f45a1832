/**
 * @description: Shapes of the inbound interaction payload as delivered by Discord.
 * @scope: interface
 * @module: InteractionPayloadTypes
 * @risk: low - Only the fields the toolkit reads are modelled.
 */

import type { APIAttachment, APIGuild, APIRole, APIUser } from 'discord.js';

export type RawUser = Pick<APIUser, 'id' | 'username'>
  & Partial<Pick<APIUser, 'discriminator' | 'global_name' | 'avatar' | 'bot'>>;

export interface RawGuildMember {
  user?: RawUser;
  nick?: string | null;
  roles: string[];
  /** Computed permission bitfield, serialized as a decimal string. */
  permissions?: string;
  joined_at?: string;
}

/** `permissions` is the bitfield serialized as a decimal string. */
export type RawRole = Pick<APIRole, 'id' | 'name' | 'permissions'>;

export interface RawChannel {
  id: string;
  type: number;
  name?: string | null;
  guild_id?: string;
}

export type RawGuild = Pick<APIGuild, 'id' | 'name'> & Partial<Pick<APIGuild, 'owner_id'>>;

export type RawAttachment = Pick<APIAttachment, 'id' | 'filename'>
  & Partial<Pick<APIAttachment, 'url' | 'size' | 'content_type'>>;

export interface RawMessage {
  id: string;
  channel_id: string;
  content?: string;
  flags?: number;
  author?: RawUser;
  embeds?: unknown[];
  components?: unknown[];
  attachments?: RawAttachment[];
  timestamp?: string;
}

export interface RawCommandOption {
  name: string;
  type: number;
  value?: string | number | boolean;
  options?: RawCommandOption[];
  focused?: boolean;
}

export interface RawResolvedData {
  users?: Record<string, RawUser>;
  members?: Record<string, RawGuildMember>;
  roles?: Record<string, RawRole>;
  channels?: Record<string, RawChannel>;
  attachments?: Record<string, RawAttachment>;
}

export interface RawCommandData {
  id?: string;
  name: string;
  type?: number;
  options?: RawCommandOption[];
  resolved?: RawResolvedData;
}

export interface RawComponentData {
  custom_id: string;
  component_type: number;
  values?: string[];
}

/**
 * Fields shared by every interaction type.
 */
export interface InteractionPayload {
  id: string;
  application_id: string;
  type: number;
  token: string;
  version?: number;
  guild_id?: string;
  channel_id?: string;
  member?: RawGuildMember;
  user?: RawUser;
  locale?: string;
  guild_locale?: string;
}

export interface CommandInteractionPayload extends InteractionPayload {
  data: RawCommandData;
}

export interface ComponentInteractionPayload extends InteractionPayload {
  data: RawComponentData;
  message: RawMessage;
}

export type AnyInteractionPayload =
  | InteractionPayload
  | CommandInteractionPayload
  | ComponentInteractionPayload;
