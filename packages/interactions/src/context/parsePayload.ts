/**
 * @description: Validates raw interaction JSON into the typed payload shapes the contexts consume.
 * @scope: core
 * @module: InteractionPayloadParser
 * @risk: moderate - A lenient parser would let malformed payloads reach the response state machine.
 */

import { InteractionType } from 'discord.js';
import { InteractionPayloadError } from '../errors.js';
import type {
  CommandInteractionPayload,
  ComponentInteractionPayload,
  InteractionPayload,
  RawAttachment,
  RawChannel,
  RawCommandData,
  RawCommandOption,
  RawComponentData,
  RawGuildMember,
  RawMessage,
  RawResolvedData,
  RawRole,
  RawUser
} from '../types.js';

export type ParsedInteraction =
  | { kind: 'command'; payload: CommandInteractionPayload }
  | { kind: 'component'; payload: ComponentInteractionPayload }
  | { kind: 'other'; payload: InteractionPayload };

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

const optionalNullableString = (value: unknown): string | null | undefined => {
  if (value === null) {
    return null;
  }
  return optionalString(value);
};

function requireString(source: Record<string, unknown>, field: string, path: string): string {
  const value = source[field];
  // Snowflakes occasionally arrive as numbers from hand-written fixtures.
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return String(value);
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new InteractionPayloadError(`Interaction payload is missing ${path}${field}`, `${path}${field}`);
  }
  return value;
}

function requireNumber(source: Record<string, unknown>, field: string, path: string): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InteractionPayloadError(`Interaction payload is missing ${path}${field}`, `${path}${field}`);
  }
  return value;
}

function requireRecord(source: Record<string, unknown>, field: string, path: string): Record<string, unknown> {
  const value = source[field];
  if (!isRecord(value)) {
    throw new InteractionPayloadError(`Interaction payload is missing ${path}${field}`, `${path}${field}`);
  }
  return value;
}

export function parseUser(raw: unknown, path = 'user.'): RawUser {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Interaction payload has a malformed ${path.slice(0, -1)}`, path.slice(0, -1));
  }

  return {
    id: requireString(raw, 'id', path),
    username: optionalString(raw.username) ?? '',
    discriminator: optionalString(raw.discriminator),
    global_name: optionalNullableString(raw.global_name),
    avatar: optionalNullableString(raw.avatar),
    bot: typeof raw.bot === 'boolean' ? raw.bot : undefined
  };
}

export function parseMember(raw: unknown, path = 'member.'): RawGuildMember {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Interaction payload has a malformed ${path.slice(0, -1)}`, path.slice(0, -1));
  }

  const roles = Array.isArray(raw.roles)
    ? raw.roles.filter((role): role is string => typeof role === 'string')
    : [];

  return {
    user: raw.user === undefined ? undefined : parseUser(raw.user, `${path}user.`),
    nick: optionalNullableString(raw.nick),
    roles,
    permissions: optionalString(raw.permissions),
    joined_at: optionalString(raw.joined_at)
  };
}

function parseRole(raw: unknown, path: string): RawRole {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Interaction payload has a malformed ${path}`, path);
  }
  return {
    id: requireString(raw, 'id', `${path}.`),
    name: optionalString(raw.name) ?? '',
    permissions: optionalString(raw.permissions) ?? '0'
  };
}

function parseChannel(raw: unknown, path: string): RawChannel {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Interaction payload has a malformed ${path}`, path);
  }
  return {
    id: requireString(raw, 'id', `${path}.`),
    type: typeof raw.type === 'number' ? raw.type : -1,
    name: optionalNullableString(raw.name),
    guild_id: optionalString(raw.guild_id)
  };
}

function parseAttachment(raw: unknown, path: string): RawAttachment {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Interaction payload has a malformed ${path}`, path);
  }
  return {
    id: requireString(raw, 'id', `${path}.`),
    filename: optionalString(raw.filename) ?? '',
    url: optionalString(raw.url),
    size: typeof raw.size === 'number' ? raw.size : undefined,
    content_type: optionalString(raw.content_type)
  };
}

function parseEntries<T>(raw: unknown, path: string, parse: (entry: unknown, entryPath: string) => T): Record<string, T> | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const parsed: Record<string, T> = {};
  for (const [key, entry] of Object.entries(raw)) {
    parsed[key] = parse(entry, `${path}.${key}`);
  }
  return parsed;
}

function parseResolved(raw: unknown): RawResolvedData | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  return {
    users: parseEntries(raw.users, 'data.resolved.users', (entry, path) => parseUser(entry, `${path}.`)),
    members: parseEntries(raw.members, 'data.resolved.members', (entry, path) => parseMember(entry, `${path}.`)),
    roles: parseEntries(raw.roles, 'data.resolved.roles', parseRole),
    channels: parseEntries(raw.channels, 'data.resolved.channels', parseChannel),
    attachments: parseEntries(raw.attachments, 'data.resolved.attachments', parseAttachment)
  };
}

function parseOption(raw: unknown, path: string): RawCommandOption {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Interaction payload has a malformed ${path}`, path);
  }

  const value = raw.value;
  return {
    name: requireString(raw, 'name', `${path}.`),
    type: requireNumber(raw, 'type', `${path}.`),
    value: typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' ? value : undefined,
    options: Array.isArray(raw.options)
      ? raw.options.map((child, index) => parseOption(child, `${path}.options[${index}]`))
      : undefined,
    focused: typeof raw.focused === 'boolean' ? raw.focused : undefined
  };
}

function parseCommandData(raw: Record<string, unknown>): RawCommandData {
  const data = requireRecord(raw, 'data', '');
  return {
    id: optionalString(data.id),
    name: requireString(data, 'name', 'data.'),
    type: typeof data.type === 'number' ? data.type : undefined,
    options: Array.isArray(data.options)
      ? data.options.map((option, index) => parseOption(option, `data.options[${index}]`))
      : undefined,
    resolved: parseResolved(data.resolved)
  };
}

function parseComponentData(raw: Record<string, unknown>): RawComponentData {
  const data = requireRecord(raw, 'data', '');
  return {
    custom_id: requireString(data, 'custom_id', 'data.'),
    component_type: requireNumber(data, 'component_type', 'data.'),
    values: Array.isArray(data.values)
      ? data.values.filter((value): value is string => typeof value === 'string')
      : undefined
  };
}

/**
 * Validates a message object, either the component host snapshot or a message
 * returned by the REST API.
 */
export function parseMessage(raw: unknown, path = 'message.'): RawMessage {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError(`Expected a message object at ${path.slice(0, -1) || 'root'}`, path.slice(0, -1));
  }

  return {
    id: requireString(raw, 'id', path),
    channel_id: requireString(raw, 'channel_id', path),
    content: optionalString(raw.content),
    flags: typeof raw.flags === 'number' ? raw.flags : undefined,
    author: raw.author === undefined ? undefined : parseUser(raw.author, `${path}author.`),
    embeds: Array.isArray(raw.embeds) ? raw.embeds : undefined,
    components: Array.isArray(raw.components) ? raw.components : undefined,
    attachments: Array.isArray(raw.attachments)
      ? raw.attachments.map((attachment, index) => parseAttachment(attachment, `${path}attachments[${index}]`))
      : undefined,
    timestamp: optionalString(raw.timestamp)
  };
}

function parseBase(raw: Record<string, unknown>): InteractionPayload {
  const payload: InteractionPayload = {
    id: requireString(raw, 'id', ''),
    application_id: requireString(raw, 'application_id', ''),
    type: requireNumber(raw, 'type', ''),
    token: requireString(raw, 'token', ''),
    version: typeof raw.version === 'number' ? raw.version : undefined,
    guild_id: optionalString(raw.guild_id),
    channel_id: optionalString(raw.channel_id),
    member: raw.member === undefined ? undefined : parseMember(raw.member),
    user: raw.user === undefined ? undefined : parseUser(raw.user),
    locale: optionalString(raw.locale),
    guild_locale: optionalString(raw.guild_locale)
  };

  if (!payload.member?.user && !payload.user) {
    throw new InteractionPayloadError('Interaction payload carries neither member.user nor user', 'user');
  }

  return payload;
}

/**
 * Parses a raw interaction body and tags it with the context variant that
 * should handle it.
 */
export function parseInteractionPayload(raw: unknown): ParsedInteraction {
  if (!isRecord(raw)) {
    throw new InteractionPayloadError('Interaction payload must be a JSON object', 'root');
  }

  const base = parseBase(raw);

  switch (base.type) {
    case InteractionType.ApplicationCommand:
      return { kind: 'command', payload: { ...base, data: parseCommandData(raw) } };
    case InteractionType.MessageComponent:
      return {
        kind: 'component',
        payload: { ...base, data: parseComponentData(raw), message: parseMessage(raw.message) }
      };
    default:
      return { kind: 'other', payload: base };
  }
}
