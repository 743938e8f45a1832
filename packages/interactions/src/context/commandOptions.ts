/**
 * @description: Decodes slash command options into a tagged union once, at parse time.
 * @scope: core
 * @module: CommandOptions
 * @risk: moderate - Handlers rely on the tag to know the runtime type of each value.
 */

import { ApplicationCommandOptionType } from 'discord.js';
import type { InteractionStateCache } from '../state/StateCache.js';
import type {
  RawAttachment,
  RawChannel,
  RawCommandOption,
  RawGuildMember,
  RawResolvedData,
  RawRole,
  RawUser
} from '../types.js';

export type CommandOptionValue =
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'user'; id: string; user: RawUser | null; member: RawGuildMember | null }
  | { kind: 'channel'; id: string; channel: RawChannel | null }
  | { kind: 'role'; id: string; role: RawRole | null }
  | { kind: 'mentionable'; id: string }
  | { kind: 'attachment'; id: string; attachment: RawAttachment | null }
  | { kind: 'subcommand'; name: string; options: CommandOptions }
  | { kind: 'subcommand-group'; name: string; options: CommandOptions }
  | { kind: 'raw'; type: number; value: unknown };

export type CommandOptionKind = CommandOptionValue['kind'];

export type CommandOptions = Readonly<Record<string, CommandOptionValue>>;

export interface OptionResolutionContext {
  guildId: string | null;
  resolved?: RawResolvedData;
  cache: InteractionStateCache;
}

const raw = (option: RawCommandOption): CommandOptionValue => ({ kind: 'raw', type: option.type, value: option.value });

const snowflakeOf = (option: RawCommandOption): string | null => {
  if (typeof option.value === 'string' && option.value.length > 0) {
    return option.value;
  }
  if (typeof option.value === 'number' && Number.isSafeInteger(option.value)) {
    return String(option.value);
  }
  return null;
};

function decodeOption(option: RawCommandOption, context: OptionResolutionContext): CommandOptionValue {
  const { value } = option;
  const { guildId, resolved, cache } = context;

  switch (option.type) {
    case ApplicationCommandOptionType.Subcommand:
      return { kind: 'subcommand', name: option.name, options: decodeCommandOptions(option.options, context) };
    case ApplicationCommandOptionType.SubcommandGroup:
      return { kind: 'subcommand-group', name: option.name, options: decodeCommandOptions(option.options, context) };
    case ApplicationCommandOptionType.String:
      return typeof value === 'string' ? { kind: 'string', value } : raw(option);
    case ApplicationCommandOptionType.Integer:
      return typeof value === 'number' && Number.isInteger(value) ? { kind: 'integer', value } : raw(option);
    case ApplicationCommandOptionType.Boolean:
      return typeof value === 'boolean' ? { kind: 'boolean', value } : raw(option);
    case ApplicationCommandOptionType.Number: {
      const parsed = typeof value === 'string' ? Number(value) : value;
      return typeof parsed === 'number' && Number.isFinite(parsed) ? { kind: 'number', value: parsed } : raw(option);
    }
    case ApplicationCommandOptionType.User: {
      const id = snowflakeOf(option);
      if (!id) {
        return raw(option);
      }
      const member = resolved?.members?.[id] ?? (guildId ? cache.getMember(guildId, id) : undefined);
      const user = resolved?.users?.[id] ?? member?.user ?? cache.getUser(id);
      return { kind: 'user', id, user: user ?? null, member: member ?? null };
    }
    case ApplicationCommandOptionType.Channel: {
      const id = snowflakeOf(option);
      return id ? { kind: 'channel', id, channel: resolved?.channels?.[id] ?? cache.getChannel(id) ?? null } : raw(option);
    }
    case ApplicationCommandOptionType.Role: {
      const id = snowflakeOf(option);
      if (!id) {
        return raw(option);
      }
      const role = resolved?.roles?.[id] ?? (guildId ? cache.getRole(guildId, id) : undefined);
      return { kind: 'role', id, role: role ?? null };
    }
    case ApplicationCommandOptionType.Mentionable: {
      const id = snowflakeOf(option);
      return id ? { kind: 'mentionable', id } : raw(option);
    }
    case ApplicationCommandOptionType.Attachment: {
      const id = snowflakeOf(option);
      return id ? { kind: 'attachment', id, attachment: resolved?.attachments?.[id] ?? null } : raw(option);
    }
    default:
      return raw(option);
  }
}

/**
 * Decodes an options array into a name-keyed record. When Discord repeats a
 * name, the first occurrence is kept.
 */
export function decodeCommandOptions(
  options: readonly RawCommandOption[] | undefined,
  context: OptionResolutionContext
): CommandOptions {
  const decoded = new Map<string, CommandOptionValue>();
  for (const option of options ?? []) {
    if (!decoded.has(option.name)) {
      decoded.set(option.name, decodeOption(option, context));
    }
  }
  return Object.fromEntries(decoded);
}

/**
 * Renders an option the way a user would have typed it.
 */
export function describeOption(option: CommandOptionValue): string {
  switch (option.kind) {
    case 'string':
    case 'integer':
    case 'boolean':
    case 'number':
      return String(option.value);
    case 'user':
      return `<@${option.id}>`;
    case 'channel':
      return `<#${option.id}>`;
    case 'role':
      return `<@&${option.id}>`;
    case 'mentionable':
      return option.id;
    case 'attachment':
      return option.attachment?.filename || option.id;
    case 'subcommand':
    case 'subcommand-group':
      return [option.name, ...Object.values(option.options).map(describeOption)].join(' ');
    case 'raw':
      return String(option.value ?? '');
  }
}
