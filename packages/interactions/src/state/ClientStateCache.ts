/**
 * @description: Reads the caches of a logged-in discord.js client.
 * @scope: interface
 * @module: ClientStateCache
 * @risk: low - Read-only view; nothing is fetched from the API.
 */

import type { Client, GuildMember, User } from 'discord.js';
import type { RawChannel, RawGuild, RawGuildMember, RawRole, RawUser } from '../types.js';
import type { InteractionStateCache } from './StateCache.js';

const toRawUser = (user: User): RawUser => ({
  id: user.id,
  username: user.username,
  discriminator: user.discriminator,
  global_name: user.globalName,
  avatar: user.avatar,
  bot: user.bot
});

const toRawMember = (member: GuildMember): RawGuildMember => ({
  user: toRawUser(member.user),
  nick: member.nickname,
  roles: [...member.roles.cache.keys()],
  permissions: member.permissions.bitfield.toString()
});

export class ClientStateCache implements InteractionStateCache {
  constructor(private readonly client: Client) {}

  getGuild(guildId: string): RawGuild | undefined {
    const guild = this.client.guilds.cache.get(guildId);
    return guild ? { id: guild.id, name: guild.name, owner_id: guild.ownerId } : undefined;
  }

  getChannel(channelId: string): RawChannel | undefined {
    const channel = this.client.channels.cache.get(channelId);
    if (!channel) {
      return undefined;
    }
    return {
      id: channel.id,
      type: channel.type,
      name: 'name' in channel ? channel.name : null,
      guild_id: 'guildId' in channel && channel.guildId ? channel.guildId : undefined
    };
  }

  getUser(userId: string): RawUser | undefined {
    const user = this.client.users.cache.get(userId);
    return user ? toRawUser(user) : undefined;
  }

  getMember(guildId: string, userId: string): RawGuildMember | undefined {
    const member = this.client.guilds.cache.get(guildId)?.members.cache.get(userId);
    return member ? toRawMember(member) : undefined;
  }

  getRole(guildId: string, roleId: string): RawRole | undefined {
    const role = this.client.guilds.cache.get(guildId)?.roles.cache.get(roleId);
    return role ? { id: role.id, name: role.name, permissions: role.permissions.bitfield.toString() } : undefined;
  }
}
