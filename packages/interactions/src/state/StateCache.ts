/**
 * @description: Lookup of guilds, channels, users, members and roles known to the running bot.
 * @scope: interface
 * @module: InteractionStateCache
 * @risk: low - A cache miss only means a reference resolves to its bare id.
 */

import type { RawChannel, RawGuild, RawGuildMember, RawRole, RawUser } from '../types.js';

export interface InteractionStateCache {
  getGuild(guildId: string): RawGuild | undefined;
  getChannel(channelId: string): RawChannel | undefined;
  getUser(userId: string): RawUser | undefined;
  getMember(guildId: string, userId: string): RawGuildMember | undefined;
  getRole(guildId: string, roleId: string): RawRole | undefined;
}

/**
 * Map-backed cache for processes without a gateway connection, and for tests.
 */
export class MemoryStateCache implements InteractionStateCache {
  private readonly guilds = new Map<string, RawGuild>();
  private readonly channels = new Map<string, RawChannel>();
  private readonly users = new Map<string, RawUser>();
  private readonly members = new Map<string, RawGuildMember>();
  private readonly roles = new Map<string, RawRole>();

  addGuild(guild: RawGuild): this {
    this.guilds.set(guild.id, guild);
    return this;
  }

  addChannel(channel: RawChannel): this {
    this.channels.set(channel.id, channel);
    return this;
  }

  addUser(user: RawUser): this {
    this.users.set(user.id, user);
    return this;
  }

  addMember(guildId: string, member: RawGuildMember & { user: RawUser }): this {
    this.members.set(`${guildId}:${member.user.id}`, member);
    this.users.set(member.user.id, member.user);
    return this;
  }

  addRole(guildId: string, role: RawRole): this {
    this.roles.set(`${guildId}:${role.id}`, role);
    return this;
  }

  getGuild(guildId: string): RawGuild | undefined {
    return this.guilds.get(guildId);
  }

  getChannel(channelId: string): RawChannel | undefined {
    return this.channels.get(channelId);
  }

  getUser(userId: string): RawUser | undefined {
    return this.users.get(userId);
  }

  getMember(guildId: string, userId: string): RawGuildMember | undefined {
    return this.members.get(`${guildId}:${userId}`);
  }

  getRole(guildId: string, roleId: string): RawRole | undefined {
    return this.roles.get(`${guildId}:${roleId}`);
  }
}
