/**
 * @module: PermissionResolver
 * @scope: core
 * @risk: high
 *
 * @description
 * Ranks the invoker of an interaction: owner, sub-owner, guild administrator,
 * member, or banned. Lower numbers carry more authority; a handler that
 * requires level N accepts any invoker ranked N or lower.
 *
 * @impact
 * Owner lists come from an injected read-only snapshot, so reloading the
 * configuration means building a new resolver.
 */

import { PermissionFlagsBits } from 'discord.js';
import { createModuleLogger } from '@slashkit/shared';
import type { InteractionInvoker } from '../context/InteractionContext.js';
import type { InteractionStateCache } from '../state/StateCache.js';

const permissionLogger = createModuleLogger('permissions');

export const PermissionLevel = {
  Owner: 1,
  SubOwner: 2,
  Administrator: 3,
  Member: 4,
  Banned: 9
} as const;

export type PermissionLevel = (typeof PermissionLevel)[keyof typeof PermissionLevel];

export interface PermissionSnapshot {
  readonly owners: readonly string[];
  readonly subOwners: readonly string[];
}

export interface BlacklistStore {
  isBanned(userId: string): Promise<boolean>;
}

const hasAdministratorBit = (permissions: string): boolean => {
  if (!/^\d+$/.test(permissions)) {
    return false;
  }
  return (BigInt(permissions) & PermissionFlagsBits.Administrator) === PermissionFlagsBits.Administrator;
};

export class PermissionResolver {
  constructor(
    private readonly snapshot: PermissionSnapshot,
    private readonly blacklist: BlacklistStore,
    private readonly cache: InteractionStateCache
  ) {}

  async resolveLevel(invoker: InteractionInvoker): Promise<PermissionLevel> {
    const userId = invoker.user.id;

    if (this.snapshot.owners.includes(userId)) {
      return PermissionLevel.Owner;
    }
    if (this.snapshot.subOwners.includes(userId)) {
      return PermissionLevel.SubOwner;
    }
    if (this.isAdministrator(invoker)) {
      return PermissionLevel.Administrator;
    }
    if (await this.blacklist.isBanned(userId)) {
      return PermissionLevel.Banned;
    }
    return PermissionLevel.Member;
  }

  async hasPermission(invoker: InteractionInvoker, required: PermissionLevel): Promise<boolean> {
    const level = await this.resolveLevel(invoker);
    const allowed = required >= level;
    if (!allowed) {
      permissionLogger.debug(`Denied user ${invoker.user.id}: level ${level} does not meet ${required}`);
    }
    return allowed;
  }

  /**
   * Administrator means the permission bitfield Discord sent with the member
   * carries the Administrator bit, or one of the member's cached roles grants
   * it. Roles missing from the cache are skipped.
   */
  private isAdministrator(invoker: InteractionInvoker): boolean {
    if (invoker.kind !== 'member') {
      return false;
    }

    if (
      invoker.permissions !== null
      && (invoker.permissions & PermissionFlagsBits.Administrator) === PermissionFlagsBits.Administrator
    ) {
      return true;
    }

    return invoker.roleIds.some((roleId) => {
      const role = this.cache.getRole(invoker.guildId, roleId);
      return role !== undefined && hasAdministratorBit(role.permissions);
    });
  }
}
