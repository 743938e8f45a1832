/**
 * @description: Reads owner and sub-owner lists from a YAML file into a frozen snapshot.
 * @scope: utility
 * @module: PermissionConfig
 * @risk: high - A parsing mistake grants or withholds owner rights.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { createModuleLogger } from '@slashkit/shared';
import { isRecord } from '../context/parsePayload.js';
import type { PermissionSnapshot } from '../permissions/PermissionResolver.js';

const permissionConfigLogger = createModuleLogger('permissionConfig');

export const EMPTY_PERMISSION_SNAPSHOT: PermissionSnapshot = Object.freeze({
  owners: Object.freeze([]),
  subOwners: Object.freeze([])
});

/**
 * Ids should be quoted in YAML. Unquoted ones parse as numbers and are only
 * kept when they are still exact.
 */
function readIdList(section: Record<string, unknown>, key: string): readonly string[] {
  const value = section[key];
  if (value === undefined || value === null) {
    return Object.freeze([]);
  }
  if (!Array.isArray(value)) {
    throw new Error(`permission.${key} must be a list of user ids`);
  }

  const ids: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string' && /^\d+$/.test(entry.trim())) {
      ids.push(entry.trim());
    } else if (typeof entry === 'number' && Number.isSafeInteger(entry)) {
      ids.push(String(entry));
    } else {
      permissionConfigLogger.warn(`Ignoring invalid id in permission.${key}: ${String(entry)} (quote snowflake ids)`);
    }
  }
  return Object.freeze(ids);
}

export function parsePermissionConfig(source: string): PermissionSnapshot {
  const document: unknown = yaml.load(source);
  if (document === undefined || document === null) {
    return EMPTY_PERMISSION_SNAPSHOT;
  }
  if (!isRecord(document)) {
    throw new Error('Permission configuration must be a mapping');
  }

  const section = document.permission;
  if (section === undefined || section === null) {
    return EMPTY_PERMISSION_SNAPSHOT;
  }
  if (!isRecord(section)) {
    throw new Error('permission must be a mapping');
  }

  return Object.freeze({
    owners: readIdList(section, 'owners'),
    subOwners: readIdList(section, 'subOwners')
  });
}

export function loadPermissionConfig(filePath: string | null): PermissionSnapshot {
  if (!filePath) {
    permissionConfigLogger.debug('No permission configuration path set; no owners configured.');
    return EMPTY_PERMISSION_SNAPSHOT;
  }

  const snapshot = parsePermissionConfig(fs.readFileSync(filePath, 'utf8'));
  permissionConfigLogger.info(
    `Loaded permission configuration from ${filePath} (${snapshot.owners.length} owners, ${snapshot.subOwners.length} sub-owners)`
  );
  return snapshot;
}
