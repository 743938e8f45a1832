/**
 * @description: Loads environment configuration for the REST client, permissions and mention defaults.
 * @scope: utility
 * @module: EnvConfig
 * @risk: high - A wrong API version or token breaks every outbound call.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import type { APIAllowedMentions } from 'discord.js';
import { AllowedMentionsTypes } from 'discord.js';
import { createModuleLogger } from '@slashkit/shared';

const configLogger = createModuleLogger('config');

const DEFAULT_API_VERSION = '10';
const DEFAULT_REST_RETRIES = 0;
const DEFAULT_REST_TIMEOUT_MS = 15_000;
const DEFAULT_BLACKLIST_DB_PATH = 'data/blacklist.db';

const ALLOWED_MENTION_TYPES: readonly AllowedMentionsTypes[] = [
  AllowedMentionsTypes.Everyone,
  AllowedMentionsTypes.Role,
  AllowedMentionsTypes.User
];

export interface InteractionRuntimeConfig {
  /** Bot token; only needed to edit component host messages. */
  token: string | null;
  apiVersion: string;
  restRetries: number;
  restTimeoutMs: number;
  permissionConfigPath: string | null;
  blacklistDbPath: string;
  defaultAllowedMentions: APIAllowedMentions | undefined;
}

/**
 * Loads a .env file when one exists; injected environment variables win.
 */
export function loadEnvironment(envPath: string = path.resolve(process.cwd(), '.env')): void {
  if (!fs.existsSync(envPath)) {
    configLogger.debug('No .env file found; relying on injected environment variables.');
    return;
  }

  const { error, parsed } = dotenv.config({ path: envPath });
  if (error) {
    configLogger.warn(`Failed to load .env file: ${error.message}`);
  } else if (parsed) {
    configLogger.debug(`Loaded environment variables: ${Object.keys(parsed).join(', ')}`);
  }
}

/**
 * Reads a non-negative integer, falling back to the default on invalid input.
 */
function getIntegerEnv(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    configLogger.warn(
      `Ignoring invalid numeric value for ${key}: "${value}". Expected a non-negative integer; using default (${defaultValue}).`
    );
    return defaultValue;
  }

  return parsed;
}

const isAllowedMentionType = (value: string): value is AllowedMentionsTypes =>
  ALLOWED_MENTION_TYPES.some((type) => type === value);

/**
 * Parses ALLOWED_MENTIONS_PARSE, e.g. `users,roles`. An empty value means
 * "no mentions"; an unset one leaves the default to Discord.
 */
function getAllowedMentionsEnv(env: NodeJS.ProcessEnv, key: string): APIAllowedMentions | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }

  const parse: AllowedMentionsTypes[] = [];
  for (const entry of value.split(',').map((item) => item.trim().toLowerCase()).filter((item) => item.length > 0)) {
    if (isAllowedMentionType(entry)) {
      if (!parse.includes(entry)) {
        parse.push(entry);
      }
    } else {
      configLogger.warn(`Ignoring unknown allowed mention type in ${key}: "${entry}"`);
    }
  }

  return { parse };
}

export function readInteractionConfig(env: NodeJS.ProcessEnv = process.env): InteractionRuntimeConfig {
  const token = env.DISCORD_TOKEN?.trim();
  const apiVersion = env.DISCORD_API_VERSION?.trim();
  const permissionConfigPath = env.PERMISSION_CONFIG_PATH?.trim();

  return {
    token: token ? token : null,
    apiVersion: apiVersion ? apiVersion : DEFAULT_API_VERSION,
    restRetries: getIntegerEnv(env, 'DISCORD_REST_RETRIES', DEFAULT_REST_RETRIES),
    restTimeoutMs: getIntegerEnv(env, 'DISCORD_REST_TIMEOUT_MS', DEFAULT_REST_TIMEOUT_MS),
    permissionConfigPath: permissionConfigPath ? permissionConfigPath : null,
    blacklistDbPath: env.BLACKLIST_DB_PATH?.trim() || DEFAULT_BLACKLIST_DB_PATH,
    defaultAllowedMentions: getAllowedMentionsEnv(env, 'ALLOWED_MENTIONS_PARSE')
  };
}
