import type { APIAllowedMentions } from 'discord.js';

/**
 * Merges a per-call allowed-mentions policy over the configured default.
 * Keys set on the override win; keys it leaves out fall back to the default.
 * Returns undefined when neither is present.
 */
export function resolveAllowedMentions(
  defaults: APIAllowedMentions | undefined,
  override: APIAllowedMentions | undefined
): APIAllowedMentions | undefined {
  if (override && defaults) {
    const merged: APIAllowedMentions = { ...defaults };
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
    return merged;
  }

  if (override) {
    return { ...override };
  }

  return defaults ? { ...defaults } : undefined;
}
