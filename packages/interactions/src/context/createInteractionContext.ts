import { ComponentContext } from './ComponentContext.js';
import { InteractionContext } from './InteractionContext.js';
import type { InteractionContextDependencies } from './InteractionContext.js';
import { parseInteractionPayload } from './parsePayload.js';
import { SlashContext } from './SlashContext.js';

/**
 * Parses a raw interaction body and builds the matching context variant.
 */
export function createInteractionContext(
  raw: unknown,
  dependencies: InteractionContextDependencies
): InteractionContext {
  const parsed = parseInteractionPayload(raw);

  switch (parsed.kind) {
    case 'command':
      return new SlashContext(parsed.payload, dependencies);
    case 'component':
      return new ComponentContext(parsed.payload, dependencies);
    case 'other':
      return new InteractionContext(parsed.payload, dependencies);
  }
}
