import { decodeCommandOptions, describeOption } from './commandOptions.js';
import type { CommandOptionKind, CommandOptionValue, CommandOptions } from './commandOptions.js';
import { InteractionContext } from './InteractionContext.js';
import type { InteractionContextDependencies } from './InteractionContext.js';
import type { CommandInteractionPayload } from '../types.js';

/**
 * Context for an application (slash) command invocation.
 */
export class SlashContext extends InteractionContext {
  readonly name: string;
  readonly commandId: string | null;
  readonly options: CommandOptions;

  constructor(payload: CommandInteractionPayload, dependencies: InteractionContextDependencies) {
    super(payload, dependencies);
    this.name = payload.data.name;
    this.commandId = payload.data.id ?? null;
    this.options = decodeCommandOptions(payload.data.options, {
      guildId: this.guildId,
      resolved: payload.data.resolved,
      cache: this.cache
    });
  }

  /**
   * Returns the option only when it decoded to the requested kind.
   */
  getOption<K extends CommandOptionKind>(name: string, kind: K): Extract<CommandOptionValue, { kind: K }> | undefined {
    const option = this.options[name];
    return option && isKind(option, kind) ? option : undefined;
  }

  /** The invocation rendered as typed text, e.g. `/roll 2 d20`. */
  get content(): string {
    return [`/${this.name}`, ...Object.values(this.options).map(describeOption)].join(' ');
  }
}

function isKind<K extends CommandOptionKind>(
  option: CommandOptionValue,
  kind: K
): option is Extract<CommandOptionValue, { kind: K }> {
  return option.kind === kind;
}
