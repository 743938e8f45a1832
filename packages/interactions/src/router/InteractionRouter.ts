/**
 * @module: InteractionRouter
 * @scope: core
 * @risk: moderate
 *
 * @description
 * Dispatches parsed interactions to registered handlers: slash commands by
 * name, components by custom-id prefix. Handlers may require a permission
 * level; invokers below it get a hidden refusal instead of the handler.
 *
 * @impact
 * Handler errors are logged and rethrown to the caller unchanged.
 */

import { Collection } from 'discord.js';
import { createModuleLogger } from '@slashkit/shared';
import { ComponentContext } from '../context/ComponentContext.js';
import { createInteractionContext } from '../context/createInteractionContext.js';
import type { InteractionContext, InteractionContextDependencies } from '../context/InteractionContext.js';
import { SlashContext } from '../context/SlashContext.js';
import type { PermissionLevel, PermissionResolver } from '../permissions/PermissionResolver.js';

const routerLogger = createModuleLogger('interactionRouter');

export const DEFAULT_DENIED_MESSAGE = 'You do not have permission to use this.';

export type InteractionHandler<C extends InteractionContext> = (context: C) => Promise<void> | void;

export interface HandlerRegistration<C extends InteractionContext> {
  handler: InteractionHandler<C>;
  /** Least-privileged level allowed to run the handler. */
  permission?: PermissionLevel;
}

export interface InteractionRouterOptions {
  dependencies: InteractionContextDependencies;
  /** Required whenever a registration sets `permission`. */
  permissions?: PermissionResolver;
  deniedMessage?: string;
}

export class InteractionRouter {
  private readonly commands = new Collection<string, HandlerRegistration<SlashContext>>();
  private readonly components = new Collection<string, HandlerRegistration<ComponentContext>>();
  private readonly deniedMessage: string;

  constructor(private readonly options: InteractionRouterOptions) {
    this.deniedMessage = options.deniedMessage ?? DEFAULT_DENIED_MESSAGE;
  }

  command(
    name: string,
    handler: InteractionHandler<SlashContext>,
    permission?: PermissionLevel
  ): this {
    if (this.commands.has(name)) {
      throw new Error(`Command "${name}" is already registered`);
    }
    this.assertResolver(permission);
    this.commands.set(name, { handler, permission });
    return this;
  }

  /**
   * Registers a component handler for every custom id starting with `prefix`.
   * The longest matching prefix wins.
   */
  component(
    prefix: string,
    handler: InteractionHandler<ComponentContext>,
    permission?: PermissionLevel
  ): this {
    if (this.components.has(prefix)) {
      throw new Error(`Component prefix "${prefix}" is already registered`);
    }
    this.assertResolver(permission);
    this.components.set(prefix, { handler, permission });
    return this;
  }

  async handle(raw: unknown): Promise<InteractionContext> {
    const context = createInteractionContext(raw, this.options.dependencies);

    if (context instanceof SlashContext) {
      const registration = this.commands.get(context.name);
      if (!registration) {
        routerLogger.warn(`No handler registered for command /${context.name}`);
        return context;
      }
      await this.run(context, registration, `/${context.name}`);
    } else if (context instanceof ComponentContext) {
      const registration = this.findComponent(context.customId);
      if (!registration) {
        routerLogger.warn(`No handler registered for component ${context.customId}`);
        return context;
      }
      await this.run(context, registration, `component ${context.customId}`);
    } else {
      routerLogger.debug(`Ignoring interaction ${context.id} of type ${context.type}`);
    }

    return context;
  }

  private findComponent(customId: string): HandlerRegistration<ComponentContext> | undefined {
    let match: string | undefined;
    for (const prefix of this.components.keys()) {
      if (customId.startsWith(prefix) && (match === undefined || prefix.length > match.length)) {
        match = prefix;
      }
    }
    return match === undefined ? undefined : this.components.get(match);
  }

  private async run<C extends InteractionContext>(
    context: C,
    registration: HandlerRegistration<C>,
    label: string
  ): Promise<void> {
    if (registration.permission !== undefined) {
      const resolver = this.options.permissions;
      if (!resolver || !(await resolver.hasPermission(context.author, registration.permission))) {
        routerLogger.info(`Refused ${label} for user ${context.author.user.id}`);
        await context.send({ content: this.deniedMessage, hidden: true });
        return;
      }
    }

    routerLogger.debug(`Running ${label} for interaction ${context.id}`);
    try {
      await registration.handler(context);
    } catch (error) {
      routerLogger.error(`Handler for ${label} failed:`, error);
      throw error;
    }
  }

  private assertResolver(permission: PermissionLevel | undefined): void {
    if (permission !== undefined && !this.options.permissions) {
      throw new Error('A permission resolver is required to register restricted handlers');
    }
  }
}
