/**
 * @description Public exports for the interaction response toolkit.
 * @scope interface
 * @module InteractionsIndex
 */

export { InteractionError, InvalidArgumentError, InteractionPayloadError } from './errors.js';
export type {
  AnyInteractionPayload,
  CommandInteractionPayload,
  ComponentInteractionPayload,
  InteractionPayload,
  RawAttachment,
  RawChannel,
  RawCommandData,
  RawCommandOption,
  RawComponentData,
  RawGuild,
  RawGuildMember,
  RawMessage,
  RawResolvedData,
  RawRole,
  RawUser
} from './types.js';

export { buildResponsePayload } from './payload/payloadBuilder.js';
export type { MessageComponentRow, ResponsePayload, ResponsePayloadFields } from './payload/payloadBuilder.js';
export { resolveAllowedMentions } from './payload/allowedMentions.js';
export { InteractionAttachment, packageAttachments, releaseAttachments, withAttachments } from './payload/attachments.js';
export { normalizeMessageOptions } from './payload/messageOptions.js';
export type {
  ComponentRowLike,
  EmbedLike,
  InteractionEditOptions,
  InteractionSendOptions,
  InteractionUpdateOptions,
  JSONEncodable,
  MessageContentOptions
} from './payload/messageOptions.js';

export { ORIGINAL_RESPONSE } from './http/InteractionTransport.js';
export type {
  DeferredResponseBody,
  DeferredResponseType,
  InteractionIdentity,
  InteractionTransport,
  InteractionTransportFactory
} from './http/InteractionTransport.js';
export { RestInteractionTransport, createRestClient, createRestTransportFactory } from './http/RestInteractionTransport.js';

export { ResponseStateMachine, planResponse } from './state/ResponseStateMachine.js';
export type { OutboundMessage, ResponseKind, ResponsePhase, ResponsePlan, ResponseRoute, UpdateTarget } from './state/ResponseStateMachine.js';
export { MemoryStateCache } from './state/StateCache.js';
export type { InteractionStateCache } from './state/StateCache.js';
export { ClientStateCache } from './state/ClientStateCache.js';

export { InteractionMessage } from './message/InteractionMessage.js';
export { InteractionContext } from './context/InteractionContext.js';
export type { DeferOptions, InteractionContextDependencies, InteractionInvoker } from './context/InteractionContext.js';
export { SlashContext } from './context/SlashContext.js';
export { ComponentContext } from './context/ComponentContext.js';
export { createInteractionContext } from './context/createInteractionContext.js';
export { parseInteractionPayload } from './context/parsePayload.js';
export { decodeCommandOptions, describeOption } from './context/commandOptions.js';
export type { CommandOptionKind, CommandOptionValue, CommandOptions } from './context/commandOptions.js';

export { PermissionLevel, PermissionResolver } from './permissions/PermissionResolver.js';
export type { BlacklistStore, PermissionSnapshot } from './permissions/PermissionResolver.js';
export { SqliteBlacklistStore } from './permissions/SqliteBlacklistStore.js';
export type { BlacklistEntry } from './permissions/SqliteBlacklistStore.js';

export { loadEnvironment, readInteractionConfig } from './config/env.js';
export type { InteractionRuntimeConfig } from './config/env.js';
export { EMPTY_PERMISSION_SNAPSHOT, loadPermissionConfig, parsePermissionConfig } from './config/permissionConfig.js';

export { DEFAULT_DENIED_MESSAGE, InteractionRouter } from './router/InteractionRouter.js';
export type { HandlerRegistration, InteractionHandler, InteractionRouterOptions } from './router/InteractionRouter.js';
