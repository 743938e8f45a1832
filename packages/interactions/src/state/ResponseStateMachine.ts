/**
 * @module: ResponseStateMachine
 * @scope: core
 * @risk: critical
 *
 * @description
 * Tracks whether an interaction has been acknowledged and answered, and picks
 * the single outbound call each operation must make. Discord treats "replace
 * the deferred placeholder" and "first substantive reply" as different
 * endpoints; choosing the wrong one is rejected as a protocol error.
 *
 * @impact
 * Flags are only set after the call they describe succeeded and are never
 * rolled back. Operations against one interaction must not run concurrently:
 * the phase is read, then written, without a guard.
 */

import { InteractionResponseType, MessageFlags } from 'discord.js';
import { createModuleLogger } from '@slashkit/shared';
import { InvalidArgumentError } from '../errors.js';
import { ORIGINAL_RESPONSE } from '../http/InteractionTransport.js';
import type { DeferredResponseBody, DeferredResponseType, InteractionTransport } from '../http/InteractionTransport.js';
import type { ResponsePayload } from '../payload/payloadBuilder.js';

const stateLogger = createModuleLogger('responseStateMachine');

/** `responded` absorbs `deferred`: once answered, every reply is a follow-up. */
export type ResponsePhase = 'fresh' | 'deferred' | 'responded';

/** A new message (`send`) or a rewrite of the message hosting a component (`update`). */
export type ResponseKind = 'message' | 'update';

export type ResponseRoute =
  | 'initial-message'
  | 'initial-update'
  | 'edit-original'
  | 'edit-message'
  | 'followup';

export interface ResponsePlan {
  /** Acknowledgement to send before the route, when the route cannot go first. */
  deferFirst: DeferredResponseType | null;
  route: ResponseRoute;
}

export interface OutboundMessage {
  payload: ResponsePayload;
  form: FormData | null;
}

export interface UpdateTarget {
  channelId: string;
  messageId: string;
}

const RESPONSE_ROUTES: Record<ResponseKind, Record<ResponsePhase, ResponseRoute>> = {
  message: { fresh: 'initial-message', deferred: 'edit-original', responded: 'followup' },
  update: { fresh: 'initial-update', deferred: 'edit-message', responded: 'followup' }
};

const DEFER_TYPES: Record<ResponseKind, DeferredResponseType> = {
  message: InteractionResponseType.DeferredChannelMessageWithSource,
  update: InteractionResponseType.DeferredMessageUpdate
};

/**
 * The initial-response callback does not take multipart bodies, so a fresh
 * interaction with attachments is acknowledged first and then answered through
 * the edit route, which does.
 */
export function planResponse(kind: ResponseKind, phase: ResponsePhase, hasAttachments: boolean): ResponsePlan {
  if (phase === 'fresh' && hasAttachments) {
    return { deferFirst: DEFER_TYPES[kind], route: RESPONSE_ROUTES[kind].deferred };
  }
  return { deferFirst: null, route: RESPONSE_ROUTES[kind][phase] };
}

export class ResponseStateMachine {
  private deferredFlag = false;
  private respondedFlag = false;

  constructor(
    private readonly transport: InteractionTransport,
    private readonly label = 'interaction'
  ) {}

  get deferred(): boolean {
    return this.deferredFlag;
  }

  get responded(): boolean {
    return this.respondedFlag;
  }

  get phase(): ResponsePhase {
    if (this.respondedFlag) {
      return 'responded';
    }
    return this.deferredFlag ? 'deferred' : 'fresh';
  }

  /**
   * Sends a deferred acknowledgement. Deferring twice is not checked here;
   * Discord rejects it.
   */
  async defer(type: DeferredResponseType, hidden = false): Promise<void> {
    const body: DeferredResponseBody = { type };
    if (hidden) {
      body.data = { flags: MessageFlags.Ephemeral };
    }

    await this.transport.postDeferredResponse(body);
    this.deferredFlag = true;
    stateLogger.debug(`[${this.label}] deferred (type=${type}, hidden=${hidden})`);
  }

  /**
   * Sends a message: the initial response, the edit of a deferred placeholder,
   * or a follow-up. Resolves with the raw message Discord returned.
   */
  async respond(message: OutboundMessage, hidden = false): Promise<unknown> {
    return this.dispatch('message', message, null, hidden);
  }

  /**
   * Rewrites the message hosting the clicked component. Resolves with null when
   * the component callback answered without returning a message.
   */
  async update(message: OutboundMessage, target: UpdateTarget): Promise<unknown> {
    return this.dispatch('update', message, target, false);
  }

  /**
   * Edits the original response or a follow-up. Allowed in any phase.
   */
  async edit(messageId: string, message: OutboundMessage): Promise<unknown> {
    if (messageId === ORIGINAL_RESPONSE) {
      return this.transport.editInitialResponse(message.payload, message.form);
    }
    return this.transport.editFollowup(messageId, message.payload, message.form);
  }

  async delete(messageId: string): Promise<void> {
    if (messageId === ORIGINAL_RESPONSE) {
      await this.transport.deleteInitialResponse();
      return;
    }
    await this.transport.deleteFollowup(messageId);
  }

  private async dispatch(
    kind: ResponseKind,
    message: OutboundMessage,
    target: UpdateTarget | null,
    hidden: boolean
  ): Promise<unknown> {
    const plan = planResponse(kind, this.phase, message.form !== null);
    stateLogger.debug(
      `[${this.label}] ${kind}: phase=${this.phase}, route=${plan.route}, deferFirst=${plan.deferFirst ?? 'none'}`
    );

    if (plan.deferFirst !== null) {
      await this.defer(plan.deferFirst, hidden);
    }

    const result = await this.execute(plan.route, message, target);
    if (plan.route !== 'followup') {
      this.respondedFlag = true;
    }
    return result;
  }

  private async execute(route: ResponseRoute, message: OutboundMessage, target: UpdateTarget | null): Promise<unknown> {
    const { payload, form } = message;

    switch (route) {
      case 'initial-message':
        await this.transport.postInitialResponse(payload);
        return this.transport.getInitialResponse();
      case 'initial-update':
        await this.transport.postInitialComponentsResponse(payload);
        return null;
      case 'edit-original':
        return this.transport.editInitialResponse(payload, form);
      case 'edit-message':
        if (!target) {
          throw new InvalidArgumentError('Updating a component message requires the hosting message');
        }
        return this.transport.editMessage(target.channelId, target.messageId, payload, form);
      case 'followup':
        return this.transport.postFollowup(payload, form);
    }
  }
}
