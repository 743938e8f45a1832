/**
 * @description: Sends interaction callbacks and webhook edits through the discord.js REST client.
 * @scope: interface
 * @module: RestInteractionTransport
 * @risk: high - A wrong route or body shape surfaces as a protocol error on the user's interaction.
 */

import { InteractionResponseType, REST, Routes } from 'discord.js';
import type { RequestData } from 'discord.js';
import { createModuleLogger } from '@slashkit/shared';
import type { InteractionRuntimeConfig } from '../config/env.js';
import type { ResponsePayload } from '../payload/payloadBuilder.js';
import { ORIGINAL_RESPONSE } from './InteractionTransport.js';
import type {
  DeferredResponseBody,
  InteractionIdentity,
  InteractionTransport,
  InteractionTransportFactory
} from './InteractionTransport.js';

const transportLogger = createModuleLogger('restTransport');

/**
 * Builds the REST client used by every interaction. Retries default to zero so
 * a failed call reaches the caller as-is.
 */
export function createRestClient(config: Pick<InteractionRuntimeConfig, 'token' | 'apiVersion' | 'restRetries' | 'restTimeoutMs'>): REST {
  const rest = new REST({
    version: config.apiVersion,
    retries: config.restRetries,
    timeout: config.restTimeoutMs
  });

  if (config.token) {
    rest.setToken(config.token);
  }

  return rest;
}

/**
 * Interaction callbacks and webhook routes authenticate with the interaction
 * token in the URL, so only `editMessage` sends the bot token.
 */
export class RestInteractionTransport implements InteractionTransport {
  constructor(
    private readonly rest: REST,
    private readonly identity: InteractionIdentity
  ) {}

  async postDeferredResponse(body: DeferredResponseBody): Promise<void> {
    await this.rest.post(this.callbackRoute(), { body, auth: false });
  }

  async postInitialResponse(payload: ResponsePayload): Promise<void> {
    await this.rest.post(this.callbackRoute(), {
      body: { type: InteractionResponseType.ChannelMessageWithSource, data: payload },
      auth: false
    });
  }

  async getInitialResponse(): Promise<unknown> {
    return this.rest.get(this.messageRoute(ORIGINAL_RESPONSE), { auth: false });
  }

  async editInitialResponse(payload: ResponsePayload, form: FormData | null): Promise<unknown> {
    return this.rest.patch(this.messageRoute(ORIGINAL_RESPONSE), this.messageRequest(payload, form, false));
  }

  async postFollowup(payload: ResponsePayload, form: FormData | null): Promise<unknown> {
    return this.rest.post(
      Routes.webhook(this.identity.applicationId, this.identity.token),
      this.messageRequest(payload, form, false)
    );
  }

  async editFollowup(messageId: string, payload: ResponsePayload, form: FormData | null): Promise<unknown> {
    return this.rest.patch(this.messageRoute(messageId), this.messageRequest(payload, form, false));
  }

  async deleteInitialResponse(): Promise<void> {
    await this.rest.delete(this.messageRoute(ORIGINAL_RESPONSE), { auth: false });
  }

  async deleteFollowup(messageId: string): Promise<void> {
    await this.rest.delete(this.messageRoute(messageId), { auth: false });
  }

  async postInitialComponentsResponse(payload: ResponsePayload): Promise<void> {
    await this.rest.post(this.callbackRoute(), {
      body: { type: InteractionResponseType.UpdateMessage, data: payload },
      auth: false
    });
  }

  async editMessage(channelId: string, messageId: string, payload: ResponsePayload, form: FormData | null): Promise<unknown> {
    transportLogger.debug(`Editing component host message ${messageId} in channel ${channelId}`);
    return this.rest.patch(Routes.channelMessage(channelId, messageId), this.messageRequest(payload, form, true));
  }

  private callbackRoute() {
    return Routes.interactionCallback(this.identity.interactionId, this.identity.token);
  }

  private messageRoute(messageId: string) {
    return Routes.webhookMessage(this.identity.applicationId, this.identity.token, messageId);
  }

  /**
   * Multipart bodies are handed to the REST client untouched so the
   * `payload_json` part built by the packager is what Discord receives.
   */
  private messageRequest(payload: ResponsePayload, form: FormData | null, auth: boolean): RequestData {
    if (form) {
      return { body: form, passThroughBody: true, auth };
    }
    return { body: payload, auth };
  }
}

export const createRestTransportFactory = (rest: REST): InteractionTransportFactory =>
  (identity) => new RestInteractionTransport(rest, identity);
