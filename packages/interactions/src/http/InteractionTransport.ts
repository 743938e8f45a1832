/**
 * @description: Contract for the outbound HTTP calls an interaction can make.
 * @scope: interface
 * @module: InteractionTransport
 * @risk: low - Structural only; the REST implementation carries the behaviour.
 */

import type { InteractionResponseType } from 'discord.js';
import type { ResponsePayload } from '../payload/payloadBuilder.js';

/** Message id Discord uses for the initial response of an interaction. */
export const ORIGINAL_RESPONSE = '@original';

export type DeferredResponseType =
  | InteractionResponseType.DeferredChannelMessageWithSource
  | InteractionResponseType.DeferredMessageUpdate;

export interface DeferredResponseBody {
  type: DeferredResponseType;
  data?: { flags: number };
}

/**
 * Identifies the interaction a transport instance answers.
 */
export interface InteractionIdentity {
  interactionId: string;
  token: string;
  applicationId: string;
}

/**
 * One instance per interaction. Calls that return a message resolve with the
 * raw response body; the context validates it.
 * `form`, when present, is a multipart body that already embeds `payload`.
 */
export interface InteractionTransport {
  postDeferredResponse(body: DeferredResponseBody): Promise<void>;
  postInitialResponse(payload: ResponsePayload): Promise<void>;
  getInitialResponse(): Promise<unknown>;
  editInitialResponse(payload: ResponsePayload, form: FormData | null): Promise<unknown>;
  postFollowup(payload: ResponsePayload, form: FormData | null): Promise<unknown>;
  editFollowup(messageId: string, payload: ResponsePayload, form: FormData | null): Promise<unknown>;
  deleteInitialResponse(): Promise<void>;
  deleteFollowup(messageId: string): Promise<void>;
  postInitialComponentsResponse(payload: ResponsePayload): Promise<void>;
  editMessage(channelId: string, messageId: string, payload: ResponsePayload, form: FormData | null): Promise<unknown>;
}

export type InteractionTransportFactory = (identity: InteractionIdentity) => InteractionTransport;
