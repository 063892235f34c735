/**
 * Wire protocol envelopes for the single multiplexed WebSocket.
 *
 * Every frame in both directions is a JSON object with four fields:
 * `{"topic": string, "event": string, "payload": any, "ref": integer|null}`.
 */

import { Type } from 'typebox';
import { MalformedEnvelopeError } from './errors.ts';
import { compileSchema } from './validation.ts';

/**
 * The unit exchanged over the transport.
 *
 * `ref` is `null` when absent. It is never coerced to 0 or -1.
 */
export interface Envelope<P = unknown> {
  topic: string;
  event: string;
  payload: P;
  ref: number | null;
}

/**
 * Reserved topic and event names.
 */
export const PHOENIX_TOPIC = 'phoenix';

export const ChannelEvent = {
  HEARTBEAT: 'heartbeat',
  JOIN: 'phx_join',
  LEAVE: 'phx_leave',
  REPLY: 'phx_reply',
  ERROR: 'phx_error',
  CLOSE: 'phx_close',
} as const;

/**
 * Payload of a `phx_reply` frame.
 */
export interface ReplyPayload {
  status: string;
  response: unknown;
}

const EnvelopeSchema = Type.Object({
  topic: Type.String(),
  event: Type.String(),
  payload: Type.Optional(Type.Unknown()),
  ref: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
});

const ReplyPayloadSchema = Type.Object({
  status: Type.String(),
  response: Type.Unknown(),
});

const envelopeValidator = compileSchema(EnvelopeSchema);
const replyValidator = compileSchema(ReplyPayloadSchema);

/**
 * Serialize an envelope to its wire text.
 */
export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify({
    topic: envelope.topic,
    event: envelope.event,
    payload: envelope.payload,
    ref: envelope.ref,
  });
}

/**
 * Parse and validate wire text. A missing `ref` decodes as `null`.
 *
 * @throws MalformedEnvelopeError if the text is not JSON or not an envelope
 */
export function decodeEnvelope(text: string): Envelope {
  let frame: unknown;
  try {
    frame = JSON.parse(text);
  } catch (err) {
    throw new MalformedEnvelopeError(err instanceof Error ? err.message : String(err));
  }

  if (!envelopeValidator.check(frame)) {
    throw new MalformedEnvelopeError(envelopeValidator.errors(frame));
  }

  return {
    topic: frame.topic,
    event: frame.event,
    payload: frame.payload ?? null,
    ref: frame.ref ?? null,
  };
}

/**
 * Build the keep-alive envelope.
 */
export function heartbeatEnvelope(ref: number): Envelope<Record<string, never>> {
  return { topic: PHOENIX_TOPIC, event: ChannelEvent.HEARTBEAT, payload: {}, ref };
}

/**
 * Narrow a `phx_reply` payload, or return null when it has the wrong shape.
 */
export function parseReply(payload: unknown): ReplyPayload | null {
  return replyValidator.check(payload) ? payload : null;
}
