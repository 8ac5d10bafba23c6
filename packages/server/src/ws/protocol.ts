// @module: server-ws-protocol
// @tags: websocket, decoding, validation

import {
  INBOUND_MESSAGE_TYPES,
  inboundMessageSchema,
  realtimeEnvelopeSchema,
  type InboundMessage,
  type RealtimeError,
} from '@chatwire/schemas';

export type DecodeResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; error: RealtimeError; type: string | null };

const textDecoder = new TextDecoder('utf-8', { fatal: true });

const readFrame = (raw: unknown): { ok: true; value: unknown } | { ok: false } => {
  let text: string;
  if (typeof raw === 'string') {
    text = raw;
  } else if (raw instanceof Uint8Array) {
    try {
      text = textDecoder.decode(raw);
    } catch {
      return { ok: false };
    }
  } else if (raw instanceof ArrayBuffer) {
    try {
      text = textDecoder.decode(new Uint8Array(raw));
    } catch {
      return { ok: false };
    }
  } else {
    // Socket.IO clients may emit already-structured payloads.
    return { ok: true, value: raw };
  }

  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
};

/**
 * Turns a raw frame into a typed inbound message, or into the error the
 * sender should receive.
 */
export const decodeInboundFrame = (raw: unknown): DecodeResult => {
  const frame = readFrame(raw);
  if (!frame.ok) {
    return {
      ok: false,
      type: null,
      error: { code: 'invalid_json', message: 'Messages must be valid JSON' },
    };
  }

  const envelope = realtimeEnvelopeSchema.safeParse(frame.value);
  if (!envelope.success) {
    return {
      ok: false,
      type: null,
      error: {
        code: 'invalid_envelope',
        message: 'Messages must be objects with a string "type" and an object "data"',
        issues: envelope.error.issues,
      },
    };
  }

  const { type, data } = envelope.data;
  if (!INBOUND_MESSAGE_TYPES.has(type)) {
    return {
      ok: false,
      type,
      error: { code: 'unknown_type', message: `Unknown message type: ${type}` },
    };
  }

  const message = inboundMessageSchema.safeParse({ type, data });
  if (!message.success) {
    return {
      ok: false,
      type,
      error: {
        code: 'invalid_payload',
        message: `Invalid ${type} payload`,
        issues: message.error.issues,
      },
    };
  }

  return { ok: true, message: message.data };
};
