import { describe, expect, it } from 'vitest';
import { decodeInboundFrame } from '../ws/protocol.js';

describe('decodeInboundFrame', () => {
  it('decodes a valid JSON frame into a typed message', () => {
    const result = decodeInboundFrame(
      JSON.stringify({ type: 'typing_indicator', data: { chat_id: 'chat-1', is_typing: true } }),
    );

    expect(result).toEqual({
      ok: true,
      message: { type: 'typing_indicator', data: { chat_id: 'chat-1', is_typing: true } },
    });
  });

  it('accepts structured payloads and binary frames', () => {
    expect(decodeInboundFrame({ type: 'ping', data: { timestamp: 42 } }).ok).toBe(true);

    const bytes = new TextEncoder().encode(JSON.stringify({ type: 'ping', data: { timestamp: 'abc' } }));
    expect(decodeInboundFrame(bytes)).toEqual({
      ok: true,
      message: { type: 'ping', data: { timestamp: 'abc' } },
    });
  });

  it('applies schema defaults', () => {
    const result = decodeInboundFrame({
      type: 'call_initiated',
      data: { call_id: 7, callee_id: 'bob', channel_name: 'room-7' },
    });

    expect(result).toEqual({
      ok: true,
      message: {
        type: 'call_initiated',
        data: { call_id: 7, callee_id: 'bob', channel_name: 'room-7', call_type: 'video' },
      },
    });
  });

  it('rejects text that is not JSON', () => {
    expect(decodeInboundFrame('not json{')).toEqual({
      ok: false,
      type: null,
      error: { code: 'invalid_json', message: 'Messages must be valid JSON' },
    });
  });

  it('rejects JSON that is not an envelope', () => {
    const result = decodeInboundFrame('[1, 2, 3]');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('invalid_envelope');
    }

    const missingType = decodeInboundFrame({ data: {} });
    expect(missingType.ok ? null : missingType.error.code).toBe('invalid_envelope');
  });

  it('names unknown types', () => {
    expect(decodeInboundFrame({ type: 'teleport', data: {} })).toEqual({
      ok: false,
      type: 'teleport',
      error: { code: 'unknown_type', message: 'Unknown message type: teleport' },
    });
  });

  it('reports field validation issues', () => {
    const result = decodeInboundFrame({
      type: 'location_update',
      data: { latitude: 91, longitude: 0 },
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.type).toBe('location_update');
      expect(result.error.code).toBe('invalid_payload');
      expect(result.error.message).toBe('Invalid location_update payload');
      expect(result.error.issues).toEqual([
        expect.objectContaining({ path: ['data', 'latitude'], message: 'latitude must be <= 90' }),
      ]);
    }
  });

  it('treats a missing data object as empty', () => {
    const result = decodeInboundFrame({ type: 'join_chat' });
    expect(result.ok ? null : result.error.code).toBe('invalid_payload');
  });
});
