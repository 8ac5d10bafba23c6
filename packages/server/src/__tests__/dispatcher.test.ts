import { afterEach, describe, expect, it, vi } from 'vitest';
import { createOutboundEvent } from '@chatwire/schemas';
import { createMetricsBundle } from '../metrics/registry.js';
import { createEventDispatcher } from '../ws/dispatcher.js';
import { createRoomMembershipIndex } from '../ws/roomIndex.js';
import { createSessionRegistry, type ConnectionHandle } from '../ws/sessionRegistry.js';
import { DeliveryError } from '../ws/transport.js';
import { createTestLogger, FakeTransport } from './helpers/fakes.js';

const setup = (deliveryTimeoutMs = 500) => {
  const registry = createSessionRegistry();
  const rooms = createRoomMembershipIndex();
  const metrics = createMetricsBundle({ collectDefaults: false });
  const failures: Array<{ handle: ConnectionHandle; error: unknown }> = [];
  const dispatcher = createEventDispatcher({
    registry,
    rooms,
    metrics,
    logger: createTestLogger(),
    deliveryTimeoutMs,
    onDeliveryFailure: (handle, error) => {
      failures.push({ handle, error });
      registry.unregister(handle.userId, handle.id);
    },
  });

  const connect = (userId: string, transport = new FakeTransport()) => {
    registry.register(userId, transport);
    return transport;
  };

  return { registry, rooms, metrics, failures, dispatcher, connect };
};

const pong = createOutboundEvent('pong', { timestamp: 1 });

describe('event dispatcher', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers to every connection of a user', async () => {
    const { dispatcher, connect } = setup();
    const phone = connect('alice');
    const laptop = connect('alice');

    const report = await dispatcher.sendToUser('alice', pong);

    expect(report).toEqual({ delivered: 2, failed: 0 });
    expect(phone.sent).toEqual([pong]);
    expect(laptop.sent).toEqual([pong]);
  });

  it('skips users without connections', async () => {
    const { dispatcher } = setup();
    expect(await dispatcher.sendToUser('ghost', pong)).toEqual({ delivered: 0, failed: 0 });
  });

  it('broadcasts to a room once per connection and never to the excluded user', async () => {
    const { dispatcher, rooms, connect } = setup();
    const alicePhone = connect('alice');
    const aliceLaptop = connect('alice');
    const bob = connect('bob');
    const carol = connect('carol');
    rooms.join('chat-1', 'alice');
    rooms.join('chat-1', 'bob');
    rooms.join('chat-1', 'carol');

    const report = await dispatcher.broadcastToRoom('chat-1', pong, { excludeUserId: 'alice' });

    expect(report).toEqual({ delivered: 2, failed: 0 });
    expect(alicePhone.sent).toEqual([]);
    expect(aliceLaptop.sent).toEqual([]);
    expect(bob.sent).toEqual([pong]);
    expect(carol.sent).toEqual([pong]);
  });

  it('treats an empty room as a no-op', async () => {
    const { dispatcher } = setup();
    expect(await dispatcher.broadcastToRoom('empty', pong)).toEqual({ delivered: 0, failed: 0 });
  });

  it('deduplicates explicit recipients', async () => {
    const { dispatcher, connect } = setup();
    const bob = connect('bob');

    await dispatcher.sendToUsers(['bob', 'bob', 'alice'], pong, { excludeUserId: 'alice' });

    expect(bob.sent).toHaveLength(1);
  });

  it('isolates a failing connection and reports it for teardown', async () => {
    const { dispatcher, rooms, registry, metrics, failures, connect } = setup();
    const broken = connect('bob', new FakeTransport('fail'));
    const healthy = connect('carol');
    rooms.join('chat-1', 'bob');
    rooms.join('chat-1', 'carol');

    const report = await dispatcher.broadcastToRoom('chat-1', pong);

    expect(report).toEqual({ delivered: 1, failed: 1 });
    expect(healthy.sent).toEqual([pong]);
    expect(broken.sent).toEqual([]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.handle.userId).toBe('bob');
    expect(registry.isOnline('bob')).toBe(false);

    const failed = await metrics.failedDeliveries.get();
    expect(failed.values).toEqual([{ value: 1, labels: { type: 'pong' } }]);
  });

  it('gives up on a write that never completes once the deadline passes', async () => {
    vi.useFakeTimers();
    const { dispatcher, rooms, failures, connect } = setup(500);
    connect('bob', new FakeTransport('hang'));
    const healthy = connect('carol');
    rooms.join('chat-1', 'bob');
    rooms.join('chat-1', 'carol');

    const pending = dispatcher.broadcastToRoom('chat-1', pong);
    await vi.advanceTimersByTimeAsync(500);
    const report = await pending;

    expect(report).toEqual({ delivered: 1, failed: 1 });
    expect(healthy.sent).toEqual([pong]);
    expect(failures[0]?.error).toBeInstanceOf(DeliveryError);
  });

  it('survives a teardown hook that throws', async () => {
    const registry = createSessionRegistry();
    registry.register('bob', new FakeTransport('fail'));
    const dispatcher = createEventDispatcher({
      registry,
      rooms: createRoomMembershipIndex(),
      metrics: createMetricsBundle({ collectDefaults: false }),
      logger: createTestLogger(),
      deliveryTimeoutMs: 500,
      onDeliveryFailure: () => {
        throw new Error('teardown exploded');
      },
    });

    await expect(dispatcher.sendToUser('bob', pong)).resolves.toEqual({ delivered: 0, failed: 1 });
  });

  it('starts published fan-outs without waiting for them and drains them later', async () => {
    vi.useFakeTimers();
    const { dispatcher, rooms, connect } = setup(500);
    connect('bob', new FakeTransport('hang'));
    const carol = connect('carol');
    rooms.join('chat-1', 'bob');
    rooms.join('chat-1', 'carol');

    dispatcher.publish('pong', () => dispatcher.broadcastToRoom('chat-1', pong));
    expect(dispatcher.inFlight()).toBe(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(carol.sent).toEqual([pong]);
    expect(dispatcher.inFlight()).toBe(1);

    const drained = dispatcher.drain();
    await vi.advanceTimersByTimeAsync(400);
    await drained;
    expect(dispatcher.inFlight()).toBe(0);
  });

  it('contains a fan-out that throws or rejects', async () => {
    const { dispatcher } = setup();

    dispatcher.publish('sync throw', () => {
      throw new Error('no route');
    });
    dispatcher.publish('rejection', () => Promise.reject(new Error('gateway down')));

    await expect(dispatcher.drain()).resolves.toBeUndefined();
    expect(dispatcher.inFlight()).toBe(0);
  });
});
