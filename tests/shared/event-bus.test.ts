/**
 * Tests for the PipeSpec shared event bus.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, createEvent, getEventBus } from '../../packages/shared/event-bus/index.js';
import type { BusEvent } from '../../packages/shared/types/index.js';

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('delivers events to subscribers', async () => {
    const received: BusEvent[] = [];
    bus.on('spec.loaded', (event) => { received.push(event); });

    await bus.emit(createEvent('spec.loaded', 'loader', { stepCount: 2 }));

    expect(received).toHaveLength(1);
    expect(received[0].payload).toEqual({ stepCount: 2 });
    expect(received[0].source).toBe('loader');
    expect(received[0].correlationId).toBeNull();
  });

  it('prefix subscribers receive matching channels only', async () => {
    const channels: string[] = [];
    bus.on('spec.*', (event) => { channels.push(event.channel); });

    await bus.emit(createEvent('spec.loaded', 'loader', {}));
    await bus.emit(createEvent('spec.references_checked', 'cli', {}));

    expect(channels).toEqual(['spec.loaded', 'spec.references_checked']);
  });

  it('prefix subscribers ignore other namespaces', async () => {
    let count = 0;
    bus.on('run.*', () => { count++; });

    await bus.emit(createEvent('spec.loaded', 'loader', {}));

    expect(count).toBe(0);
    expect(bus.getHistory()).toHaveLength(1);
  });

  it('unsubscribe prevents further delivery', async () => {
    let count = 0;
    const unsub = bus.on('spec.loaded', () => { count++; });

    await bus.emit(createEvent('spec.loaded', 'loader', {}));
    unsub();
    await bus.emit(createEvent('spec.loaded', 'loader', {}));

    expect(count).toBe(1);
  });

  it('maintains bounded event history', async () => {
    const small = new EventBus({ maxHistory: 2 });
    await small.emit(createEvent('spec.loaded', 'loader', { n: 1 }));
    await small.emit(createEvent('spec.rejected', 'loader', { n: 2 }));
    await small.emit(createEvent('spec.loaded', 'loader', { n: 3 }));

    const all = small.getHistory();
    expect(all.map(e => e.payload)).toEqual([{ n: 2 }, { n: 3 }]);
    expect(small.getHistory('spec.loaded')).toHaveLength(1);
  });

  it('logs handler errors without rethrowing', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    let delivered = 0;
    bus.on('spec.loaded', () => { throw new Error('boom'); });
    bus.on('spec.loaded', () => { delivered++; });

    await expect(bus.emit(createEvent('spec.loaded', 'loader', {}))).resolves.toBeUndefined();

    expect(delivered).toBe(1);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toBe('[EventBus] Handler error on spec.loaded:');
    spy.mockRestore();
  });

  it('createEvent carries the correlation id', () => {
    const event = createEvent('spec.loaded', 'cli', { ok: true }, { correlationId: 'run-1' });
    expect(event.correlationId).toBe('run-1');
    expect(event.channel).toBe('spec.loaded');
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });

  it('getEventBus returns one process-wide instance', () => {
    expect(getEventBus()).toBe(getEventBus());
  });
});
