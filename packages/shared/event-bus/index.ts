/**
 * PipeSpec Event Bus — Cross-Package Notifications
 *
 * In-process pub/sub. The loader publishes what it accepted or rejected;
 * consumers subscribe to what they need.
 *
 * Loader publishes: spec.loaded, spec.rejected, spec.references_checked
 */

import type { EventChannel, EventSource, BusEvent, EventHandler } from '../types/index.js';

/** An exact channel, or a prefix such as `spec.*`. */
type SubscribedChannel = EventChannel | `${string}.*`;

interface Subscription {
  id: string;
  channel: SubscribedChannel;
  handler: EventHandler;
}

export class EventBus {
  private subscriptions: Map<string, Subscription> = new Map();
  private channelIndex: Map<SubscribedChannel, Set<string>> = new Map();
  private history: BusEvent[] = [];
  private maxHistory: number;
  private subCounter = 0;

  constructor(opts?: { maxHistory?: number }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
  }

  /**
   * Subscribe to a channel. Returns unsubscribe function.
   */
  on(channel: SubscribedChannel, handler: EventHandler): () => void {
    const id = `sub_${++this.subCounter}`;
    this.subscriptions.set(id, { id, channel, handler });

    let ids = this.channelIndex.get(channel);
    if (!ids) {
      ids = new Set();
      this.channelIndex.set(channel, ids);
    }
    ids.add(id);

    return () => this.unsubscribe(id);
  }

  /**
   * Publish an event. Exact and prefix ('spec.*') subscribers are notified.
   * Handler errors are logged, never rethrown to the emitter.
   */
  async emit<T>(event: BusEvent<T>): Promise<void> {
    // Ring buffer
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    const matchingIds = new Set<string>();

    const channelSubs = this.channelIndex.get(event.channel);
    if (channelSubs) {
      for (const id of channelSubs) matchingIds.add(id);
    }

    for (const [channel, subIds] of this.channelIndex) {
      if (channel.endsWith('.*')) {
        const prefix = channel.slice(0, -1);
        if (event.channel.startsWith(prefix)) {
          for (const id of subIds) matchingIds.add(id);
        }
      }
    }

    for (const id of matchingIds) {
      const sub = this.subscriptions.get(id);
      if (!sub) continue;

      try {
        await sub.handler(event);
      } catch (err) {
        console.error(`[EventBus] Handler error on ${event.channel}:`, err);
      }
    }
  }

  /**
   * Recent event history, optionally filtered by channel.
   */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel
      ? this.history.filter(e => e.channel === channel)
      : this.history;
    return events.slice(-limit);
  }

  private unsubscribe(id: string): void {
    const sub = this.subscriptions.get(id);
    if (!sub) return;

    this.subscriptions.delete(id);
    const channelSubs = this.channelIndex.get(sub.channel);
    if (channelSubs) {
      channelSubs.delete(id);
      if (channelSubs.size === 0) {
        this.channelIndex.delete(sub.channel);
      }
    }
  }
}

let _globalBus: EventBus | null = null;

/**
 * Process-wide bus. The CLI publishes here.
 */
export function getEventBus(): EventBus {
  if (!_globalBus) {
    _globalBus = new EventBus();
  }
  return _globalBus;
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<T>(
  channel: EventChannel,
  source: EventSource,
  payload: T,
  opts?: { correlationId?: string }
): BusEvent<T> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    correlationId: opts?.correlationId ?? null,
    payload,
  };
}
