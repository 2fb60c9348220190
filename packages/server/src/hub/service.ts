// ============================================================================
// flexwatch: Broadcast Hub
// ============================================================================
import { EventEmitter } from 'events';
import type { Alert, AlertFilter, HubStats, SubscriberInfo } from '@flexwatch/shared';
import { logDebug, logInfo, logWarn } from '../logger.js';
import type { RetentionStore } from '../store/service.js';
import { compileFilter } from './filter.js';
import { Subscriber } from './subscriber.js';

export interface BroadcastHubOptions {
  queueSize: number;
  snapshotLimit: number;
}

export interface Subscription {
  subscriber: Subscriber;
  snapshot: Alert[];
}

/**
 * Registry of live subscribers. `publish` offers each alert to every active
 * subscriber whose filter matches; a full queue drops its oldest entry, so
 * the live channel is lossy under overload while the store stays complete.
 */
export class BroadcastHub extends EventEmitter {
  private subscribers = new Map<string, Subscriber>();
  private seq = 0;
  private published = 0;
  private droppedByClosed = 0;

  constructor(private readonly store: RetentionStore, private readonly opts: BroadcastHubOptions) {
    super();
  }

  get size(): number { return this.subscribers.size; }

  /**
   * Register a subscriber and return it with its initial snapshot. Both happen
   * in one synchronous step, so every later publish is either in the snapshot
   * or in the queue, never both and never neither.
   */
  subscribe(filter: AlertFilter = {}, queueSize: number = this.opts.queueSize): Subscription {
    const predicate = compileFilter(filter);
    const id = `sub-${Date.now().toString(36)}-${++this.seq}`;
    const subscriber = new Subscriber(id, filter, predicate, queueSize);
    const snapshot = this.store.query(predicate, { limit: this.opts.snapshotLimit });

    subscriber.once('closed', () => this.remove(subscriber));
    this.subscribers.set(id, subscriber);
    logDebug(`⚡ Subscriber ${id} joined (${this.subscribers.size} active)`, filter);
    this.emit('subscribed', subscriber);
    return { subscriber, snapshot };
  }

  /** Idempotent. Returns true only for the call that removed the subscriber. */
  unsubscribe(target: Subscriber | string): boolean {
    const id = typeof target === 'string' ? target : target.id;
    const subscriber = this.subscribers.get(id);
    if (!subscriber) return false;
    subscriber.close();
    return true;
  }

  private remove(subscriber: Subscriber): void {
    if (this.subscribers.get(subscriber.id) !== subscriber) return;
    this.subscribers.delete(subscriber.id);
    this.droppedByClosed += subscriber.dropped;
    if (subscriber.dropped > 0) {
      logWarn(`⚡ Subscriber ${subscriber.id} left after dropping ${subscriber.dropped} alerts`);
    } else {
      logDebug(`⚡ Subscriber ${subscriber.id} left (${this.subscribers.size} active)`);
    }
    this.emit('unsubscribed', subscriber);
  }

  /** Returns how many subscribers the alert was queued for. */
  publish(alert: Alert): number {
    this.published++;
    let delivered = 0;
    for (const subscriber of Array.from(this.subscribers.values())) {
      if (subscriber.state !== 'active' || !subscriber.matches(alert)) continue;
      if (subscriber.offer(alert)) delivered++;
    }
    return delivered;
  }

  get(id: string): Subscriber | undefined {
    return this.subscribers.get(id);
  }

  list(): SubscriberInfo[] {
    return Array.from(this.subscribers.values(), (s) => s.info());
  }

  /** Log subscribers that dropped alerts since the last report; returns the total. */
  reportDrops(): number {
    let total = 0;
    for (const subscriber of this.subscribers.values()) {
      const delta = subscriber.takeDropDelta();
      if (delta === 0) continue;
      total += delta;
      logWarn(`⚡ Subscriber ${subscriber.id} dropped ${delta} alerts (queue ${subscriber.capacity}, ${subscriber.dropped} total)`);
    }
    return total;
  }

  /** Stop accepting alerts everywhere; each subscriber closes once drained. */
  shutdown(): void {
    const all = Array.from(this.subscribers.values());
    for (const subscriber of all) subscriber.beginDrain();
    if (all.length > 0) logInfo(`⚡ Draining ${all.length} subscribers`);
  }

  stats(): HubStats {
    let dropped = this.droppedByClosed;
    for (const s of this.subscribers.values()) dropped += s.dropped;
    return { subscribers: this.subscribers.size, published: this.published, totalDropped: dropped };
  }
}
