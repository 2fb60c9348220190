import { EventEmitter } from 'events';
import type { Alert, AlertFilter, SubscriberInfo, SubscriberState } from '@flexwatch/shared';
import type { AlertPredicate } from './filter.js';

/**
 * One viewer's end of the live feed: an immutable filter and a bounded FIFO.
 * Offers never block; when the queue is full the oldest entry is dropped.
 *
 * Events: `ready` when the queue goes from empty to non-empty, `closed` once.
 */
export class Subscriber extends EventEmitter {
  readonly connectedAt = Date.now();
  private queue: Alert[] = [];
  private _state: SubscriberState = 'active';
  private _dropped = 0;
  private _delivered = 0;
  private reportedDrops = 0;

  constructor(
    readonly id: string,
    readonly filter: AlertFilter,
    readonly predicate: AlertPredicate,
    readonly capacity: number,
  ) {
    super();
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`queue capacity must be >= 1, got ${capacity}`);
  }

  get state(): SubscriberState { return this._state; }
  get dropped(): number { return this._dropped; }
  get delivered(): number { return this._delivered; }
  get queued(): number { return this.queue.length; }

  matches(alert: Alert): boolean {
    return this.predicate(alert);
  }

  /** Returns false when the subscriber no longer accepts alerts. */
  offer(alert: Alert): boolean {
    if (this._state !== 'active') return false;
    const wasEmpty = this.queue.length === 0;
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this._dropped++;
    }
    this.queue.push(alert);
    if (wasEmpty) this.emit('ready');
    return true;
  }

  /** Queued alerts, oldest first, without removing them. */
  pending(): readonly Alert[] {
    return this.queue.slice();
  }

  /** Remove and return up to `max` alerts, oldest first. */
  take(max: number = Infinity): Alert[] {
    const batch = max >= this.queue.length ? this.queue : this.queue.slice(0, max);
    this.queue = max >= this.queue.length ? [] : this.queue.slice(max);
    this._delivered += batch.length;
    if (this._state === 'draining' && this.queue.length === 0) this.close();
    return batch;
  }

  /** Stop accepting alerts; closes once the queue has been taken. */
  beginDrain(): void {
    if (this._state !== 'active') return;
    this._state = 'draining';
    if (this.queue.length === 0) this.close();
  }

  close(): void {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this.queue = [];
    this.emit('closed');
    this.removeAllListeners();
  }

  /** Drops since the previous call, for periodic reporting. */
  takeDropDelta(): number {
    const delta = this._dropped - this.reportedDrops;
    this.reportedDrops = this._dropped;
    return delta;
  }

  info(): SubscriberInfo {
    return {
      id: this.id,
      state: this._state,
      filter: this.filter,
      queued: this.queue.length,
      dropped: this._dropped,
      delivered: this._delivered,
      connectedAt: this.connectedAt,
    };
  }
}
