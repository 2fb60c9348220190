// ============================================================================
// flexwatch: Retention Store
// ============================================================================
import { EventEmitter } from 'events';
import { rename } from 'fs/promises';
import type { Alert, StoreStats, UnsequencedAlert } from '@flexwatch/shared';
import { StoreIOError, errorMessage } from '../errors.js';
import { logDebug, logError, logInfo, logWarn } from '../logger.js';
import type { AlertPredicate } from '../hub/filter.js';
import { SnapshotFormatError, decodeSnapshot, type DecodedSnapshot, encodeSnapshot, readSnapshotFile, writeSnapshotFile } from './snapshot.js';

export interface RetentionStoreOptions {
  /** Snapshot file; null keeps the store in memory only. */
  path: string | null;
  retentionMs: number;
  flushIntervalMs: number;
  evictIntervalMs: number;
  clock?: () => number;
}

export interface QueryOptions {
  maxAgeMs?: number;
  limit?: number;
  now?: number;
}

const ALL: AlertPredicate = () => true;

function freezeAlert(alert: Alert): Alert {
  return Object.freeze({
    ...alert,
    capcodes: Object.freeze([...alert.capcodes]),
    matchedAliases: Object.freeze([...alert.matchedAliases]),
  });
}

/**
 * Append-only alert history ordered by id. Every method that touches the
 * sequence is synchronous, so append, evict and query never interleave; the
 * durable flush serializes a copy up front and does its I/O afterwards.
 */
export class RetentionStore extends EventEmitter {
  private alerts: Alert[] = [];
  private highWater = 0;
  private dirty = false;
  private flushing: Promise<boolean> | null = null;
  private flushAgain = false;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private evictTimer: ReturnType<typeof setInterval> | null = null;
  private lastFlushAt: number | null = null;
  private flushFailures = 0;
  private skippedOnLoad = 0;
  // Set when an existing history file could not be read; writing would destroy it.
  private persistBlocked = false;
  private readonly clock: () => number;

  constructor(private readonly opts: RetentionStoreOptions) {
    super();
    this.clock = opts.clock ?? Date.now;
  }

  get size(): number { return this.alerts.length; }
  get highWaterMark(): number { return this.highWater; }
  get isDirty(): boolean { return this.dirty; }

  /**
   * Missing and corrupt files start the store empty. A file that exists but
   * cannot be read throws StoreIOError and blocks every later flush.
   */
  async load(): Promise<void> {
    const path = this.opts.path;
    if (!path) return;

    let text: string | null;
    try {
      text = await readSnapshotFile(path);
    } catch (err) {
      this.persistBlocked = true;
      throw new StoreIOError(path, `Cannot read history ${path}: ${errorMessage(err)}`, { cause: err });
    }
    if (text === null) {
      logInfo(`💾 No history at ${path}, starting empty`);
      return;
    }

    let decoded: DecodedSnapshot;
    try {
      decoded = decodeSnapshot(text);
    } catch (err) {
      if (!(err instanceof SnapshotFormatError)) throw err;
      await this.moveAside(path, err.message);
      return;
    }

    const alerts: Alert[] = [];
    for (const a of decoded.alerts.sort((x, y) => x.id - y.id)) {
      if (alerts.length > 0 && alerts[alerts.length - 1].id === a.id) continue;
      alerts.push(freezeAlert(a));
    }

    this.alerts = alerts;
    this.highWater = Math.max(decoded.highWater, alerts.length ? alerts[alerts.length - 1].id : 0);
    this.skippedOnLoad = decoded.skipped;
    if (decoded.skipped > 0) logWarn(`💾 Skipped ${decoded.skipped} invalid history records`);

    const evicted = this.evict();
    logInfo(`💾 History loaded: ${this.alerts.length} alerts (${evicted} expired), next id ${this.highWater + 1}`);
  }

  private async moveAside(path: string, reason: string): Promise<void> {
    const aside = `${path}.corrupt-${this.clock()}`;
    try {
      await rename(path, aside);
      logError(`💾 History ${path} unreadable (${reason}), moved to ${aside}; starting empty`);
    } catch (err) {
      logError(`💾 History ${path} unreadable (${reason}) and could not be moved aside: ${errorMessage(err)}`);
    }
  }

  start(): void {
    if (!this.flushTimer && this.opts.path) {
      this.flushTimer = setInterval(() => {
        if (this.dirty) void this.flush();
      }, this.opts.flushIntervalMs);
      this.flushTimer.unref();
    }
    if (!this.evictTimer) {
      this.evictTimer = setInterval(() => this.evict(), this.opts.evictIntervalMs);
      this.evictTimer.unref();
    }
  }

  append(entry: UnsequencedAlert): Alert {
    const alert = freezeAlert({ ...entry, id: ++this.highWater });
    this.alerts.push(alert);
    this.dirty = true;
    this.emit('appended', alert);
    return alert;
  }

  /** Matching alerts, newest first. */
  query(predicate: AlertPredicate = ALL, opts: QueryOptions = {}): Alert[] {
    const limit = opts.limit ?? Infinity;
    const cutoff = opts.maxAgeMs !== undefined ? (opts.now ?? this.clock()) - opts.maxAgeMs : -Infinity;
    const out: Alert[] = [];
    for (let i = this.alerts.length - 1; i >= 0 && out.length < limit; i--) {
      const alert = this.alerts[i];
      if (alert.timestamp < cutoff) continue;
      if (predicate(alert)) out.push(alert);
    }
    return out;
  }

  get(id: number): Alert | undefined {
    let lo = 0;
    let hi = this.alerts.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const candidate = this.alerts[mid];
      if (candidate.id === id) return candidate;
      if (candidate.id < id) lo = mid + 1;
      else hi = mid - 1;
    }
    return undefined;
  }

  /**
   * Drop alerts whose timestamp falls before the retention window. Source
   * timestamps can be slightly out of order, so this scans rather than
   * cutting at the first in-window entry.
   */
  evict(now: number = this.clock()): number {
    const cutoff = now - this.opts.retentionMs;
    const before = this.alerts.length;
    if (before === 0 || this.alerts.every((a) => a.timestamp >= cutoff)) return 0;
    this.alerts = this.alerts.filter((a) => a.timestamp >= cutoff);
    const removed = before - this.alerts.length;
    this.dirty = true;
    logDebug(`💾 Evicted ${removed} alerts older than ${new Date(cutoff).toISOString()}`);
    this.emit('evicted', removed);
    return removed;
  }

  /**
   * Persist the current sequence. Concurrent calls share one write and queue
   * at most one follow-up. Never rejects: failures are logged, counted and
   * left dirty for the next interval.
   */
  flush(): Promise<boolean> {
    if (this.flushing) {
      this.flushAgain = true;
      return this.flushing;
    }
    this.flushing = this.runFlush().finally(() => {
      this.flushing = null;
    });
    return this.flushing;
  }

  private async runFlush(): Promise<boolean> {
    let ok: boolean;
    do {
      this.flushAgain = false;
      ok = await this.writeOnce();
    } while (ok && this.flushAgain);
    return ok;
  }

  private async writeOnce(): Promise<boolean> {
    const path = this.opts.path;
    if (!path) {
      this.dirty = false;
      return true;
    }
    if (this.persistBlocked) {
      logError(`💾 Not writing ${path}: the existing history could not be read`);
      return false;
    }
    const contents = encodeSnapshot({ highWater: this.highWater, alerts: this.alerts });
    const count = this.alerts.length;
    this.dirty = false;
    try {
      await writeSnapshotFile(path, contents);
      this.lastFlushAt = this.clock();
      logDebug(`💾 History flushed: ${count} alerts`);
      this.emit('flushed', count);
      return true;
    } catch (err) {
      this.dirty = true;
      this.flushFailures++;
      const error = new StoreIOError(path, `History flush failed: ${errorMessage(err)}`, { cause: err });
      logError(`💾 ${error.message} (failure ${this.flushFailures}, retrying next interval)`);
      this.emit('flush_error', error);
      return false;
    }
  }

  stats(): StoreStats {
    let oldest: number | null = null;
    let newest: number | null = null;
    for (const a of this.alerts) {
      if (oldest === null || a.timestamp < oldest) oldest = a.timestamp;
      if (newest === null || a.timestamp > newest) newest = a.timestamp;
    }
    return {
      alerts: this.alerts.length,
      highWater: this.highWater,
      oldestTimestamp: oldest,
      newestTimestamp: newest,
      lastFlushAt: this.lastFlushAt,
      flushFailures: this.flushFailures,
      skippedOnLoad: this.skippedOnLoad,
    };
  }

  /** Stop timers and write a final snapshot. */
  async close(): Promise<boolean> {
    if (this.flushTimer) { clearInterval(this.flushTimer); this.flushTimer = null; }
    if (this.evictTimer) { clearInterval(this.evictTimer); this.evictTimer = null; }
    if (this.flushing) await this.flushing;
    return this.dirty ? this.flush() : true;
  }
}
