// ============================================================================
// flexwatch: Ingestion Loop
// decoder stdout → parse → classify → store.append → hub.publish
// ============================================================================
import { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { Alert, IngestStats } from '@flexwatch/shared';
import type { CapcodeTable } from '../capcodes/table.js';
import { IngestionLostError, errorMessage } from '../errors.js';
import type { BroadcastHub } from '../hub/service.js';
import { logDebug, logError, logInfo, logWarn } from '../logger.js';
import { classify } from '../pager/classifier.js';
import { parseLine } from '../pager/parser.js';
import type { RetentionStore } from '../store/service.js';
import { LineSplitter } from './lines.js';

export interface CapcodeSource {
  current(): CapcodeTable;
}

export interface ActivityRecorder {
  record(alert: Alert, table: CapcodeTable): void;
}

export interface IngestionLoopDeps {
  capcodes: CapcodeSource;
  store: RetentionStore;
  hub: BroadcastHub;
  activity?: ActivityRecorder | null;
  clock?: () => number;
}

/**
 * The single producer. Lines are handled one at a time and synchronously,
 * which is what gives alert ids their arrival order.
 */
export class IngestionLoop extends EventEmitter {
  private counters: IngestStats = {
    linesRead: 0,
    messagesParsed: 0,
    parseErrors: 0,
    alertsAppended: 0,
    lineFailures: 0,
    lastLineAt: null,
  };
  private readonly clock: () => number;

  constructor(private readonly deps: IngestionLoopDeps) {
    super();
    this.clock = deps.clock ?? Date.now;
  }

  /** Handle one complete line. Never throws; returns the alerts it produced. */
  processLine(text: string, receivedAt: number = this.clock()): Alert[] {
    this.counters.linesRead++;
    this.counters.lastLineAt = receivedAt;

    const result = parseLine(text, receivedAt);
    if (!result.ok) {
      this.counters.parseErrors++;
      if (result.error.reason !== 'empty') logDebug(`📟 Dropped line (${result.error.message}): ${result.error.line}`);
      this.emit('parse_error', result.error);
      return [];
    }

    const produced: Alert[] = [];
    try {
      const table = this.deps.capcodes.current();
      for (const message of result.messages) {
        this.counters.messagesParsed++;
        const alert = this.deps.store.append(classify(message, table));
        this.counters.alertsAppended++;
        produced.push(alert);
        this.deps.hub.publish(alert);
        this.recordActivity(alert, table);
        logDebug(`📟 #${alert.id} ${alert.priority} ${alert.service} [${alert.capcodes.join(' ')}] ${alert.body}`);
        this.emit('alert', alert);
      }
    } catch (err) {
      this.counters.lineFailures++;
      logError(`📟 Line handling failed: ${errorMessage(err)}`, text);
    }
    return produced;
  }

  private recordActivity(alert: Alert, table: CapcodeTable): void {
    if (!this.deps.activity) return;
    try {
      this.deps.activity.record(alert, table);
    } catch (err) {
      logWarn(`📟 Capcode activity not recorded for #${alert.id}: ${errorMessage(err)}`);
    }
  }

  /**
   * Consume the decoder stream until it ends. Always rejects with
   * IngestionLostError: a decoder that stops talking is fatal, not idle.
   */
  run(stream: Readable): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      const splitter = new LineSplitter();
      let settled = false;

      const onData = (chunk: string | Buffer) => {
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        for (const line of splitter.push(text)) this.processLine(line);
      };

      const finish = (error: IngestionLostError) => {
        if (settled) return;
        settled = true;
        stream.off('data', onData);
        const tail = splitter.reset();
        if (tail.trim()) logWarn(`📡 Discarding unterminated decoder line: ${tail}`);
        reject(error);
      };

      stream.setEncoding('utf8');
      stream.on('data', onData);
      stream.once('end', () => finish(new IngestionLostError('Decoder stream ended')));
      stream.once('close', () => finish(new IngestionLostError('Decoder stream closed')));
      stream.on('error', (err: Error) => finish(new IngestionLostError(`Decoder stream failed: ${err.message}`, { cause: err })));
      logInfo('📡 Ingestion started');
    });
  }

  stats(): IngestStats {
    return { ...this.counters };
  }
}
