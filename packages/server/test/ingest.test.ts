import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { PassThrough } from 'stream';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseCapcodeText } from '../src/capcodes/table.js';
import { IngestionLostError } from '../src/errors.js';
import { BroadcastHub } from '../src/hub/service.js';
import { LineSplitter } from '../src/ingest/lines.js';
import { IngestionLoop, type ActivityRecorder } from '../src/ingest/service.js';
import { RetentionStore } from '../src/store/service.js';

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');
const RECEIVED = 1_709_644_931_000;

const FIRE_LINE = 'FLEX|2024-03-05 14:22:10|1600/2/K/A|08.094|000012345|ALN|A1 Brandweer Dordrecht Spuiboulevard 12 Dordrecht 123456';
const AMBU_LINE = 'FLEX|2024-03-05 14:22:11|1600/2/K/A|08.095|001420001 000012345|ALN|P 1 Ambu 17-123 Rit 12345';

const table = parseCapcodeText('012345,Fire Station 1,Fire,A1\n1420001,Ambu Post,Ambulance,B1\n');

describe('LineSplitter', () => {
  it('yields only complete lines and keeps the tail', () => {
    const splitter = new LineSplitter();

    expect(splitter.push('FLEX|a')).toEqual([]);
    expect(splitter.push('bc\r\nsecond\nthi')).toEqual(['FLEX|abc', 'second']);
    expect(splitter.pending).toBe('thi');
    expect(splitter.push('rd\n')).toEqual(['third']);
    expect(splitter.reset()).toBe('');
  });
});

describe('IngestionLoop', () => {
  let store: RetentionStore;
  let hub: BroadcastHub;

  const createLoop = (activity?: ActivityRecorder) =>
    new IngestionLoop({ capcodes: { current: () => table }, store, hub, activity, clock: () => RECEIVED });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = new RetentionStore({ path: null, retentionMs: 3 * 86_400_000, flushIntervalMs: 1000, evictIntervalMs: 1000 });
    hub = new BroadcastHub(store, { queueSize: 16, snapshotLimit: 100 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('turns a decoder line into a stored and published alert', () => {
    const loop = createLoop();
    const { subscriber } = hub.subscribe();

    const [alert] = loop.processLine(FIRE_LINE);

    expect(alert).toMatchObject({
      id: 1,
      capcodes: ['0012345'],
      service: 'Fire',
      priority: 'A1',
      colorClass: 'service-fire',
      matchedAliases: ['Fire Station 1'],
      receivedAt: RECEIVED,
      timestamp: new Date(2024, 2, 5, 14, 22, 10).getTime(),
    });
    expect(store.get(1)).toBe(alert);
    expect(subscriber.pending()).toEqual([alert]);
  });

  it('drops malformed lines without touching store or hub', () => {
    const loop = createLoop();
    const onParseError = vi.fn();
    loop.on('parse_error', onParseError);

    loop.processLine(FIRE_LINE);
    expect(loop.processLine('FLEX|2024-03-05 14:22:10|broken')).toEqual([]);
    expect(loop.processLine('')).toEqual([]);
    const [second] = loop.processLine(AMBU_LINE);

    expect(store.size).toBe(2);
    expect(second.id).toBe(2);
    expect(second).toMatchObject({ service: 'Ambulance', priority: 'P1', matchedAliases: ['Ambu Post', 'Fire Station 1'] });
    expect(hub.stats().published).toBe(2);
    expect(onParseError).toHaveBeenCalledTimes(2);
    expect(loop.stats()).toEqual({
      linesRead: 4,
      messagesParsed: 2,
      parseErrors: 2,
      alertsAppended: 2,
      lineFailures: 0,
      lastLineAt: RECEIVED,
    });
  });

  it('keeps ingesting when the activity ledger fails', () => {
    const loop = createLoop({
      record: () => {
        throw new Error('disk full');
      },
    });

    expect(loop.processLine(FIRE_LINE)).toHaveLength(1);
    expect(store.size).toBe(1);
    expect(loop.stats().lineFailures).toBe(0);
  });

  it('reassembles lines split across chunks and fails when the stream ends', async () => {
    const loop = createLoop();
    const stream = new PassThrough();
    const run = loop.run(stream);

    stream.write(FIRE_LINE.slice(0, 30));
    stream.write(`${FIRE_LINE.slice(30)}\r\nmultimon-ng 1.2.0\n${AMBU_LINE.slice(0, 20)}`);
    stream.write(`${AMBU_LINE.slice(20)}\nFLEX|2024-03-05 14:22`);
    stream.end();

    const error = await run.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IngestionLostError);
    expect(error).toMatchObject({ code: 'INGESTION_LOST', message: 'Decoder stream ended' });
    expect(store.query().map((a) => [a.id, a.body])).toEqual([
      [2, 'P 1 Ambu 17-123 Rit 12345'],
      [1, 'A1 Brandweer Dordrecht Spuiboulevard 12 Dordrecht 123456'],
    ]);
    expect(loop.stats().parseErrors).toBe(1);
  });

  it('fails with the stream error', async () => {
    const loop = createLoop();
    const stream = new PassThrough();
    const run = loop.run(stream);

    stream.destroy(new Error('pipe broke'));

    const error = await run.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IngestionLostError);
    expect(error).toMatchObject({ message: 'Decoder stream failed: pipe broke' });
  });

  it('ingests a captured decoder session', async () => {
    const loop = createLoop();
    const stream = new PassThrough();
    const run = loop.run(stream);

    stream.end(readFileSync(join(FIXTURES, 'decoder-sample.txt')));
    await expect(run).rejects.toBeInstanceOf(IngestionLostError);

    expect(store.size).toBe(3);
    expect(store.query().map((a) => a.service)).toEqual(['Unknown', 'Ambulance', 'Fire']);
    expect(loop.stats()).toMatchObject({ linesRead: 7, parseErrors: 4, alertsAppended: 3 });
  });
});
