import { PassThrough } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseCapcodeText } from '../src/capcodes/table.js';
import { openDecoderStream, type StdinLike } from '../src/decoder/source.js';
import { IngestionLostError, LoadError } from '../src/errors.js';
import { BroadcastHub } from '../src/hub/service.js';
import { IngestionLoop } from '../src/ingest/service.js';
import { RetentionStore } from '../src/store/service.js';

describe('openDecoderStream', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('refuses an interactive terminal on stdin', async () => {
    const tty: StdinLike = Object.assign(new PassThrough(), { isTTY: true });
    await expect(openDecoderStream({ source: 'stdin', command: '' }, tty)).rejects.toBeInstanceOf(LoadError);
  });

  it('reads piped stdin as is', async () => {
    const piped = new PassThrough();
    const decoder = await openDecoderStream({ source: 'stdin', command: '' }, piped);

    expect(decoder.stream).toBe(piped);
    expect(decoder.description).toBe('stdin');
  });

  it('feeds a spawned command into ingestion until it exits', async () => {
    const store = new RetentionStore({ path: null, retentionMs: 86_400_000, flushIntervalMs: 1000, evictIntervalMs: 1000 });
    const hub = new BroadcastHub(store, { queueSize: 8, snapshotLimit: 10 });
    const loop = new IngestionLoop({
      capcodes: { current: () => parseCapcodeText('012345,Fire Station 1,Fire') },
      store,
      hub,
    });

    const decoder = await openDecoderStream({
      source: 'command',
      command: "printf 'FLEX|2024-03-05 14:22:10|1600/2/K/A|08.094|000012345|ALN|A1 proefalarm\\n'",
    });

    await expect(loop.run(decoder.stream)).rejects.toBeInstanceOf(IngestionLostError);
    decoder.stop();

    expect(store.query().map((a) => [a.body, a.service])).toEqual([['A1 proefalarm', 'Fire']]);
  });
});
