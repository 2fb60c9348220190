import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { UnsequencedAlert } from '@flexwatch/shared';
import { StoreIOError } from '../src/errors.js';
import { encodeSnapshot, readSnapshotFile } from '../src/store/snapshot.js';
import { RetentionStore } from '../src/store/service.js';

vi.mock('../src/store/snapshot.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/store/snapshot.js')>();
  return { ...actual, readSnapshotFile: vi.fn(actual.readSnapshotFile) };
});

const NOW = Date.UTC(2024, 2, 5, 12, 0, 0);

function entry(): UnsequencedAlert {
  return {
    timestamp: NOW,
    receivedAt: NOW,
    capcodes: ['0012345'],
    body: 'A1 Brandweer Dordrecht',
    protocol: 'FLEX',
    messageType: 'alpha',
    service: 'Fire',
    priority: 'A1',
    colorClass: 'service-fire',
    matchedAliases: ['Fire Station 1'],
  };
}

function createStore(path: string): RetentionStore {
  return new RetentionStore({
    path,
    retentionMs: 3 * 86_400_000,
    flushIntervalMs: 60_000,
    evictIntervalMs: 60_000,
    clock: () => NOW,
  });
}

describe('RetentionStore with an unreadable history file', () => {
  let dir: string;
  let path: string;
  let original: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    dir = mkdtempSync(join(tmpdir(), 'flexwatch-load-'));
    path = join(dir, 'history.json');
    original = encodeSnapshot({ highWater: 50, alerts: [{ ...entry(), id: 50 }] });
    writeFileSync(path, original);

    vi.mocked(readSnapshotFile).mockRejectedValueOnce(
      Object.assign(new Error('EIO: i/o error, read'), { code: 'EIO' }),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('fails the load instead of starting empty', async () => {
    const store = createStore(path);

    const failure = store.load();
    await expect(failure).rejects.toBeInstanceOf(StoreIOError);
    await expect(failure).rejects.toThrow(`Cannot read history ${path}: EIO: i/o error, read`);
  });

  it('never overwrites the file after a failed load', async () => {
    const store = createStore(path);
    await expect(store.load()).rejects.toBeInstanceOf(StoreIOError);

    store.append(entry());
    expect(await store.flush()).toBe(false);
    expect(await store.close()).toBe(false);

    expect(store.isDirty).toBe(true);
    expect(store.stats().flushFailures).toBe(0);
    expect(readFileSync(path, 'utf-8')).toBe(original);
  });

  it('continues the id sequence once the file reads again', async () => {
    await expect(createStore(path).load()).rejects.toBeInstanceOf(StoreIOError);

    const store = createStore(path);
    await store.load();

    expect(store.get(50)?.body).toBe('A1 Brandweer Dordrecht');
    expect(store.append(entry()).id).toBe(51);
  });
});
