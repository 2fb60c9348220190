import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_DECODER_COMMAND, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults and resolves paths against the working directory', () => {
    expect(loadConfig({}, '/srv/flexwatch')).toEqual({
      http: { host: '0.0.0.0', port: 8112 },
      capcodeFile: '/srv/flexwatch/capcodelijst.csv',
      store: {
        historyFile: '/srv/flexwatch/data/history.json',
        retentionMs: 3 * 86_400_000,
        flushIntervalMs: 5000,
        evictIntervalMs: 60_000,
      },
      hub: { queueSize: 256, snapshotLimit: 500, dropReportIntervalMs: 60_000 },
      decoder: { source: 'stdin', command: DEFAULT_DECODER_COMMAND },
      activityDbPath: '/srv/flexwatch/data/activity.db',
      verbose: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      HOST: '127.0.0.1',
      RETENTION_DAYS: '1.5',
      CAPCODE_FILE: '/etc/flexwatch/capcodes.csv',
      SUBSCRIBER_QUEUE_SIZE: '32',
      DECODER_SOURCE: 'command',
      DECODER_COMMAND: '  multimon-ng -a FLEX -t raw /tmp/capture.raw  ',
      VERBOSE: 'true',
    }, '/srv/flexwatch');

    expect(config.http).toEqual({ host: '127.0.0.1', port: 9000 });
    expect(config.store.retentionMs).toBe(129_600_000);
    expect(config.capcodeFile).toBe('/etc/flexwatch/capcodes.csv');
    expect(config.hub.queueSize).toBe(32);
    expect(config.decoder).toEqual({ source: 'command', command: 'multimon-ng -a FLEX -t raw /tmp/capture.raw' });
    expect(config.verbose).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ZodError);
    expect(() => loadConfig({ RETENTION_DAYS: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ DECODER_SOURCE: 'tcp' })).toThrow(ZodError);
    expect(() => loadConfig({ SUBSCRIBER_QUEUE_SIZE: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ VERBOSE: 'yes' })).toThrow(ZodError);
  });

  it('rejects a blank decoder command in command mode', () => {
    expect(() => loadConfig({ DECODER_SOURCE: 'command', DECODER_COMMAND: '   ' })).toThrow(/DECODER_COMMAND/);
  });
});
