import { resolve } from 'path';
import { z } from 'zod';

export type DecoderSourceMode = 'stdin' | 'command';

export interface AppConfig {
  http: {
    host: string;
    port: number;
  };
  capcodeFile: string;
  store: {
    historyFile: string;
    retentionMs: number;
    flushIntervalMs: number;
    evictIntervalMs: number;
  };
  hub: {
    queueSize: number;
    snapshotLimit: number;
    dropReportIntervalMs: number;
  };
  decoder: {
    source: DecoderSourceMode;
    command: string;
  };
  activityDbPath: string;
  verbose: boolean;
}

const DAY_MS = 24 * 3600 * 1000;

export const DEFAULT_DECODER_COMMAND = 'rtl_fm -f 169.65M -M fm -s 22050 -p 83 -g 30 | multimon-ng -a FLEX -t raw -';

const flag = (fallback: '0' | '1') =>
  z
    .enum(['0', '1', 'true', 'false'])
    .default(fallback)
    .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8112),
  CAPCODE_FILE: z.string().min(1).default('capcodelijst.csv'),
  HISTORY_FILE: z.string().min(1).default('data/history.json'),
  ACTIVITY_DB_PATH: z.string().min(1).default('data/activity.db'),
  RETENTION_DAYS: z.coerce.number().positive().max(365).default(3),
  FLUSH_INTERVAL_MS: z.coerce.number().int().min(100).max(600_000).default(5000),
  EVICT_INTERVAL_MS: z.coerce.number().int().min(1000).max(3_600_000).default(60_000),
  SUBSCRIBER_QUEUE_SIZE: z.coerce.number().int().min(1).max(100_000).default(256),
  SNAPSHOT_LIMIT: z.coerce.number().int().min(0).max(100_000).default(500),
  DROP_REPORT_INTERVAL_MS: z.coerce.number().int().min(1000).max(3_600_000).default(60_000),
  DECODER_SOURCE: z.enum(['stdin', 'command']).default('stdin'),
  DECODER_COMMAND: z.string().min(1).default(DEFAULT_DECODER_COMMAND),
  VERBOSE: flag('0'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.DECODER_SOURCE === 'command' && parsed.DECODER_COMMAND.trim().length === 0) {
    throw new Error('DECODER_COMMAND must not be blank when DECODER_SOURCE=command');
  }

  return {
    http: {
      host: parsed.HOST,
      port: parsed.PORT,
    },
    capcodeFile: resolve(cwd, parsed.CAPCODE_FILE),
    store: {
      historyFile: resolve(cwd, parsed.HISTORY_FILE),
      retentionMs: Math.round(parsed.RETENTION_DAYS * DAY_MS),
      flushIntervalMs: parsed.FLUSH_INTERVAL_MS,
      evictIntervalMs: parsed.EVICT_INTERVAL_MS,
    },
    hub: {
      queueSize: parsed.SUBSCRIBER_QUEUE_SIZE,
      snapshotLimit: parsed.SNAPSHOT_LIMIT,
      dropReportIntervalMs: parsed.DROP_REPORT_INTERVAL_MS,
    },
    decoder: {
      source: parsed.DECODER_SOURCE,
      command: parsed.DECODER_COMMAND.trim(),
    },
    activityDbPath: resolve(cwd, parsed.ACTIVITY_DB_PATH),
    verbose: parsed.VERBOSE,
  };
}
