// ============================================================================
// flexwatch: History snapshot file (atomic replace)
// ============================================================================
import { mkdir, open, readFile, rename, unlink } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Alert } from '@flexwatch/shared';
import { logDebug } from '../logger.js';

export const SNAPSHOT_VERSION = 1;

// Unknown keys are stripped, so files written by newer builds still load.
const alertSchema = z.object({
  id: z.number().int().positive(),
  timestamp: z.number().finite(),
  receivedAt: z.number().finite().optional(),
  rawTime: z.string().optional(),
  capcodes: z.array(z.string()).min(1),
  body: z.string(),
  protocol: z.enum(['FLEX', 'POCSAG', 'Unknown']).catch('Unknown'),
  messageType: z.enum(['alpha', 'numeric', 'tone', 'binary', 'unknown']).catch('unknown'),
  service: z.enum(['Fire', 'Ambulance', 'Police', 'TraumaHeli', 'Unknown']).catch('Unknown'),
  priority: z.enum(['A0', 'A1', 'A2', 'B1', 'B2', 'P1', 'TEST', 'Unknown']).catch('Unknown'),
  colorClass: z
    .enum(['service-fire', 'service-ambulance', 'service-police', 'service-trauma', 'service-unknown'])
    .catch('service-unknown'),
  matchedAliases: z.array(z.string()).default([]),
});

const snapshotSchema = z.object({
  version: z.number().int().min(1),
  highWater: z.number().int().min(0).default(0),
  alerts: z.array(z.unknown()),
});

export interface SnapshotData {
  highWater: number;
  alerts: Alert[];
}

export interface DecodedSnapshot extends SnapshotData {
  skipped: number;
}

export class SnapshotFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnapshotFormatError';
  }
}

export function encodeSnapshot(data: SnapshotData): string {
  return JSON.stringify({ version: SNAPSHOT_VERSION, highWater: data.highWater, alerts: data.alerts });
}

/** Invalid individual records are skipped and counted; an invalid envelope throws. */
export function decodeSnapshot(text: string): DecodedSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SnapshotFormatError('snapshot is not valid JSON', { cause: err });
  }
  const envelope = snapshotSchema.safeParse(raw);
  if (!envelope.success) {
    throw new SnapshotFormatError(`snapshot envelope invalid: ${envelope.error.issues[0]?.message ?? 'unknown'}`);
  }

  const alerts: Alert[] = [];
  let skipped = 0;
  for (const item of envelope.data.alerts) {
    const parsed = alertSchema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const { receivedAt, rawTime, ...rest } = parsed.data;
    const alert: Alert = { ...rest, receivedAt: receivedAt ?? rest.timestamp };
    if (rawTime !== undefined) alert.rawTime = rawTime;
    alerts.push(alert);
  }
  return { highWater: envelope.data.highWater, alerts, skipped };
}

/** Null when the file does not exist yet. */
export async function readSnapshotFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

/**
 * Write to `<path>.tmp`, fsync, then rename over `path`. A crash at any point
 * leaves either the previous file or the new one on disk, never a torn write.
 */
export async function writeSnapshotFile(path: string, contents: string): Promise<void> {
  const tmp = `${path}.tmp`;
  await mkdir(dirname(path), { recursive: true });
  const handle = await open(tmp, 'w');
  try {
    await handle.writeFile(contents, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await rename(tmp, path);
  } catch (err) {
    await unlink(tmp).catch((cleanupErr: unknown) => logDebug(`💾 Could not remove ${tmp}`, cleanupErr));
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
