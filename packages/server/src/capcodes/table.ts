// ============================================================================
// flexwatch: Capcode Table
// ============================================================================
import { readFile } from 'fs/promises';
import type { CapcodeRecord, CapcodeTableStats, Priority, Service } from '@flexwatch/shared';
import { LoadError, errorMessage } from '../errors.js';
import { logDebug, logInfo } from '../logger.js';

export const CAPCODE_DIGITS = 7;

export const PRIORITIES: readonly Priority[] = ['A0', 'A1', 'A2', 'B1', 'B2', 'P1', 'TEST'];

const SERVICES: readonly Service[] = ['Fire', 'Ambulance', 'Police', 'TraumaHeli', 'Unknown'];

export const UNKNOWN_CAPCODE: CapcodeRecord = Object.freeze<CapcodeRecord>({
  capcode: '',
  alias: 'Unknown',
  service: 'Unknown',
});

/**
 * Reduce a decoder or list capcode to its 7-digit short form.
 * FLEX addresses arrive as 9 digits (`001234567`), lists use 7 (`1234567`)
 * and some use fewer with the leading zeros dropped.
 */
export function normalizeCapcode(raw: string): string | null {
  const digits = raw.trim();
  if (!/^\d+$/.test(digits)) return null;
  return digits.slice(-CAPCODE_DIGITS).padStart(CAPCODE_DIGITS, '0');
}

export function isUnknownCapcode(record: CapcodeRecord): boolean {
  return record === UNKNOWN_CAPCODE;
}

/** Derive a service from free text (Dutch discipline names or English tags). */
export function serviceFromText(discipline: string, unit = ''): Service {
  const d = discipline.toLowerCase();
  const u = unit.toLowerCase();
  if (['trauma', 'heli', 'lifeliner', 'mmt'].some((k) => u.includes(k) || d.includes(k))) return 'TraumaHeli';
  if (d.includes('brandweer') || d.includes('fire')) return 'Fire';
  if (['ambulance', 'rav', 'ghor'].some((k) => d.includes(k))) return 'Ambulance';
  if (d.includes('politie') || d.includes('kmar') || d.includes('police')) return 'Police';
  return 'Unknown';
}

function parseServiceTag(tag: string): Service {
  const exact = SERVICES.find((s) => s.toLowerCase() === tag.trim().toLowerCase());
  return exact ?? serviceFromText(tag);
}

function parsePriority(raw: string): Priority | null {
  const upper = raw.replace(/\s+/g, '').toUpperCase();
  return PRIORITIES.find((p) => p === upper) ?? null;
}

/** Split one delimited row, honouring double-quoted fields and `""` escapes. */
export function splitRow(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') { current += '"'; i++; }
      else if (ch === '"') quoted = false;
      else current += ch;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === delimiter) {
      fields.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current.trim());
  return fields;
}

type RowResult = { ok: true; record: CapcodeRecord } | { ok: false; reason: string };

// capcode,alias,service[,priority]
function parseCommaRow(fields: string[]): RowResult {
  if (fields.length < 3) return { ok: false, reason: 'too few columns' };
  const [rawCapcode, alias, serviceTag, priorityField = ''] = fields;
  const capcode = normalizeCapcode(rawCapcode);
  if (!capcode) return { ok: false, reason: `bad capcode "${rawCapcode}"` };
  if (!alias) return { ok: false, reason: 'empty alias' };

  const record: CapcodeRecord = { capcode, alias, service: parseServiceTag(serviceTag) };
  if (priorityField) {
    const priority = parsePriority(priorityField);
    if (!priority) return { ok: false, reason: `bad priority "${priorityField}"` };
    record.priorityHint = priority;
  }
  return { ok: true, record };
}

// capcode;discipline;province;region;unit
function parseSemicolonRow(fields: string[]): RowResult {
  if (fields.length < 5) return { ok: false, reason: 'too few columns' };
  const [rawCapcode, discipline, , region, unit] = fields;
  const capcode = normalizeCapcode(rawCapcode);
  if (!capcode) return { ok: false, reason: `bad capcode "${rawCapcode}"` };

  const alias = region ? `${discipline} | ${unit} (${region})` : `${discipline} | ${unit}`;
  const record: CapcodeRecord = { capcode, alias, service: serviceFromText(discipline, unit), unit };
  if (region) record.region = region;
  return { ok: true, record };
}

export class CapcodeTable {
  readonly source: string;
  readonly skipped: number;
  readonly loadedAt: number;
  private readonly records: ReadonlyMap<string, CapcodeRecord>;

  constructor(records: Iterable<CapcodeRecord>, opts: { source?: string; skipped?: number; loadedAt?: number } = {}) {
    const map = new Map<string, CapcodeRecord>();
    for (const r of records) map.set(r.capcode, Object.freeze({ ...r }));
    this.records = map;
    this.source = opts.source ?? '(memory)';
    this.skipped = opts.skipped ?? 0;
    this.loadedAt = opts.loadedAt ?? Date.now();
  }

  get size(): number { return this.records.size; }

  lookup(capcode: string): CapcodeRecord {
    const key = normalizeCapcode(capcode);
    if (!key) return UNKNOWN_CAPCODE;
    return this.records.get(key) ?? UNKNOWN_CAPCODE;
  }

  has(capcode: string): boolean {
    return !isUnknownCapcode(this.lookup(capcode));
  }

  stats(): CapcodeTableStats {
    return { source: this.source, records: this.records.size, skipped: this.skipped, loadedAt: this.loadedAt };
  }
}

export function parseCapcodeText(text: string, source = '(memory)'): CapcodeTable {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const firstRow = lines.find((l) => l.trim() && !l.trim().startsWith('#')) ?? '';
  const delimiter = firstRow.includes(';') ? ';' : ',';
  const parseRow = delimiter === ';' ? parseSemicolonRow : parseCommaRow;

  const records: CapcodeRecord[] = [];
  let skipped = 0;
  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    const result = parseRow(splitRow(trimmed, delimiter));
    if (result.ok) {
      records.push(result.record);
    } else {
      skipped++;
      logDebug(`📟 Capcode row ${index + 1} skipped: ${result.reason}`);
    }
  });

  return new CapcodeTable(records, { source, skipped });
}

export async function loadCapcodeTable(path: string): Promise<CapcodeTable> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new LoadError(path, `Cannot read capcode file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseCapcodeText(text, path);
}

/**
 * Process-wide holder of the current capcode table. Readers take a snapshot
 * reference with `current()`; `reload()` swaps in a fully built table in one
 * assignment so no lookup ever sees a half-loaded list.
 */
export class CapcodeDirectory {
  private table: CapcodeTable;

  constructor(private readonly path: string, initial: CapcodeTable) {
    this.table = initial;
  }

  static async open(path: string): Promise<CapcodeDirectory> {
    const table = await loadCapcodeTable(path);
    logInfo(`📟 Capcodes loaded: ${table.size} (${table.skipped} skipped) from ${path}`);
    return new CapcodeDirectory(path, table);
  }

  current(): CapcodeTable {
    return this.table;
  }

  /** Failed reloads keep the previous table and rethrow. */
  async reload(): Promise<CapcodeTable> {
    const next = await loadCapcodeTable(this.path);
    this.table = next;
    logInfo(`📟 Capcodes reloaded: ${next.size} (${next.skipped} skipped)`);
    return next;
  }
}
