// ============================================================================
// flexwatch: multimon-ng line parser (FLEX / POCSAG)
// ============================================================================
import type { PagerMessageType, ParsedMessage } from '@flexwatch/shared';
import { normalizeCapcode } from '../capcodes/table.js';
import { ParseError } from '../errors.js';

export type ParseResult =
  | { ok: true; messages: ParsedMessage[] }
  | { ok: false; error: ParseError };

// Control character stripping
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

export function cleanContent(raw: string): string {
  return raw.replace(CONTROL_CHARS, '').replace(/\s+/g, ' ').trim();
}

const FLEX_TYPES: Record<string, PagerMessageType> = {
  ALN: 'alpha',
  NUM: 'numeric',
  NNM: 'numeric',
  TON: 'tone',
  BIN: 'binary',
  HEX: 'binary',
};

const DECODER_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

// FLEX: 2017-01-01 12:00:00 1600/2/A 01.025 [001234567] ALN message text
const LEGACY_FLEX = /^FLEX:\s+(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\s+(\S+)\s+(\S+)\s+\[(\d+)\]\s+(\S+)(?:\s(.*))?$/;

// POCSAG1200: Address: 1234567  Function: 0  Alpha:   message text
const POCSAG = /^POCSAG(\d+):\s+Address:\s+(\d+)\s+Function:\s+(\d+)(?:\s+(Alpha|Numeric):\s*(.*))?$/i;

/** Decoder wall-clock time is host-local; unreadable values fall back to receipt time. */
export function parseDecoderTime(raw: string, fallback: number): number {
  const m = raw.trim().match(DECODER_TIME);
  if (!m) return fallback;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  const date = new Date(y, mo - 1, d, h, mi, s);
  if (date.getFullYear() !== y || date.getMonth() !== mo - 1 || date.getDate() !== d) return fallback;
  return date.getTime();
}

function flexType(raw: string): PagerMessageType {
  return FLEX_TYPES[raw.trim().toUpperCase()] ?? 'unknown';
}

/**
 * Normalize a capcode field. A group call lists several capcodes separated by
 * spaces in the one field; they are kept together, de-duplicated, in order.
 */
function parseCapcodeField(field: string, line: string): string[] | ParseError {
  const tokens = field.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return new ParseError('no-capcode', line);
  const out: string[] = [];
  for (const t of tokens) {
    const cc = normalizeCapcode(t);
    if (!cc) return new ParseError('malformed', line, `bad capcode "${t}"`);
    if (!out.includes(cc)) out.push(cc);
  }
  return out;
}

function fail(error: ParseError): ParseResult {
  return { ok: false, error };
}

// FLEX|2024-03-05 14:22:10|1600/2/K/A|08.094|001234567 002029568|ALN|body (may contain |)
function parseFlexPipe(line: string, receivedAt: number): ParseResult {
  const parts = line.split('|');
  if (parts.length < 7) return fail(new ParseError('malformed', line, `expected 7 fields, got ${parts.length}`));
  const [, time, , , caps, type] = parts;
  const capcodes = parseCapcodeField(caps, line);
  if (capcodes instanceof ParseError) return fail(capcodes);
  const rawTime = time.trim();
  return {
    ok: true,
    messages: [{
      capcodes,
      body: cleanContent(parts.slice(6).join('|')),
      protocol: 'FLEX',
      messageType: flexType(type),
      timestamp: parseDecoderTime(rawTime, receivedAt),
      receivedAt,
      rawTime,
    }],
  };
}

function parseFlexLegacy(line: string, receivedAt: number): ParseResult {
  const m = line.match(LEGACY_FLEX);
  if (!m) return fail(new ParseError('malformed', line, 'legacy FLEX layout'));
  const [, time, , , cap, type, body = ''] = m;
  const capcodes = parseCapcodeField(cap, line);
  if (capcodes instanceof ParseError) return fail(capcodes);
  return {
    ok: true,
    messages: [{
      capcodes,
      body: cleanContent(body),
      protocol: 'FLEX',
      messageType: flexType(type),
      timestamp: parseDecoderTime(time, receivedAt),
      receivedAt,
      rawTime: time,
    }],
  };
}

function parsePocsag(line: string, receivedAt: number): ParseResult {
  const m = line.match(POCSAG);
  if (!m) return fail(new ParseError('malformed', line, 'POCSAG layout'));
  const [, , address, , encoding, body = ''] = m;
  const capcodes = parseCapcodeField(address, line);
  if (capcodes instanceof ParseError) return fail(capcodes);
  let messageType: PagerMessageType = 'tone';
  if (encoding) messageType = encoding.toLowerCase() === 'alpha' ? 'alpha' : 'numeric';
  return {
    ok: true,
    messages: [{
      capcodes,
      body: cleanContent(body),
      protocol: 'POCSAG',
      messageType,
      timestamp: receivedAt,
      receivedAt,
    }],
  };
}

/**
 * Parse one complete decoder line. Never throws: anything that does not fit
 * a known multimon-ng layout comes back as a ParseError for the caller to
 * count and drop.
 */
export function parseLine(text: string, receivedAt: number = Date.now()): ParseResult {
  const line = text.replace(/\r$/, '').trim();
  if (!line) return fail(new ParseError('empty', text));
  if (line.startsWith('FLEX|')) return parseFlexPipe(line, receivedAt);
  if (line.startsWith('FLEX:')) return parseFlexLegacy(line, receivedAt);
  if (/^POCSAG\d+:/i.test(line)) return parsePocsag(line, receivedAt);
  return fail(new ParseError('unrecognized', line));
}
