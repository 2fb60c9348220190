import { z } from 'zod';
import type { Alert, AlertFilter } from '@flexwatch/shared';
import { normalizeCapcode } from '../capcodes/table.js';

export type AlertPredicate = (alert: Alert) => boolean;

const SERVICES = ['Fire', 'Ambulance', 'Police', 'TraumaHeli', 'Unknown'] as const;
const PRIORITIES = ['A0', 'A1', 'A2', 'B1', 'B2', 'P1', 'TEST', 'Unknown'] as const;

/** Match a query value onto one of `values` regardless of case. */
function caseInsensitiveEnum<T extends string>(values: readonly T[]) {
  const byLower = new Map<string, T>(values.map((v) => [v.toLowerCase(), v]));
  return z.string().transform((raw, ctx): T => {
    const match = byLower.get(raw.toLowerCase());
    if (match === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected one of ${values.join(', ')}, received '${raw}'`,
      });
      return z.NEVER;
    }
    return match;
  });
}

const serviceSchema = caseInsensitiveEnum(SERVICES);
const prioritySchema = caseInsensitiveEnum(PRIORITIES);

/** `a,b` and repeated `?k=a&k=b` both become `['a', 'b']`. */
const listParam = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    const items = (Array.isArray(value) ? value : [value])
      .flatMap((v) => v.split(','))
      .map((v) => v.trim())
      .filter(Boolean);
    return items.length > 0 ? items : undefined;
  });

const filterQuerySchema = z.object({
  q: z.string().optional(),
  service: listParam.pipe(z.array(serviceSchema).optional()),
  priority: listParam.pipe(z.array(prioritySchema).optional()),
  capcode: listParam.pipe(
    z
      .array(z.string().regex(/^\d+$/, 'capcode must be numeric'))
      .transform((codes) => codes.map((c) => normalizeCapcode(c) ?? c))
      .optional(),
  ),
});

export type FilterQuery = Record<string, unknown>;

/** Build a filter from HTTP or WebSocket query parameters. Throws ZodError on bad input. */
export function parseFilterQuery(query: FilterQuery): AlertFilter {
  const parsed = filterQuerySchema.parse(query);
  const filter: AlertFilter = {};
  const text = parsed.q?.trim();
  if (text) filter.text = text;
  if (parsed.service) filter.services = parsed.service;
  if (parsed.priority) filter.priorities = parsed.priority;
  if (parsed.capcode) filter.capcodes = parsed.capcode;
  return filter;
}

export function isEmptyFilter(filter: AlertFilter): boolean {
  return !filter.text && !filter.services?.length && !filter.priorities?.length && !filter.capcodes?.length;
}

/**
 * Compile a filter into a pure predicate. Text matches case-insensitively
 * against the body and the matched aliases; list fields match any member.
 */
export function compileFilter(filter: AlertFilter): AlertPredicate {
  if (isEmptyFilter(filter)) return () => true;

  const needle = filter.text?.toLowerCase();
  const services = filter.services?.length ? new Set(filter.services) : null;
  const priorities = filter.priorities?.length ? new Set(filter.priorities) : null;
  const capcodes = filter.capcodes?.length ? new Set(filter.capcodes) : null;

  return (alert) => {
    if (services && !services.has(alert.service)) return false;
    if (priorities && !priorities.has(alert.priority)) return false;
    if (capcodes && !alert.capcodes.some((c) => capcodes.has(c))) return false;
    if (needle) {
      const inBody = alert.body.toLowerCase().includes(needle);
      if (!inBody && !alert.matchedAliases.some((a) => a.toLowerCase().includes(needle))) return false;
    }
    return true;
  };
}
