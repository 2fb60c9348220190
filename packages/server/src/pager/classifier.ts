import type { CapcodeRecord, ColorClass, ParsedMessage, Priority, Service, UnsequencedAlert } from '@flexwatch/shared';
import { isUnknownCapcode, type CapcodeTable } from '../capcodes/table.js';

const PRIORITY_TOKEN = /\b(A0|A1|A2|B1|B2|P\s*1|TEST)\b/i;

const COLOR_CLASSES: Record<Service, ColorClass> = {
  Fire: 'service-fire',
  Ambulance: 'service-ambulance',
  Police: 'service-police',
  TraumaHeli: 'service-trauma',
  Unknown: 'service-unknown',
};

/** Leftmost priority token in the text, `P 1` folded to `P1`. */
export function extractPriority(text: string): Priority | null {
  const m = text.match(PRIORITY_TOKEN);
  if (!m) return null;
  const token = m[1].replace(/\s+/g, '').toUpperCase();
  switch (token) {
    case 'A0': case 'A1': case 'A2': case 'B1': case 'B2': case 'P1': case 'TEST':
      return token;
    default:
      return null;
  }
}

export function colorClassFor(service: Service): ColorClass {
  return COLOR_CLASSES[service];
}

/**
 * Enrich a parsed message. Service and colour come from the first capcode
 * that the table knows; priority from the body, then the first match's hint.
 */
export function classify(message: ParsedMessage, table: CapcodeTable): UnsequencedAlert {
  const matched: CapcodeRecord[] = [];
  for (const cc of message.capcodes) {
    const record = table.lookup(cc);
    if (!isUnknownCapcode(record)) matched.push(record);
  }

  const primary: CapcodeRecord | undefined = matched[0];
  const service: Service = primary?.service ?? 'Unknown';
  const priority = extractPriority(message.body) ?? primary?.priorityHint ?? 'Unknown';

  const alert: UnsequencedAlert = {
    timestamp: message.timestamp,
    receivedAt: message.receivedAt,
    capcodes: [...message.capcodes],
    body: message.body,
    protocol: message.protocol,
    messageType: message.messageType,
    service,
    priority,
    colorClass: colorClassFor(service),
    matchedAliases: matched.map((r) => r.alias),
  };
  if (message.rawTime !== undefined) alert.rawTime = message.rawTime;
  return alert;
}
