// FLEX/POCSAG pager alert types

export type PagerProtocol = 'FLEX' | 'POCSAG' | 'Unknown';

export type PagerMessageType = 'alpha' | 'numeric' | 'tone' | 'binary' | 'unknown';

export type Service = 'Fire' | 'Ambulance' | 'Police' | 'TraumaHeli' | 'Unknown';

export type Priority = 'A0' | 'A1' | 'A2' | 'B1' | 'B2' | 'P1' | 'TEST' | 'Unknown';

export type ColorClass =
  | 'service-fire'
  | 'service-ambulance'
  | 'service-police'
  | 'service-trauma'
  | 'service-unknown';

export interface CapcodeRecord {
  capcode: string;
  alias: string;
  service: Service;
  priorityHint?: Priority;
  region?: string;
  unit?: string;
}

export interface ParsedMessage {
  capcodes: string[];
  body: string;
  protocol: PagerProtocol;
  messageType: PagerMessageType;
  /** Decoder time when it could be read, otherwise receipt time (epoch ms). */
  timestamp: number;
  receivedAt: number;
  rawTime?: string;
}

export interface Alert {
  /** Store-assigned, strictly increasing, never reused. */
  id: number;
  timestamp: number;
  receivedAt: number;
  /** Decoder time as printed, when the line carried one. */
  rawTime?: string;
  capcodes: readonly string[];
  body: string;
  protocol: PagerProtocol;
  messageType: PagerMessageType;
  service: Service;
  priority: Priority;
  colorClass: ColorClass;
  matchedAliases: readonly string[];
}

export type UnsequencedAlert = Omit<Alert, 'id'>;

export interface AlertFilter {
  text?: string;
  services?: Service[];
  priorities?: Priority[];
  capcodes?: string[];
}

export type SubscriberState = 'active' | 'draining' | 'closed';

export interface SubscriberInfo {
  id: string;
  state: SubscriberState;
  filter: AlertFilter;
  queued: number;
  dropped: number;
  delivered: number;
  connectedAt: number;
}

export interface CapcodeActivity {
  capcode: string;
  lastAlias: string;
  firstSeen: number;
  lastSeen: number;
  messageCount: number;
}

export interface IngestStats {
  linesRead: number;
  messagesParsed: number;
  parseErrors: number;
  alertsAppended: number;
  lineFailures: number;
  lastLineAt: number | null;
}

export interface StoreStats {
  alerts: number;
  highWater: number;
  oldestTimestamp: number | null;
  newestTimestamp: number | null;
  lastFlushAt: number | null;
  flushFailures: number;
  skippedOnLoad: number;
}

export interface HubStats {
  subscribers: number;
  published: number;
  totalDropped: number;
}

export interface CapcodeTableStats {
  source: string;
  records: number;
  skipped: number;
  loadedAt: number;
}

// Live feed frames (server → viewer)

export interface SnapshotFrame {
  type: 'snapshot';
  subscriberId: string;
  filter: AlertFilter;
  alerts: Alert[];
}

export interface AlertFrame {
  type: 'alert';
  alert: Alert;
}

export type FeedFrame = SnapshotFrame | AlertFrame;
