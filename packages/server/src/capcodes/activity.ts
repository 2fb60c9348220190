// ============================================================================
// flexwatch: Capcode activity ledger (SQLite)
// ============================================================================
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Alert, CapcodeActivity } from '@flexwatch/shared';
import type { ActivityRecorder } from '../ingest/service.js';
import { isUnknownCapcode, type CapcodeTable } from './table.js';

interface ActivityRow {
  capcode: string;
  last_alias: string;
  first_seen: number;
  last_seen: number;
  message_count: number;
}

function toActivity(row: ActivityRow): CapcodeActivity {
  return {
    capcode: row.capcode,
    lastAlias: row.last_alias,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    messageCount: row.message_count,
  };
}

/**
 * Per-capcode first/last seen and message counts, kept across restarts.
 * Pass `:memory:` for a throwaway ledger.
 */
export class CapcodeActivityLog implements ActivityRecorder {
  private db: Database.Database;
  private upsert: Database.Statement<[string, string, number, number]>;
  private selectOne: Database.Statement<[string], ActivityRow>;
  private recordAll: (alert: Alert, table: CapcodeTable) => void;

  constructor(path: string) {
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS capcode_activity (
        capcode TEXT PRIMARY KEY,
        last_alias TEXT NOT NULL DEFAULT '',
        first_seen INTEGER NOT NULL,
        last_seen INTEGER NOT NULL,
        message_count INTEGER NOT NULL DEFAULT 1
      );
      CREATE INDEX IF NOT EXISTS idx_capcode_activity_last_seen ON capcode_activity(last_seen);
    `);

    this.upsert = this.db.prepare<[string, string, number, number]>(`
      INSERT INTO capcode_activity (capcode, last_alias, first_seen, last_seen, message_count)
      VALUES (?, ?, ?, ?, 1)
      ON CONFLICT(capcode) DO UPDATE SET
        last_alias = CASE WHEN excluded.last_alias != '' THEN excluded.last_alias ELSE last_alias END,
        first_seen = MIN(first_seen, excluded.first_seen),
        last_seen = MAX(last_seen, excluded.last_seen),
        message_count = message_count + 1
    `);

    this.selectOne = this.db.prepare<[string], ActivityRow>('SELECT * FROM capcode_activity WHERE capcode = ?');

    this.recordAll = this.db.transaction((alert: Alert, table: CapcodeTable) => {
      for (const capcode of alert.capcodes) {
        const record = table.lookup(capcode);
        const alias = isUnknownCapcode(record) ? '' : record.alias;
        this.upsert.run(capcode, alias, alert.timestamp, alert.timestamp);
      }
    });
  }

  record(alert: Alert, table: CapcodeTable): void {
    this.recordAll(alert, table);
  }

  get(capcode: string): CapcodeActivity | null {
    const row = this.selectOne.get(capcode);
    return row ? toActivity(row) : null;
  }

  list(opts: { limit?: number; sort?: 'recent' | 'busiest' } = {}): CapcodeActivity[] {
    const order = opts.sort === 'busiest' ? 'message_count DESC, last_seen DESC' : 'last_seen DESC';
    const rows = this.db
      .prepare<[number], ActivityRow>(`SELECT * FROM capcode_activity ORDER BY ${order} LIMIT ?`)
      .all(opts.limit ?? 100);
    return rows.map(toActivity);
  }

  count(): number {
    const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM capcode_activity').get();
    return row?.c ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
