import fs from 'fs';
import path from 'path';
import DatabaseConstructor from 'better-sqlite3';
import { createLogger } from '@venuepilot/logger';
import { isPlainRecord } from '@venuepilot/util';

const logger = createLogger('sqlite');

type Migration = {
  id: string;
  statements: string[];
};

const MIGRATIONS: Migration[] = [
  {
    id: '0001_init',
    statements: [
      `CREATE TABLE IF NOT EXISTS audit_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        kind TEXT NOT NULL,
        actor TEXT,
        outcome TEXT NOT NULL,
        detail TEXT NOT NULL
      );`,
      `CREATE INDEX IF NOT EXISTS idx_audit_events_ts ON audit_events(ts);`,
      `CREATE TABLE IF NOT EXISTS auto_toggle_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        baseline REAL,
        peak REAL,
        direction TEXT NOT NULL DEFAULT 'none',
        enabled INTEGER,
        updated_at INTEGER NOT NULL
      );`
    ]
  }
];

export type AuditEvent = {
  ts: number;
  kind: string;
  actor?: string;
  outcome: string;
  detail?: Record<string, unknown>;
};

export type AuditRecord = Required<Omit<AuditEvent, 'actor'>> & { id: number; actor: string | null };

export type ToggleDirection = 'none' | 'long' | 'short';

export type AutoToggleState = {
  baseline: number | null;
  peak: number | null;
  direction: ToggleDirection;
  enabled: boolean;
};

/** The tracked part of the state; `enabled` is only written by an explicit on/off. */
export type AutoToggleTracking = Omit<AutoToggleState, 'enabled'>;

export const INITIAL_AUTO_TOGGLE_STATE: AutoToggleState = {
  baseline: null,
  peak: null,
  direction: 'none',
  enabled: true
};

type AuditRow = {
  id: number;
  ts: number;
  kind: string;
  actor: string | null;
  outcome: string;
  detail: string;
};

type AutoToggleRow = {
  baseline: number | null;
  peak: number | null;
  direction: string;
  enabled: number | null;
};

function toDirection(value: string): ToggleDirection {
  return value === 'long' || value === 'short' ? value : 'none';
}

function parseDetail(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainRecord(parsed) ? parsed : {};
  } catch (err) {
    logger.warn({ err }, 'audit detail is not valid JSON');
    return {};
  }
}

function ensureDataDir(filePath: string): void {
  if (filePath === ':memory:') return;
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function runMigrations(instance: DatabaseConstructor.Database): void {
  instance.exec('CREATE TABLE IF NOT EXISTS migrations (id TEXT PRIMARY KEY, applied_at TEXT NOT NULL);');
  const appliedStmt = instance.prepare('SELECT id FROM migrations WHERE id = ?');
  const insertStmt = instance.prepare('INSERT INTO migrations (id, applied_at) VALUES (?, CURRENT_TIMESTAMP)');
  for (const migration of MIGRATIONS) {
    if (appliedStmt.get(migration.id)) {
      continue;
    }
    const applyMigration = instance.transaction(() => {
      for (const statement of migration.statements) {
        instance.exec(statement);
      }
      insertStmt.run(migration.id);
    });
    applyMigration();
    logger.info({ migration: migration.id }, 'applied sqlite migration');
  }
}

export class PersistenceStore {
  private readonly db: DatabaseConstructor.Database;

  constructor(filePath: string) {
    ensureDataDir(filePath);
    this.db = new DatabaseConstructor(filePath, { timeout: 5000 });
    if (filePath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    runMigrations(this.db);
  }

  recordAudit(event: AuditEvent): void {
    this.db
      .prepare('INSERT INTO audit_events (ts, kind, actor, outcome, detail) VALUES (?, ?, ?, ?, ?)')
      .run(event.ts, event.kind, event.actor ?? null, event.outcome, JSON.stringify(event.detail ?? {}));
  }

  listAudit(limit = 50): AuditRecord[] {
    const rows = this.db
      .prepare('SELECT id, ts, kind, actor, outcome, detail FROM audit_events ORDER BY id DESC LIMIT ?')
      .all(limit) as AuditRow[];
    return rows.map((row) => ({ ...row, detail: parseDetail(row.detail) }));
  }

  loadAutoToggleState(fallback: AutoToggleState = INITIAL_AUTO_TOGGLE_STATE): AutoToggleState {
    const row = this.db
      .prepare('SELECT baseline, peak, direction, enabled FROM auto_toggle_state WHERE id = 1')
      .get() as AutoToggleRow | undefined;
    if (!row) {
      return { ...fallback };
    }
    return {
      baseline: row.baseline,
      peak: row.peak,
      direction: toDirection(row.direction),
      enabled: row.enabled === null ? fallback.enabled : row.enabled === 1
    };
  }

  saveAutoToggleState(state: AutoToggleTracking, now = Date.now()): void {
    this.db
      .prepare(
        `INSERT INTO auto_toggle_state (id, baseline, peak, direction, updated_at)
         VALUES (1, @baseline, @peak, @direction, @updatedAt)
         ON CONFLICT(id) DO UPDATE SET
           baseline = excluded.baseline,
           peak = excluded.peak,
           direction = excluded.direction,
           updated_at = excluded.updated_at`
      )
      .run({
        baseline: state.baseline,
        peak: state.peak,
        direction: state.direction,
        updatedAt: now
      });
  }

  saveAutoToggleEnabled(enabled: boolean, now = Date.now()): void {
    this.db
      .prepare(
        `INSERT INTO auto_toggle_state (id, enabled, updated_at)
         VALUES (1, @enabled, @updatedAt)
         ON CONFLICT(id) DO UPDATE SET
           enabled = excluded.enabled,
           updated_at = excluded.updated_at`
      )
      .run({ enabled: enabled ? 1 : 0, updatedAt: now });
  }

  close(): void {
    this.db.close();
  }
}

export function openStore(filePath: string): PersistenceStore {
  return new PersistenceStore(filePath);
}
