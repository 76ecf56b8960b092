import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import type { CaptureOutcome, CaptureTier } from './types.js';

const CAPTURE_SCHEMA_VERSION = 1;

type IndexDefinition = { name: string; sql: string };

const CAPTURE_INDEX_DEFINITIONS: IndexDefinition[] = [
  { name: 'idx_captures_ts', sql: 'CREATE INDEX IF NOT EXISTS idx_captures_ts ON captures (ts)' },
  {
    name: 'idx_captures_schedule_profile',
    sql: 'CREATE INDEX IF NOT EXISTS idx_captures_schedule_profile ON captures (schedule, profile)'
  },
  { name: 'idx_captures_success', sql: 'CREATE INDEX IF NOT EXISTS idx_captures_success ON captures (success, ts)' }
];

type IndexEnsureResult = { created: string[]; version: number; previousVersion: number };

type CaptureRow = {
  id: number;
  ts: number;
  schedule: string;
  profile: string;
  success: number;
  error: string | null;
  latency_ms: number;
  sequence: number;
  tier: string;
  degraded: number;
};

type CaptureInsert = Omit<CaptureRow, 'id'>;

export type CaptureRecord = CaptureOutcome & { id: number };

export interface ListCapturesOptions {
  limit?: number;
  offset?: number;
  schedule?: string;
  profile?: string;
  success?: boolean;
  since?: number;
  until?: number;
  /** Only rows with a larger id, oldest first, for resuming a feed. */
  afterId?: number;
}

export interface PaginatedCaptures {
  items: CaptureRecord[];
  total: number;
}

/** Capture history table on one SQLite handle. */
export class CaptureStore {
  readonly path: string;
  readonly inMemory: boolean;
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement<CaptureInsert>;
  private readonly deleteOlderThanStatement: Database.Statement<{ cutoff: number }>;

  constructor(dbPath: string) {
    this.inMemory = dbPath === ':memory:';
    this.path = this.inMemory ? dbPath : path.resolve(dbPath);
    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (!this.inMemory) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS captures (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        schedule TEXT NOT NULL,
        profile TEXT NOT NULL,
        success INTEGER NOT NULL,
        error TEXT,
        latency_ms REAL NOT NULL,
        sequence INTEGER NOT NULL,
        tier TEXT NOT NULL,
        degraded INTEGER NOT NULL DEFAULT 0
      );
    `);
    this.ensureIndexes();

    this.insertStatement = this.db.prepare<CaptureInsert>(
      `INSERT INTO captures (ts, schedule, profile, success, error, latency_ms, sequence, tier, degraded)
       VALUES (@ts, @schedule, @profile, @success, @error, @latency_ms, @sequence, @tier, @degraded)`
    );
    this.deleteOlderThanStatement = this.db.prepare<{ cutoff: number }>('DELETE FROM captures WHERE ts < @cutoff');
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  readUserVersion(): number {
    const value = this.db.pragma('user_version', { simple: true });
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
  }

  setUserVersion(version: number) {
    const normalized = Math.max(0, Math.floor(Number(version)) || 0);
    this.db.pragma(`user_version = ${normalized}`);
  }

  ensureIndexes(): IndexEnsureResult {
    const created: string[] = [];
    const previousVersion = this.readUserVersion();
    const existing = new Set(
      this.db
        .prepare<[], { name: string }>("PRAGMA index_list('captures')")
        .all()
        .map(entry => entry.name)
    );

    for (const definition of CAPTURE_INDEX_DEFINITIONS) {
      if (!existing.has(definition.name)) {
        this.db.exec(definition.sql);
        created.push(definition.name);
      }
    }

    let version = previousVersion;
    if (version < CAPTURE_SCHEMA_VERSION) {
      this.setUserVersion(CAPTURE_SCHEMA_VERSION);
      version = CAPTURE_SCHEMA_VERSION;
    }

    return { created, version, previousVersion };
  }

  store(outcome: CaptureOutcome): number {
    const result = this.insertStatement.run({
      ts: outcome.timestamp,
      schedule: outcome.scheduleName,
      profile: outcome.profileId,
      success: outcome.success ? 1 : 0,
      error: outcome.error,
      latency_ms: outcome.latencyMs,
      sequence: outcome.sequence,
      tier: outcome.tier,
      degraded: outcome.degraded ? 1 : 0
    });
    return Number(result.lastInsertRowid);
  }

  list(options: ListCapturesOptions = {}): PaginatedCaptures {
    const filters: string[] = [];
    const params: Record<string, string | number> = {};

    if (options.schedule) {
      filters.push('schedule = @schedule');
      params.schedule = options.schedule;
    }

    if (options.profile) {
      filters.push('profile = @profile');
      params.profile = options.profile;
    }

    if (typeof options.success === 'boolean') {
      filters.push('success = @success');
      params.success = options.success ? 1 : 0;
    }

    if (typeof options.since === 'number') {
      filters.push('ts >= @since');
      params.since = options.since;
    }

    if (typeof options.until === 'number') {
      filters.push('ts <= @until');
      params.until = options.until;
    }

    const { afterId } = options;
    const resuming = typeof afterId === 'number' && Number.isFinite(afterId);
    if (resuming) {
      filters.push('id > @afterId');
      params.afterId = Math.floor(afterId);
    }

    const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
    const limit = clampLimit(options.limit);
    const offset = clampOffset(options.offset);

    const rows = this.db
      .prepare<Record<string, string | number>, CaptureRow>(
        `SELECT id, ts, schedule, profile, success, error, latency_ms, sequence, tier, degraded
         FROM captures
         ${whereClause}
         ${resuming ? 'ORDER BY id ASC' : 'ORDER BY ts DESC, id DESC'}
         LIMIT @limit OFFSET @offset`
      )
      .all({ ...params, limit, offset });
    const totalRow = this.db
      .prepare<Record<string, string | number>, { count: number }>(
        `SELECT COUNT(*) AS count FROM captures ${whereClause}`
      )
      .get(params);

    return {
      items: rows.map(row => mapRow(row)),
      total: totalRow?.count ?? 0
    };
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM captures').get();
    return row?.count ?? 0;
  }

  clear() {
    this.db.prepare('DELETE FROM captures').run();
  }

  pruneOlderThan(cutoffTs: number): number {
    return this.deleteOlderThanStatement.run({ cutoff: cutoffTs }).changes;
  }

  vacuum() {
    if (this.inMemory) {
      return;
    }
    this.db.exec('VACUUM');
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }
}

let defaultStore: CaptureStore | null = null;

/** Opens `database.path` on first use. */
export function getCaptureStore(): CaptureStore {
  if (!defaultStore || !defaultStore.isOpen) {
    defaultStore = new CaptureStore(config.get<string>('database.path'));
  }
  return defaultStore;
}

export function storeCaptureOutcome(outcome: CaptureOutcome): number {
  return getCaptureStore().store(outcome);
}

export function listCaptures(options: ListCapturesOptions = {}): PaginatedCaptures {
  return getCaptureStore().list(options);
}

export function countCaptures(): number {
  return getCaptureStore().count();
}

export function clearCaptures() {
  getCaptureStore().clear();
}

export function pruneCapturesOlderThan(cutoffTs: number): number {
  return getCaptureStore().pruneOlderThan(cutoffTs);
}

export function vacuumDatabase() {
  getCaptureStore().vacuum();
}

export function closeDatabase() {
  defaultStore?.close();
  defaultStore = null;
}

const CAPTURE_TIERS: readonly CaptureTier[] = ['cached', 'light_adapt', 'full_recalc', 'refocus'];

function toTier(value: string): CaptureTier {
  return CAPTURE_TIERS.find(tier => tier === value) ?? 'full_recalc';
}

function mapRow(row: CaptureRow): CaptureRecord {
  return {
    id: row.id,
    timestamp: row.ts,
    scheduleName: row.schedule,
    profileId: row.profile,
    success: row.success === 1,
    error: row.error,
    latencyMs: row.latency_ms,
    sequence: row.sequence,
    tier: toTier(row.tier),
    degraded: row.degraded === 1
  };
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || Number.isNaN(limit)) {
    return 25;
  }
  return Math.min(Math.max(Math.floor(limit), 1), 500);
}

function clampOffset(offset?: number) {
  if (typeof offset !== 'number' || Number.isNaN(offset)) {
    return 0;
  }
  return Math.max(Math.floor(offset), 0);
}

export const __test__ = {
  CAPTURE_SCHEMA_VERSION,
  CAPTURE_INDEX_DEFINITIONS
};
