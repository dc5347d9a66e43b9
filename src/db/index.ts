/**
 * Database - SQLite (sql.js WASM) vendor/part store
 *
 * Supplies vendor and part records to the scoring engine and keeps the
 * append-only score snapshot history. File-backed databases are written on
 * every mutation (tmp file + rename) and backed up when opened; ':memory:'
 * databases never touch disk.
 */

import initSqlJs from 'sql.js';
import type { BindParams, Database as SqlJsDatabase, SqlValue } from 'sql.js';
import { dirname, join } from 'path';
import {
  mkdirSync,
  existsSync,
  readFileSync,
  writeFileSync,
  renameSync,
  readdirSync,
  statSync,
  unlinkSync,
} from 'fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { weightsSchema } from '../scoring/weights';
import type { PartRecord, ScoreSnapshot, SnapshotInputs, Vendor } from '../scoring/types';

const logger = createLogger('db');

export type Row = Record<string, SqlValue>;

export const MEMORY_PATH = ':memory:';

// ---------------------------------------------------------------------------
// Store interface
// ---------------------------------------------------------------------------

export interface VendorStore {
  close(): void;

  // Vendors
  getVendor(id: string): Vendor | undefined;
  /** Every vendor by name, or the first `limit` when given */
  listVendors(limit?: number): Vendor[];
  upsertVendor(vendor: Vendor): void;

  // Parts
  /** Parts grouped by vendor id; restricted to the given vendors when provided */
  getPartsByVendor(vendorIds?: readonly string[]): Map<string, PartRecord[]>;
  upsertPart(part: PartRecord): void;

  // Snapshots (append-only)
  addScoreSnapshot(snapshot: ScoreSnapshot): void;
  /** Newest first */
  listScoreSnapshots(vendorId: string, limit?: number): ScoreSnapshot[];
  getLatestSnapshotBefore(vendorId: string, before: Date): ScoreSnapshot | undefined;

  counts(): { vendors: number; parts: number; snapshots: number };
}

export interface VendorStoreOptions {
  /** SQLite file, or ':memory:' */
  path: string;
  /** Persist after each mutation (file databases only). Default true */
  autoSave?: boolean;
  /** Backups kept next to the database file. Default VENDORSCORE_DB_BACKUP_MAX or 10 */
  maxBackups?: number;
}

// ---------------------------------------------------------------------------
// Schema DDL
// ---------------------------------------------------------------------------

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS vendors (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    region TEXT NOT NULL DEFAULT '',
    reliability_score REAL NOT NULL DEFAULT 0,
    contact_email TEXT NOT NULL DEFAULT '',
    last_verified INTEGER,
    created_at INTEGER DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER DEFAULT (strftime('%s','now') * 1000)
  );

  CREATE TABLE IF NOT EXISTS parts (
    id TEXT PRIMARY KEY,
    vendor_id TEXT NOT NULL,
    component_name TEXT NOT NULL,
    odm_destination TEXT NOT NULL DEFAULT '',
    odm_region TEXT NOT NULL DEFAULT '',
    unit_price REAL NOT NULL DEFAULT 0,
    freight_cost REAL NOT NULL DEFAULT 0,
    tariff_rate REAL NOT NULL DEFAULT 0,
    lead_time_weeks REAL NOT NULL DEFAULT 0,
    transit_days REAL NOT NULL DEFAULT 0,
    shipping_mode TEXT NOT NULL,
    monthly_capacity REAL NOT NULL DEFAULT 0,
    last_verified INTEGER,
    notes TEXT NOT NULL DEFAULT '',
    updated_at INTEGER DEFAULT (strftime('%s','now') * 1000),
    FOREIGN KEY (vendor_id) REFERENCES vendors(id)
  );

  CREATE TABLE IF NOT EXISTS score_snapshots (
    id TEXT PRIMARY KEY,
    vendor_id TEXT NOT NULL,
    vendor_name TEXT NOT NULL,
    total_cost_score REAL NOT NULL,
    total_time_score REAL NOT NULL,
    reliability_score REAL NOT NULL,
    capacity_score REAL NOT NULL,
    final_score REAL NOT NULL,
    weights_json TEXT NOT NULL,
    inputs_json TEXT NOT NULL,
    computed_at INTEGER NOT NULL,
    snapshot_date TEXT NOT NULL,
    FOREIGN KEY (vendor_id) REFERENCES vendors(id)
  );

  CREATE INDEX IF NOT EXISTS idx_parts_vendor ON parts(vendor_id);
  CREATE INDEX IF NOT EXISTS idx_snapshots_vendor_time ON score_snapshots(vendor_id, computed_at);
`;

// ---------------------------------------------------------------------------
// Row parsers
// ---------------------------------------------------------------------------

function str(value: SqlValue | undefined, fallback = ''): string {
  return value === null || value === undefined ? fallback : String(value);
}

function num(value: SqlValue | undefined, fallback = 0): number {
  if (value === null || value === undefined) return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function dateOrNull(value: SqlValue | undefined): Date | null {
  if (value === null || value === undefined || value === '') return null;
  const ms = Number(value);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

function rowToVendor(row: Row): Vendor {
  return {
    id: str(row.id),
    name: str(row.name),
    region: str(row.region),
    reliabilityScore: num(row.reliability_score),
    contactEmail: str(row.contact_email),
    lastVerified: dateOrNull(row.last_verified),
  };
}

function rowToPart(row: Row): PartRecord {
  return {
    id: str(row.id),
    vendorId: str(row.vendor_id),
    componentName: str(row.component_name),
    odmDestination: str(row.odm_destination),
    odmRegion: str(row.odm_region),
    unitPrice: num(row.unit_price),
    freightCost: num(row.freight_cost),
    tariffRate: num(row.tariff_rate),
    leadTimeWeeks: num(row.lead_time_weeks),
    transitDays: num(row.transit_days),
    shippingMode: str(row.shipping_mode),
    monthlyCapacity: num(row.monthly_capacity),
    lastVerified: dateOrNull(row.last_verified),
    notes: str(row.notes),
  };
}

const snapshotInputsSchema = z.object({
  avgLandedCost: z.number().nullable(),
  avgTotalTime: z.number().nullable(),
  totalCapacity: z.number(),
  reliability: z.number(),
  partCount: z.number(),
});

function parseJsonColumn(value: SqlValue | undefined): unknown {
  try {
    return JSON.parse(str(value, 'null'));
  } catch {
    return null;
  }
}

function rowToSnapshot(row: Row): ScoreSnapshot | null {
  const weights = weightsSchema.safeParse(parseJsonColumn(row.weights_json));
  const inputs = snapshotInputsSchema.safeParse(parseJsonColumn(row.inputs_json));
  if (!weights.success || !inputs.success) {
    logger.warn({ snapshotId: row.id }, 'Skipping snapshot with unreadable weights or inputs');
    return null;
  }
  const snapshotInputs: SnapshotInputs = inputs.data;
  return {
    id: str(row.id),
    vendorId: str(row.vendor_id),
    vendorName: str(row.vendor_name),
    pillarScores: {
      totalCost: num(row.total_cost_score),
      totalTime: num(row.total_time_score),
      reliability: num(row.reliability_score),
      capacity: num(row.capacity_score),
    },
    finalScore: num(row.final_score),
    weights: Object.freeze({ ...weights.data }),
    inputs: snapshotInputs,
    computedAt: new Date(num(row.computed_at)),
    snapshotDate: str(row.snapshot_date),
  };
}

function notNull<T>(value: T | null): value is T {
  return value !== null;
}

// ---------------------------------------------------------------------------
// createVendorStore
// ---------------------------------------------------------------------------

/**
 * Open (or create) a store. Each call returns an independent handle.
 */
export async function createVendorStore(options: VendorStoreOptions): Promise<VendorStore> {
  const inMemory = options.path === MEMORY_PATH;
  const dbFile = options.path;
  const autoSave = !inMemory && (options.autoSave ?? true);
  const backupDir = inMemory ? '' : join(dirname(dbFile), 'backups');
  const envBackups = Number.parseInt(process.env.VENDORSCORE_DB_BACKUP_MAX || '10', 10);
  const maxBackups = Math.max(1, options.maxBackups ?? (Number.isFinite(envBackups) ? envBackups : 10));

  if (!inMemory && !existsSync(dirname(dbFile))) {
    mkdirSync(dirname(dbFile), { recursive: true });
  }

  logger.info(`Opening database: ${inMemory ? 'in-memory' : dbFile}`);

  // Initialize sql.js WASM
  const SQL = await initSqlJs();

  // Load existing database or create new
  let sqlJsDb: SqlJsDatabase | null =
    !inMemory && existsSync(dbFile) ? new SQL.Database(readFileSync(dbFile)) : new SQL.Database();

  function handle(): SqlJsDatabase {
    if (!sqlJsDb) throw new Error('Database is closed');
    return sqlJsDb;
  }

  handle().run(SCHEMA_SQL);

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  function saveDb(): void {
    if (inMemory || !sqlJsDb) return;
    const buffer = Buffer.from(sqlJsDb.export());
    const tmpPath = dbFile + '.tmp';
    writeFileSync(tmpPath, buffer);
    renameSync(tmpPath, dbFile);
  }

  function afterMutation(): void {
    if (autoSave) saveDb();
  }

  function listBackupFiles(): Array<{ name: string; path: string; mtimeMs: number }> {
    if (!existsSync(backupDir)) return [];
    return readdirSync(backupDir)
      .filter((name) => name.endsWith('.db'))
      .map((name) => {
        const filePath = join(backupDir, name);
        return { name, path: filePath, mtimeMs: statSync(filePath).mtimeMs };
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs);
  }

  function pruneBackups(): void {
    for (const file of listBackupFiles().slice(maxBackups)) {
      try {
        unlinkSync(file.path);
      } catch (error) {
        logger.warn({ error, file: file.name }, 'Failed to delete old backup');
      }
    }
  }

  function createBackup(): void {
    if (inMemory || !existsSync(dbFile)) return;
    if (!existsSync(backupDir)) mkdirSync(backupDir, { recursive: true });
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    writeFileSync(join(backupDir, `vendorscore-${timestamp}.db`), readFileSync(dbFile));
    pruneBackups();
  }

  /** Get all matching rows */
  function getAll(sql: string, params: BindParams = []): Row[] {
    const stmt = handle().prepare(sql);
    try {
      stmt.bind(params);
      const results: Row[] = [];
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
      return results;
    } finally {
      stmt.free();
    }
  }

  function getOne(sql: string, params: BindParams = []): Row | undefined {
    return getAll(sql, params)[0];
  }

  function countOf(table: 'vendors' | 'parts' | 'score_snapshots'): number {
    return num(getOne(`SELECT COUNT(*) AS n FROM ${table}`)?.n);
  }

  createBackup();

  // -------------------------------------------------------------------------
  // Store
  // -------------------------------------------------------------------------

  const store: VendorStore = {
    close() {
      if (!sqlJsDb) return;
      saveDb();
      sqlJsDb.close();
      sqlJsDb = null;
    },

    // -- Vendors --
    getVendor(id) {
      const row = getOne('SELECT * FROM vendors WHERE id = ?', [id]);
      return row ? rowToVendor(row) : undefined;
    },

    listVendors(limit) {
      const sql = 'SELECT * FROM vendors ORDER BY name ASC, id ASC';
      const rows = limit === undefined ? getAll(sql) : getAll(`${sql} LIMIT ?`, [limit]);
      return rows.map(rowToVendor);
    },

    upsertVendor(vendor) {
      handle().run(
        `INSERT INTO vendors (id, name, region, reliability_score, contact_email, last_verified, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           name = excluded.name,
           region = excluded.region,
           reliability_score = excluded.reliability_score,
           contact_email = excluded.contact_email,
           last_verified = excluded.last_verified,
           updated_at = excluded.updated_at`,
        [
          vendor.id, vendor.name, vendor.region, vendor.reliabilityScore,
          vendor.contactEmail, vendor.lastVerified?.getTime() ?? null, Date.now(),
        ],
      );
      afterMutation();
    },

    // -- Parts --
    getPartsByVendor(vendorIds) {
      const grouped = new Map<string, PartRecord[]>();
      if (vendorIds) {
        for (const id of vendorIds) grouped.set(id, []);
      }
      const rows = getAll('SELECT * FROM parts ORDER BY vendor_id ASC, component_name ASC, id ASC');
      for (const part of rows.map(rowToPart)) {
        const bucket = grouped.get(part.vendorId);
        if (bucket) {
          bucket.push(part);
        } else if (!vendorIds) {
          grouped.set(part.vendorId, [part]);
        }
      }
      return grouped;
    },

    upsertPart(part) {
      handle().run(
        `INSERT INTO parts (id, vendor_id, component_name, odm_destination, odm_region, unit_price, freight_cost,
           tariff_rate, lead_time_weeks, transit_days, shipping_mode, monthly_capacity, last_verified, notes, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           vendor_id = excluded.vendor_id,
           component_name = excluded.component_name,
           odm_destination = excluded.odm_destination,
           odm_region = excluded.odm_region,
           unit_price = excluded.unit_price,
           freight_cost = excluded.freight_cost,
           tariff_rate = excluded.tariff_rate,
           lead_time_weeks = excluded.lead_time_weeks,
           transit_days = excluded.transit_days,
           shipping_mode = excluded.shipping_mode,
           monthly_capacity = excluded.monthly_capacity,
           last_verified = excluded.last_verified,
           notes = excluded.notes,
           updated_at = excluded.updated_at`,
        [
          part.id, part.vendorId, part.componentName, part.odmDestination, part.odmRegion,
          part.unitPrice, part.freightCost, part.tariffRate, part.leadTimeWeeks, part.transitDays,
          part.shippingMode, part.monthlyCapacity, part.lastVerified?.getTime() ?? null, part.notes, Date.now(),
        ],
      );
      afterMutation();
    },

    // -- Snapshots --
    addScoreSnapshot(snapshot) {
      handle().run(
        `INSERT INTO score_snapshots (id, vendor_id, vendor_name, total_cost_score, total_time_score,
           reliability_score, capacity_score, final_score, weights_json, inputs_json, computed_at, snapshot_date)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          snapshot.id, snapshot.vendorId, snapshot.vendorName,
          snapshot.pillarScores.totalCost, snapshot.pillarScores.totalTime,
          snapshot.pillarScores.reliability, snapshot.pillarScores.capacity,
          snapshot.finalScore, JSON.stringify(snapshot.weights), JSON.stringify(snapshot.inputs),
          snapshot.computedAt.getTime(), snapshot.snapshotDate,
        ],
      );
      afterMutation();
    },

    listScoreSnapshots(vendorId, limit = 100) {
      return getAll(
        'SELECT * FROM score_snapshots WHERE vendor_id = ? ORDER BY computed_at DESC, id DESC LIMIT ?',
        [vendorId, limit],
      )
        .map(rowToSnapshot)
        .filter(notNull);
    },

    getLatestSnapshotBefore(vendorId, before) {
      const rows = getAll(
        'SELECT * FROM score_snapshots WHERE vendor_id = ? AND computed_at < ? ORDER BY computed_at DESC, id DESC',
        [vendorId, before.getTime()],
      );
      for (const row of rows) {
        const snapshot = rowToSnapshot(row);
        if (snapshot) return snapshot;
      }
      return undefined;
    },

    counts() {
      return {
        vendors: countOf('vendors'),
        parts: countOf('parts'),
        snapshots: countOf('score_snapshots'),
      };
    },
  };

  return store;
}
