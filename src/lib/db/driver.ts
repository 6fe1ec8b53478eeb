/**
 * Database driver abstraction for SQLite (dev) and PostgreSQL (prod)
 *
 * - sql.js when DATABASE_URL is unset (file under DATA_DIR, or SQLITE_PATH,
 *   which may be ":memory:"). The database lives in memory and is written
 *   back to its file shortly after each write and on close.
 * - pg when DATABASE_URL is a postgres connection string
 *
 * SQL is written with ? placeholders; the postgres client rewrites them.
 */

import * as fs from "fs";
import * as path from "path";
import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from "sql.js";
import pg from "pg";
import { logger } from "../logger";
import { getSettings, resolveDataPath, type Settings } from "../../config/settings";

export type DatabaseDriver = "sqlite" | "postgres";

export type DbRow = Record<string, unknown>;

export interface DbResult {
  rows: DbRow[];
  rowCount: number;
}

export interface DatabaseClient {
  driver: DatabaseDriver;
  query(sql: string, params?: unknown[]): Promise<DbResult>;
  run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
  exec(sql: string): Promise<void>;
  close(): Promise<void>;
}

let clientInstance: DatabaseClient | null = null;

export function detectDriver(settings: Settings): DatabaseDriver {
  return settings.DATABASE_URL?.startsWith("postgres") ? "postgres" : "sqlite";
}

export function sqlitePath(settings: Settings): string {
  return settings.SQLITE_PATH ?? resolveDataPath(settings, "digest.db");
}

/**
 * Get or create the process-wide client
 */
export async function getDbClient(settings: Settings = getSettings()): Promise<DatabaseClient> {
  if (clientInstance) {
    return clientInstance;
  }

  const driver = detectDriver(settings);
  if (driver === "postgres" && settings.DATABASE_URL) {
    clientInstance = await createPostgresClient(settings.DATABASE_URL);
  } else {
    clientInstance = await createSqliteClient(sqlitePath(settings));
  }

  logger.info(`Database initialized with ${driver} driver`);
  return clientInstance;
}

export async function closeDbClient(): Promise<void> {
  if (clientInstance) {
    const client = clientInstance;
    clientInstance = null;
    await client.close();
  }
}

const FLUSH_DELAY_MS = 200;

export async function createSqliteClient(dbPath: string): Promise<DatabaseClient> {
  const inMemory = dbPath === ":memory:";
  const SQL = await initSqlJs();

  let sqlite: SqlJsDatabase;
  if (!inMemory && fs.existsSync(dbPath)) {
    sqlite = new SQL.Database(fs.readFileSync(dbPath));
  } else {
    sqlite = new SQL.Database();
  }
  sqlite.run("PRAGMA foreign_keys = ON");

  let flushTimer: NodeJS.Timeout | null = null;

  const flush = () => {
    if (flushTimer) {
      clearTimeout(flushTimer);
      flushTimer = null;
    }
    if (inMemory) return;
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    fs.writeFileSync(dbPath, sqlite.export());
  };

  const scheduleFlush = () => {
    if (inMemory || flushTimer) return;
    flushTimer = setTimeout(() => {
      try {
        flush();
      } catch (error) {
        logger.error(`Failed to write SQLite database to ${dbPath}`, error);
      }
    }, FLUSH_DELAY_MS);
    flushTimer.unref();
  };

  return {
    driver: "sqlite",

    async query(sql: string, params: unknown[] = []): Promise<DbResult> {
      const stmt = sqlite.prepare(sql);
      try {
        stmt.bind(params.map(toSqlValue));
        const rows: DbRow[] = [];
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
        return { rows, rowCount: rows.length };
      } finally {
        stmt.free();
      }
    },

    async run(sql: string, params: unknown[] = []): Promise<{ changes: number }> {
      sqlite.run(sql, params.map(toSqlValue));
      const changes = sqlite.getRowsModified();
      scheduleFlush();
      return { changes };
    },

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
      scheduleFlush();
    },

    async close(): Promise<void> {
      try {
        flush();
      } finally {
        sqlite.close();
      }
    },
  };
}

function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Uint8Array) return value;
  throw new Error(`Unsupported SQLite parameter type: ${typeof value}`);
}

export async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const needsSSL = process.env.NODE_ENV === "production" || databaseUrl.includes("sslmode=require");

  const pool = new pg.Pool({
    connectionString: databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 60000,
  });

  // Fail fast on a bad connection string
  await pool.query("SELECT 1");

  return {
    driver: "postgres",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const result = await pool.query<DbRow>(convertPlaceholders(sql), params);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount ?? 0 };
    },

    async exec(sql: string): Promise<void> {
      const statements = sql.split(";").filter((s) => s.trim());
      for (const stmt of statements) {
        await pool.query(stmt);
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

/**
 * Convert ? placeholders to $1, $2, ...
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * Current Unix timestamp in seconds
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
