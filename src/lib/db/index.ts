/**
 * Database schema
 * One DDL for both drivers; timestamps are Unix seconds
 */

import { logger } from "../logger";
import type { DatabaseClient, DatabaseDriver } from "./driver";

const initialized = new WeakSet<DatabaseClient>();

export function getSchema(driver: DatabaseDriver): string {
  const bigint = driver === "postgres" ? "BIGINT" : "INTEGER";
  const real = driver === "postgres" ? "DOUBLE PRECISION" : "REAL";

  return `
    CREATE TABLE IF NOT EXISTS items (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      title TEXT NOT NULL,
      url TEXT NOT NULL,
      content TEXT,
      author TEXT,
      raw_score ${bigint} NOT NULL DEFAULT 0,
      metadata TEXT,
      created_at ${bigint} NOT NULL,
      ingested_at ${bigint} NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_items_created_at ON items(created_at);

    CREATE TABLE IF NOT EXISTS evaluations (
      item_id TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
      persona TEXT NOT NULL,
      score ${real} NOT NULL,
      decision TEXT NOT NULL,
      reasoning TEXT,
      details TEXT,
      evaluated_at ${bigint} NOT NULL,
      PRIMARY KEY (item_id, persona)
    );

    CREATE TABLE IF NOT EXISTS digests (
      id TEXT PRIMARY KEY,
      created_at ${bigint} NOT NULL,
      summary TEXT NOT NULL,
      markdown TEXT NOT NULL,
      item_count INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS preferences (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at ${bigint} NOT NULL
    );
  `;
}

/**
 * Create tables if they don't exist. Safe to call repeatedly.
 */
export async function initializeDatabase(client: DatabaseClient): Promise<void> {
  if (initialized.has(client)) {
    return;
  }

  try {
    await client.exec(getSchema(client.driver));
    initialized.add(client);
    logger.info(`Database schema ready (${client.driver})`);
  } catch (error) {
    logger.error("Failed to initialize database schema", error);
    throw error;
  }
}
