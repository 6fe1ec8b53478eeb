/**
 * Digest history
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { DigestRecord, NewDigest } from "../pipeline/store";
import type { DatabaseClient } from "./driver";

const DigestRowSchema = z.object({
  id: z.string(),
  created_at: z.coerce.number(),
  summary: z.string(),
  markdown: z.string(),
  item_count: z.coerce.number(),
});

export async function saveDigest(client: DatabaseClient, digest: NewDigest): Promise<DigestRecord> {
  const record: DigestRecord = { id: uuidv4(), ...digest };
  await client.run(
    `INSERT INTO digests (id, created_at, summary, markdown, item_count) VALUES (?, ?, ?, ?, ?)`,
    [
      record.id,
      Math.floor(record.createdAt.getTime() / 1000),
      record.summary,
      record.markdown,
      record.itemCount,
    ]
  );
  return record;
}

function rowToDigest(row: unknown): DigestRecord {
  const parsed = DigestRowSchema.parse(row);
  return {
    id: parsed.id,
    createdAt: new Date(parsed.created_at * 1000),
    summary: parsed.summary,
    markdown: parsed.markdown,
    itemCount: parsed.item_count,
  };
}

/**
 * Newest first
 */
export async function listDigests(client: DatabaseClient, limit: number = 20): Promise<DigestRecord[]> {
  const result = await client.query(
    "SELECT id, created_at, summary, markdown, item_count FROM digests ORDER BY created_at DESC LIMIT ?",
    [limit]
  );
  return result.rows.map(rowToDigest);
}

export async function getDigest(client: DatabaseClient, id: string): Promise<DigestRecord | null> {
  const result = await client.query(
    "SELECT id, created_at, summary, markdown, item_count FROM digests WHERE id = ?",
    [id]
  );
  const [row] = result.rows;
  return row ? rowToDigest(row) : null;
}
