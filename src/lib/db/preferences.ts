/**
 * Runtime preferences (key/value strings)
 */

import { z } from "zod";
import type { Preference } from "../pipeline/store";
import type { DatabaseClient } from "./driver";
import { nowSeconds } from "./driver";

const PreferenceRowSchema = z.object({
  key: z.string(),
  value: z.string(),
  updated_at: z.coerce.number(),
});

export async function getPreference(
  client: DatabaseClient,
  key: string,
  fallback: string
): Promise<string> {
  const result = await client.query("SELECT value FROM preferences WHERE key = ?", [key]);
  const value = result.rows[0]?.value;
  return typeof value === "string" ? value : fallback;
}

export async function setPreference(client: DatabaseClient, key: string, value: string): Promise<void> {
  await client.run(
    `INSERT INTO preferences (key, value, updated_at) VALUES (?, ?, ?)
     ON CONFLICT (key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    [key, value, nowSeconds()]
  );
}

export async function listPreferences(client: DatabaseClient): Promise<Preference[]> {
  const result = await client.query("SELECT key, value, updated_at FROM preferences ORDER BY key");
  return result.rows.map((row) => {
    const parsed = PreferenceRowSchema.parse(row);
    return { key: parsed.key, value: parsed.value, updatedAt: new Date(parsed.updated_at * 1000) };
  });
}
