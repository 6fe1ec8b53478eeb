/**
 * PipelineStore backed by the SQL driver
 */

import type { EvaluationResult, IngestedItem } from "../model";
import type { DigestRecord, NewDigest, PipelineQueryStore, Preference } from "../pipeline/store";
import { PREFERENCE_DEFAULT } from "../../config/preferences";
import { getDbClient, type DatabaseClient } from "./driver";
import { initializeDatabase } from "./index";
import { getRecentItems, saveItem } from "./items";
import { getPreference, listPreferences, setPreference } from "./preferences";
import { saveEvaluations } from "./evaluations";
import { getDigest, listDigests, saveDigest } from "./digests";
import type { Settings } from "../../config/settings";

export class DatabasePipelineStore implements PipelineQueryStore {
  constructor(readonly client: DatabaseClient) {}

  saveItem(item: IngestedItem): Promise<boolean> {
    return saveItem(this.client, item);
  }

  getRecentItems(limit: number): Promise<IngestedItem[]> {
    return getRecentItems(this.client, limit);
  }

  getPreference(key: string, fallback: string = PREFERENCE_DEFAULT): Promise<string> {
    return getPreference(this.client, key, fallback);
  }

  setPreference(key: string, value: string): Promise<void> {
    return setPreference(this.client, key, value);
  }

  listPreferences(): Promise<Preference[]> {
    return listPreferences(this.client);
  }

  saveEvaluations(results: EvaluationResult[]): Promise<void> {
    return saveEvaluations(this.client, results);
  }

  saveDigest(digest: NewDigest): Promise<DigestRecord> {
    return saveDigest(this.client, digest);
  }

  listDigests(limit?: number): Promise<DigestRecord[]> {
    return listDigests(this.client, limit);
  }

  getDigest(id: string): Promise<DigestRecord | null> {
    return getDigest(this.client, id);
  }
}

/**
 * Open the configured database and make sure the schema exists
 */
export async function createDatabaseStore(settings?: Settings): Promise<DatabasePipelineStore> {
  const client = await getDbClient(settings);
  await initializeDatabase(client);
  return new DatabasePipelineStore(client);
}
