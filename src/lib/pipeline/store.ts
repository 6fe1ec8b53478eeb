/**
 * Persistence contract the pipeline runs against
 * Implemented over SQL in lib/db/store; tests use in-memory fakes
 */

import type { EvaluationResult, IngestedItem } from "../model";
import { PREFERENCE_DEFAULT, isEnabledValue } from "../../config/preferences";

export interface NewDigest {
  createdAt: Date;
  markdown: string;
  summary: string;
  itemCount: number;
}

export interface DigestRecord extends NewDigest {
  id: string;
}

export interface Preference {
  key: string;
  value: string;
  updatedAt: Date;
}

export interface PipelineStore {
  /** Insert an item; an existing id is a silent no-op. Resolves false on failure. */
  saveItem(item: IngestedItem): Promise<boolean>;
  /** Most recent items first */
  getRecentItems(limit: number): Promise<IngestedItem[]>;
  getPreference(key: string, fallback?: string): Promise<string>;
  setPreference(key: string, value: string): Promise<void>;
  saveEvaluations(results: EvaluationResult[]): Promise<void>;
  saveDigest(digest: NewDigest): Promise<DigestRecord>;
}

/**
 * Read side used by the HTTP API and the CLI
 */
export interface PipelineQueryStore extends PipelineStore {
  /** Stored preferences, ordered by key */
  listPreferences(): Promise<Preference[]>;
  /** Newest first */
  listDigests(limit?: number): Promise<DigestRecord[]>;
  getDigest(id: string): Promise<DigestRecord | null>;
}

export async function isPreferenceEnabled(store: PipelineStore, key: string): Promise<boolean> {
  return isEnabledValue(await store.getPreference(key, PREFERENCE_DEFAULT));
}
