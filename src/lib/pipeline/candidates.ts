/**
 * Candidate pool for digest generation
 * Per source family: keep the N most engaging items. Then drop repeated
 * titles across the whole pool, first occurrence wins.
 */

import type { IngestedItem } from "../model";
import { logger } from "../logger";
import { normalizeTitle, sourceKey } from "./normalize";

export const DEFAULT_CANDIDATES_PER_SOURCE = 50;

export interface CandidatePoolOptions {
  perSource?: number;
  isSourceEnabled?: (source: string) => boolean;
}

export function buildCandidatePool(
  items: IngestedItem[],
  options: CandidatePoolOptions = {}
): IngestedItem[] {
  const perSource = options.perSource ?? DEFAULT_CANDIDATES_PER_SOURCE;
  const isSourceEnabled = options.isSourceEnabled ?? (() => true);

  const bySource = new Map<string, IngestedItem[]>();
  for (const item of items) {
    const key = sourceKey(item.source);
    const group = bySource.get(key);
    if (group) {
      group.push(item);
    } else {
      bySource.set(key, [item]);
    }
  }

  const pool: IngestedItem[] = [];
  const seenTitles = new Set<string>();

  for (const [source, group] of bySource) {
    if (!isSourceEnabled(source)) {
      logger.debug(`Skipping disabled source ${source} (${group.length} items)`);
      continue;
    }

    const top = [...group].sort((a, b) => b.rawScore - a.rawScore).slice(0, perSource);
    for (const item of top) {
      const title = normalizeTitle(item.title);
      if (seenTitles.has(title)) continue;
      seenTitles.add(title);
      pool.push(item);
    }
  }

  logger.info(`Candidate pool: ${pool.length} items from ${bySource.size} sources`);
  return pool;
}
