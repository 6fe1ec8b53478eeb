import type { IngestedItem } from "../model";

export interface SourceAdapter {
  /** Source family, matching sourceKey() of the items it returns */
  readonly name: string;
  /** Preference that enables this adapter */
  readonly preferenceKey: string;
  /** Items published within the lookback window; rejects when the source is unreachable */
  fetchItems(lookbackHours: number): Promise<IngestedItem[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
