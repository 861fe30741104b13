export interface SportKeywords {
  sport: string;
  keywords: readonly string[];
}

/** Ordered: the first matching sport wins. */
export type SportKeywordTable = readonly SportKeywords[];

export type DetectedSport = string;
