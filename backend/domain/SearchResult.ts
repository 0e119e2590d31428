import type { RatedProvider } from "./Provider";

export interface ScoreBreakdown {
  readonly costScore: number;
  readonly ratingScore: number;
  readonly distanceScore: number;
  readonly volumeScore: number;
}

// Created per query, ordered, truncated, serialized, then discarded.
export interface SearchResult extends RatedProvider {
  readonly distanceKm: number | null;
  readonly compositeScore: number;
  readonly scoreBreakdown: ScoreBreakdown;

  // 1-based position after ranking.
  readonly rank: number;
}
