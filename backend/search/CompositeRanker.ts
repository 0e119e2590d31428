import type { Intent } from "../domain/Intent";
import type { RatedProvider } from "../domain/Provider";
import type { ScoreBreakdown, SearchResult } from "../domain/SearchResult";

// =========================================================================
// Cost Navigator: Composite Value Score
//
// Single scalar from four normalized components:
//   1. Cost (40%): inverse of average covered charges, floored at $1,000
//   2. Rating (35%): mean rating on the 1–10 scale
//   3. Distance (15%): linear decay, zero beyond ~66.7 km
//   4. Volume (10%): log of discharges, capped
//
// DETERMINISTIC: pure computation, no store or LLM access.
// =========================================================================

export const SCORE_WEIGHTS = Object.freeze({
  cost: 0.4,
  rating: 0.35,
  distance: 0.15,
  volume: 0.1,
});

export const SCORE_DEFAULTS = Object.freeze({
  cost: 50_000,
  rating: 5.0,
  distanceKm: 50,
  volume: 0,
});

const COST_FLOOR = 1000;
const VOLUME_CAP = 50;

export interface ScoringInput {
  readonly cost?: number | null;
  readonly rating?: number | null;
  readonly distanceKm?: number | null;
  readonly volume?: number | null;
}

function present(v: number | null | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function costScore(cost: number | null | undefined): number {
  const c = present(cost) ? cost : SCORE_DEFAULTS.cost;
  return 1_000_000 / Math.max(c, COST_FLOOR);
}

export function ratingScore(rating: number | null | undefined): number {
  return (present(rating) ? rating : SCORE_DEFAULTS.rating) * 15;
}

export function distanceScore(distanceKm: number | null | undefined): number {
  const d = present(distanceKm) ? distanceKm : SCORE_DEFAULTS.distanceKm;
  return Math.max(0, 100 - d * 1.5);
}

export function volumeScore(volume: number | null | undefined): number {
  const v = present(volume) ? Math.max(0, volume) : SCORE_DEFAULTS.volume;
  return Math.min(Math.log(v + 1) * 10, VOLUME_CAP);
}

export function scoreBreakdown(input: ScoringInput): ScoreBreakdown {
  return {
    costScore: costScore(input.cost),
    ratingScore: ratingScore(input.rating),
    distanceScore: distanceScore(input.distanceKm),
    volumeScore: volumeScore(input.volume),
  };
}

export function compositeFromBreakdown(b: ScoreBreakdown): number {
  return (
    SCORE_WEIGHTS.cost * b.costScore +
    SCORE_WEIGHTS.rating * b.ratingScore +
    SCORE_WEIGHTS.distance * b.distanceScore +
    SCORE_WEIGHTS.volume * b.volumeScore
  );
}

export function compositeScore(input: ScoringInput): number {
  return compositeFromBreakdown(scoreBreakdown(input));
}

export type ScorableProvider = RatedProvider & Readonly<{ distanceKm?: number | null }>;

export function scoreProvider(provider: ScorableProvider): Omit<SearchResult, "rank"> {
  const breakdown = scoreBreakdown({
    cost: provider.averageCoveredCharges,
    rating: provider.averageRating,
    distanceKm: provider.distanceKm,
    volume: provider.totalDischarges,
  });
  return {
    ...provider,
    distanceKm: present(provider.distanceKm) ? provider.distanceKm : null,
    compositeScore: compositeFromBreakdown(breakdown),
    scoreBreakdown: breakdown,
  };
}

// --- Ordering ---

type Scored = Omit<SearchResult, "rank">;
type Comparator = (a: Scored, b: Scored) => number;

// Ascending on present values; missing values sort last regardless of direction.
function compareOptional(a: number | null, b: number | null, direction: 1 | -1): number {
  const ap = present(a);
  const bp = present(b);
  if (ap && bp) return (a - b) * direction;
  if (ap) return -1;
  if (bp) return 1;
  return 0;
}

function compareNearest(a: Scored, b: Scored): number {
  if (present(a.distanceKm) || present(b.distanceKm)) return compareOptional(a.distanceKm, b.distanceKm, 1);
  // Without coordinates, ZIP order is the only proxy. It is not true proximity.
  return a.providerZipCode.localeCompare(b.providerZipCode);
}

const PRIMARY: Readonly<Record<Intent, Comparator>> = {
  cheapest: (a, b) => compareOptional(a.averageCoveredCharges, b.averageCoveredCharges, 1),
  best_rated: (a, b) => compareOptional(a.averageRating, b.averageRating, -1),
  nearest: compareNearest,
  value: () => 0,
};

function tieBreak(a: Scored, b: Scored): number {
  if (a.compositeScore !== b.compositeScore) return b.compositeScore - a.compositeScore;
  if (a.providerId !== b.providerId) return a.providerId < b.providerId ? -1 : 1;
  if (a.procedureDefinition !== b.procedureDefinition) return a.procedureDefinition < b.procedureDefinition ? -1 : 1;
  return 0;
}

export function rankResults(providers: readonly ScorableProvider[], intent: Intent): SearchResult[] {
  const primary = PRIMARY[intent];
  return providers
    .map(scoreProvider)
    .sort((a, b) => primary(a, b) || tieBreak(a, b))
    .map((r, i) => ({ ...r, rank: i + 1 }));
}
