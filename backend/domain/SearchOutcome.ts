import type { RatedProvider } from "./Provider";
import type { SearchResult } from "./SearchResult";

// Explicit outcome variants so callers can tell "nothing matched"
// apart from "the store failed" or "the input was rejected".

export type ValidationIssue = Readonly<{
  path: string;
  message: string;
}>;

export type SearchOutcome =
  | Readonly<{ status: "ok"; results: readonly SearchResult[] }>
  | Readonly<{ status: "empty" }>
  | Readonly<{ status: "invalid"; issues: readonly ValidationIssue[] }>
  | Readonly<{ status: "store_error"; message: string }>;

export function outcomeFromResults(results: readonly SearchResult[]): SearchOutcome {
  return results.length ? { status: "ok", results } : { status: "empty" };
}

export function resultsOf(outcome: SearchOutcome): readonly SearchResult[] {
  return outcome.status === "ok" ? outcome.results : [];
}

export type ProviderLookup =
  | Readonly<{ status: "ok"; records: readonly RatedProvider[] }>
  | Readonly<{ status: "not_found" }>
  | Readonly<{ status: "invalid"; issues: readonly ValidationIssue[] }>
  | Readonly<{ status: "store_error"; message: string }>;
