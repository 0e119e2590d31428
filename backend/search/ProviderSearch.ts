import type { ReferenceData } from "../config/ReferenceData";
import type { RatedProvider } from "../domain/Provider";
import {
  outcomeFromResults,
  type ProviderLookup,
  type SearchOutcome,
  type ValidationIssue,
} from "../domain/SearchOutcome";
import { haversineKm, type LatLng } from "../geo/Distance";
import type { GeoResolver } from "../geo/GeoResolver";
import type { ProviderFilter, ProviderRepository } from "../repository/ProviderRepository";
import {
  ProviderIdSchema,
  SearchParamsSchema,
  TopRatedParamsSchema,
  toValidationIssues,
  type SearchParamsInput,
  type TopRatedParamsInput,
  type Unvalidated,
} from "../validation/schemas";
import { rankResults, type ScorableProvider } from "./CompositeRanker";
import { buildProcedureConditions, type ProcedureCondition } from "./ProcedureMatcher";

// Search Orchestrator
//
// validate -> build conditions -> resolve center -> fetch -> radius filter
// -> rank -> truncate.
// Radius filtering happens in-process: the store returns every procedure
// match and distances are compared post-hoc.
// Store failures come back as `store_error`, never as a thrown error.

export const STORE_UNAVAILABLE_MESSAGE = "Provider data is temporarily unavailable. Please try again later.";

const EMPTY_PROCEDURE_ISSUE: ValidationIssue = {
  path: "procedure",
  message: "Procedure query produced no match conditions.",
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function withDistanceFrom(center: LatLng, providers: readonly RatedProvider[]): ScorableProvider[] {
  const out: ScorableProvider[] = [];
  for (const p of providers) {
    if (p.latitude === null || p.longitude === null) continue;
    out.push({ ...p, distanceKm: haversineKm(center, { lat: p.latitude, lng: p.longitude }) });
  }
  return out;
}

export interface ProviderSearchDeps {
  readonly repository: ProviderRepository;
  readonly geo: GeoResolver;
  readonly reference: ReferenceData;
}

export class ProviderSearch {
  constructor(private readonly deps: ProviderSearchDeps) {}

  private async fetch(
    filter: ProviderFilter,
    context: Readonly<Record<string, unknown>>,
  ): Promise<{ ok: true; rows: readonly RatedProvider[] } | { ok: false; message: string }> {
    try {
      return { ok: true, rows: await this.deps.repository.findMatching(filter) };
    } catch (err) {
      console.error("[ProviderSearch] store fetch failed", { ...context, stage: "fetch", error: describeError(err) });
      return { ok: false, message: STORE_UNAVAILABLE_MESSAGE };
    }
  }

  async search(input: Unvalidated<SearchParamsInput>): Promise<SearchOutcome> {
    const parsed = SearchParamsSchema.safeParse(input);
    if (!parsed.success) return { status: "invalid", issues: toValidationIssues(parsed.error) };
    const params = parsed.data;

    const conditions = buildProcedureConditions(params.procedure, this.deps.reference.procedureSynonyms);
    if (!conditions.length) return { status: "invalid", issues: [EMPTY_PROCEDURE_ISSUE] };

    const center = await this.deps.geo.resolve(params.zipCode);

    const fetched = await this.fetch({ conditions }, params);
    if (!fetched.ok) return { status: "store_error", message: fetched.message };

    // Boundary inclusive: a record at exactly radiusKm stays.
    const withinRadius = withDistanceFrom(center, fetched.rows).filter(
      (p) => typeof p.distanceKm === "number" && p.distanceKm <= params.radiusKm,
    );

    const ranked = rankResults(withinRadius, params.intent).slice(0, params.limit);

    console.log(
      `[ProviderSearch] "${params.procedure}" near ${params.zipCode} (${center.source}): ` +
        `${fetched.rows.length} matched, ${withinRadius.length} within ${params.radiusKm} km, ${ranked.length} returned`,
    );

    return outcomeFromResults(ranked);
  }

  async topRated(input: Unvalidated<TopRatedParamsInput>): Promise<SearchOutcome> {
    const parsed = TopRatedParamsSchema.safeParse(input);
    if (!parsed.success) return { status: "invalid", issues: toValidationIssues(parsed.error) };
    const params = parsed.data;

    let conditions: ProcedureCondition[] | undefined;
    if (params.procedure) {
      conditions = buildProcedureConditions(params.procedure, this.deps.reference.procedureSynonyms);
      if (!conditions.length) return { status: "invalid", issues: [EMPTY_PROCEDURE_ISSUE] };
    }

    const fetched = await this.fetch({ conditions, ratedOnly: true }, params);
    if (!fetched.ok) return { status: "store_error", message: fetched.message };

    return outcomeFromResults(rankResults(fetched.rows, "best_rated").slice(0, params.limit));
  }

  async getProvider(providerId: unknown): Promise<ProviderLookup> {
    const parsed = ProviderIdSchema.safeParse(providerId);
    if (!parsed.success) return { status: "invalid", issues: toValidationIssues(parsed.error) };

    try {
      const records = await this.deps.repository.findByProviderId(parsed.data);
      return records.length ? { status: "ok", records } : { status: "not_found" };
    } catch (err) {
      console.error("[ProviderSearch] provider lookup failed", { providerId: parsed.data, error: describeError(err) });
      return { status: "store_error", message: STORE_UNAVAILABLE_MESSAGE };
    }
  }
}
