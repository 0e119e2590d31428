import type { ReferenceData } from "../config/ReferenceData";
import type { Intent } from "../domain/Intent";
import type { RatedProvider } from "../domain/Provider";
import type { SearchResult } from "../domain/SearchResult";
import { haversineKm } from "../geo/Distance";
import type { GeoResolver } from "../geo/GeoResolver";
import type { ProviderFilter, ProviderRepository } from "../repository/ProviderRepository";
import { rankResults, type ScorableProvider } from "../search/CompositeRanker";
import { buildProcedureConditions, type ProcedureCondition } from "../search/ProcedureMatcher";
import { STORE_UNAVAILABLE_MESSAGE, withDistanceFrom } from "../search/ProviderSearch";
import type { QueryFilter, StructuredQuery } from "./StructuredQuery";

// Translates a validated structured query into a repository filter, computes
// distances from the radius or origin ZIP, applies the radius in-process and
// ranks by the query's order.

// Upper bound on rows pulled for queries the store can sort without a radius.
export const FETCH_CAP = 500;

// Orders the store can apply itself. Distance and the composite score are
// only known after the fetch.
const STORE_SORTABLE: ReadonlySet<Intent> = new Set<Intent>(["cheapest", "best_rated"]);

export type ExecutionResult =
  | Readonly<{ ok: true; results: readonly SearchResult[]; matched: number }>
  | Readonly<{ ok: false; message: string }>;

export interface StructuredQueryExecutorDeps {
  readonly repository: ProviderRepository;
  readonly geo: GeoResolver;
  readonly reference: ReferenceData;
}

function lastOf<T extends QueryFilter["type"]>(
  filters: readonly QueryFilter[],
  type: T,
): Extract<QueryFilter, { type: T }> | undefined {
  let found: Extract<QueryFilter, { type: T }> | undefined;
  for (const f of filters) {
    if (isFilterOf(f, type)) found = f;
  }
  return found;
}

function isFilterOf<T extends QueryFilter["type"]>(f: QueryFilter, type: T): f is Extract<QueryFilter, { type: T }> {
  return f.type === type;
}

export class StructuredQueryExecutor {
  constructor(private readonly deps: StructuredQueryExecutorDeps) {}

  conditionsFor(query: StructuredQuery): ProcedureCondition[] {
    const out: ProcedureCondition[] = [];
    const seen = new Set<string>();
    for (const f of query.filters) {
      if (f.type !== "procedure") continue;
      for (const term of f.terms) {
        for (const c of buildProcedureConditions(term, this.deps.reference.procedureSynonyms)) {
          const key = `${c.kind}:${c.value}`;
          if (seen.has(key)) continue;
          seen.add(key);
          out.push(c);
        }
      }
    }
    return out;
  }

  async execute(query: StructuredQuery): Promise<ExecutionResult> {
    const conditions = this.conditionsFor(query);
    const radius = lastOf(query.filters, "radius");
    const originZip = radius?.zip ?? lastOf(query.filters, "origin")?.zip;
    const pushDown = !radius && STORE_SORTABLE.has(query.order);

    const filter: ProviderFilter = {
      conditions: conditions.length ? conditions : undefined,
      zipPrefix: lastOf(query.filters, "zip_prefix")?.value,
      city: lastOf(query.filters, "city")?.value,
      state: lastOf(query.filters, "state")?.value.toUpperCase(),
      ...(pushDown ? { orderBy: query.order, limit: FETCH_CAP } : {}),
    };

    let rows: readonly RatedProvider[];
    try {
      rows = await this.deps.repository.findMatching(filter);
    } catch (err) {
      console.error("[StructuredQuery] store fetch failed", {
        stage: "execute",
        query,
        error: err instanceof Error ? err.message : String(err),
      });
      return { ok: false, message: STORE_UNAVAILABLE_MESSAGE };
    }

    let candidates: readonly ScorableProvider[] = rows;
    if (originZip) {
      const origin = await this.deps.geo.resolve(originZip);
      // Without a radius, rows lacking coordinates stay in with no distance.
      candidates = radius
        ? withDistanceFrom(origin, rows).filter(
            (p) => typeof p.distanceKm === "number" && p.distanceKm <= radius.radiusKm,
          )
        : rows.map((p) =>
            p.latitude === null || p.longitude === null
              ? p
              : { ...p, distanceKm: haversineKm(origin, { lat: p.latitude, lng: p.longitude }) },
          );
    }

    return { ok: true, results: rankResults(candidates, query.order).slice(0, query.limit), matched: rows.length };
  }
}
