import type { Intent } from "../domain/Intent";
import type { RatedProvider } from "../domain/Provider";
import type { LatLng } from "../geo/Distance";
import type { ProcedureCondition } from "../search/ProcedureMatcher";
import { query as defaultQuery, type QueryFn } from "../database/connection";
import type { ProviderFilter, ProviderRepository } from "./ProviderRepository";

// =========================================================================
// PostgreSQL Provider Repository (Cost Navigator)
//
// Production storage backend. Implements the same ProviderRepository
// interface as InMemoryProviderRepository:
// - Read-only (SELECT only)
// - Case-insensitive procedure matching, OR-combined
// - Average rating joined per provider (NULL when unrated)
// Tables: providers, ratings (loaded by the ETL job, not by this service).
// =========================================================================

// --- Row ↔ Domain mapping ---

interface ProviderRow {
  [key: string]: unknown;
  provider_id: string;
  provider_name: string | null;
  provider_city: string | null;
  provider_state: string | null;
  provider_zip_code: string | null;
  ms_drg_definition: string | null;
  total_discharges: number | string | null;
  average_covered_charges: number | string | null;
  average_total_payments: number | string | null;
  average_medicare_payments: number | string | null;
  latitude: number | string | null;
  longitude: number | string | null;
  avg_rating: number | string | null;
}

function toNumberOrNull(v: unknown): number | null {
  if (v === null || v === undefined || v === "") return null;
  const n = typeof v === "number" ? v : Number(v);
  return Number.isFinite(n) ? n : null;
}

function rowToDomain(row: ProviderRow): RatedProvider {
  return {
    providerId: row.provider_id,
    providerName: row.provider_name ?? "",
    providerCity: row.provider_city ?? "",
    providerState: row.provider_state ?? "",
    providerZipCode: row.provider_zip_code ?? "",
    procedureDefinition: row.ms_drg_definition ?? "",
    totalDischarges: toNumberOrNull(row.total_discharges) ?? 0,
    averageCoveredCharges: toNumberOrNull(row.average_covered_charges) ?? 0,
    averageTotalPayments: toNumberOrNull(row.average_total_payments) ?? 0,
    averageMedicarePayments: toNumberOrNull(row.average_medicare_payments) ?? 0,
    latitude: toNumberOrNull(row.latitude),
    longitude: toNumberOrNull(row.longitude),
    averageRating: toNumberOrNull(row.avg_rating),
  };
}

// --- SQL construction ---

const SELECT_RATED_PROVIDERS = `
  SELECT p.provider_id, p.provider_name, p.provider_city, p.provider_state, p.provider_zip_code,
         p.ms_drg_definition, p.total_discharges, p.average_covered_charges,
         p.average_total_payments, p.average_medicare_payments, p.latitude, p.longitude,
         r.avg_rating
  FROM providers p
  LEFT JOIN (
    SELECT provider_id, AVG(rating) AS avg_rating FROM ratings GROUP BY provider_id
  ) r ON r.provider_id = p.provider_id`;

const ORDER_BY: Readonly<Record<Intent, string>> = {
  cheapest: "p.average_covered_charges ASC, p.provider_id ASC",
  best_rated: "r.avg_rating DESC NULLS LAST, p.provider_id ASC",
  nearest: "p.provider_zip_code ASC, p.provider_id ASC",
  value: "p.provider_id ASC, p.ms_drg_definition ASC",
};

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function conditionToSql(c: ProcedureCondition, placeholder: string): { sql: string; param: string } {
  switch (c.kind) {
    case "startsWith":
      return { sql: `p.ms_drg_definition ILIKE ${placeholder}`, param: `${escapeLike(c.value)}%` };
    case "contains":
      return { sql: `p.ms_drg_definition ILIKE ${placeholder}`, param: `%${escapeLike(c.value)}%` };
    case "word":
      return { sql: `p.ms_drg_definition ~* ${placeholder}`, param: `(^|[^a-z0-9])${escapeRegex(c.value)}($|[^a-z0-9])` };
  }
}

export function buildFindMatchingQuery(filter: ProviderFilter): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const where: string[] = [];
  const next = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  const conditions = filter.conditions ?? [];
  if (conditions.length) {
    const ors = conditions.map((c) => {
      const placeholder = `$${params.length + 1}`;
      const { sql, param } = conditionToSql(c, placeholder);
      params.push(param);
      return sql;
    });
    where.push(`(${ors.join(" OR ")})`);
  }

  if (filter.zipPrefix) where.push(`p.provider_zip_code LIKE ${next(`${escapeLike(filter.zipPrefix)}%`)}`);
  if (filter.city) where.push(`UPPER(p.provider_city) = UPPER(${next(filter.city)})`);
  if (filter.state) where.push(`UPPER(p.provider_state) = UPPER(${next(filter.state)})`);
  if (filter.ratedOnly) where.push("r.avg_rating IS NOT NULL");

  let text = SELECT_RATED_PROVIDERS;
  if (where.length) text += `\n  WHERE ${where.join("\n    AND ")}`;
  text += `\n  ORDER BY ${ORDER_BY[filter.orderBy ?? "value"]}`;
  if (filter.limit !== undefined) text += `\n  LIMIT ${next(filter.limit)}`;

  return { text, params };
}

export class PostgresProviderRepository implements ProviderRepository {
  constructor(private readonly query: QueryFn = defaultQuery) {}

  async findMatching(filter: ProviderFilter): Promise<readonly RatedProvider[]> {
    const { text, params } = buildFindMatchingQuery(filter);
    const result = await this.query<ProviderRow>(text, params);
    return result.rows.map(rowToDomain);
  }

  async findCoordinatesByZip(zipCode: string): Promise<LatLng | null> {
    const result = await this.query<{ latitude: number | string | null; longitude: number | string | null }>(
      `SELECT latitude, longitude FROM providers
       WHERE provider_zip_code = $1 AND latitude IS NOT NULL AND longitude IS NOT NULL
       LIMIT 1`,
      [zipCode],
    );
    const row = result.rows[0];
    if (!row) return null;
    const lat = toNumberOrNull(row.latitude);
    const lng = toNumberOrNull(row.longitude);
    return lat === null || lng === null ? null : { lat, lng };
  }

  async findByProviderId(providerId: string): Promise<readonly RatedProvider[]> {
    const result = await this.query<ProviderRow>(
      `${SELECT_RATED_PROVIDERS}\n  WHERE p.provider_id = $1\n  ORDER BY p.ms_drg_definition ASC`,
      [providerId],
    );
    return result.rows.map(rowToDomain);
  }
}
