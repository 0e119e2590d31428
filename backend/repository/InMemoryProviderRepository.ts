import { averageRating, type ProviderRecord, type RatedProvider, type RatingRecord } from "../domain/Provider";
import type { Intent } from "../domain/Intent";
import type { LatLng } from "../geo/Distance";
import { matchesAny } from "../search/ProcedureMatcher";
import type { ProviderFilter, ProviderRepository } from "./ProviderRepository";

// In-memory repository (reference implementation)
// - For local runs without DATABASE_URL, unit tests, and demos.
// - NOT production storage.
//
// Enforcement:
// - Read-only after construction.
// - (providerId, procedureDefinition) must be unique.
// - Returns copies so callers cannot mutate stored records.

function assertUniqueRecords(records: readonly ProviderRecord[]): void {
  const seen = new Set<string>();
  for (const r of records) {
    const key = `${r.providerId}\u0000${r.procedureDefinition}`;
    if (seen.has(key)) {
      throw new Error(`Duplicate provider record (${r.providerId}, ${r.procedureDefinition}).`);
    }
    seen.add(key);
  }
}

function pushDownOrder(orderBy: Intent): (a: RatedProvider, b: RatedProvider) => number {
  switch (orderBy) {
    case "cheapest":
      return (a, b) => a.averageCoveredCharges - b.averageCoveredCharges;
    case "best_rated":
      return (a, b) => (b.averageRating ?? -Infinity) - (a.averageRating ?? -Infinity);
    case "nearest":
      return (a, b) => a.providerZipCode.localeCompare(b.providerZipCode);
    case "value":
      return () => 0;
  }
}

export class InMemoryProviderRepository implements ProviderRepository {
  private readonly records: readonly RatedProvider[];

  constructor(providers: readonly ProviderRecord[], ratings: readonly RatingRecord[] = []) {
    assertUniqueRecords(providers);

    const byProvider = new Map<string, RatingRecord[]>();
    for (const r of ratings) {
      const list = byProvider.get(r.providerId) ?? [];
      list.push(r);
      byProvider.set(r.providerId, list);
    }

    this.records = providers.map((p) => ({
      ...p,
      averageRating: averageRating(byProvider.get(p.providerId) ?? []),
    }));
  }

  async findMatching(filter: ProviderFilter): Promise<readonly RatedProvider[]> {
    const conditions = filter.conditions ?? [];
    const city = filter.city?.toLowerCase();
    const state = filter.state?.toLowerCase();

    let rows = this.records.filter((r) => {
      if (conditions.length && !matchesAny(r.procedureDefinition, conditions)) return false;
      if (filter.zipPrefix && !r.providerZipCode.startsWith(filter.zipPrefix)) return false;
      if (city && r.providerCity.toLowerCase() !== city) return false;
      if (state && r.providerState.toLowerCase() !== state) return false;
      if (filter.ratedOnly && r.averageRating === null) return false;
      return true;
    });

    // Stable base order, mirrors the SQL ORDER BY.
    rows = [...rows].sort((a, b) => a.providerId.localeCompare(b.providerId) || a.procedureDefinition.localeCompare(b.procedureDefinition));
    if (filter.orderBy) rows.sort(pushDownOrder(filter.orderBy));
    if (filter.limit !== undefined) rows = rows.slice(0, filter.limit);

    return rows.map((r) => ({ ...r }));
  }

  async findCoordinatesByZip(zipCode: string): Promise<LatLng | null> {
    const hit = this.records.find((r) => r.providerZipCode === zipCode && r.latitude !== null && r.longitude !== null);
    if (!hit || hit.latitude === null || hit.longitude === null) return null;
    return { lat: hit.latitude, lng: hit.longitude };
  }

  async findByProviderId(providerId: string): Promise<readonly RatedProvider[]> {
    return this.records
      .filter((r) => r.providerId === providerId)
      .map((r) => ({ ...r }));
  }
}
