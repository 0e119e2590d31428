import type { Intent } from "../domain/Intent";
import type { RatedProvider } from "../domain/Provider";
import type { LatLng } from "../geo/Distance";
import type { ProcedureCondition } from "../search/ProcedureMatcher";

// Repository Boundary (Cost Navigator)
// - This is the ONLY layer that reads provider and rating records.
// - Read-only: no insert/update/delete methods exist.
// - No ranking beyond the optional order push-down; scoring lives in search/.

export interface ProviderFilter {
  // OR-combined. Absent or empty means no procedure constraint.
  readonly conditions?: readonly ProcedureCondition[];

  // Equality / prefix filters, AND-combined with the conditions.
  readonly zipPrefix?: string;
  readonly city?: string;
  readonly state?: string;

  // Only return providers that have at least one rating.
  readonly ratedOnly?: boolean;

  // Push-down ordering, only meaningful together with `limit`.
  readonly orderBy?: Intent;
  readonly limit?: number;
}

export interface ProviderRepository {
  findMatching(filter: ProviderFilter): Promise<readonly RatedProvider[]>;

  // Coordinates of any stored record with exactly this ZIP.
  findCoordinatesByZip(zipCode: string): Promise<LatLng | null>;

  // Every procedure record of one provider.
  findByProviderId(providerId: string): Promise<readonly RatedProvider[]>;
}
