// NOTE: These are read-only domain contracts.
// - The data store owns these records; the navigator never writes them.
// - One provider has one record per procedure it offers.

export type ProviderId = string;

export interface ProviderRecord {
  readonly providerId: ProviderId;
  readonly providerName: string;
  readonly providerCity: string;
  readonly providerState: string;
  readonly providerZipCode: string;

  // MS-DRG definition, e.g. "470 - MAJOR JOINT REPLACEMENT W/O MCC".
  readonly procedureDefinition: string;

  readonly totalDischarges: number;
  readonly averageCoveredCharges: number;
  readonly averageTotalPayments: number;
  readonly averageMedicarePayments: number;

  // Absent coordinates exclude the record from radius search.
  readonly latitude: number | null;
  readonly longitude: number | null;
}

export interface RatingRecord {
  readonly providerId: ProviderId;
  readonly rating: number; // 1–10
  readonly category: string;
}

// A provider record joined with the unweighted mean of its ratings.
export interface RatedProvider extends ProviderRecord {
  readonly averageRating: number | null;
}

export function averageRating(ratings: readonly RatingRecord[]): number | null {
  if (!ratings.length) return null;
  return ratings.reduce((sum, r) => sum + r.rating, 0) / ratings.length;
}
