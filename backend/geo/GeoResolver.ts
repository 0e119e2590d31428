import type { ReferenceData } from "../config/ReferenceData";
import type { ProviderRepository } from "../repository/ProviderRepository";
import type { LatLng } from "./Distance";

// Geo-Resolver
//
// Maps a ZIP code to approximate coordinates. Never fails: each tier degrades
// to the next, and the last one is a fixed centroid for the covered area.
//   1. static ZIP centroid table
//   2. any stored provider record with the same ZIP
//   3. regional centroid by ZIP prefix + deterministic jitter
//   4. default centroid

export type LocationSource = "zip-table" | "store" | "region" | "default";

export type ResolvedLocation = LatLng & Readonly<{ source: LocationSource; label?: string }>;

export function normalizeZip(zipCode: string): string {
  // ZIP+4 extensions are ignored for matching.
  return zipCode.trim().split("-")[0];
}

// FNV-1a, 32-bit.
export function hashZip(zip: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < zip.length; i++) {
    h ^= zip.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Two offsets in [-1, 1], stable per ZIP string.
export function jitterOffsets(zip: string): readonly [number, number] {
  const h = hashZip(zip);
  const a = (h & 0xffff) / 0xffff;
  const b = (h >>> 16) / 0xffff;
  return [a * 2 - 1, b * 2 - 1];
}

export class GeoResolver {
  constructor(
    private readonly reference: ReferenceData,
    private readonly repository?: ProviderRepository,
  ) {}

  async resolve(zipCode: string): Promise<ResolvedLocation> {
    const zip = normalizeZip(zipCode);

    const known = this.reference.zipCentroids.get(zip);
    if (known) return { lat: known.lat, lng: known.lng, source: "zip-table" };

    if (this.repository) {
      try {
        const stored = await this.repository.findCoordinatesByZip(zip);
        if (stored) return { lat: stored.lat, lng: stored.lng, source: "store" };
      } catch (err) {
        // Store trouble only costs precision here.
        console.warn(`[GeoResolver] store lookup failed for ZIP ${zip}:`, err instanceof Error ? err.message : err);
      }
    }

    return this.resolveOffline(zip);
  }

  // Tiers 3 and 4 only; synchronous and store-free.
  resolveOffline(zipCode: string): ResolvedLocation {
    const zip = normalizeZip(zipCode);

    const region = /^\d{5}$/.test(zip)
      ? this.reference.regionalCentroids.find((r) => zip.startsWith(r.prefix))
      : undefined;

    if (region) {
      const [dLat, dLng] = jitterOffsets(zip);
      return {
        lat: region.lat + dLat * region.jitterDegrees,
        lng: region.lng + dLng * region.jitterDegrees,
        source: "region",
        label: region.label,
      };
    }

    const fallback = this.reference.defaultCentroid;
    return { lat: fallback.lat, lng: fallback.lng, source: "default", label: fallback.label };
  }
}
