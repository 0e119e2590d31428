import type { CompletionOptions, CompletionService } from "../ai/CompletionService";
import { DEFAULT_DATA_DIR, loadReferenceData, type ReferenceData } from "../config/ReferenceData";
import type { ProviderRecord, RatedProvider } from "../domain/Provider";
import type { LatLng } from "../geo/Distance";
import type { ProviderFilter, ProviderRepository } from "../repository/ProviderRepository";

// Shared in-process stand-ins for tests.

let cachedReference: ReferenceData | undefined;

export function testReference(): ReferenceData {
  cachedReference ??= loadReferenceData(DEFAULT_DATA_DIR);
  return cachedReference;
}

export function providerRecord(overrides: Partial<ProviderRecord> & Pick<ProviderRecord, "providerId">): ProviderRecord {
  return {
    providerName: `PROVIDER ${overrides.providerId}`,
    providerCity: "NEW YORK",
    providerState: "NY",
    providerZipCode: "10001",
    procedureDefinition: "470 - MAJOR JOINT REPLACEMENT OR REATTACHMENT OF LOWER EXTREMITY W/O MCC",
    totalDischarges: 100,
    averageCoveredCharges: 50_000,
    averageTotalPayments: 15_000,
    averageMedicarePayments: 12_000,
    latitude: 40.7506,
    longitude: -73.9972,
    ...overrides,
  };
}

export class FailingRepository implements ProviderRepository {
  async findMatching(_filter: ProviderFilter): Promise<readonly RatedProvider[]> {
    throw new Error("connection refused");
  }

  async findCoordinatesByZip(_zipCode: string): Promise<LatLng | null> {
    throw new Error("connection refused");
  }

  async findByProviderId(_providerId: string): Promise<readonly RatedProvider[]> {
    throw new Error("connection refused");
  }
}

// Counts reads before delegating.
export class CountingRepository implements ProviderRepository {
  findMatchingCalls = 0;

  constructor(private readonly inner: ProviderRepository) {}

  async findMatching(filter: ProviderFilter): Promise<readonly RatedProvider[]> {
    this.findMatchingCalls++;
    return this.inner.findMatching(filter);
  }

  findCoordinatesByZip(zipCode: string): Promise<LatLng | null> {
    return this.inner.findCoordinatesByZip(zipCode);
  }

  findByProviderId(providerId: string): Promise<readonly RatedProvider[]> {
    return this.inner.findByProviderId(providerId);
  }
}

export interface RecordedCompletion {
  readonly prompt: string;
  readonly systemInstructions: string;
}

// Replies in order; an Error entry is thrown instead of returned.
export class ScriptedCompletionService implements CompletionService {
  readonly name = "scripted";
  readonly calls: RecordedCompletion[] = [];
  private readonly replies: (string | Error)[];

  constructor(replies: readonly (string | Error)[]) {
    this.replies = [...replies];
  }

  async complete(prompt: string, systemInstructions: string, _options?: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, systemInstructions });
    const next = this.replies.shift();
    if (next === undefined) throw new Error("no scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  }
}
