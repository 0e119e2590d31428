import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { FailingRepository, providerRecord, testReference } from "../../__tests__/fixtures";
import { DEFAULT_DATA_DIR } from "../../config/ReferenceData";
import { resultsOf } from "../../domain/SearchOutcome";
import { haversineKm } from "../../geo/Distance";
import { GeoResolver } from "../../geo/GeoResolver";
import { InMemoryProviderRepository } from "../../repository/InMemoryProviderRepository";
import type { ProviderRepository } from "../../repository/ProviderRepository";
import { loadInMemoryRepository } from "../../repository/RepositoryFactory";
import { ProviderSearch, STORE_UNAVAILABLE_MESSAGE } from "../ProviderSearch";

const reference = testReference();
const MIDTOWN = { lat: 40.7506, lng: -73.9972 }; // ZIP 10001 centroid

function searchOver(repository: ProviderRepository): ProviderSearch {
  return new ProviderSearch({ repository, geo: new GeoResolver(reference), reference });
}

// One provider ~10 km north of 10001, one ~80 km north.
const near = providerRecord({ providerId: "100010", latitude: 40.8405, longitude: -73.9972, averageCoveredCharges: 90_000 });
const far = providerRecord({ providerId: "100080", latitude: 41.4701, longitude: -73.9972, averageCoveredCharges: 20_000 });
const nearCheap = providerRecord({ providerId: "100011", latitude: 40.7806, longitude: -73.9972, averageCoveredCharges: 30_000 });

describe("ProviderSearch.search", () => {
  it("keeps the 10 km provider and drops the 80 km one at a 50 km radius", async () => {
    const outcome = await searchOver(new InMemoryProviderRepository([near, far])).search({
      procedure: "470",
      zipCode: "10001",
      radiusKm: 50,
    });

    assert.equal(outcome.status, "ok");
    const results = resultsOf(outcome);
    assert.deepEqual(results.map((r) => r.providerId), ["100010"]);
    assert.ok(Math.abs((results[0].distanceKm ?? -1) - 10) < 0.05);
    assert.equal(results[0].rank, 1);
  });

  it("includes a provider exactly on the radius", async () => {
    const exact = haversineKm(MIDTOWN, { lat: 40.8405, lng: -73.9972 });
    const outcome = await searchOver(new InMemoryProviderRepository([near])).search({
      procedure: "470",
      zipCode: "10001",
      radiusKm: exact,
    });
    assert.deepEqual(resultsOf(outcome).map((r) => r.providerId), ["100010"]);
  });

  it("ranks by the requested intent", async () => {
    const outcome = await searchOver(new InMemoryProviderRepository([near, nearCheap])).search({
      procedure: "joint replacement",
      zipCode: "10001",
      intent: "cheapest",
    });
    assert.deepEqual(resultsOf(outcome).map((r) => r.providerId), ["100011", "100010"]);
  });

  it("skips records without coordinates", async () => {
    const unplaced = providerRecord({ providerId: "100099", latitude: null, longitude: null });
    const outcome = await searchOver(new InMemoryProviderRepository([unplaced, near])).search({
      procedure: "470",
      zipCode: "10001",
    });
    assert.deepEqual(resultsOf(outcome).map((r) => r.providerId), ["100010"]);
  });

  it("reports empty when nothing matches", async () => {
    const outcome = await searchOver(new InMemoryProviderRepository([near])).search({
      procedure: "sepsis",
      zipCode: "10001",
    });
    assert.deepEqual(outcome, { status: "empty" });
  });

  it("rejects a malformed ZIP before touching the store", async () => {
    const outcome = await searchOver(new FailingRepository()).search({ procedure: "470", zipCode: "ABCDE" });
    assert.equal(outcome.status, "invalid");
    if (outcome.status === "invalid") assert.equal(outcome.issues[0].path, "zipCode");
  });

  it("rejects an out-of-range radius and limit", async () => {
    const outcome = await searchOver(new FailingRepository()).search({
      procedure: "470",
      zipCode: "10001",
      radiusKm: "0",
      limit: "101",
    });
    assert.equal(outcome.status, "invalid");
    if (outcome.status === "invalid") {
      assert.deepEqual(outcome.issues.map((i) => i.path), ["radiusKm", "limit"]);
    }
  });

  it("accepts numeric strings from query parameters", async () => {
    const outcome = await searchOver(new InMemoryProviderRepository([near, nearCheap])).search({
      procedure: "470",
      zipCode: "10001",
      radiusKm: "25",
      limit: "1",
      intent: "cheapest",
    });
    assert.deepEqual(resultsOf(outcome).map((r) => r.providerId), ["100011"]);
  });

  it("surfaces store failures as store_error", async () => {
    const outcome = await searchOver(new FailingRepository()).search({ procedure: "470", zipCode: "10001" });
    assert.deepEqual(outcome, { status: "store_error", message: STORE_UNAVAILABLE_MESSAGE });
  });

  it("searches the sample dataset by DRG code", async () => {
    const outcome = await searchOver(loadInMemoryRepository(DEFAULT_DATA_DIR)).search({
      procedure: "470",
      zipCode: "10001",
      radiusKm: 15,
      intent: "cheapest",
    });
    assert.deepEqual(resultsOf(outcome).map((r) => r.providerId), ["330194", "330055", "330024", "330101", "330214"]);
  });
});

describe("ProviderSearch.topRated", () => {
  const search = searchOver(loadInMemoryRepository(DEFAULT_DATA_DIR));

  it("ranks rated providers for a procedure", async () => {
    const outcome = await search.topRated({ procedure: "470", limit: 3 });
    assert.deepEqual(resultsOf(outcome).map((r) => r.providerId), ["330101", "330214", "330024"]);
  });

  it("excludes unrated providers", async () => {
    const unrated = new InMemoryProviderRepository([near], []);
    assert.deepEqual(await searchOver(unrated).topRated({}), { status: "empty" });
  });
});

describe("ProviderSearch.getProvider", () => {
  const search = searchOver(loadInMemoryRepository(DEFAULT_DATA_DIR));

  it("returns every record of a provider", async () => {
    const lookup = await search.getProvider("330024");
    assert.equal(lookup.status, "ok");
    if (lookup.status === "ok") {
      assert.equal(lookup.records.length, 2);
      assert.ok(Math.abs((lookup.records[0].averageRating ?? 0) - 8.65) < 1e-9);
    }
  });

  it("reports an unknown provider as not_found", async () => {
    assert.deepEqual(await search.getProvider("999999"), { status: "not_found" });
  });

  it("reports store failures", async () => {
    assert.deepEqual(await searchOver(new FailingRepository()).getProvider("330024"), {
      status: "store_error",
      message: STORE_UNAVAILABLE_MESSAGE,
    });
  });
});
