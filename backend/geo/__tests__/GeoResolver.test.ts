import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { FailingRepository, providerRecord, testReference } from "../../__tests__/fixtures";
import { InMemoryProviderRepository } from "../../repository/InMemoryProviderRepository";
import { GeoResolver, hashZip, jitterOffsets, normalizeZip } from "../GeoResolver";

describe("hashZip", () => {
  it("matches the FNV-1a reference values", () => {
    assert.equal(hashZip(""), 0x811c9dc5);
    assert.equal(hashZip("a"), 0xe40c292c);
  });
});

describe("jitterOffsets", () => {
  it("is stable and bounded", () => {
    const [a, b] = jitterOffsets("10999");
    assert.deepEqual(jitterOffsets("10999"), [a, b]);
    for (const v of [a, b]) assert.ok(v >= -1 && v <= 1);
  });
});

describe("normalizeZip", () => {
  it("drops a ZIP+4 extension", () => {
    assert.equal(normalizeZip(" 10001-1234 "), "10001");
  });
});

describe("GeoResolver", () => {
  const reference = testReference();

  it("uses the static centroid table first", async () => {
    const geo = new GeoResolver(reference);
    assert.deepEqual(await geo.resolve("10001"), { lat: 40.7506, lng: -73.9972, source: "zip-table" });
    assert.deepEqual(await geo.resolve("10001-1234"), { lat: 40.7506, lng: -73.9972, source: "zip-table" });
  });

  it("falls back to a stored record with the same ZIP", async () => {
    const repo = new InMemoryProviderRepository([
      providerRecord({ providerId: "990001", providerZipCode: "10999", latitude: 40.9, longitude: -73.9 }),
    ]);
    const geo = new GeoResolver(reference, repo);
    assert.deepEqual(await geo.resolve("10999"), { lat: 40.9, lng: -73.9, source: "store" });
  });

  it("degrades to the regional centroid when the store fails", async () => {
    const geo = new GeoResolver(reference, new FailingRepository());
    const first = await geo.resolve("10999");
    const second = await geo.resolve("10999");

    assert.equal(first.source, "region");
    assert.equal(first.label, "New York City & Lower Hudson");
    assert.deepEqual(first, second);
    assert.ok(Math.abs(first.lat - 40.7831) <= 0.08);
    assert.ok(Math.abs(first.lng - -73.9712) <= 0.08);
  });

  it("gives different ZIPs in one region different points", async () => {
    const geo = new GeoResolver(reference);
    const a = geo.resolveOffline("10998");
    const b = geo.resolveOffline("10999");
    assert.notDeepEqual([a.lat, a.lng], [b.lat, b.lng]);
  });

  it("resolves an unknown ZIP outside every region to the default centroid", async () => {
    const geo = new GeoResolver(reference);
    const expected = { lat: 40.7128, lng: -74.006, source: "default", label: "New York City" };
    assert.deepEqual(await geo.resolve("99999"), expected);
    assert.deepEqual(await geo.resolve("99999"), expected);
  });

  it("does not apply regional jitter to malformed ZIPs", () => {
    const geo = new GeoResolver(reference);
    assert.equal(geo.resolveOffline("1234").source, "default");
  });
});
