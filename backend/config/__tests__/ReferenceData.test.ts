import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { testReference } from "../../__tests__/fixtures";
import { buildReferenceData } from "../ReferenceData";

const valid = {
  zipCentroids: { "10001": { lat: 40.75, lng: -73.99 } },
  regionalCentroids: {
    default: { label: "Default", lat: 40.7, lng: -74 },
    regions: [
      { prefix: "1", label: "Wide", lat: 41, lng: -74, jitterDegrees: 0.5 },
      { prefix: "10", label: "Narrow", lat: 40.8, lng: -73.9, jitterDegrees: 0.1 },
    ],
  },
  procedureSynonyms: { Knee: ["Joint"] },
  cities: [],
  healthcareVocabulary: ["Hospital"],
};

describe("buildReferenceData", () => {
  it("sorts regional prefixes longest first", () => {
    assert.deepEqual(buildReferenceData(valid).regionalCentroids.map((r) => r.prefix), ["10", "1"]);
  });

  it("lowercases synonyms and vocabulary", () => {
    const reference = buildReferenceData(valid);
    assert.deepEqual(reference.procedureSynonyms.get("knee"), ["joint"]);
    assert.deepEqual(reference.healthcareVocabulary, ["hospital"]);
  });

  it("rejects malformed ZIP keys", () => {
    assert.throws(() => buildReferenceData({ ...valid, zipCentroids: { "1000": { lat: 0, lng: 0 } } }));
  });

  it("rejects out-of-range coordinates", () => {
    assert.throws(() => buildReferenceData({ ...valid, zipCentroids: { "10001": { lat: 91, lng: 0 } } }));
  });
});

describe("bundled reference tables", () => {
  const reference = testReference();

  it("load and validate", () => {
    assert.deepEqual(reference.zipCentroids.get("10001"), { lat: 40.7506, lng: -73.9972 });
    assert.equal(reference.defaultCentroid.label, "New York City");
    assert.ok(reference.cities.some((c) => c.city === "BROOKLYN"));
    assert.ok(reference.procedureSynonyms.has("knee"));
  });
});
