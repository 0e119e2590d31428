import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { EARTH_RADIUS_KM, haversineKm } from "../Distance";

describe("haversineKm", () => {
  const midtown = { lat: 40.7506, lng: -73.9972 };
  const brooklyn = { lat: 40.6393, lng: -73.9985 };

  it("returns 0 for identical points", () => {
    assert.equal(haversineKm(midtown, midtown), 0);
  });

  it("is symmetric", () => {
    assert.ok(Math.abs(haversineKm(midtown, brooklyn) - haversineKm(brooklyn, midtown)) < 1e-9);
  });

  it("measures one degree of latitude along a meridian", () => {
    const expected = (EARTH_RADIUS_KM * Math.PI) / 180;
    assert.ok(Math.abs(haversineKm({ lat: 0, lng: 0 }, { lat: 1, lng: 0 }) - expected) < 1e-6);
  });

  it("stays finite for antipodal points", () => {
    const d = haversineKm({ lat: 0, lng: 0 }, { lat: 0, lng: 180 });
    assert.ok(Math.abs(d - EARTH_RADIUS_KM * Math.PI) < 1e-6);
  });

  it("places a Brooklyn hospital about 12.4 km from midtown", () => {
    assert.ok(Math.abs(haversineKm(midtown, brooklyn) - 12.3765) < 0.001);
  });
});
