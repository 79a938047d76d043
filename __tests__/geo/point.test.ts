import { describe, it, expect } from "vitest";
import {
  latitudeOf,
  locationFromCoordinates,
  longitudeOf,
  pointFromLatLng,
  toLatLngTuple,
} from "@/lib/geo/point";

describe("geo points", () => {
  it("stores longitude first", () => {
    const point = pointFromLatLng(40.7128, -74.006);
    expect(point).toEqual({ type: "Point", coordinates: [-74.006, 40.7128] });
    expect(latitudeOf(point)).toBe(40.7128);
    expect(longitudeOf(point)).toBe(-74.006);
    expect(toLatLngTuple(point)).toEqual([40.7128, -74.006]);
  });

  it("rejects out-of-range coordinates", () => {
    expect(() => pointFromLatLng(91, 0)).toThrow();
    expect(() => pointFromLatLng(0, -181)).toThrow();
  });

  describe("locationFromCoordinates", () => {
    it("sets a point when both coordinates are given", () => {
      expect(locationFromCoordinates(51.5, -0.12)).toEqual({ type: "Point", coordinates: [-0.12, 51.5] });
    });

    it("accepts zero as a coordinate", () => {
      expect(locationFromCoordinates(0, 0)).toEqual({ type: "Point", coordinates: [0, 0] });
    });

    it("clears the location when both are missing", () => {
      expect(locationFromCoordinates(null, null)).toBeNull();
      expect(locationFromCoordinates(undefined, undefined)).toBeNull();
      expect(locationFromCoordinates(null, undefined)).toBeNull();
    });

    it("leaves the location unchanged when only one is given", () => {
      expect(locationFromCoordinates(51.5, null)).toBeUndefined();
      expect(locationFromCoordinates(undefined, -0.12)).toBeUndefined();
    });
  });
});
