import { describe, it, expect } from "vitest";
import {
  activityQuerySchema,
  createProfileSchema,
  currentProfileUpdateSchema,
  patchProfileSchema,
  registerSchema,
  replaceProfileSchema,
} from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

describe("request schemas", () => {
  describe("profiles", () => {
    it("fills omitted fields with null on replace", () => {
      expect(replaceProfileSchema.parse({ phone_number: "555-0100" })).toEqual({
        home_address: null,
        phone_number: "555-0100",
        location: null,
      });
    });

    it("keeps omitted fields absent on patch", () => {
      expect(patchProfileSchema.parse({ home_address: "1 Main St" })).toEqual({ home_address: "1 Main St" });
    });

    it("validates GeoJSON points and coordinate ranges", () => {
      expect(
        patchProfileSchema.safeParse({ location: { type: "Point", coordinates: [-74.006, 40.7128] } }).success
      ).toBe(true);
      expect(patchProfileSchema.safeParse({ location: { type: "Point", coordinates: [181, 0] } }).success).toBe(false);
      expect(patchProfileSchema.safeParse({ location: { type: "Point", coordinates: [0, -91] } }).success).toBe(false);
      expect(patchProfileSchema.safeParse({ location: { type: "LineString", coordinates: [0, 0] } }).success).toBe(
        false
      );
    });

    it("limits phone numbers to 20 characters", () => {
      const result = patchProfileSchema.safeParse({ phone_number: "1".repeat(21) });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(zodErrorDetails(result.error)).toEqual({
        phone_number: ["Phone number must be at most 20 characters"],
      });
    });

    it("accepts an optional user_id on create", () => {
      expect(createProfileSchema.parse({ user_id: "u1" })).toEqual({ user_id: "u1" });
      expect(createProfileSchema.safeParse({ user_id: "" }).success).toBe(false);
    });
  });

  describe("current profile form", () => {
    it("accepts separate coordinates and null", () => {
      expect(currentProfileUpdateSchema.parse({ latitude: 40.7, longitude: null })).toEqual({
        latitude: 40.7,
        longitude: null,
      });
    });

    it("accepts an empty email but not a malformed one", () => {
      expect(currentProfileUpdateSchema.safeParse({ email: "" }).success).toBe(true);
      expect(currentProfileUpdateSchema.safeParse({ email: "not-an-email" }).success).toBe(false);
    });
  });

  describe("registration", () => {
    it("enforces the username alphabet and password length", () => {
      expect(registerSchema.safeParse({ username: "alice.b+1@x", password: "test-secret" }).success).toBe(true);
      expect(registerSchema.safeParse({ username: "has space", password: "test-secret" }).success).toBe(false);
      expect(registerSchema.safeParse({ username: "alice", password: "short" }).success).toBe(false);
    });
  });

  describe("activity query", () => {
    it("defaults the limit to 100 and coerces strings", () => {
      expect(activityQuerySchema.parse({})).toEqual({ limit: 100 });
      expect(activityQuerySchema.parse({ limit: "25", action: "login" })).toEqual({ limit: 25, action: "login" });
    });

    it("rejects limits above 500 and unknown actions", () => {
      expect(activityQuerySchema.safeParse({ limit: "501" }).success).toBe(false);
      expect(activityQuerySchema.safeParse({ action: "signup" }).success).toBe(false);
    });
  });
});
