/**
 * Zod schemas for API request payload validation.
 * Reuses domain schemas where applicable; adds request-specific shapes.
 */

import * as z from "zod";
import { DEFAULT_ACTIVITY_LIMIT, MAX_ACTIVITY_LIMIT } from "@/lib/activity/queries";
import {
  MAX_PHONE_NUMBER_LENGTH,
  activityActionSchema,
  geoPointSchema,
  latitudeSchema,
  longitudeSchema,
  usernameSchema,
} from "@/lib/schemas";

// Auth
export const loginSchema = z.object({
  username: z.string().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
});

export const registerSchema = z.object({
  username: usernameSchema,
  password: z.string().min(8, "Password must be at least 8 characters"),
  email: z.string().email().optional().or(z.literal("")),
  first_name: z.string().max(150).optional(),
  last_name: z.string().max(150).optional(),
});

// Profiles
const homeAddressSchema = z.string().nullable();
const phoneNumberSchema = z
  .string()
  .max(MAX_PHONE_NUMBER_LENGTH, `Phone number must be at most ${MAX_PHONE_NUMBER_LENGTH} characters`)
  .nullable();

/** Writable fields; PUT sends them all, missing ones are cleared. */
export const replaceProfileSchema = z.object({
  home_address: homeAddressSchema.optional().default(null),
  phone_number: phoneNumberSchema.optional().default(null),
  location: geoPointSchema.nullable().optional().default(null),
});

export const patchProfileSchema = z.object({
  home_address: homeAddressSchema.optional(),
  phone_number: phoneNumberSchema.optional(),
  location: geoPointSchema.nullable().optional(),
});

export const createProfileSchema = patchProfileSchema.extend({
  /** Defaults to the caller. */
  user_id: z.string().min(1).optional(),
});

export const profileListQuerySchema = z.object({
  search: z.string().trim().optional(),
});

// Current user's own profile form
export const currentProfileUpdateSchema = z.object({
  first_name: z.string().max(150).optional(),
  last_name: z.string().max(150).optional(),
  email: z.string().email().optional().or(z.literal("")),
  home_address: homeAddressSchema.optional(),
  phone_number: phoneNumberSchema.optional(),
  latitude: latitudeSchema.nullable().optional(),
  longitude: longitudeSchema.nullable().optional(),
});

// Activity log
export const activityQuerySchema = z.object({
  action: activityActionSchema.optional(),
  username: z.string().trim().min(1).optional(),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_ACTIVITY_LIMIT)
    .optional()
    .default(DEFAULT_ACTIVITY_LIMIT),
});

export type LoginInput = z.infer<typeof loginSchema>;
export type RegisterInput = z.infer<typeof registerSchema>;
export type ReplaceProfileInput = z.infer<typeof replaceProfileSchema>;
export type PatchProfileInput = z.infer<typeof patchProfileSchema>;
export type CreateProfileInput = z.infer<typeof createProfileSchema>;
export type CurrentProfileUpdateInput = z.infer<typeof currentProfileUpdateSchema>;
export type ActivityQuery = z.infer<typeof activityQuerySchema>;
