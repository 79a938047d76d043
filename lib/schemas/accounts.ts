import * as z from "zod";

export const MAX_PHONE_NUMBER_LENGTH = 20;
export const MAX_USERNAME_LENGTH = 150;

export const longitudeSchema = z.number().finite().min(-180).max(180);
export const latitudeSchema = z.number().finite().min(-90).max(90);

/** GeoJSON Point, coordinates in [longitude, latitude] order. */
export const geoPointSchema = z.object({
  type: z.literal("Point"),
  coordinates: z.tuple([longitudeSchema, latitudeSchema]),
});

export const activityActionSchema = z.enum(["login", "logout", "failed_login"]);

export const usernameSchema = z
  .string()
  .min(1)
  .max(MAX_USERNAME_LENGTH)
  .regex(/^[\w.@+-]+$/, "Letters, digits and @/./+/-/_ only");

export const userSchema = z.object({
  id: z.string().min(1),
  username: usernameSchema,
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  password_hash: z.string(),
  is_active: z.boolean(),
  is_staff: z.boolean(),
  is_superuser: z.boolean(),
  date_joined: z.string(),
  last_login: z.string().nullable(),
});

export const profileSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  home_address: z.string().nullable(),
  phone_number: z.string().max(MAX_PHONE_NUMBER_LENGTH).nullable(),
  location: geoPointSchema.nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

/** Profile joined with the owning user's identity columns. */
export const profileRecordSchema = profileSchema.extend({
  username: z.string(),
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
});

export const activityLogSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().nullable(),
  username: z.string(),
  action: activityActionSchema,
  ip_address: z.string().nullable(),
  user_agent: z.string(),
  session_key: z.string().nullable(),
  timestamp: z.string(),
});

export const groupSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const sessionSchema = z.object({
  session_key: z.string().min(1),
  user_id: z.string().min(1),
  created_at: z.string(),
  expires_at: z.string(),
});

export type GeoPoint = z.infer<typeof geoPointSchema>;
export type ActivityAction = z.infer<typeof activityActionSchema>;
export type User = z.infer<typeof userSchema>;
export type Profile = z.infer<typeof profileSchema>;
export type ProfileRecord = z.infer<typeof profileRecordSchema>;
export type ActivityLog = z.infer<typeof activityLogSchema>;
export type Group = z.infer<typeof groupSchema>;
export type Session = z.infer<typeof sessionSchema>;
