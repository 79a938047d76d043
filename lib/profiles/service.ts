/**
 * Scoped profile and user access. Every read and write goes through the
 * requester's scope; rows outside it are reported as missing.
 */

import { UniqueConstraintError, type DbAdapter, type ProfileUpdate } from "@/lib/db/adapter";
import type { GeoPoint, ProfileRecord, User } from "@/lib/schemas";
import { AccountError } from "@/lib/accounts/errors";
import { canAccessUser, profileScope, userScope } from "@/lib/accounts/permissions";

export interface ProfileSearch {
  search?: string;
}

export async function listProfilesFor(
  db: DbAdapter,
  requester: User,
  { search }: ProfileSearch = {}
): Promise<ProfileRecord[]> {
  return db.listProfiles({ ...profileScope(requester), search: search || undefined });
}

export async function getProfileFor(
  db: DbAdapter,
  requester: User,
  profileId: string
): Promise<ProfileRecord | null> {
  const profile = await db.getProfile(profileId);
  if (!profile || !canAccessUser(requester, profile.user_id)) return null;
  return profile;
}

export interface NewProfileInput {
  user_id?: string;
  home_address?: string | null;
  phone_number?: string | null;
  location?: GeoPoint | null;
}

/**
 * Creates a profile for input.user_id (the requester when omitted).
 * Throws user_not_found for a missing or out-of-scope user and
 * profile_exists when the user already has one.
 */
export async function createProfileFor(
  db: DbAdapter,
  requester: User,
  input: NewProfileInput
): Promise<ProfileRecord> {
  const userId = input.user_id ?? requester.id;
  if (!canAccessUser(requester, userId)) {
    throw new AccountError("user_not_found", `User ${userId} not found`);
  }

  return db.transaction(async (tx) => {
    const user = await tx.getUser(userId);
    if (!user) throw new AccountError("user_not_found", `User ${userId} not found`);
    const exists = () => new AccountError("profile_exists", `User ${user.username} already has a profile`);
    if (await tx.getProfileByUserId(userId)) throw exists();
    try {
      return await tx.insertProfile({
        user_id: userId,
        home_address: input.home_address ?? null,
        phone_number: input.phone_number ?? null,
        location: input.location ?? null,
      });
    } catch (err) {
      if (err instanceof UniqueConstraintError && err.target === "user_profile.user_id") throw exists();
      throw err;
    }
  });
}

/** Returns the updated profile, or null when it is missing or out of scope. */
export async function updateProfileFor(
  db: DbAdapter,
  requester: User,
  profileId: string,
  updates: ProfileUpdate
): Promise<ProfileRecord | null> {
  const existing = await getProfileFor(db, requester, profileId);
  if (!existing) return null;
  await db.updateProfile(profileId, updates);
  return db.getProfile(profileId);
}

export async function deleteProfileFor(
  db: DbAdapter,
  requester: User,
  profileId: string
): Promise<boolean> {
  const existing = await getProfileFor(db, requester, profileId);
  if (!existing) return false;
  await db.deleteProfile(profileId);
  return true;
}

export interface UserWithProfile {
  user: User;
  profile: ProfileRecord | null;
}

export async function listUsersFor(db: DbAdapter, requester: User): Promise<UserWithProfile[]> {
  const [users, profiles] = await Promise.all([
    db.listUsers(userScope(requester)),
    db.listProfiles(profileScope(requester)),
  ]);
  const byUser = new Map(profiles.map((p) => [p.user_id, p]));
  return users.map((user) => ({ user, profile: byUser.get(user.id) ?? null }));
}

export async function getUserFor(
  db: DbAdapter,
  requester: User,
  userId: string
): Promise<UserWithProfile | null> {
  if (!canAccessUser(requester, userId)) return null;
  const user = await db.getUser(userId);
  if (!user) return null;
  return { user, profile: await db.getProfileByUserId(user.id) };
}

/** Profile page lookup by username, subject to the same scope. */
export async function getUserByUsernameFor(
  db: DbAdapter,
  requester: User,
  username: string
): Promise<UserWithProfile | null> {
  const user = await db.getUserByUsername(username);
  if (!user || !canAccessUser(requester, user.id)) return null;
  return { user, profile: await db.getProfileByUserId(user.id) };
}
