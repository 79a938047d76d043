/**
 * Two-tier visibility: superusers see every row, everyone else only their own.
 * Out-of-scope lookups read as "not found" so ids of other users do not leak.
 */

import type { DbAdapter, ProfileListOptions, UserListOptions } from "@/lib/db/adapter";
import type { User } from "@/lib/schemas";

export const PROFILE_PERMISSIONS = [
  "add_userprofile",
  "change_userprofile",
  "delete_userprofile",
  "view_userprofile",
] as const;

export type ProfilePermission = (typeof PROFILE_PERMISSIONS)[number];

export function seesAllRows(user: User): boolean {
  return user.is_superuser;
}

export function profileScope(user: User): ProfileListOptions {
  return seesAllRows(user) ? {} : { userId: user.id };
}

export function userScope(user: User): UserListOptions {
  return seesAllRows(user) ? {} : { userId: user.id };
}

export function canAccessUser(requester: User, targetUserId: string): boolean {
  return seesAllRows(requester) || requester.id === targetUserId;
}

export async function hasPermission(
  db: DbAdapter,
  user: User,
  codename: ProfilePermission
): Promise<boolean> {
  if (!user.is_active) return false;
  if (user.is_superuser) return true;
  const granted = await db.getUserPermissions(user.id);
  return granted.includes(codename);
}

/** Admin pages: staff holding view_userprofile (superusers always pass). */
export async function canUseProfileAdmin(db: DbAdapter, user: User): Promise<boolean> {
  if (!user.is_active || !user.is_staff) return false;
  return hasPermission(db, user, "view_userprofile");
}

/** Profile change form: staff holding change_userprofile. Rows stay under profileScope. */
export async function canChangeProfiles(db: DbAdapter, user: User): Promise<boolean> {
  if (!user.is_active || !user.is_staff) return false;
  return hasPermission(db, user, "change_userprofile");
}

export function canViewActivityLog(user: User): boolean {
  return user.is_active && user.is_superuser;
}
