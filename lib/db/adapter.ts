/**
 * Database adapter interface.
 * Single seam between business logic and storage.
 */

import type {
  ActivityAction,
  ActivityLog,
  GeoPoint,
  Group,
  ProfileRecord,
  Session,
  User,
} from "@/lib/schemas";

/**
 * Run multiple operations in a transaction.
 * On success: commit. On error/throw: rollback.
 */
export type TransactionFn<T> = (adapter: DbAdapter) => Promise<T>;

/** A write hit a UNIQUE constraint; `target` names it as "table.column". */
export class UniqueConstraintError extends Error {
  constructor(
    readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(`UNIQUE constraint failed: ${target}`, options);
    this.name = "UniqueConstraintError";
  }
}

export interface NewUser {
  id?: string;
  username: string;
  email?: string;
  first_name?: string;
  last_name?: string;
  password_hash?: string;
  is_active?: boolean;
  is_staff?: boolean;
  is_superuser?: boolean;
  date_joined?: string;
}

export type UserUpdate = Partial<
  Pick<
    User,
    | "email"
    | "first_name"
    | "last_name"
    | "password_hash"
    | "is_active"
    | "is_staff"
    | "is_superuser"
    | "last_login"
  >
>;

export interface NewProfile {
  id?: string;
  user_id: string;
  home_address?: string | null;
  phone_number?: string | null;
  location?: GeoPoint | null;
}

export type ProfileUpdate = Partial<
  Pick<NewProfile, "home_address" | "phone_number" | "location">
>;

export interface ProfileListOptions {
  /** Restrict to the profile owned by this user. */
  userId?: string;
  /** Case-insensitive substring over username, email, phone number and address. */
  search?: string;
  /** Only profiles that have a location. */
  withLocation?: boolean;
  createdSince?: string;
  updatedSince?: string;
}

export interface UserListOptions {
  userId?: string;
  /** Exclude members of this group. */
  notInGroupId?: string;
  is_staff?: boolean;
  is_superuser?: boolean;
}

export interface NewActivityLog {
  user_id: string | null;
  username: string;
  action: ActivityAction;
  ip_address: string | null;
  user_agent: string;
  session_key: string | null;
  timestamp?: string;
}

export interface ActivityLogListOptions {
  action?: ActivityAction;
  username?: string;
  limit?: number;
}

export interface DbAdapter {
  /** Run operations in a transaction. Rolls back on error. */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;

  // --- Users ---
  getUser(userId: string): Promise<User | null>;
  getUserByUsername(username: string): Promise<User | null>;
  listUsers(options?: UserListOptions): Promise<User[]>;
  countUsers(): Promise<number>;
  insertUser(row: NewUser): Promise<User>;
  updateUser(userId: string, updates: UserUpdate): Promise<void>;
  deleteUser(userId: string): Promise<void>;

  // --- Profiles ---
  getProfile(profileId: string): Promise<ProfileRecord | null>;
  getProfileByUserId(userId: string): Promise<ProfileRecord | null>;
  listProfiles(options?: ProfileListOptions): Promise<ProfileRecord[]>;
  insertProfile(row: NewProfile): Promise<ProfileRecord>;
  /** Applies the given fields and refreshes updated_at. An empty update only touches. */
  updateProfile(profileId: string, updates: ProfileUpdate): Promise<void>;
  deleteProfile(profileId: string): Promise<void>;

  // --- Activity log (append-only) ---
  insertActivityLog(row: NewActivityLog): Promise<ActivityLog>;
  listActivityLogs(options?: ActivityLogListOptions): Promise<ActivityLog[]>;

  // --- Groups & permissions ---
  getGroupByName(name: string): Promise<Group | null>;
  insertGroup(name: string): Promise<Group>;
  getGroupPermissions(groupId: string): Promise<string[]>;
  /** Replaces the group's permission set. */
  setGroupPermissions(groupId: string, codenames: string[]): Promise<void>;
  addUserToGroup(userId: string, groupId: string): Promise<void>;
  getUserPermissions(userId: string): Promise<string[]>;

  // --- Sessions ---
  insertSession(row: Session): Promise<void>;
  getSession(sessionKey: string): Promise<Session | null>;
  deleteSession(sessionKey: string): Promise<void>;
  deleteExpiredSessions(now: string): Promise<number>;
}
