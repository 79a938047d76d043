/**
 * User lifecycle. Every save goes through userSaved so the profile
 * receiver can create or refresh the user's profile.
 */

import "@/lib/signals/receivers";
import { UniqueConstraintError, type DbAdapter } from "@/lib/db/adapter";
import type { User } from "@/lib/schemas";
import { hashPassword } from "@/lib/auth/passwords";
import { userSaved } from "@/lib/signals";
import { AccountError } from "./errors";

export interface CreateUserInput {
  username: string;
  /** Omit for an account that cannot log in. */
  password?: string;
  email?: string;
  first_name?: string;
  last_name?: string;
  is_staff?: boolean;
  /** Superusers are always staff. */
  is_superuser?: boolean;
}

function duplicateUsername(username: string): AccountError {
  return new AccountError("duplicate_username", `A user named "${username}" already exists`);
}

export async function createUser(db: DbAdapter, input: CreateUserInput): Promise<User> {
  if (await db.getUserByUsername(input.username)) throw duplicateUsername(input.username);

  const isSuperuser = input.is_superuser ?? false;
  try {
    return await insertUserWithProfile(db, input, isSuperuser);
  } catch (err) {
    // A concurrent registration can take the name between the check and the insert.
    if (err instanceof UniqueConstraintError && err.target === "auth_user.username") {
      throw duplicateUsername(input.username);
    }
    throw err;
  }
}

function insertUserWithProfile(db: DbAdapter, input: CreateUserInput, isSuperuser: boolean): Promise<User> {
  return db.transaction(async (tx) => {
    const user = await tx.insertUser({
      username: input.username,
      email: input.email ?? "",
      first_name: input.first_name ?? "",
      last_name: input.last_name ?? "",
      password_hash: input.password ? hashPassword(input.password) : "",
      is_staff: isSuperuser || (input.is_staff ?? false),
      is_superuser: isSuperuser,
    });
    await userSaved.send({ db: tx, user, created: true });
    return user;
  });
}

export interface UserDetailsUpdate {
  email?: string;
  first_name?: string;
  last_name?: string;
}

export async function updateUserDetails(
  db: DbAdapter,
  userId: string,
  updates: UserDetailsUpdate
): Promise<User> {
  return db.transaction(async (tx) => {
    await tx.updateUser(userId, updates);
    const user = await tx.getUser(userId);
    if (!user) throw new AccountError("user_not_found", `User ${userId} not found`);
    await userSaved.send({ db: tx, user, created: false });
    return user;
  });
}

export async function setPassword(db: DbAdapter, userId: string, password: string): Promise<void> {
  await db.updateUser(userId, { password_hash: hashPassword(password) });
}
