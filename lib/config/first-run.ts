/**
 * First-run initialization.
 * Ensures the Staff group exists and, on an empty database, creates a
 * superuser from ADMIN_USERNAME / ADMIN_PASSWORD.
 * Runs once per process.
 */

import { getDb } from "@/lib/db";
import { ensureStaffGroup } from "@/lib/accounts/groups";
import { createUser } from "@/lib/accounts/users";

let _initialized = false;

export async function ensureFirstRunComplete(): Promise<void> {
  if (_initialized) return;
  _initialized = true;

  try {
    const db = getDb();
    const { created } = await ensureStaffGroup(db);
    if (created) console.log("  Created Staff group");

    const username = process.env.ADMIN_USERNAME?.trim();
    const password = process.env.ADMIN_PASSWORD;
    if (!username || !password) return;
    if ((await db.countUsers()) > 0) return;

    await createUser(db, { username, password, is_superuser: true });
    console.log(`  Created superuser: ${username}`);
  } catch (err) {
    console.error("First-run initialization failed:", err);
  }
}

/** For tests: allow ensureFirstRunComplete to run again. */
export function resetFirstRunForTesting(): void {
  _initialized = false;
}
