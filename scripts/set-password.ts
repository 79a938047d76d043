/**
 * Reset a user's password.
 * Usage: npx tsx scripts/set-password.ts <username>
 * The new password is read from SET_PASSWORD or --password.
 */
import { parseArgs } from "node:util";
import { loadConfigIntoEnv } from "../lib/config/data-dir";
import { getDb } from "../lib/db";
import { setPassword } from "../lib/accounts/users";

const MIN_PASSWORD_LENGTH = 8;

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    password: { type: "string" },
  },
});

async function main() {
  loadConfigIntoEnv();
  const username = positionals[0];
  const password = values.password ?? process.env.SET_PASSWORD;
  if (!username || !password) {
    console.error("Usage: set-password <username> [--password <pw>]  (or SET_PASSWORD=...)");
    process.exit(1);
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    console.error(`Password must be at least ${MIN_PASSWORD_LENGTH} characters.`);
    process.exit(1);
  }

  const db = getDb();
  const user = await db.getUserByUsername(username);
  if (!user) {
    console.error(`User "${username}" does not exist.`);
    process.exit(1);
  }

  await setPassword(db, user.id, password);
  console.log(`Password updated for ${user.username}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
