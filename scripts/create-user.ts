/**
 * Create a user from the command line. The profile is created on save.
 * Usage: npx tsx scripts/create-user.ts <username> [--email <email>] [--staff] [--superuser]
 * The password is read from CREATE_USER_PASSWORD or --password.
 */
import { parseArgs } from "node:util";
import { loadConfigIntoEnv } from "../lib/config/data-dir";
import { getDb } from "../lib/db";
import { createUser } from "../lib/accounts/users";
import { isAccountError } from "../lib/accounts/errors";
import { usernameSchema } from "../lib/schemas";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    email: { type: "string" },
    password: { type: "string" },
    staff: { type: "boolean", default: false },
    superuser: { type: "boolean", default: false },
  },
});

async function main() {
  loadConfigIntoEnv();
  const username = usernameSchema.safeParse(positionals[0]);
  if (!username.success) {
    console.error("Usage: create-user <username> [--email <email>] [--password <pw>] [--staff] [--superuser]");
    process.exit(1);
  }

  const password = values.password ?? process.env.CREATE_USER_PASSWORD;
  if (!password) console.warn("No password given; the account cannot log in until one is set.");

  try {
    const user = await createUser(getDb(), {
      username: username.data,
      password,
      email: values.email,
      is_staff: values.staff,
      is_superuser: values.superuser,
    });
    const role = user.is_superuser ? "superuser" : user.is_staff ? "staff user" : "user";
    console.log(`Created ${role} ${user.username} (${user.id})`);
  } catch (err) {
    if (isAccountError(err, "duplicate_username")) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
