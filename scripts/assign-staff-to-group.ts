/**
 * Add every staff user who is not a superuser to the "Staff" group.
 * Run create-staff-group first.
 * Usage: npx tsx scripts/assign-staff-to-group.ts
 */
import { loadConfigIntoEnv } from "../lib/config/data-dir";
import { getDb } from "../lib/db";
import { STAFF_GROUP_NAME, assignStaffToGroup } from "../lib/accounts/groups";

async function main() {
  loadConfigIntoEnv();
  const result = await assignStaffToGroup(getDb());

  if (result.status === "missing_group") {
    console.error(`Group "${STAFF_GROUP_NAME}" does not exist. Run create-staff-group first.`);
    process.exit(1);
  }

  if (result.users.length === 0) {
    console.log(`All staff users are already in "${result.group.name}".`);
    return;
  }
  for (const user of result.users) {
    console.log(`Added ${user.username} to "${result.group.name}"`);
  }
  console.log(`Assigned ${result.users.length} user(s).`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
