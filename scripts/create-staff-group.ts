/**
 * Create (or refresh) the "Staff" group with view/change rights on profiles.
 * Usage: npx tsx scripts/create-staff-group.ts
 */
import { loadConfigIntoEnv } from "../lib/config/data-dir";
import { getDb } from "../lib/db";
import { ensureStaffGroup } from "../lib/accounts/groups";

async function main() {
  loadConfigIntoEnv();
  const { group, created, permissions } = await ensureStaffGroup(getDb());

  console.log(created ? `Created group "${group.name}"` : `Group "${group.name}" already exists`);
  console.log("Permissions:");
  for (const codename of permissions) {
    console.log(`  - ${codename}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
