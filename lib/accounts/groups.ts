/**
 * The "Staff" group: view/change rights on profiles for non-superuser staff.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { Group, User } from "@/lib/schemas";
import type { ProfilePermission } from "./permissions";

export const STAFF_GROUP_NAME = "Staff";

export const STAFF_PERMISSIONS: ProfilePermission[] = [
  "view_userprofile",
  "change_userprofile",
];

export interface EnsureStaffGroupResult {
  group: Group;
  created: boolean;
  permissions: string[];
}

/** Get or create the Staff group and reset its permissions. */
export async function ensureStaffGroup(db: DbAdapter): Promise<EnsureStaffGroupResult> {
  return db.transaction(async (tx) => {
    const existing = await tx.getGroupByName(STAFF_GROUP_NAME);
    const group = existing ?? (await tx.insertGroup(STAFF_GROUP_NAME));
    await tx.setGroupPermissions(group.id, STAFF_PERMISSIONS);
    const permissions = await tx.getGroupPermissions(group.id);
    return { group, created: existing === null, permissions };
  });
}

export type AssignStaffResult =
  | { status: "missing_group" }
  | { status: "assigned"; group: Group; users: User[] };

/** Add every staff non-superuser who is not yet a member. */
export async function assignStaffToGroup(db: DbAdapter): Promise<AssignStaffResult> {
  const group = await db.getGroupByName(STAFF_GROUP_NAME);
  if (!group) return { status: "missing_group" };

  const users = await db.listUsers({
    is_staff: true,
    is_superuser: false,
    notInGroupId: group.id,
  });
  await db.transaction(async (tx) => {
    for (const user of users) {
      await tx.addUserToGroup(user.id, group.id);
    }
  });
  return { status: "assigned", group, users };
}
