import type { ActivityLogListOptions, DbAdapter } from "@/lib/db/adapter";
import type { ActivityLog } from "@/lib/schemas";

export const DEFAULT_ACTIVITY_LIMIT = 100;
export const MAX_ACTIVITY_LIMIT = 500;

/** Newest first, limit clamped to [1, MAX_ACTIVITY_LIMIT]. */
export async function listRecentActivity(
  db: DbAdapter,
  options: ActivityLogListOptions = {}
): Promise<ActivityLog[]> {
  const limit = Math.min(Math.max(options.limit ?? DEFAULT_ACTIVITY_LIMIT, 1), MAX_ACTIVITY_LIMIT);
  return db.listActivityLogs({ ...options, limit });
}

export const ACTIVITY_LABELS: Record<ActivityLog["action"], string> = {
  login: "Login",
  logout: "Logout",
  failed_login: "Failed login",
};
