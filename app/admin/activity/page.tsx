import { getDb } from "@/lib/db";
import { requireUser } from "@/lib/auth/current-user";
import { canViewActivityLog } from "@/lib/accounts/permissions";
import { ACTIVITY_LABELS, listRecentActivity } from "@/lib/activity/queries";
import { activityActionSchema } from "@/lib/schemas";
import { AccessDenied } from "@/components/admin/access-denied";

type SearchParams = Record<string, string | string[] | undefined>;
type PageProps = { searchParams: Promise<SearchParams> };

const ACTION_STYLES = {
  login: "text-green-700",
  logout: "text-muted-foreground",
  failed_login: "text-destructive",
} as const;

export default async function AdminActivityPage({ searchParams }: PageProps) {
  const user = await requireUser("/admin/activity");
  if (!canViewActivityLog(user)) {
    return <AccessDenied message="Only superusers can view the activity log." />;
  }

  const params = await searchParams;
  const action = activityActionSchema.safeParse(params.action);
  const username = typeof params.username === "string" ? params.username.trim() : "";

  const logs = await listRecentActivity(getDb(), {
    action: action.success ? action.data : undefined,
    username: username || undefined,
  });

  return (
    <main className="mx-auto max-w-6xl p-6 space-y-4">
      <h1 className="text-xl font-semibold">User activity</h1>
      <form className="flex flex-wrap items-end gap-3 text-sm">
        <label className="space-y-1">
          <span className="block text-muted-foreground">Action</span>
          <select
            name="action"
            defaultValue={action.success ? action.data : ""}
            className="rounded border border-border px-2 py-1.5"
          >
            <option value="">All</option>
            {activityActionSchema.options.map((a) => (
              <option key={a} value={a}>{ACTIVITY_LABELS[a]}</option>
            ))}
          </select>
        </label>
        <label className="space-y-1">
          <span className="block text-muted-foreground">Username</span>
          <input name="username" defaultValue={username} className="rounded border border-border px-3 py-1.5" />
        </label>
        <button type="submit" className="rounded bg-primary px-3 py-1.5 text-primary-foreground">
          Filter
        </button>
      </form>

      <table className="w-full text-sm">
        <thead className="border-b border-border text-left text-muted-foreground">
          <tr>
            <th className="py-2">Time</th>
            <th>User</th>
            <th>Action</th>
            <th>IP address</th>
            <th>User agent</th>
          </tr>
        </thead>
        <tbody>
          {logs.map((log) => (
            <tr key={log.id} className="border-b border-border align-top">
              <td className="py-2 whitespace-nowrap">{log.timestamp.replace("T", " ").slice(0, 19)}</td>
              <td>{log.username}</td>
              <td className={ACTION_STYLES[log.action]}>{ACTIVITY_LABELS[log.action]}</td>
              <td>{log.ip_address ?? "-"}</td>
              <td className="max-w-xs truncate" title={log.user_agent}>{log.user_agent || "-"}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </main>
  );
}
