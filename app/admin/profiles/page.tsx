import Link from "next/link";
import { getDb } from "@/lib/db";
import { requireUser } from "@/lib/auth/current-user";
import { canChangeProfiles, canUseProfileAdmin, profileScope } from "@/lib/accounts/permissions";
import {
  DATE_FILTERS,
  DATE_FILTER_LABELS,
  dateFilterSince,
  parseDateFilter,
} from "@/lib/admin/date-filters";
import { AccessDenied } from "@/components/admin/access-denied";

type SearchParams = Record<string, string | string[] | undefined>;
type PageProps = { searchParams: Promise<SearchParams> };

function single(value: string | string[] | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function formatDate(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}

export default async function AdminProfilesPage({ searchParams }: PageProps) {
  const user = await requireUser("/admin/profiles");
  const db = getDb();
  if (!(await canUseProfileAdmin(db, user))) {
    return <AccessDenied message="You do not have permission to view profiles." />;
  }

  const params = await searchParams;
  const q = single(params.q)?.trim() ?? "";
  const created = parseDateFilter(single(params.created));
  const updated = parseDateFilter(single(params.updated));

  const profiles = await db.listProfiles({
    ...profileScope(user),
    search: q || undefined,
    createdSince: dateFilterSince(created),
    updatedSince: dateFilterSince(updated),
  });
  const canChange = await canChangeProfiles(db, user);

  return (
    <main className="mx-auto max-w-5xl p-6 space-y-4">
      <h1 className="text-xl font-semibold">User profiles</h1>
      <form className="flex flex-wrap items-end gap-3 text-sm">
        <label className="space-y-1">
          <span className="block text-muted-foreground">Search</span>
          <input
            name="q"
            defaultValue={q}
            placeholder="Username, email, phone or address"
            className="rounded border border-border px-3 py-1.5"
          />
        </label>
        <label className="space-y-1">
          <span className="block text-muted-foreground">Created</span>
          <select name="created" defaultValue={created} className="rounded border border-border px-2 py-1.5">
            {DATE_FILTERS.map((f) => (
              <option key={f} value={f}>{DATE_FILTER_LABELS[f]}</option>
            ))}
          </select>
        </label>
        <label className="space-y-1">
          <span className="block text-muted-foreground">Updated</span>
          <select name="updated" defaultValue={updated} className="rounded border border-border px-2 py-1.5">
            {DATE_FILTERS.map((f) => (
              <option key={f} value={f}>{DATE_FILTER_LABELS[f]}</option>
            ))}
          </select>
        </label>
        <button type="submit" className="rounded bg-primary px-3 py-1.5 text-primary-foreground">
          Filter
        </button>
      </form>

      <table className="w-full text-sm">
        <thead className="border-b border-border text-left text-muted-foreground">
          <tr>
            <th className="py-2">User</th>
            <th>Phone number</th>
            <th>Location</th>
            <th>Created</th>
            <th>Updated</th>
            {canChange && <th />}
          </tr>
        </thead>
        <tbody>
          {profiles.map((p) => (
            <tr key={p.id} className="border-b border-border">
              <td className="py-2">
                <Link href={`/profile/${encodeURIComponent(p.username)}`} className="text-primary hover:underline">
                  {p.username}
                </Link>
              </td>
              <td>{p.phone_number ?? "-"}</td>
              <td>{p.location ? "Yes" : "-"}</td>
              <td>{formatDate(p.created_at)}</td>
              <td>{formatDate(p.updated_at)}</td>
              {canChange && (
                <td>
                  <Link href={`/admin/profiles/${encodeURIComponent(p.id)}`} className="text-primary hover:underline">
                    Change
                  </Link>
                </td>
              )}
            </tr>
          ))}
        </tbody>
      </table>
      <p className="text-xs text-muted-foreground">
        {profiles.length === 1 ? "1 profile" : `${profiles.length} profiles`}
      </p>
    </main>
  );
}
