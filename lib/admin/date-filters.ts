/**
 * Admin list date filters. Boundaries are computed in UTC so they match the
 * ISO timestamps stored in the database.
 */

export const DATE_FILTERS = ["any", "today", "past_7_days", "this_month", "this_year"] as const;

export type DateFilter = (typeof DATE_FILTERS)[number];

export const DATE_FILTER_LABELS: Record<DateFilter, string> = {
  any: "Any date",
  today: "Today",
  past_7_days: "Past 7 days",
  this_month: "This month",
  this_year: "This year",
};

export function parseDateFilter(value: string | undefined): DateFilter {
  return DATE_FILTERS.find((f) => f === value) ?? "any";
}

/** Inclusive lower bound for the filter, or undefined for "any". */
export function dateFilterSince(filter: DateFilter, now = new Date()): string | undefined {
  const y = now.getUTCFullYear();
  const m = now.getUTCMonth();
  const d = now.getUTCDate();
  switch (filter) {
    case "any":
      return undefined;
    case "today":
      return new Date(Date.UTC(y, m, d)).toISOString();
    case "past_7_days":
      return new Date(Date.UTC(y, m, d - 7)).toISOString();
    case "this_month":
      return new Date(Date.UTC(y, m, 1)).toISOString();
    case "this_year":
      return new Date(Date.UTC(y, 0, 1)).toISOString();
  }
}
