import type { User } from "@/lib/schemas";

/** Full name as "first last", falling back to the username. */
export function getFullName(user: Pick<User, "username" | "first_name" | "last_name">): string {
  const full = `${user.first_name} ${user.last_name}`.trim();
  return full || user.username;
}
