/**
 * Session lookup for server components and server-rendered pages.
 */

import { cookies } from "next/headers";
import { redirect } from "next/navigation";
import { getDb } from "@/lib/db";
import type { User } from "@/lib/schemas";
import { SESSION_COOKIE_NAME } from "@/lib/config/settings";
import { resolveSession } from "./sessions";

export async function getCurrentUser(): Promise<User | null> {
  const cookieStore = await cookies();
  const resolved = await resolveSession(getDb(), cookieStore.get(SESSION_COOKIE_NAME)?.value);
  return resolved?.user ?? null;
}

/** Redirects anonymous visitors to the login page, returning here afterwards. */
export async function requireUser(nextPath: string): Promise<User> {
  const user = await getCurrentUser();
  if (!user) redirect(`/login?next=${encodeURIComponent(nextPath)}`);
  return user;
}
