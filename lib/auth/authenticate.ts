import type { NextRequest, NextResponse } from "next/server";
import type { DbAdapter } from "@/lib/db/adapter";
import type { Session, User } from "@/lib/schemas";
import { SESSION_COOKIE_NAME, isSecureCookie } from "@/lib/config/settings";
import { resolveSession } from "./sessions";

export function getSessionKey(request: NextRequest): string | undefined {
  return request.cookies.get(SESSION_COOKIE_NAME)?.value;
}

/** The active user behind the request's session cookie, or null. */
export async function getRequestUser(db: DbAdapter, request: NextRequest): Promise<User | null> {
  const resolved = await resolveSession(db, getSessionKey(request));
  return resolved?.user ?? null;
}

export function setSessionCookie(response: NextResponse, session: Session): void {
  response.cookies.set(SESSION_COOKIE_NAME, session.session_key, {
    httpOnly: true,
    sameSite: "lax",
    secure: isSecureCookie(),
    path: "/",
    expires: new Date(session.expires_at),
  });
}

export function clearSessionCookie(response: NextResponse): void {
  response.cookies.set(SESSION_COOKIE_NAME, "", {
    httpOnly: true,
    sameSite: "lax",
    secure: isSecureCookie(),
    path: "/",
    maxAge: 0,
  });
}
