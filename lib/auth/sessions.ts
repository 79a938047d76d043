/**
 * Database-backed sessions keyed by an opaque random key.
 */

import crypto from "node:crypto";
import type { DbAdapter } from "@/lib/db/adapter";
import type { Session, User } from "@/lib/schemas";
import { getSessionTtlMs } from "@/lib/config/settings";

const SESSION_KEY_PATTERN = /^[0-9a-f]{48}$/;

export function generateSessionKey(): string {
  return crypto.randomBytes(24).toString("hex");
}

/** Starts a session and sweeps sessions that expired without being presented again. */
export async function createSession(db: DbAdapter, userId: string, now = new Date()): Promise<Session> {
  const session: Session = {
    session_key: generateSessionKey(),
    user_id: userId,
    created_at: now.toISOString(),
    expires_at: new Date(now.getTime() + getSessionTtlMs()).toISOString(),
  };
  await db.deleteExpiredSessions(session.created_at);
  await db.insertSession(session);
  return session;
}

export interface ResolvedSession {
  session: Session;
  /** Null when the user was deleted or deactivated. */
  user: User | null;
}

/**
 * Look up a live session. Expired sessions are deleted and treated as absent.
 */
export async function resolveSession(
  db: DbAdapter,
  sessionKey: string | undefined,
  now = new Date()
): Promise<ResolvedSession | null> {
  if (!sessionKey) return null;
  if (!SESSION_KEY_PATTERN.test(sessionKey)) {
    console.warn("Ignoring malformed session cookie");
    return null;
  }
  const session = await db.getSession(sessionKey);
  if (!session) return null;
  if (session.expires_at <= now.toISOString()) {
    await db.deleteSession(sessionKey);
    return null;
  }
  const user = await db.getUser(session.user_id);
  return { session, user: user && user.is_active ? user : null };
}

export async function endSession(db: DbAdapter, sessionKey: string): Promise<void> {
  await db.deleteSession(sessionKey);
}
