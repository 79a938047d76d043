/**
 * Credential checks, login and logout. Each outcome is announced on the
 * matching signal; the audit trail is written by its receivers.
 */

import "@/lib/signals/receivers";
import type { DbAdapter } from "@/lib/db/adapter";
import type { Session, User } from "@/lib/schemas";
import { userLoggedIn, userLoggedOut, userLoginFailed } from "@/lib/signals";
import { verifyPassword } from "./passwords";
import type { RequestMeta } from "./request-meta";
import { createSession, endSession, resolveSession } from "./sessions";

export interface Credentials {
  username: string;
  password: string;
}

export type LoginResult =
  | { ok: true; user: User; session: Session }
  | { ok: false };

/** Returns the active user matching the credentials, or null. */
export async function authenticateCredentials(
  db: DbAdapter,
  { username, password }: Credentials
): Promise<User | null> {
  const user = await db.getUserByUsername(username);
  if (!user || !user.is_active) return null;
  return verifyPassword(password, user.password_hash) ? user : null;
}

export async function login(
  db: DbAdapter,
  request: RequestMeta,
  credentials: Credentials
): Promise<LoginResult> {
  const user = await authenticateCredentials(db, credentials);
  if (!user) {
    await userLoginFailed.send({
      db,
      credentials: { username: credentials.username },
      request,
    });
    return { ok: false };
  }

  const session = await createSession(db, user.id);
  const lastLogin = session.created_at;
  await db.updateUser(user.id, { last_login: lastLogin });
  const loggedIn: User = { ...user, last_login: lastLogin };
  await userLoggedIn.send({ db, request, user: loggedIn, sessionKey: session.session_key });
  return { ok: true, user: loggedIn, session };
}

/**
 * Ends the session behind sessionKey, if any. An expired or unknown session
 * still counts as a logout but carries no user.
 */
export async function logout(
  db: DbAdapter,
  request: RequestMeta,
  sessionKey: string | undefined
): Promise<void> {
  const resolved = await resolveSession(db, sessionKey);
  await userLoggedOut.send({
    db,
    request,
    user: resolved?.user ?? null,
    sessionKey: resolved ? resolved.session.session_key : null,
  });
  if (resolved) await endSession(db, resolved.session.session_key);
}
