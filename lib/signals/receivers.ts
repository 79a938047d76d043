/**
 * Signal receivers: profile auto-creation and the authentication audit trail.
 * Importing this module connects them; dispatch uids keep it idempotent.
 */

import { getClientIp, getUserAgent } from "@/lib/auth/request-meta";
import {
  userLoggedIn,
  userLoggedOut,
  userLoginFailed,
  userSaved,
  type UserLoggedInPayload,
  type UserLoggedOutPayload,
  type UserLoginFailedPayload,
  type UserSavedPayload,
} from "./index";

export async function createOrUpdateUserProfile({ db, user, created }: UserSavedPayload): Promise<void> {
  const existing = created ? null : await db.getProfileByUserId(user.id);
  if (existing) {
    await db.updateProfile(existing.id, {});
    return;
  }
  await db.insertProfile({ user_id: user.id });
}

export async function logUserLogin({ db, request, user, sessionKey }: UserLoggedInPayload): Promise<void> {
  await db.insertActivityLog({
    user_id: user.id,
    username: user.username,
    action: "login",
    ip_address: getClientIp(request),
    user_agent: getUserAgent(request),
    session_key: sessionKey,
  });
}

export async function logUserLogout({ db, request, user, sessionKey }: UserLoggedOutPayload): Promise<void> {
  if (!user) return;
  await db.insertActivityLog({
    user_id: user.id,
    username: user.username,
    action: "logout",
    ip_address: getClientIp(request),
    user_agent: getUserAgent(request),
    session_key: sessionKey,
  });
}

export async function logFailedLogin({ db, credentials, request }: UserLoginFailedPayload): Promise<void> {
  await db.insertActivityLog({
    user_id: null,
    username: credentials.username || "unknown",
    action: "failed_login",
    ip_address: request ? getClientIp(request) : null,
    user_agent: request ? getUserAgent(request) : "",
    session_key: null,
  });
}

userSaved.connect(createOrUpdateUserProfile, { dispatchUid: "profiles.create_or_update" });
userLoggedIn.connect(logUserLogin, { dispatchUid: "activity.login" });
userLoggedOut.connect(logUserLogout, { dispatchUid: "activity.logout" });
userLoginFailed.connect(logFailedLogin, { dispatchUid: "activity.failed_login" });
