/**
 * Application signals. Senders live in lib/accounts and lib/auth;
 * receivers are connected in ./receivers.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { RequestMeta } from "@/lib/auth/request-meta";
import type { User } from "@/lib/schemas";
import { Signal } from "./signal";

export { Signal } from "./signal";
export type { Receiver, ConnectOptions } from "./signal";

export interface UserSavedPayload {
  db: DbAdapter;
  user: User;
  created: boolean;
}

export interface UserLoggedInPayload {
  db: DbAdapter;
  request: RequestMeta;
  user: User;
  sessionKey: string;
}

export interface UserLoggedOutPayload {
  db: DbAdapter;
  request: RequestMeta;
  /** Null when the session had already expired. */
  user: User | null;
  sessionKey: string | null;
}

export interface UserLoginFailedPayload {
  db: DbAdapter;
  credentials: { username?: string };
  request: RequestMeta | null;
}

export const userSaved = new Signal<UserSavedPayload>("user_saved");
export const userLoggedIn = new Signal<UserLoggedInPayload>("user_logged_in");
export const userLoggedOut = new Signal<UserLoggedOutPayload>("user_logged_out");
export const userLoginFailed = new Signal<UserLoginFailedPayload>("user_login_failed");
