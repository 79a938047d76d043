/**
 * Client metadata recorded with authentication events.
 */

import { trustProxy } from "@/lib/config/settings";

/** The part of an incoming request the audit trail needs. */
export interface RequestMeta {
  headers: Headers;
}

/**
 * First X-Forwarded-For hop when proxies are trusted, then X-Real-IP.
 * Returns null when neither header carries an address.
 */
export function getClientIp(request: RequestMeta): string | null {
  if (trustProxy()) {
    const forwarded = request.headers.get("x-forwarded-for");
    const first = forwarded?.split(",")[0]?.trim();
    if (first) return first;
  }
  const realIp = request.headers.get("x-real-ip")?.trim();
  return realIp || null;
}

export function getUserAgent(request: RequestMeta): string {
  return request.headers.get("user-agent") ?? "";
}
