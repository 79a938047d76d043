/**
 * Typed runtime settings. Read on every call so tests and the config file
 * loader can change process.env after import.
 */

const DEFAULT_SESSION_TTL_HOURS = 24 * 14;

export const SESSION_COOKIE_NAME = "sessionid";

function envFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "1" || raw === "true" || raw === "yes";
}

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function getSessionTtlMs(): number {
  return envNumber("SESSION_TTL_HOURS", DEFAULT_SESSION_TTL_HOURS) * 60 * 60 * 1000;
}

export function isSecureCookie(): boolean {
  return envFlag("SESSION_COOKIE_SECURE", process.env.NODE_ENV === "production");
}

/** Whether X-Forwarded-For is taken as the client address. */
export function trustProxy(): boolean {
  return envFlag("TRUST_PROXY", true);
}

export interface MapSettings {
  tileUrl: string;
  attribution: string;
  defaultCenter: [number, number];
  defaultZoom: number;
}

/** Client-visible map settings; NEXT_PUBLIC_ vars are inlined at build time. */
export function getMapSettings(): MapSettings {
  return {
    tileUrl:
      process.env.NEXT_PUBLIC_MAP_TILE_URL ??
      "https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png",
    attribution:
      process.env.NEXT_PUBLIC_MAP_ATTRIBUTION ??
      '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors',
    defaultCenter: [20, 0],
    defaultZoom: 2,
  };
}
