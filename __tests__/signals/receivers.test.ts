// @vitest-environment node
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { DbAdapter } from "@/lib/db/adapter";
import {
  createOrUpdateUserProfile,
  logFailedLogin,
  logUserLogin,
  logUserLogout,
} from "@/lib/signals/receivers";
import { userLoginFailed, userSaved } from "@/lib/signals";
import { createTestDb } from "../lib/create-test-db";

function requestWith(headers: Record<string, string>) {
  return { headers: new Headers(headers) };
}

describe("signal receivers", () => {
  let db: DbAdapter;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("createOrUpdateUserProfile", () => {
    it("creates an empty profile for a new user", async () => {
      const user = await db.insertUser({ username: "alice" });
      await createOrUpdateUserProfile({ db, user, created: true });

      const profile = await db.getProfileByUserId(user.id);
      expect(profile).toMatchObject({
        user_id: user.id,
        home_address: null,
        phone_number: null,
        location: null,
      });
    });

    it("touches the existing profile on a later save", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-05-01T00:00:00.000Z"));
      const user = await db.insertUser({ username: "alice" });
      const profile = await db.insertProfile({ user_id: user.id, phone_number: "555-0100" });

      vi.setSystemTime(new Date("2026-05-02T00:00:00.000Z"));
      await createOrUpdateUserProfile({ db, user, created: false });

      const saved = await db.getProfile(profile.id);
      expect(saved?.updated_at).toBe("2026-05-02T00:00:00.000Z");
      expect(saved?.phone_number).toBe("555-0100");
      expect(await db.listProfiles()).toHaveLength(1);
    });

    it("creates a missing profile on a later save", async () => {
      const user = await db.insertUser({ username: "legacy" });
      await createOrUpdateUserProfile({ db, user, created: false });

      expect(await db.getProfileByUserId(user.id)).not.toBeNull();
    });

    it("is connected to userSaved", async () => {
      const user = await db.insertUser({ username: "alice" });
      await userSaved.send({ db, user, created: true });

      expect(await db.getProfileByUserId(user.id)).not.toBeNull();
    });
  });

  describe("audit trail", () => {
    it("logs a login with client IP, agent and session key", async () => {
      const user = await db.insertUser({ username: "alice" });
      await logUserLogin({
        db,
        request: requestWith({ "x-forwarded-for": "203.0.113.7, 10.0.0.1", "user-agent": "test-agent" }),
        user,
        sessionKey: "session-1",
      });

      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({
        user_id: user.id,
        username: "alice",
        action: "login",
        ip_address: "203.0.113.7",
        user_agent: "test-agent",
        session_key: "session-1",
      });
    });

    it("logs a logout for a known user", async () => {
      const user = await db.insertUser({ username: "alice" });
      await logUserLogout({ db, request: requestWith({}), user, sessionKey: "session-1" });

      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({
        action: "logout",
        username: "alice",
        ip_address: null,
        user_agent: "",
        session_key: "session-1",
      });
    });

    it("writes nothing for a logout without a user", async () => {
      await logUserLogout({ db, request: requestWith({}), user: null, sessionKey: null });
      expect(await db.listActivityLogs()).toEqual([]);
    });

    it("logs a failed login with the attempted username", async () => {
      await logFailedLogin({
        db,
        credentials: { username: "mallory" },
        request: requestWith({ "x-real-ip": "198.51.100.2", "user-agent": "curl/8" }),
      });

      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({
        user_id: null,
        username: "mallory",
        action: "failed_login",
        ip_address: "198.51.100.2",
        user_agent: "curl/8",
        session_key: null,
      });
    });

    it("records 'unknown' and no client details without a username or request", async () => {
      await userLoginFailed.send({ db, credentials: {}, request: null });

      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({
        username: "unknown",
        ip_address: null,
        user_agent: "",
      });
    });
  });
});
