// @vitest-environment node
import { describe, it, expect, beforeEach } from "vitest";
import type { DbAdapter } from "@/lib/db/adapter";
import { authenticateCredentials, login, logout } from "@/lib/auth/login";
import { createSession } from "@/lib/auth/sessions";
import { createTestDb, seedUser, TEST_PASSWORD } from "../lib/create-test-db";

const request = {
  headers: new Headers({ "x-forwarded-for": "203.0.113.10", "user-agent": "test-agent" }),
};

describe("login flow", () => {
  let db: DbAdapter;

  beforeEach(() => {
    db = createTestDb();
  });

  describe("authenticateCredentials", () => {
    it("returns the user for valid credentials", async () => {
      await seedUser(db, { username: "alice" });
      const user = await authenticateCredentials(db, { username: "alice", password: TEST_PASSWORD });
      expect(user?.username).toBe("alice");
    });

    it("rejects a wrong password, an unknown user and an inactive user", async () => {
      const inactive = await seedUser(db, { username: "bob" });
      await db.updateUser(inactive.id, { is_active: false });
      await seedUser(db, { username: "alice" });

      expect(await authenticateCredentials(db, { username: "alice", password: "nope" })).toBeNull();
      expect(await authenticateCredentials(db, { username: "ghost", password: TEST_PASSWORD })).toBeNull();
      expect(await authenticateCredentials(db, { username: "bob", password: TEST_PASSWORD })).toBeNull();
    });
  });

  describe("login", () => {
    it("creates a session, stamps last_login and logs the login", async () => {
      const alice = await seedUser(db, { username: "alice" });
      const result = await login(db, request, { username: "alice", password: TEST_PASSWORD });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.user.last_login).toBe(result.session.created_at);
      expect((await db.getUser(alice.id))?.last_login).toBe(result.session.created_at);
      expect(await db.getSession(result.session.session_key)).not.toBeNull();

      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({
        action: "login",
        user_id: alice.id,
        ip_address: "203.0.113.10",
        user_agent: "test-agent",
        session_key: result.session.session_key,
      });
    });

    it("logs a failed attempt without creating a session", async () => {
      await seedUser(db, { username: "alice" });
      const result = await login(db, request, { username: "alice", password: "wrong" });

      expect(result).toEqual({ ok: false });
      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({ action: "failed_login", username: "alice", user_id: null, session_key: null });
    });
  });

  describe("logout", () => {
    it("logs the logout and ends the session", async () => {
      const alice = await seedUser(db, { username: "alice" });
      const session = await createSession(db, alice.id);
      await logout(db, request, session.session_key);

      expect(await db.getSession(session.session_key)).toBeNull();
      const [log] = await db.listActivityLogs();
      expect(log).toMatchObject({ action: "logout", user_id: alice.id, session_key: session.session_key });
    });

    it("writes nothing when there is no live session", async () => {
      await logout(db, request, undefined);
      expect(await db.listActivityLogs()).toEqual([]);
    });
  });
});
