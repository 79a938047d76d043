// @vitest-environment node
import { describe, it, expect, beforeEach } from "vitest";
import { resetDbForTesting, type DbAdapter } from "@/lib/db";
import { GET } from "@/app/api/activity/route";
import { login } from "@/lib/auth/login";
import { apiRequest } from "../lib/http";
import { TEST_PASSWORD, seedUser, sessionFor } from "../lib/create-test-db";

describe("GET /api/activity", () => {
  let db: DbAdapter;
  let rootKey: string;

  beforeEach(async () => {
    db = resetDbForTesting();
    const root = await seedUser(db, { username: "root", is_superuser: true });
    await seedUser(db, { username: "alice" });
    rootKey = await sessionFor(db, root);

    const request = apiRequest("/api/auth/login", { method: "POST" });
    await login(db, request, { username: "alice", password: TEST_PASSWORD });
    await login(db, request, { username: "alice", password: "wrong-password" });
    await login(db, request, { username: "nobody", password: TEST_PASSWORD });
  });

  it("answers 403 to anonymous callers", async () => {
    const res = await GET(apiRequest("/api/activity"));
    expect(res.status).toBe(403);
    expect((await res.json()).error).toBe("not_authenticated");
  });

  it("answers 403 permission_denied to non-superusers", async () => {
    const alice = await db.getUserByUsername("alice");
    if (!alice) throw new Error("alice missing");
    const res = await GET(apiRequest("/api/activity", { sessionKey: await sessionFor(db, alice) }));
    expect(res.status).toBe(403);
    expect((await res.json()).error).toBe("permission_denied");
  });

  it("lists entries newest first", async () => {
    const res = await GET(apiRequest("/api/activity", { sessionKey: rootKey }));
    expect(res.status).toBe(200);
    const body: Array<{ username: string; action: string }> = await res.json();
    expect(body.map((e) => [e.username, e.action])).toEqual([
      ["nobody", "failed_login"],
      ["alice", "failed_login"],
      ["alice", "login"],
    ]);
  });

  it("filters by action and username", async () => {
    const res = await GET(
      apiRequest("/api/activity?action=failed_login&username=alice", { sessionKey: rootKey })
    );
    const body: Array<{ username: string; action: string }> = await res.json();
    expect(body).toHaveLength(1);
    expect(body[0]).toMatchObject({ username: "alice", action: "failed_login" });
  });

  it("honours the limit", async () => {
    const res = await GET(apiRequest("/api/activity?limit=1", { sessionKey: rootKey }));
    expect(await res.json()).toHaveLength(1);
  });

  it("rejects a limit above the maximum", async () => {
    const res = await GET(apiRequest("/api/activity?limit=501", { sessionKey: rootKey }));
    expect(res.status).toBe(400);
  });

  it("rejects an unknown action", async () => {
    const res = await GET(apiRequest("/api/activity?action=reboot", { sessionKey: rootKey }));
    expect(res.status).toBe(400);
  });
});
