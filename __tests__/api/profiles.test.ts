// @vitest-environment node
/**
 * Route handler tests for /api/profiles and /api/profiles/[profileId].
 */

import { describe, it, expect, beforeEach } from "vitest";
import { resetDbForTesting, type DbAdapter } from "@/lib/db";
import type { User } from "@/lib/schemas";
import { GET as listGET, POST as createPOST } from "@/app/api/profiles/route";
import {
  DELETE as profileDELETE,
  GET as profileGET,
  PATCH as profilePATCH,
  PUT as profilePUT,
} from "@/app/api/profiles/[profileId]/route";
import { apiRequest, routeParams } from "../lib/http";
import { seedUser, sessionFor } from "../lib/create-test-db";

describe("profiles API", () => {
  let db: DbAdapter;
  let root: User;
  let alice: User;
  let rootKey: string;
  let aliceKey: string;

  beforeEach(async () => {
    db = resetDbForTesting();
    root = await seedUser(db, { username: "root", is_superuser: true });
    alice = await seedUser(db, { username: "alice", email: "alice@example.com" });
    rootKey = await sessionFor(db, root);
    aliceKey = await sessionFor(db, alice);
  });

  async function profileIdOf(user: User): Promise<string> {
    const profile = await db.getProfileByUserId(user.id);
    if (!profile) throw new Error(`no profile for ${user.username}`);
    return profile.id;
  }

  it("answers 403 to anonymous callers", async () => {
    const res = await listGET(apiRequest("/api/profiles"));
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: "not_authenticated",
      message: "Authentication credentials were not provided",
    });
  });

  describe("GET /api/profiles", () => {
    it("lists every profile for a superuser", async () => {
      const res = await listGET(apiRequest("/api/profiles", { sessionKey: rootKey }));
      expect(res.status).toBe(200);
      const body: Array<{ username: string }> = await res.json();
      expect(body.map((p) => p.username)).toEqual(["alice", "root"]);
    });

    it("lists only the caller's profile otherwise", async () => {
      const res = await listGET(apiRequest("/api/profiles", { sessionKey: aliceKey }));
      const body = await res.json();
      expect(body).toHaveLength(1);
      expect(body[0]).toEqual({
        id: await profileIdOf(alice),
        username: "alice",
        email: "alice@example.com",
        home_address: null,
        phone_number: null,
        location: null,
        created_at: expect.any(String),
        updated_at: expect.any(String),
      });
    });

    it("filters with search", async () => {
      const res = await listGET(apiRequest("/api/profiles?search=EXAMPLE", { sessionKey: rootKey }));
      const body: Array<{ username: string }> = await res.json();
      expect(body.map((p) => p.username)).toEqual(["alice"]);
    });
  });

  describe("POST /api/profiles", () => {
    it("creates a profile for a user without one", async () => {
      await db.deleteProfile(await profileIdOf(alice));
      const res = await createPOST(
        apiRequest("/api/profiles", {
          method: "POST",
          sessionKey: rootKey,
          body: {
            user_id: alice.id,
            phone_number: "555-0100",
            location: { type: "Point", coordinates: [-74.006, 40.7128] },
          },
        })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        username: "alice",
        phone_number: "555-0100",
        location: { type: "Point", coordinates: [-74.006, 40.7128] },
      });
    });

    it("answers 409 when the user already has a profile", async () => {
      const res = await createPOST(
        apiRequest("/api/profiles", { method: "POST", sessionKey: aliceKey, body: {} })
      );
      expect(res.status).toBe(409);
      expect((await res.json()).error).toBe("conflict");
    });

    it("answers 404 for an unknown or out-of-scope user", async () => {
      const unknown = await createPOST(
        apiRequest("/api/profiles", { method: "POST", sessionKey: rootKey, body: { user_id: "missing" } })
      );
      expect(unknown.status).toBe(404);

      const other = await createPOST(
        apiRequest("/api/profiles", { method: "POST", sessionKey: aliceKey, body: { user_id: root.id } })
      );
      expect(other.status).toBe(404);
    });

    it("answers 400 for invalid coordinates", async () => {
      const res = await createPOST(
        apiRequest("/api/profiles", {
          method: "POST",
          sessionKey: rootKey,
          body: { user_id: alice.id, location: { type: "Point", coordinates: [200, 0] } },
        })
      );
      expect(res.status).toBe(400);
      expect(Object.keys((await res.json()).details)).toEqual(["location.coordinates.0"]);
    });
  });

  describe("/api/profiles/[profileId]", () => {
    it("retrieves the caller's own profile", async () => {
      const id = await profileIdOf(alice);
      const res = await profileGET(apiRequest(`/api/profiles/${id}`, { sessionKey: aliceKey }), routeParams({ profileId: id }));
      expect(res.status).toBe(200);
      expect((await res.json()).id).toBe(id);
    });

    it("answers 404 for someone else's profile", async () => {
      const id = await profileIdOf(root);
      const res = await profileGET(apiRequest(`/api/profiles/${id}`, { sessionKey: aliceKey }), routeParams({ profileId: id }));
      expect(res.status).toBe(404);
    });

    it("PUT replaces writable fields and nulls omitted ones", async () => {
      const id = await profileIdOf(alice);
      await db.updateProfile(id, { home_address: "Old Street", phone_number: "555-0100" });

      const res = await profilePUT(
        apiRequest(`/api/profiles/${id}`, { method: "PUT", sessionKey: aliceKey, body: { home_address: "New Street" } }),
        routeParams({ profileId: id })
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ home_address: "New Street", phone_number: null, location: null });
    });

    it("PATCH changes only the given fields", async () => {
      const id = await profileIdOf(alice);
      await db.updateProfile(id, { home_address: "Old Street" });

      const res = await profilePATCH(
        apiRequest(`/api/profiles/${id}`, {
          method: "PATCH",
          sessionKey: aliceKey,
          body: { location: { type: "Point", coordinates: [2.35, 48.85] } },
        }),
        routeParams({ profileId: id })
      );

      expect(await res.json()).toMatchObject({
        home_address: "Old Street",
        location: { type: "Point", coordinates: [2.35, 48.85] },
      });
    });

    it("ignores read-only fields on update", async () => {
      const id = await profileIdOf(alice);
      const res = await profilePATCH(
        apiRequest(`/api/profiles/${id}`, {
          method: "PATCH",
          sessionKey: aliceKey,
          body: { username: "mallory", id: "forged" },
        }),
        routeParams({ profileId: id })
      );

      expect(await res.json()).toMatchObject({ id, username: "alice" });
    });

    it("PATCH answers 400 for an over-long phone number", async () => {
      const id = await profileIdOf(alice);
      const res = await profilePATCH(
        apiRequest(`/api/profiles/${id}`, { method: "PATCH", sessionKey: aliceKey, body: { phone_number: "9".repeat(21) } }),
        routeParams({ profileId: id })
      );
      expect(res.status).toBe(400);
    });

    it("DELETE removes the profile with 204", async () => {
      const id = await profileIdOf(alice);
      const res = await profileDELETE(
        apiRequest(`/api/profiles/${id}`, { method: "DELETE", sessionKey: aliceKey }),
        routeParams({ profileId: id })
      );

      expect(res.status).toBe(204);
      expect(await db.getProfile(id)).toBeNull();
    });

    it("DELETE answers 404 outside the caller's scope", async () => {
      const id = await profileIdOf(root);
      const res = await profileDELETE(
        apiRequest(`/api/profiles/${id}`, { method: "DELETE", sessionKey: aliceKey }),
        routeParams({ profileId: id })
      );

      expect(res.status).toBe(404);
      expect(await db.getProfile(id)).not.toBeNull();
    });
  });
});
