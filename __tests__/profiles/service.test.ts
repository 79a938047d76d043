// @vitest-environment node
import { describe, it, expect, beforeEach } from "vitest";
import type { DbAdapter } from "@/lib/db/adapter";
import type { User } from "@/lib/schemas";
import { isAccountError } from "@/lib/accounts/errors";
import {
  createProfileFor,
  deleteProfileFor,
  getProfileFor,
  getUserByUsernameFor,
  getUserFor,
  listProfilesFor,
  listUsersFor,
  updateProfileFor,
} from "@/lib/profiles/service";
import { createTestDb, seedUser } from "../lib/create-test-db";

describe("scoped profile service", () => {
  let db: DbAdapter;
  let root: User;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    db = createTestDb();
    root = await seedUser(db, { username: "root", is_superuser: true });
    alice = await seedUser(db, { username: "alice", email: "alice@example.com" });
    bob = await seedUser(db, { username: "bob", is_staff: true });
  });

  async function profileIdOf(user: User): Promise<string> {
    const profile = await db.getProfileByUserId(user.id);
    if (!profile) throw new Error(`no profile for ${user.username}`);
    return profile.id;
  }

  it("lists every profile for a superuser and only the own one otherwise", async () => {
    expect((await listProfilesFor(db, root)).map((p) => p.username)).toEqual(["alice", "bob", "root"]);
    expect((await listProfilesFor(db, bob)).map((p) => p.username)).toEqual(["bob"]);
  });

  it("applies the search within the scope", async () => {
    expect((await listProfilesFor(db, root, { search: "example" })).map((p) => p.username)).toEqual(["alice"]);
    expect(await listProfilesFor(db, bob, { search: "example" })).toEqual([]);
  });

  it("hides other users' profiles as missing", async () => {
    const aliceProfile = await profileIdOf(alice);

    expect((await getProfileFor(db, root, aliceProfile))?.username).toBe("alice");
    expect(await getProfileFor(db, bob, aliceProfile)).toBeNull();
    expect(await updateProfileFor(db, bob, aliceProfile, { phone_number: "1" })).toBeNull();
    expect(await deleteProfileFor(db, bob, aliceProfile)).toBe(false);
    expect(await db.getProfile(aliceProfile)).not.toBeNull();
  });

  it("updates and deletes within scope", async () => {
    const own = await profileIdOf(bob);
    const updated = await updateProfileFor(db, bob, own, {
      home_address: "2 Side St",
      location: { type: "Point", coordinates: [13.4, 52.5] },
    });

    expect(updated?.home_address).toBe("2 Side St");
    expect(updated?.location).toEqual({ type: "Point", coordinates: [13.4, 52.5] });
    expect(await deleteProfileFor(db, bob, own)).toBe(true);
    expect(await db.getProfile(own)).toBeNull();
  });

  describe("createProfileFor", () => {
    it("creates a profile for the requester by default", async () => {
      await deleteProfileFor(db, alice, await profileIdOf(alice));
      const created = await createProfileFor(db, alice, { phone_number: "555-0101" });

      expect(created.user_id).toBe(alice.id);
      expect(created.phone_number).toBe("555-0101");
    });

    it("lets a superuser target another user", async () => {
      await deleteProfileFor(db, root, await profileIdOf(alice));
      const created = await createProfileFor(db, root, { user_id: alice.id });
      expect(created.username).toBe("alice");
    });

    it("refuses a second profile", async () => {
      await expect(createProfileFor(db, alice, {})).rejects.toSatisfy((err: unknown) =>
        isAccountError(err, "profile_exists")
      );
    });

    it("reports unknown and out-of-scope users as missing", async () => {
      await expect(createProfileFor(db, root, { user_id: "missing" })).rejects.toSatisfy((err: unknown) =>
        isAccountError(err, "user_not_found")
      );
      await expect(createProfileFor(db, bob, { user_id: alice.id })).rejects.toSatisfy((err: unknown) =>
        isAccountError(err, "user_not_found")
      );
    });
  });

  describe("users", () => {
    it("lists users with their nested profile, scoped", async () => {
      const rows = await listUsersFor(db, root);
      expect(rows.map((r) => [r.user.username, r.profile?.username])).toEqual([
        ["alice", "alice"],
        ["bob", "bob"],
        ["root", "root"],
      ]);
      expect((await listUsersFor(db, alice)).map((r) => r.user.username)).toEqual(["alice"]);
    });

    it("returns null profile for a user without one", async () => {
      await deleteProfileFor(db, root, await profileIdOf(alice));
      const row = await getUserFor(db, root, alice.id);
      expect(row?.profile).toBeNull();
    });

    it("scopes lookups by id and username", async () => {
      expect(await getUserFor(db, bob, alice.id)).toBeNull();
      expect((await getUserFor(db, bob, bob.id))?.user.username).toBe("bob");
      expect(await getUserByUsernameFor(db, bob, "alice")).toBeNull();
      expect((await getUserByUsernameFor(db, root, "alice"))?.user.id).toBe(alice.id);
      expect(await getUserByUsernameFor(db, root, "ghost")).toBeNull();
    });
  });
});
