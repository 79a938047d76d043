// @vitest-environment node
import { describe, it, expect, beforeEach } from "vitest";
import { resetDbForTesting, type DbAdapter } from "@/lib/db";
import type { User } from "@/lib/schemas";
import { GET } from "@/app/map/api/locations/route";
import { apiRequest } from "../lib/http";
import { seedUser, sessionFor } from "../lib/create-test-db";

describe("GET /map/api/locations", () => {
  let db: DbAdapter;
  let root: User;
  let alice: User;

  async function placeUser(user: User, coordinates: [number, number]) {
    const profile = await db.getProfileByUserId(user.id);
    if (!profile) throw new Error(`no profile for ${user.username}`);
    await db.updateProfile(profile.id, {
      home_address: `${user.username}'s house`,
      location: { type: "Point", coordinates },
    });
    return profile.id;
  }

  beforeEach(async () => {
    db = resetDbForTesting();
    root = await seedUser(db, { username: "root", is_superuser: true });
    alice = await seedUser(db, { username: "alice", first_name: "Alice", last_name: "Liddell" });
    await seedUser(db, { username: "bob" });
  });

  it("returns a FeatureCollection of every located profile to a superuser", async () => {
    const aliceProfileId = await placeUser(alice, [-1.2577, 51.752]);
    await placeUser(root, [2.35, 48.85]);

    const res = await GET(apiRequest("/map/api/locations", { sessionKey: await sessionFor(db, root) }));
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.type).toBe("FeatureCollection");
    expect(body.features).toHaveLength(2);
    expect(body.features[0]).toEqual({
      type: "Feature",
      geometry: { type: "Point", coordinates: [-1.2577, 51.752] },
      properties: {
        id: aliceProfileId,
        username: "alice",
        full_name: "Alice Liddell",
        home_address: "alice's house",
      },
    });
  });

  it("returns only the caller's own location otherwise", async () => {
    await placeUser(alice, [-1.2577, 51.752]);
    await placeUser(root, [2.35, 48.85]);

    const res = await GET(apiRequest("/map/api/locations", { sessionKey: await sessionFor(db, alice) }));
    const body = await res.json();
    expect(body.features.map((f: { properties: { username: string } }) => f.properties.username)).toEqual([
      "alice",
    ]);
  });

  it("returns an empty collection when nobody has a location", async () => {
    const res = await GET(apiRequest("/map/api/locations", { sessionKey: await sessionFor(db, root) }));
    expect(await res.json()).toEqual({ type: "FeatureCollection", features: [] });
  });

  it("answers 403 to anonymous callers", async () => {
    expect((await GET(apiRequest("/map/api/locations"))).status).toBe(403);
  });
});
