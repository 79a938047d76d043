import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getRequestUser } from "@/lib/auth/authenticate";
import { profileScope } from "@/lib/accounts/permissions";
import { buildLocationsFeatureCollection } from "@/lib/geo";
import { internalError, json, notAuthenticatedError } from "@/lib/api/response-helpers";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();

    const profiles = await db.listProfiles({ ...profileScope(user), withLocation: true });
    return json(buildLocationsFeatureCollection(profiles));
  } catch (err) {
    console.error("GET /map/api/locations error:", err);
    return internalError();
  }
}
