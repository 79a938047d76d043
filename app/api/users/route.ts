import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getRequestUser } from "@/lib/auth/authenticate";
import { listUsersFor } from "@/lib/profiles/service";
import { serializeUser } from "@/lib/profiles/serializers";
import { internalError, json, notAuthenticatedError } from "@/lib/api/response-helpers";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();

    const rows = await listUsersFor(db, user);
    return json(rows.map((row) => serializeUser(row.user, row.profile)));
  } catch (err) {
    console.error("GET /api/users error:", err);
    return internalError();
  }
}
