import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getRequestUser } from "@/lib/auth/authenticate";
import { updateCurrentProfile } from "@/lib/profiles/current-profile";
import { serializeCurrentUser } from "@/lib/profiles/serializers";
import {
  internalError,
  json,
  notAuthenticatedError,
  readJsonBody,
  validationError,
} from "@/lib/api/response-helpers";
import { currentProfileUpdateSchema } from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();

    const profile = await db.getProfileByUserId(user.id);
    return json(serializeCurrentUser(user, profile));
  } catch (err) {
    console.error("GET /api/profile error:", err);
    return internalError();
  }
}

export async function PUT(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();

    const body = await readJsonBody(request);
    const parsed = currentProfileUpdateSchema.safeParse(body);
    if (!parsed.success) {
      return validationError("Invalid request body", zodErrorDetails(parsed.error));
    }

    const saved = await updateCurrentProfile(db, user.id, parsed.data);
    return json(serializeCurrentUser(saved.user, saved.profile));
  } catch (err) {
    console.error("PUT /api/profile error:", err);
    return internalError();
  }
}
