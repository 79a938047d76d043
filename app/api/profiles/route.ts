import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getRequestUser } from "@/lib/auth/authenticate";
import { isAccountError } from "@/lib/accounts/errors";
import { createProfileFor, listProfilesFor } from "@/lib/profiles/service";
import { serializeProfile } from "@/lib/profiles/serializers";
import {
  conflictError,
  internalError,
  json,
  notAuthenticatedError,
  notFoundError,
  readJsonBody,
  validationError,
} from "@/lib/api/response-helpers";
import { createProfileSchema, profileListQuerySchema } from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();

    const parsed = profileListQuerySchema.safeParse({
      search: request.nextUrl.searchParams.get("search") ?? undefined,
    });
    if (!parsed.success) {
      return validationError("Invalid query parameters", zodErrorDetails(parsed.error));
    }

    const profiles = await listProfilesFor(db, user, parsed.data);
    return json(profiles.map(serializeProfile));
  } catch (err) {
    console.error("GET /api/profiles error:", err);
    return internalError();
  }
}

export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();

    const body = await readJsonBody(request);
    const parsed = createProfileSchema.safeParse(body);
    if (!parsed.success) {
      return validationError("Invalid request body", zodErrorDetails(parsed.error));
    }

    const created = await createProfileFor(db, user, parsed.data);
    return json(serializeProfile(created), 201);
  } catch (err) {
    if (isAccountError(err, "user_not_found")) return notFoundError("User not found");
    if (isAccountError(err, "profile_exists")) {
      return conflictError(err.message, { user_id: ["This user already has a profile."] });
    }
    console.error("POST /api/profiles error:", err);
    return internalError();
  }
}
