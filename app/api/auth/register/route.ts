import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { SELF_REGISTRATION } from "@/lib/feature-flags";
import { createUser } from "@/lib/accounts/users";
import { isAccountError } from "@/lib/accounts/errors";
import {
  conflictError,
  internalError,
  json,
  notFoundError,
  readJsonBody,
  validationError,
} from "@/lib/api/response-helpers";
import { serializeUser } from "@/lib/profiles/serializers";
import { registerSchema } from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export async function POST(request: NextRequest) {
  if (!SELF_REGISTRATION) {
    return notFoundError("Registration is disabled");
  }

  try {
    const body = await readJsonBody(request);
    const parsed = registerSchema.safeParse(body);
    if (!parsed.success) {
      return validationError("Invalid request body", zodErrorDetails(parsed.error));
    }

    const db = getDb();
    const user = await createUser(db, { ...parsed.data, is_staff: false, is_superuser: false });
    const profile = await db.getProfileByUserId(user.id);
    return json(serializeUser(user, profile), 201);
  } catch (err) {
    if (isAccountError(err, "duplicate_username")) {
      return conflictError(err.message, { username: ["A user with that username already exists."] });
    }
    console.error("POST /api/auth/register error:", err);
    return internalError();
  }
}
