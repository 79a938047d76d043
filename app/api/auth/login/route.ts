import { NextRequest, NextResponse } from "next/server";
import { getDb } from "@/lib/db";
import { login } from "@/lib/auth/login";
import { setSessionCookie } from "@/lib/auth/authenticate";
import {
  internalError,
  invalidCredentialsError,
  readJsonBody,
  validationError,
} from "@/lib/api/response-helpers";
import { serializeCurrentUser } from "@/lib/profiles/serializers";
import { loginSchema } from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const parsed = loginSchema.safeParse(body);
    if (!parsed.success) {
      return validationError("Invalid request body", zodErrorDetails(parsed.error));
    }

    const db = getDb();
    const result = await login(db, request, parsed.data);
    if (!result.ok) {
      return invalidCredentialsError();
    }

    const profile = await db.getProfileByUserId(result.user.id);
    const response = NextResponse.json(serializeCurrentUser(result.user, profile));
    setSessionCookie(response, result.session);
    return response;
  } catch (err) {
    console.error("POST /api/auth/login error:", err);
    return internalError();
  }
}
