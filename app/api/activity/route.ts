import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getRequestUser } from "@/lib/auth/authenticate";
import { canViewActivityLog } from "@/lib/accounts/permissions";
import { listRecentActivity } from "@/lib/activity/queries";
import {
  internalError,
  json,
  notAuthenticatedError,
  permissionDeniedError,
  validationError,
} from "@/lib/api/response-helpers";
import { activityQuerySchema } from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(db, request);
    if (!user) return notAuthenticatedError();
    if (!canViewActivityLog(user)) return permissionDeniedError();

    const search = request.nextUrl.searchParams;
    const parsed = activityQuerySchema.safeParse({
      action: search.get("action") ?? undefined,
      username: search.get("username") ?? undefined,
      limit: search.get("limit") ?? undefined,
    });
    if (!parsed.success) {
      return validationError("Invalid query parameters", zodErrorDetails(parsed.error));
    }

    return json(await listRecentActivity(db, parsed.data));
  } catch (err) {
    console.error("GET /api/activity error:", err);
    return internalError();
  }
}
