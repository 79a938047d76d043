import { NextRequest, NextResponse } from "next/server";
import { getDb } from "@/lib/db";
import { logout } from "@/lib/auth/login";
import { clearSessionCookie, getSessionKey } from "@/lib/auth/authenticate";
import { internalError } from "@/lib/api/response-helpers";

export async function POST(request: NextRequest) {
  try {
    await logout(getDb(), request, getSessionKey(request));
    const response = new NextResponse(null, { status: 204 });
    clearSessionCookie(response);
    return response;
  } catch (err) {
    console.error("POST /api/auth/logout error:", err);
    return internalError();
  }
}
