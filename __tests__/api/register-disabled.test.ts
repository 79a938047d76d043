// @vitest-environment node
import { describe, it, expect, vi } from "vitest";
import { resetDbForTesting } from "@/lib/db";
import { POST } from "@/app/api/auth/register/route";
import { apiRequest } from "../lib/http";

vi.mock("@/lib/feature-flags", () => ({
  SELF_REGISTRATION: false,
}));

describe("POST /api/auth/register with self-registration off", () => {
  it("answers 404 and creates nothing", async () => {
    const db = resetDbForTesting();
    const res = await POST(
      apiRequest("/api/auth/register", { method: "POST", body: { username: "newbie", password: "test-secret" } })
    );

    expect(res.status).toBe(404);
    expect(await db.countUsers()).toBe(0);
  });
});
