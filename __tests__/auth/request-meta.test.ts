// @vitest-environment node
import { describe, it, expect, afterEach } from "vitest";
import { getClientIp, getUserAgent } from "@/lib/auth/request-meta";

function meta(headers: Record<string, string>) {
  return { headers: new Headers(headers) };
}

describe("request metadata", () => {
  const originalTrust = process.env.TRUST_PROXY;

  afterEach(() => {
    if (originalTrust === undefined) delete process.env.TRUST_PROXY;
    else process.env.TRUST_PROXY = originalTrust;
  });

  it("takes the first trimmed X-Forwarded-For hop", () => {
    expect(getClientIp(meta({ "x-forwarded-for": "  203.0.113.9 , 10.0.0.2" }))).toBe("203.0.113.9");
  });

  it("falls back to X-Real-IP", () => {
    expect(getClientIp(meta({ "x-real-ip": "198.51.100.4" }))).toBe("198.51.100.4");
  });

  it("ignores X-Forwarded-For when proxies are not trusted", () => {
    process.env.TRUST_PROXY = "false";
    const request = meta({ "x-forwarded-for": "203.0.113.9", "x-real-ip": "198.51.100.4" });
    expect(getClientIp(request)).toBe("198.51.100.4");
  });

  it("returns null without address headers", () => {
    expect(getClientIp(meta({}))).toBeNull();
  });

  it("reads the user agent or an empty string", () => {
    expect(getUserAgent(meta({ "user-agent": "test-agent/1.0" }))).toBe("test-agent/1.0");
    expect(getUserAgent(meta({}))).toBe("");
  });
});
