import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env";
import { signToken, verifyToken } from "../src/utils/token";

describe("loadConfig", () => {
  it("falls back to the defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 5000,
      mongoDbName: "snack_counter",
      jwtSecret: "dev-secret",
      jwtExpiresInSeconds: 604800,
      timeZone: "Asia/Kolkata",
      feedbackMaxLength: 350,
      statusPolicy: "permissive",
      zeroStockUnlimited: true,
      bcryptRounds: 10,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      OWNER_EMAIL: " Owner@Example.com ",
      STATUS_POLICY: "Strict",
      ZERO_STOCK_UNLIMITED: "false",
      TIME_ZONE: "Europe/London",
    });

    expect([
      config.port,
      config.ownerEmail,
      config.statusPolicy,
      config.zeroStockUnlimited,
      config.timeZone,
    ]).toEqual([8080, "owner@example.com", "strict", false, "Europe/London"]);
  });

  it("refuses bad settings", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow(
      "JWT_SECRET must be set in production"
    );
    expect(() => loadConfig({ STATUS_POLICY: "loose" })).toThrow(/STATUS_POLICY/);
    expect(() => loadConfig({ TIME_ZONE: "Mars/Olympus" })).toThrow(/TIME_ZONE/);
  });
});

describe("session tokens", () => {
  const config = { jwtSecret: "test-secret", jwtExpiresInSeconds: 60 };

  it("carries the role and subject", () => {
    const token = signToken({ role: "customer", sub: "abc123" }, config);

    expect(verifyToken(token, config)).toEqual({ role: "customer", sub: "abc123" });
  });

  it("rejects tokens it did not sign", () => {
    const token = signToken({ role: "owner", sub: "owner@example.com" }, config);

    expect(verifyToken(token, { jwtSecret: "other-secret" })).toBeNull();
    expect(verifyToken("not-a-token", config)).toBeNull();
  });
});
