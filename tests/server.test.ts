/**
 * HTTP API Tests
 *
 * Serves the app on an ephemeral local port with an in-memory provider.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { createApp, statusFor } from "../src/server.js";
import { LeverageAnalyst } from "../src/agents/leverage-analyst.js";
import {
  EmptyInputError,
  InvalidInputError,
  InvalidScenarioError,
  MarketDataError,
} from "../src/utils/errors.js";
import { FakeMarketData, sampleListings } from "./helpers/fake-provider.js";

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const analyst = new LeverageAnalyst(new FakeMarketData(sampleListings), {
    targetPct: 20,
    strikeLowPct: -50,
    strikeHighPct: -10,
    showAdjusted: true,
  });
  const app = createApp(analyst);
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

async function get(path: string) {
  const res = await fetch(`${baseUrl}${path}`);
  const body: unknown = await res.json();
  return { status: res.status, body };
}

describe("GET /api/health", () => {
  it("should report ok", async () => {
    const { status, body } = await get("/api/health");
    expect(status).toBe(200);
    expect(body).toEqual({ success: true, data: { status: "ok" } });
  });
});

describe("GET /api/expirations/:symbol", () => {
  it("should list expirations with a default", async () => {
    const { status, body } = await get("/api/expirations/acme");
    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: { symbol: "ACME", expirations: ["2025-03-21", "2026-01-16"] },
    });
  });

  it("should map provider failures to 502", async () => {
    const { status, body } = await get("/api/expirations/NOPE");
    expect(status).toBe(502);
    expect(body).toEqual({ success: false, error: "Unknown symbol NOPE" });
  });
});

describe("GET /api/leverage/:symbol", () => {
  it("should return a filtered report", async () => {
    const { status, body } = await get(
      "/api/leverage/ACME?expiration=2026-01-16&targetPct=20&lowPct=-30&highPct=0&showAdjusted=false"
    );
    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: {
        symbol: "ACME",
        expiration: "2026-01-16",
        showAdjusted: false,
        totalStrikes: 6,
        summary: ["Current Price: $200.00", "Target Price (after 20% increase): $240.00"],
      },
    });
  });

  it("should reject out-of-range query values with 400", async () => {
    const { status, body } = await get("/api/leverage/ACME?targetPct=250");
    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false });
  });

  it("should reject a malformed expiration with 400", async () => {
    const { status } = await get("/api/leverage/ACME?expiration=Jan-16");
    expect(status).toBe(400);
  });
});

describe("statusFor", () => {
  it("should map error types to status codes", () => {
    expect(statusFor(new InvalidInputError("x"))).toBe(400);
    expect(statusFor(new InvalidScenarioError("x"))).toBe(400);
    expect(statusFor(new EmptyInputError("x"))).toBe(404);
    expect(statusFor(new MarketDataError("ACME", "x"))).toBe(502);
    expect(statusFor(new Error("x"))).toBe(500);
  });
});
