import { FixedSalarySource, NotarySigner, verifyStlopProof, type HealthResponse, type STLOPProof } from "@attestkit/claim-sdk";
import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import { INVALID_ADDRESS_MESSAGE, RateLimiter, buildNotaryServer, type NotaryServerOptions } from "../src/server.js";

const TEST_KEY = "0x0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef";
const EMPLOYEE = `0x${"ab".repeat(20)}`;
const NOW = 1735128000;

const signer = new NotarySigner(TEST_KEY, { clock: () => NOW });

let app: FastifyInstance | undefined;

async function start(overrides: Partial<NotaryServerOptions> = {}): Promise<FastifyInstance> {
  app = await buildNotaryServer({ signer, logger: false, ...overrides });
  return app;
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("health", () => {
  it.each(["/api/health", "/healthz"])("GET %s reports the notary address", async (url) => {
    const server = await start();
    const res = await server.inject({ method: "GET", url });

    expect(res.statusCode).toBe(200);
    expect(res.json<HealthResponse>()).toEqual({ status: "ok", notary_address: signer.address });
  });
});

describe("POST /api/generate-proof", () => {
  it("returns a proof the on-chain check would accept", async () => {
    const server = await start();
    const res = await server.inject({
      method: "POST",
      url: "/api/generate-proof",
      payload: { employee_address: EMPLOYEE },
    });

    expect(res.statusCode).toBe(200);
    const proof = res.json<STLOPProof>();
    expect(proof.salary).toBe("75000");
    expect(proof.timestamp).toBe(NOW);
    expect(proof.notary_pubkey).toBe(signer.address);
    expect(proof.signature).toHaveLength(132);
    expect(await verifyStlopProof(EMPLOYEE, proof, signer.address)).toBe(true);
  });

  it.each([
    ["a malformed address", { employee_address: "0x123" }],
    ["a missing address", {}],
    ["a non-string address", { employee_address: 42 }],
  ])("rejects %s with 400", async (_label, payload) => {
    const server = await start();
    const res = await server.inject({ method: "POST", url: "/api/generate-proof", payload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: INVALID_ADDRESS_MESSAGE });
  });

  it("reports signing failures as 500 without detail", async () => {
    const broken = new NotarySigner(TEST_KEY, { salarySource: new FixedSalarySource("n/a") });
    const server = await start({ signer: broken });
    const res = await server.inject({
      method: "POST",
      url: "/api/generate-proof",
      payload: { employee_address: EMPLOYEE },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Failed to generate proof" });
  });

  it("passes body parse errors through as 400", async () => {
    const server = await start();
    const res = await server.inject({
      method: "POST",
      url: "/api/generate-proof",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });

    expect(res.statusCode).toBe(400);
  });
});

describe("rate limiting", () => {
  it("answers 429 once the window is used up, then recovers", async () => {
    let now = 0;
    const server = await start({ rateLimitMax: 2, rateLimitWindowMs: 1000, now: () => now });

    expect((await server.inject({ method: "GET", url: "/healthz" })).statusCode).toBe(200);
    expect((await server.inject({ method: "GET", url: "/healthz" })).statusCode).toBe(200);
    const limited = await server.inject({ method: "GET", url: "/healthz" });
    expect(limited.statusCode).toBe(429);
    expect(limited.json()).toEqual({ error: "Rate limit exceeded" });

    now = 1001;
    expect((await server.inject({ method: "GET", url: "/healthz" })).statusCode).toBe(200);
  });

  it("counts each client separately", () => {
    const limiter = new RateLimiter(1, 1000, () => 0);
    expect(limiter.allow("10.0.0.1")).toBe(true);
    expect(limiter.allow("10.0.0.1")).toBe(false);
    expect(limiter.allow("10.0.0.2")).toBe(true);
  });
});

describe("CORS", () => {
  it("reflects the request origin by default", async () => {
    const server = await start();
    const res = await server.inject({ method: "GET", url: "/healthz", headers: { origin: "http://app.test" } });
    expect(res.headers["access-control-allow-origin"]).toBe("http://app.test");
  });

  it("uses a configured origin", async () => {
    const server = await start({ corsOrigin: "https://notary.test" });
    const res = await server.inject({ method: "GET", url: "/healthz", headers: { origin: "http://app.test" } });
    expect(res.headers["access-control-allow-origin"]).toBe("https://notary.test");
  });
});
