import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import {
  NotaryError,
  isValidAddress,
  type GenerateProofRequest,
  type HealthResponse,
  type NotarySigner,
} from "@attestkit/claim-sdk";
import { z } from "zod";

export const INVALID_ADDRESS_MESSAGE =
  "Invalid employee address format. Expected 0x-prefixed 40-character hex string";

const RATE_WINDOW_MS = 60_000;

const GenerateProofBodySchema = z.object({
  employee_address: z.string(),
}) satisfies z.ZodType<GenerateProofRequest>;

class RateLimitExceeded extends Error {
  readonly code = "RATE_LIMITED";

  constructor() {
    super("Rate limit exceeded");
    this.name = "RateLimitExceeded";
  }
}

/** Naive in-memory fixed-window limit: key -> { count, resetAt } */
export class RateLimiter {
  private readonly hits = new Map<string, { count: number; resetAt: number }>();

  constructor(
    private readonly max: number,
    private readonly windowMs: number = RATE_WINDOW_MS,
    private readonly now: () => number = Date.now
  ) {}

  allow(key: string): boolean {
    const now = this.now();
    const entry = this.hits.get(key);
    if (!entry || now > entry.resetAt) {
      this.hits.set(key, { count: 1, resetAt: now + this.windowMs });
      return this.max >= 1;
    }
    entry.count++;
    return entry.count <= this.max;
  }
}

export type NotaryServerOptions = {
  signer: NotarySigner;
  logger?: FastifyServerOptions["logger"];
  /** `true` reflects the request origin. */
  corsOrigin?: string | boolean;
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
  /** Milliseconds; drives the rate-limit window. */
  now?: () => number;
};

export type NotaryRoutesOptions = {
  signer: NotarySigner;
};

/** POST /api/generate-proof, GET /api/health and GET /healthz. */
export async function notaryRoutes(fastify: FastifyInstance, opts: NotaryRoutesOptions) {
  const { signer } = opts;

  const health = async (): Promise<HealthResponse> => ({
    status: "ok",
    notary_address: signer.address,
  });
  fastify.get("/api/health", health);
  fastify.get("/healthz", health);

  fastify.post<{ Body: unknown }>("/api/generate-proof", async (req, reply) => {
    const body = GenerateProofBodySchema.safeParse(req.body);
    if (!body.success || !isValidAddress(body.data.employee_address)) {
      return reply.status(400).send({ error: INVALID_ADDRESS_MESSAGE });
    }

    try {
      const proof = await signer.generateProof(body.data.employee_address);
      req.log.info({ employee: body.data.employee_address, timestamp: proof.timestamp }, "STLOP proof issued");
      return proof;
    } catch (e) {
      if (e instanceof NotaryError && e.code === "INVALID_ADDRESS") {
        return reply.status(400).send({ error: INVALID_ADDRESS_MESSAGE });
      }
      req.log.error({ err: e }, "STLOP proof generation failed");
      return reply.status(500).send({ error: "Failed to generate proof" });
    }
  });
}

export async function buildNotaryServer(options: NotaryServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? true });

  await fastify.register(cors, {
    origin: options.corsOrigin ?? true,
    methods: ["GET", "POST"],
  });

  const limiter = new RateLimiter(options.rateLimitMax ?? 30, options.rateLimitWindowMs, options.now);
  fastify.addHook("preHandler", (req, _reply, done) => {
    if (!limiter.allow(req.ip)) {
      return done(new RateLimitExceeded());
    }
    done();
  });

  fastify.setErrorHandler((err, req, reply) => {
    if (err instanceof RateLimitExceeded) {
      req.log.warn({ ip: req.ip }, "rate limit exceeded");
      return reply.status(429).send({ error: "Rate limit exceeded" });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    req.log.error(err);
    return reply.status(500).send({ error: "Internal server error" });
  });

  await fastify.register(notaryRoutes, { signer: options.signer });
  return fastify;
}
