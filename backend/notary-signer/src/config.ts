import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const NotaryEnvSchema = z.object({
  NOTARY_PRIVATE_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, "must be 32 bytes of hex"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ORIGIN: z.string().min(1).optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type NotaryConfig = {
  privateKey: string;
  port: number;
  host: string;
  /** `true` reflects the request origin. */
  corsOrigin: string | true;
  rateLimitMax: number;
  logLevel: LogLevel;
};

export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";
  readonly variables: readonly string[];

  constructor(variables: readonly string[]) {
    super(`Invalid notary configuration: ${variables.join(", ")}`);
    this.name = "ConfigError";
    this.variables = variables;
  }
}

/** Parse once at startup. Errors name the offending variables, never their values. */
export function loadNotaryConfig(env: NodeJS.ProcessEnv = process.env): NotaryConfig {
  const parsed = NotaryEnvSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((i) => String(i.path[0] ?? "(env)")))];
    throw new ConfigError(variables);
  }
  const e = parsed.data;
  return {
    privateKey: e.NOTARY_PRIVATE_KEY,
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN ?? true,
    rateLimitMax: e.RATE_LIMIT_MAX,
    logLevel: e.LOG_LEVEL,
  };
}
