import { z } from 'zod';

const numericEnv = (value: unknown, defaultValue: number): number => {
  if (value === undefined || value === null || value === "") {
    return defaultValue;
  }

  if (typeof value === "number") {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
      throw new Error(`Expected numeric string but received ${value}`);
    }

    return parsed;
  }

  throw new Error(`Unsupported numeric env value: ${String(value)}`);
};

const configSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    HOST: z.string().default("0.0.0.0"),
    PORT: z
      .preprocess((value) => numericEnv(value, 3001), z.number().int().min(0).max(65535)),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    JWT_SECRET: z
      .string()
      .min(1, "JWT_SECRET is required")
      .default("development-insecure-secret"),
    JWT_ISSUER: z.string().default("chatwire"),
    JWT_AUDIENCE: z.string().default("chatwire.client"),
    CLIENT_ORIGIN: z.string().default("http://localhost:5173"),
    PGHOST: z.string().default("127.0.0.1"),
    PGPORT: z.preprocess((value) => numericEnv(value, 5432), z.number().int().min(1).max(65535)),
    PGDATABASE: z.string().default("chatwire"),
    PGUSER: z.string().default("chatwire"),
    PGPASSWORD: z.string().default("chatwire"),
    PG_POOL_MIN: z.preprocess((value) => numericEnv(value, 0), z.number().int().min(0)),
    PG_POOL_MAX: z.preprocess((value) => numericEnv(value, 10), z.number().int().min(1)),
    TYPING_TTL_MS: z.preprocess(
      (value) => numericEnv(value, 10_000),
      z.number().int().min(1_000),
    ),
    TYPING_SWEEP_INTERVAL_MS: z.preprocess(
      (value) => numericEnv(value, 3_000),
      z.number().int().min(100),
    ),
    DELIVERY_TIMEOUT_MS: z.preprocess(
      (value) => numericEnv(value, 5_000),
      z.number().int().min(100).max(60_000),
    ),
    WS_MAX_MESSAGE_BYTES: z.preprocess(
      (value) => numericEnv(value, 64 * 1024),
      z.number().int().min(1024),
    ),
  })
  .refine((config) => config.TYPING_SWEEP_INTERVAL_MS <= config.TYPING_TTL_MS, {
    message: "TYPING_SWEEP_INTERVAL_MS must not exceed TYPING_TTL_MS",
    path: ["TYPING_SWEEP_INTERVAL_MS"],
  });

export type ServerConfig = z.infer<typeof configSchema>;

const LOCALHOST_HOSTNAMES = new Set(["localhost", "127.0.0.1", "[::1]"]);

const buildLocalhostAllowList = (parsed: URL): string[] => {
  const portSuffix = parsed.port ? `:${parsed.port}` : "";
  const protocolPrefix = `${parsed.protocol}//`;

  const origins = new Set<string>();
  for (const hostname of LOCALHOST_HOSTNAMES) {
    origins.add(`${protocolPrefix}${hostname}${portSuffix}`);
  }

  return Array.from(origins);
};

export const resolveCorsOrigins = (origin: string): string | string[] => {
  let parsed: URL;
  try {
    parsed = new URL(origin);
  } catch (error) {
    return origin;
  }

  if (!LOCALHOST_HOSTNAMES.has(parsed.hostname)) {
    return parsed.origin;
  }

  return buildLocalhostAllowList(parsed);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = configSchema.parse({
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    JWT_SECRET: env.JWT_SECRET,
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,
    CLIENT_ORIGIN: env.CLIENT_ORIGIN,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGPASSWORD: env.PGPASSWORD,
    PG_POOL_MIN: env.PG_POOL_MIN,
    PG_POOL_MAX: env.PG_POOL_MAX,
    TYPING_TTL_MS: env.TYPING_TTL_MS,
    TYPING_SWEEP_INTERVAL_MS: env.TYPING_SWEEP_INTERVAL_MS,
    DELIVERY_TIMEOUT_MS: env.DELIVERY_TIMEOUT_MS,
    WS_MAX_MESSAGE_BYTES: env.WS_MAX_MESSAGE_BYTES,
  });

  return parsed;
};
