import { z } from "zod";

/** Empty env values count as unset. */
const optionalEnvString = z.preprocess((v) => (v === "" ? undefined : v), z.string().trim().min(1).optional());

export const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  host: z.string().default("127.0.0.1"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Tapis tenant and credentials used by the Pods API client. */
  tapis: z
    .object({
      tenantUrl: optionalEnvString,
      user: optionalEnvString,
      token: optionalEnvString,
      requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
    })
    .default({ requestTimeoutMs: 30_000 }),

  /** Fallback secrets, used only when a request does not carry its own. */
  flexserv: z
    .object({
      secret: optionalEnvString,
      hfToken: optionalEnvString,
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    tapis: {
      tenantUrl: env.TAPIS_TENANT_URL,
      user: env.TAPIS_USER,
      token: env.TAPIS_TOKEN,
      requestTimeoutMs: env.TAPIS_REQUEST_TIMEOUT_MS,
    },
    flexserv: {
      secret: env.FLEXSERV_SECRET,
      hfToken: env.HF_TOKEN,
    },
  });
}

export const config = loadConfig();
