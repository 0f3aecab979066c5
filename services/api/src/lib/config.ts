import { z } from "zod";

// Empty variables count as unset.
const fromEnv = <T extends z.ZodTypeAny>(schema: T) => z.preprocess((v) => (v === "" ? undefined : v), schema);

const envSchema = z
  .object({
    PORT: fromEnv(z.coerce.number().int().min(1).max(65535).default(8787)),
    MAX_UPLOAD_MB: fromEnv(z.coerce.number().positive().max(200).default(20)),
    ARTIFACTS_DIR: fromEnv(z.string().min(1).default("./artifacts")),
    REDIS_URL: fromEnv(z.string().url().default("redis://localhost:6379")),
    LOG_LEVEL: fromEnv(
      z
        .string()
        .default("info")
        .transform((s) => s.toLowerCase())
        .pipe(z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]))
    ),
    LOG_PRETTY: fromEnv(z.string().optional())
  })
  .transform((e) => ({
    port: e.PORT,
    maxUploadMb: e.MAX_UPLOAD_MB,
    artifactsDir: e.ARTIFACTS_DIR,
    redisUrl: e.REDIS_URL,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === "true"
  }));

export type AppConfig = z.output<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(source);
}
