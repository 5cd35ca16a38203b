import { z } from "zod";
import { POST_TONES } from "@postroom/shared";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const configSchema = z.object({
  PORT: intFromEnv(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DATABASE_URL: z.string().url().optional(),
  GOOGLE_AI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  IMAGEN_MODEL: z.string().min(1).default("imagen-3.0-generate-002"),
  IMAGE_DIR: z.string().min(1).default("./generated-images"),
  POST_TONE: z.enum(POST_TONES).default("friendly"),
  POST_MAX_LENGTH: intFromEnv(300),
  GENERATION_TIMEOUT_MS: intFromEnv(30_000),
  GENERATION_MAX_ATTEMPTS: intFromEnv(3),
  SCHEDULER_INTERVAL_MS: intFromEnv(60_000),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Empty strings count as unset so `FOO=` in a .env file falls back to the default. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}
