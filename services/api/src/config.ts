import { z } from "zod";

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((value) => value.trim().toLowerCase() === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8080),

  LOG_LEVEL: z.enum(["debug", "info", "warning", "error", "fatal"]).default("info"),
  REQUEST_ID_HEADER: z.string().min(1).default("X-Request-ID"),

  // Chaos injection
  CHAOS_ENABLED: flag("false"),
  CHAOS_PROBABILITY: z.coerce.number().min(0).max(1).default(0.05),
  CHAOS_CANCELLATION: z.enum(["ignore", "abort"]).default("ignore"),

  // OpenTelemetry
  OTEL_ENABLED: flag("true"),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
  OTEL_SERVICE_NAME: z.string().default("microtrace"),
  OTEL_SERVICE_VERSION: z.string().default("0.1.0")
});

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return envSchema.parse(env);
}

export function loadConfig(): Config {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}
