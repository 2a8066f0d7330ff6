import { config as loadEnv } from "dotenv";
import { z } from "zod";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(3333),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.string().optional(),
  POLICY_CONFIG_PATH: z.string().default("./config/policy.json"),
  MISSIONS_PATH: z.string().default("./config/missions.json"),
  GATEWAY_PROVIDER: z.enum(["fake", "openai"]).default("fake"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  REPORT_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  KG_PROVIDER: z.enum(["fixture", "http"]).default("fixture"),
  KG_BASE_URL: z.string().url().optional(),
  PROFILE_PROVIDER: z.enum(["fixture", "http"]).default("fixture"),
  PROFILE_BASE_URL: z.string().url().optional(),
  RESULT_STORE: z.enum(["memory", "sqlite"]).default("memory"),
  RESULT_DB_PATH: z.string().default("./data/results.db"),
  RESULT_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }

  const env = parsed.data;
  if (env.GATEWAY_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY must be set when GATEWAY_PROVIDER=openai.");
  }
  if (env.KG_PROVIDER === "http" && !env.KG_BASE_URL) {
    throw new Error("KG_BASE_URL must be set when KG_PROVIDER=http.");
  }
  if (env.PROFILE_PROVIDER === "http" && !env.PROFILE_BASE_URL) {
    throw new Error("PROFILE_BASE_URL must be set when PROFILE_PROVIDER=http.");
  }
  return env;
}
