import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  DATABASE_URL: z.string().min(1),
  JWT_SECRET: z.string().min(1),
  /** Comma-separated origins for CORS (e.g. https://dashboard.example.com). */
  FRONTEND_ORIGIN: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  SCORING_STRATEGY: z.enum(["heuristic", "delegated"]).default("heuristic"),
  PASS_THRESHOLD: z.coerce.number().min(0).max(100).default(75),
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  BATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  DELEGATED_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(500),
  DELEGATED_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DELEGATED_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(4).default(1),
  COMPLEXITY_VARIANT: z.enum(["readability", "domain_density"]).default("domain_density"),
  URGENCY_VARIANT: z.enum(["keyword", "weighted"]).default("keyword")
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issueText = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${issueText}`);
  }
  return parsed.data;
}
