// api/src/config.ts
import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

export const GENERATION_STRATEGIES = ["catalog", "creative", "tool"] as const;
export type GenerationStrategy = (typeof GENERATION_STRATEGIES)[number];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  DATABASE_URL: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  GENERATION_STRATEGY: z.enum(GENERATION_STRATEGIES).default("creative"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export interface Config {
  port: number;
  databaseUrl?: string;
  openaiApiKey?: string;
  llmModel: string;
  embeddingModel: string;
  generationStrategy: GenerationStrategy;
  llmTimeoutMs: number;
  corsOrigin: string[];
  nodeEnv: "development" | "production" | "test";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // empty strings in .env mean "unset"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const keys = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new Error(`Invalid environment configuration: ${keys.join("; ")}`);
  }

  const v = parsed.data;
  return {
    port: v.PORT,
    databaseUrl: v.DATABASE_URL,
    openaiApiKey: v.OPENAI_API_KEY,
    llmModel: v.LLM_MODEL,
    embeddingModel: v.EMBEDDING_MODEL,
    generationStrategy: v.GENERATION_STRATEGY,
    llmTimeoutMs: v.LLM_TIMEOUT_MS,
    corsOrigin: v.CORS_ORIGIN.split(",").map((s) => s.trim()).filter(Boolean),
    nodeEnv: v.NODE_ENV,
  };
}

export const config = loadConfig();
