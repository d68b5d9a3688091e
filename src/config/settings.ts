import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const MODEL_STAGE_NAMES = ["route", "draft", "answer"] as const;
export type ModelStage = (typeof MODEL_STAGE_NAMES)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const modelStages = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const raw = (value ?? "route,draft")
      .split(",")
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0);
    const stages: ModelStage[] = [];
    for (const entry of raw) {
      const stage = MODEL_STAGE_NAMES.find((name) => name === entry);
      if (!stage) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown model stage "${entry}"` });
        return z.NEVER;
      }
      stages.push(stage);
    }
    return stages;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DOCS_DIR: z.string().min(1).default("data/docs"),
  DATABASE_URL: z.string().min(1).optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().int().positive().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGDATABASE: z.string().optional(),
  PGSSLMODE: z.string().optional(),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GENERATION_PROVIDER: z.enum(["openai", "ollama", "none"]).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().optional(),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("phi3.5:3.8b-mini-instruct-q4_K_M"),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  MODEL_STAGES: modelStages,
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
  RETRIEVAL_MIN_SCORE: z.coerce.number().min(0).max(1).default(0),
  MAX_REPAIR_ATTEMPTS: z.coerce.number().int().min(0).max(5).default(2),
  REPAIR_BYPASS_TEMPLATES: booleanFlag,
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(4)
});

export interface DatabaseSettings {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  ssl: boolean;
  statementTimeoutMs: number;
}

export type GenerationSettings =
  | { provider: "none"; timeoutMs: number }
  | { provider: "openai"; apiKey: string; model: string; baseUrl?: string; timeoutMs: number }
  | { provider: "ollama"; baseUrl: string; model: string; timeoutMs: number };

export interface Settings {
  port: number;
  docsDir: string;
  database: DatabaseSettings;
  generation: GenerationSettings;
  modelStages: ModelStage[];
  retrieval: { topK: number; minScore: number };
  maxRepairAttempts: number;
  repairBypassTemplates: boolean;
  batchConcurrency: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    docsDir: values.DOCS_DIR,
    database: {
      connectionString: values.DATABASE_URL,
      host: values.PGHOST,
      port: values.PGPORT,
      user: values.PGUSER,
      password: values.PGPASSWORD,
      database: values.PGDATABASE,
      ssl: values.PGSSLMODE === "require",
      statementTimeoutMs: values.QUERY_TIMEOUT_MS
    },
    generation: resolveGeneration(values),
    modelStages: values.MODEL_STAGES,
    retrieval: { topK: values.RETRIEVAL_TOP_K, minScore: values.RETRIEVAL_MIN_SCORE },
    maxRepairAttempts: values.MAX_REPAIR_ATTEMPTS,
    repairBypassTemplates: values.REPAIR_BYPASS_TEMPLATES,
    batchConcurrency: values.BATCH_CONCURRENCY
  } satisfies Settings;
}

function resolveGeneration(values: z.infer<typeof EnvSchema>): GenerationSettings {
  const provider = values.GENERATION_PROVIDER ?? (values.OPENAI_API_KEY ? "openai" : "none");
  const timeoutMs = values.GENERATION_TIMEOUT_MS;

  if (provider === "openai") {
    if (!values.OPENAI_API_KEY) {
      throw new Error("Invalid configuration: GENERATION_PROVIDER=openai requires OPENAI_API_KEY");
    }
    return {
      provider,
      apiKey: values.OPENAI_API_KEY,
      model: values.OPENAI_MODEL,
      baseUrl: values.OPENAI_BASE_URL,
      timeoutMs
    };
  }
  if (provider === "ollama") {
    return { provider, baseUrl: values.OLLAMA_BASE_URL, model: values.OLLAMA_MODEL, timeoutMs };
  }
  return { provider: "none", timeoutMs };
}
