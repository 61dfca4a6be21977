import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  BODY_LIMIT: z.string().default("10mb"),
  HIERARCHY_FILE: z.string().min(1).optional(),
  SEED_DEFAULT_HIERARCHY: flag.default("true"),
  GOOGLE_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-004"),
  EMBEDDING_DIM: z.coerce.number().int().min(1).default(256),
  MAX_TOP_K: z.coerce.number().int().min(1).default(100),
});

export type AppConfig = {
  port: number;
  bodyLimit: string;
  hierarchyFile?: string;
  seedDefaultHierarchy: boolean;
  googleApiKey?: string;
  embeddingModel: string;
  embeddingDim: number;
  maxTopK: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    bodyLimit: e.BODY_LIMIT,
    hierarchyFile: e.HIERARCHY_FILE,
    seedDefaultHierarchy: e.SEED_DEFAULT_HIERARCHY,
    googleApiKey: e.GOOGLE_API_KEY || undefined,
    embeddingModel: e.EMBEDDING_MODEL,
    embeddingDim: e.EMBEDDING_DIM,
    maxTopK: e.MAX_TOP_K,
  };
}
