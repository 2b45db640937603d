import { z } from "zod";

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => {
    if (typeof v === "string" && v.trim().length === 0) return undefined;
    return v;
  }, schema);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const ServerEnvSchema = z.object({
  GENERATION_PROVIDER: emptyToUndefined(z.enum(["gemini", "openai", "huggingface"]).optional()),

  // Gemini: API key, or Vertex AI when a project is set (credentials come from ADC)
  GEMINI_API_KEY: emptyToUndefined(z.string().min(1).optional()),
  GOOGLE_CLOUD_PROJECT: emptyToUndefined(z.string().min(1).optional()),
  GOOGLE_CLOUD_LOCATION: emptyToUndefined(z.string().min(1).optional().default("us-central1")),
  GEMINI_MODEL: emptyToUndefined(z.string().min(1).optional().default("gemini-1.5-flash")),

  OPENAI_API_KEY: emptyToUndefined(z.string().min(1).optional()),
  OPENAI_MODEL: emptyToUndefined(z.string().min(1).optional().default("gpt-4o-mini")),

  HUGGINGFACE_API_KEY: emptyToUndefined(z.string().min(1).optional()),
  HUGGINGFACE_MODEL: emptyToUndefined(z.string().min(1).optional().default("mistralai/Mistral-7B-Instruct-v0.3")),

  GENERATION_TIMEOUT_MS: emptyToUndefined(z.coerce.number().int().positive().optional().default(30_000)),
  SESSION_IDLE_TTL_MS: emptyToUndefined(z.coerce.number().int().positive().optional().default(2 * 60 * 60 * 1000)),
  CLASSIFY_CONCURRENCY: emptyToUndefined(z.coerce.number().int().min(1).max(16).optional().default(1)),
  GROUP_ERROR_CATEGORIES: emptyToUndefined(booleanFlag.optional().default("false")),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export type GenerationProvider = NonNullable<ServerEnv["GENERATION_PROVIDER"]>;

export function getServerEnv(source: Record<string, string | undefined> = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid server environment variables: ${message}`);
  }
  return parsed.data;
}

export function resolveGenerationProvider(env: ServerEnv = getServerEnv()): GenerationProvider {
  if (env.GENERATION_PROVIDER) return env.GENERATION_PROVIDER;
  if (env.GEMINI_API_KEY || env.GOOGLE_CLOUD_PROJECT) return "gemini";
  if (env.OPENAI_API_KEY) return "openai";
  if (env.HUGGINGFACE_API_KEY) return "huggingface";
  return "gemini";
}
