import { getServerEnv, resolveGenerationProvider, type ServerEnv } from "../server/env";
import { ServiceCallError } from "./errors";
import { callGemini, createGeminiClient, type GeminiConfig } from "./providers/gemini";
import { callHuggingFaceTextGeneration } from "./providers/huggingface";
import { callOpenAI } from "./providers/openai";
import type { GenerationService, ProviderCall } from "./types";

export const DEFAULT_TIMEOUT_MS = 30_000;

async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ServiceCallError(`Request timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wraps a provider call into the plain `generate(prompt)` contract: one
 * attempt, bounded by `timeoutMs`, trimmed text out. Every failure surfaces
 * as a ServiceCallError.
 */
export function createGenerationService(
  call: ProviderCall,
  opts: { label: string; timeoutMs?: number }
): GenerationService {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    async generate(prompt: string) {
      const out = await withTimeout((signal) => call({ prompt: prompt.trim(), signal }), timeoutMs).catch(
        (err: unknown) => {
          if (err instanceof ServiceCallError) throw err;
          const reason = err instanceof Error ? err.message : String(err);
          throw new ServiceCallError(`${opts.label} request failed: ${reason}`, { cause: err });
        }
      );

      if (!out.ok) {
        const detail = out.text.trim() ? `: ${out.text.trim()}` : "";
        throw new ServiceCallError(`${opts.label} error (${out.status})${detail}`, { status: out.status });
      }

      const text = out.text.trim();
      if (!text) {
        throw new ServiceCallError(`${opts.label} returned an empty response`);
      }
      return text;
    },
  };
}

function geminiConfigFromEnv(env: ServerEnv): GeminiConfig {
  if (env.GOOGLE_CLOUD_PROJECT) {
    return { project: env.GOOGLE_CLOUD_PROJECT, location: env.GOOGLE_CLOUD_LOCATION };
  }
  if (env.GEMINI_API_KEY) {
    return { apiKey: env.GEMINI_API_KEY };
  }
  throw new Error(
    "Gemini is not configured. Set GEMINI_API_KEY, or GOOGLE_CLOUD_PROJECT and GOOGLE_CLOUD_LOCATION for Vertex AI, in .env.local."
  );
}

export function createGenerationServiceFromEnv(env: ServerEnv = getServerEnv()): GenerationService {
  const provider = resolveGenerationProvider(env);
  const timeoutMs = env.GENERATION_TIMEOUT_MS;

  if (provider === "openai") {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error("OpenAI is not configured. Set OPENAI_API_KEY (and optionally OPENAI_MODEL) in .env.local.");
    }
    return createGenerationService(
      ({ prompt, signal }) => callOpenAI({ apiKey, model: env.OPENAI_MODEL, prompt, signal }),
      { label: "OpenAI", timeoutMs }
    );
  }

  if (provider === "huggingface") {
    const apiKey = env.HUGGINGFACE_API_KEY;
    if (!apiKey) {
      throw new Error(
        "Hugging Face is not configured. Set HUGGINGFACE_API_KEY (and optionally HUGGINGFACE_MODEL) in .env.local."
      );
    }
    return createGenerationService(
      ({ prompt, signal }) => callHuggingFaceTextGeneration({ apiKey, model: env.HUGGINGFACE_MODEL, prompt, signal }),
      { label: "Hugging Face", timeoutMs }
    );
  }

  const client = createGeminiClient(geminiConfigFromEnv(env));
  return createGenerationService(({ prompt, signal }) => callGemini({ client, model: env.GEMINI_MODEL, prompt, signal }), {
    label: "Gemini",
    timeoutMs,
  });
}
