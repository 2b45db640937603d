import { GoogleGenAI } from "@google/genai";
import type { ProviderResult } from "../types";

export type GeminiConfig =
  | { apiKey: string }
  | { project: string; location: string };

export function createGeminiClient(config: GeminiConfig) {
  if ("apiKey" in config) {
    return new GoogleGenAI({ apiKey: config.apiKey });
  }
  return new GoogleGenAI({ vertexai: true, project: config.project, location: config.location });
}

function statusOf(err: unknown): number {
  if (err && typeof err === "object" && "status" in err) {
    const status = (err as { status?: unknown }).status;
    if (typeof status === "number") return status;
  }
  return 0;
}

export async function callGemini(params: {
  client: GoogleGenAI;
  model: string;
  prompt: string;
  signal?: AbortSignal;
}): Promise<ProviderResult> {
  try {
    const response = await params.client.models.generateContent({
      model: params.model,
      contents: params.prompt,
      config: { abortSignal: params.signal },
    });
    return { ok: true, text: (response.text ?? "").trim() };
  } catch (err) {
    return { ok: false, status: statusOf(err), text: err instanceof Error ? err.message : String(err) };
  }
}
