import type { ProviderResult } from "../types";
import { extractOpenAIContent } from "./openai";

const INFERENCE_BASE_URL = "https://api-inference.huggingface.co";

function parseGeneratedText(data: unknown): string | null {
  const first: unknown = Array.isArray(data) ? data[0] : data;
  if (first && typeof first === "object" && "generated_text" in first) {
    const gt = (first as { generated_text?: unknown }).generated_text;
    if (typeof gt === "string") return gt;
  }
  return null;
}

async function postJson(url: string, apiKey: string, body: unknown, signal?: AbortSignal) {
  const upstream = await fetch(url, {
    method: "POST",
    headers: {
      authorization: `Bearer ${apiKey}`,
      "content-type": "application/json",
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!upstream.ok) {
    const text = await upstream.text().catch(() => "");
    return { ok: false as const, status: upstream.status, text };
  }

  const data: unknown = await upstream.json().catch(() => null);
  return { ok: true as const, status: upstream.status, data };
}

export async function callHuggingFaceTextGeneration(params: {
  apiKey: string;
  model: string;
  prompt: string;
  signal?: AbortSignal;
}): Promise<ProviderResult> {
  async function tryClassic(): Promise<ProviderResult> {
    const out = await postJson(
      `${INFERENCE_BASE_URL}/models/${encodeURIComponent(params.model)}`,
      params.apiKey,
      {
        inputs: params.prompt,
        parameters: {
          max_new_tokens: 500,
          temperature: 0.3,
          return_full_text: false,
        },
        options: {
          wait_for_model: true,
        },
      },
      params.signal
    );
    if (!out.ok) return out;

    const generated = parseGeneratedText(out.data);
    if (generated === null) {
      return { ok: false, status: out.status, text: "Malformed response body" };
    }
    return { ok: true, text: generated.trim() };
  }

  async function tryChatCompletions(): Promise<ProviderResult> {
    const out = await postJson(
      `${INFERENCE_BASE_URL}/v1/chat/completions`,
      params.apiKey,
      {
        model: params.model,
        messages: [{ role: "user", content: params.prompt }],
        temperature: 0.3,
        max_tokens: 500,
      },
      params.signal
    );
    if (!out.ok) return out;
    return { ok: true, text: extractOpenAIContent(out.data).trim() };
  }

  const classic = await tryClassic();
  if (classic.ok) return classic;

  // Gated or disabled models are often served only through the chat-completions endpoint.
  if (classic.status === 404 || classic.status === 403 || classic.status === 410) {
    const chat = await tryChatCompletions();
    if (chat.ok) return chat;
    return {
      ok: false,
      status: chat.status,
      text: `Classic inference failed (${classic.status}): ${classic.text}\n\nChat-completions failed (${chat.status}): ${chat.text}`,
    };
  }

  return classic;
}
