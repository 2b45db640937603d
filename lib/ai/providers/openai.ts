import type { ProviderResult } from "../types";

type OpenAIChatCompletion = {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
};

export function extractOpenAIContent(data: unknown): string {
  if (!data || typeof data !== "object") return "";
  if (!("choices" in data)) return "";
  const choices = (data as OpenAIChatCompletion).choices;
  if (!Array.isArray(choices) || choices.length === 0) return "";
  const content = choices[0]?.message?.content;
  return typeof content === "string" ? content : "";
}

export async function callOpenAI(params: {
  apiKey: string;
  model: string;
  prompt: string;
  signal?: AbortSignal;
}): Promise<ProviderResult> {
  const upstream = await fetch("https://api.openai.com/v1/chat/completions", {
    method: "POST",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${params.apiKey}`,
    },
    body: JSON.stringify({
      model: params.model,
      temperature: 0.4,
      messages: [{ role: "user", content: params.prompt }],
    }),
    signal: params.signal,
  });

  if (!upstream.ok) {
    const text = await upstream.text().catch(() => "");
    return { ok: false, status: upstream.status, text };
  }

  const data: unknown = await upstream.json().catch(() => null);
  if (data === null) {
    return { ok: false, status: upstream.status, text: "Malformed response body" };
  }
  return { ok: true, text: extractOpenAIContent(data).trim() };
}
