export type ProviderResult =
  | { ok: true; text: string }
  | { ok: false; status: number; text: string };

export type ProviderCall = (params: { prompt: string; signal: AbortSignal }) => Promise<ProviderResult>;

/** Plain text in, plain text out. Rejects with ServiceCallError on any call-level fault. */
export interface GenerationService {
  generate(prompt: string): Promise<string>;
}
