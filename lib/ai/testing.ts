import type { GenerationService } from "./types";

/** In-process stand-in for a generation provider; records every prompt it receives. */
export function createFakeGenerationService(respond: (prompt: string) => string | Promise<string>) {
  const prompts: string[] = [];
  const service: GenerationService = {
    async generate(prompt: string) {
      prompts.push(prompt);
      return respond(prompt);
    },
  };
  return { service, prompts };
}
