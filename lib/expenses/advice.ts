import { buildAdvicePrompt, type GenerationService } from "../ai";
import { AdviceGenerationError, describeError } from "./errors";
import type { CategorySummary } from "./types";

/** One request, no retry. Rejects with AdviceGenerationError. */
export async function generateAdvice(
  args: { budget: number; totalExpenditure: number; summary: CategorySummary },
  service: GenerationService
): Promise<string> {
  const prompt = buildAdvicePrompt({
    budget: args.budget,
    totalExpenditure: args.totalExpenditure,
    breakdown: args.summary,
  });

  try {
    const text = await service.generate(prompt);
    return text.trim();
  } catch (err) {
    throw new AdviceGenerationError(
      `An error occurred while generating financial advice: ${describeError(err)}`,
      { cause: err }
    );
  }
}
