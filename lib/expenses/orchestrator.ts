import type { GenerationService } from "../ai";
import { aggregateByCategory, buildChartData, totalExpenditure } from "./aggregate";
import { generateAdvice } from "./advice";
import { classifyRows } from "./classify";
import { EMPTY_INPUT_WARNING, describeError } from "./errors";
import { isEffectivelyEmpty } from "./normalize";
import type { AdviceResult, CategorizationResult, NormalizedTable } from "./types";

export type PipelineDeps = {
  service: GenerationService;
  concurrency?: number;
  groupErrors?: boolean;
};

export async function runCategorization(
  input: { table: NormalizedTable | null; budget: number },
  deps: PipelineDeps
): Promise<CategorizationResult> {
  if (!input.table || isEffectivelyEmpty(input.table)) {
    return { status: "empty", warning: EMPTY_INPUT_WARNING };
  }

  try {
    const categorized = await classifyRows(input.table.rows, deps.service, {
      concurrency: deps.concurrency,
      groupErrors: deps.groupErrors,
    });

    const summary = aggregateByCategory(categorized);
    const total = totalExpenditure(categorized);

    // advice needs the final aggregate, so it only starts once every row has settled
    let advice: AdviceResult;
    try {
      const text = await generateAdvice({ budget: input.budget, totalExpenditure: total, summary }, deps.service);
      advice = { ok: true, text };
    } catch (err) {
      console.error("Advice generation failed:", err);
      advice = { ok: false, error: describeError(err) };
    }

    return {
      status: "done",
      categorized,
      summary,
      charts: buildChartData(summary),
      totalExpenditure: total,
      budgetRemaining: input.budget - total,
      advice,
    };
  } catch (err) {
    console.error("Categorization failed:", err);
    return { status: "failed", error: `An error occurred: ${describeError(err)}` };
  }
}
