import { buildClassificationPrompt, type GenerationService } from "../ai";
import { describeError } from "./errors";
import type { CategorizedRow, CategoryOutcome, TransactionRow } from "./types";

export const UNCATEGORIZED = "Uncategorized";
export const ERROR_CATEGORY = "Error";

export type ClassifyOptions = {
  concurrency?: number;
  groupErrors?: boolean;
};

export function categoryLabel(outcome: CategoryOutcome, opts?: { groupErrors?: boolean }): string {
  if (outcome.ok) return outcome.category;
  if (outcome.kind === "skipped") return UNCATEGORIZED;
  return opts?.groupErrors ? ERROR_CATEGORY : `${ERROR_CATEGORY}: ${outcome.cause}`;
}

export async function classifyRow(row: TransactionRow, service: GenerationService): Promise<CategoryOutcome> {
  if (row.amount === null) return { ok: false, kind: "skipped" };

  const prompt = buildClassificationPrompt({ description: row.description, amount: row.amount });
  try {
    const text = await service.generate(prompt);
    return { ok: true, category: text.trim() };
  } catch (err) {
    console.warn("Expense classification failed:", err);
    return { ok: false, kind: "error", cause: describeError(err) };
  }
}

/**
 * Assigns one category outcome per row. Rows are classified independently;
 * with `concurrency > 1` up to that many calls are in flight, and results
 * are written back by index so the output keeps the input order.
 */
export async function classifyRows(
  rows: TransactionRow[],
  service: GenerationService,
  opts: ClassifyOptions = {}
): Promise<CategorizedRow[]> {
  const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 1));
  const outcomes: CategoryOutcome[] = new Array(rows.length);

  let next = 0;
  async function worker() {
    while (next < rows.length) {
      const idx = next++;
      outcomes[idx] = await classifyRow(rows[idx], service);
    }
  }

  await Promise.all(Array.from({ length: Math.min(concurrency, rows.length) }, () => worker()));

  return rows.map((row, idx) => ({
    ...row,
    outcome: outcomes[idx],
    category: categoryLabel(outcomes[idx], { groupErrors: opts.groupErrors }),
  }));
}
