import type { CategorizedRow, CategorySummary, ChartData } from "./types";

function amountOrZero(row: { amount: number | null }) {
  return row.amount ?? 0;
}

export function aggregateByCategory(rows: Array<Pick<CategorizedRow, "amount" | "category">>): CategorySummary {
  const byCategory: CategorySummary = new Map();
  for (const row of rows) {
    byCategory.set(row.category, (byCategory.get(row.category) ?? 0) + amountOrZero(row));
  }
  return byCategory;
}

export function totalExpenditure(rows: Array<{ amount: number | null }>): number {
  return rows.reduce((acc, row) => acc + amountOrZero(row), 0);
}

export function buildChartData(summary: CategorySummary): ChartData {
  const entries = [...summary.entries()];
  const total = entries.reduce((acc, [, amount]) => acc + amount, 0);

  return {
    bar: {
      labels: entries.map(([category]) => category),
      values: entries.map(([, amount]) => amount),
    },
    pie: entries.map(([category, amount]) => ({
      category,
      amount,
      share: total === 0 ? 0 : amount / total,
    })),
  };
}
