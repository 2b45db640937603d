import type { CategorizationResult, CategorizedRow, NormalizedTable, Session, TransactionRow } from "./types";

type PresentedCell = string | number | boolean | null;

function presentRow(row: TransactionRow): Record<string, PresentedCell> {
  return {
    Date: row.date ?? null,
    Description: row.description ?? null,
    Amount: row.amount ?? row.rawAmount ?? null,
    ...row.extra,
  };
}

function presentCategorizedRow(row: CategorizedRow): Record<string, PresentedCell> {
  return { ...presentRow(row), category: row.category };
}

export function presentTable(table: NormalizedTable | null) {
  if (!table) return null;
  return { columns: table.columns, rows: table.rows.map(presentRow) };
}

export function presentResult(result: CategorizationResult | null) {
  if (!result || result.status !== "done") return result;
  return {
    status: result.status,
    categorized: result.categorized.map(presentCategorizedRow),
    summary: Object.fromEntries(result.summary),
    charts: result.charts,
    totalExpenditure: result.totalExpenditure,
    budgetRemaining: result.budgetRemaining,
    advice: result.advice,
  };
}

export function presentSession(session: Session) {
  return {
    sessionId: session.id,
    budget: session.budget,
    table: presentTable(session.table),
    result: presentResult(session.result),
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
  };
}
