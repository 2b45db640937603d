export type CellValue = string | number | boolean | null;

export type RawRecord = Record<string, CellValue>;

export type CanonicalColumn = "Date" | "Description" | "Amount";

export type TransactionRow = {
  date?: string;
  description?: string;
  amount: number | null; // null = missing or not numeric
  rawAmount?: string; // amount cell as entered
  extra: Record<string, CellValue>; // columns outside the canonical set, keyed by header
};

export type NormalizedTable = {
  columns: string[];
  rows: TransactionRow[];
};

export type CategoryOutcome =
  | { ok: true; category: string }
  | { ok: false; kind: "error"; cause: string }
  | { ok: false; kind: "skipped" };

export type CategorizedRow = TransactionRow & {
  outcome: CategoryOutcome;
  category: string;
};

export type CategorySummary = Map<string, number>;

export type ChartData = {
  bar: { labels: string[]; values: number[] };
  pie: Array<{ category: string; amount: number; share: number }>;
};

export type AdviceResult =
  | { ok: true; text: string }
  | { ok: false; error: string };

export type CategorizationResult =
  | { status: "empty"; warning: string }
  | { status: "failed"; error: string }
  | {
      status: "done";
      categorized: CategorizedRow[];
      summary: CategorySummary;
      charts: ChartData;
      totalExpenditure: number;
      budgetRemaining: number;
      advice: AdviceResult;
    };

export type Session = {
  id: string;
  budget: number;
  table: NormalizedTable | null;
  result: CategorizationResult | null;
  createdAt: Date;
  updatedAt: Date;
};
