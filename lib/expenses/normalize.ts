import Papa from "papaparse";
import { z } from "zod";
import { MalformedInputError } from "./errors";
import type { CanonicalColumn, CellValue, NormalizedTable, RawRecord, TransactionRow } from "./types";

const COLUMN_ALIASES: Record<string, CanonicalColumn> = {
  date: "Date",
  description: "Description",
  amount: "Amount",
};

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const RecordsSchema = z.array(z.record(z.string(), CellSchema));

export function canonicalColumnName(header: string): string {
  const trimmed = header.trim();
  return COLUMN_ALIASES[trimmed.toLowerCase()] ?? trimmed;
}

export function coerceAmount(value: CellValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!DECIMAL_LITERAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function cellToText(value: CellValue | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return String(value);
}

function isBlank(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim().length === 0);
}

function toRow(record: RawRecord): TransactionRow {
  const row: TransactionRow = { amount: null, extra: {} };
  const seen = new Set<string>();

  for (const [header, value] of Object.entries(record)) {
    const column = canonicalColumnName(header);
    // first matching column wins, e.g. "Amount" and " amount " in the same file
    if (column === "Date" || column === "Description" || column === "Amount") {
      if (seen.has(column)) continue;
      seen.add(column);
    }

    if (column === "Date") {
      row.date = cellToText(value);
    } else if (column === "Description") {
      row.description = cellToText(value);
    } else if (column === "Amount") {
      row.amount = coerceAmount(value);
      row.rawAmount = cellToText(value);
    } else {
      row.extra[column] = value;
    }
  }

  return row;
}

function collectColumns(headers: string[]): string[] {
  const columns: string[] = [];
  for (const h of headers) {
    const c = canonicalColumnName(h);
    if (!columns.includes(c)) columns.push(c);
  }
  return columns;
}

/**
 * Normalizes rows coming from a manual table edit. Header matching is
 * case and whitespace insensitive for the canonical columns; other headers
 * are kept as-is (trimmed).
 */
export function normalizeTable(records: unknown): NormalizedTable {
  const parsed = RecordsSchema.safeParse(records);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new MalformedInputError(`Input is not a table: ${message}`);
  }

  const headers: string[] = [];
  for (const record of parsed.data) {
    for (const key of Object.keys(record)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }

  return {
    columns: collectColumns(headers),
    rows: parsed.data.map(toRow),
  };
}

export function parseCsvTable(text: string): NormalizedTable {
  if (text.trim().length === 0) {
    throw new MalformedInputError("The uploaded file is empty.");
  }

  const result = Papa.parse<Record<string, string | undefined>>(text.trim(), {
    header: true,
    skipEmptyLines: "greedy",
  });

  const fatal = result.errors.find((e) => e.type === "Quotes" || e.code === "TooManyFields");
  if (fatal) {
    const where = typeof fatal.row === "number" ? ` (row ${fatal.row + 1})` : "";
    throw new MalformedInputError(`Could not parse CSV${where}: ${fatal.message}`);
  }

  const headers = (result.meta.fields ?? []).filter((h) => h.trim().length > 0);
  if (headers.length === 0) {
    throw new MalformedInputError("The uploaded file has no header row.");
  }

  const rows = result.data.map((raw) => {
    const record: RawRecord = {};
    for (const h of headers) {
      const v = raw[h];
      record[h] = v === undefined || v.trim().length === 0 ? null : v;
    }
    return toRow(record);
  });

  return { columns: collectColumns(headers), rows };
}

export function isEffectivelyEmpty(table: NormalizedTable | null): boolean {
  if (!table || table.rows.length === 0) return true;
  return table.rows.every(
    (row) =>
      isBlank(row.date) &&
      isBlank(row.description) &&
      isBlank(row.rawAmount) &&
      Object.values(row.extra).every(isBlank)
  );
}
