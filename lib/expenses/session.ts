import { randomUUID } from "crypto";
import { runCategorization, type PipelineDeps } from "./orchestrator";
import { normalizeTable, parseCsvTable } from "./normalize";
import type { CategorizationResult, NormalizedTable, Session } from "./types";

export const DEFAULT_IDLE_TTL_MS = 2 * 60 * 60 * 1000;

/**
 * In-process session store. Sessions are transient: nothing survives a
 * restart, a discarded session is gone for good, and a session untouched
 * for longer than `idleTtlMs` expires.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly now: () => Date;
  private readonly idleTtlMs: number;

  constructor(opts: { now?: () => Date; idleTtlMs?: number } = {}) {
    this.now = opts.now ?? (() => new Date());
    this.idleTtlMs = opts.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
  }

  private isExpired(session: Session, at: Date): boolean {
    return at.getTime() - session.updatedAt.getTime() > this.idleTtlMs;
  }

  private prune(at: Date) {
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, at)) this.sessions.delete(id);
    }
  }

  create(args: { budget?: number } = {}): Session {
    const at = this.now();
    this.prune(at);
    const session: Session = {
      id: randomUUID(),
      budget: args.budget ?? 0,
      table: null,
      result: null,
      createdAt: at,
      updatedAt: at,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): Session | null {
    this.prune(this.now());
    return this.sessions.get(sessionId) ?? null;
  }

  discard(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private update(sessionId: string, patch: Partial<Pick<Session, "budget" | "table" | "result">>): Session | null {
    const current = this.get(sessionId);
    if (!current) return null;
    const next: Session = { ...current, ...patch, updatedAt: this.now() };
    this.sessions.set(sessionId, next);
    return next;
  }

  setBudget(sessionId: string, budget: number): Session | null {
    if (!Number.isFinite(budget) || budget < 0) {
      throw new RangeError("Budget must be a non-negative number");
    }
    return this.update(sessionId, { budget });
  }

  /** Replaces the table and clears any previous result. */
  replaceTable(sessionId: string, table: NormalizedTable): Session | null {
    return this.update(sessionId, { table, result: null });
  }

  recordResult(sessionId: string, result: CategorizationResult): Session | null {
    return this.update(sessionId, { result });
  }
}

// Parsing happens before the session is touched, so a MalformedInputError leaves the prior table in place.
export function uploadCsv(store: SessionStore, sessionId: string, csv: string): Session | null {
  const table = parseCsvTable(csv);
  return store.replaceTable(sessionId, table);
}

export function editTable(store: SessionStore, sessionId: string, rows: unknown): Session | null {
  const table = normalizeTable(rows);
  return store.replaceTable(sessionId, table);
}

/**
 * Runs the pipeline on the session's current table. The result is stored
 * only if that table is still current when the run finishes; an upload or
 * edit in the meantime leaves the new table without a result.
 */
export async function categorizeSession(
  store: SessionStore,
  sessionId: string,
  deps: PipelineDeps
): Promise<CategorizationResult | null> {
  const session = store.get(sessionId);
  if (!session) return null;

  const table = session.table;
  const result = await runCategorization({ table, budget: session.budget }, deps);
  if (store.get(sessionId)?.table === table) {
    store.recordResult(sessionId, result);
  }
  return result;
}
