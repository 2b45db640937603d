import { beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeGenerationService } from "../ai/testing";
import { MalformedInputError } from "./errors";
import { presentSession } from "./present";
import { SessionStore, categorizeSession, editTable, uploadCsv } from "./session";

const CSV = "Date,Description,Amount\n2024-01-01,Coffee,4.50\n2024-01-02,Rent,1200.00\n";

function fakeService() {
  return createFakeGenerationService((prompt) => {
    if (prompt.startsWith("You are")) return "Keep rent under 30% of income.";
    return prompt.includes("Coffee") ? "Food" : "Housing";
  });
}

let store: SessionStore;
let clock: Date;
beforeEach(() => {
  clock = new Date("2024-05-01T10:00:00.000Z");
  store = new SessionStore({ now: () => clock, idleTtlMs: 60_000 });
});

describe("SessionStore", () => {
  it("creates sessions with a default budget of zero", () => {
    const session = store.create();
    expect(session.budget).toBe(0);
    expect(session.table).toBeNull();
    expect(session.result).toBeNull();
    expect(store.get(session.id)).toEqual(session);
  });

  it("sets a non-negative budget", () => {
    const { id } = store.create({ budget: 200 });
    expect(store.setBudget(id, 1500)?.budget).toBe(1500);
    expect(() => store.setBudget(id, -1)).toThrow(RangeError);
    expect(() => store.setBudget(id, Number.NaN)).toThrow(RangeError);
    expect(store.get(id)?.budget).toBe(1500);
  });

  it("returns null for unknown sessions", () => {
    expect(store.get("missing")).toBeNull();
    expect(store.setBudget("missing", 10)).toBeNull();
    expect(store.discard("missing")).toBe(false);
  });

  it("expires sessions left idle longer than the TTL", () => {
    const stale = store.create();
    clock = new Date("2024-05-01T10:00:30.000Z");
    const fresh = store.create();

    clock = new Date("2024-05-01T10:01:00.000Z");
    expect(store.get(stale.id)?.id).toBe(stale.id);

    clock = new Date("2024-05-01T10:01:00.001Z");
    expect(store.get(stale.id)).toBeNull();
    expect(store.get(fresh.id)?.id).toBe(fresh.id);
    expect(store.setBudget(stale.id, 10)).toBeNull();
  });

  it("keeps a session alive while it is being used", () => {
    const { id } = store.create();
    clock = new Date("2024-05-01T10:00:50.000Z");
    store.setBudget(id, 100);

    clock = new Date("2024-05-01T10:01:40.000Z");
    expect(store.get(id)?.budget).toBe(100);
  });

  it("discards a session", () => {
    const { id } = store.create();
    expect(store.discard(id)).toBe(true);
    expect(store.get(id)).toBeNull();
  });
});

describe("session operations", () => {
  it("keeps the previous table when an upload is malformed", () => {
    const { id } = store.create();
    uploadCsv(store, id, CSV);

    expect(() => uploadCsv(store, id, '"broken,1')).toThrow(MalformedInputError);
    expect(store.get(id)?.table?.rows).toHaveLength(2);
  });

  it("records the latest result and clears it when the table changes", async () => {
    const { id } = store.create({ budget: 1500 });
    uploadCsv(store, id, CSV);

    const result = await categorizeSession(store, id, { service: fakeService().service });
    expect(result?.status).toBe("done");
    expect(store.get(id)?.result).toBe(result);

    editTable(store, id, [{ Description: "Gym", Amount: 40 }]);
    const session = store.get(id);
    expect(session?.result).toBeNull();
    expect(session?.table?.rows).toEqual([{ description: "Gym", amount: 40, rawAmount: "40", extra: {} }]);
  });

  it("does not attach a result to a table replaced during the run", async () => {
    const { id } = store.create({ budget: 100 });
    uploadCsv(store, id, "Description,Amount\nCoffee,4.50\n");

    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { service } = createFakeGenerationService(async (prompt) => {
      await gate;
      return prompt.startsWith("You are") ? "Fine." : "Food";
    });

    const run = categorizeSession(store, id, { service });
    editTable(store, id, [{ Description: "Rent", Amount: 1200 }]);
    release();

    const result = await run;
    expect(result?.status).toBe("done");
    const session = store.get(id);
    expect(session?.table?.rows.map((r) => r.description)).toEqual(["Rent"]);
    expect(session?.result).toBeNull();
  });

  it("returns null when categorizing an unknown session", async () => {
    await expect(categorizeSession(store, "missing", { service: fakeService().service })).resolves.toBeNull();
  });

  it("presents a session for the UI", async () => {
    const { id } = store.create({ budget: 1500 });
    uploadCsv(store, id, CSV);
    await categorizeSession(store, id, { service: fakeService().service });

    const session = store.get(id);
    if (!session) throw new Error("session missing");
    const view = presentSession(session);

    expect(view.budget).toBe(1500);
    expect(view.updatedAt).toBe("2024-05-01T10:00:00.000Z");
    expect(view.table?.rows[0]).toEqual({ Date: "2024-01-01", Description: "Coffee", Amount: 4.5 });
    expect(view.result).toMatchObject({
      status: "done",
      categorized: [
        { Date: "2024-01-01", Description: "Coffee", Amount: 4.5, category: "Food" },
        { Date: "2024-01-02", Description: "Rent", Amount: 1200, category: "Housing" },
      ],
      summary: { Food: 4.5, Housing: 1200 },
      totalExpenditure: 1204.5,
      budgetRemaining: 295.5,
      advice: { ok: true, text: "Keep rent under 30% of income." },
    });
  });
});
