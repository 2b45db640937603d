import { describe, expect, it } from "vitest";
import { buildAdvicePrompt } from "../ai";
import { createFakeGenerationService } from "../ai/testing";
import { generateAdvice } from "./advice";
import { AdviceGenerationError } from "./errors";

const summary = new Map([
  ["Food", 4.5],
  ["Housing", 1200],
]);

describe("buildAdvicePrompt", () => {
  it("embeds budget, total and breakdown", () => {
    const prompt = buildAdvicePrompt({ budget: 1500, totalExpenditure: 1204.5, breakdown: summary });

    expect(prompt.split("\n")).toEqual([
      "You are a financial advisor. Based on the following financial data, provide highly specific financial advice:",
      "Budget: $1500.00",
      "Total Expenditure: $1204.50",
      'Expense Breakdown: {"Food":4.5,"Housing":1200}',
      "Provide unique advice that takes into account the user's spending patterns, and provide actionable steps that are tailored to reducing spending where necessary and optimizing their budget.",
    ]);
  });
});

describe("generateAdvice", () => {
  it("makes exactly one request and returns the trimmed text", async () => {
    const { service, prompts } = createFakeGenerationService(() => "\n  Cut back on coffee.  ");

    const text = await generateAdvice({ budget: 1500, totalExpenditure: 1204.5, summary }, service);

    expect(text).toBe("Cut back on coffee.");
    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain("Budget: $1500.00");
  });

  it("wraps service failures in AdviceGenerationError", async () => {
    const { service } = createFakeGenerationService(() => {
      throw new Error("deadline exceeded");
    });

    const run = generateAdvice({ budget: 0, totalExpenditure: 0, summary: new Map() }, service);
    await expect(run).rejects.toBeInstanceOf(AdviceGenerationError);
    await expect(run).rejects.toThrow("An error occurred while generating financial advice: deadline exceeded");
  });
});
