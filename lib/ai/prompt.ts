export function formatUsd(n: number): string {
  return `$${n.toFixed(2)}`;
}

export function buildClassificationPrompt(args: { description?: string; amount: number }) {
  return `Categorize the following expense: Description: '${args.description ?? ""}', Amount: '${args.amount}'`;
}

export function buildAdvicePrompt(args: {
  budget: number;
  totalExpenditure: number;
  breakdown: Map<string, number>;
}) {
  const lines: string[] = [];
  lines.push(
    "You are a financial advisor. Based on the following financial data, provide highly specific financial advice:"
  );
  lines.push(`Budget: ${formatUsd(args.budget)}`);
  lines.push(`Total Expenditure: ${formatUsd(args.totalExpenditure)}`);
  lines.push(`Expense Breakdown: ${JSON.stringify(Object.fromEntries(args.breakdown))}`);
  lines.push(
    "Provide unique advice that takes into account the user's spending patterns, and provide actionable steps that are tailored to reducing spending where necessary and optimizing their budget."
  );
  return lines.join("\n");
}
