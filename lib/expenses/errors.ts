export { ServiceCallError } from "../ai/errors";

export class MalformedInputError extends Error {
  name = "MalformedInputError";
}

export class AdviceGenerationError extends Error {
  name = "AdviceGenerationError";
}

export const EMPTY_INPUT_WARNING = "Please enter valid financial data to categorize.";

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
