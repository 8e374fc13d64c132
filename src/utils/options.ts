import { InvalidArgumentError } from "commander";

/** Parses a non-negative integer option such as `--request-delay`. */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || value.trim() === "") {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

/** Parses a `--max-*` limit, which must be positive. */
export function parseLimit(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
