import { InvalidArgumentError } from "commander";

function parseIntegerAtLeast(value: string, min: number, expected: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed) || parsed < min) {
    throw new InvalidArgumentError(`expected ${expected}`);
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  return parseIntegerAtLeast(value, 0, "a non-negative integer");
}

export function parsePositiveInt(value: string): number {
  return parseIntegerAtLeast(value, 1, "a positive integer");
}
