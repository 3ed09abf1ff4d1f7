import { InvalidArgumentError } from "commander";

export function parseDepth(raw: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new InvalidArgumentError("--depth must be non-negative integer");
  }
  return value;
}

export function parseLegacyPath(raw: string): string {
  const value = raw.trim().replace(/\/+$/, "");
  if (!value) {
    throw new InvalidArgumentError("legacy path must not be empty");
  }
  return value;
}
