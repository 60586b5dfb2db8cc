import { z } from "zod";

/**
 * Environment readers behind `loadWorkerConfig`. Values are trimmed and blanks
 * count as unset. Anything unrecognised falls back to the caller's default.
 */
const FLAG_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ["1", true],
  ["true", true],
  ["yes", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["no", false],
  ["off", false],
]);

const integerLiteral = z
  .string()
  .regex(/^[-+]?\d+$/)
  .transform(Number)
  .refine((value) => Number.isSafeInteger(value));

interface NumberOptions {
  /** Inclusive. */
  readonly min?: number;
  /** Inclusive. */
  readonly max?: number;
}

function envValue(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/** Flags accept `1/true/yes/on` and `0/false/no/off` in any case. */
export function readOptionalBool(name: string): boolean | undefined {
  const value = envValue(name);
  return value === undefined ? undefined : FLAG_LITERALS.get(value.toLowerCase());
}

export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

/** Base-10 safe integers only; decimals, exponents and out-of-range values read as unset. */
export function readOptionalInt(name: string, options: NumberOptions = {}): number | undefined {
  const parsed = integerLiteral.safeParse(envValue(name));
  if (!parsed.success) {
    return undefined;
  }
  const { min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER } = options;
  return parsed.data >= min && parsed.data <= max ? parsed.data : undefined;
}

export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

export function readOptionalString(name: string): string | undefined {
  return envValue(name);
}

export function readString(name: string, defaultValue: string): string {
  return envValue(name) ?? defaultValue;
}
