// JSON codec that keeps every number as its source text
import { isLosslessNumber, parse, stringify } from "lossless-json";

/**
 * Parse JSON text. Numbers become `LosslessNumber`, so u64 amounts above
 * 2^53 and `1` against `1.0` stay distinguishable.
 *
 * @throws SyntaxError on malformed input
 */
export function parseJson(text: string): unknown {
  return parse(text);
}

/** Serialize with `LosslessNumber` values written back unchanged */
export function stringifyJson(value: unknown, space?: number): string | undefined {
  return stringify(value, undefined, space);
}

/** Source text of a JSON number, or undefined for anything else */
export function numberText(value: unknown): string | undefined {
  if (isLosslessNumber(value)) return value.value;
  if (typeof value === "number") return String(value);
  return undefined;
}

export function isJsonNumber(value: unknown): boolean {
  return numberText(value) !== undefined;
}

/** A non-negative safe integer written without fraction or exponent */
export function toIndex(value: unknown): number | undefined {
  const text = numberText(value);
  if (text === undefined || !/^(0|[1-9][0-9]*)$/.test(text)) return undefined;
  const index = Number(text);
  return Number.isSafeInteger(index) ? index : undefined;
}
