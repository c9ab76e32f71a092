/**
 * Strict structural comparison of two JSON values.
 *
 * Each mismatch becomes one path-qualified entry; entries are joined with a
 * blank line. Difference filters are regular expressions run over that
 * text, so the phrasing below must stay stable: changing it silently
 * disables every filter already written against it.
 */

import { isJsonNumber, numberText, stringifyJson } from "./json";

type PathSegment = { field: string } | { index: number };

interface Difference {
  path: PathSegment[];
  lhs?: unknown;
  rhs?: unknown;
  kind: "missing-from-lhs" | "missing-from-rhs" | "not-equal";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isJsonNumber(value)
  );
}

function formatPath(path: PathSegment[]): string {
  if (path.length === 0) return "(root)";
  return path
    .map((segment) =>
      "field" in segment ? `.${segment.field}` : `[${segment.index}]`,
    )
    .join("");
}

/** Keys sorted at every depth, numbers left as parsed */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

function prettyJson(value: unknown): string {
  return stringifyJson(sortKeys(value), 2) ?? "null";
}

function indent(text: string, spaces: number): string {
  const pad = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => pad + line)
    .join("\n");
}

function describe(diff: Difference): string {
  const path = formatPath(diff.path);
  switch (diff.kind) {
    case "missing-from-rhs":
      return `json atom at path "${path}" is missing from rhs`;
    case "missing-from-lhs":
      return `json atom at path "${path}" is missing from lhs`;
    case "not-equal":
      return [
        `json atoms at path "${path}" are not equal:`,
        "    lhs:",
        indent(prettyJson(diff.lhs), 8),
        "    rhs:",
        indent(prettyJson(diff.rhs), 8),
      ].join("\n");
  }
}

// Numbers compare by source text: 1 and 1.0 differ, as do u64 values past 2^53
function scalarsEqual(lhs: unknown, rhs: unknown): boolean {
  const lhsNumber = numberText(lhs);
  const rhsNumber = numberText(rhs);
  if (lhsNumber !== undefined || rhsNumber !== undefined) {
    return lhsNumber === rhsNumber;
  }
  return lhs === rhs;
}

function collect(
  lhs: unknown,
  rhs: unknown,
  path: PathSegment[],
  out: Difference[],
): void {
  if (isPlainObject(lhs) && isPlainObject(rhs)) {
    const lhsKeys = Object.keys(lhs).sort();
    for (const key of lhsKeys) {
      const childPath = [...path, { field: key }];
      if (Object.prototype.hasOwnProperty.call(rhs, key)) {
        collect(lhs[key], rhs[key], childPath, out);
      } else {
        out.push({ path: childPath, lhs: lhs[key], kind: "missing-from-rhs" });
      }
    }
    for (const key of Object.keys(rhs).sort()) {
      if (!Object.prototype.hasOwnProperty.call(lhs, key)) {
        out.push({
          path: [...path, { field: key }],
          rhs: rhs[key],
          kind: "missing-from-lhs",
        });
      }
    }
    return;
  }

  if (Array.isArray(lhs) && Array.isArray(rhs)) {
    const longest = Math.max(lhs.length, rhs.length);
    for (let i = 0; i < longest; i++) {
      const childPath = [...path, { index: i }];
      if (i >= rhs.length) {
        out.push({ path: childPath, lhs: lhs[i], kind: "missing-from-rhs" });
      } else if (i >= lhs.length) {
        out.push({ path: childPath, rhs: rhs[i], kind: "missing-from-lhs" });
      } else {
        collect(lhs[i], rhs[i], childPath, out);
      }
    }
    return;
  }

  // Same-kind containers were handled above; a container here is a type mismatch
  const lhsIsContainer = isPlainObject(lhs) || Array.isArray(lhs);
  const rhsIsContainer = isPlainObject(rhs) || Array.isArray(rhs);
  if (lhsIsContainer || rhsIsContainer || !scalarsEqual(lhs, rhs)) {
    out.push({ path, lhs, rhs, kind: "not-equal" });
  }
}

/**
 * Describe every structural difference between `lhs` (reference) and
 * `rhs` (testing). Returns undefined when the values are identical.
 */
export function diffJson(lhs: unknown, rhs: unknown): string | undefined {
  const differences: Difference[] = [];
  collect(lhs, rhs, [], differences);
  if (differences.length === 0) return undefined;
  return differences.map(describe).join("\n\n");
}

/**
 * Compile difference filters. Every pattern is applied with the global
 * flag so a filter removes all of its matches.
 *
 * @throws SyntaxError when a pattern does not compile
 */
export function compileFilters(patterns: string[]): RegExp[] {
  return patterns.map((pattern) => new RegExp(pattern, "g"));
}

/**
 * Delete every match of every filter, in order. An empty remainder means
 * the difference was fully accounted for.
 */
export function applyFilters(
  diff: string,
  filters: RegExp[],
): string | undefined {
  const remaining = filters.reduce(
    (acc, filter) => acc.replace(filter, ""),
    diff,
  );
  return remaining.length === 0 ? undefined : remaining;
}

/**
 * Compare two responses and drop known, accepted discrepancies
 */
export function compareResponses(
  referenceResponse: unknown,
  testingResponse: unknown,
  filters: RegExp[],
): string | undefined {
  const diff = diffJson(referenceResponse, testingResponse);
  if (diff === undefined) return undefined;
  return applyFilters(diff, filters);
}
