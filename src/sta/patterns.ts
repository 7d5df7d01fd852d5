/**
 * Regex helpers shared by the report parser and the enrichment pass
 */

// Signed decimal or integer, e.g. "-7.614", "+0.5", "12"
export const FLOAT = String.raw`[-+]?(?:\d+\.\d+|\d+)`;

// Percentage value without the "%" sign
export const PCT = String.raw`(?:\d+\.\d+|\d+)`;

/**
 * Convert a captured number, null when it is not finite
 */
export function toNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toInt(value: string | undefined): number | null {
  const parsed = toNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * First capture group of a pattern, trimmed
 */
export function firstMatch(pattern: RegExp, text: string): string | null {
  const match = text.match(pattern);
  const value = match?.[1];
  return value !== undefined ? value.trim() : null;
}

export function firstFloat(pattern: RegExp, text: string): number | null {
  return toNumber(text.match(pattern)?.[1]);
}

export function firstInt(pattern: RegExp, text: string): number | null {
  return toInt(text.match(pattern)?.[1]);
}

/**
 * Text between the end of `start` and the beginning of `end`.
 * Runs to the end of the text when `end` is not found; empty when `start`
 * is not found.
 */
export function between(text: string, start: RegExp, end: RegExp): string {
  const head = text.match(start);
  if (!head || head.index === undefined) return "";

  const rest = text.slice(head.index + head[0].length);
  const tail = rest.match(end);
  return tail && tail.index !== undefined ? rest.slice(0, tail.index) : rest;
}

/**
 * Escape a literal for use inside a RegExp source
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
