const integerPattern = /^[+-]?\d+$/;
const floatPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseInteger(rawInput: string): number | null {
  const raw = rawInput.trim();
  if (!integerPattern.test(raw)) {
    return null;
  }
  // Beyond Number.MAX_SAFE_INTEGER the value is kept, rounded to the nearest double.
  return Number.parseInt(raw, 10);
}

export function parseFloatValue(rawInput: string): number | null {
  const raw = rawInput.trim();
  if (!floatPattern.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function parseSuccessFlag(rawInput: string): boolean {
  return rawInput.trim() === "true";
}

/** Shortest decimal form that round-trips, e.g. `5`, `2.5`, `80`. */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? "0" : String(value);
}
