/** Outcome of reading a free-text field. `ok: false` is distinct from a low score. */
export type Parsed<T> = { ok: true; value: T } | { ok: false; text: string };

export function parsed<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

export function unparsed<T>(text: string): Parsed<T> {
  return { ok: false, text };
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Score returned when a field exists but cannot be read. */
export const NEEDS_CONFIRMATION = 0.5;
