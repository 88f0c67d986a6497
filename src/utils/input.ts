// src/utils/input.ts
// Parsing of typed-in values and money formatting. Parsers return null instead of throwing.

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseInteger(input: string): number | null {
  const s = input.trim();
  if (!INTEGER_RE.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}

/** Decimal amount such as a price or a balance ("12", "12.5", "-3"). */
export function parseAmount(input: string): number | null {
  const s = input.trim();
  if (!DECIMAL_RE.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function isConfirmation(input: string): boolean {
  const s = input.trim();
  return s === "y" || s === "Y";
}

export function roundMoney(amount: number): number {
  return Number(amount.toFixed(2));
}

/** True when `amount` is a cent value, allowing for binary float noise. */
export function isWholeCents(amount: number): boolean {
  return Math.abs(roundMoney(amount) - amount) < 1e-9;
}

export function formatMoney(amount: number): string {
  return amount.toFixed(2);
}
