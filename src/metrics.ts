import type { Ticket } from "./types.js";

/** Extra decimals inspected to tell an exact tie from a near one. */
const TIE_DIGITS = 30;

/**
 * Rounds to a fixed number of decimals, halves to even (1.25 → 1.2,
 * 1.35 → 1.4). Works on the exact binary value, so 0.15 (stored as
 * 0.1499...) rounds to 0.1.
 * @param value - The number to round
 * @param digits - Decimal places to keep (default 1)
 */
export function roundTo(value: number, digits = 1): number {
  const expansion = Math.abs(value).toFixed(digits + TIE_DIGITS);
  const tail = expansion.slice(-TIE_DIGITS);
  if (tail !== "5".padEnd(TIE_DIGITS, "0")) {
    return Number(value.toFixed(digits));
  }

  // toFixed resolves exact ties away from zero; keep the even neighbour instead
  const kept = expansion.slice(0, -TIE_DIGITS);
  const lastDigit = Number(kept.replace(".", "").slice(-1));
  if (lastDigit % 2 === 1) return Number(value.toFixed(digits));
  return Math.sign(value) * Number(kept);
}

/**
 * Calculates a percentage rounded to one decimal.
 * @param part - The numerator value
 * @param total - The denominator value
 * @returns Percentage (0–100). Returns 0 when total is 0.
 */
export function percent(part: number, total: number): number {
  if (total <= 0) return 0;
  return roundTo((part / total) * 100);
}

/** Clamp `value` into `[min, max]`. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Arithmetic mean; 0 for an empty list. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function isDone(ticket: Ticket): boolean {
  return ticket.status.category === "done";
}

/** Sum of story-point estimates (unestimated tickets count as 0). */
export function sumStoryPoints(tickets: readonly Ticket[]): number {
  return tickets.reduce((sum, t) => sum + t.storyPoints, 0);
}
