/**
 * Quote pricing: total estimate derivation and line-item discounts.
 *
 * Amounts are decimal currency units (not cents). Every derived amount is
 * rounded to 2 decimal places so stored prices never carry float residue.
 */

import type { DiscountType, QuoteItem } from "./types";

export function roundMoney(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Sum of unitPrice × quantity over priced items.
 * null if and only if no item carries a price.
 */
export function computeTotalEstimate(items: ReadonlyArray<Pick<QuoteItem, "unitPrice" | "quantity">>): number | null {
  let total = 0;
  let hasPricing = false;

  for (const item of items) {
    if (item.unitPrice !== null) {
      total += item.unitPrice * item.quantity;
      hasPricing = true;
    }
  }

  return hasPricing ? roundMoney(total) : null;
}

export interface DiscountRequest {
  type: DiscountType;
  /** Percent (0-100+) for percentage, currency amount for fixed_amount. Must be > 0. */
  value: number;
  /** Item indices to discount; omitted means every item */
  targetIndices?: readonly number[];
}

export interface DiscountOutcome {
  items: QuoteItem[];
  /** Σ per-unit discount × quantity across the items actually discounted */
  totalDiscount: number;
  newTotal: number | null;
  /** Indices that were actually discounted, in application order */
  affectedIndices: number[];
}

/**
 * Per-unit discount on a single price. Result never takes the price below zero.
 */
export function discountUnitPrice(price: number, type: DiscountType, value: number): { newPrice: number; discount: number } {
  const raw = type === "percentage" ? price * (value / 100) : Math.min(value, price);
  const newPrice = roundMoney(Math.max(0, price - raw));
  return { newPrice, discount: roundMoney(price - newPrice) };
}

/**
 * Applies a discount to the selected items and recomputes the total.
 *
 * Discounts compound: each call works from the item's current unitPrice, and
 * originalPrice keeps the price seen by the first discount ever applied.
 * Indices outside the item list, duplicates, unpriced (or zero-priced) items
 * and items whose discount rounds to nothing are skipped. The input array is not mutated.
 */
export function applyDiscountToItems(items: readonly QuoteItem[], request: DiscountRequest): DiscountOutcome {
  const modified = items.map((item) => ({ ...item }));
  const indices = request.targetIndices ?? items.map((_, index) => index);
  const seen = new Set<number>();
  const affectedIndices: number[] = [];
  let totalDiscount = 0;

  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= modified.length || seen.has(index)) {
      continue;
    }
    seen.add(index);

    const item = modified[index];
    const price = item.unitPrice;
    if (price === null || price === 0) {
      continue;
    }

    const { newPrice, discount } = discountUnitPrice(price, request.type, request.value);
    if (discount === 0) {
      continue;
    }

    modified[index] = {
      ...item,
      unitPrice: newPrice,
      originalPrice: item.originalPrice ?? price,
      discountApplied: discount,
    };
    totalDiscount += discount * item.quantity;
    affectedIndices.push(index);
  }

  return {
    items: modified,
    totalDiscount: roundMoney(totalDiscount),
    newTotal: computeTotalEstimate(modified),
    affectedIndices,
  };
}

export function formatAmount(amount: number | null): string {
  return amount === null ? "none" : amount.toFixed(2);
}

/**
 * "percentage discount applied: 10%" / "fixed_amount discount applied: 25"
 */
export function describeDiscount(type: DiscountType, value: number, reason?: string | null): string {
  const base = `${type} discount applied: ${value}${type === "percentage" ? "%" : ""}`;
  return reason ? `${base} (${reason})` : base;
}
