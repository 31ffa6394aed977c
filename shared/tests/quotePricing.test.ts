import { describe, expect, test } from "@jest/globals";

import type { QuoteItem } from "../types";
import {
  applyDiscountToItems,
  computeTotalEstimate,
  describeDiscount,
  discountUnitPrice,
  formatAmount,
} from "../quotePricing";

function item(unitPrice: number | null, quantity: number = 1): QuoteItem {
  return {
    productId: "prod",
    productName: "Part",
    quantity,
    unitPrice,
    originalPrice: null,
    discountApplied: 0,
    notes: null,
  };
}

describe("computeTotalEstimate", () => {
  test("sums priced items and skips unpriced ones", () => {
    expect(computeTotalEstimate([item(12.5, 4), item(null, 3), item(0.1, 3)])).toBe(50.3);
  });

  test("null only when no item carries a price", () => {
    expect(computeTotalEstimate([item(null, 2)])).toBeNull();
    expect(computeTotalEstimate([item(0, 2)])).toBe(0);
  });
});

describe("discountUnitPrice", () => {
  test("percentage", () => {
    expect(discountUnitPrice(80, "percentage", 12.5)).toEqual({ newPrice: 70, discount: 10 });
  });

  test("fixed amount never goes below zero", () => {
    expect(discountUnitPrice(30, "fixed_amount", 45)).toEqual({ newPrice: 0, discount: 30 });
  });
});

describe("applyDiscountToItems", () => {
  test("discounts compound across calls and keep the first original price", () => {
    const first = applyDiscountToItems([item(100, 10)], { type: "percentage", value: 10 });
    expect(first.newTotal).toBe(900);
    expect(first.totalDiscount).toBe(100);

    const second = applyDiscountToItems(first.items, { type: "percentage", value: 10 });
    expect(second.newTotal).toBe(810);
    expect(second.totalDiscount).toBe(90);
    expect(second.items[0]).toMatchObject({ unitPrice: 81, originalPrice: 100, discountApplied: 9 });
  });

  test("10% off a single 1000.00 item twice", () => {
    const first = applyDiscountToItems([item(1000)], { type: "percentage", value: 10 });
    expect(first.items[0]).toMatchObject({ unitPrice: 900, discountApplied: 100, originalPrice: 1000 });

    const second = applyDiscountToItems(first.items, { type: "percentage", value: 10 });
    expect(second.newTotal).toBe(810);
    expect(second.items[0].originalPrice).toBe(1000);
  });

  test("targets only the selected indices and skips invalid, duplicate and unpriced ones", () => {
    const items = [item(50, 2), item(null, 1), item(20, 5)];
    const outcome = applyDiscountToItems(items, { type: "fixed_amount", value: 5, targetIndices: [2, 2, 1, 7, -1] });

    expect(outcome.affectedIndices).toEqual([2]);
    expect(outcome.totalDiscount).toBe(25);
    expect(outcome.newTotal).toBe(175);
    expect(outcome.items[0]).toEqual(items[0]);
  });

  test("leaves items whose discount rounds to zero untouched", () => {
    const items = [item(0.01, 3), item(100, 1)];
    const outcome = applyDiscountToItems(items, { type: "percentage", value: 10 });

    expect(outcome.affectedIndices).toEqual([1]);
    expect(outcome.totalDiscount).toBe(10);
    expect(outcome.newTotal).toBe(90.03);
    expect(outcome.items[0]).toEqual(items[0]);
  });

  test("does not mutate the input", () => {
    const items = [item(10, 1)];
    applyDiscountToItems(items, { type: "percentage", value: 50 });
    expect(items[0].unitPrice).toBe(10);
    expect(items[0].originalPrice).toBeNull();
  });
});

describe("formatting", () => {
  test("describeDiscount", () => {
    expect(describeDiscount("percentage", 10)).toBe("percentage discount applied: 10%");
    expect(describeDiscount("fixed_amount", 25, "loyal customer")).toBe("fixed_amount discount applied: 25 (loyal customer)");
  });

  test("formatAmount", () => {
    expect(formatAmount(null)).toBe("none");
    expect(formatAmount(810)).toBe("810.00");
  });
});
