import { describe, expect, it } from "vitest";
import type { Product } from "@catalog-builder/shared";
import { aggregate } from "./statistics.js";

function product(overrides: Partial<Product>): Product {
  return {
    name: "Produto",
    price: 10,
    description: "",
    imageUrl: "https://example.com/p.png",
    category: "",
    size: "",
    color: "",
    quantity: null,
    highlight: "",
    ...overrides
  };
}

describe("aggregate", () => {
  it("returns zeroed stats for an empty collection", () => {
    expect(aggregate([])).toEqual({
      count: 0,
      priceMin: 0,
      priceMax: 0,
      priceAvg: 0,
      totalQuantity: 0,
      categoryCounts: {},
      sizeCounts: {},
      colorCounts: {}
    });
  });

  it("computes price aggregates over positive prices only", () => {
    const stats = aggregate([product({ price: 10 }), product({ price: 30 }), product({ price: 0 })]);
    expect(stats.count).toBe(3);
    expect(stats.priceMin).toBe(10);
    expect(stats.priceMax).toBe(30);
    expect(stats.priceAvg).toBe(20);
  });

  it("counts non-empty categories, sizes and colors", () => {
    const stats = aggregate([
      product({ category: "Camisetas", size: "M", color: "Azul", quantity: 3 }),
      product({ category: "Camisetas", size: "G", color: "" }),
      product({ category: "", size: "M", color: "Azul", quantity: 2 })
    ]);
    expect(stats.categoryCounts).toEqual({ Camisetas: 2 });
    expect(stats.sizeCounts).toEqual({ M: 2, G: 1 });
    expect(stats.colorCounts).toEqual({ Azul: 2 });
    expect(stats.totalQuantity).toBe(5);
  });

  it("counts values named like Object.prototype members", () => {
    const stats = aggregate([
      product({ category: "constructor", color: "toString" }),
      product({ category: "toString", size: "__proto__" }),
      product({ category: "constructor", size: "__proto__" })
    ]);
    expect(Object.entries(stats.categoryCounts)).toEqual([
      ["constructor", 2],
      ["toString", 1]
    ]);
    expect(Object.entries(stats.sizeCounts)).toEqual([["__proto__", 2]]);
    expect(Object.entries(stats.colorCounts)).toEqual([["toString", 1]]);
  });
});
