import { describe, expect, it } from "vitest";
import { formatMegabytes, formatPrice, formatPriceRange } from "./format.js";

describe("formatPrice", () => {
  it("uses a comma decimal separator without thousands grouping", () => {
    expect(formatPrice(1234.5)).toBe("R$ 1234,50");
    expect(formatPrice(12)).toBe("R$ 12,00");
    expect(formatPrice(0.1)).toBe("R$ 0,10");
  });

  it("formats a price range", () => {
    expect(formatPriceRange(9.9, 120)).toBe("R$ 9,90 - R$ 120,00");
  });
});

describe("formatMegabytes", () => {
  it("rounds to two decimals", () => {
    expect(formatMegabytes(1024 * 1024 * 1.5)).toBe(1.5);
    expect(formatMegabytes(0)).toBe(0);
  });
});
