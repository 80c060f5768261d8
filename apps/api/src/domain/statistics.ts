import type { Product, ProductStats } from "@catalog-builder/shared";

function countValues(values: string[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (!value) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

export function aggregate(products: readonly Product[]): ProductStats {
  // Zero prices carry no information for the range.
  const prices = products.map((p) => p.price).filter((price) => price > 0);

  return {
    count: products.length,
    priceMin: prices.length ? Math.min(...prices) : 0,
    priceMax: prices.length ? Math.max(...prices) : 0,
    priceAvg: prices.length ? prices.reduce((sum, price) => sum + price, 0) / prices.length : 0,
    totalQuantity: products.reduce((sum, p) => sum + (p.quantity ?? 0), 0),
    categoryCounts: countValues(products.map((p) => p.category)),
    sizeCounts: countValues(products.map((p) => p.size)),
    colorCounts: countValues(products.map((p) => p.color))
  };
}
