export const CURRENCY_MARKER = "R$";

// Two decimals, comma separator, no thousands grouping.
export function formatDecimal(value: number) {
  return value.toFixed(2).replace(".", ",");
}

export function formatPrice(value: number) {
  return `${CURRENCY_MARKER} ${formatDecimal(value)}`;
}

export function formatPriceRange(min: number, max: number) {
  return `${formatPrice(min)} - ${formatPrice(max)}`;
}

export function formatMegabytes(bytes: number) {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}
