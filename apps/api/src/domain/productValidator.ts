import type {
  ColumnMapping,
  Product,
  RawRow,
  Rejection,
  RejectionReason,
  RequiredField,
  Result
} from "@catalog-builder/shared";

const REQUIRED_FIELDS: RequiredField[] = ["name", "price", "image_url"];

// scheme://host[:port][/path], host being a DNS name, localhost or a dotted quad.
const IMAGE_URL_PATTERN = new RegExp(
  "^https?://" +
    "(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\\.)+[A-Z]{2,6}\\.?" +
    "|localhost" +
    "|\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3})" +
    "(?::\\d+)?" +
    "(?:/?|[/?]\\S+)$",
  "i"
);

export function cleanText(value: string | undefined): string {
  return String(value ?? "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Parses a locale-formatted price ("R$ 1.234,56", "12,50", "19.90").
 * When both separators appear the right-most one is the decimal separator.
 * Returns null for blank, non-numeric or negative input.
 */
export function parsePrice(value: string | undefined): number | null {
  const raw = String(value ?? "").trim();
  if (!raw) return null;
  if (/-\s*\d/.test(raw.replace(/[^\d.,\s-]/g, ""))) return null;

  const normalized = raw.replace(/[^\d.,]/g, "");
  if (!/\d/.test(normalized)) return null;

  const hasDot = normalized.includes(".");
  const hasComma = normalized.includes(",");
  let canonical = normalized;
  if (hasDot && hasComma) {
    canonical =
      normalized.lastIndexOf(".") > normalized.lastIndexOf(",")
        ? normalized.replace(/,/g, "")
        : normalized.replace(/\./g, "").replace(",", ".");
  } else if (hasComma) {
    canonical = normalized.replace(",", ".");
  }

  const num = Number(canonical);
  if (!Number.isFinite(num) || num < 0) return null;
  return num;
}

export function parseQuantity(value: string | undefined): number | null {
  const raw = cleanText(value);
  if (!/^\d+$/.test(raw)) return null;
  return Number(raw);
}

export function isValidImageUrl(value: string | undefined): boolean {
  const url = String(value ?? "").trim();
  if (!url) return false;
  return IMAGE_URL_PATTERN.test(url);
}

export function deriveHighlight(value: string | undefined): string {
  const raw = String(value ?? "").trim();
  if (!raw) return "";
  const upper = raw.toUpperCase();
  if (upper === "TRUE") return "DESTAQUE";
  if (upper === "FALSE") return "";
  return cleanText(raw);
}

function cell(row: RawRow, columns: ColumnMapping, field: keyof ColumnMapping): string {
  return row[columns[field]] ?? "";
}

export function normalize(row: RawRow, columns: ColumnMapping): Result<Product, RejectionReason> {
  for (const field of REQUIRED_FIELDS) {
    if (!cell(row, columns, field).trim()) {
      return { ok: false, error: { code: "MissingField", field } };
    }
  }

  const imageUrl = cell(row, columns, "image_url").trim();
  if (!isValidImageUrl(imageUrl)) {
    return { ok: false, error: { code: "InvalidImageUrl", value: imageUrl } };
  }

  const rawPrice = cell(row, columns, "price");
  const price = parsePrice(rawPrice);
  if (price === null) {
    return { ok: false, error: { code: "InvalidPrice", value: rawPrice.trim() } };
  }

  return {
    ok: true,
    value: {
      name: cleanText(cell(row, columns, "name")),
      price,
      description: cleanText(cell(row, columns, "description")),
      imageUrl,
      category: cleanText(cell(row, columns, "category")),
      size: cleanText(cell(row, columns, "size")),
      color: cleanText(cell(row, columns, "color")),
      quantity: parseQuantity(cell(row, columns, "quantity")),
      highlight: deriveHighlight(cell(row, columns, "highlight"))
    }
  };
}

export function processAll(
  rows: RawRow[],
  columns: ColumnMapping
): { products: Product[]; rejections: Rejection[] } {
  const products: Product[] = [];
  const rejections: Rejection[] = [];

  rows.forEach((row, index) => {
    const result = normalize(row, columns);
    if (result.ok) products.push(result.value);
    else rejections.push({ index, reason: result.error });
  });

  return { products, rejections };
}

export function describeRejection(reason: RejectionReason): string {
  switch (reason.code) {
    case "MissingField":
      return `missing required field "${reason.field}"`;
    case "InvalidPrice":
      return `invalid price "${reason.value}"`;
    case "InvalidImageUrl":
      return `invalid image URL "${reason.value}"`;
  }
}
