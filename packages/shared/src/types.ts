export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** One spreadsheet data row keyed by its header label. */
export type RawRow = Record<string, string>;

export const LOGICAL_FIELDS = [
  "name",
  "price",
  "description",
  "image_url",
  "category",
  "size",
  "color",
  "quantity",
  "highlight"
] as const;

export type LogicalField = (typeof LOGICAL_FIELDS)[number];

export type ColumnMapping = Record<LogicalField, string>;

export type RequiredField = "name" | "price" | "image_url";

export type Product = {
  readonly name: string;
  readonly price: number;
  readonly description: string;
  readonly imageUrl: string;
  readonly category: string;
  readonly size: string;
  readonly color: string;
  readonly quantity: number | null;
  readonly highlight: string;
  // Filled in after a successful image download.
  readonly localImagePath?: string;
};

export type RejectionReason =
  | { code: "MissingField"; field: RequiredField }
  | { code: "InvalidPrice"; value: string }
  | { code: "InvalidImageUrl"; value: string };

export type Rejection = {
  index: number;
  reason: RejectionReason;
};

export type ProductStats = {
  count: number;
  priceMin: number;
  priceMax: number;
  priceAvg: number;
  totalQuantity: number;
  categoryCounts: Record<string, number>;
  sizeCounts: Record<string, number>;
  colorCounts: Record<string, number>;
};

export type Rgb = [number, number, number];

export type BaseColorRole = "background" | "accent" | "text_primary";

export type DerivedColorRole =
  | "product_bg"
  | "header_bg"
  | "border"
  | "text_secondary"
  | "price"
  | "highlight";

export type ColorRole = BaseColorRole | DerivedColorRole;

export type ColorScheme = { name: string } & Record<BaseColorRole, string> &
  Partial<Record<DerivedColorRole, string>>;

export type ColorSchemeSet = Record<string, ColorScheme>;

export type CatalogMode = "grid" | "simple";

export type CardElement =
  | { kind: "image"; data: Buffer }
  | { kind: "image_placeholder"; text: string }
  | { kind: "spacer"; height: number }
  | { kind: "name"; text: string }
  | { kind: "price"; text: string }
  | { kind: "description"; text: string }
  | { kind: "details"; text: string };

export type CardSlot =
  | { kind: "card"; highlight: string; elements: CardElement[] }
  | { kind: "filler" };

export type PageElement =
  | { kind: "title"; text: string }
  | { kind: "rule" }
  | { kind: "row"; slots: CardSlot[] }
  | { kind: "entry"; line: string; description: string | null };

export type CatalogPage = {
  elements: PageElement[];
};

export type CatalogDocument = {
  mode: CatalogMode;
  title: string;
  pages: CatalogPage[];
};
