import {
  formatPrice,
  type CardElement,
  type CardSlot,
  type CatalogDocument,
  type CatalogPage,
  type PageElement,
  type Product
} from "@catalog-builder/shared";
import type { GridConfig } from "../config.js";

export const CATALOG_TITLE = "Catálogo de Produtos";
export const IMAGE_PLACEHOLDER = "Imagem não disponível";
export const PRICE_FALLBACK = "Preço não informado";
export const CARD_SPACER_HEIGHT = 6;

export type LayoutGrid = Pick<GridConfig, "columns" | "rowsPerPage">;

/** Optimized image bytes keyed by the product's local image path. */
export type ImageLookup = ReadonlyMap<string, Buffer>;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export function detailsLine(product: Product): string {
  const parts: string[] = [];
  if (product.category) parts.push(`Categoria: ${product.category}`);
  if (product.size) parts.push(`Tamanho: ${product.size}`);
  if (product.color) parts.push(`Cor: ${product.color}`);
  return parts.join(" | ");
}

export function buildCard(product: Product, images: ImageLookup): CardSlot {
  const elements: CardElement[] = [];

  const data = product.localImagePath ? images.get(product.localImagePath) : undefined;
  if (data) elements.push({ kind: "image", data });
  else elements.push({ kind: "image_placeholder", text: IMAGE_PLACEHOLDER });

  elements.push({ kind: "spacer", height: CARD_SPACER_HEIGHT });
  elements.push({ kind: "name", text: product.name });
  if (product.price > 0) elements.push({ kind: "price", text: formatPrice(product.price) });
  if (product.description) elements.push({ kind: "description", text: product.description });

  const details = detailsLine(product);
  if (details) elements.push({ kind: "details", text: details });

  return { kind: "card", highlight: product.highlight, elements };
}

function header(): PageElement[] {
  return [{ kind: "title", text: CATALOG_TITLE }, { kind: "rule" }];
}

/**
 * Lays products out as a grid: rows of `columns` cards in input order, the
 * last row padded with fillers, `rowsPerPage` rows per page. The title block
 * opens the first page even when there are no products.
 */
export function assemble(
  products: readonly Product[],
  grid: LayoutGrid,
  images: ImageLookup = new Map()
): CatalogDocument {
  if (grid.columns < 1 || grid.rowsPerPage < 1) {
    throw new Error(`Invalid grid ${grid.columns}x${grid.rowsPerPage}`);
  }

  const rows: PageElement[] = chunk(products, grid.columns).map((group) => {
    const slots: CardSlot[] = group.map((product) => buildCard(product, images));
    while (slots.length < grid.columns) slots.push({ kind: "filler" });
    return { kind: "row", slots };
  });

  const pages: CatalogPage[] = chunk(rows, grid.rowsPerPage).map((elements) => ({ elements }));
  if (pages.length === 0) pages.push({ elements: [] });
  pages[0].elements.unshift(...header());

  return { mode: "grid", title: CATALOG_TITLE, pages };
}

export function simpleEntryLine(product: Product, position: number): string {
  const price = product.price > 0 ? formatPrice(product.price) : PRICE_FALLBACK;
  return `${position}. ${product.name} - ${price}`;
}

/** One line per product, no grid and no images. */
export function assembleSimple(products: readonly Product[]): CatalogDocument {
  const entries: PageElement[] = products.map((product, i) => ({
    kind: "entry",
    line: simpleEntryLine(product, i + 1),
    description: product.description ? `   ${product.description}` : null
  }));

  return {
    mode: "simple",
    title: CATALOG_TITLE,
    pages: [{ elements: [...header(), ...entries] }]
  };
}
