import path from "node:path";
import { z } from "zod";
import type { ColumnMapping } from "@catalog-builder/shared";
import type { Env } from "./env.js";

export const DEFAULT_COLUMNS: ColumnMapping = {
  name: "Nome",
  price: "Preço",
  description: "Descrição",
  image_url: "URL da Imagem",
  category: "Categoria",
  size: "Tamanho",
  color: "Cor",
  quantity: "Quantidade",
  highlight: "Destaque"
};

const GridConfigSchema = z.object({
  columns: z.number().int().min(1),
  rowsPerPage: z.number().int().min(1),
  spacing: z.number().nonnegative()
});

export type GridConfig = z.infer<typeof GridConfigSchema>;

const CatalogConfigSchema = z.object({
  pageSize: z.literal("A4"),
  margins: z.object({
    top: z.number().nonnegative(),
    bottom: z.number().nonnegative(),
    left: z.number().nonnegative(),
    right: z.number().nonnegative()
  }),
  grid: GridConfigSchema,
  image: z.object({
    maxWidth: z.number().int().positive(),
    maxHeight: z.number().int().positive(),
    quality: z.number().int().min(1).max(100)
  }),
  download: z.object({
    timeoutMs: z.number().int().positive(),
    maxFileSize: z.number().int().positive(),
    allowedExtensions: z.array(z.string().startsWith("."))
  }),
  sheets: z.object({
    timeoutMs: z.number().int().positive(),
    columns: z.record(z.string(), z.string().min(1))
  }),
  outputDir: z.string().min(1),
  tempDir: z.string().min(1)
});

export type CatalogConfig = Omit<z.infer<typeof CatalogConfigSchema>, "sheets"> & {
  sheets: { timeoutMs: number; columns: ColumnMapping };
};

/**
 * Static configuration for a run. Built once at startup from the environment
 * and never re-read while a catalog is being produced.
 */
export function buildCatalogConfig(env: Env, columns: Partial<ColumnMapping> = {}): CatalogConfig {
  const mapping: ColumnMapping = { ...DEFAULT_COLUMNS, ...columns };
  const config = {
    pageSize: "A4" as const,
    margins: { top: 50, bottom: 50, left: 50, right: 50 },
    grid: {
      columns: env.CATALOG_COLUMNS,
      rowsPerPage: env.CATALOG_ROWS_PER_PAGE,
      spacing: 20
    },
    image: { maxWidth: 200, maxHeight: 200, quality: 85 },
    download: {
      timeoutMs: env.IMAGE_DOWNLOAD_TIMEOUT_MS,
      maxFileSize: 5 * 1024 * 1024,
      allowedExtensions: [".jpg", ".jpeg", ".png", ".webp"]
    },
    sheets: { timeoutMs: env.SHEETS_TIMEOUT_MS, columns: mapping },
    outputDir: path.resolve(env.OUTPUT_DIR),
    tempDir: path.resolve(env.TEMP_DIR)
  };

  const parsed = CatalogConfigSchema.safeParse(config);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid catalog configuration: ${message}`);
  }
  return { ...parsed.data, sheets: { timeoutMs: parsed.data.sheets.timeoutMs, columns: mapping } };
}
