import type { CatalogDocument, ColorSchemeSet, RawRow, Rgb } from "@catalog-builder/shared";

export interface SpreadsheetSource {
  authenticate(): Promise<boolean>;
  /** Data rows keyed by the header row; blank rows are skipped. */
  fetchRows(sheetId: string, sheetName: string): Promise<RawRow[]>;
}

export type DownloadStats = {
  downloadedImages: number;
  tempFiles: number;
  totalSizeMb: number;
};

export interface ImageAcquisition {
  /** Resolves to null when the image cannot be fetched, including after `signal` aborts. */
  download(url: string, label: string, signal?: AbortSignal): Promise<string | null>;
  optimizeForDocument(localPath: string): Promise<Buffer | null>;
  cleanup(): Promise<void>;
  stats(): Promise<DownloadStats>;
}

export interface PaletteExtractor {
  /** Most prominent colors first; empty when the image cannot be read. */
  dominantPalette(imagePath: string, maxColors: number): Promise<Rgb[]>;
}

export type RenderInput = {
  document: CatalogDocument;
  schemes: ColorSchemeSet;
  schemeId: string;
  generatedAt: Date;
};

export interface CatalogRenderer {
  readonly format: "pdf" | "html";
  render(input: RenderInput, outputPath: string): Promise<boolean>;
}
