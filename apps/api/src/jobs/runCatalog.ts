import fs from "node:fs/promises";
import path from "node:path";
import {
  formatPrice,
  formatPriceRange,
  type CatalogDocument,
  type CatalogMode,
  type Product,
  type ProductStats,
  type RawRow,
  type Rejection
} from "@catalog-builder/shared";
import type { CatalogConfig } from "../config.js";
import { ColorSchemeResolver } from "../domain/colorSchemes.js";
import { describeRejection, processAll } from "../domain/productValidator.js";
import { aggregate } from "../domain/statistics.js";
import { assemble, assembleSimple } from "../engines/layoutEngine.js";
import type { DiagnosticsSink } from "../logger.js";
import type {
  CatalogRenderer,
  ImageAcquisition,
  PaletteExtractor,
  SpreadsheetSource
} from "../services/types.js";

export type PipelineState =
  | "Idle"
  | "Authenticated"
  | "Fetched"
  | "Validated"
  | "ImagesResolved"
  | "Assembled"
  | "Rendered"
  | "CleanedUp"
  | "Failed";

export type FailureReason =
  | "AuthError"
  | "NoData"
  | "NoValidProducts"
  | "NoImagesAvailable"
  | "RenderError"
  | "Cancelled"
  | "UnexpectedError";

export type CatalogJob = {
  spreadsheetId: string;
  sheetName: string;
  outputPath: string;
  mode: CatalogMode;
  schemeId: string;
  logoPath?: string;
  /** Grid mode only; the simple list never carries images. */
  includeImages: boolean;
  signal?: AbortSignal;
};

export type CatalogDeps = {
  config: CatalogConfig;
  sheets: SpreadsheetSource;
  images: ImageAcquisition;
  palettes: PaletteExtractor;
  renderer: CatalogRenderer;
  sink: DiagnosticsSink;
  now?: () => Date;
};

export type CatalogRunResult =
  | {
      ok: true;
      outputPath: string;
      stats: ProductStats;
      rejections: Rejection[];
      states: PipelineState[];
    }
  | { ok: false; reason: FailureReason; message: string; states: PipelineState[] };

class RunFailure extends Error {
  constructor(
    readonly reason: FailureReason,
    message: string
  ) {
    super(message);
    this.name = "RunFailure";
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function logStats(sink: DiagnosticsSink, stats: ProductStats): void {
  sink.log("info", "Catalog statistics", {
    products: stats.count,
    priceRange: formatPriceRange(stats.priceMin, stats.priceMax),
    priceAvg: formatPrice(stats.priceAvg),
    totalQuantity: stats.totalQuantity,
    categories: stats.categoryCounts,
    sizes: stats.sizeCounts,
    colors: stats.colorCounts
  });
}

async function resolveImages(
  products: Product[],
  deps: CatalogDeps,
  checkpoint: () => void,
  signal?: AbortSignal
): Promise<{ products: Product[]; images: Map<string, Buffer> }> {
  const kept: Product[] = [];
  const images = new Map<string, Buffer>();

  // One download at a time.
  for (const product of products) {
    checkpoint();
    const localImagePath = await deps.images.download(product.imageUrl, product.name, signal);
    // An aborted request also resolves to null; report it as a cancellation.
    checkpoint();
    if (!localImagePath) {
      deps.sink.log("warn", "Image unavailable, product dropped", {
        code: "ImageDownloadFailed",
        product: product.name,
        url: product.imageUrl
      });
      continue;
    }

    const data = await deps.images.optimizeForDocument(localImagePath);
    if (data) images.set(localImagePath, data);
    kept.push({ ...product, localImagePath });
  }

  const stats = await deps.images.stats();
  deps.sink.log("info", "Images resolved", { kept: kept.length, dropped: products.length - kept.length, ...stats });
  return { products: kept, images };
}

async function cleanup(deps: CatalogDeps, stagingPath: string): Promise<void> {
  try {
    await deps.images.cleanup();
  } catch (err) {
    deps.sink.log("error", "Temporary image cleanup failed", { error: errorMessage(err) });
  }
  try {
    await fs.rm(stagingPath, { force: true });
  } catch (err) {
    deps.sink.log("error", "Staging file cleanup failed", { stagingPath, error: errorMessage(err) });
  }
}

/**
 * Sheet rows to a single output file. The renderer writes a sibling staging
 * file that is renamed into place only after rendering succeeds, so a failed
 * or cancelled run leaves no output behind. Cleanup runs on every exit.
 */
export async function runCatalog(job: CatalogJob, deps: CatalogDeps): Promise<CatalogRunResult> {
  const { config, sink } = deps;
  const now = deps.now ?? (() => new Date());
  const states: PipelineState[] = ["Idle"];
  const stagingPath = `${job.outputPath}.part`;

  const checkpoint = () => {
    if (job.signal?.aborted) throw new RunFailure("Cancelled", "Run cancelled");
  };

  let result: CatalogRunResult;
  try {
    checkpoint();
    if (!(await deps.sheets.authenticate())) {
      throw new RunFailure("AuthError", "Spreadsheet authentication failed");
    }
    states.push("Authenticated");
    checkpoint();

    let rows: RawRow[];
    try {
      rows = await deps.sheets.fetchRows(job.spreadsheetId, job.sheetName);
    } catch (err) {
      throw new RunFailure("NoData", `Could not read sheet "${job.sheetName}": ${errorMessage(err)}`);
    }
    if (rows.length === 0) throw new RunFailure("NoData", `Sheet "${job.sheetName}" has no data rows`);
    states.push("Fetched");
    sink.log("info", "Rows fetched", { spreadsheetId: job.spreadsheetId, sheetName: job.sheetName, rows: rows.length });
    checkpoint();

    const { products, rejections } = processAll(rows, config.sheets.columns);
    for (const rejection of rejections) {
      sink.log("warn", `Row rejected: ${describeRejection(rejection.reason)}`, {
        code: rejection.reason.code,
        index: rejection.index
      });
    }
    if (products.length === 0) {
      throw new RunFailure("NoValidProducts", `None of the ${rows.length} rows produced a valid product`);
    }
    states.push("Validated");

    const stats = aggregate(products);
    logStats(sink, stats);
    checkpoint();

    let document: CatalogDocument;
    if (job.mode === "grid") {
      let catalogProducts = products;
      let images = new Map<string, Buffer>();
      if (job.includeImages) {
        const resolved = await resolveImages(products, deps, checkpoint, job.signal);
        if (resolved.products.length === 0) {
          throw new RunFailure("NoImagesAvailable", "No product image could be downloaded");
        }
        catalogProducts = resolved.products;
        images = resolved.images;
        states.push("ImagesResolved");
      }
      document = assemble(catalogProducts, config.grid, images);
    } else {
      document = assembleSimple(products);
    }
    states.push("Assembled");
    checkpoint();

    const schemes = await new ColorSchemeResolver(deps.palettes, sink).resolveSchemes(job.logoPath);
    await fs.mkdir(path.dirname(job.outputPath), { recursive: true });

    let rendered: boolean;
    try {
      rendered = await deps.renderer.render(
        { document, schemes, schemeId: job.schemeId, generatedAt: now() },
        stagingPath
      );
    } catch (err) {
      throw new RunFailure("RenderError", `Rendering failed: ${errorMessage(err)}`);
    }
    if (!rendered) throw new RunFailure("RenderError", `The ${deps.renderer.format} renderer reported a failure`);
    checkpoint();

    await fs.rename(stagingPath, job.outputPath);
    states.push("Rendered");
    sink.log("info", "Catalog generated", { outputPath: job.outputPath, products: stats.count });

    result = { ok: true, outputPath: job.outputPath, stats, rejections, states };
  } catch (err) {
    states.push("Failed");
    if (err instanceof RunFailure) {
      sink.log(err.reason === "Cancelled" ? "warn" : "error", err.message, { reason: err.reason });
      result = { ok: false, reason: err.reason, message: err.message, states };
    } else {
      sink.log("error", "Catalog run failed unexpectedly", { err: errorMessage(err) });
      result = { ok: false, reason: "UnexpectedError", message: errorMessage(err), states };
    }
  }

  await cleanup(deps, stagingPath);
  states.push("CleanedUp");
  return result;
}
