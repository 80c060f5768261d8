import type { CatalogConfig } from "../config.js";
import type { Env } from "../env.js";
import type { CatalogDeps } from "../jobs/runCatalog.js";
import type { DiagnosticsSink } from "../logger.js";
import { HtmlRenderer } from "../renderers/htmlRenderer.js";
import { PdfRenderer } from "../renderers/pdfRenderer.js";
import { ImageDownloader } from "./imageDownloader.js";
import { ImageOptimizer } from "./imageOptimizer.js";
import { VibrantPaletteExtractor } from "./paletteExtractor.js";
import { GoogleSheetsConnector, credentialsFromEnv } from "./sheetsConnector.js";
import type { CatalogRenderer } from "./types.js";

export type OutputFormat = CatalogRenderer["format"];

/** Fresh collaborators for one run; nothing is shared between runs. */
export type DepsFactory = (format: OutputFormat, sink: DiagnosticsSink) => CatalogDeps;

export function createDepsFactory(env: Env, config: CatalogConfig): DepsFactory {
  const credentials = credentialsFromEnv(env);

  return (format, sink) => {
    const optimizer = new ImageOptimizer(config.image, sink);
    const renderer: CatalogRenderer =
      format === "pdf"
        ? new PdfRenderer(
            { margins: config.margins, spacing: config.grid.spacing, imageMaxHeight: config.image.maxHeight },
            sink
          )
        : new HtmlRenderer(sink);

    return {
      config,
      sheets: new GoogleSheetsConnector(
        credentials,
        { timeoutMs: config.sheets.timeoutMs, nameColumn: config.sheets.columns.name },
        sink
      ),
      images: new ImageDownloader({ tempDir: config.tempDir, ...config.download }, optimizer, sink),
      palettes: new VibrantPaletteExtractor(sink),
      renderer,
      sink
    };
  };
}
