import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import type { CatalogDocument, RawRow } from "@catalog-builder/shared";
import { buildCatalogConfig } from "../config.js";
import { BUILT_IN_SCHEMES } from "../domain/colorSchemes.js";
import { loadEnv } from "../env.js";
import {
  FakeImages,
  FakePalette,
  FakeRenderer,
  FakeSpreadsheet,
  MemorySink,
  makeRow
} from "../testing/fakes.js";
import { runAllSchemes } from "./runAllSchemes.js";
import { runCatalog, type CatalogDeps, type CatalogJob } from "./runCatalog.js";

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "run-catalog-"));
const config = buildCatalogConfig(
  loadEnv({ OUTPUT_DIR: tmpDir, TEMP_DIR: path.join(tmpDir, "temp") })
);

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const writeMarker = (outputPath: string) => fs.promises.writeFile(outputPath, "rendered");

function setup(overrides: Partial<CatalogDeps> = {}) {
  const sink = new MemorySink();
  const images = new FakeImages();
  const renderer = new FakeRenderer(writeMarker);
  const deps: CatalogDeps = {
    config,
    sheets: new FakeSpreadsheet([makeRow("A"), makeRow("B"), makeRow("C")]),
    images,
    palettes: new FakePalette([]),
    renderer,
    sink,
    now: () => new Date("2026-01-05T10:00:00Z"),
    ...overrides
  };
  return { deps, sink, images, renderer };
}

function job(name: string, overrides: Partial<CatalogJob> = {}): CatalogJob {
  return {
    spreadsheetId: "sheet-123",
    sheetName: "Sheet1",
    outputPath: path.join(tmpDir, name),
    mode: "grid",
    schemeId: "default",
    includeImages: true,
    ...overrides
  };
}

function cardNames(document: CatalogDocument): string[] {
  return document.pages.flatMap((page) =>
    page.elements.flatMap((element) =>
      element.kind === "row"
        ? element.slots.flatMap((slot) =>
            slot.kind === "card"
              ? slot.elements.flatMap((e) => (e.kind === "name" ? [e.text] : []))
              : []
          )
        : []
    )
  );
}

describe("runCatalog", () => {
  it("keeps valid rows, records rejections and writes the output", async () => {
    const rows: RawRow[] = [
      makeRow("A"),
      makeRow("B"),
      makeRow("C"),
      makeRow("D", { Preço: "sob consulta" }),
      makeRow("E", { "URL da Imagem": "not a url" })
    ];
    const { deps, sink, images, renderer } = setup({ sheets: new FakeSpreadsheet(rows) });
    const target = job("catalogo.pdf");

    const result = await runCatalog(target, deps);

    expect(result).toMatchObject({ ok: true, outputPath: target.outputPath });
    if (!result.ok) throw new Error("expected success");
    expect(result.stats.count).toBe(3);
    expect(result.rejections).toEqual([
      { index: 3, reason: { code: "InvalidPrice", value: "sob consulta" } },
      { index: 4, reason: { code: "InvalidImageUrl", value: "not a url" } }
    ]);
    expect(result.states).toEqual([
      "Idle",
      "Authenticated",
      "Fetched",
      "Validated",
      "ImagesResolved",
      "Assembled",
      "Rendered",
      "CleanedUp"
    ]);

    expect(fs.readFileSync(target.outputPath, "utf8")).toBe("rendered");
    expect(fs.existsSync(`${target.outputPath}.part`)).toBe(false);
    expect(images.cleanups).toBe(1);
    expect(sink.messages("warn")).toEqual([
      'Row rejected: invalid price "sob consulta"',
      'Row rejected: invalid image URL "not a url"'
    ]);

    const input = renderer.inputs[0];
    expect(input.schemes).toBe(BUILT_IN_SCHEMES);
    expect(input.schemeId).toBe("default");
    expect(input.generatedAt.toISOString()).toBe("2026-01-05T10:00:00.000Z");
    expect(cardNames(input.document)).toEqual(["A", "B", "C"]);
  });

  it("fails with AuthError when authentication is refused", async () => {
    const { deps, images, renderer } = setup({ sheets: new FakeSpreadsheet([makeRow("A")], false) });

    const result = await runCatalog(job("auth.pdf"), deps);

    expect(result).toEqual({
      ok: false,
      reason: "AuthError",
      message: "Spreadsheet authentication failed",
      states: ["Idle", "Failed", "CleanedUp"]
    });
    expect(renderer.inputs).toHaveLength(0);
    expect(images.cleanups).toBe(1);
  });

  it("treats an empty sheet as NoData", async () => {
    const { deps } = setup({ sheets: new FakeSpreadsheet([]) });
    const result = await runCatalog(job("empty.pdf"), deps);

    expect(result).toEqual({
      ok: false,
      reason: "NoData",
      message: 'Sheet "Sheet1" has no data rows',
      states: ["Idle", "Authenticated", "Failed", "CleanedUp"]
    });
  });

  it("maps a fetch error to NoData", async () => {
    const { deps } = setup({ sheets: new FakeSpreadsheet(new Error("quota exceeded")) });
    const result = await runCatalog(job("fetch.pdf"), deps);

    expect(result).toMatchObject({
      ok: false,
      reason: "NoData",
      message: 'Could not read sheet "Sheet1": quota exceeded'
    });
  });

  it("fails with NoValidProducts when every row is rejected", async () => {
    const { deps } = setup({ sheets: new FakeSpreadsheet([makeRow("A", { Preço: "" }), makeRow("B", { Preço: "-5" })]) });
    const result = await runCatalog(job("invalid.pdf"), deps);

    expect(result).toEqual({
      ok: false,
      reason: "NoValidProducts",
      message: "None of the 2 rows produced a valid product",
      states: ["Idle", "Authenticated", "Fetched", "Failed", "CleanedUp"]
    });
  });

  it("drops products whose image cannot be downloaded", async () => {
    const images = new FakeImages(new Set(["https://example.com/B.png"]));
    const { deps, sink, renderer } = setup({ images });

    const result = await runCatalog(job("dropped.pdf"), deps);

    expect(result.ok).toBe(true);
    expect(cardNames(renderer.inputs[0].document)).toEqual(["A", "C"]);
    expect(sink.entries).toContainEqual({
      level: "warn",
      message: "Image unavailable, product dropped",
      context: { code: "ImageDownloadFailed", product: "B", url: "https://example.com/B.png" }
    });
  });

  it("fails with NoImagesAvailable when no image downloads", async () => {
    const failing = new Set(["A", "B", "C"].map((n) => `https://example.com/${n}.png`));
    const { deps, renderer } = setup({ images: new FakeImages(failing) });

    const result = await runCatalog(job("no-images.pdf"), deps);

    expect(result).toEqual({
      ok: false,
      reason: "NoImagesAvailable",
      message: "No product image could be downloaded",
      states: ["Idle", "Authenticated", "Fetched", "Validated", "Failed", "CleanedUp"]
    });
    expect(renderer.inputs).toHaveLength(0);
  });

  it("skips downloads when images are off or the list is simple", async () => {
    const { deps, images } = setup();

    const noImages = await runCatalog(job("no-download.pdf", { includeImages: false }), deps);
    const simple = await runCatalog(job("simple.pdf", { mode: "simple" }), deps);

    expect(images.downloads).toEqual([]);
    expect(noImages.states).not.toContain("ImagesResolved");
    expect(simple.ok).toBe(true);
  });

  it("leaves no output when the renderer reports failure", async () => {
    const renderer = new FakeRenderer(writeMarker, false);
    const { deps } = setup({ renderer });
    const target = job("render-false.pdf");

    const result = await runCatalog(target, deps);

    expect(result).toMatchObject({
      ok: false,
      reason: "RenderError",
      message: "The pdf renderer reported a failure"
    });
    expect(fs.existsSync(target.outputPath)).toBe(false);
    expect(fs.existsSync(`${target.outputPath}.part`)).toBe(false);
  });

  it("maps a renderer exception to RenderError", async () => {
    const { deps } = setup({ renderer: new FakeRenderer(writeMarker, new Error("boom")) });
    const result = await runCatalog(job("render-throw.pdf"), deps);

    expect(result).toMatchObject({ ok: false, reason: "RenderError", message: "Rendering failed: boom" });
  });

  it("stops on cancellation and cleans up", async () => {
    const controller = new AbortController();
    const images = new FakeImages(new Set(), () => controller.abort());
    const { deps, renderer } = setup({ images });
    const target = job("cancelled.pdf", { signal: controller.signal });

    const result = await runCatalog(target, deps);

    expect(result).toEqual({
      ok: false,
      reason: "Cancelled",
      message: "Run cancelled",
      states: ["Idle", "Authenticated", "Fetched", "Validated", "Failed", "CleanedUp"]
    });
    expect(images.downloads).toEqual(["A"]);
    expect(images.signals).toEqual([controller.signal]);
    expect(images.cleanups).toBe(1);
    expect(renderer.inputs).toHaveLength(0);
    expect(fs.existsSync(target.outputPath)).toBe(false);
  });

  it("reports an aborted last download as a cancellation", async () => {
    const controller = new AbortController();
    const url = "https://example.com/A.png";
    const images = new FakeImages(new Set([url]), () => controller.abort());
    const { deps, sink } = setup({ images, sheets: new FakeSpreadsheet([makeRow("A")]) });

    const result = await runCatalog(job("cancelled-last.pdf", { signal: controller.signal }), deps);

    expect(result).toMatchObject({ ok: false, reason: "Cancelled", message: "Run cancelled" });
    expect(sink.messages("warn")).toEqual(["Run cancelled"]);
  });

  it("reports unexpected errors and still cleans up", async () => {
    class ExplodingImages extends FakeImages {
      override async download(): Promise<string | null> {
        throw new Error("disk full");
      }
    }
    const images = new ExplodingImages();
    const { deps, sink } = setup({ images });

    const result = await runCatalog(job("unexpected.pdf"), deps);

    expect(result).toMatchObject({ ok: false, reason: "UnexpectedError", message: "disk full" });
    expect(sink.messages("error")).toEqual(["Catalog run failed unexpectedly"]);
    expect(images.cleanups).toBe(1);
  });

  it("logs a cleanup failure without failing the run", async () => {
    class StickyImages extends FakeImages {
      override async cleanup(): Promise<void> {
        throw new Error("EBUSY");
      }
    }
    const { deps, sink } = setup({ images: new StickyImages() });

    const result = await runCatalog(job("sticky.pdf"), deps);

    expect(result.ok).toBe(true);
    expect(result.states.at(-1)).toBe("CleanedUp");
    expect(sink.messages("error")).toEqual(["Temporary image cleanup failed"]);
  });
});

describe("runAllSchemes", () => {
  it("renders one catalog per scheme", async () => {
    const { deps } = setup();
    const outputDir = path.join(tmpDir, "all");

    const runs = await runAllSchemes(
      { spreadsheetId: "sheet-123", sheetName: "Sheet1", outputDir, mode: "grid", includeImages: false },
      deps
    );

    expect(runs.map((r) => [r.schemeId, r.result.ok])).toEqual([
      ["default", true],
      ["dark_mode", true],
      ["minimal", true]
    ]);
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      "catalogo_dark_mode.pdf",
      "catalogo_default.pdf",
      "catalogo_minimal.pdf"
    ]);
  });

  it("stops the batch once a run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { deps } = setup();

    const runs = await runAllSchemes(
      {
        spreadsheetId: "sheet-123",
        sheetName: "Sheet1",
        outputDir: path.join(tmpDir, "cancelled-all"),
        mode: "grid",
        includeImages: false,
        signal: controller.signal
      },
      deps
    );

    expect(runs).toHaveLength(1);
    expect(runs[0].result).toMatchObject({ ok: false, reason: "Cancelled" });
  });
});
