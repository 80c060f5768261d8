import fs from "node:fs";
import { finished } from "node:stream/promises";
import { colord } from "colord";
import PDFDocument from "pdfkit";
import type { CardSlot, CatalogDocument, CatalogPage, ColorScheme } from "@catalog-builder/shared";
import type { CatalogConfig } from "../config.js";
import { IMAGE_PLACEHOLDER } from "../engines/layoutEngine.js";
import { isGradient, pickScheme, resolveRole } from "../domain/colorSchemes.js";
import type { DiagnosticsSink } from "../logger.js";
import type { CatalogRenderer, RenderInput } from "../services/types.js";

type Doc = PDFKit.PDFDocument;
type Box = { x: number; y: number; width: number; height: number };
type TextStyle = { font: "Helvetica" | "Helvetica-Bold"; size: number; color: string };

const HEADER_HEIGHT = 64;
const RULE_GAP = 14;
const CARD_PADDING = 8;
const CARD_RADIUS = 6;
const IMAGE_SHARE = 0.5;

export type PdfLayoutOptions = Pick<CatalogConfig, "margins"> & {
  spacing: number;
  imageMaxHeight: number;
};

/** Hex stops of a CSS gradient expression, in order. */
export function gradientStops(value: string): string[] {
  return value.match(/#[0-9a-f]{3,8}\b/gi) ?? [];
}

/** White or dark text, whichever reads on `background`. */
export function readableOn(background: string): string {
  const solid = gradientStops(background)[0] ?? background;
  return colord(solid).isDark() ? "#FFFFFF" : "#333333";
}

function rowCount(page: CatalogPage): number {
  return page.elements.filter((e) => e.kind === "row").length;
}

export class PdfRenderer implements CatalogRenderer {
  readonly format = "pdf" as const;

  constructor(
    private readonly options: PdfLayoutOptions,
    private readonly sink: DiagnosticsSink
  ) {}

  async render(input: RenderInput, outputPath: string): Promise<boolean> {
    const scheme = pickScheme(input.schemes, input.schemeId, this.sink);
    const doc = new PDFDocument({
      size: "A4",
      margins: this.options.margins,
      autoFirstPage: false,
      info: { Title: input.document.title, CreationDate: input.generatedAt }
    });

    let pages = 0;
    doc.on("pageAdded", () => {
      pages += 1;
      this.paintBackground(doc, scheme);
    });

    const out = fs.createWriteStream(outputPath);
    doc.pipe(out);

    try {
      if (input.document.mode === "grid") this.drawGrid(doc, input.document, scheme);
      else this.drawSimple(doc, input.document, scheme);
      doc.end();
      await finished(out);
    } catch (err) {
      out.destroy();
      this.sink.log("error", "PDF rendering failed", {
        outputPath,
        error: err instanceof Error ? err.message : String(err)
      });
      return false;
    }

    this.sink.log("info", "PDF written", { outputPath, pages, scheme: input.schemeId });
    return true;
  }

  private paintBackground(doc: Doc, scheme: ColorScheme): void {
    doc.save();
    doc.rect(0, 0, doc.page.width, doc.page.height).fill(resolveRole(scheme, "background"));
    doc.restore();
  }

  private contentWidth(doc: Doc): number {
    const { left, right } = this.options.margins;
    return doc.page.width - left - right;
  }

  private drawGrid(doc: Doc, document: CatalogDocument, scheme: ColorScheme): void {
    const rowsPerPage = Math.max(1, ...document.pages.map(rowCount));
    for (const page of document.pages) {
      doc.addPage();
      this.drawGridPage(doc, page, rowsPerPage, scheme);
    }
  }

  private drawGridPage(doc: Doc, page: CatalogPage, rowsPerPage: number, scheme: ColorScheme): void {
    const { margins, spacing } = this.options;
    const left = margins.left;
    const width = this.contentWidth(doc);
    let y = margins.top;
    let rowHeight: number | null = null;

    for (const element of page.elements) {
      if (element.kind === "title") {
        this.drawHeader(doc, element.text, scheme, { x: left, y, width, height: HEADER_HEIGHT });
        y += HEADER_HEIGHT;
      } else if (element.kind === "rule") {
        this.drawRule(doc, left, y + RULE_GAP / 2, width, scheme);
        y += RULE_GAP;
      } else if (element.kind === "row") {
        // Rows share the space left under whatever header this page carries.
        const height: number =
          rowHeight ?? (doc.page.height - margins.bottom - y - spacing * (rowsPerPage - 1)) / rowsPerPage;
        rowHeight = height;

        const columns = element.slots.length;
        const colWidth = (width - spacing * (columns - 1)) / columns;
        element.slots.forEach((slot, i) => {
          const box = { x: left + i * (colWidth + spacing), y, width: colWidth, height };
          if (slot.kind === "card") this.drawCard(doc, slot, box, scheme);
        });
        y += height + spacing;
      }
    }
  }

  private fillHeaderBand(doc: Doc, box: Box, value: string): void {
    const stops = isGradient(value) ? gradientStops(value) : [];
    if (stops.length >= 2) {
      const gradient = doc.linearGradient(box.x, box.y, box.x + box.width, box.y + box.height);
      stops.forEach((color, i) => gradient.stop(i / (stops.length - 1), color));
      doc.rect(box.x, box.y, box.width, box.height).fill(gradient);
      return;
    }
    doc.rect(box.x, box.y, box.width, box.height).fill(stops[0] ?? value);
  }

  private drawHeader(doc: Doc, title: string, scheme: ColorScheme, box: Box): void {
    const background = resolveRole(scheme, "header_bg");
    this.fillHeaderBand(doc, box, background);

    doc.font("Helvetica-Bold").fontSize(22).fillColor(readableOn(background));
    const textHeight = doc.heightOfString(title, { width: box.width });
    doc.text(title, box.x, box.y + (box.height - textHeight) / 2, { width: box.width, align: "center" });
  }

  private drawRule(doc: Doc, x: number, y: number, width: number, scheme: ColorScheme): void {
    doc
      .moveTo(x, y)
      .lineTo(x + width, y)
      .lineWidth(2)
      .strokeColor(resolveRole(scheme, "border"))
      .stroke();
  }

  private drawCard(doc: Doc, card: Extract<CardSlot, { kind: "card" }>, box: Box, scheme: ColorScheme): void {
    doc
      .roundedRect(box.x, box.y, box.width, box.height, CARD_RADIUS)
      .lineWidth(1)
      .fillAndStroke(resolveRole(scheme, "product_bg"), resolveRole(scheme, "border"));

    const x = box.x + CARD_PADDING;
    const width = box.width - CARD_PADDING * 2;
    const bottom = box.y + box.height - CARD_PADDING;
    const imageHeight = Math.min(this.options.imageMaxHeight, box.height * IMAGE_SHARE);
    const primary = resolveRole(scheme, "text_primary");
    const secondary = resolveRole(scheme, "text_secondary");
    let y = box.y + CARD_PADDING;

    for (const element of card.elements) {
      switch (element.kind) {
        case "image":
          try {
            doc.image(element.data, x, y, { fit: [width, imageHeight], align: "center", valign: "center" });
          } catch (err) {
            this.sink.log("warn", "Image could not be embedded", {
              error: err instanceof Error ? err.message : String(err)
            });
            this.drawPlaceholder(doc, { x, y, width, height: imageHeight }, secondary);
          }
          y += imageHeight;
          break;
        case "image_placeholder":
          this.drawPlaceholder(doc, { x, y, width, height: imageHeight }, secondary, element.text);
          y += imageHeight;
          break;
        case "spacer":
          y += element.height;
          break;
        case "name":
          y = this.writeText(doc, element.text, { font: "Helvetica-Bold", size: 11, color: primary }, x, y, width, bottom);
          break;
        case "price":
          y = this.writeText(
            doc,
            element.text,
            { font: "Helvetica-Bold", size: 12, color: resolveRole(scheme, "price") },
            x,
            y,
            width,
            bottom
          );
          break;
        case "description":
          y = this.writeText(doc, element.text, { font: "Helvetica", size: 9, color: secondary }, x, y, width, bottom);
          break;
        case "details":
          y = this.writeText(doc, element.text, { font: "Helvetica", size: 8, color: secondary }, x, y, width, bottom);
          break;
      }
    }

    if (card.highlight) this.drawBadge(doc, card.highlight, box, resolveRole(scheme, "highlight"));
  }

  private drawPlaceholder(doc: Doc, box: Box, color: string, text = IMAGE_PLACEHOLDER): void {
    doc.rect(box.x, box.y, box.width, box.height).lineWidth(0.5).dash(3, { space: 3 }).strokeColor(color).stroke();
    doc.undash();
    doc.font("Helvetica").fontSize(9).fillColor(color);
    const textHeight = doc.heightOfString(text, { width: box.width });
    doc.text(text, box.x, box.y + (box.height - textHeight) / 2, { width: box.width, align: "center" });
  }

  private drawBadge(doc: Doc, text: string, card: Box, color: string): void {
    doc.font("Helvetica-Bold").fontSize(8);
    const width = Math.min(doc.widthOfString(text) + 10, card.width - CARD_PADDING * 2);
    const x = card.x + card.width - width - 4;
    const y = card.y + 4;
    doc.roundedRect(x, y, width, 14, 3).fill(color);
    doc.fillColor(readableOn(color)).text(text, x, y + 3, { width, height: 10, align: "center", ellipsis: true });
  }

  /** Writes clipped, centered text and returns the next free y. */
  private writeText(
    doc: Doc,
    text: string,
    style: TextStyle,
    x: number,
    y: number,
    width: number,
    bottom: number
  ): number {
    const room = bottom - y;
    if (room <= style.size) return y;

    doc.font(style.font).fontSize(style.size).fillColor(style.color);
    const height = Math.min(doc.heightOfString(text, { width }), room);
    doc.text(text, x, y, { width, height, align: "center", ellipsis: true });
    return y + height + 2;
  }

  private drawSimple(doc: Doc, document: CatalogDocument, scheme: ColorScheme): void {
    const primary = resolveRole(scheme, "text_primary");
    const secondary = resolveRole(scheme, "text_secondary");
    const left = this.options.margins.left;
    const width = this.contentWidth(doc);

    doc.addPage();
    for (const page of document.pages) {
      for (const element of page.elements) {
        if (element.kind === "title") {
          doc
            .font("Helvetica-Bold")
            .fontSize(20)
            .fillColor(primary)
            .text(element.text, left, doc.y, { width, align: "center" });
          doc.moveDown(0.5);
        } else if (element.kind === "rule") {
          this.drawRule(doc, left, doc.y, width, scheme);
          doc.moveDown(1);
        } else if (element.kind === "entry") {
          doc.font("Helvetica").fontSize(11).fillColor(primary).text(element.line, left, doc.y, { width });
          if (element.description) {
            doc.fontSize(9).fillColor(secondary).text(element.description, left, doc.y, { width });
          }
          doc.moveDown(0.4);
        }
      }
    }
  }
}
