import { readFile, writeFile } from "node:fs/promises";
import type { CardElement, CardSlot, CatalogDocument, CatalogPage, PageElement } from "@catalog-builder/shared";
import { applyScheme } from "../domain/colorSchemes.js";
import type { DiagnosticsSink } from "../logger.js";
import type { CatalogRenderer, RenderInput } from "../services/types.js";

const BASE_STYLESHEET = new URL("../../templates/catalog.css", import.meta.url);

export function loadBaseStylesheet(): Promise<string> {
  return readFile(BASE_STYLESHEET, "utf8");
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function cardElement(element: CardElement): string {
  switch (element.kind) {
    case "image":
      return `<div class="imagem"><img src="data:image/jpeg;base64,${element.data.toString("base64")}" alt=""></div>`;
    case "image_placeholder":
      return `<div class="imagem sem-imagem">${escapeHtml(element.text)}</div>`;
    case "spacer":
      return `<div style="height: ${element.height}px"></div>`;
    case "name":
      return `<div class="nome">${escapeHtml(element.text)}</div>`;
    case "price":
      return `<div class="preco">${escapeHtml(element.text)}</div>`;
    case "description":
      return `<div class="descricao">${escapeHtml(element.text)}</div>`;
    case "details":
      return `<div class="detalhe">${escapeHtml(element.text)}</div>`;
  }
}

function slot(s: CardSlot): string {
  if (s.kind === "filler") return `<div class="produto-vazio"></div>`;
  const badge = s.highlight ? `<span class="highlight">${escapeHtml(s.highlight)}</span>` : "";
  return `<div class="produto accent-border">${badge}${s.elements.map(cardElement).join("")}</div>`;
}

function pageElement(element: PageElement, subtitle: string): string {
  switch (element.kind) {
    case "title":
      return `<div class="header"><h1 class="title">${escapeHtml(element.text)}</h1><p class="subtitle">${escapeHtml(subtitle)}</p></div>`;
    case "rule":
      return `<hr class="rule">`;
    case "row":
      return `<div class="grid" style="grid-template-columns: repeat(${element.slots.length}, 1fr)">${element.slots.map(slot).join("")}</div>`;
    case "entry": {
      const description = element.description
        ? `<div class="descricao">${escapeHtml(element.description)}</div>`
        : "";
      return `<div class="entrada">${escapeHtml(element.line)}${description}</div>`;
    }
  }
}

function page(p: CatalogPage, mode: CatalogDocument["mode"], subtitle: string): string {
  const cls = mode === "simple" ? "page lista" : "page";
  return `<section class="${cls}">\n${p.elements.map((e) => pageElement(e, subtitle)).join("\n")}\n</section>`;
}

/** A standalone page: styles inline, images as data URIs. */
export function renderHtml(document: CatalogDocument, css: string, generatedAt: Date): string {
  const subtitle = `Gerado em ${generatedAt.toISOString().slice(0, 10)}`;
  const body = document.pages.map((p) => page(p, document.mode, subtitle)).join("\n");
  return `<!DOCTYPE html>
<html lang="pt-BR">
<head>
<meta charset="utf-8">
<title>${escapeHtml(document.title)}</title>
<style>
${css}
</style>
</head>
<body>
<div class="container">
${body}
</div>
</body>
</html>
`;
}

export class HtmlRenderer implements CatalogRenderer {
  readonly format = "html" as const;

  constructor(
    private readonly sink: DiagnosticsSink,
    private readonly stylesheet?: string
  ) {}

  async render(input: RenderInput, outputPath: string): Promise<boolean> {
    try {
      const base = this.stylesheet ?? (await loadBaseStylesheet());
      const css = applyScheme(base, input.schemeId, input.schemes, this.sink);
      await writeFile(outputPath, renderHtml(input.document, css, input.generatedAt), "utf8");
    } catch (err) {
      this.sink.log("error", "HTML rendering failed", {
        outputPath,
        error: err instanceof Error ? err.message : String(err)
      });
      return false;
    }

    this.sink.log("info", "HTML written", { outputPath, scheme: input.schemeId });
    return true;
  }
}
