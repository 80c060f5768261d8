import { existsSync } from "node:fs";
import { colord } from "colord";
import type {
  BaseColorRole,
  ColorRole,
  ColorScheme,
  ColorSchemeSet,
  DerivedColorRole,
  Rgb
} from "@catalog-builder/shared";
import type { DiagnosticsSink } from "../logger.js";
import type { PaletteExtractor } from "../services/types.js";

export const MAX_PALETTE_COLORS = 6;

export const ROLE_FALLBACKS: Record<DerivedColorRole, ColorRole> = {
  product_bg: "background",
  header_bg: "background",
  border: "accent",
  text_secondary: "text_primary",
  price: "accent",
  highlight: "accent"
};

const BASE_ROLES: readonly ColorRole[] = ["background", "accent", "text_primary"];

function isBaseRole(role: ColorRole): role is BaseColorRole {
  return BASE_ROLES.includes(role);
}

export function resolveRole(scheme: ColorScheme, role: ColorRole): string {
  if (isBaseRole(role)) return scheme[role];
  return scheme[role] ?? resolveRole(scheme, ROLE_FALLBACKS[role]);
}

export const BUILT_IN_SCHEMES: ColorSchemeSet = {
  default: {
    name: "Padrão",
    background: "#F28E30",
    product_bg: "#F28E30",
    header_bg: "#333333",
    border: "#00A79D",
    accent: "#6BC0C9",
    text_primary: "#333333",
    text_secondary: "#6BC0C9",
    price: "#7F4C9E",
    highlight: "#7AD0E0"
  },
  dark_mode: {
    name: "Modo Escuro",
    background: "#1C1C1C",
    product_bg: "#2D2D2D",
    header_bg: "#F28E30",
    border: "#00A79D",
    accent: "#7AD0E0",
    text_primary: "#FFFFFF",
    text_secondary: "#7AD0E0",
    price: "#7F4C9E",
    highlight: "#6BC0C9"
  },
  minimal: {
    name: "Minimalista",
    background: "#F8F8F8",
    product_bg: "#FFFFFF",
    header_bg: "#333333",
    border: "#DDDDDD",
    accent: "#00A79D",
    text_primary: "#333333",
    text_secondary: "#6BC0C9",
    price: "#F28E30",
    highlight: "#00A79D"
  }
};

// The colors of the unstyled base stylesheet.
export const BASE_STYLE: ColorScheme = {
  name: "Base",
  background: "#FFFFFF",
  product_bg: "#F8F9FA",
  header_bg: "#FFFFFF",
  border: "#BDC3C7",
  accent: "#3498DB",
  text_primary: "#2C3E50",
  text_secondary: "#7F8C8D",
  price: "#E74C3C"
};

function findScheme(schemes: ColorSchemeSet, schemeId: string): ColorScheme | undefined {
  return Object.hasOwn(schemes, schemeId) ? schemes[schemeId] : undefined;
}

/** Looks a scheme up by id; unknown ids keep the base style and warn. */
export function pickScheme(schemes: ColorSchemeSet, schemeId: string, sink: DiagnosticsSink): ColorScheme {
  const scheme = findScheme(schemes, schemeId);
  if (scheme) return scheme;
  sink.log("warn", `Unknown color scheme "${schemeId}", keeping base style`, {
    code: "UnknownColorScheme",
    available: Object.keys(schemes)
  });
  return BASE_STYLE;
}

export function rgbToHex([r, g, b]: Rgb): string {
  return colord({ r, g, b }).toHex().toUpperCase();
}

/** Adds `factor` to the HSL lightness, clamped to [0, 1]. */
export function lighten(color: string, factor: number): string {
  return colord(color).lighten(factor).toHex().toUpperCase();
}

export function darken(color: string, factor: number): string {
  return colord(color).darken(factor).toHex().toUpperCase();
}

export function isGradient(value: string | undefined): boolean {
  return /gradient\(/i.test(value ?? "");
}

export function deriveSchemes(palette: readonly Rgb[]): ColorSchemeSet {
  if (palette.length === 0) return BUILT_IN_SCHEMES;

  const primary = rgbToHex(palette[0]);
  const secondary = palette[1] ? rgbToHex(palette[1]) : primary;
  const accent = palette[2] ? rgbToHex(palette[2]) : secondary;

  const primaryLight = lighten(primary, 0.4);
  const primaryDark = darken(primary, 0.3);
  const secondaryLight = lighten(secondary, 0.5);
  const accentLight = lighten(accent, 0.6);

  return {
    default: {
      name: "Padrão",
      background: primaryLight,
      product_bg: "#FFFFFF",
      header_bg: primary,
      border: secondary,
      accent,
      text_primary: "#333333",
      text_secondary: primaryDark,
      price: primaryDark,
      highlight: accent
    },
    dark_mode: {
      name: "Modo Escuro",
      background: darken(primary, 0.45),
      product_bg: "#2D2D2D",
      header_bg: primary,
      border: secondary,
      accent: accentLight,
      text_primary: "#FFFFFF",
      text_secondary: secondaryLight,
      price: accentLight,
      highlight: secondaryLight
    },
    minimal: {
      name: "Minimalista",
      background: "#F8F8F8",
      product_bg: "#FFFFFF",
      header_bg: "#333333",
      border: "#DDDDDD",
      accent: primary,
      text_primary: "#333333",
      text_secondary: primaryDark,
      price: primary
    },
    gradient: {
      name: "Gradiente",
      background: secondaryLight,
      product_bg: "#FFFFFF",
      header_bg: `linear-gradient(135deg, ${primary} 0%, ${secondary} 100%)`,
      border: accent,
      accent,
      text_primary: "#333333",
      text_secondary: primaryDark,
      price: primaryDark,
      highlight: accentLight
    }
  };
}

export function listSchemes(schemes: ColorSchemeSet): Record<string, string> {
  return Object.fromEntries(Object.entries(schemes).map(([id, scheme]) => [id, scheme.name]));
}

export class ColorSchemeResolver {
  constructor(
    private readonly palettes: PaletteExtractor,
    private readonly sink: DiagnosticsSink
  ) {}

  /** Never throws; any logo problem falls back to the built-in schemes. */
  async resolveSchemes(logoPath?: string): Promise<ColorSchemeSet> {
    if (!logoPath) {
      this.sink.log("info", "Using built-in color schemes");
      return BUILT_IN_SCHEMES;
    }

    if (!existsSync(logoPath)) {
      this.sink.log("warn", "Logo file not found, using built-in color schemes", { logoPath });
      return BUILT_IN_SCHEMES;
    }

    let palette: Rgb[];
    try {
      palette = await this.palettes.dominantPalette(logoPath, MAX_PALETTE_COLORS);
    } catch (err) {
      this.sink.log("warn", "Palette extraction failed, using built-in color schemes", {
        logoPath,
        error: err instanceof Error ? err.message : String(err)
      });
      return BUILT_IN_SCHEMES;
    }

    if (palette.length === 0) {
      this.sink.log("warn", "No colors extracted from logo, using built-in color schemes", { logoPath });
      return BUILT_IN_SCHEMES;
    }

    const schemes = deriveSchemes(palette.slice(0, MAX_PALETTE_COLORS));
    this.sink.log("info", "Derived color schemes from logo", {
      logoPath,
      colors: palette.length,
      schemes: Object.keys(schemes)
    });
    return schemes;
  }
}

function substitutions(scheme: ColorScheme): Array<[string, string]> {
  const background = resolveRole(scheme, "background");
  return [
    ["background-color: #fff;", `background-color: ${background};`],
    ["background: #fff;", `background: ${background};`],
    ["border-bottom: 2px solid #e74c3c;", `border-bottom: 2px solid ${resolveRole(scheme, "border")};`],
    ["color: #2c3e50;", `color: ${resolveRole(scheme, "text_primary")};`],
    ["color: #7f8c8d;", `color: ${resolveRole(scheme, "text_secondary")};`],
    ["color: #e74c3c;", `color: ${resolveRole(scheme, "price")};`],
    ["border-left: 2px solid #3498db;", `border-left: 2px solid ${resolveRole(scheme, "accent")};`],
    ["background-color: #f8f9fa;", `background-color: ${resolveRole(scheme, "product_bg")};`],
    ["color: #333;", `color: ${resolveRole(scheme, "text_primary")};`],
    ["color: #666;", `color: ${resolveRole(scheme, "text_secondary")};`]
  ];
}

function overrideBlock(scheme: ColorScheme): string {
  const background = resolveRole(scheme, "background");
  const textPrimary = resolveRole(scheme, "text_primary");
  const textSecondary = resolveRole(scheme, "text_secondary");
  return `
/* color scheme: ${scheme.name} */
@page {
  background: ${background};
}

html, body {
  background: ${background} !important;
  min-height: 100vh;
  margin: 0;
  padding: 0;
}

.container {
  background: ${background} !important;
  min-height: 100vh;
}

.header {
  background-color: ${resolveRole(scheme, "header_bg")} !important;
  color: ${textPrimary} !important;
}

.header .title {
  color: ${textPrimary} !important;
}

.header .subtitle {
  color: ${textSecondary} !important;
}

.produto {
  background-color: ${resolveRole(scheme, "product_bg")} !important;
  border-color: ${resolveRole(scheme, "border")} !important;
}

.produto .nome {
  color: ${textPrimary} !important;
}

.produto .descricao,
.produto .detalhe {
  color: ${textSecondary} !important;
}

.produto .preco {
  color: ${resolveRole(scheme, "price")} !important;
}

.highlight {
  color: ${resolveRole(scheme, "highlight")} !important;
}

.accent-border {
  border-color: ${resolveRole(scheme, "accent")} !important;
}
`;
}

function gradientHeaderBlock(scheme: ColorScheme): string {
  return `
/* gradient header */
.header {
  background: ${resolveRole(scheme, "header_bg")} !important;
  color: ${resolveRole(scheme, "text_primary")} !important;
}

.header .title {
  color: ${resolveRole(scheme, "text_primary")} !important;
}

.header .subtitle {
  color: ${resolveRole(scheme, "text_secondary")} !important;
}
`;
}

/**
 * Recolors a base stylesheet. Literal tokens are substituted first, then the
 * scheme override block is appended so it wins over anything above it. A
 * gradient header gets its own block after that.
 */
export function applyScheme(
  css: string,
  schemeId: string,
  schemes: ColorSchemeSet,
  sink: DiagnosticsSink
): string {
  const scheme = findScheme(schemes, schemeId);
  if (!scheme) {
    sink.log("warn", `Unknown color scheme "${schemeId}", keeping original stylesheet`, {
      code: "UnknownColorScheme",
      available: Object.keys(schemes)
    });
    return css;
  }

  let out = css;
  for (const [from, to] of substitutions(scheme)) {
    out = out.split(from).join(to);
  }

  out += overrideBlock(scheme);
  if (isGradient(scheme.header_bg)) out += gradientHeaderBlock(scheme);
  return out;
}
