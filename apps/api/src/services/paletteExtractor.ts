import { Vibrant } from "node-vibrant/node";
import type { Rgb } from "@catalog-builder/shared";
import type { DiagnosticsSink } from "../logger.js";
import type { PaletteExtractor } from "./types.js";

export class VibrantPaletteExtractor implements PaletteExtractor {
  constructor(private readonly sink: DiagnosticsSink) {}

  async dominantPalette(imagePath: string, maxColors: number): Promise<Rgb[]> {
    try {
      const palette = await Vibrant.from(imagePath).getPalette();
      const swatches = Object.values(palette).flatMap((swatch) => (swatch ? [swatch] : []));
      swatches.sort((a, b) => b.population - a.population);

      return swatches.slice(0, maxColors).map((swatch): Rgb => {
        const [r, g, b] = swatch.rgb;
        return [Math.round(r), Math.round(g), Math.round(b)];
      });
    } catch (err) {
      this.sink.log("warn", "Could not read logo colors", {
        imagePath,
        error: err instanceof Error ? err.message : String(err)
      });
      return [];
    }
  }
}
