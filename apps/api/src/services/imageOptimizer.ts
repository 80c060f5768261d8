import sharp from "sharp";
import type { DiagnosticsSink } from "../logger.js";

export type ImageOptions = {
  maxWidth: number;
  maxHeight: number;
  quality: number;
};

export type ImageInfo = {
  width: number;
  height: number;
  format: string;
};

export class ImageOptimizer {
  constructor(
    private readonly options: ImageOptions,
    private readonly sink: DiagnosticsSink
  ) {}

  /**
   * Fits the image inside the configured box (never enlarging), flattens
   * transparency onto white and re-encodes as JPEG. Null when the file is
   * missing or unreadable.
   */
  async optimizeForDocument(localPath: string): Promise<Buffer | null> {
    try {
      return await sharp(localPath)
        .rotate()
        .resize({
          width: this.options.maxWidth,
          height: this.options.maxHeight,
          fit: "inside",
          withoutEnlargement: true
        })
        .flatten({ background: "#ffffff" })
        .jpeg({ quality: this.options.quality })
        .toBuffer();
    } catch (err) {
      this.sink.log("warn", "Image optimization failed", {
        localPath,
        error: err instanceof Error ? err.message : String(err)
      });
      return null;
    }
  }

  async describe(localPath: string): Promise<ImageInfo | null> {
    try {
      const meta = await sharp(localPath).metadata();
      if (!meta.width || !meta.height || !meta.format) return null;
      return { width: meta.width, height: meta.height, format: meta.format };
    } catch {
      return null;
    }
  }
}
