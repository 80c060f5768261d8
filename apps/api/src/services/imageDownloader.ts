import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { formatMegabytes } from "@catalog-builder/shared";
import type { DiagnosticsSink } from "../logger.js";
import type { ImageOptimizer } from "./imageOptimizer.js";
import type { DownloadStats, ImageAcquisition } from "./types.js";

export type DownloadOptions = {
  tempDir: string;
  timeoutMs: number;
  maxFileSize: number;
  allowedExtensions: string[];
};

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export function imageFileName(url: string, label: string, allowedExtensions: string[]): string {
  const urlHash = crypto.createHash("md5").update(url).digest("hex").slice(0, 8);
  const cleanName = Array.from(label)
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join("")
    .trimEnd()
    .replace(/ /g, "_")
    .slice(0, 20);

  let extension = "";
  try {
    extension = path.extname(new URL(url).pathname).toLowerCase();
  } catch {
    extension = "";
  }
  if (!allowedExtensions.includes(extension)) extension = ".jpg";

  return `${cleanName}_${urlHash}${extension}`;
}

export class ImageDownloader implements ImageAcquisition {
  private readonly browserLikeUserAgent =
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";
  private readonly downloaded = new Map<string, string>();
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: DownloadOptions,
    private readonly optimizer: ImageOptimizer,
    private readonly sink: DiagnosticsSink,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async download(url: string, label: string, signal?: AbortSignal): Promise<string | null> {
    const cached = this.downloaded.get(url);
    if (cached) return cached;

    const filepath = path.join(this.options.tempDir, imageFileName(url, label, this.options.allowedExtensions));

    try {
      const response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.browserLikeUserAgent, Accept: "image/*,*/*;q=0.8" },
        signal: this.requestSignal(signal)
      });
      if (!response.ok) {
        this.sink.log("warn", "Image request failed", { label, url, status: response.status });
        return null;
      }

      const declared = Number(response.headers.get("content-length") ?? 0);
      if (declared > this.options.maxFileSize) {
        this.sink.log("warn", "Image too large", { label, url, bytes: declared });
        return null;
      }

      const body = Buffer.from(await response.arrayBuffer());
      if (body.length > this.options.maxFileSize) {
        this.sink.log("warn", "Image too large", { label, url, bytes: body.length });
        return null;
      }

      await fs.mkdir(this.options.tempDir, { recursive: true });
      await fs.writeFile(filepath, body);
    } catch (err) {
      this.sink.log("warn", "Image download failed", {
        label,
        url,
        error: err instanceof Error ? err.message : String(err)
      });
      return null;
    }

    if (!(await this.optimizer.describe(filepath))) {
      this.sink.log("warn", "Downloaded file is not a valid image", { label, url });
      await fs.rm(filepath, { force: true });
      return null;
    }

    this.downloaded.set(url, filepath);
    this.sink.log("debug", "Image downloaded", { label, file: path.basename(filepath) });
    return filepath;
  }

  private requestSignal(caller?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    return caller ? AbortSignal.any([caller, timeout]) : timeout;
  }

  optimizeForDocument(localPath: string): Promise<Buffer | null> {
    return this.optimizer.optimizeForDocument(localPath);
  }

  /** Removes the files this downloader wrote. */
  async cleanup(): Promise<void> {
    const files = [...new Set(this.downloaded.values())];
    this.downloaded.clear();
    await Promise.all(files.map((file) => fs.rm(file, { force: true })));
    this.sink.log("debug", "Temporary images removed", { files: files.length });
  }

  async stats(): Promise<DownloadStats> {
    let tempFiles = 0;
    let totalSize = 0;
    for (const file of new Set(this.downloaded.values())) {
      const stat = await fs.stat(file).catch(() => null);
      if (!stat) continue;
      tempFiles += 1;
      totalSize += stat.size;
    }
    return {
      downloadedImages: this.downloaded.size,
      tempFiles,
      totalSizeMb: formatMegabytes(totalSize)
    };
  }
}
