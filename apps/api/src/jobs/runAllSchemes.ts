import path from "node:path";
import { ColorSchemeResolver } from "../domain/colorSchemes.js";
import { runCatalog, type CatalogDeps, type CatalogJob, type CatalogRunResult } from "./runCatalog.js";

export type SchemeBatchJob = Omit<CatalogJob, "outputPath" | "schemeId"> & { outputDir: string };

export type SchemeRun = { schemeId: string; result: CatalogRunResult };

export function schemeOutputPath(outputDir: string, schemeId: string, format: string): string {
  return path.join(outputDir, `catalogo_${schemeId}.${format}`);
}

/** One full run per available scheme; a cancelled run stops the batch. */
export async function runAllSchemes(job: SchemeBatchJob, deps: CatalogDeps): Promise<SchemeRun[]> {
  const schemes = await new ColorSchemeResolver(deps.palettes, deps.sink).resolveSchemes(job.logoPath);
  const { outputDir, ...base } = job;

  const runs: SchemeRun[] = [];
  for (const schemeId of Object.keys(schemes)) {
    deps.sink.log("info", "Generating catalog for scheme", { schemeId, name: schemes[schemeId]?.name });
    const result = await runCatalog(
      { ...base, schemeId, outputPath: schemeOutputPath(outputDir, schemeId, deps.renderer.format) },
      deps
    );
    runs.push({ schemeId, result });
    if (!result.ok && result.reason === "Cancelled") break;
  }

  const succeeded = runs.filter((r) => r.result.ok).length;
  deps.sink.log(succeeded === runs.length ? "info" : "warn", "Scheme batch finished", {
    succeeded,
    failed: runs.length - succeeded
  });
  return runs;
}
