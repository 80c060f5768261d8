import path from "node:path";
import { hideBin } from "yargs/helpers";
import { parseCliArgs } from "./cli/args.js";
import { buildCatalogConfig } from "./config.js";
import { loadEnv, loadEnvFiles } from "./env.js";
import { runAllSchemes } from "./jobs/runAllSchemes.js";
import { runCatalog } from "./jobs/runCatalog.js";
import { createDiagnosticsSink, createLogger } from "./logger.js";
import { createDepsFactory } from "./services/container.js";

loadEnvFiles();
const env = loadEnv();
const logger = createLogger(env);

async function main(): Promise<boolean> {
  const options = parseCliArgs(hideBin(process.argv), env);
  const config = buildCatalogConfig(env);
  const deps = createDepsFactory(env, config)(options.format, createDiagnosticsSink(logger));

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("interrupted, cancelling run");
    controller.abort();
  });

  const base = {
    spreadsheetId: options.spreadsheetId,
    sheetName: options.sheetName,
    mode: options.type,
    logoPath: options.logo,
    includeImages: options.images,
    signal: controller.signal
  };

  if (options.allSchemes) {
    const runs = await runAllSchemes({ ...base, outputDir: config.outputDir }, deps);
    for (const { schemeId, result } of runs) {
      if (result.ok) logger.info({ scheme: schemeId, outputPath: result.outputPath }, "catalog written");
      else logger.error({ scheme: schemeId, reason: result.reason }, result.message);
    }
    return runs.length > 0 && runs.every((r) => r.result.ok);
  }

  const outputPath = options.output
    ? path.resolve(options.output)
    : path.join(config.outputDir, `catalogo_produtos.${options.format}`);

  const result = await runCatalog({ ...base, schemeId: options.scheme, outputPath }, deps);
  if (!result.ok) {
    logger.error({ reason: result.reason }, result.message);
    return false;
  }

  logger.info(
    { outputPath: result.outputPath, products: result.stats.count, rejected: result.rejections.length },
    "catalog written"
  );
  return true;
}

main()
  .then((ok) => {
    process.exitCode = ok ? 0 : 1;
  })
  .catch((err: unknown) => {
    logger.error({ err }, "catalog-builder failed");
    process.exitCode = 1;
  });
