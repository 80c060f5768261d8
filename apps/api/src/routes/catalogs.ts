import path from "node:path";
import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { CatalogConfig } from "../config.js";
import { BUILT_IN_SCHEMES, ColorSchemeResolver, listSchemes } from "../domain/colorSchemes.js";
import { runAllSchemes } from "../jobs/runAllSchemes.js";
import { runCatalog, type CatalogRunResult } from "../jobs/runCatalog.js";
import { createDiagnosticsSink } from "../logger.js";
import type { DepsFactory } from "../services/container.js";

export type CatalogRoutesOptions = {
  config: CatalogConfig;
  defaultSheetName: string;
  makeDeps: DepsFactory;
};

const SchemesQuery = z.object({
  logo_path: z.string().min(1).optional()
});

const CreateCatalogBody = z.object({
  spreadsheet_id: z.string().min(1),
  sheet_name: z.string().min(1).optional(),
  // A bare file name, written under OUTPUT_DIR.
  output_name: z
    .string()
    .regex(/^[\w.-]+$/, "must be a plain file name")
    .optional(),
  type: z.enum(["grid", "simple"]).default("grid"),
  format: z.enum(["pdf", "html"]).default("pdf"),
  scheme: z.string().min(1).default("default"),
  logo_path: z.string().min(1).optional(),
  include_images: z.boolean().default(true),
  all_schemes: z.boolean().default(false)
});

/** Runs share the temp directory, so they go one at a time. */
function serialQueue() {
  let tail: Promise<unknown> = Promise.resolve();
  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task);
    tail = run.catch(() => undefined);
    return run;
  };
}

function failure(result: Extract<CatalogRunResult, { ok: false }>) {
  return { error: result.reason, message: result.message, states: result.states };
}

export const catalogsRoutes: FastifyPluginAsync<CatalogRoutesOptions> = async (server, opts) => {
  const exclusive = serialQueue();

  server.get("/schemes", async (req, reply) => {
    const parsed = SchemesQuery.safeParse(req.query ?? {});
    if (!parsed.success) {
      return reply.status(400).send({
        error: "invalid_request",
        issues: parsed.error.issues
      });
    }

    const sink = createDiagnosticsSink(req.log);
    const schemes = parsed.data.logo_path
      ? await new ColorSchemeResolver(opts.makeDeps("pdf", sink).palettes, sink).resolveSchemes(
          parsed.data.logo_path
        )
      : BUILT_IN_SCHEMES;

    return reply.send({ schemes: listSchemes(schemes) });
  });

  server.post("/catalogs", async (req, reply) => {
    const parsed = CreateCatalogBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({
        error: "invalid_request",
        issues: parsed.error.issues
      });
    }

    const body = parsed.data;
    const deps = opts.makeDeps(body.format, createDiagnosticsSink(req.log));
    const base = {
      spreadsheetId: body.spreadsheet_id,
      sheetName: body.sheet_name ?? opts.defaultSheetName,
      mode: body.type,
      logoPath: body.logo_path,
      includeImages: body.include_images
    };

    if (body.all_schemes) {
      const runs = await exclusive(() => runAllSchemes({ ...base, outputDir: opts.config.outputDir }, deps));
      return reply.send({
        runs: runs.map(({ schemeId, result }) =>
          result.ok
            ? { scheme: schemeId, ok: true, output_path: result.outputPath }
            : { scheme: schemeId, ok: false, ...failure(result) }
        )
      });
    }

    const outputName = body.output_name ?? `catalogo_produtos.${body.format}`;
    const result = await exclusive(() =>
      runCatalog(
        { ...base, schemeId: body.scheme, outputPath: path.join(opts.config.outputDir, outputName) },
        deps
      )
    );

    if (!result.ok) return reply.status(422).send(failure(result));

    return reply.send({
      ok: true,
      output_path: result.outputPath,
      stats: result.stats,
      rejections: result.rejections,
      states: result.states
    });
  });
};
