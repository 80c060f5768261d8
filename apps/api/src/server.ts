import Fastify from "fastify";
import cors from "@fastify/cors";
import { buildCatalogConfig, type CatalogConfig } from "./config.js";
import type { Env } from "./env.js";
import { loggerOptions } from "./logger.js";
import { catalogsRoutes } from "./routes/catalogs.js";
import { createDepsFactory, type DepsFactory } from "./services/container.js";

export type ServerOptions = {
  env: Env;
  config?: CatalogConfig;
  /** Tests swap in fakes here. */
  makeDeps?: DepsFactory;
};

export async function buildServer(options: ServerOptions) {
  const { env } = options;
  const config = options.config ?? buildCatalogConfig(env);
  const server = Fastify({
    logger: loggerOptions(env)
  });

  await server.register(cors, {
    origin: env.CORS_ORIGIN ? [env.CORS_ORIGIN] : true
  });

  server.get("/health", async () => ({ ok: true }));

  await server.register(catalogsRoutes, {
    config,
    defaultSheetName: env.SHEET_NAME,
    makeDeps: options.makeDeps ?? createDepsFactory(env, config)
  });

  return server;
}
