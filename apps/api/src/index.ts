import { loadEnv, loadEnvFiles } from "./env.js";
import { buildServer } from "./server.js";

loadEnvFiles();
const env = loadEnv();

const host = "0.0.0.0";

const server = await buildServer({ env });
await server.listen({ port: env.PORT, host });

server.log.info({ port: env.PORT }, "catalog api listening");
