import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

// dotenv leaves blank assignments as "", which should read as unset.
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const optionalString = z.preprocess(blankAsUndefined, z.string().min(1).optional());

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),
  PORT: z.coerce.number().int().positive().default(4100),
  CORS_ORIGIN: optionalString,
  SPREADSHEET_ID: optionalString,
  SHEET_NAME: z.string().min(1).default("Sheet1"),
  // Service account credentials: a key file, or the email + private key pair.
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  GOOGLE_CLIENT_EMAIL: optionalString,
  GOOGLE_PRIVATE_KEY: optionalString,
  OUTPUT_DIR: z.string().min(1).default("output"),
  TEMP_DIR: z.string().min(1).default("temp"),
  IMAGE_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SHEETS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CATALOG_COLUMNS: z.coerce.number().int().min(1).max(6).default(2),
  CATALOG_ROWS_PER_PAGE: z.coerce.number().int().min(1).max(10).default(4)
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }
  return parsed.data;
}

/**
 * Loads .env files without overriding variables already set. Commands run
 * from `apps/api` or from the repo root, so both locations are tried.
 */
export function loadEnvFiles(cwd = process.cwd()): string[] {
  const candidates = [
    path.resolve(cwd, ".env"),
    path.resolve(cwd, "..", "..", ".env")
  ];

  const loaded: string[] = [];
  for (const p of candidates) {
    if (!fs.existsSync(p)) continue;
    dotenv.config({ path: p, override: false });
    loaded.push(p);
  }
  return loaded;
}
