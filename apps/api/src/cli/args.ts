import yargs from "yargs";
import type { CatalogMode } from "@catalog-builder/shared";
import type { Env } from "../env.js";
import type { OutputFormat } from "../services/container.js";

export type CliOptions = {
  spreadsheetId: string;
  sheetName: string;
  output?: string;
  type: CatalogMode;
  format: OutputFormat;
  scheme: string;
  logo?: string;
  images: boolean;
  allSchemes: boolean;
};

export function parseCliArgs(
  args: string[],
  env: Pick<Env, "SPREADSHEET_ID" | "SHEET_NAME">,
  { exitProcess = true }: { exitProcess?: boolean } = {}
): CliOptions {
  let parser = yargs(args)
    .scriptName("catalog-builder")
    .usage("$0 [spreadsheetId] [options]")
    .option("sheet-name", { type: "string", default: env.SHEET_NAME, describe: "Worksheet to read" })
    .option("output", { type: "string", describe: "Output file (default: OUTPUT_DIR/catalogo_produtos.<format>)" })
    .option("type", { choices: ["grid", "simple"] as const, default: "grid" as const, describe: "Catalog layout" })
    .option("format", { choices: ["pdf", "html"] as const, default: "pdf" as const, describe: "Output format" })
    .option("scheme", { type: "string", default: "default", describe: "Color scheme id" })
    .option("logo", { type: "string", describe: "Logo image to derive color schemes from" })
    .option("images", { type: "boolean", default: true, describe: "Download product images (--no-images to skip)" })
    .option("all-schemes", { type: "boolean", default: false, describe: "Write one catalog per color scheme" })
    .help();

  if (!exitProcess) {
    parser = parser.exitProcess(false).fail((msg, err) => {
      throw err ?? new Error(msg);
    });
  }

  const argv = parser.parseSync();
  const positional = argv._[0];
  const spreadsheetId = positional !== undefined ? String(positional) : env.SPREADSHEET_ID;
  if (!spreadsheetId) {
    throw new Error("Missing spreadsheet id: pass it as the first argument or set SPREADSHEET_ID");
  }

  return {
    spreadsheetId,
    sheetName: argv.sheetName,
    output: argv.output,
    type: argv.type,
    format: argv.format,
    scheme: argv.scheme,
    logo: argv.logo,
    images: argv.images,
    allSchemes: argv.allSchemes
  };
}
