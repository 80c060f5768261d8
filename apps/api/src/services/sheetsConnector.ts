import { google, type sheets_v4 } from "googleapis";
import type { RawRow } from "@catalog-builder/shared";
import type { DiagnosticsSink } from "../logger.js";
import type { SpreadsheetSource } from "./types.js";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets.readonly"];

export type SheetsCredentials =
  | { kind: "keyFile"; keyFile: string }
  | { kind: "serviceAccount"; clientEmail: string; privateKey: string };

export function credentialsFromEnv(env: {
  GOOGLE_APPLICATION_CREDENTIALS?: string;
  GOOGLE_CLIENT_EMAIL?: string;
  GOOGLE_PRIVATE_KEY?: string;
}): SheetsCredentials | null {
  if (env.GOOGLE_CLIENT_EMAIL && env.GOOGLE_PRIVATE_KEY) {
    return {
      kind: "serviceAccount",
      clientEmail: env.GOOGLE_CLIENT_EMAIL,
      // .env files usually store the key with escaped newlines
      privateKey: env.GOOGLE_PRIVATE_KEY.replace(/\\n/g, "\n")
    };
  }
  if (env.GOOGLE_APPLICATION_CREDENTIALS) {
    return { kind: "keyFile", keyFile: env.GOOGLE_APPLICATION_CREDENTIALS };
  }
  return null;
}

/**
 * Turns a values grid into rows keyed by the header row. Empty rows and rows
 * without a value in `nameColumn` are skipped; short rows read as "".
 */
export function valuesToRows(values: unknown[][], nameColumn: string): RawRow[] {
  const [header, ...rest] = values;
  if (!header) return [];
  const keys = header.map((h) => String(h ?? "").trim());

  const rows: RawRow[] = [];
  for (const arr of rest) {
    if (!arr || arr.length === 0) continue;
    const row: RawRow = {};
    keys.forEach((key, i) => {
      row[key] = arr[i] == null ? "" : String(arr[i]);
    });
    if (!String(row[nameColumn] ?? "").trim()) continue;
    rows.push(row);
  }
  return rows;
}

export class GoogleSheetsConnector implements SpreadsheetSource {
  private sheets: sheets_v4.Sheets | null = null;

  constructor(
    private readonly credentials: SheetsCredentials | null,
    private readonly options: { timeoutMs: number; nameColumn: string },
    private readonly sink: DiagnosticsSink
  ) {}

  async authenticate(): Promise<boolean> {
    if (!this.credentials) {
      this.sink.log(
        "error",
        "Google credentials missing: set GOOGLE_APPLICATION_CREDENTIALS or GOOGLE_CLIENT_EMAIL/GOOGLE_PRIVATE_KEY"
      );
      return false;
    }

    try {
      const auth =
        this.credentials.kind === "keyFile"
          ? new google.auth.GoogleAuth({ keyFile: this.credentials.keyFile, scopes: SCOPES })
          : new google.auth.JWT({
              email: this.credentials.clientEmail,
              key: this.credentials.privateKey,
              scopes: SCOPES
            });

      // Fail here rather than on the first read.
      await auth.getAccessToken();

      this.sheets = google.sheets({ version: "v4", auth });
      this.sink.log("info", "Authenticated with Google Sheets", { method: this.credentials.kind });
      return true;
    } catch (err) {
      this.sink.log("error", "Google Sheets authentication failed", {
        error: err instanceof Error ? err.message : String(err)
      });
      return false;
    }
  }

  async fetchRows(sheetId: string, sheetName: string): Promise<RawRow[]> {
    if (!this.sheets) throw new Error("Sheets client not initialized; call authenticate() first");

    const range = `${sheetName}!A1:Z1000`;
    const resp = await this.sheets.spreadsheets.values.get(
      { spreadsheetId: sheetId, range },
      { timeout: this.options.timeoutMs }
    );

    const values: unknown[][] = resp.data.values ?? [];
    const rows = valuesToRows(values, this.options.nameColumn);
    this.sink.log("debug", "Sheet values read", { range, values: values.length, rows: rows.length });
    return rows;
  }
}
