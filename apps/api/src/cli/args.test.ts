import { describe, expect, it } from "vitest";
import { parseCliArgs } from "./args.js";

const env = { SPREADSHEET_ID: undefined, SHEET_NAME: "Sheet1" };

describe("parseCliArgs", () => {
  it("applies defaults around the spreadsheet id", () => {
    expect(parseCliArgs(["abc123"], env, { exitProcess: false })).toEqual({
      spreadsheetId: "abc123",
      sheetName: "Sheet1",
      output: undefined,
      type: "grid",
      format: "pdf",
      scheme: "default",
      logo: undefined,
      images: true,
      allSchemes: false
    });
  });

  it("reads every flag", () => {
    const options = parseCliArgs(
      [
        "abc123",
        "--sheet-name",
        "Produtos",
        "--output",
        "out/lista.html",
        "--type",
        "simple",
        "--format",
        "html",
        "--scheme",
        "dark_mode",
        "--logo",
        "logo.png",
        "--no-images",
        "--all-schemes"
      ],
      env,
      { exitProcess: false }
    );

    expect(options).toEqual({
      spreadsheetId: "abc123",
      sheetName: "Produtos",
      output: "out/lista.html",
      type: "simple",
      format: "html",
      scheme: "dark_mode",
      logo: "logo.png",
      images: false,
      allSchemes: true
    });
  });

  it("falls back to SPREADSHEET_ID", () => {
    const options = parseCliArgs([], { SPREADSHEET_ID: "from-env", SHEET_NAME: "Estoque" }, { exitProcess: false });
    expect(options.spreadsheetId).toBe("from-env");
    expect(options.sheetName).toBe("Estoque");
  });

  it("requires a spreadsheet id", () => {
    expect(() => parseCliArgs([], env, { exitProcess: false })).toThrow(
      "Missing spreadsheet id: pass it as the first argument or set SPREADSHEET_ID"
    );
  });

  it("rejects an unknown layout", () => {
    expect(() => parseCliArgs(["abc123", "--type", "poster"], env, { exitProcess: false })).toThrow();
  });
});
