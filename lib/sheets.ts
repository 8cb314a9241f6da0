/**
 * Google Sheets row store (JWT auth) for the project summary worksheet.
 *
 * Exports:
 * - createSheetsClient(account): sheets_v4.Sheets
 * - googleSheetsValues(sheets, spreadsheetId): SheetsValuesClient
 * - SheetsRowStore: RowStore over one worksheet
 *
 * Notes:
 * - Ensure the target spreadsheet is shared with the service account email.
 * - Reads use the sheet's formatted values; writes use USER_ENTERED so a
 *   formula such as =NOW() is evaluated by the sheet.
 */

import { google, type sheets_v4 } from "googleapis";
import { JWT } from "google-auth-library";
import type { ServiceAccount } from "./config";
import { CollaboratorError } from "./errors";

export const SHEETS_TIMEOUT_MS = 8000;

/**
 * Fixed columns (1-based) of the project summary sheet.
 * Header occupies row 1; projects start at row 2.
 */
export const COLUMNS = {
  projectName: 2, // B
  actual: 9, // I
  planned: 10, // J
  updateProgress: 18, // R
} as const;

export const HEADER_ROWS = 1;

/** Server-side "current time" marker written on every progress update. */
export const NOW_FORMULA = "=NOW()";

export type CellValue = string | number;

/**
 * One project row keyed by the header row's titles.
 */
export type ProjectRecord = Record<string, string>;

/**
 * Project rows as the bot sees them. Rows are never created or deleted.
 */
export interface RowStore {
  getAllRecords(): Promise<ProjectRecord[]>;
  /** Column B from the first row after the header, in sheet order. */
  getProjectNames(): Promise<string[]>;
  updateCell(row: number, col: number, value: CellValue): Promise<void>;
  getCell(row: number, col: number): Promise<string>;
}

/**
 * The two values calls the row store makes, by A1 range.
 */
export interface SheetsValuesClient {
  get(range: string): Promise<unknown[][]>;
  update(range: string, values: CellValue[][]): Promise<void>;
}

/**
 * Creates an authenticated Sheets client using a service account (JWT).
 */
export function createSheetsClient(account: ServiceAccount): sheets_v4.Sheets {
  const jwt = new JWT({
    email: account.email,
    key: account.privateKey,
    scopes: ["https://www.googleapis.com/auth/spreadsheets"],
  });
  return google.sheets({ version: "v4", auth: jwt });
}

export function googleSheetsValues(
  sheets: sheets_v4.Sheets,
  spreadsheetId: string,
  timeoutMs: number = SHEETS_TIMEOUT_MS,
): SheetsValuesClient {
  return {
    async get(range) {
      const res = await sheets.spreadsheets.values.get(
        { spreadsheetId, range, valueRenderOption: "FORMATTED_VALUE" },
        { timeout: timeoutMs },
      );
      return res.data.values ?? [];
    },
    async update(range, values) {
      await sheets.spreadsheets.values.update(
        {
          spreadsheetId,
          range,
          valueInputOption: "USER_ENTERED",
          requestBody: { values },
        },
        { timeout: timeoutMs },
      );
    },
  };
}

/**
 * 1 -> A, 26 -> Z, 27 -> AA.
 */
export function columnLetter(col: number): string {
  if (!Number.isInteger(col) || col < 1) {
    throw new RangeError(`column must be a positive integer, got ${col}`);
  }
  let n = col;
  let out = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

/**
 * Sheet titles are always quoted so spaces and apostrophes survive.
 */
export function quoteSheetName(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  return String(v);
}

export class SheetsRowStore implements RowStore {
  private readonly prefix: string;

  constructor(
    private readonly values: SheetsValuesClient,
    sheetName: string,
  ) {
    this.prefix = quoteSheetName(sheetName);
  }

  private cellRange(row: number, col: number): string {
    if (!Number.isInteger(row) || row < 1) {
      throw new RangeError(`row must be a positive integer, got ${row}`);
    }
    return `${this.prefix}!${columnLetter(col)}${row}`;
  }

  private async read(operation: string, range: string): Promise<unknown[][]> {
    try {
      return await this.values.get(range);
    } catch (err) {
      throw new CollaboratorError(operation, err);
    }
  }

  async getAllRecords(): Promise<ProjectRecord[]> {
    const rows = await this.read("sheets.getAllRecords", this.prefix);
    if (!rows.length) return [];

    const header = (rows[0] ?? []).map(cellText);
    return rows.slice(HEADER_ROWS).map((row) => {
      const record: ProjectRecord = {};
      header.forEach((title, i) => {
        record[title] = cellText(row[i]);
      });
      return record;
    });
  }

  async getProjectNames(): Promise<string[]> {
    const letter = columnLetter(COLUMNS.projectName);
    const first = HEADER_ROWS + 1;
    const rows = await this.read(
      "sheets.getProjectNames",
      `${this.prefix}!${letter}${first}:${letter}`,
    );
    return rows.map((row) => cellText(row[0]));
  }

  async updateCell(row: number, col: number, value: CellValue): Promise<void> {
    const range = this.cellRange(row, col);
    try {
      await this.values.update(range, [[value]]);
    } catch (err) {
      throw new CollaboratorError("sheets.updateCell", err);
    }
  }

  async getCell(row: number, col: number): Promise<string> {
    const rows = await this.read("sheets.getCell", this.cellRange(row, col));
    return cellText(rows[0]?.[0]);
  }
}
