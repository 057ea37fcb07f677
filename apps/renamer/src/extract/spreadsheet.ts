import fs from "node:fs/promises";
import {
  MalformedScheduleError,
  MissingFileError,
  describeError,
} from "@meeting-renamer/core";
import * as XLSX from "xlsx";
import { errnoCode } from "../fs-util";

export type SheetCell = string | number | boolean | null;

export type SheetRows = SheetCell[][];

function toCell(value: unknown): SheetCell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value.trim() === "" ? null : value;
  if (typeof value === "number" || typeof value === "boolean") return value;
  return String(value);
}

/**
 * Rows of the first worksheet indexed from A1, whatever the used range:
 * blank rows stay in place and empty cells are null. Date cells come back as
 * Excel serials.
 */
export function decodeWorkbook(buf: Buffer): SheetRows {
  const workbook = XLSX.read(buf, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) throw new MalformedScheduleError("Workbook has no sheets");
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) throw new MalformedScheduleError("Workbook has no sheets");
  const ref = sheet["!ref"];
  if (!ref) return [];
  const range = XLSX.utils.decode_range(ref);
  range.s.r = 0;
  range.s.c = 0;
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range,
    raw: true,
    defval: null,
    blankrows: true,
  });
  return rows.map((row) => (Array.isArray(row) ? row.map(toCell) : []));
}

export async function readSpreadsheetRows(filePath: string): Promise<SheetRows> {
  let buf: Buffer;
  try {
    buf = await fs.readFile(filePath);
  } catch (e: unknown) {
    if (errnoCode(e) === "ENOENT") throw new MissingFileError(filePath);
    throw e;
  }
  try {
    return decodeWorkbook(buf);
  } catch (e: unknown) {
    if (e instanceof MalformedScheduleError) throw e;
    throw new MalformedScheduleError(
      `Unreadable spreadsheet ${filePath}: ${describeError(e)}`
    );
  }
}

export function cellAt(rows: SheetRows, row: number, col: number): SheetCell {
  return rows[row]?.[col] ?? null;
}
