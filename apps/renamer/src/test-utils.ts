import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import * as XLSX from "xlsx";
import type { SheetCell } from "./extract/spreadsheet";

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "meeting-renamer-test-"));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export async function touch(dir: string, name: string, content = ""): Promise<string> {
  const p = path.join(dir, name);
  await fs.writeFile(p, content, "utf8");
  return p;
}

export async function writeWorkbook(filePath: string, rows: SheetCell[][]): Promise<string> {
  return writeSheet(filePath, XLSX.utils.aoa_to_sheet(rows));
}

export async function writeSheet(filePath: string, sheet: XLSX.WorkSheet): Promise<string> {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, "Sheet1");
  const buf: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  await fs.writeFile(filePath, buf);
  return filePath;
}

/** Attendance export: header block, then one row per participant. */
export function attendanceRows(opts: {
  theme: string;
  number: string | number;
  participants: [SheetCell, SheetCell][];
}): SheetCell[][] {
  return [
    ["会议主题", opts.theme],
    ["会议号", opts.number],
    ["发起人", "host"],
    ["预定开始时间", null],
    [null, null],
    ["会议时长", null],
    [null, null],
    ["参会成员明细", null],
    ["用户昵称", "首次入会时间", "最后退会时间", "入会次数"],
    ...opts.participants.map(([join, leave], i): SheetCell[] => [
      `member-${i + 1}`,
      join,
      leave,
      1,
    ]),
  ];
}

/** Schedule export: start at row 3, duration at row 5, no participant table. */
export function scheduleRows(opts: {
  theme: string;
  number: string | number;
  start: SheetCell;
  duration: SheetCell;
}): SheetCell[][] {
  return [
    ["会议主题", opts.theme],
    ["会议号", opts.number],
    ["发起人", "host"],
    ["开始时间", opts.start],
    ["结束时间", null],
    ["会议时长", opts.duration],
  ];
}
