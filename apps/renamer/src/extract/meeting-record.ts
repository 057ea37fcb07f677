import path from "node:path";
import {
  InvalidRecordError,
  MalformedScheduleError,
  MissingFileError,
  attendanceTiming,
  createMeetingRecord,
  diffSeconds,
  fromExcelSerial,
  parseDurationSeconds,
  parseLocalTimestamp,
  scheduleTiming,
  type LocalTimestamp,
  type MeetingRecord,
  type MeetingTiming,
} from "@meeting-renamer/core";
import type { SpreadsheetLayout } from "../config";
import { exists } from "../fs-util";
import {
  cellAt,
  readSpreadsheetRows,
  type SheetCell,
  type SheetRows,
} from "./spreadsheet";

type ParticipantHeader = {
  row: number;
  joinCol: number;
  leaveCol: number;
};

function cellText(cell: SheetCell): string | null {
  if (cell === null) return null;
  const text = String(cell).trim();
  return text === "" ? null : text;
}

function parseTimestampCell(cell: SheetCell): LocalTimestamp | null {
  if (typeof cell === "number") return fromExcelSerial(cell);
  if (typeof cell === "string") return parseLocalTimestamp(cell);
  return null;
}

function findParticipantHeader(
  rows: SheetRows,
  layout: SpreadsheetLayout
): ParticipantHeader | null {
  for (let r = layout.participantScanFrom; r < rows.length; r++) {
    const labels = (rows[r] ?? []).map(cellText);
    const joinCol = labels.indexOf(layout.joinColumn);
    const leaveCol = labels.indexOf(layout.leaveColumn);
    if (joinCol >= 0 && leaveCol >= 0) return { row: r, joinCol, leaveCol };
  }
  return null;
}

function earliest(values: LocalTimestamp[]): LocalTimestamp {
  return values.reduce((a, b) => (diffSeconds(b, a) < 0 ? b : a));
}

function latest(values: LocalTimestamp[]): LocalTimestamp {
  return values.reduce((a, b) => (diffSeconds(b, a) > 0 ? b : a));
}

function collectColumn(
  rows: SheetRows,
  header: ParticipantHeader,
  col: number,
  label: string
): LocalTimestamp[] {
  const out: LocalTimestamp[] = [];
  for (let r = header.row + 1; r < rows.length; r++) {
    const cell = cellAt(rows, r, col);
    if (cellText(cell) === null) continue;
    const ts = parseTimestampCell(cell);
    if (!ts) {
      throw new MalformedScheduleError(
        `Unparsable ${label} "${String(cell)}" in row ${r + 1}`
      );
    }
    out.push(ts);
  }
  return out;
}

function attendanceFromTable(
  rows: SheetRows,
  header: ParticipantHeader,
  layout: SpreadsheetLayout
): MeetingTiming {
  const joins = collectColumn(rows, header, header.joinCol, layout.joinColumn);
  const leaves = collectColumn(
    rows,
    header,
    header.leaveCol,
    layout.leaveColumn
  );
  if (joins.length === 0 && leaves.length === 0) {
    throw new MalformedScheduleError("Participant table is empty");
  }
  if (joins.length === 0) {
    throw new MalformedScheduleError(`No ${layout.joinColumn} values`);
  }
  if (leaves.length === 0) {
    throw new MalformedScheduleError(`No ${layout.leaveColumn} values`);
  }
  return attendanceTiming({
    earliestJoinTime: earliest(joins),
    earliestLeaveTime: earliest(leaves),
    latestLeaveTime: latest(leaves),
  });
}

function scheduleFromCells(
  rows: SheetRows,
  layout: SpreadsheetLayout
): MeetingTiming {
  const { scheduledStartCell: s, durationCell: d } = layout;
  const startCell = cellAt(rows, s.row, s.col);
  if (cellText(startCell) === null) {
    throw new MalformedScheduleError(
      "No participant table and no scheduled start time"
    );
  }
  const scheduledStartTime = parseTimestampCell(startCell);
  if (!scheduledStartTime) {
    throw new MalformedScheduleError(
      `Unparsable scheduled start "${String(startCell)}"`
    );
  }
  const durationCell = cellAt(rows, d.row, d.col);
  const durationSeconds =
    typeof durationCell === "number" || typeof durationCell === "string"
      ? parseDurationSeconds(durationCell)
      : null;
  if (durationSeconds === null) {
    throw new MalformedScheduleError(
      `Unparsable duration "${String(durationCell)}"`
    );
  }
  return scheduleTiming({ scheduledStartTime, durationSeconds });
}

/**
 * Builds a MeetingRecord from decoded rows. A participant table (located by
 * its join/leave column labels) takes precedence over the scheduled start
 * and duration cells.
 */
export function extractMeetingRecord(
  rows: SheetRows,
  spreadsheetPath: string,
  layout: SpreadsheetLayout
): MeetingRecord {
  const theme = cellText(
    cellAt(rows, layout.themeCell.row, layout.themeCell.col)
  );
  if (!theme) throw new InvalidRecordError("Missing meeting theme");
  const number = cellText(
    cellAt(rows, layout.numberCell.row, layout.numberCell.col)
  );
  if (!number) throw new InvalidRecordError("Missing meeting number");

  const header = findParticipantHeader(rows, layout);
  const timing = header
    ? attendanceFromTable(rows, header, layout)
    : scheduleFromCells(rows, layout);

  const absPath = path.resolve(spreadsheetPath);
  return createMeetingRecord({
    theme,
    number,
    timing,
    sourceDirectory: path.dirname(absPath),
    spreadsheetPath: absPath,
  });
}

export async function readMeetingRecord(
  spreadsheetPath: string,
  layout: SpreadsheetLayout
): Promise<MeetingRecord> {
  if (!(await exists(spreadsheetPath))) {
    throw new MissingFileError(spreadsheetPath, `Spreadsheet ${spreadsheetPath} not found`);
  }
  const rows = await readSpreadsheetRows(spreadsheetPath);
  return extractMeetingRecord(rows, spreadsheetPath, layout);
}
