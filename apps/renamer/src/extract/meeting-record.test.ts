import path from "node:path";
import {
  InvalidRecordError,
  MalformedScheduleError,
  MissingFileError,
} from "@meeting-renamer/core";
import { describe, expect, test } from "vitest";
import { loadConfig } from "../config";
import {
  attendanceRows,
  scheduleRows,
  withTempDir,
  writeSheet,
  writeWorkbook,
} from "../test-utils";
import { extractMeetingRecord, readMeetingRecord } from "./meeting-record";

const layout = loadConfig().layout;
const sheetPath = "/meetings/Q3 Planning-713309188-a1.xlsx";

describe("extractMeetingRecord", () => {
  test("takes join minimum and leave extremes from the participant table", () => {
    const rows = attendanceRows({
      theme: "Q3 Planning",
      number: "713309188",
      participants: [
        ["2023-09-12 10:01:10", "2023-09-12 10:59:30"],
        ["2023-09-12 09:58:03", "2023-09-12 11:00:00"],
        ["2023-09-12 10:20:00", "2023-09-12 10:45:12"],
      ],
    });
    const record = extractMeetingRecord(rows, sheetPath, layout);
    expect(record.theme).toBe("Q3 Planning");
    expect(record.number).toBe("713309188");
    expect(record.timing).toEqual({
      source: "attendance",
      earliestJoinTime: "2023-09-12T09:58:03",
      earliestLeaveTime: "2023-09-12T10:45:12",
      latestLeaveTime: "2023-09-12T11:00:00",
    });
    expect(record.sourceDirectory).toBe(path.resolve("/meetings"));
    expect(record.spreadsheetPath).toBe(path.resolve(sheetPath));
    expect(record.canonicalBaseName).toBe("【2023-09-12】Q3 Planning");
  });

  test("renders numeric meeting numbers without a fraction", () => {
    const rows = attendanceRows({
      theme: "Q3 Planning",
      number: 713309188,
      participants: [["2023-09-12 09:58:03", "2023-09-12 11:00:00"]],
    });
    expect(extractMeetingRecord(rows, sheetPath, layout).number).toBe(
      "713309188"
    );
  });

  test("ignores blank cells and accepts date serials", () => {
    const rows = attendanceRows({
      theme: "Q3 Planning",
      number: "713309188",
      participants: [
        [45181.4153125, null],
        [null, "2023-09-12 11:00:00"],
      ],
    });
    const record = extractMeetingRecord(rows, sheetPath, layout);
    expect(record.timing).toEqual({
      source: "attendance",
      earliestJoinTime: "2023-09-12T09:58:03",
      earliestLeaveTime: "2023-09-12T11:00:00",
      latestLeaveTime: "2023-09-12T11:00:00",
    });
  });

  test("an empty participant table is a malformed schedule", () => {
    const rows = attendanceRows({
      theme: "Q3 Planning",
      number: "713309188",
      participants: [],
    });
    expect(() => extractMeetingRecord(rows, sheetPath, layout)).toThrow(
      MalformedScheduleError
    );
  });

  test("an unparsable join time is a malformed schedule", () => {
    const rows = attendanceRows({
      theme: "Q3 Planning",
      number: "713309188",
      participants: [["soon", "2023-09-12 11:00:00"]],
    });
    expect(() => extractMeetingRecord(rows, sheetPath, layout)).toThrow(
      'Unparsable 首次入会时间 "soon" in row 10'
    );
  });

  test("falls back to scheduled start plus duration", () => {
    const rows = scheduleRows({
      theme: "Weekly Sync",
      number: "123456789",
      start: "2023-09-12 10:00:00",
      duration: "1:30:00",
    });
    const record = extractMeetingRecord(rows, sheetPath, layout);
    expect(record.timing).toEqual({
      source: "schedule",
      scheduledStartTime: "2023-09-12T10:00:00",
      durationSeconds: 5400,
      endTime: "2023-09-12T11:30:00",
    });
    expect(record.canonicalBaseName).toBe("【2023-09-12】Weekly Sync");
  });

  test("a non-numeric duration is a malformed schedule", () => {
    const rows = scheduleRows({
      theme: "Weekly Sync",
      number: "123456789",
      start: "2023-09-12 10:00:00",
      duration: "an hour",
    });
    expect(() => extractMeetingRecord(rows, sheetPath, layout)).toThrow(
      MalformedScheduleError
    );
  });

  test("an unparsable start is a malformed schedule", () => {
    const rows = scheduleRows({
      theme: "Weekly Sync",
      number: "123456789",
      start: "2023-13-45 10:00:00",
      duration: "1:00:00",
    });
    expect(() => extractMeetingRecord(rows, sheetPath, layout)).toThrow(
      MalformedScheduleError
    );
  });

  test("a missing theme is an invalid record", () => {
    const rows = scheduleRows({
      theme: "",
      number: "123456789",
      start: "2023-09-12 10:00:00",
      duration: "1:00:00",
    });
    expect(() => extractMeetingRecord(rows, sheetPath, layout)).toThrow(
      InvalidRecordError
    );
  });
});

describe("readMeetingRecord", () => {
  test("reads an xlsx file", async () => {
    await withTempDir(async (dir) => {
      const file = await writeWorkbook(
        path.join(dir, "Q3 Planning-713309188-a1.xlsx"),
        attendanceRows({
          theme: "Q3 Planning",
          number: 713309188,
          participants: [
            ["2023-09-12 09:58:03", "2023-09-12 11:00:00"],
            [45181.42, "2023-09-12 10:30:00"],
          ],
        })
      );
      const record = await readMeetingRecord(file, layout);
      expect(record.sourceDirectory).toBe(dir);
      expect(record.number).toBe("713309188");
      expect(record.timing).toEqual({
        source: "attendance",
        earliestJoinTime: "2023-09-12T09:58:03",
        earliestLeaveTime: "2023-09-12T10:30:00",
        latestLeaveTime: "2023-09-12T11:00:00",
      });
    });
  });

  test("reads the fixed cells when column A is empty", async () => {
    await withTempDir(async (dir) => {
      const file = await writeSheet(path.join(dir, "Weekly Sync-123456789-b2.xlsx"), {
        "!ref": "B1:B6",
        B1: { t: "s", v: "Weekly Sync" },
        B2: { t: "s", v: "123456789" },
        B4: { t: "s", v: "2023-09-12 10:00:00" },
        B6: { t: "s", v: "1:00:00" },
      });
      const record = await readMeetingRecord(file, layout);
      expect(record.theme).toBe("Weekly Sync");
      expect(record.number).toBe("123456789");
      expect(record.timing).toEqual({
        source: "schedule",
        scheduledStartTime: "2023-09-12T10:00:00",
        durationSeconds: 3600,
        endTime: "2023-09-12T11:00:00",
      });
    });
  });

  test("a missing spreadsheet is a missing file", async () => {
    await withTempDir(async (dir) => {
      await expect(
        readMeetingRecord(path.join(dir, "gone-1-a.xlsx"), layout)
      ).rejects.toBeInstanceOf(MissingFileError);
    });
  });
});
