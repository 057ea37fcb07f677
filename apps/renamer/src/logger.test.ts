import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { Logger, formatLogLine, type LogEvent } from "./logger";
import { withTempDir } from "./test-utils";

describe("Logger", () => {
  test("keeps a bounded buffer and notifies subscribers", () => {
    const logger = new Logger({ maxBuffer: 2 });
    const seen: string[] = [];
    const unsubscribe = logger.subscribe((evt) => seen.push(evt.event));
    logger.info("a");
    logger.warn("b");
    unsubscribe();
    logger.error("c", { spreadsheet: "/m/x.xlsx" });

    expect(seen).toEqual(["a", "b"]);
    expect(logger.getRecent().map((e) => e.event)).toEqual(["b", "c"]);
    expect(logger.getRecent(1)[0]?.data).toEqual({ spreadsheet: "/m/x.xlsx" });
  });

  test("appends JSONL when a logs dir is set", async () => {
    await withTempDir(async (dir) => {
      const logsDir = path.join(dir, "logs");
      const logger = new Logger({ logsDir });
      logger.info("batch.start", { found: 1 });
      logger.info("batch.summary", { renamed: 1 });
      await logger.flush();

      const [file] = await fs.readdir(logsDir);
      expect(file).toMatch(/^renamer-\d{4}-\d{2}-\d{2}\.jsonl$/);
      const lines = (await fs.readFile(path.join(logsDir, file ?? ""), "utf8"))
        .trim()
        .split("\n")
        .map((l) => JSON.parse(l) as LogEvent);
      expect(lines.map((l) => l.event)).toEqual(["batch.start", "batch.summary"]);
    });
  });

  test("flush surfaces a failed append", async () => {
    await withTempDir(async (dir) => {
      const blocker = path.join(dir, "not-a-dir");
      await fs.writeFile(blocker, "", "utf8");
      const logger = new Logger({ logsDir: blocker });
      logger.info("x");
      await expect(logger.flush()).rejects.toThrow();
      await expect(logger.flush()).resolves.toBeUndefined();
    });
  });
});

describe("formatLogLine", () => {
  test("renders level, event, message and data", () => {
    expect(
      formatLogLine({
        ts: "2023-09-12T10:00:00.000Z",
        level: "info",
        event: "batch.no_spreadsheets",
        msg: "No spreadsheet files found.",
        data: { found: 0 },
      })
    ).toBe(
      '2023-09-12T10:00:00.000Z INFO batch.no_spreadsheets No spreadsheet files found. {"found":0}'
    );
  });
});
