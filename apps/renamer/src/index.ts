import { parseArgs } from "node:util";
import { describeError } from "@meeting-renamer/core";
import { processMeetings } from "./batch/process-meetings";
import { loadConfig, loadConfigFile, type RenamerConfigInput } from "./config";
import { Logger, formatLogLine } from "./logger";

const USAGE = "usage: meeting-renamer <directory> [--config file.json] [--dry-run]";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    config: { type: "string" },
    "dry-run": { type: "boolean", default: false },
  },
});

const rootDir = positionals[0];
if (!rootDir) {
  console.error(USAGE);
  process.exit(2);
}

const overrides: RenamerConfigInput = values["dry-run"] ? { dryRun: true } : {};

try {
  const config = values.config
    ? await loadConfigFile(values.config, overrides)
    : loadConfig(overrides);
  const logger = new Logger({ logsDir: config.logsDir });
  logger.subscribe((evt) => {
    const line = formatLogLine(evt);
    if (evt.level === "error" || evt.level === "warn") console.error(line);
    else console.log(line);
  });

  const result = await processMeetings({ rootDir, config, logger });
  await logger.flush();
  console.log(
    `${result.processed} processed, ${result.renamed} renamed, ${result.skipped} skipped, ${result.failed} failed`
  );
} catch (e: unknown) {
  console.error(`meeting-renamer: ${describeError(e)}`);
  process.exitCode = 1;
}
