import path from "node:path";
import {
  admit,
  describeError,
  generatePatterns,
  isCanonicalName,
  isRenamerError,
  type RenamerError,
} from "@meeting-renamer/core";
import type { RenamerConfig } from "../config";
import { readMeetingRecord } from "../extract/meeting-record";
import type { Logger } from "../logger";
import { findMatchingFiles } from "../match/directory";
import { resolveMeetingArtifacts } from "../match/resolver";
import {
  applyRenames,
  planRenames,
  type RenameOperation,
} from "../rename/rename";

export type OutcomeError = {
  code: string;
  error: string;
  details?: string;
};

export type MeetingOutcome =
  | {
      status: "renamed";
      spreadsheet: string;
      canonicalBaseName: string;
      renames: RenameOperation[];
      rejections: OutcomeError[];
    }
  | {
      status: "skipped";
      spreadsheet: string;
      canonicalBaseName: string;
      reasons: OutcomeError[];
    }
  | { status: "failed"; spreadsheet: string; error: OutcomeError };

export type BatchResult = {
  rootDir: string;
  dryRun: boolean;
  found: number;
  processed: number;
  renamed: number;
  skipped: number;
  failed: number;
  outcomes: MeetingOutcome[];
};

function toOutcomeError(e: unknown): OutcomeError {
  if (isRenamerError(e)) return e.toJSON();
  return { code: "UNEXPECTED", error: describeError(e) };
}

/** Spreadsheets still waiting to be processed, in name order. */
export async function discoverSpreadsheets(
  rootDir: string,
  pattern: string
): Promise<string[]> {
  const found = await findMatchingFiles(rootDir, [pattern]);
  return found.filter((p) => !isCanonicalName(path.basename(p)));
}

async function processMeeting(
  spreadsheet: string,
  config: RenamerConfig,
  logger: Logger
): Promise<MeetingOutcome> {
  const record = await readMeetingRecord(spreadsheet, config.layout);
  const patterns = generatePatterns(record, {
    tolerance: config.tolerance,
    leaveAnchors: config.leaveAnchors,
  });
  logger.debug("meeting.candidates", {
    spreadsheet,
    canonicalBaseName: record.canonicalBaseName,
    video: patterns.video.length,
    transcription: patterns.transcription.length,
    summary: patterns.summary.length,
  });
  const matches = await resolveMeetingArtifacts(record, patterns);
  const admission = admit(matches, config.admission);

  const rejections = admission.rejections.map((e: RenamerError) => {
    logger.warn("artifact.rejected", {
      spreadsheet,
      code: e.code,
      error: e.message,
    });
    return e.toJSON();
  });

  if (!admission.admitted) {
    logger.warn("meeting.skipped", {
      spreadsheet,
      admission: config.admission,
      reasons: rejections.map((r) => r.error),
    });
    return {
      status: "skipped",
      spreadsheet,
      canonicalBaseName: record.canonicalBaseName,
      reasons: rejections,
    };
  }

  const ops = planRenames(record, admission.artifacts);
  const renames = await applyRenames(ops, { dryRun: config.dryRun });
  logger.info(config.dryRun ? "meeting.planned" : "meeting.renamed", {
    spreadsheet,
    canonicalBaseName: record.canonicalBaseName,
    renames: renames.map((op) => ({
      kind: op.kind,
      from: path.basename(op.from),
      to: path.basename(op.to),
    })),
  });
  return {
    status: "renamed",
    spreadsheet,
    canonicalBaseName: record.canonicalBaseName,
    renames,
    rejections,
  };
}

/**
 * Processes every pending meeting spreadsheet directly under `rootDir`, one
 * at a time. A missing root is fatal; any per-meeting failure is logged,
 * recorded and skipped.
 */
export async function processMeetings(opts: {
  rootDir: string;
  config: RenamerConfig;
  logger: Logger;
}): Promise<BatchResult> {
  const { config, logger } = opts;
  const rootDir = path.resolve(opts.rootDir);
  const spreadsheets = await discoverSpreadsheets(
    rootDir,
    config.spreadsheetPattern
  );

  const result: BatchResult = {
    rootDir,
    dryRun: config.dryRun,
    found: spreadsheets.length,
    processed: 0,
    renamed: 0,
    skipped: 0,
    failed: 0,
    outcomes: [],
  };

  if (spreadsheets.length === 0) {
    logger.info(
      "batch.no_spreadsheets",
      { rootDir, pattern: config.spreadsheetPattern },
      "No spreadsheet files found."
    );
    return result;
  }

  logger.info("batch.start", {
    rootDir,
    found: spreadsheets.length,
    admission: config.admission,
    tolerance: config.tolerance,
    dryRun: config.dryRun,
  });

  for (const spreadsheet of spreadsheets) {
    let outcome: MeetingOutcome;
    try {
      outcome = await processMeeting(spreadsheet, config, logger);
    } catch (e: unknown) {
      const error = toOutcomeError(e);
      logger.error("meeting.failed", { spreadsheet, ...error });
      outcome = { status: "failed", spreadsheet, error };
    }
    result.outcomes.push(outcome);
    result.processed++;
    if (outcome.status === "renamed") result.renamed++;
    else if (outcome.status === "skipped") result.skipped++;
    else result.failed++;
  }

  logger.info("batch.summary", {
    rootDir,
    found: result.found,
    processed: result.processed,
    renamed: result.renamed,
    skipped: result.skipped,
    failed: result.failed,
  });
  return result;
}
