import fs from "node:fs/promises";
import {
  AdmissionPolicySchema,
  DEFAULT_TOLERANCE,
  LeaveAnchorsSchema,
  MissingFileError,
  ToleranceWindowSchema,
} from "@meeting-renamer/core";
import { z } from "zod";
import { errnoCode } from "./fs-util";

const CellSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
});

export const SpreadsheetLayoutSchema = z.object({
  themeCell: CellSchema.default({ row: 0, col: 1 }),
  numberCell: CellSchema.default({ row: 1, col: 1 }),
  scheduledStartCell: CellSchema.default({ row: 3, col: 1 }),
  durationCell: CellSchema.default({ row: 5, col: 1 }),
  participantScanFrom: z.number().int().nonnegative().default(2),
  joinColumn: z.string().min(1).default("首次入会时间"),
  leaveColumn: z.string().min(1).default("最后退会时间"),
});

export type SpreadsheetLayout = z.infer<typeof SpreadsheetLayoutSchema>;

export const RenamerConfigSchema = z.object({
  tolerance: ToleranceWindowSchema.default(DEFAULT_TOLERANCE),
  leaveAnchors: LeaveAnchorsSchema.default("latest"),
  admission: AdmissionPolicySchema.default("loose"),
  spreadsheetPattern: z.string().min(1).default("*-[0-9]*-[0-9a-zA-Z]*.xlsx"),
  layout: SpreadsheetLayoutSchema.default({}),
  dryRun: z.boolean().default(false),
  logsDir: z.string().min(1).nullable().default(null),
});

export type RenamerConfig = z.infer<typeof RenamerConfigSchema>;

export type RenamerConfigInput = z.input<typeof RenamerConfigSchema>;

export function loadConfig(overrides: unknown = {}): RenamerConfig {
  return RenamerConfigSchema.parse(overrides);
}

/** Reads a JSON settings file; absent keys take their defaults. */
export async function loadConfigFile(
  filePath: string,
  overrides: RenamerConfigInput = {}
): Promise<RenamerConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e: unknown) {
    if (errnoCode(e) === "ENOENT") {
      throw new MissingFileError(filePath);
    }
    throw e;
  }
  const parsed: unknown = JSON.parse(text);
  const fromFile = z.record(z.unknown()).parse(parsed);
  return loadConfig({ ...fromFile, ...overrides });
}
