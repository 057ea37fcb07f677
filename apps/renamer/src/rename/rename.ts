import fs from "node:fs/promises";
import path from "node:path";
import {
  ARTIFACT_KINDS,
  MissingFileError,
  TargetExistsError,
  assertMeetingRecord,
  buildTargetName,
  type ArtifactKind,
  type MeetingFileKind,
  type MeetingRecord,
} from "@meeting-renamer/core";
import { errnoCode, exists } from "../fs-util";

export type RenameOperation = {
  kind: MeetingFileKind;
  from: string;
  to: string;
};

// File systems that cannot hard-link (FAT, some network mounts).
const NO_LINK_CODES = new Set(["EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EXDEV"]);

/**
 * The spreadsheet plus every admitted artifact, each moved to
 * `<sourceDirectory>/<canonicalBaseName><suffix>`. Files already carrying
 * their target name produce no operation.
 */
export function planRenames(
  record: MeetingRecord,
  artifacts: Partial<Record<ArtifactKind, string>>
): RenameOperation[] {
  const valid = assertMeetingRecord(record);
  const sources: [MeetingFileKind, string | undefined][] = [
    ["spreadsheet", valid.spreadsheetPath],
    ...ARTIFACT_KINDS.map((k): [MeetingFileKind, string | undefined] => [
      k,
      artifacts[k],
    ]),
  ];

  const ops: RenameOperation[] = [];
  for (const [kind, from] of sources) {
    if (!from) continue;
    const to = path.join(
      valid.sourceDirectory,
      buildTargetName(valid.canonicalBaseName, kind)
    );
    if (path.resolve(from) === to) continue;
    ops.push({ kind, from: path.resolve(from), to });
  }
  return ops;
}

/** Fails before anything moves if a source is gone or a target is taken. */
export async function preflightRenames(
  ops: readonly RenameOperation[]
): Promise<void> {
  const targets = new Set<string>();
  for (const op of ops) {
    if (targets.has(op.to)) throw new TargetExistsError(op.to);
    targets.add(op.to);
  }
  for (const op of ops) {
    if (!(await exists(op.from))) throw new MissingFileError(op.from);
    if (await exists(op.to)) throw new TargetExistsError(op.to);
  }
}

/**
 * Atomic move that never replaces an existing file: hard-link to the
 * target, then drop the old name. Where hard links are unsupported, falls
 * back to rename after an existence check.
 */
export async function moveNoClobber(from: string, to: string): Promise<void> {
  try {
    await fs.link(from, to);
  } catch (e: unknown) {
    const code = errnoCode(e);
    if (code === "EEXIST") throw new TargetExistsError(to);
    if (code === undefined || !NO_LINK_CODES.has(code)) throw e;
    if (await exists(to)) throw new TargetExistsError(to);
    await fs.rename(from, to);
    return;
  }
  await fs.unlink(from);
}

export async function applyRenames(
  ops: readonly RenameOperation[],
  opts: { dryRun?: boolean } = {}
): Promise<RenameOperation[]> {
  await preflightRenames(ops);
  if (opts.dryRun) return [...ops];
  const done: RenameOperation[] = [];
  for (const op of ops) {
    await moveNoClobber(op.from, op.to);
    done.push(op);
  }
  return done;
}
