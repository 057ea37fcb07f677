import { datePart, type LocalTimestamp } from "./timestamp";

export const ARTIFACT_KINDS = ["video", "transcription", "summary"] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

/** Every file a meeting owns, the spreadsheet included. */
export type MeetingFileKind = "spreadsheet" | ArtifactKind;

export const TARGET_SUFFIXES: Record<MeetingFileKind, string> = {
  spreadsheet: ".xlsx",
  video: ".mp4",
  transcription: "_Transcription.txt",
  summary: "_Summary.txt",
};

const CANONICAL_NAME_RE = /^【\d{4}-\d{2}-\d{2}】/;

export function buildCanonicalBaseName(opts: {
  date: LocalTimestamp;
  theme: string;
}): string {
  return `【${datePart(opts.date)}】${opts.theme}`;
}

export function buildTargetName(
  canonicalBaseName: string,
  kind: MeetingFileKind
): string {
  return `${canonicalBaseName}${TARGET_SUFFIXES[kind]}`;
}

/** True for names this tool produced; those are never picked up again. */
export function isCanonicalName(fileName: string): boolean {
  return CANONICAL_NAME_RE.test(fileName);
}
