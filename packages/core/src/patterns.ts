import { z } from "zod";
import { InvalidRecordError } from "./errors";
import { escapeGlob } from "./glob";
import type { ArtifactKind } from "./naming";
import { assertMeetingRecord, startAnchor, type MeetingRecord } from "./record";
import { addSeconds, formatCompact, type LocalTimestamp } from "./timestamp";

export const ToleranceWindowSchema = z
  .object({
    min: z.number().int(),
    max: z.number().int(),
  })
  .refine((w) => w.min <= w.max, {
    message: "Tolerance min must not exceed max",
  });

export type ToleranceWindow = z.infer<typeof ToleranceWindowSchema>;

export const LeaveAnchorsSchema = z.enum(["latest", "earliest-and-latest"]);

export type LeaveAnchors = z.infer<typeof LeaveAnchorsSchema>;

export const DEFAULT_TOLERANCE: ToleranceWindow = { min: -5, max: 5 };

export type PatternOptions = {
  tolerance?: ToleranceWindow;
  leaveAnchors?: LeaveAnchors;
};

export type CandidatePatternSet = Record<ArtifactKind, string[]>;

type PatternTemplate = (compactTs: string, record: MeetingRecord) => string;

const TEMPLATES: Record<ArtifactKind, PatternTemplate> = {
  video: (ts, record) => `TM-${ts}-${escapeGlob(record.number)}-*.mp4`,
  transcription: (ts) => `TencentMeeting_(${ts})_Transcription*.txt`,
  summary: (ts) => `TencentMeeting_${ts}_Summary*.txt`,
};

export function toleranceOffsets(window: ToleranceWindow): number[] {
  const out: number[] = [];
  for (let d = window.min; d <= window.max; d++) out.push(d);
  return out;
}

/** Anchors transcripts and summaries are stamped from. */
export function leaveAnchorTimes(
  record: MeetingRecord,
  leaveAnchors: LeaveAnchors
): LocalTimestamp[] {
  const t = record.timing;
  if (t.source === "schedule") return [t.endTime];
  return leaveAnchors === "earliest-and-latest"
    ? [t.earliestLeaveTime, t.latestLeaveTime]
    : [t.latestLeaveTime];
}

export function anchorTimes(
  record: MeetingRecord,
  kind: ArtifactKind,
  leaveAnchors: LeaveAnchors
): LocalTimestamp[] {
  return kind === "video"
    ? [startAnchor(record.timing)]
    : leaveAnchorTimes(record, leaveAnchors);
}

/**
 * Candidate file name patterns per artifact kind: every offset of the
 * tolerance window applied to every anchor, anchor-major, ascending offset,
 * duplicates dropped.
 */
export function generatePatterns(
  record: MeetingRecord,
  options: PatternOptions = {}
): CandidatePatternSet {
  const valid = assertMeetingRecord(record);
  const window = ToleranceWindowSchema.safeParse(
    options.tolerance ?? DEFAULT_TOLERANCE
  );
  if (!window.success) {
    throw new InvalidRecordError(
      "Invalid tolerance window",
      window.error.issues.map((i) => i.message).join("; ")
    );
  }
  const offsets = toleranceOffsets(window.data);
  const leaveAnchors = options.leaveAnchors ?? "latest";

  const build = (kind: ArtifactKind): string[] => {
    const seen = new Set<string>();
    for (const anchor of anchorTimes(valid, kind, leaveAnchors)) {
      for (const delta of offsets) {
        seen.add(TEMPLATES[kind](formatCompact(addSeconds(anchor, delta)), valid));
      }
    }
    return [...seen];
  };

  return {
    video: build("video"),
    transcription: build("transcription"),
    summary: build("summary"),
  };
}
