import {
  resolveMatch,
  type ArtifactKind,
  type CandidatePatternSet,
  type MatchResult,
  type MeetingMatches,
  type MeetingRecord,
} from "@meeting-renamer/core";
import { findMatchingFiles } from "./directory";

/** Runs each kind's candidate patterns against the meeting's directory. */
export async function resolveMeetingArtifacts(
  record: MeetingRecord,
  patterns: CandidatePatternSet
): Promise<MeetingMatches> {
  const resolveKind = async (kind: ArtifactKind): Promise<MatchResult> =>
    resolveMatch(await findMatchingFiles(record.sourceDirectory, patterns[kind]));

  return {
    video: await resolveKind("video"),
    transcription: await resolveKind("transcription"),
    summary: await resolveKind("summary"),
  };
}
