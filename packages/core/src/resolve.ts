import { z } from "zod";
import {
  AmbiguousMatchError,
  NoMatchError,
  type RenamerError,
} from "./errors";
import { ARTIFACT_KINDS, type ArtifactKind } from "./naming";

export type MatchRejection =
  | { status: "rejected"; reason: "none" }
  | {
      status: "rejected";
      reason: "ambiguous";
      count: number;
      paths: string[];
    };

export type MatchResult = { status: "matched"; path: string } | MatchRejection;

export type MeetingMatches = Record<ArtifactKind, MatchResult>;

export const AdmissionPolicySchema = z.enum(["loose", "strict"]);

/**
 * `loose`: rename the spreadsheet plus every kind that matched.
 * `strict`: rename nothing unless every kind matched.
 */
export type AdmissionPolicy = z.infer<typeof AdmissionPolicySchema>;

export type Admission =
  | {
      admitted: true;
      artifacts: Partial<Record<ArtifactKind, string>>;
      rejections: RenamerError[];
    }
  | { admitted: false; rejections: RenamerError[] };

/** One path is a match; zero or several never are. */
export function resolveMatch(paths: readonly string[]): MatchResult {
  const [only] = paths;
  if (paths.length === 1 && only !== undefined) {
    return { status: "matched", path: only };
  }
  if (paths.length === 0) return { status: "rejected", reason: "none" };
  return {
    status: "rejected",
    reason: "ambiguous",
    count: paths.length,
    paths: [...paths],
  };
}

export function rejectionError(
  kind: ArtifactKind,
  rejection: MatchRejection
): RenamerError {
  return rejection.reason === "ambiguous"
    ? new AmbiguousMatchError(kind, rejection.count)
    : new NoMatchError(kind);
}

export function admit(
  matches: MeetingMatches,
  policy: AdmissionPolicy
): Admission {
  const artifacts: Partial<Record<ArtifactKind, string>> = {};
  const rejections: RenamerError[] = [];
  for (const kind of ARTIFACT_KINDS) {
    const m = matches[kind];
    if (m.status === "matched") artifacts[kind] = m.path;
    else rejections.push(rejectionError(kind, m));
  }
  if (policy === "strict" && rejections.length > 0) {
    return { admitted: false, rejections };
  }
  return { admitted: true, artifacts, rejections };
}
