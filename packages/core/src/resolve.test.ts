import { describe, expect, test } from "vitest";
import { AmbiguousMatchError, NoMatchError } from "./errors";
import { admit, resolveMatch, type MeetingMatches } from "./resolve";

describe("resolveMatch", () => {
  test("accepts exactly one path", () => {
    expect(resolveMatch(["/m/a.mp4"])).toEqual({
      status: "matched",
      path: "/m/a.mp4",
    });
  });

  test("rejects zero paths", () => {
    expect(resolveMatch([])).toEqual({ status: "rejected", reason: "none" });
  });

  test("never picks among several paths", () => {
    expect(
      resolveMatch([
        "/m/TencentMeeting_(20230912110001)_Transcription.txt",
        "/m/TencentMeeting_(20230912110002)_Transcription.txt",
      ])
    ).toEqual({
      status: "rejected",
      reason: "ambiguous",
      count: 2,
      paths: [
        "/m/TencentMeeting_(20230912110001)_Transcription.txt",
        "/m/TencentMeeting_(20230912110002)_Transcription.txt",
      ],
    });
  });
});

describe("admit", () => {
  const partial: MeetingMatches = {
    video: { status: "matched", path: "/m/v.mp4" },
    transcription: {
      status: "rejected",
      reason: "ambiguous",
      count: 2,
      paths: ["/m/a.txt", "/m/b.txt"],
    },
    summary: { status: "rejected", reason: "none" },
  };

  test("loose admits the kinds that matched and reports the rest", () => {
    const res = admit(partial, "loose");
    expect(res.admitted).toBe(true);
    if (!res.admitted) return;
    expect(res.artifacts).toEqual({ video: "/m/v.mp4" });
    expect(res.rejections).toHaveLength(2);
    expect(res.rejections[0]).toBeInstanceOf(AmbiguousMatchError);
    expect(res.rejections[0]?.message).toBe("ambiguous transcription: 2 found");
    expect(res.rejections[1]).toBeInstanceOf(NoMatchError);
    expect(res.rejections[1]?.message).toBe("no summary found");
  });

  test("strict refuses the meeting when any kind is rejected", () => {
    const res = admit(partial, "strict");
    expect(res.admitted).toBe(false);
    expect(res.rejections.map((e) => e.code)).toEqual([
      "AMBIGUOUS_MATCH",
      "NO_MATCH",
    ]);
  });

  test("strict admits when every kind matched", () => {
    const res = admit(
      {
        video: { status: "matched", path: "/m/v.mp4" },
        transcription: { status: "matched", path: "/m/t.txt" },
        summary: { status: "matched", path: "/m/s.txt" },
      },
      "strict"
    );
    expect(res).toEqual({
      admitted: true,
      artifacts: {
        video: "/m/v.mp4",
        transcription: "/m/t.txt",
        summary: "/m/s.txt",
      },
      rejections: [],
    });
  });
});
