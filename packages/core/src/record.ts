import { z } from "zod";
import { InvalidRecordError, MalformedScheduleError } from "./errors";
import { buildCanonicalBaseName } from "./naming";
import {
  addSeconds,
  diffSeconds,
  isLocalTimestamp,
  type LocalTimestamp,
} from "./timestamp";

const LocalTimestampSchema = z
  .string()
  .refine(isLocalTimestamp, { message: "Expected YYYY-MM-DDTHH:MM:SS" });

export const AttendanceTimingSchema = z.object({
  source: z.literal("attendance"),
  earliestJoinTime: LocalTimestampSchema,
  earliestLeaveTime: LocalTimestampSchema,
  latestLeaveTime: LocalTimestampSchema,
});

export const ScheduleTimingSchema = z.object({
  source: z.literal("schedule"),
  scheduledStartTime: LocalTimestampSchema,
  durationSeconds: z.number().int().nonnegative(),
  endTime: LocalTimestampSchema,
});

export const MeetingTimingSchema = z.discriminatedUnion("source", [
  AttendanceTimingSchema,
  ScheduleTimingSchema,
]);

export const MeetingRecordSchema = z.object({
  theme: z
    .string()
    .trim()
    .min(1)
    .refine((s) => !/[\/\\\0]/.test(s), {
      message: "Theme must not contain path separators",
    }),
  number: z.string().trim().min(1),
  timing: MeetingTimingSchema,
  sourceDirectory: z.string().min(1),
  spreadsheetPath: z.string().min(1),
  canonicalBaseName: z.string().min(1),
});

export type AttendanceTiming = z.infer<typeof AttendanceTimingSchema>;
export type ScheduleTiming = z.infer<typeof ScheduleTimingSchema>;
export type MeetingTiming = z.infer<typeof MeetingTimingSchema>;
export type MeetingRecord = Readonly<z.infer<typeof MeetingRecordSchema>>;

export type MeetingRecordInput = {
  theme: string;
  number: string;
  timing: MeetingTiming;
  sourceDirectory: string;
  spreadsheetPath: string;
};

export function attendanceTiming(opts: {
  earliestJoinTime: LocalTimestamp;
  earliestLeaveTime: LocalTimestamp;
  latestLeaveTime: LocalTimestamp;
}): AttendanceTiming {
  return { source: "attendance", ...opts };
}

export function scheduleTiming(opts: {
  scheduledStartTime: LocalTimestamp;
  durationSeconds: number;
}): ScheduleTiming {
  return {
    source: "schedule",
    scheduledStartTime: opts.scheduledStartTime,
    durationSeconds: opts.durationSeconds,
    endTime: addSeconds(opts.scheduledStartTime, opts.durationSeconds),
  };
}

/** The instant the meeting's name date and video timestamp derive from. */
export function startAnchor(timing: MeetingTiming): LocalTimestamp {
  return timing.source === "attendance"
    ? timing.earliestJoinTime
    : timing.scheduledStartTime;
}

function checkTimingInvariants(timing: MeetingTiming): void {
  if (timing.source === "attendance") {
    if (diffSeconds(timing.latestLeaveTime, timing.earliestJoinTime) < 0) {
      throw new MalformedScheduleError(
        `Earliest join ${timing.earliestJoinTime} is after latest leave ${timing.latestLeaveTime}`
      );
    }
    if (diffSeconds(timing.latestLeaveTime, timing.earliestLeaveTime) < 0) {
      throw new MalformedScheduleError(
        `Earliest leave ${timing.earliestLeaveTime} is after latest leave ${timing.latestLeaveTime}`
      );
    }
    return;
  }
  const expected = addSeconds(timing.scheduledStartTime, timing.durationSeconds);
  if (expected !== timing.endTime) {
    throw new MalformedScheduleError(
      `End time ${timing.endTime} does not equal start ${timing.scheduledStartTime} plus ${timing.durationSeconds}s`
    );
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "record"}: ${i.message}`)
    .join("; ");
}

// The canonical base name is computed once so every artifact shares the stem.
export function createMeetingRecord(input: MeetingRecordInput): MeetingRecord {
  const parsed = MeetingRecordSchema.omit({ canonicalBaseName: true }).safeParse(
    input
  );
  if (!parsed.success) {
    throw new InvalidRecordError(
      "Invalid meeting record",
      formatIssues(parsed.error)
    );
  }
  checkTimingInvariants(parsed.data.timing);
  return Object.freeze({
    ...parsed.data,
    timing: Object.freeze({ ...parsed.data.timing }),
    canonicalBaseName: buildCanonicalBaseName({
      date: startAnchor(parsed.data.timing),
      theme: parsed.data.theme,
    }),
  });
}

export function assertMeetingRecord(value: unknown): MeetingRecord {
  const parsed = MeetingRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRecordError(
      "Invalid meeting record",
      formatIssues(parsed.error)
    );
  }
  checkTimingInvariants(parsed.data.timing);
  const expected = buildCanonicalBaseName({
    date: startAnchor(parsed.data.timing),
    theme: parsed.data.theme,
  });
  if (parsed.data.canonicalBaseName !== expected) {
    throw new InvalidRecordError(
      "Invalid meeting record",
      `canonicalBaseName: expected ${expected}`
    );
  }
  return parsed.data;
}
