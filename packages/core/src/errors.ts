export type RenamerErrorCode =
  | "MISSING_FILE"
  | "DIRECTORY_NOT_FOUND"
  | "MALFORMED_SCHEDULE"
  | "INVALID_RECORD"
  | "AMBIGUOUS_MATCH"
  | "NO_MATCH"
  | "TARGET_EXISTS";

export type RenamerErrorJson = {
  code: RenamerErrorCode;
  error: string;
};

export class RenamerError extends Error {
  readonly code: RenamerErrorCode;

  constructor(message: string, code: RenamerErrorCode) {
    super(message);
    this.name = "RenamerError";
    this.code = code;
  }

  toJSON(): RenamerErrorJson {
    return { code: this.code, error: this.message };
  }
}

export class MissingFileError extends RenamerError {
  readonly path: string;

  constructor(
    filePath: string,
    message = `File ${filePath} not found`,
    code: "MISSING_FILE" | "DIRECTORY_NOT_FOUND" = "MISSING_FILE"
  ) {
    super(message, code);
    this.name = "MissingFileError";
    this.path = filePath;
  }
}

export class DirectoryNotFoundError extends MissingFileError {
  constructor(dirPath: string) {
    super(dirPath, `Directory ${dirPath} not found`, "DIRECTORY_NOT_FOUND");
    this.name = "DirectoryNotFoundError";
  }
}

export class MalformedScheduleError extends RenamerError {
  constructor(message: string) {
    super(message, "MALFORMED_SCHEDULE");
    this.name = "MalformedScheduleError";
  }
}

export class InvalidRecordError extends RenamerError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, "INVALID_RECORD");
    this.name = "InvalidRecordError";
    this.details = details;
  }

  toJSON(): RenamerErrorJson & { details?: string } {
    return {
      ...super.toJSON(),
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class AmbiguousMatchError extends RenamerError {
  readonly kind: string;
  readonly count: number;

  constructor(kind: string, count: number) {
    super(`ambiguous ${kind}: ${count} found`, "AMBIGUOUS_MATCH");
    this.name = "AmbiguousMatchError";
    this.kind = kind;
    this.count = count;
  }
}

export class NoMatchError extends RenamerError {
  readonly kind: string;

  constructor(kind: string) {
    super(`no ${kind} found`, "NO_MATCH");
    this.name = "NoMatchError";
    this.kind = kind;
  }
}

export class TargetExistsError extends RenamerError {
  readonly targetPath: string;

  constructor(targetPath: string) {
    super(`Target ${targetPath} already exists`, "TARGET_EXISTS");
    this.name = "TargetExistsError";
    this.targetPath = targetPath;
  }
}

export function isRenamerError(e: unknown): e is RenamerError {
  return e instanceof RenamerError;
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
