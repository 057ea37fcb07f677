import fs from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  msg?: string;
  data?: Record<string, unknown>;
};

type Subscriber = (evt: LogEvent) => void;

/**
 * Structured event log. Events go to an in-memory ring buffer, to
 * subscribers, and (when `logsDir` is set) to a daily JSONL file.
 * File appends are serialised; `flush()` waits for them and rethrows the
 * first append failure.
 */
export class Logger {
  private readonly logsDir: string | null;
  private readonly buffer: LogEvent[] = [];
  private readonly maxBuffer: number;
  private readonly subscribers = new Set<Subscriber>();
  private pending: Promise<void> = Promise.resolve();
  private writeError: unknown = null;

  constructor(opts: { logsDir?: string | null; maxBuffer?: number } = {}) {
    this.logsDir = opts.logsDir ?? null;
    this.maxBuffer = opts.maxBuffer ?? 500;
  }

  subscribe(fn: Subscriber): () => void {
    this.subscribers.add(fn);
    return () => this.subscribers.delete(fn);
  }

  getRecent(limit = 200): LogEvent[] {
    return this.buffer.slice(Math.max(0, this.buffer.length - limit));
  }

  debug(event: string, data?: LogEvent["data"], msg?: string) {
    this.write({ level: "debug", event, data, msg });
  }

  info(event: string, data?: LogEvent["data"], msg?: string) {
    this.write({ level: "info", event, data, msg });
  }

  warn(event: string, data?: LogEvent["data"], msg?: string) {
    this.write({ level: "warn", event, data, msg });
  }

  error(event: string, data?: LogEvent["data"], msg?: string) {
    this.write({ level: "error", event, data, msg });
  }

  async flush(): Promise<void> {
    await this.pending;
    if (this.writeError !== null) {
      const err = this.writeError;
      this.writeError = null;
      throw err;
    }
  }

  private write(partial: Omit<LogEvent, "ts">): void {
    const evt: LogEvent = { ts: new Date().toISOString(), ...partial };
    this.buffer.push(evt);
    if (this.buffer.length > this.maxBuffer)
      this.buffer.splice(0, this.buffer.length - this.maxBuffer);

    for (const sub of this.subscribers) sub(evt);

    const logsDir = this.logsDir;
    if (!logsDir) return;
    this.pending = this.pending
      .then(() => appendEvent(logsDir, evt))
      .catch((e: unknown) => {
        this.writeError ??= e;
      });
  }
}

async function appendEvent(logsDir: string, evt: LogEvent): Promise<void> {
  await fs.mkdir(logsDir, { recursive: true });
  const fileName = `renamer-${evt.ts.slice(0, 10)}.jsonl`;
  await fs.appendFile(
    path.join(logsDir, fileName),
    `${JSON.stringify(evt)}\n`,
    "utf8"
  );
}

/** One human-readable line per event, for terminals. */
export function formatLogLine(evt: LogEvent): string {
  const data = evt.data ? ` ${JSON.stringify(evt.data)}` : "";
  const msg = evt.msg ? ` ${evt.msg}` : "";
  return `${evt.ts} ${evt.level.toUpperCase()} ${evt.event}${msg}${data}`;
}
