import { errorMessage } from "../core/errors.js";
import type { JobId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface JobEvent {
  ts: string;
  level: LogLevel;
  jobId: JobId | null;
  kind: string;
  message: string;
  data: JsonObject | null;
}

export interface JobEventSink {
  write(event: JobEvent): Promise<void>;
}

export function formatEventLine(event: JobEvent): string {
  return JSON.stringify({
    ts: event.ts,
    level: event.level,
    job_id: event.jobId,
    kind: event.kind,
    message: event.message,
    data: event.data
  });
}

export class StderrEventSink implements JobEventSink {
  constructor(
    private readonly minLevel: LogLevel = "info",
    private readonly writeLine: (line: string) => void = (line) => console.error(line)
  ) {}

  async write(event: JobEvent): Promise<void> {
    if (LEVEL_ORDER[event.level] < LEVEL_ORDER[this.minLevel]) return;
    this.writeLine(formatEventLine(event));
  }
}

export class MemoryEventSink implements JobEventSink {
  readonly events: JobEvent[] = [];

  async write(event: JobEvent): Promise<void> {
    this.events.push(event);
  }

  kinds(jobId?: JobId): string[] {
    return this.events.filter((e) => jobId === undefined || e.jobId === jobId).map((e) => e.kind);
  }
}

export type SinkErrorHandler = (err: unknown, event: JobEvent) => void;

const reportSinkError: SinkErrorHandler = (err, event) => {
  console.error(`gridpool: event sink failed on ${event.kind}: ${errorMessage(err)}`);
};

/**
 * Event recorder for one job. Keeps every line it has seen so a failure
 * report can carry the full history, and forwards each event to its sinks in
 * order. A sink that rejects is reported and skipped; `event` never rejects.
 */
export class JobLog {
  private readonly lines: string[] = [];

  constructor(
    readonly jobId: JobId | null,
    private readonly sinks: readonly JobEventSink[],
    private readonly onSinkError: SinkErrorHandler = reportSinkError
  ) {}

  async event(kind: string, message: string, data: JsonObject | null = null, level: LogLevel = "info"): Promise<void> {
    const event: JobEvent = { ts: new Date().toISOString(), level, jobId: this.jobId, kind, message, data };
    this.lines.push(formatEventLine(event));
    for (const sink of this.sinks) {
      try {
        await sink.write(event);
      } catch (err) {
        this.onSinkError(err, event);
      }
    }
  }

  async warn(kind: string, message: string, data: JsonObject | null = null): Promise<void> {
    await this.event(kind, message, data, "warn");
  }

  text(): string {
    return this.lines.length ? this.lines.join("\n") + "\n" : "";
  }
}
