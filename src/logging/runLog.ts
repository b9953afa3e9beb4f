import { promises as fs } from "fs";
import path from "path";
import type { JsonObject } from "../core/json.js";

export type LogLevel = "info" | "warn" | "error";

export interface RunLogEvent {
  ts: string;
  level: LogLevel;
  kind: string;
  message: string;
  data: JsonObject | null;
}

export interface RunLogSink {
  write(event: RunLogEvent): Promise<void>;
}

/**
 * Structured event log for one download run. Every event is kept in memory and
 * fanned out to the configured sinks in order.
 */
export class RunLog {
  private readonly recorded: RunLogEvent[] = [];

  constructor(private readonly sinks: RunLogSink[] = []) {}

  addSink(sink: RunLogSink): void {
    this.sinks.push(sink);
  }

  get events(): readonly RunLogEvent[] {
    return this.recorded;
  }

  async event(level: LogLevel, kind: string, message: string, data: JsonObject | null = null): Promise<void> {
    const event: RunLogEvent = { ts: new Date().toISOString(), level, kind, message, data };
    this.recorded.push(event);
    for (const sink of this.sinks) {
      await sink.write(event);
    }
  }

  info(kind: string, message: string, data: JsonObject | null = null): Promise<void> {
    return this.event("info", kind, message, data);
  }

  warn(kind: string, message: string, data: JsonObject | null = null): Promise<void> {
    return this.event("warn", kind, message, data);
  }

  error(kind: string, message: string, data: JsonObject | null = null): Promise<void> {
    return this.event("error", kind, message, data);
  }
}

/** `LEVEL: message` on stderr; info only when verbose. */
export function consoleSink(opts: { verbose: boolean }): RunLogSink {
  return {
    async write(event: RunLogEvent): Promise<void> {
      if (event.level === "info" && !opts.verbose) return;
      console.error(`${event.level.toUpperCase()}: ${event.message}`);
    }
  };
}

export async function fileSink(logPath: string): Promise<RunLogSink> {
  await fs.mkdir(path.dirname(path.resolve(logPath)), { recursive: true });
  await fs.writeFile(logPath, "", "utf8");
  return {
    async write(event: RunLogEvent): Promise<void> {
      await fs.appendFile(logPath, JSON.stringify(event) + "\n", "utf8");
    }
  };
}
