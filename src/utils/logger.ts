/**
 * Logger Utility
 * Handles log output with different log levels
 */

import { createWriteStream } from "node:fs";
import type { LogLevel } from "../types";

export type LogFields = Record<string, unknown>;
export type LogSink = (line: string) => void;
export type CloseSink = () => Promise<void>;

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  return Object.entries(fields)
    .map(([key, value]) => {
      const text = value instanceof Error ? value.message : String(value);
      return ` ${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`;
    })
    .join("");
}

export class Logger {
  private closing: Promise<void> | null = null;

  constructor(
    private level: LogLevel = "info",
    private sink: LogSink = (line) => console.error(line),
    private closeSink: CloseSink = async () => {},
  ) {}

  /**
   * Logger that drops everything (interactive pager without a log file)
   */
  static silent(): Logger {
    return new Logger("error", () => {});
  }

  /**
   * Logger appending to a file
   */
  static toFile(level: LogLevel, filePath: string): Logger {
    const stream = createWriteStream(filePath, { flags: "a" });
    return new Logger(
      level,
      (line) => {
        stream.write(`${new Date().toISOString()} ${line}\n`);
      },
      () =>
        new Promise<void>((resolve) => {
          stream.end(() => resolve());
        }),
    );
  }

  /**
   * Flush and release the sink; later calls return the same promise
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.closeSink();
    }
    return this.closing;
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string, fields?: LogFields): void {
    if (this.enabled("debug")) {
      this.sink(`[DEBUG] ${message}${formatFields(fields)}`);
    }
  }

  info(message: string, fields?: LogFields): void {
    if (this.enabled("info")) {
      this.sink(`[INFO] ${message}${formatFields(fields)}`);
    }
  }

  warn(message: string, fields?: LogFields): void {
    if (this.enabled("warn")) {
      this.sink(`[WARN] ${message}${formatFields(fields)}`);
    }
  }

  error(message: string, fields?: LogFields): void {
    this.sink(`[ERROR] ${message}${formatFields(fields)}`);
  }
}
