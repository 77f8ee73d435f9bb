import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** File receiving every entry as a JSON line. `null` disables the mirror. */
  readonly logFile?: string | null;
  /** Whether entries are echoed on stdout. Defaults to `true`. */
  readonly stdout?: boolean;
  /** Called synchronously with a copy of every entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * JSON-lines logger used by the compilers. Messages are snake_case event
 * names; the payload carries the compiler, problem and other identifiers.
 * File appends are chained so entries land in emission order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly echoToStdout: boolean;
  private readonly entryListener: ((entry: LogEntry) => void) | null;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.echoToStdout = options.stdout ?? true;
    this.entryListener = options.onEntry ?? null;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Resolves once every pending file append has completed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.echoToStdout) {
      process.stdout.write(line);
    }
    this.entryListener?.(structuredClone(entry));
    const file = this.logFile;
    if (file) {
      this.writeQueue = this.writeQueue.then(() => this.append(file, line));
    }
  }

  private async append(file: string, line: string): Promise<void> {
    try {
      if (!this.logDirectoryReady) {
        await mkdir(dirname(file), { recursive: true });
        this.logDirectoryReady = true;
      }
      await appendFile(file, line, "utf8");
    } catch (err) {
      const failure: LogEntry = {
        timestamp: new Date().toISOString(),
        level: "error",
        message: "log_file_write_failed",
        payload: err instanceof Error ? { file, message: err.message } : { file, error: String(err) },
      };
      process.stderr.write(`${JSON.stringify(failure)}\n`);
      // mkdir is retried on the next append.
      this.logDirectoryReady = false;
    }
  }
}

/** Logger used when callers do not provide one: no stdout echo, no file. */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ logFile: null, stdout: false });
}
