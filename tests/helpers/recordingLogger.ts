import { StructuredLogger, type LogEntry } from "../../src/logger.js";

/**
 * Logger capturing every entry in memory so tests can assert on compiler
 * lifecycle messages. Nothing is printed or written to disk.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: LogEntry[];

  constructor() {
    const entries: LogEntry[] = [];
    super({ logFile: null, stdout: false, onEntry: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }
}
