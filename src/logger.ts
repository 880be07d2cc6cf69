import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Numeric weight used to filter entries below the configured threshold. */
const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Optional file receiving a mirror of every emitted line. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  /** Writes entries to stdout when true (default). */
  readonly stdout?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Clock used for the entry timestamp. */
  readonly now?: () => Date;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially and never awaited by the
 * caller; {@link flush} waits for the queue to drain.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly minWeight: number;
  private readonly stdout: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly now: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Set once the directory holding {@link logFile} exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.minWeight = LEVEL_WEIGHT[options.minLevel ?? "info"];
    this.stdout = options.stdout ?? true;
    this.entryListener = options.onEntry;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
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

  /** Whether an entry at {@link level} would be emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= this.minWeight;
  }

  /**
   * Waits for all pending file writes. Tests rely on this helper to assert the
   * content of mirrored log files deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.stdout) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          const errorEntry: LogEntry = {
            timestamp: this.now().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: err instanceof Error ? { message: err.message } : { error: String(err) },
          };
          process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
          // Retry directory creation on the next write.
          this.logDirectoryReady = false;
        }
      })
      .catch((err: unknown) => {
        process.stderr.write(`${JSON.stringify({ level: "error", message: "log_queue_failed", error: String(err) })}\n`);
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }
}
