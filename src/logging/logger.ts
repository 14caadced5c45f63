/**
 * Onboarding Logging Subsystem
 *
 * Leveled logger with pluggable transports. The console transport prints the
 * human-facing output; the file transport keeps the per-run transcript, with
 * a timestamp and level on every line.
 */

import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname, join } from "node:path";
import { theme } from "../theme.js";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Presentation hint for console output. Transcript lines ignore it.
 */
export type LogTone = "plain" | "success" | "heading" | "muted";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  tone: LogTone;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
  /** Replace every occurrence of `literal` in what this transport persists. */
  mask?(literal: string): void;
}

export interface OnboardingLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  success(message: string): void;
  heading(message: string): void;
  muted(message: string): void;

  child(name: string): OnboardingLogger;
  /** Keep `literal` out of persisted transcripts; the console still shows it. */
  maskInTranscript(literal: string): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export const REDACTED = "[REDACTED]";

// =============================================================================
// Formatters
// =============================================================================

/**
 * Console formatter: the message alone, coloured by tone or level.
 */
export function createConsoleFormatter(options?: { colors?: boolean }): LogFormatter {
  const colors = options?.colors ?? process.stdout.isTTY ?? false;

  return (entry: LogEntry): string => {
    if (!colors) return entry.message;

    switch (entry.level) {
      case "error":
      case "fatal":
        return theme.error(entry.message);
      case "warn":
        return theme.warn(entry.message);
      default:
        break;
    }

    switch (entry.tone) {
      case "success":
        return theme.success(entry.message);
      case "heading":
        return theme.heading(entry.message);
      case "muted":
        return theme.muted(entry.message);
      default:
        return entry.message;
    }
  };
}

/**
 * Transcript formatter: `<ISO timestamp> <LEVEL> [subsystem] message {meta}`.
 */
export function createTranscriptFormatter(): LogFormatter {
  return (entry: LogEntry): string => {
    const parts = [entry.timestamp.toISOString(), entry.level.toUpperCase().padEnd(5), `[${entry.subsystem}]`, entry.message];
    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(JSON.stringify(entry.metadata));
    }
    return parts.join(" ");
  };
}

// =============================================================================
// Console Transport
// =============================================================================

export type ConsoleSink = {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
};

export class ConsoleTransport implements LogTransport {
  readonly name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private sink: ConsoleSink;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel; sink?: ConsoleSink }) {
    this.formatter = options?.formatter ?? createConsoleFormatter();
    this.minLevel = options?.minLevel ?? "info";
    this.sink = options?.sink ?? console;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      this.sink.error(formatted);
    } else if (entry.level === "warn") {
      this.sink.warn(formatted);
    } else {
      this.sink.log(formatted);
    }
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Append-only transcript file. Lines are buffered and written through a
 * single append stream; `close()` must be awaited before the process exits.
 */
export class FileTransport implements LogTransport {
  readonly name = "file";
  readonly filePath: string;
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private masks = new Set<string>();
  private writeStream: WriteStream | null = null;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: LogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createTranscriptFormatter();
    this.minLevel = options.minLevel ?? "trace";
    this.bufferSize = options.bufferSize ?? 20;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.applyMasks(this.formatter(entry)));

    if (this.buffer.length >= this.bufferSize) {
      this.writeBuffer();
    }
  }

  mask(literal: string): void {
    if (literal) this.masks.add(literal);
    // Lines still in the buffer have not been persisted yet.
    this.buffer = this.buffer.map((line) => this.applyMasks(line));
  }

  async flush(): Promise<void> {
    this.writeBuffer();
  }

  async close(): Promise<void> {
    this.writeBuffer();
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  private writeBuffer(): void {
    if (this.buffer.length === 0) return;
    const content = this.buffer.join("\n") + "\n";
    this.buffer = [];
    this.openStream().write(content);
  }

  private openStream(): WriteStream {
    if (this.writeStream) return this.writeStream;
    mkdirSync(dirname(this.filePath), { recursive: true });
    const stream = createWriteStream(this.filePath, { flags: "a" });
    this.writeStream = stream;
    return stream;
  }

  private applyMasks(line: string): string {
    let result = line;
    for (const literal of this.masks) {
      result = result.split(literal).join(REDACTED);
    }
    return result;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class OnboardingLoggerImpl implements OnboardingLogger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private now: () => Date;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    now?: () => Date;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "trace";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.now = options.now ?? (() => new Date());
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, "plain", meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, "plain", meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, "plain", meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, "plain", meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, "plain", meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, "plain", meta);
  }

  success(message: string): void {
    this.log("info", message, "success");
  }

  heading(message: string): void {
    this.log("info", message, "heading");
  }

  muted(message: string): void {
    this.log("info", message, "muted");
  }

  child(name: string): OnboardingLogger {
    return new OnboardingLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      now: this.now,
    });
  }

  maskInTranscript(literal: string): void {
    for (const transport of this.transports) {
      transport.mask?.(literal);
    }
  }

  async flush(): Promise<void> {
    for (const transport of this.transports) {
      await transport.flush?.();
    }
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private log(level: LogLevel, message: string, tone: LogTone, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: this.now(),
      level,
      subsystem: this.subsystem,
      message,
      tone,
      metadata: meta,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `spotto-onboarding-YYYYMMDD-HHmmss.log`, in local time.
 */
export function transcriptFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `spotto-onboarding-${day}-${time}.log`;
}

export type OnboardingLoggerOptions = {
  logDir: string;
  /** Console threshold. The transcript always records from `trace`. */
  consoleLevel?: LogLevel;
  colors?: boolean;
  now?: () => Date;
  sink?: ConsoleSink;
};

export type OnboardingLoggerHandle = {
  logger: OnboardingLogger;
  transcriptPath: string;
};

/**
 * Create the run logger: console output plus a fresh transcript file.
 */
export function createOnboardingLogger(options: OnboardingLoggerOptions): OnboardingLoggerHandle {
  const now = options.now ?? (() => new Date());
  const transcriptPath = join(options.logDir, transcriptFileName(now()));

  const logger = new OnboardingLoggerImpl({
    subsystem: "onboarding",
    level: "trace",
    now,
    transports: [
      new ConsoleTransport({
        minLevel: options.consoleLevel ?? "info",
        formatter: createConsoleFormatter({ colors: options.colors }),
        sink: options.sink,
      }),
      new FileTransport({ filePath: transcriptPath }),
    ],
  });

  return { logger, transcriptPath };
}
