export {
  OnboardingLoggerImpl,
  ConsoleTransport,
  FileTransport,
  createOnboardingLogger,
  createConsoleFormatter,
  createTranscriptFormatter,
  transcriptFileName,
  shouldLog,
  REDACTED,
} from "./logger.js";

export type {
  OnboardingLogger,
  OnboardingLoggerHandle,
  OnboardingLoggerOptions,
  LogLevel,
  LogTone,
  LogEntry,
  LogFormatter,
  LogTransport,
  ConsoleSink,
} from "./logger.js";
