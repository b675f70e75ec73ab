/**
 * Utility exports
 */

// Crypto utilities
export { computeFileChecksum } from "./crypto";
// Errors
export {
  ArchiveFormatError,
  CollectorError,
  errorCode,
  formatErrorChain,
  RemoteProtocolError,
} from "./errors";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  getLogFile,
  getLogLevel,
  info,
  isLogLevel,
  LOG_FILE_NAME,
  logger,
  readLogTail,
  setLogDirectory,
  setLogLevel,
  warn,
} from "./logger";
export type { ParsedArchiveName } from "./naming";
// Naming utilities
export {
  ARCHIVE_EXTENSION,
  ARCHIVE_NAME_PATTERN,
  formatTimestamp,
  generateArchiveName,
  isValidArchiveName,
  parseArchiveName,
  REMOTE_PREFIX,
  stripRemotePrefix,
  toRemoteKey,
} from "./naming";
// Path utilities
export { isPathWithinDir, statOrNull, toArchivePath } from "./path";
// Processes
export { decodeOutput, defaultProcessRunner, ExecaProcessRunner } from "./process";
