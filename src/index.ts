/**
 * release-gate - gated multi-platform release orchestration
 * @module release-gate
 */

// Types
export * from "./types/index.js";

// Logging
export { Logger, silentLogger, stderrSink, resolveLogLevel, isLogLevel } from "./logging/logger.js";
export type { LogLevel, LogEntry, LogSink, LogContext, LoggerOptions } from "./logging/logger.js";

// Lock
export { withFileLock, readLockInfo, LockError } from "./lock/index.js";

// Version
export {
  VersionStore,
  VersionStoreError,
  VersionAdvancer,
  VersionFormatError,
  computeNextRecord,
  compareVersions,
  incrementVersion,
  isValidVersion,
} from "./version/index.js";

// Config
export {
  parseReleaseConfig,
  parseReleaseConfigFile,
  validateReleaseConfig,
  ConfigParseError,
} from "./config/index.js";

// Matrix
export { enumerateMatrix, cellKey, createCell, canonicalArtifactName, platformTag } from "./matrix/index.js";

// Gate
export { InterfaceGate, checkDependencies } from "./gate/index.js";

// Build
export { MatrixBuilder, WorkspaceStore, Semaphore } from "./build/index.js";

// Collect
export { ArtifactCollector, findArtifact } from "./collect/index.js";

// Publish
export { Publisher, NoArtifactsError, DirectoryIndex, DirectoryIndexError } from "./publish/index.js";

// Collaborators
export { CommandBuildTool, CommandConformanceChecker, CommandError, runCommand } from "./collaborators/index.js";

// Pipeline
export { ReleasePipeline, ReleaseStateMachine, RunJournal, RunJournalError } from "./pipeline/index.js";
