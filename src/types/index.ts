/**
 * 型定義のエクスポート
 */

// Version
export type { VersionRecord } from "./version.js";

// Matrix
export type {
  Platform,
  Arch,
  BuildCell,
  PlatformTarget,
  MatrixExclusion,
  MatrixDefinition,
  PlatformTagOptions,
} from "./matrix.js";
export { PLATFORMS, ARCHES } from "./matrix.js";

// Artifact
export type {
  DependencyPaths,
  DependencyName,
  BuildOutput,
  Artifact,
  BuildFailureKind,
  BuildFailure,
  CellResult,
  ArtifactSet,
} from "./artifact.js";
export { DEPENDENCY_NAMES } from "./artifact.js";

// Gate
export type { GateResult } from "./gate.js";

// Publish
export type {
  ExistingEntryPolicy,
  EndpointKind,
  EndpointConfig,
  Credentials,
  PublishedEntry,
  PublishOutcome,
  PublishEntryResult,
  EndpointReport,
  PublishReport,
} from "./publish.js";

// Collaborators
export type {
  BuildRequest,
  BuildTool,
  CheckRequest,
  ConformanceChecker,
  PackageIndex,
} from "./collaborators.js";

// Pipeline
export type {
  ReleaseRunId,
  PipelineStage,
  FailureReason,
  Trigger,
  StageTransition,
  NameCollision,
  FailureDetails,
  PipelineSuccess,
  PipelineFailure,
  PipelineResult,
} from "./pipeline.js";

// Config
export type {
  CommandSpec,
  ReleaseConfig,
  ConfigValidationError,
  ConfigValidationResult,
} from "./config.js";
