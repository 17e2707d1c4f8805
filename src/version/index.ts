/**
 * Version モジュール
 * バージョン規則・永続化・前進
 */

export {
  VersionFormatError,
  isValidVersion,
  parseVersion,
  compareVersions,
  incrementVersion,
} from "./version.js";

export {
  VersionStore,
  VersionStoreError,
  parseVersionFile,
  formatVersionFile,
  assertValidRecord,
  DEFAULT_VERSION_FILE,
} from "./version-store.js";
export type { VersionStoreOptions, VersionStoreErrorCode } from "./version-store.js";

export { VersionAdvancer, computeNextRecord } from "./version-advancer.js";
