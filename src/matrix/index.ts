/**
 * Matrix モジュール
 * セルの列挙と命名
 */

export { cellKey, createCell, sameCell, matchesExclusion, enumerateMatrix } from "./matrix.js";
export {
  canonicalArtifactName,
  platformTag,
  DEFAULT_PLATFORM_TAG_OPTIONS,
  DEFAULT_INTERPRETER_PREFIX,
} from "./naming.js";
export type { NamingOptions } from "./naming.js";
