/**
 * Config モジュール
 */

export {
  parseReleaseConfig,
  parseReleaseConfigFile,
  ConfigParseError,
  DEFAULT_CONFIG_FILE,
} from "./parser.js";
export type { ParseConfigOptions } from "./parser.js";
export { validateReleaseConfig } from "./validator.js";
