/**
 * Collaborators モジュール
 * 外部コマンドによるビルドツール・チェッカーのアダプター
 */

export { runCommand, outputLines, CommandError } from "./command-runner.js";
export type { CommandRunner, CommandResult, RunCommandOptions } from "./command-runner.js";
export { CommandBuildTool, buildEnvironment, OUTPUT_DIR_NAME } from "./command-build-tool.js";
export type { CommandBuildToolOptions } from "./command-build-tool.js";
export { CommandConformanceChecker } from "./command-checker.js";
export type { CommandConformanceCheckerOptions } from "./command-checker.js";
