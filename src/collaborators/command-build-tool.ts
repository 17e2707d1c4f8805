/**
 * コマンド型ビルドツール
 * 設定されたビルドコマンドを環境変数付きで起動し、出力ディレクトリに残った 1 ファイルを成果物とする
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BuildOutput, BuildRequest, BuildTool, CommandSpec } from "../types/index.js";
import { CommandError, outputLines, runCommand, type CommandRunner } from "./command-runner.js";

/**
 * ワークスペース内の出力ディレクトリ名
 */
export const OUTPUT_DIR_NAME = "dist";

export interface CommandBuildToolOptions {
  command: CommandSpec;
  runner?: CommandRunner;
}

/**
 * ビルド要求をコマンドの環境変数に変換する
 */
export function buildEnvironment(request: BuildRequest, outputDir: string): Record<string, string> {
  return {
    RELEASE_SOURCE_REVISION: request.source_revision,
    RELEASE_VERSION: request.version,
    RELEASE_NATIVE_LIB_DIR: request.dependencies.native_lib,
    RELEASE_TOOLCHAIN_DIR: request.dependencies.toolchain,
    RELEASE_SOLVER_DIR: request.dependencies.solver,
    RELEASE_PLATFORM: request.target.platform,
    RELEASE_ARCH: request.target.arch,
    RELEASE_PLATFORM_TAG: request.platform_tag,
    RELEASE_INTERPRETER: request.target.interpreter_version,
    RELEASE_OUTPUT_DIR: outputDir,
  };
}

export class CommandBuildTool implements BuildTool {
  private readonly command: CommandSpec;
  private readonly runner: CommandRunner;

  constructor(options: CommandBuildToolOptions) {
    this.command = options.command;
    this.runner = options.runner ?? runCommand;
  }

  async build(request: BuildRequest): Promise<BuildOutput> {
    const outputDir = path.join(request.workspace, OUTPUT_DIR_NAME);
    await fs.mkdir(outputDir, { recursive: true });

    const result = await this.runner(this.command, {
      cwd: request.workspace,
      env: buildEnvironment(request, outputDir),
      signal: request.signal,
    });

    if (result.exitCode !== 0) {
      const lastLine = outputLines(result.stderr).pop();
      throw new CommandError(
        `Build command exited with code ${result.exitCode}${lastLine !== undefined ? `: ${lastLine}` : ""}`,
        this.command.command,
        result.stderr
      );
    }

    const entries = await fs.readdir(outputDir, { withFileTypes: true });
    const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    const [fileName] = files;
    if (fileName === undefined || files.length !== 1) {
      throw new CommandError(
        `Build command must leave exactly one file in ${outputDir}, found ${files.length}`,
        this.command.command
      );
    }

    const binary = await fs.readFile(path.join(outputDir, fileName));
    return { binary, file_name: fileName };
  }
}
