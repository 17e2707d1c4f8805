/**
 * コマンド型の適合性チェッカー
 * 終了コード 0 を合格とし、出力の各行を診断メッセージとして扱う
 */

import * as path from "node:path";
import type { CheckRequest, CommandSpec, ConformanceChecker, GateResult } from "../types/index.js";
import { outputLines, runCommand, type CommandRunner } from "./command-runner.js";

export interface CommandConformanceCheckerOptions {
  command: CommandSpec;
  runner?: CommandRunner;
}

export class CommandConformanceChecker implements ConformanceChecker {
  private readonly command: CommandSpec;
  private readonly runner: CommandRunner;

  constructor(options: CommandConformanceCheckerOptions) {
    this.command = options.command;
    this.runner = options.runner ?? runCommand;
  }

  async check(request: CheckRequest): Promise<GateResult> {
    const result = await this.runner(this.command, {
      cwd: path.dirname(request.artifact_path),
      env: {
        RELEASE_ARTIFACT_PATH: request.artifact_path,
        RELEASE_CONTRACT_FILE: request.contract_file,
      },
      signal: request.signal,
    });

    return {
      passed: result.exitCode === 0,
      diagnostics: outputLines(result.stdout, result.stderr),
    };
  }
}
