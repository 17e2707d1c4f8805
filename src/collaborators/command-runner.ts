/**
 * 外部コマンドの実行
 * シェルを介さず spawn し、stdout / stderr を収集する
 */

import { spawn } from "node:child_process";
import type { CommandSpec } from "../types/index.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  /** process.env に上書きで追加する変数 */
  env?: Record<string, string>;
  signal?: AbortSignal;
  /** 0 以下なら無制限 */
  timeoutMs?: number;
}

/**
 * コマンド実行関数（テストでは差し替える）
 */
export type CommandRunner = (spec: CommandSpec, options: RunCommandOptions) => Promise<CommandResult>;

/**
 * コマンドを起動できなかった、またはシグナルで終了した
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stderr: string = "",
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "CommandError";
  }
}

/**
 * コマンドを実行する
 * 終了コードが 0 以外でも reject しない（判断は呼び出し側）
 * @throws CommandError - 起動失敗・中断・タイムアウト
 */
export const runCommand: CommandRunner = (spec, options) => {
  return new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(spec.command, spec.args, {
      ...(options.cwd !== undefined && { cwd: options.cwd }),
      env: { ...process.env, ...options.env },
      ...(options.signal !== undefined && { signal: options.signal }),
      ...(options.timeoutMs !== undefined && options.timeoutMs > 0 && { timeout: options.timeoutMs }),
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString("utf-8");
    });
    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString("utf-8");
    });

    proc.on("error", (error) => {
      reject(new CommandError(`Failed to run ${spec.command}: ${error.message}`, spec.command, stderr, error));
    });

    proc.on("close", (code, signal) => {
      if (code === null) {
        reject(
          new CommandError(`${spec.command} was terminated by ${signal ?? "a signal"}`, spec.command, stderr)
        );
        return;
      }
      resolve({ exitCode: code, stdout, stderr });
    });
  });
};

/**
 * 出力の空でない行を取り出す
 */
export function outputLines(...outputs: string[]): string[] {
  return outputs
    .flatMap((output) => output.split(/\r?\n/))
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
