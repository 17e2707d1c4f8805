/**
 * 単一ビルドの実行
 * タイムアウトと中断を扱い、ビルドツールの reject を値として返す
 */

import { createHash } from "node:crypto";
import type {
  Artifact,
  BuildCell,
  BuildOutput,
  BuildRequest,
  BuildTool,
} from "../types/index.js";

/**
 * ビルドの終了状態
 */
export type BuildTaskOutcome =
  | { type: "output"; output: BuildOutput }
  | { type: "error"; error: unknown }
  | { type: "timeout" }
  | { type: "cancelled" };

/**
 * abort 後にビルドツールの終了を待つ上限（ミリ秒）
 */
const DEFAULT_ABORT_GRACE_MS = 5000;

export interface BuildTaskOptions {
  /** 0 以下ならタイムアウトなし */
  timeoutMs: number;
  /** Run 全体の中断シグナル */
  signal?: AbortSignal | undefined;
  /** タイムアウト・中断後にツールの終了を待つ時間 */
  abortGraceMs?: number;
}

/**
 * ビルドツールを呼び出す
 * タイムアウト・中断時はツールに渡したシグナルを abort し、終了を待ってから返す
 * ツールの同期例外も error として返す
 */
export async function runBuildTask(
  tool: BuildTool,
  request: Omit<BuildRequest, "signal">,
  options: BuildTaskOptions
): Promise<BuildTaskOutcome> {
  const parent = options.signal;
  if (parent?.aborted) {
    return { type: "cancelled" };
  }

  const controller = new AbortController();
  const cancelled = whenAborted(parent);
  const timedOut = timeoutAfter(options.timeoutMs);

  const built = Promise.resolve()
    .then(() => tool.build({ ...request, signal: controller.signal }))
    .then(
      (output): BuildTaskOutcome => ({ type: "output", output }),
      (error: unknown): BuildTaskOutcome => ({ type: "error", error })
    );

  try {
    const outcome = await Promise.race([built, timedOut.promise, cancelled.promise]);
    if (outcome.type === "timeout" || outcome.type === "cancelled") {
      controller.abort();
      // ワークスペースを片付ける前にツールの後始末を待つ
      await settleWithin(built, options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS);
    }
    return outcome;
  } finally {
    timedOut.dispose();
    cancelled.dispose();
  }
}

async function settleWithin(promise: Promise<unknown>, ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  try {
    await Promise.race([promise.then(() => undefined), expired]);
  } finally {
    clearTimeout(timer);
  }
}

interface PendingOutcome {
  promise: Promise<BuildTaskOutcome>;
  dispose: () => void;
}

function timeoutAfter(ms: number): PendingOutcome {
  if (ms <= 0) {
    return { promise: new Promise<BuildTaskOutcome>(() => {}), dispose: () => {} };
  }
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<BuildTaskOutcome>((resolve) => {
    timer = setTimeout(() => resolve({ type: "timeout" }), ms);
  });
  return { promise, dispose: () => clearTimeout(timer) };
}

function whenAborted(signal: AbortSignal | undefined): PendingOutcome {
  if (!signal) {
    return { promise: new Promise<BuildTaskOutcome>(() => {}), dispose: () => {} };
  }
  let listener: () => void = () => {};
  const promise = new Promise<BuildTaskOutcome>((resolve) => {
    listener = () => resolve({ type: "cancelled" });
    signal.addEventListener("abort", listener, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", listener) };
}

/**
 * バイナリの SHA-256（小文字 16 進）
 */
export function digestOf(binary: Uint8Array): string {
  return createHash("sha256").update(binary).digest("hex");
}

/**
 * ビルド出力から不変の Artifact を作成
 */
export function createArtifact(
  cell: BuildCell,
  version: string,
  canonicalName: string,
  output: BuildOutput
): Artifact {
  return Object.freeze({
    cell,
    version,
    canonical_name: canonicalName,
    file_name: output.file_name,
    binary: output.binary,
    digest: digestOf(output.binary),
    size: output.binary.byteLength,
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
