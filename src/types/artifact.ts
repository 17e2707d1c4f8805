/**
 * ビルド成果物の型定義
 *
 * ## 用語
 * - `canonical_name`: (version, platform, arch, interpreter_version) から導出される一意名
 * - `file_name`: ビルドツールが出力したファイル名（例: wheel のファイル名）
 */

import type { BuildCell } from "./matrix.js";

/**
 * 外部依存の配置パス
 */
export interface DependencyPaths {
  /** ネイティブライブラリ */
  native_lib: string;
  /** ツールチェイン */
  toolchain: string;
  /** 補助ソルバー */
  solver: string;
}

export type DependencyName = keyof DependencyPaths;

export const DEPENDENCY_NAMES: readonly DependencyName[] = ["native_lib", "toolchain", "solver"];

/**
 * ビルドツールが返す出力
 */
export interface BuildOutput {
  binary: Uint8Array;
  file_name: string;
}

/**
 * 1 セル分の成果物
 * 作成後は変更しない（canonical_name でアドレスされる）
 */
export interface Artifact {
  readonly cell: BuildCell;
  readonly version: string;
  readonly canonical_name: string;
  readonly file_name: string;
  readonly binary: Uint8Array;
  /** binary の SHA-256（小文字 16 進） */
  readonly digest: string;
  readonly size: number;
}

/** セル失敗の種別 */
export type BuildFailureKind = "tool_error" | "empty_output" | "timeout" | "cancelled";

/**
 * セル単位のビルド失敗
 */
export interface BuildFailure {
  cell: BuildCell;
  kind: BuildFailureKind;
  message: string;
}

/**
 * セルごとの結果
 */
export type CellResult =
  | { ok: true; artifact: Artifact }
  | { ok: false; failure: BuildFailure };

/**
 * 公開対象の成果物集合
 *
 * @law artifacts の canonical_name は一意
 * @law 並び順はマトリクスの列挙順
 */
export interface ArtifactSet {
  version: string;
  artifacts: readonly Artifact[];
}
