/**
 * 外部コラボレーターのインターフェース
 * ネイティブビルド・適合性チェック・パッケージインデックスはこのパイプラインの外側にある
 */

import type { Artifact, BuildOutput, DependencyPaths } from "./artifact.js";
import type { GateResult } from "./gate.js";
import type { BuildCell } from "./matrix.js";
import type { Credentials, PublishedEntry } from "./publish.js";

/**
 * ビルド要求
 */
export interface BuildRequest {
  source_revision: string;
  dependencies: DependencyPaths;
  target: BuildCell;
  /** ターゲットのプラットフォームタグ（例: manylinux2014_x86_64） */
  platform_tag: string;
  version: string;
  /** このセル専用の作業ディレクトリ */
  workspace: string;
  signal: AbortSignal;
}

/**
 * ビルドツール
 * 失敗時は reject する
 */
export interface BuildTool {
  build(request: BuildRequest): Promise<BuildOutput>;
}

/**
 * 適合性チェック要求
 */
export interface CheckRequest {
  artifact: Artifact;
  /** 参照成果物を書き出したパス */
  artifact_path: string;
  contract_file: string;
  signal: AbortSignal;
}

/**
 * インターフェース適合性チェッカー
 */
export interface ConformanceChecker {
  check(request: CheckRequest): Promise<GateResult>;
}

/**
 * パッケージインデックス（ステージングインデックスやタグ付きリリースストア）
 */
export interface PackageIndex {
  /** 同名・同バージョンのエントリを探す */
  lookup(canonicalName: string, version: string): Promise<PublishedEntry | null>;
  publish(
    artifact: Artifact,
    version: string,
    credentials: Credentials | undefined
  ): Promise<PublishedEntry>;
  remove(
    canonicalName: string,
    version: string,
    credentials: Credentials | undefined
  ): Promise<void>;
}
