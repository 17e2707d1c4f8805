/**
 * リリース設定の型定義
 * @see src/config/parser.ts
 */

import type { DependencyName, DependencyPaths } from "./artifact.js";
import type { BuildCell, MatrixDefinition, PlatformTagOptions } from "./matrix.js";
import type { EndpointConfig } from "./publish.js";

/**
 * 外部コマンドの定義
 */
export interface CommandSpec {
  command: string;
  args: string[];
}

export interface ReleaseConfig {
  package: {
    name: string;
    /** canonical_name でインタプリタバージョンの前に付ける接頭辞 */
    interpreter_prefix: string;
  };
  source: {
    revision: string;
    /** push トリガーを受け付けるブランチ */
    branch: string;
  };
  version_file: string;
  dependencies: DependencyPaths;
  /** 依存ディレクトリ内に存在すべきエントリ */
  dependency_markers: Partial<Record<DependencyName, string[]>>;
  matrix: MatrixDefinition;
  gate: {
    contract_file: string;
    reference?: BuildCell;
  };
  build: {
    command?: CommandSpec;
    concurrency: number;
    cell_timeout_ms: number;
    workspace_dir: string;
    keep_workspaces: boolean;
    platform_tags: PlatformTagOptions;
  };
  check: {
    command?: CommandSpec;
  };
  publish: {
    block_on_optional_failure: boolean;
    endpoints: EndpointConfig[];
  };
  lock: {
    path: string;
    wait_ms: number;
    stale_after_ms: number;
  };
  journal_dir: string;
}

export interface ConfigValidationError {
  code: string;
  message: string;
  path: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
}
