/**
 * パイプライン Run の型定義
 */

import type { BuildCell } from "./matrix.js";
import type { BuildFailure } from "./artifact.js";
import type { GateResult } from "./gate.js";
import type { EndpointReport, PublishReport } from "./publish.js";
import type { VersionRecord } from "./version.js";

/**
 * Run ID の形式: release-{UUIDv7}
 */
export type ReleaseRunId = `release-${string}`;

/**
 * パイプラインのステージ
 */
export type PipelineStage =
  | "pending"
  | "reading_version"
  | "checking_dependencies"
  | "gating"
  | "building"
  | "collecting"
  | "publishing"
  | "advancing"
  | "succeeded"
  | "failed";

/**
 * Run 失敗の理由
 * ログ・ジャーナル・結果のすべてで区別できること
 */
export type FailureReason =
  | "TRIGGER_REJECTED"
  | "RUN_IN_PROGRESS"
  | "VERSION_READ_FAILED"
  | "DEPENDENCY_INVALID"
  | "GATE_FAILED"
  | "COLLECTION_INCOMPLETE"
  | "NAME_COLLISION"
  | "NO_ARTIFACTS"
  | "PUBLISH_FAILED"
  | "VERSION_WRITE_FAILED"
  | "CANCELLED"
  | "INTERNAL_ERROR";

/**
 * Run の起動トリガー
 * triggered_by は来歴の記録のみで、動作には影響しない
 */
export type Trigger =
  | { kind: "push"; ref: string }
  | { kind: "manual"; triggered_by?: string };

/**
 * ステージ遷移の記録
 */
export interface StageTransition {
  from: PipelineStage;
  to: PipelineStage;
  /** 遷移ごとに 1 ずつ増える番号（初期値 1） */
  revision: number;
  timestamp: string;
  reason?: string;
}

/**
 * 名前衝突の情報
 */
export interface NameCollision {
  canonical_name: string;
  cells: BuildCell[];
}

/**
 * 失敗の詳細（理由ごとに該当するフィールドのみ設定）
 */
export interface FailureDetails {
  dependency_errors?: string[];
  gate?: GateResult;
  failed_cells?: BuildFailure[];
  missing_cells?: BuildCell[];
  collision?: NameCollision;
  endpoints?: EndpointReport[];
  /** VERSION_WRITE_FAILED 時: 公開済みだが記録できなかったバージョン */
  published_version?: string;
  cause?: string;
}

export interface PipelineSuccess {
  success: true;
  run_id: ReleaseRunId;
  version: string;
  version_record: VersionRecord;
  artifacts: string[];
  publish: PublishReport;
  stages: StageTransition[];
}

export interface PipelineFailure {
  success: false;
  run_id: ReleaseRunId;
  /** 失敗したステージ */
  stage: PipelineStage;
  reason: FailureReason;
  message: string;
  details: FailureDetails;
  stages: StageTransition[];
}

export type PipelineResult = PipelineSuccess | PipelineFailure;
