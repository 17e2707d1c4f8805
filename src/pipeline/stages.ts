/**
 * パイプラインのステージと遷移表
 */

import type { PipelineStage } from "../types/index.js";

/**
 * 許可される遷移
 * 各ステージは次のステージか failed にしか進めない
 */
export const STAGE_TRANSITIONS: Readonly<Record<PipelineStage, readonly PipelineStage[]>> = {
  pending: ["reading_version", "failed"],
  reading_version: ["checking_dependencies", "failed"],
  checking_dependencies: ["gating", "failed"],
  gating: ["building", "failed"],
  building: ["collecting", "failed"],
  collecting: ["publishing", "failed"],
  publishing: ["advancing", "failed"],
  advancing: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

export const STAGE_DESCRIPTIONS: Readonly<Record<PipelineStage, string>> = {
  pending: "Run created, waiting for the release lock",
  reading_version: "Reading the version record",
  checking_dependencies: "Validating dependency coordinates",
  gating: "Verifying the reference artifact against the interface contract",
  building: "Building every matrix cell",
  collecting: "Waiting for all cells and collecting artifacts",
  publishing: "Publishing the artifact set",
  advancing: "Advancing the version record",
  succeeded: "Run finished successfully",
  failed: "Run failed",
};

export function isTerminalStage(stage: PipelineStage): boolean {
  return STAGE_TRANSITIONS[stage].length === 0;
}

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return STAGE_TRANSITIONS[from].includes(to);
}
