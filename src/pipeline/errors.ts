/**
 * パイプラインのエラー
 */

import type { PipelineStage } from "../types/index.js";

/**
 * 遷移表にない遷移
 */
export class IllegalStageTransitionError extends Error {
  constructor(
    public readonly from: PipelineStage,
    public readonly to: PipelineStage
  ) {
    super(`Illegal stage transition: ${from} -> ${to}`);
    this.name = "IllegalStageTransitionError";
  }
}
