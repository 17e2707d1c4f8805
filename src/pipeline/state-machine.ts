/**
 * Release State Machine
 * Run のステージ遷移を管理し、遷移履歴と revision を保持する
 */

import type { PipelineStage, ReleaseRunId, StageTransition } from "../types/index.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { IllegalStageTransitionError } from "./errors.js";
import { canTransition, isTerminalStage } from "./stages.js";

export class ReleaseStateMachine {
  private current: PipelineStage = "pending";
  private revision = 1;
  private readonly history: StageTransition[] = [];
  private readonly logger: Logger;

  constructor(
    readonly runId: ReleaseRunId,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get stage(): PipelineStage {
    return this.current;
  }

  get currentRevision(): number {
    return this.revision;
  }

  /**
   * ステージを進める
   * @throws IllegalStageTransitionError - 遷移表にない遷移
   */
  transition(to: PipelineStage, reason?: string): StageTransition {
    const from = this.current;
    if (!canTransition(from, to)) {
      this.logger.error("illegal_stage_transition", "Illegal stage transition attempted", {
        from,
        to,
        history: this.history.map((t) => `${t.from}->${t.to}`),
      });
      throw new IllegalStageTransitionError(from, to);
    }

    this.revision++;
    const transition: StageTransition = {
      from,
      to,
      revision: this.revision,
      timestamp: new Date().toISOString(),
      ...(reason !== undefined && { reason }),
    };
    this.history.push(transition);
    this.current = to;

    this.logger.info("stage_transition", "Pipeline stage changed", {
      from,
      to,
      revision: this.revision,
      ...(reason !== undefined && { reason }),
    });
    return transition;
  }

  isTerminal(): boolean {
    return isTerminalStage(this.current);
  }

  getHistory(): StageTransition[] {
    return [...this.history];
  }
}
