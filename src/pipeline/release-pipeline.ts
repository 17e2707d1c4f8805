/**
 * Release Pipeline
 * ゲート付きの一連のステージを 1 Run として実行する
 *
 * ```
 * lock -> version -> dependencies -> gate -> build -> collect -> publish -> advance
 * ```
 *
 * 想定内の失敗は例外にせず PipelineFailure として返す
 */

import { v7 as uuidv7 } from "uuid";
import type {
  BuildCell,
  BuildTool,
  ConformanceChecker,
  FailureDetails,
  FailureReason,
  PipelineFailure,
  PipelineResult,
  PipelineStage,
  PublishReport,
  ReleaseConfig,
  ReleaseRunId,
  Trigger,
  VersionRecord,
} from "../types/index.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { LockError, withFileLock } from "../lock/file-lock.js";
import { VersionStore } from "../version/version-store.js";
import { VersionAdvancer } from "../version/version-advancer.js";
import { enumerateMatrix } from "../matrix/matrix.js";
import type { NamingOptions } from "../matrix/naming.js";
import { checkDependencies } from "../gate/dependency-check.js";
import { InterfaceGate } from "../gate/interface-gate.js";
import { WorkspaceStore } from "../build/workspace-store.js";
import { MatrixBuilder } from "../build/matrix-builder.js";
import { describeError } from "../build/build-task.js";
import { ArtifactCollector } from "../collect/artifact-collector.js";
import {
  NoArtifactsError,
  Publisher,
  type CredentialsResolver,
  type PublishTarget,
} from "../publish/publisher.js";
import { ReleaseStateMachine } from "./state-machine.js";
import { RunJournal, type JournalEntry } from "./run-journal.js";

/**
 * Run ロックの再試行間隔
 */
const LOCK_RETRY_INTERVAL = 250;

export interface ReleasePipelineOptions {
  config: ReleaseConfig;
  buildTool: BuildTool;
  checker: ConformanceChecker;
  targets: PublishTarget[];
  versionStore?: VersionStore;
  workspaces?: WorkspaceStore;
  journal?: RunJournal;
  resolveCredentials?: CredentialsResolver;
  logger?: Logger;
}

export interface RunParams {
  trigger: Trigger;
  /** 省略時は config.source.revision */
  sourceRevision?: string;
  signal?: AbortSignal;
}

/**
 * 1 Run 分の状態
 */
interface RunContext {
  runId: ReleaseRunId;
  machine: ReleaseStateMachine;
  logger: Logger;
  signal: AbortSignal | undefined;
  sourceRevision: string;
}

export class ReleasePipeline {
  private readonly config: ReleaseConfig;
  private readonly buildTool: BuildTool;
  private readonly checker: ConformanceChecker;
  private readonly targets: PublishTarget[];
  private readonly versionStore: VersionStore;
  private readonly workspaces: WorkspaceStore;
  private readonly journal: RunJournal;
  private readonly resolveCredentials: CredentialsResolver | undefined;
  private readonly logger: Logger;

  constructor(options: ReleasePipelineOptions) {
    this.config = options.config;
    this.buildTool = options.buildTool;
    this.checker = options.checker;
    this.targets = options.targets;
    this.versionStore =
      options.versionStore ?? new VersionStore({ filePath: options.config.version_file });
    this.workspaces =
      options.workspaces ?? new WorkspaceStore({ baseDir: options.config.build.workspace_dir });
    this.journal = options.journal ?? new RunJournal({ baseDir: options.config.journal_dir });
    this.resolveCredentials = options.resolveCredentials;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run を 1 回実行する
   */
  async run(params: RunParams): Promise<PipelineResult> {
    const runId: ReleaseRunId = `release-${uuidv7()}`;
    const logger = this.logger.child({ run_id: runId });
    const ctx: RunContext = {
      runId,
      machine: new ReleaseStateMachine(runId, { logger }),
      logger,
      signal: params.signal,
      sourceRevision: params.sourceRevision ?? this.config.source.revision,
    };

    logger.info("run_started", "Release run started", {
      trigger: params.trigger.kind,
      source_revision: ctx.sourceRevision,
      ...(params.trigger.kind === "push" && { ref: params.trigger.ref }),
      ...(params.trigger.kind === "manual" &&
        params.trigger.triggered_by !== undefined && { triggered_by: params.trigger.triggered_by }),
    });
    await this.recordTrigger(ctx, params.trigger);

    if (!this.acceptsTrigger(params.trigger)) {
      const ref = params.trigger.kind === "push" ? params.trigger.ref : "";
      return this.fail(
        ctx,
        "TRIGGER_REJECTED",
        `Push to '${ref}' does not trigger a release (branch: ${this.config.source.branch})`
      );
    }

    try {
      return await withFileLock(this.config.lock.path, () => this.execute(ctx), {
        maxRetries: Math.ceil(this.config.lock.wait_ms / LOCK_RETRY_INTERVAL),
        retryInterval: LOCK_RETRY_INTERVAL,
        staleAfter: this.config.lock.stale_after_ms,
        owner: runId,
        onLost: (error) => {
          logger.warn("run_lock_lost", "Release lock is no longer held by this run", {
            error: error.message,
          });
        },
      });
    } catch (error) {
      if (error instanceof LockError) {
        return this.fail(ctx, "RUN_IN_PROGRESS", "Another release run holds the release lock", {
          cause: error.holder?.owner ?? error.message,
        });
      }
      return this.fail(ctx, "INTERNAL_ERROR", describeError(error), { cause: describeError(error) });
    }
  }

  /**
   * push は設定されたブランチへのものだけ受け付ける
   */
  private acceptsTrigger(trigger: Trigger): boolean {
    if (trigger.kind === "manual") return true;
    const branch = this.config.source.branch;
    return trigger.ref === branch || trigger.ref === `refs/heads/${branch}`;
  }

  private async execute(ctx: RunContext): Promise<PipelineResult> {
    try {
      return await this.executeStages(ctx);
    } catch (error) {
      ctx.logger.error("unexpected_error", "Run aborted by an unexpected error", {
        stage: ctx.machine.stage,
        error: describeError(error),
      });
      return this.fail(ctx, "INTERNAL_ERROR", describeError(error), { cause: describeError(error) });
    } finally {
      await this.cleanupWorkspaces(ctx);
    }
  }

  private async executeStages(ctx: RunContext): Promise<PipelineResult> {
    const { config } = this;
    const naming: NamingOptions = {
      packageName: config.package.name,
      interpreterPrefix: config.package.interpreter_prefix,
    };

    // バージョン読み込み
    let record: VersionRecord;
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "reading_version");
    try {
      record = await this.versionStore.read();
    } catch (error) {
      return this.fail(ctx, "VERSION_READ_FAILED", describeError(error), {
        cause: describeError(error),
      });
    }
    const version = record.next_version;
    ctx.logger.info("version_read", "Version record loaded", {
      current_version: record.current_version,
      next_version: record.next_version,
    });

    // 依存チェック
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "checking_dependencies");
    const dependencyCheck = await checkDependencies(config.dependencies, config.dependency_markers);
    if (!dependencyCheck.valid) {
      return this.fail(ctx, "DEPENDENCY_INVALID", "Dependency coordinates are invalid", {
        dependency_errors: dependencyCheck.errors,
      });
    }

    // インターフェースゲート
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "gating");
    const cells = enumerateMatrix(config.matrix);
    const reference: BuildCell | undefined = config.gate.reference ?? cells[0];
    if (reference === undefined) {
      return this.fail(ctx, "NO_ARTIFACTS", "Matrix has no cells to build");
    }

    const gate = new InterfaceGate({
      buildTool: this.buildTool,
      checker: this.checker,
      workspaces: this.workspaces,
      naming,
      contractFile: config.gate.contract_file,
      platformTags: config.build.platform_tags,
      buildTimeoutMs: config.build.cell_timeout_ms,
      logger: ctx.logger,
    });
    const gateOutcome = await gate.run({
      runId: ctx.runId,
      reference,
      sourceRevision: ctx.sourceRevision,
      dependencies: config.dependencies,
      version,
      signal: ctx.signal,
    });
    if (gateOutcome.type === "cancelled") {
      return this.cancelled(ctx);
    }
    if (!gateOutcome.result.passed) {
      return this.fail(ctx, "GATE_FAILED", "Reference artifact does not conform to the interface contract", {
        gate: gateOutcome.result,
      });
    }

    // マトリクスビルド
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "building");
    const builder = new MatrixBuilder({
      buildTool: this.buildTool,
      workspaces: this.workspaces,
      naming,
      platformTags: config.build.platform_tags,
      concurrency: config.build.concurrency,
      cellTimeoutMs: config.build.cell_timeout_ms,
      keepWorkspaces: config.build.keep_workspaces,
      logger: ctx.logger,
    });
    const results = await builder.buildAll({
      runId: ctx.runId,
      cells,
      sourceRevision: ctx.sourceRevision,
      dependencies: config.dependencies,
      version,
      signal: ctx.signal,
    });

    // 収集（全セル終了後）
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "collecting");
    const collection = new ArtifactCollector({ logger: ctx.logger }).collect(results, cells, version);
    if (!collection.ok) {
      if (collection.reason === "NAME_COLLISION") {
        return this.fail(
          ctx,
          "NAME_COLLISION",
          `Canonical name '${collection.collision.canonical_name}' is produced by more than one cell`,
          { collision: collection.collision }
        );
      }
      return this.fail(
        ctx,
        "COLLECTION_INCOMPLETE",
        `${collection.failures.length + collection.missing.length} of ${cells.length} cells did not produce an artifact`,
        { failed_cells: collection.failures, missing_cells: collection.missing }
      );
    }

    // 公開
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "publishing");
    const publisher = new Publisher({
      targets: this.targets,
      blockOnOptionalFailure: config.publish.block_on_optional_failure,
      ...(this.resolveCredentials !== undefined && { resolveCredentials: this.resolveCredentials }),
      logger: ctx.logger,
    });
    let report: PublishReport;
    try {
      report = await publisher.publish(collection.set, version);
    } catch (error) {
      if (error instanceof NoArtifactsError) {
        return this.fail(ctx, "NO_ARTIFACTS", error.message);
      }
      throw error;
    }
    if (!report.success) {
      const failed = report.endpoints.filter((e) => !e.success).map((e) => e.endpoint);
      return this.fail(ctx, "PUBLISH_FAILED", `Publishing failed for: ${failed.join(", ")}`, {
        endpoints: report.endpoints,
      });
    }

    // 公開後でも取り消されたらバージョンは進めない
    if (this.isCancelled(ctx)) return this.cancelled(ctx);
    await this.enter(ctx, "advancing");
    let advanced: VersionRecord;
    try {
      advanced = await new VersionAdvancer(this.versionStore).advance(record);
    } catch (error) {
      return this.fail(
        ctx,
        "VERSION_WRITE_FAILED",
        `Version ${version} was published but the version record could not be advanced`,
        { published_version: version, cause: describeError(error) }
      );
    }

    await this.enter(ctx, "succeeded");
    ctx.logger.info("run_succeeded", "Release run succeeded", {
      version,
      current_version: advanced.current_version,
      next_version: advanced.next_version,
      artifacts: collection.set.artifacts.length,
    });

    return {
      success: true,
      run_id: ctx.runId,
      version,
      version_record: advanced,
      artifacts: collection.set.artifacts.map((a) => a.canonical_name),
      publish: report,
      stages: ctx.machine.getHistory(),
    };
  }

  private isCancelled(ctx: RunContext): boolean {
    return ctx.signal?.aborted ?? false;
  }

  private cancelled(ctx: RunContext): Promise<PipelineFailure> {
    return this.fail(ctx, "CANCELLED", `Run was cancelled during ${ctx.machine.stage}`);
  }

  /**
   * ステージに入り、ジャーナルに記録する
   */
  private async enter(ctx: RunContext, stage: PipelineStage, reason?: string): Promise<void> {
    const transition = ctx.machine.transition(stage, reason);
    await this.appendJournal(ctx, {
      timestamp: transition.timestamp,
      stage,
      revision: transition.revision,
      event: "enter",
      reason: reason ?? "",
      detail: "",
    });
  }

  private async fail(
    ctx: RunContext,
    reason: FailureReason,
    message: string,
    details: FailureDetails = {}
  ): Promise<PipelineFailure> {
    const stage = ctx.machine.stage;
    if (!ctx.machine.isTerminal()) {
      await this.enter(ctx, "failed", reason);
    }

    ctx.logger.error("run_failed", message, { stage, reason });

    return {
      success: false,
      run_id: ctx.runId,
      stage,
      reason,
      message,
      details,
      stages: ctx.machine.getHistory(),
    };
  }

  private async recordTrigger(ctx: RunContext, trigger: Trigger): Promise<void> {
    const entry: JournalEntry = {
      timestamp: new Date().toISOString(),
      stage: "pending",
      revision: ctx.machine.currentRevision,
      event: `trigger:${trigger.kind}`,
      reason: "",
      detail: trigger.kind === "push" ? trigger.ref : (trigger.triggered_by ?? ""),
    };
    try {
      await this.journal.createRun(ctx.runId, entry);
    } catch (error) {
      ctx.logger.warn("journal_write_failed", "Failed to create run journal", {
        error: describeError(error),
      });
    }
  }

  /**
   * ジャーナルの書き込み失敗は Run を止めない
   */
  private async appendJournal(ctx: RunContext, entry: JournalEntry): Promise<void> {
    try {
      await this.journal.appendEntry(ctx.runId, entry);
    } catch (error) {
      ctx.logger.warn("journal_write_failed", "Failed to append to run journal", {
        stage: entry.stage,
        error: describeError(error),
      });
    }
  }

  private async cleanupWorkspaces(ctx: RunContext): Promise<void> {
    if (this.config.build.keep_workspaces) return;
    try {
      await this.workspaces.deleteRun(ctx.runId);
    } catch (error) {
      ctx.logger.warn("workspace_cleanup_failed", "Failed to remove run workspaces", {
        error: describeError(error),
      });
    }
  }
}
