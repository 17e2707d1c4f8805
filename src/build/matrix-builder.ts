/**
 * Matrix Builder
 * セルごとに 1 タスクを発行し、全セルが終了状態になるまで待つ
 *
 * - セルの失敗は兄弟セルを止めない
 * - タイムアウトはそのセルだけの失敗
 * - 同時実行数はセマフォで制限
 */

import type {
  BuildCell,
  BuildFailure,
  BuildFailureKind,
  BuildTool,
  CellResult,
  DependencyPaths,
  PlatformTagOptions,
  ReleaseRunId,
} from "../types/index.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { cellKey } from "../matrix/matrix.js";
import {
  canonicalArtifactName,
  DEFAULT_PLATFORM_TAG_OPTIONS,
  platformTag,
  type NamingOptions,
} from "../matrix/naming.js";
import { createArtifact, describeError, runBuildTask } from "./build-task.js";
import { Semaphore } from "./semaphore.js";
import type { WorkspaceStore } from "./workspace-store.js";

const DEFAULT_CONCURRENCY = 4;

export interface MatrixBuilderOptions {
  buildTool: BuildTool;
  workspaces: WorkspaceStore;
  naming: NamingOptions;
  platformTags?: PlatformTagOptions;
  concurrency?: number;
  /** セルごとのタイムアウト（0 以下なら無制限） */
  cellTimeoutMs?: number;
  /** true ならビルド後もワークスペースを残す */
  keepWorkspaces?: boolean;
  logger?: Logger;
}

export interface BuildMatrixParams {
  runId: ReleaseRunId;
  cells: readonly BuildCell[];
  sourceRevision: string;
  dependencies: DependencyPaths;
  version: string;
  signal?: AbortSignal | undefined;
}

export class MatrixBuilder {
  private readonly buildTool: BuildTool;
  private readonly workspaces: WorkspaceStore;
  private readonly naming: NamingOptions;
  private readonly platformTags: PlatformTagOptions;
  private readonly concurrency: number;
  private readonly cellTimeoutMs: number;
  private readonly keepWorkspaces: boolean;
  private readonly logger: Logger;

  constructor(options: MatrixBuilderOptions) {
    this.buildTool = options.buildTool;
    this.workspaces = options.workspaces;
    this.naming = options.naming;
    this.platformTags = options.platformTags ?? DEFAULT_PLATFORM_TAG_OPTIONS;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.cellTimeoutMs = options.cellTimeoutMs ?? 0;
    this.keepWorkspaces = options.keepWorkspaces ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * 全セルをビルドする
   * 戻り値はセルと同じ順序で、セルごとに必ず 1 つの結果を含む
   */
  async buildAll(params: BuildMatrixParams): Promise<CellResult[]> {
    const semaphore = new Semaphore(Math.max(1, this.concurrency));

    this.logger.info("matrix_dispatch", "Dispatching matrix cells", {
      cells: params.cells.length,
      concurrency: semaphore.capacity,
    });

    const results = await Promise.all(
      params.cells.map((cell) => semaphore.run(() => this.buildCell(cell, params)))
    );

    const failed = results.filter((r) => !r.ok).length;
    this.logger.info("matrix_joined", "All matrix cells reported", {
      succeeded: results.length - failed,
      failed,
      peak_in_flight: semaphore.getPeak(),
    });

    return results;
  }

  private async buildCell(cell: BuildCell, params: BuildMatrixParams): Promise<CellResult> {
    const key = cellKey(cell);
    if (params.signal?.aborted) {
      return this.fail(cell, "cancelled", "Run was cancelled before the cell started");
    }

    let workspace: string;
    try {
      workspace = await this.workspaces.createWorkspace(params.runId, key);
    } catch (error) {
      return this.fail(cell, "tool_error", `Failed to create workspace: ${describeError(error)}`);
    }

    const tag = platformTag(cell, this.platformTags);
    this.logger.debug("cell_started", "Building cell", { cell: key, platform_tag: tag });

    try {
      const outcome = await runBuildTask(
        this.buildTool,
        {
          source_revision: params.sourceRevision,
          dependencies: params.dependencies,
          target: cell,
          platform_tag: tag,
          version: params.version,
          workspace,
        },
        { timeoutMs: this.cellTimeoutMs, signal: params.signal }
      );

      switch (outcome.type) {
        case "timeout":
          return this.fail(cell, "timeout", `Build exceeded ${this.cellTimeoutMs}ms`);
        case "cancelled":
          return this.fail(cell, "cancelled", "Run was cancelled during the build");
        case "error":
          return this.fail(cell, "tool_error", describeError(outcome.error));
        case "output": {
          if (outcome.output.binary.byteLength === 0) {
            return this.fail(cell, "empty_output", `Build produced an empty binary: ${outcome.output.file_name}`);
          }
          const artifact = createArtifact(
            cell,
            params.version,
            canonicalArtifactName(this.naming, params.version, cell),
            outcome.output
          );
          this.logger.info("cell_succeeded", "Cell built", {
            cell: key,
            canonical_name: artifact.canonical_name,
            size: artifact.size,
          });
          return { ok: true, artifact };
        }
      }
    } finally {
      await this.cleanup(params.runId, key);
    }
  }

  private fail(cell: BuildCell, kind: BuildFailureKind, message: string): CellResult {
    const failure: BuildFailure = { cell, kind, message };
    this.logger.warn("cell_failed", "Cell build failed", {
      cell: cellKey(cell),
      kind,
      message,
    });
    return { ok: false, failure };
  }

  private async cleanup(runId: ReleaseRunId, key: string): Promise<void> {
    if (this.keepWorkspaces) return;
    try {
      await this.workspaces.deleteWorkspace(runId, key);
    } catch (error) {
      this.logger.warn("workspace_cleanup_failed", "Failed to remove cell workspace", {
        cell: key,
        error: describeError(error),
      });
    }
  }
}
