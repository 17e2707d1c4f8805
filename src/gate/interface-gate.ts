/**
 * Interface Gate
 * 代表セルの成果物を 1 つだけビルドし、公開インターフェースを契約ファイルと照合する
 * 失敗した場合、マトリクスビルド以降は一切実行されない
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
  BuildCell,
  BuildTool,
  ConformanceChecker,
  DependencyPaths,
  GateResult,
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
import { createArtifact, describeError, runBuildTask } from "../build/build-task.js";
import type { WorkspaceStore } from "../build/workspace-store.js";

/**
 * ゲート用ワークスペースのキー（セルキーと衝突しない）
 */
export const GATE_WORKSPACE_KEY = "gate";

export interface InterfaceGateOptions {
  buildTool: BuildTool;
  checker: ConformanceChecker;
  workspaces: WorkspaceStore;
  naming: NamingOptions;
  /** 許可リスト形式のスタブ（期待される公開インターフェース） */
  contractFile: string;
  platformTags?: PlatformTagOptions;
  buildTimeoutMs?: number;
  logger?: Logger;
}

export interface GateParams {
  runId: ReleaseRunId;
  reference: BuildCell;
  sourceRevision: string;
  dependencies: DependencyPaths;
  version: string;
  signal?: AbortSignal | undefined;
}

/**
 * ゲートの実行結果
 * cancelled は GateResult とは別に扱う（契約違反ではない）
 */
export type GateOutcome =
  | { type: "result"; result: GateResult }
  | { type: "cancelled" };

export class InterfaceGate {
  private readonly options: InterfaceGateOptions;
  private readonly logger: Logger;

  constructor(options: InterfaceGateOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * ゲートを実行する
   * ワークスペースは結果にかかわらず破棄される
   */
  async run(params: GateParams): Promise<GateOutcome> {
    const { workspaces } = this.options;

    if (!(await fileExists(this.options.contractFile))) {
      return this.failed([`Contract file not found: ${this.options.contractFile}`]);
    }

    const workspace = await workspaces.createWorkspace(params.runId, GATE_WORKSPACE_KEY);
    try {
      return await this.buildAndCheck(params, workspace);
    } finally {
      await workspaces.deleteWorkspace(params.runId, GATE_WORKSPACE_KEY);
    }
  }

  private async buildAndCheck(params: GateParams, workspace: string): Promise<GateOutcome> {
    const cell = params.reference;
    const tag = platformTag(cell, this.options.platformTags ?? DEFAULT_PLATFORM_TAG_OPTIONS);

    this.logger.info("gate_build", "Building reference artifact", {
      cell: cellKey(cell),
      platform_tag: tag,
    });

    const outcome = await runBuildTask(
      this.options.buildTool,
      {
        source_revision: params.sourceRevision,
        dependencies: params.dependencies,
        target: cell,
        platform_tag: tag,
        version: params.version,
        workspace,
      },
      { timeoutMs: this.options.buildTimeoutMs ?? 0, signal: params.signal }
    );

    if (outcome.type === "cancelled") {
      return { type: "cancelled" };
    }
    if (outcome.type === "timeout") {
      return this.failed([`Reference build for ${cellKey(cell)} timed out`]);
    }
    if (outcome.type === "error") {
      return this.failed([
        `Reference build for ${cellKey(cell)} failed: ${describeError(outcome.error)}`,
      ]);
    }

    if (outcome.output.binary.byteLength === 0) {
      return this.failed([`Reference build for ${cellKey(cell)} produced an empty binary`]);
    }

    const artifact = createArtifact(
      cell,
      params.version,
      canonicalArtifactName(this.options.naming, params.version, cell),
      outcome.output
    );
    const artifactPath = path.join(workspace, path.basename(artifact.file_name));
    await fs.writeFile(artifactPath, artifact.binary);

    let result: GateResult;
    try {
      result = await this.options.checker.check({
        artifact,
        artifact_path: artifactPath,
        contract_file: this.options.contractFile,
        signal: params.signal ?? new AbortController().signal,
      });
    } catch (error) {
      if (params.signal?.aborted) {
        return { type: "cancelled" };
      }
      return this.failed([`Conformance checker error: ${describeError(error)}`]);
    }

    if (params.signal?.aborted) {
      return { type: "cancelled" };
    }

    if (result.passed) {
      this.logger.info("gate_passed", "Interface matches contract", {
        diagnostics: result.diagnostics.length,
      });
    } else {
      this.logger.error("gate_failed", "Interface drifted from contract", {
        diagnostics: result.diagnostics,
      });
    }
    return { type: "result", result: { passed: result.passed, diagnostics: [...result.diagnostics] } };
  }

  private failed(diagnostics: string[]): GateOutcome {
    this.logger.error("gate_failed", "Interface gate failed", { diagnostics });
    return { type: "result", result: { passed: false, diagnostics } };
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
