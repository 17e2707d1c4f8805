/**
 * WorkspaceStore
 * Run・セルごとに分離されたビルド作業ディレクトリを管理
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ReleaseRunId } from "../types/index.js";

/**
 * デフォルトのワークスペースベースディレクトリ
 */
const DEFAULT_BASE_DIR = ".release_gate/workspaces";

/**
 * WorkspaceStore オプション
 */
export interface WorkspaceStoreOptions {
  /** ワークスペースのベースディレクトリ */
  baseDir?: string;
}

/**
 * WorkspaceStore
 * セル同士がファイルシステムを共有しないよう、セルごとに専用ディレクトリを割り当てる
 */
export class WorkspaceStore {
  private readonly baseDir: string;

  constructor(options: WorkspaceStoreOptions = {}) {
    this.baseDir = options.baseDir ?? DEFAULT_BASE_DIR;
  }

  /**
   * Run のワークスペースルート
   */
  getRunDir(runId: ReleaseRunId): string {
    return path.join(this.baseDir, runId);
  }

  /**
   * Run 内の個別ワークスペースのパス
   * @param key - セルキー（例: "linux-x86_64-3.10"）または "gate"
   */
  getWorkspaceDir(runId: ReleaseRunId, key: string): string {
    return path.join(this.getRunDir(runId), key);
  }

  /**
   * 空のワークスペースを作成（既存の内容は削除）
   */
  async createWorkspace(runId: ReleaseRunId, key: string): Promise<string> {
    const dir = this.getWorkspaceDir(runId, key);
    await fs.rm(dir, { recursive: true, force: true });
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  /**
   * ワークスペースを削除
   * @returns 削除成功なら true、ディレクトリが存在しなければ false
   */
  async deleteWorkspace(runId: ReleaseRunId, key: string): Promise<boolean> {
    return removeDir(this.getWorkspaceDir(runId, key));
  }

  /**
   * Run のワークスペースをまとめて削除
   */
  async deleteRun(runId: ReleaseRunId): Promise<boolean> {
    return removeDir(this.getRunDir(runId));
  }

  async workspaceExists(runId: ReleaseRunId, key: string): Promise<boolean> {
    try {
      await fs.access(this.getWorkspaceDir(runId, key));
      return true;
    } catch {
      return false;
    }
  }
}

async function removeDir(dir: string): Promise<boolean> {
  try {
    await fs.rm(dir, { recursive: true });
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
