/**
 * Build モジュール
 * マトリクスのファンアウトとワークスペース管理
 */

export { MatrixBuilder } from "./matrix-builder.js";
export type { MatrixBuilderOptions, BuildMatrixParams } from "./matrix-builder.js";
export { WorkspaceStore } from "./workspace-store.js";
export type { WorkspaceStoreOptions } from "./workspace-store.js";
export { Semaphore } from "./semaphore.js";
export { runBuildTask, createArtifact, digestOf } from "./build-task.js";
export type { BuildTaskOutcome, BuildTaskOptions } from "./build-task.js";
