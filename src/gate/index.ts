/**
 * Gate モジュール
 * 依存パスの検証とインターフェースゲート
 */

export { checkDependencies } from "./dependency-check.js";
export type { DependencyCheckResult } from "./dependency-check.js";
export { InterfaceGate, GATE_WORKSPACE_KEY } from "./interface-gate.js";
export type { InterfaceGateOptions, GateParams, GateOutcome } from "./interface-gate.js";
