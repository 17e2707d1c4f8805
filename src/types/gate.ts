/**
 * インターフェースゲートの型定義
 */

/**
 * 適合性チェックの結果
 * passed が false の場合、以降のステージは一切実行されない
 */
export interface GateResult {
  passed: boolean;
  diagnostics: string[];
}
