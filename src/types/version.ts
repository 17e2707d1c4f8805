/**
 * バージョン管理の型定義
 */

/**
 * 永続化されるバージョンレコード
 *
 * @law next_version は current_version より厳密に大きい（成分ごとの比較）
 * @law VersionAdvancer 以外は書き換えない
 */
export interface VersionRecord {
  /** 最後にリリースされたバージョン */
  current_version: string;
  /** 次の Run が公開するバージョン */
  next_version: string;
}
