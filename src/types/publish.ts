/**
 * 公開（publish）の型定義
 */

/**
 * 同名エントリが既に存在する場合の扱い
 * - skip: 同一内容ならスキップ、内容が異なれば衝突として失敗
 * - replace: 既存エントリを削除して再公開
 */
export type ExistingEntryPolicy = "skip" | "replace";

/** エンドポイントの種類 */
export type EndpointKind = "directory";

/**
 * 公開先エンドポイントの設定
 */
export interface EndpointConfig {
  name: string;
  kind: EndpointKind;
  /** directory エンドポイントの出力先 */
  path: string;
  /** true の場合、失敗は Run 全体の失敗 */
  required: boolean;
  on_existing: ExistingEntryPolicy;
  /** 認証情報を保持する環境変数名 */
  credentials_env?: string;
}

/**
 * 外部から渡される認証情報
 */
export interface Credentials {
  token: string;
}

/**
 * インデックス上の公開済みエントリ
 */
export interface PublishedEntry {
  canonical_name: string;
  version: string;
  digest: string;
  /** 取得用のハンドル（パスや URL） */
  location: string;
}

/** 成果物ごとの公開結果 */
export type PublishOutcome = "published" | "skipped" | "replaced";

export interface PublishEntryResult {
  canonical_name: string;
  outcome: PublishOutcome;
  location: string;
}

/**
 * エンドポイントごとの結果
 */
export interface EndpointReport {
  endpoint: string;
  required: boolean;
  success: boolean;
  entries: PublishEntryResult[];
  error?: string;
}

/**
 * Publisher 全体の結果
 */
export interface PublishReport {
  /** VersionAdvancer を実行してよいか */
  success: boolean;
  endpoints: EndpointReport[];
  /** 失敗したがブロックしなかったエンドポイントの警告 */
  warnings: string[];
}
