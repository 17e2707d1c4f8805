/**
 * ビルドマトリクスの型定義
 */

/** ターゲット OS */
export type Platform = "linux" | "macos" | "windows";

/** ターゲット CPU アーキテクチャ */
export type Arch = "x86_64" | "aarch64";

export const PLATFORMS: readonly Platform[] = ["linux", "macos", "windows"];
export const ARCHES: readonly Arch[] = ["x86_64", "aarch64"];

/**
 * マトリクスの 1 セル
 * Run 開始時に列挙され、以後は変更されない
 */
export interface BuildCell {
  readonly platform: Platform;
  readonly arch: Arch;
  /** インタプリタのバージョン（例: "3.10"） */
  readonly interpreter_version: string;
}

/**
 * プラットフォーム軸の 1 要素
 */
export interface PlatformTarget {
  platform: Platform;
  arch: Arch;
}

/**
 * 除外条件
 * 指定されたフィールドがすべて一致するセルを除外する
 */
export type MatrixExclusion = Partial<BuildCell>;

/**
 * マトリクス定義（設定ファイルから読み込む）
 */
export interface MatrixDefinition {
  platforms: PlatformTarget[];
  interpreters: string[];
  exclude: MatrixExclusion[];
}

/**
 * プラットフォームタグの生成オプション
 */
export interface PlatformTagOptions {
  /** Linux の manylinux ポリシー（デフォルト: manylinux2014） */
  manylinux: string;
  /** macOS の最小バージョン（デフォルト: 11.0） */
  macos_min: string;
}
