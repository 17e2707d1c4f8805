/**
 * 成果物の命名
 */

import type { BuildCell, PlatformTagOptions } from "../types/index.js";

export const DEFAULT_PLATFORM_TAG_OPTIONS: PlatformTagOptions = {
  manylinux: "manylinux2014",
  macos_min: "11.0",
};

export const DEFAULT_INTERPRETER_PREFIX = "py";

export interface NamingOptions {
  packageName: string;
  interpreterPrefix?: string;
}

/**
 * canonical_name を導出する
 * (version, platform, arch, interpreter_version) がすべて含まれるため、マトリクス内で衝突しない
 * @example canonicalArtifactName({ packageName: "pysvf" }, "1.2.4", cell) // "pysvf-1.2.4-linux-x86_64-py3.10"
 */
export function canonicalArtifactName(
  options: NamingOptions,
  version: string,
  cell: BuildCell
): string {
  const prefix = options.interpreterPrefix ?? DEFAULT_INTERPRETER_PREFIX;
  return [
    options.packageName,
    version,
    cell.platform,
    cell.arch,
    `${prefix}${cell.interpreter_version}`,
  ].join("-");
}

/**
 * ビルドツールに渡すターゲットプラットフォームタグ
 */
export function platformTag(
  cell: BuildCell,
  options: PlatformTagOptions = DEFAULT_PLATFORM_TAG_OPTIONS
): string {
  switch (cell.platform) {
    case "linux":
      return `${options.manylinux}_${cell.arch}`;
    case "macos": {
      const version = options.macos_min.replace(/\./g, "_");
      const arch = cell.arch === "aarch64" ? "arm64" : "x86_64";
      return `macosx_${version}_${arch}`;
    }
    case "windows":
      return cell.arch === "aarch64" ? "win_arm64" : "win_amd64";
  }
}
