/**
 * ビルドマトリクスの列挙
 * プラットフォーム軸 × インタプリタ軸の直積から除外条件に一致するセルを取り除く
 */

import type { BuildCell, MatrixDefinition, MatrixExclusion } from "../types/index.js";

/**
 * セルの識別キー（ワークスペース名やログに使う）
 * @example cellKey({ platform: "linux", arch: "x86_64", interpreter_version: "3.10" }) // "linux-x86_64-3.10"
 */
export function cellKey(cell: BuildCell): string {
  return `${cell.platform}-${cell.arch}-${cell.interpreter_version}`;
}

export function createCell(
  platform: BuildCell["platform"],
  arch: BuildCell["arch"],
  interpreterVersion: string
): BuildCell {
  return Object.freeze({ platform, arch, interpreter_version: interpreterVersion });
}

export function sameCell(a: BuildCell, b: BuildCell): boolean {
  return (
    a.platform === b.platform &&
    a.arch === b.arch &&
    a.interpreter_version === b.interpreter_version
  );
}

/**
 * 除外条件がセルに一致するか
 * 条件に書かれたフィールドがすべて等しければ一致（空の条件はすべてに一致）
 */
export function matchesExclusion(cell: BuildCell, exclusion: MatrixExclusion): boolean {
  if (exclusion.platform !== undefined && exclusion.platform !== cell.platform) return false;
  if (exclusion.arch !== undefined && exclusion.arch !== cell.arch) return false;
  if (
    exclusion.interpreter_version !== undefined &&
    exclusion.interpreter_version !== cell.interpreter_version
  ) {
    return false;
  }
  return true;
}

/**
 * マトリクスを列挙する
 * 並び順はプラットフォーム軸の順、その中でインタプリタ軸の順
 */
export function enumerateMatrix(definition: MatrixDefinition): BuildCell[] {
  const cells: BuildCell[] = [];

  for (const target of definition.platforms) {
    for (const interpreter of definition.interpreters) {
      const cell = createCell(target.platform, target.arch, interpreter);
      if (definition.exclude.some((exclusion) => matchesExclusion(cell, exclusion))) {
        continue;
      }
      cells.push(cell);
    }
  }

  return cells;
}
