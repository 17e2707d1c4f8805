/**
 * 依存パスの検証
 * ビルドを始める前に、ネイティブライブラリ・ツールチェイン・ソルバーが揃っていることを確認する
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { DependencyName, DependencyPaths } from "../types/index.js";
import { DEPENDENCY_NAMES } from "../types/index.js";

export interface DependencyCheckResult {
  valid: boolean;
  errors: string[];
}

/**
 * 各依存パスが存在し、指定されたマーカーエントリを含むか検証する
 * @param markers - 依存ディレクトリ内に存在すべき相対パス（例: native_lib の "Release-build"）
 */
export async function checkDependencies(
  dependencies: DependencyPaths,
  markers: Partial<Record<DependencyName, string[]>> = {}
): Promise<DependencyCheckResult> {
  const errors: string[] = [];

  for (const name of DEPENDENCY_NAMES) {
    const dir = dependencies[name];
    if (!(await pathExists(dir))) {
      errors.push(`${name}: path not found: ${dir}`);
      continue;
    }

    for (const marker of markers[name] ?? []) {
      const markerPath = path.join(dir, marker);
      if (!(await pathExists(markerPath))) {
        errors.push(`${name}: expected entry not found: ${markerPath}`);
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
