/**
 * Artifact Collector
 * マトリクスの全セルが終了した後の合流点（バリア）
 *
 * 方針: all-or-nothing。1 セルでも欠ければ Run 全体を失敗とし、部分的な公開はしない
 */

import type {
  Artifact,
  ArtifactSet,
  BuildCell,
  BuildFailure,
  CellResult,
  NameCollision,
} from "../types/index.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { cellKey, sameCell } from "../matrix/matrix.js";

export type CollectionResult =
  | { ok: true; set: ArtifactSet }
  | { ok: false; reason: "NAME_COLLISION"; collision: NameCollision }
  | {
      ok: false;
      reason: "COLLECTION_INCOMPLETE";
      failures: BuildFailure[];
      missing: BuildCell[];
    };

export class ArtifactCollector {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * セル結果を 1 つの ArtifactSet にまとめる
   * @param results - MatrixBuilder の結果（全セルが終了済みであること）
   * @param expected - 列挙されたマトリクス全体
   * @param version - 公開予定のバージョン
   */
  collect(results: readonly CellResult[], expected: readonly BuildCell[], version: string): CollectionResult {
    const succeeded: Artifact[] = [];
    const failures: BuildFailure[] = [];
    for (const result of results) {
      if (result.ok) {
        succeeded.push(result.artifact);
      } else {
        failures.push(result.failure);
      }
    }

    // 名前衝突はマトリクス設定の誤り（重複セル）を示すので最初に検出する
    const byName = new Map<string, Artifact>();
    for (const artifact of succeeded) {
      const existing = byName.get(artifact.canonical_name);
      if (existing) {
        const collision: NameCollision = {
          canonical_name: artifact.canonical_name,
          cells: [existing.cell, artifact.cell],
        };
        this.logger.error("name_collision", "Two artifacts share a canonical name", {
          canonical_name: collision.canonical_name,
          cells: collision.cells.map(cellKey),
        });
        return { ok: false, reason: "NAME_COLLISION", collision };
      }
      byName.set(artifact.canonical_name, artifact);
    }

    const reported = results.map((r) => (r.ok ? r.artifact.cell : r.failure.cell));
    const missing = expected.filter((cell) => !reported.some((r) => sameCell(r, cell)));

    if (failures.length > 0 || missing.length > 0 || succeeded.length < expected.length) {
      this.logger.error("collection_incomplete", "Matrix did not fully succeed", {
        expected: expected.length,
        succeeded: succeeded.length,
        failed_cells: failures.map((f) => cellKey(f.cell)),
        missing_cells: missing.map(cellKey),
      });
      return { ok: false, reason: "COLLECTION_INCOMPLETE", failures, missing };
    }

    const ordered = orderByMatrix(succeeded, expected);
    this.logger.info("collection_complete", "Artifact set collected", {
      artifacts: ordered.length,
    });
    return { ok: true, set: { version, artifacts: ordered } };
  }
}

/**
 * マトリクスの列挙順に並べ替える
 */
function orderByMatrix(artifacts: Artifact[], expected: readonly BuildCell[]): Artifact[] {
  const index = (cell: BuildCell): number => {
    const position = expected.findIndex((e) => sameCell(e, cell));
    return position === -1 ? expected.length : position;
  };
  return [...artifacts].sort((a, b) => index(a.cell) - index(b.cell));
}

/**
 * canonical_name で成果物を探す
 */
export function findArtifact(set: ArtifactSet, canonicalName: string): Artifact | undefined {
  return set.artifacts.find((a) => a.canonical_name === canonicalName);
}
