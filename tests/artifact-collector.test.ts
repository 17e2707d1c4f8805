/**
 * Artifact Collector のテスト
 */

import { describe, it, expect } from "vitest";
import { ArtifactCollector, findArtifact } from "../src/collect/artifact-collector.js";
import { createCell } from "../src/matrix/matrix.js";
import { createArtifact } from "../src/build/build-task.js";
import type { CellResult } from "../src/types/index.js";
import { captureLogger, makeArtifact } from "./helpers/fakes.js";

const a = createCell("linux", "x86_64", "3.10");
const b = createCell("linux", "x86_64", "3.11");
const c = createCell("macos", "aarch64", "3.10");
const expected = [a, b, c];

function ok(cell: typeof a): CellResult {
  return { ok: true, artifact: makeArtifact(cell, "1.2.4") };
}

describe("ArtifactCollector", () => {
  const collector = new ArtifactCollector();

  it("should return the complete set in matrix order", () => {
    const result = collector.collect([ok(c), ok(a), ok(b)], expected, "1.2.4");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.set.version).toBe("1.2.4");
    expect(result.set.artifacts.map((x) => x.canonical_name)).toEqual([
      "pkg-1.2.4-linux-x86_64-3.10",
      "pkg-1.2.4-linux-x86_64-3.11",
      "pkg-1.2.4-macos-aarch64-3.10",
    ]);
  });

  it("should refuse a partial set when one cell failed", () => {
    const failed: CellResult = {
      ok: false,
      failure: { cell: c, kind: "tool_error", message: "link error" },
    };

    const result = collector.collect([ok(a), ok(b), failed], expected, "1.2.4");

    expect(result).toEqual({
      ok: false,
      reason: "COLLECTION_INCOMPLETE",
      failures: [{ cell: c, kind: "tool_error", message: "link error" }],
      missing: [],
    });
  });

  it("should refuse a set when a cell never reported", () => {
    const result = collector.collect([ok(a), ok(b)], expected, "1.2.4");

    expect(result).toEqual({ ok: false, reason: "COLLECTION_INCOMPLETE", failures: [], missing: [c] });
  });

  it("should detect two artifacts with the same canonical name", () => {
    const first = createArtifact(a, "1.2.4", "pkg-1.2.4-dup", { binary: new Uint8Array([1]), file_name: "a.so" });
    const second = createArtifact(b, "1.2.4", "pkg-1.2.4-dup", { binary: new Uint8Array([2]), file_name: "b.so" });

    const result = collector.collect(
      [
        { ok: true, artifact: first },
        { ok: true, artifact: second },
        { ok: false, failure: { cell: c, kind: "timeout", message: "slow" } },
      ],
      expected,
      "1.2.4"
    );

    // 衝突は欠落より先に検出される
    expect(result).toEqual({
      ok: false,
      reason: "NAME_COLLISION",
      collision: { canonical_name: "pkg-1.2.4-dup", cells: [a, b] },
    });
  });

  it("should log why a collection was refused", () => {
    const { logger, entries } = captureLogger();

    new ArtifactCollector({ logger }).collect([ok(a)], expected, "1.2.4");

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "error",
      phase: "collection_incomplete",
      data: { expected: 3, succeeded: 1, failed_cells: [], missing_cells: ["linux-x86_64-3.11", "macos-aarch64-3.10"] },
    });
  });

  it("should find artifacts by canonical name", () => {
    const result = collector.collect([ok(a), ok(b), ok(c)], expected, "1.2.4");
    if (!result.ok) throw new Error("expected a complete set");

    expect(findArtifact(result.set, "pkg-1.2.4-linux-x86_64-3.11")?.cell).toEqual(b);
    expect(findArtifact(result.set, "missing")).toBeUndefined();
  });
});
