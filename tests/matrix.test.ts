/**
 * マトリクス列挙と命名のテスト
 */

import { describe, it, expect } from "vitest";
import { cellKey, createCell, enumerateMatrix, matchesExclusion } from "../src/matrix/matrix.js";
import { canonicalArtifactName, platformTag } from "../src/matrix/naming.js";
import type { MatrixDefinition } from "../src/types/index.js";

const definition: MatrixDefinition = {
  platforms: [
    { platform: "linux", arch: "x86_64" },
    { platform: "macos", arch: "aarch64" },
    { platform: "linux", arch: "aarch64" },
  ],
  interpreters: ["3.8", "3.9", "3.10", "3.11"],
  exclude: [],
};

describe("enumerateMatrix", () => {
  it("should produce the full cartesian product in axis order", () => {
    const cells = enumerateMatrix(definition);

    expect(cells).toHaveLength(12);
    expect(cells.slice(0, 5).map(cellKey)).toEqual([
      "linux-x86_64-3.8",
      "linux-x86_64-3.9",
      "linux-x86_64-3.10",
      "linux-x86_64-3.11",
      "macos-aarch64-3.8",
    ]);
  });

  it("should drop cells matching an exclusion", () => {
    const cells = enumerateMatrix({
      ...definition,
      exclude: [{ platform: "macos", interpreter_version: "3.8" }, { arch: "aarch64", platform: "linux" }],
    });

    expect(cells.map(cellKey)).toEqual([
      "linux-x86_64-3.8",
      "linux-x86_64-3.9",
      "linux-x86_64-3.10",
      "linux-x86_64-3.11",
      "macos-aarch64-3.9",
      "macos-aarch64-3.10",
      "macos-aarch64-3.11",
    ]);
  });

  it("should produce frozen cells", () => {
    const [cell] = enumerateMatrix(definition);
    expect(Object.isFrozen(cell)).toBe(true);
  });
});

describe("matchesExclusion", () => {
  const cell = createCell("linux", "aarch64", "3.10");

  it("should match only when every named field is equal", () => {
    expect(matchesExclusion(cell, { arch: "aarch64" })).toBe(true);
    expect(matchesExclusion(cell, { arch: "aarch64", interpreter_version: "3.10" })).toBe(true);
    expect(matchesExclusion(cell, { arch: "aarch64", interpreter_version: "3.11" })).toBe(false);
    expect(matchesExclusion(cell, { platform: "windows" })).toBe(false);
  });
});

describe("canonicalArtifactName", () => {
  it("should join package, version, platform, arch and interpreter", () => {
    const cell = createCell("linux", "x86_64", "3.10");
    expect(canonicalArtifactName({ packageName: "pysvf" }, "1.2.4", cell)).toBe(
      "pysvf-1.2.4-linux-x86_64-py3.10"
    );
  });

  it("should use a configured interpreter prefix", () => {
    const cell = createCell("macos", "aarch64", "3.11");
    expect(canonicalArtifactName({ packageName: "pysvf", interpreterPrefix: "cp" }, "2.0", cell)).toBe(
      "pysvf-2.0-macos-aarch64-cp3.11"
    );
  });

  it("should give every cell of a matrix a distinct name", () => {
    const names = enumerateMatrix(definition).map((cell) =>
      canonicalArtifactName({ packageName: "pysvf" }, "1.0.0", cell)
    );
    expect(new Set(names).size).toBe(names.length);
  });
});

describe("platformTag", () => {
  it("should map linux cells to the manylinux policy", () => {
    expect(platformTag(createCell("linux", "x86_64", "3.10"))).toBe("manylinux2014_x86_64");
    expect(platformTag(createCell("linux", "aarch64", "3.10"))).toBe("manylinux2014_aarch64");
  });

  it("should map macOS cells to the minimum version and arch names", () => {
    expect(platformTag(createCell("macos", "aarch64", "3.10"))).toBe("macosx_11_0_arm64");
    expect(
      platformTag(createCell("macos", "x86_64", "3.10"), { manylinux: "manylinux2014", macos_min: "10.15" })
    ).toBe("macosx_10_15_x86_64");
  });

  it("should map windows cells", () => {
    expect(platformTag(createCell("windows", "x86_64", "3.10"))).toBe("win_amd64");
    expect(platformTag(createCell("windows", "aarch64", "3.10"))).toBe("win_arm64");
  });
});
