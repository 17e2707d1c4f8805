/**
 * バージョン規則のテスト
 */

import { describe, it, expect } from "vitest";
import {
  compareVersions,
  incrementVersion,
  isValidVersion,
  parseVersion,
  VersionFormatError,
} from "../src/version/version.js";

describe("version rules", () => {
  describe("isValidVersion", () => {
    it("should accept dot-separated non-negative integers", () => {
      expect(isValidVersion("1")).toBe(true);
      expect(isValidVersion("1.2.3")).toBe(true);
      expect(isValidVersion("0.0.0")).toBe(true);
      expect(isValidVersion("10.20.30.40")).toBe(true);
    });

    it("should reject malformed versions", () => {
      expect(isValidVersion("")).toBe(false);
      expect(isValidVersion("1.2.")).toBe(false);
      expect(isValidVersion(".1")).toBe(false);
      expect(isValidVersion("1.02")).toBe(false);
      expect(isValidVersion("1.2.3-rc1")).toBe(false);
      expect(isValidVersion("v1.2.3")).toBe(false);
      expect(isValidVersion("-1")).toBe(false);
    });
  });

  describe("parseVersion", () => {
    it("should split into numeric components", () => {
      expect(parseVersion("1.2.3")).toEqual([1n, 2n, 3n]);
    });

    it("should throw VersionFormatError for invalid input", () => {
      expect(() => parseVersion("abc")).toThrow(VersionFormatError);
    });
  });

  describe("compareVersions", () => {
    it("should compare numerically per component", () => {
      expect(compareVersions("1.2.10", "1.2.9")).toBe(1);
      expect(compareVersions("1.2.9", "1.2.10")).toBe(-1);
      expect(compareVersions("1.2.3", "1.2.3")).toBe(0);
      expect(compareVersions("2.0.0", "1.99.99")).toBe(1);
    });

    it("should treat missing components as zero", () => {
      expect(compareVersions("1.2", "1.2.0")).toBe(0);
      expect(compareVersions("1.2", "1.2.1")).toBe(-1);
    });

    it("should not lose precision on large components", () => {
      expect(compareVersions("1.9007199254740993", "1.9007199254740992")).toBe(1);
    });
  });

  describe("incrementVersion", () => {
    it("should increment the last component", () => {
      expect(incrementVersion("1.2.3")).toBe("1.2.4");
      expect(incrementVersion("1.2.9")).toBe("1.2.10");
      expect(incrementVersion("7")).toBe("8");
    });

    it("should always produce a strictly greater version", () => {
      for (const value of ["0.0.0", "1.2.9", "3.99", "9007199254740992"]) {
        expect(compareVersions(incrementVersion(value), value)).toBe(1);
      }
    });

    it("should throw for invalid input", () => {
      expect(() => incrementVersion("1.x")).toThrow(VersionFormatError);
    });
  });
});
