/**
 * Release Pipeline のテスト
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ReleasePipeline, type ReleasePipelineOptions } from "../src/pipeline/release-pipeline.js";
import { RunJournal } from "../src/pipeline/run-journal.js";
import { VersionStore, VersionStoreError } from "../src/version/version-store.js";
import type {
  BuildRequest,
  EndpointConfig,
  PipelineFailure,
  PipelineResult,
  ReleaseConfig,
  VersionRecord,
} from "../src/types/index.js";
import { FakeBuildTool, FakeChecker, MemoryIndex, captureLogger, fakeOutput } from "./helpers/fakes.js";

const TEST_DIR = ".release_gate_test_pipeline";
const VERSION_FILE = path.join(TEST_DIR, "VERSION");
const CONTRACT = path.join(TEST_DIR, "pysvf.pyi");
const JOURNAL_DIR = path.join(TEST_DIR, "runs");
const LOCK_PATH = path.join(TEST_DIR, "release");

const EXPECTED_ARTIFACTS = [
  "pysvf-1.2.4-linux-x86_64-py3.10",
  "pysvf-1.2.4-macos-aarch64-py3.10",
  "pysvf-1.2.4-linux-aarch64-py3.10",
];

function makeConfig(): ReleaseConfig {
  return {
    package: { name: "pysvf", interpreter_prefix: "py" },
    source: { revision: "abc123", branch: "main" },
    version_file: VERSION_FILE,
    dependencies: {
      native_lib: path.join(TEST_DIR, "deps/svf"),
      toolchain: path.join(TEST_DIR, "deps/llvm"),
      solver: path.join(TEST_DIR, "deps/z3"),
    },
    dependency_markers: { native_lib: ["Release-build"] },
    matrix: {
      platforms: [
        { platform: "linux", arch: "x86_64" },
        { platform: "macos", arch: "aarch64" },
        { platform: "linux", arch: "aarch64" },
      ],
      interpreters: ["3.10"],
      exclude: [],
    },
    gate: { contract_file: CONTRACT },
    build: {
      concurrency: 4,
      cell_timeout_ms: 5000,
      workspace_dir: path.join(TEST_DIR, "workspaces"),
      keep_workspaces: false,
      platform_tags: { manylinux: "manylinux2014", macos_min: "11.0" },
    },
    check: {},
    publish: { block_on_optional_failure: false, endpoints: [] },
    lock: { path: LOCK_PATH, wait_ms: 0, stale_after_ms: 3600000 },
    journal_dir: JOURNAL_DIR,
  };
}

const stagingEndpoint: EndpointConfig = {
  name: "staging",
  kind: "directory",
  path: "/indexes/staging",
  required: true,
  on_existing: "skip",
};

function hangUntilAborted(request: BuildRequest): Promise<never> {
  return new Promise((_, reject) => {
    request.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

function isGateBuild(request: BuildRequest): boolean {
  return path.basename(request.workspace) === "gate";
}

/**
 * 最初の書き込みだけ失敗するストア
 */
class FailingOnceVersionStore extends VersionStore {
  private failed = false;

  async compareAndWrite(expected: VersionRecord, next: VersionRecord): Promise<void> {
    if (!this.failed) {
      this.failed = true;
      throw new VersionStoreError("disk full", "IO_ERROR");
    }
    return super.compareAndWrite(expected, next);
  }
}

function expectFailure(result: PipelineResult): PipelineFailure {
  if (result.success) {
    throw new Error(`expected failure, got success for ${result.version}`);
  }
  return result;
}

describe("ReleasePipeline", () => {
  let buildTool: FakeBuildTool;
  let checker: FakeChecker;
  let index: MemoryIndex;
  let store: VersionStore;

  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(path.join(TEST_DIR, "deps/svf/Release-build"), { recursive: true });
    await fs.mkdir(path.join(TEST_DIR, "deps/llvm"), { recursive: true });
    await fs.mkdir(path.join(TEST_DIR, "deps/z3"), { recursive: true });
    await fs.writeFile(CONTRACT, "def analyze(path: str) -> int: ...\n", "utf-8");

    store = new VersionStore({ filePath: VERSION_FILE });
    await store.write({ current_version: "1.2.3", next_version: "1.2.4" });

    buildTool = new FakeBuildTool();
    checker = new FakeChecker();
    index = new MemoryIndex("staging");
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  function createPipeline(overrides: Partial<ReleasePipelineOptions> = {}): ReleasePipeline {
    return new ReleasePipeline({
      config: makeConfig(),
      buildTool,
      checker,
      targets: [{ endpoint: stagingEndpoint, index }],
      ...overrides,
    });
  }

  it("should publish every cell and advance the version once", async () => {
    const result = await createPipeline().run({ trigger: { kind: "manual", triggered_by: "ci-bot" } });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.version).toBe("1.2.4");
    expect(result.version_record).toEqual({ current_version: "1.2.4", next_version: "1.2.5" });
    expect(result.artifacts).toEqual(EXPECTED_ARTIFACTS);
    expect([...index.entries.keys()].sort()).toEqual(EXPECTED_ARTIFACTS.map((n) => `${n}@1.2.4`).sort());
    expect(result.stages[result.stages.length - 1]?.to).toBe("succeeded");
    expect(await store.read()).toEqual({ current_version: "1.2.4", next_version: "1.2.5" });
  });

  it("should build the gate reference once plus every matrix cell", async () => {
    await createPipeline().run({ trigger: { kind: "manual" }, sourceRevision: "def456" });

    expect(buildTool.requests).toHaveLength(4);
    expect(buildTool.requests.filter(isGateBuild)).toHaveLength(1);
    expect(buildTool.requests.every((r) => r.source_revision === "def456" && r.version === "1.2.4")).toBe(
      true
    );
  });

  it("should journal every stage of the run", async () => {
    const journal = new RunJournal({ baseDir: JOURNAL_DIR });

    const result = await createPipeline({ journal }).run({
      trigger: { kind: "push", ref: "refs/heads/main" },
    });

    const entries = await journal.readEntries(result.run_id);
    expect(entries[0]).toMatchObject({ stage: "pending", event: "trigger:push", detail: "refs/heads/main" });
    expect(entries.slice(1).map((e) => e.stage)).toEqual([
      "reading_version",
      "checking_dependencies",
      "gating",
      "building",
      "collecting",
      "publishing",
      "advancing",
      "succeeded",
    ]);
    expect(entries.map((e) => e.revision)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("should stop before the matrix when the gate fails", async () => {
    checker = new FakeChecker({ passed: false, diagnostics: ["pysvf.analyze: signature differs"] });

    const failure = expectFailure(await createPipeline().run({ trigger: { kind: "manual" } }));

    expect(failure.reason).toBe("GATE_FAILED");
    expect(failure.stage).toBe("gating");
    expect(failure.details.gate).toEqual({
      passed: false,
      diagnostics: ["pysvf.analyze: signature differs"],
    });
    expect(buildTool.requests).toHaveLength(1);
    expect(index.publishCalls).toEqual([]);
    expect(await store.read()).toEqual({ current_version: "1.2.3", next_version: "1.2.4" });
  });

  it("should publish nothing when one of three cells fails", async () => {
    buildTool.failCell({ platform: "macos", arch: "aarch64", interpreter_version: "3.10" });

    const failure = expectFailure(await createPipeline().run({ trigger: { kind: "manual" } }));

    expect(failure.reason).toBe("COLLECTION_INCOMPLETE");
    expect(failure.stage).toBe("collecting");
    expect(failure.message).toBe("1 of 3 cells did not produce an artifact");
    expect(failure.details.failed_cells).toEqual([
      {
        cell: { platform: "macos", arch: "aarch64", interpreter_version: "3.10" },
        kind: "tool_error",
        message: "compiler error for macos-aarch64-3.10",
      },
    ]);
    expect(index.publishCalls).toEqual([]);
    expect(await store.read()).toEqual({ current_version: "1.2.3", next_version: "1.2.4" });
  });

  it("should not advance the version when a required endpoint fails", async () => {
    index.failWith = new Error("503 Service Unavailable");

    const failure = expectFailure(await createPipeline().run({ trigger: { kind: "manual" } }));

    expect(failure.reason).toBe("PUBLISH_FAILED");
    expect(failure.stage).toBe("publishing");
    expect(failure.message).toBe("Publishing failed for: staging");
    expect(failure.details.endpoints?.[0]?.error).toBe(
      "pysvf-1.2.4-linux-x86_64-py3.10: 503 Service Unavailable"
    );
    expect(await store.read()).toEqual({ current_version: "1.2.3", next_version: "1.2.4" });
  });

  it("should advance past a failing optional endpoint", async () => {
    const mirror = new MemoryIndex("mirror");
    mirror.failWith = new Error("timeout");

    const result = await createPipeline({
      targets: [
        { endpoint: stagingEndpoint, index },
        { endpoint: { ...stagingEndpoint, name: "mirror", required: false }, index: mirror },
      ],
    }).run({ trigger: { kind: "manual" } });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.publish.warnings).toEqual([
      "Optional endpoint 'mirror' failed: pysvf-1.2.4-linux-x86_64-py3.10: timeout",
    ]);
    expect(await store.read()).toEqual({ current_version: "1.2.4", next_version: "1.2.5" });
  });

  it("should republish idempotently after the version write failed", async () => {
    const flaky = new FailingOnceVersionStore({ filePath: VERSION_FILE });
    const pipeline = createPipeline({ versionStore: flaky });

    const first = expectFailure(await pipeline.run({ trigger: { kind: "manual" } }));
    expect(first.reason).toBe("VERSION_WRITE_FAILED");
    expect(first.stage).toBe("advancing");
    expect(first.details).toEqual({ published_version: "1.2.4", cause: "disk full" });
    expect(await store.read()).toEqual({ current_version: "1.2.3", next_version: "1.2.4" });

    const second = await pipeline.run({ trigger: { kind: "manual" } });

    expect(second.success).toBe(true);
    if (!second.success) return;
    expect(second.version).toBe("1.2.4");
    expect(second.publish.endpoints[0]?.entries.map((e) => e.outcome)).toEqual([
      "skipped",
      "skipped",
      "skipped",
    ]);
    expect(index.entries.size).toBe(3);
    expect(await store.read()).toEqual({ current_version: "1.2.4", next_version: "1.2.5" });
  });

  it("should fail fast when another run holds the release lock", async () => {
    await fs.writeFile(
      `${LOCK_PATH}.lock`,
      JSON.stringify({ pid: 999999, timestamp: Date.now(), owner: "release-other" })
    );

    const failure = expectFailure(await createPipeline().run({ trigger: { kind: "manual" } }));

    expect(failure.reason).toBe("RUN_IN_PROGRESS");
    expect(failure.stage).toBe("pending");
    expect(failure.details.cause).toBe("release-other");
    expect(buildTool.requests).toHaveLength(0);
  });

  it("should advance even when the run lock sits on the version file", async () => {
    const config = makeConfig();
    const pipeline = createPipeline({ config: { ...config, lock: { ...config.lock, path: VERSION_FILE } } });

    const result = await pipeline.run({ trigger: { kind: "manual" } });

    expect(result.success).toBe(true);
    expect(await store.read()).toEqual({ current_version: "1.2.4", next_version: "1.2.5" });
  });

  it("should give runs started together distinct versions", async () => {
    const pipeline = createPipeline();

    const results = await Promise.all([
      pipeline.run({ trigger: { kind: "manual" } }),
      pipeline.run({ trigger: { kind: "manual" } }),
    ]);

    const versions = results.map((r) => (r.success ? r.version : r.reason)).sort();
    expect(versions).toEqual(["1.2.4", "1.2.5"]);
    expect(await store.read()).toEqual({ current_version: "1.2.5", next_version: "1.2.6" });
    expect(index.entries.size).toBe(6);
  });

  it("should reject pushes to other branches before taking the lock", async () => {
    const failure = expectFailure(
      await createPipeline().run({ trigger: { kind: "push", ref: "refs/heads/feature" } })
    );

    expect(failure.reason).toBe("TRIGGER_REJECTED");
    expect(failure.stage).toBe("pending");
    expect(failure.stages.map((t) => t.to)).toEqual(["failed"]);
    expect(buildTool.requests).toHaveLength(0);
  });

  it("should fail when the version file is missing", async () => {
    await fs.rm(VERSION_FILE);

    const failure = expectFailure(await createPipeline().run({ trigger: { kind: "manual" } }));

    expect(failure.reason).toBe("VERSION_READ_FAILED");
    expect(failure.stage).toBe("reading_version");
    expect(failure.message).toBe(`Version file not found: ${VERSION_FILE}`);
  });

  it("should fail before building when a dependency marker is missing", async () => {
    await fs.rm(path.join(TEST_DIR, "deps/svf/Release-build"), { recursive: true });

    const failure = expectFailure(await createPipeline().run({ trigger: { kind: "manual" } }));

    expect(failure.reason).toBe("DEPENDENCY_INVALID");
    expect(failure.details.dependency_errors).toEqual([
      `native_lib: expected entry not found: ${path.join(TEST_DIR, "deps/svf/Release-build")}`,
    ]);
    expect(buildTool.requests).toHaveLength(0);
  });

  it("should cancel during the matrix without publishing or advancing", async () => {
    const controller = new AbortController();
    buildTool = new FakeBuildTool(async (request) => {
      if (isGateBuild(request)) return fakeOutput(request);
      controller.abort();
      return hangUntilAborted(request);
    });

    const failure = expectFailure(
      await createPipeline().run({ trigger: { kind: "manual" }, signal: controller.signal })
    );

    expect(failure.reason).toBe("CANCELLED");
    expect(failure.stage).toBe("building");
    expect(index.publishCalls).toEqual([]);
    expect(await store.read()).toEqual({ current_version: "1.2.3", next_version: "1.2.4" });
  });

  it("should remove the run workspaces afterwards", async () => {
    const result = await createPipeline().run({ trigger: { kind: "manual" } });

    const runDir = path.join(TEST_DIR, "workspaces", result.run_id);
    await expect(fs.access(runDir)).rejects.toThrow();
  });

  it("should log the failure reason with the run id", async () => {
    const { logger, entries } = captureLogger();
    checker = new FakeChecker({ passed: false, diagnostics: ["drift"] });

    const result = await createPipeline({ logger }).run({ trigger: { kind: "manual" } });

    const failed = entries.find((e) => e.phase === "run_failed");
    expect(failed?.run_id).toBe(result.run_id);
    expect(failed?.data).toEqual({ stage: "gating", reason: "GATE_FAILED" });
  });
});
