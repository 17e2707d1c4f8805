/**
 * テスト用のインプロセス実装
 */

import type {
  Artifact,
  BuildCell,
  BuildOutput,
  BuildRequest,
  BuildTool,
  CheckRequest,
  ConformanceChecker,
  Credentials,
  GateResult,
  PackageIndex,
  PublishedEntry,
} from "../../src/types/index.js";
import { Logger, type LogEntry } from "../../src/logging/logger.js";
import { cellKey, createCell } from "../../src/matrix/matrix.js";
import { createArtifact } from "../../src/build/build-task.js";

export type BuildBehavior = (request: BuildRequest) => Promise<BuildOutput>;

/**
 * セルキーとバージョンから決まるバイナリを返すビルドツール
 */
export class FakeBuildTool implements BuildTool {
  readonly requests: BuildRequest[] = [];
  private readonly failing = new Set<string>();

  constructor(private readonly behavior?: BuildBehavior) {}

  failCell(cell: BuildCell): void {
    this.failing.add(cellKey(cell));
  }

  async build(request: BuildRequest): Promise<BuildOutput> {
    this.requests.push(request);
    if (this.behavior) {
      return this.behavior(request);
    }
    const key = cellKey(request.target);
    if (this.failing.has(key)) {
      throw new Error(`compiler error for ${key}`);
    }
    return fakeOutput(request);
  }
}

export function fakeOutput(request: BuildRequest): BuildOutput {
  const key = cellKey(request.target);
  return {
    binary: new TextEncoder().encode(`binary:${key}:${request.version}`),
    file_name: `${key}.so`,
  };
}

export class FakeChecker implements ConformanceChecker {
  readonly requests: CheckRequest[] = [];

  constructor(private readonly result: GateResult = { passed: true, diagnostics: [] }) {}

  async check(request: CheckRequest): Promise<GateResult> {
    this.requests.push(request);
    return this.result;
  }
}

/**
 * メモリ上のパッケージインデックス
 */
export class MemoryIndex implements PackageIndex {
  readonly entries = new Map<string, PublishedEntry>();
  readonly publishCalls: string[] = [];
  readonly removeCalls: string[] = [];
  readonly credentialsSeen: (Credentials | undefined)[] = [];
  failWith: Error | undefined;

  constructor(private readonly name = "memory") {}

  async lookup(canonicalName: string, version: string): Promise<PublishedEntry | null> {
    return this.entries.get(`${canonicalName}@${version}`) ?? null;
  }

  async publish(
    artifact: Artifact,
    version: string,
    credentials: Credentials | undefined
  ): Promise<PublishedEntry> {
    this.publishCalls.push(artifact.canonical_name);
    this.credentialsSeen.push(credentials);
    if (this.failWith) {
      throw this.failWith;
    }
    const key = `${artifact.canonical_name}@${version}`;
    if (this.entries.has(key)) {
      throw new Error(`Entry already exists: ${key}`);
    }
    const entry: PublishedEntry = {
      canonical_name: artifact.canonical_name,
      version,
      digest: artifact.digest,
      location: `${this.name}://${version}/${artifact.file_name}`,
    };
    this.entries.set(key, entry);
    return entry;
  }

  async remove(canonicalName: string, version: string): Promise<void> {
    this.removeCalls.push(canonicalName);
    this.entries.delete(`${canonicalName}@${version}`);
  }
}

/**
 * 出力を配列に溜めるロガー
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: "debug", sink: (entry) => entries.push(entry) });
  return { logger, entries };
}

export function linuxCell(interpreter = "3.10"): BuildCell {
  return createCell("linux", "x86_64", interpreter);
}

export function makeArtifact(cell: BuildCell, version: string, content = "payload"): Artifact {
  const key = cellKey(cell);
  return createArtifact(cell, version, `pkg-${version}-${key}`, {
    binary: new TextEncoder().encode(content),
    file_name: `${key}.so`,
  });
}
