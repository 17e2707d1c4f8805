/**
 * Version Store
 * (current_version, next_version) を 2 行のテキストファイルとして永続化する
 *
 * ```
 * CURRENT_VERSION:1.2.3
 * NEXT_VERSION:1.2.4
 * ```
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { VersionRecord } from "../types/index.js";
import { withFileLock } from "../lock/file-lock.js";
import { compareVersions, incrementVersion, isValidVersion } from "./version.js";

export type VersionStoreErrorCode =
  | "NOT_FOUND"
  | "INVALID_FORMAT"
  | "INVALID_RECORD"
  | "VERSION_CONFLICT"
  | "ALREADY_EXISTS"
  | "IO_ERROR";

/**
 * Version Store エラー
 */
export class VersionStoreError extends Error {
  constructor(
    message: string,
    public readonly code: VersionStoreErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "VersionStoreError";
  }
}

const CURRENT_KEY = "CURRENT_VERSION";
const NEXT_KEY = "NEXT_VERSION";

/**
 * デフォルトのバージョンファイル
 */
export const DEFAULT_VERSION_FILE = "VERSION";

export interface VersionStoreOptions {
  filePath?: string;
}

/**
 * ファイル内容をパースする
 * @throws VersionStoreError - 形式不正
 */
export function parseVersionFile(content: string): VersionRecord {
  const values = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0) continue;

    const separator = line.indexOf(":");
    if (separator === -1) {
      throw new VersionStoreError(`Malformed line: '${line}'`, "INVALID_FORMAT");
    }
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (key !== CURRENT_KEY && key !== NEXT_KEY) {
      throw new VersionStoreError(`Unknown key: '${key}'`, "INVALID_FORMAT");
    }
    if (values.has(key)) {
      throw new VersionStoreError(`Duplicate key: '${key}'`, "INVALID_FORMAT");
    }
    values.set(key, value);
  }

  const current = values.get(CURRENT_KEY);
  const next = values.get(NEXT_KEY);
  if (current === undefined || next === undefined) {
    throw new VersionStoreError(
      `Version file must contain ${CURRENT_KEY} and ${NEXT_KEY}`,
      "INVALID_FORMAT"
    );
  }

  const record: VersionRecord = { current_version: current, next_version: next };
  assertValidRecord(record);
  return record;
}

/**
 * レコードをファイル形式に変換
 */
export function formatVersionFile(record: VersionRecord): string {
  return `${CURRENT_KEY}:${record.current_version}\n${NEXT_KEY}:${record.next_version}\n`;
}

/**
 * レコードの不変条件を検証
 * @throws VersionStoreError - INVALID_RECORD
 */
export function assertValidRecord(record: VersionRecord): void {
  for (const value of [record.current_version, record.next_version]) {
    if (!isValidVersion(value)) {
      throw new VersionStoreError(`Invalid version string: '${value}'`, "INVALID_RECORD");
    }
  }
  if (compareVersions(record.next_version, record.current_version) <= 0) {
    throw new VersionStoreError(
      `next_version ${record.next_version} must be greater than current_version ${record.current_version}`,
      "INVALID_RECORD"
    );
  }
}

/**
 * 書き込みロックの対象パス（ロックファイルは `${filePath}.write.lock`）
 * Run ロックと同じキーにならないよう、バージョンファイル自体とは別にする
 */
export function versionLockTarget(filePath: string): string {
  return `${filePath}.write`;
}

function sameRecord(a: VersionRecord, b: VersionRecord): boolean {
  return a.current_version === b.current_version && a.next_version === b.next_version;
}

/**
 * Version Store
 * 書き込みはファイルロック下で一時ファイル + rename により行う
 */
export class VersionStore {
  readonly filePath: string;
  private readonly lockTarget: string;

  constructor(options: VersionStoreOptions = {}) {
    this.filePath = options.filePath ?? DEFAULT_VERSION_FILE;
    this.lockTarget = versionLockTarget(this.filePath);
  }

  /**
   * 現在のレコードを読み込む
   * @throws VersionStoreError - NOT_FOUND / INVALID_FORMAT / INVALID_RECORD / IO_ERROR
   */
  async read(): Promise<VersionRecord> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw new VersionStoreError(`Version file not found: ${this.filePath}`, "NOT_FOUND", error);
      }
      throw new VersionStoreError(`Failed to read version file: ${this.filePath}`, "IO_ERROR", error);
    }
    return parseVersionFile(content);
  }

  /**
   * レコードを書き込む（無条件）
   */
  async write(record: VersionRecord): Promise<void> {
    assertValidRecord(record);
    await withFileLock(this.lockTarget, () => this.writeUnlocked(record));
  }

  /**
   * 保存されているレコードが expected と一致する場合のみ書き込む
   * @throws VersionStoreError - VERSION_CONFLICT（他の Run が先に進めた場合）
   */
  async compareAndWrite(expected: VersionRecord, next: VersionRecord): Promise<void> {
    assertValidRecord(next);
    await withFileLock(this.lockTarget, async () => {
      const stored = await this.read();
      if (!sameRecord(stored, expected)) {
        throw new VersionStoreError(
          `Version record changed since the run started: expected ${expected.current_version}/${expected.next_version}, found ${stored.current_version}/${stored.next_version}`,
          "VERSION_CONFLICT"
        );
      }
      await this.writeUnlocked(next);
    });
  }

  /**
   * バージョンファイルを新規作成する
   * @param currentVersion - 現在のバージョン（next はインクリメントで決まる）
   * @throws VersionStoreError - ALREADY_EXISTS
   */
  async initialize(currentVersion: string): Promise<VersionRecord> {
    if (!isValidVersion(currentVersion)) {
      throw new VersionStoreError(`Invalid version string: '${currentVersion}'`, "INVALID_RECORD");
    }
    const record: VersionRecord = {
      current_version: currentVersion,
      next_version: incrementVersion(currentVersion),
    };

    await withFileLock(this.lockTarget, async () => {
      if (await this.exists()) {
        throw new VersionStoreError(`Version file already exists: ${this.filePath}`, "ALREADY_EXISTS");
      }
      await this.writeUnlocked(record);
    });
    return record;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async writeUnlocked(record: VersionRecord): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, formatVersionFile(record), "utf-8");
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new VersionStoreError(`Failed to write version file: ${this.filePath}`, "IO_ERROR", error);
    }
  }
}
