/**
 * Version Advancer
 * Run 全体が成功した後に一度だけバージョンを進める
 */

import type { VersionRecord } from "../types/index.js";
import type { VersionStore } from "./version-store.js";
import { incrementVersion } from "./version.js";

/**
 * 次のレコードを計算する
 * {current: old.next, next: increment(old.next)}
 */
export function computeNextRecord(record: VersionRecord): VersionRecord {
  return {
    current_version: record.next_version,
    next_version: incrementVersion(record.next_version),
  };
}

export class VersionAdvancer {
  private advanced = false;

  constructor(private readonly store: VersionStore) {}

  /**
   * Run 開始時に読んだレコードを基準にバージョンを進める
   * 保存値が変わっていれば書き込まない（VERSION_CONFLICT）
   * @throws Error - 同じインスタンスで 2 回呼ばれた場合
   * @throws VersionStoreError - 書き込み失敗
   */
  async advance(startRecord: VersionRecord): Promise<VersionRecord> {
    if (this.advanced) {
      throw new Error("Version has already been advanced for this run");
    }
    this.advanced = true;

    const next = computeNextRecord(startRecord);
    await this.store.compareAndWrite(startRecord, next);
    return next;
  }

  get hasAdvanced(): boolean {
    return this.advanced;
  }
}
