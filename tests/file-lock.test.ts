/**
 * File Lock のテスト
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockError, readLockInfo, withFileLock } from "../src/lock/file-lock.js";

const TEST_DIR = ".release_gate_test_lock";
const TARGET = path.join(TEST_DIR, "release");
const LOCK_PATH = `${TARGET}.lock`;

describe("withFileLock", () => {
  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it("should hold the lock file only while the operation runs", async () => {
    const seen = await withFileLock(TARGET, async () => readLockInfo(LOCK_PATH), { owner: "run-a" });

    expect(seen?.pid).toBe(process.pid);
    expect(seen?.owner).toBe("run-a");
    expect(await readLockInfo(LOCK_PATH)).toBeNull();
  });

  it("should release the lock when the operation throws", async () => {
    await expect(
      withFileLock(TARGET, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await readLockInfo(LOCK_PATH)).toBeNull();
  });

  it("should serialize callers in the same process", async () => {
    const order: string[] = [];
    const slow = withFileLock(TARGET, async () => {
      order.push("first:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push("first:end");
    });
    const fast = withFileLock(TARGET, async () => {
      order.push("second");
    });

    await Promise.all([slow, fast]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("should fail with the holder when another process holds the lock", async () => {
    await fs.writeFile(LOCK_PATH, JSON.stringify({ pid: 999999, timestamp: Date.now(), owner: "other" }));

    const attempt = withFileLock(TARGET, async () => "never", { maxRetries: 0 });

    await expect(attempt).rejects.toBeInstanceOf(LockError);
    await expect(attempt).rejects.toMatchObject({ holder: { owner: "other" } });
  });

  it("should take over a stale lock", async () => {
    await fs.writeFile(LOCK_PATH, JSON.stringify({ pid: 999999, timestamp: Date.now() - 60_000 }));

    const result = await withFileLock(TARGET, async () => "acquired", {
      maxRetries: 0,
      staleAfter: 1000,
    });

    expect(result).toBe("acquired");
  });

  it("should treat a corrupt lock file as held since epoch", async () => {
    await fs.writeFile(LOCK_PATH, "not json");
    expect(await readLockInfo(LOCK_PATH)).toEqual({ pid: 0, timestamp: 0 });
  });

  it("should keep a long-held lock fresh so other holders cannot take it over", async () => {
    // 同じロックファイルを別キーで指す（別プロセスからの取得に相当）
    const otherKey = `${TEST_DIR}/./release`;

    await withFileLock(
      TARGET,
      async () => {
        await sleep(400);
        const info = await readLockInfo(LOCK_PATH);
        expect(Date.now() - (info?.timestamp ?? 0)).toBeLessThan(200);

        const rival = withFileLock(otherKey, async () => "stolen", { maxRetries: 0, staleAfter: 200 });
        await expect(rival).rejects.toBeInstanceOf(LockError);
      },
      { staleAfter: 200, owner: "run-a" }
    );

    expect(await readLockInfo(LOCK_PATH)).toBeNull();
  });

  it("should leave a lock file it no longer owns in place", async () => {
    const lost: string[] = [];
    const foreign = JSON.stringify({ pid: 999999, timestamp: Date.now(), owner: "run-b", token: "other" });

    await withFileLock(
      TARGET,
      async () => {
        await fs.writeFile(LOCK_PATH, foreign);
        await sleep(60);
      },
      { refreshInterval: 20, onLost: (error) => lost.push(error.message) }
    );

    expect(await readLockInfo(LOCK_PATH)).toMatchObject({ owner: "run-b", token: "other" });
    expect(lost).toEqual([`Lock ${LOCK_PATH} was taken over by another holder`]);
  });
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
