/**
 * File Lock Utility
 * バージョンファイルとリリース Run の排他制御
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { v7 as uuidv7 } from "uuid";

/**
 * ロック取得の最大リトライ回数（デフォルト）
 */
const DEFAULT_MAX_RETRIES = 10;

/**
 * リトライ間隔（ミリ秒）
 */
const DEFAULT_RETRY_INTERVAL = 50;

/**
 * ロックのタイムアウト（ミリ秒）- 古いロックファイルの検出用
 */
const DEFAULT_STALE_AFTER = 30000;

/**
 * ロック取得失敗
 */
export class LockError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly holder?: LockInfo
  ) {
    super(message);
    this.name = "LockError";
  }
}

/**
 * ロックファイルの内容
 */
export interface LockInfo {
  pid: number;
  /** 最終更新時刻（保持中は定期的に更新される） */
  timestamp: number;
  owner?: string;
  /** 取得ごとに一意なトークン */
  token?: string;
}

export interface FileLockOptions {
  /** ロック取得のリトライ回数（0 なら 1 回だけ試行） */
  maxRetries?: number;
  retryInterval?: number;
  /** これより古いロックファイルは放棄されたものとみなす */
  staleAfter?: number;
  /** ロックファイルに記録する所有者ラベル */
  owner?: string;
  /** timestamp の更新間隔（デフォルト: staleAfter の 1/3） */
  refreshInterval?: number;
  /** ロックを失った（他者に奪われた・更新できなかった）ときに呼ばれる */
  onLost?: (error: Error) => void;
}

/**
 * インメモリロック（同一プロセス内の競合防止）
 */
const inMemoryLocks = new Map<string, Promise<void>>();

/**
 * ファイルロックを取得して操作を実行
 * 同一プロセス内の呼び出しは順番待ちになり、他プロセスとはロックファイルで排他する
 * @param filePath - ロック対象のファイルパス（ロックファイルは `${filePath}.lock`）
 * @param operation - ロック内で実行する操作
 * @returns 操作の結果
 * @throws LockError - リトライ上限までにロックを取得できなかった場合
 */
export async function withFileLock<T>(
  filePath: string,
  operation: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const lockPath = `${filePath}.lock`;

  // インメモリロック（同一プロセス内の順序保証）
  const existingLock = inMemoryLocks.get(filePath);
  let resolveLock: () => void = () => {};
  const lockPromise = new Promise<void>((resolve) => {
    resolveLock = resolve;
  });
  const chained = existingLock ? existingLock.then(() => lockPromise) : lockPromise;
  inMemoryLocks.set(filePath, chained);

  if (existingLock) {
    await existingLock;
  }

  try {
    // ファイルロック取得（クロスプロセス）
    const held = await acquireFileLock(lockPath, options);
    const heartbeat = startHeartbeat(lockPath, held, options);

    try {
      return await operation();
    } finally {
      await heartbeat.stop();
      await releaseFileLock(lockPath, held);
    }
  } finally {
    resolveLock();
    // 後続の待機者がいなければエントリを削除
    if (inMemoryLocks.get(filePath) === chained) {
      inMemoryLocks.delete(filePath);
    }
  }
}

/**
 * ロックファイルの内容を読み取る（存在しなければ null）
 */
export async function readLockInfo(lockPath: string): Promise<LockInfo | null> {
  let content: string;
  try {
    content = await fs.readFile(lockPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (
      parsed !== null &&
      typeof parsed === "object" &&
      "pid" in parsed &&
      "timestamp" in parsed &&
      typeof parsed.pid === "number" &&
      typeof parsed.timestamp === "number"
    ) {
      const info: LockInfo = { pid: parsed.pid, timestamp: parsed.timestamp };
      if ("owner" in parsed && typeof parsed.owner === "string") {
        info.owner = parsed.owner;
      }
      if ("token" in parsed && typeof parsed.token === "string") {
        info.token = parsed.token;
      }
      return info;
    }
  } catch {
    // 壊れたロックファイル
  }
  return { pid: 0, timestamp: 0 };
}

/**
 * ファイルロックを取得し、書き込んだ内容を返す
 */
async function acquireFileLock(lockPath: string, options: FileLockOptions): Promise<LockInfo> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const retryInterval = options.retryInterval ?? DEFAULT_RETRY_INTERVAL;
  const staleAfter = options.staleAfter ?? DEFAULT_STALE_AFTER;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  const lockInfo: LockInfo = {
    pid: process.pid,
    timestamp: Date.now(),
    token: uuidv7(),
    ...(options.owner !== undefined && { owner: options.owner }),
  };
  const lockContent = JSON.stringify(lockInfo);

  let attempt = 0;
  for (;;) {
    try {
      // O_EXCL フラグで排他的にファイルを作成
      await fs.writeFile(lockPath, lockContent, { flag: "wx" });
      return lockInfo;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "EEXIST") {
        throw error;
      }
    }

    const holder = await readLockInfo(lockPath);
    if (holder === null) {
      // 直前に解放された（リトライ回数に数えない）
      continue;
    }
    if (Date.now() - holder.timestamp > staleAfter) {
      await removeLockFile(lockPath);
      continue;
    }

    if (attempt < maxRetries) {
      attempt++;
      await sleep(retryInterval);
      continue;
    }

    throw new LockError(
      `Failed to acquire lock for ${lockPath} after ${maxRetries} retries`,
      lockPath,
      holder
    );
  }
}

interface Heartbeat {
  stop: () => Promise<void>;
}

/**
 * 保持中のロックの timestamp を定期的に更新する
 * 他者に奪われていたら更新をやめ、onLost に通知する
 */
function startHeartbeat(lockPath: string, held: LockInfo, options: FileLockOptions): Heartbeat {
  const staleAfter = options.staleAfter ?? DEFAULT_STALE_AFTER;
  const interval = options.refreshInterval ?? Math.max(1, Math.floor(staleAfter / 3));
  let pending: Promise<void> = Promise.resolve();
  let stopped = false;

  const lost = (error: Error): void => {
    stopped = true;
    clearInterval(timer);
    options.onLost?.(error);
  };

  const refresh = async (): Promise<void> => {
    const current = await readLockInfo(lockPath);
    if (stopped) return;
    if (!isHeldBy(current, held)) {
      lost(new LockError(`Lock ${lockPath} was taken over by another holder`, lockPath, current ?? undefined));
      return;
    }
    await replaceLockFile(lockPath, { ...held, timestamp: Date.now() });
  };

  const timer = setInterval(() => {
    pending = pending.then(refresh).catch((error: unknown) => {
      lost(error instanceof Error ? error : new Error(String(error)));
    });
  }, interval);
  timer.unref();

  return {
    stop: async () => {
      stopped = true;
      clearInterval(timer);
      await pending;
    },
  };
}

function isHeldBy(current: LockInfo | null, held: LockInfo): boolean {
  return current !== null && current.pid === held.pid && current.token === held.token;
}

/**
 * 一時ファイル + rename で内容を置き換える（読み手が途中の内容を見ないように）
 */
async function replaceLockFile(lockPath: string, info: LockInfo): Promise<void> {
  const tempPath = `${lockPath}.${process.pid}.${info.token ?? "refresh"}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(info), "utf-8");
  await fs.rename(tempPath, lockPath);
}

/**
 * ファイルロックを解放
 * 自分が保持しているロックファイルだけを削除する
 */
async function releaseFileLock(lockPath: string, held: LockInfo): Promise<void> {
  const current = await readLockInfo(lockPath);
  if (!isHeldBy(current, held)) {
    return;
  }
  await removeLockFile(lockPath);
}

async function removeLockFile(lockPath: string): Promise<void> {
  try {
    await fs.unlink(lockPath);
  } catch (error) {
    // ロックファイルが既に削除されている場合は無視
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * スリープユーティリティ
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
