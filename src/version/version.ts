/**
 * バージョン文字列の規則
 * ドット区切りの非負整数（例: 1.2.3）。最後の成分をインクリメントして次のバージョンを得る
 */

/**
 * バージョン文字列の形式エラー
 */
export class VersionFormatError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid version '${value}': expected dot-separated non-negative integers`);
    this.name = "VersionFormatError";
  }
}

const VERSION_PATTERN = /^(0|[1-9]\d*)(\.(0|[1-9]\d*))*$/;

export function isValidVersion(value: string): boolean {
  return VERSION_PATTERN.test(value);
}

/**
 * バージョン文字列を数値成分に分解
 * 大きな成分でも精度を失わないよう bigint を使う
 * @throws VersionFormatError
 */
export function parseVersion(value: string): bigint[] {
  if (!isValidVersion(value)) {
    throw new VersionFormatError(value);
  }
  return value.split(".").map((part) => BigInt(part));
}

/**
 * 成分ごとに比較する（足りない成分は 0 とみなす）
 * @returns a < b なら負、a = b なら 0、a > b なら正
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0n;
    const r = right[i] ?? 0n;
    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }
  return 0;
}

/**
 * 最後の成分を 1 増やす。それ以前の成分はそのまま残す
 * @example incrementVersion("1.2.9") // "1.2.10"
 */
export function incrementVersion(value: string): string {
  const parts = parseVersion(value);
  const last = parts[parts.length - 1] ?? 0n;
  const prefix = value.split(".").slice(0, -1);
  return [...prefix, (last + 1n).toString()].join(".");
}
