/**
 * Release 設定バリデーター
 * スキーマでは表せない整合性を検証する
 */

import type {
  ConfigValidationError,
  ConfigValidationResult,
  ReleaseConfig,
} from "../types/index.js";
import * as path from "node:path";
import { cellKey, enumerateMatrix, sameCell } from "../matrix/matrix.js";
import { versionLockTarget } from "../version/version-store.js";

/**
 * ReleaseConfig をバリデーションする
 */
export function validateReleaseConfig(config: ReleaseConfig): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  validateMatrix(config, errors);
  validateGate(config, errors);
  validateBuild(config, errors);
  validateEndpoints(config, errors);
  validateLock(config, errors);

  return { valid: errors.length === 0, errors };
}

function validateMatrix(config: ReleaseConfig, errors: ConfigValidationError[]): void {
  const seenTargets = new Set<string>();
  config.matrix.platforms.forEach((target, index) => {
    const key = `${target.platform}-${target.arch}`;
    if (seenTargets.has(key)) {
      errors.push(
        createError("DUPLICATE_PLATFORM", `Platform '${key}' is listed more than once`, `/matrix/platforms/${index}`)
      );
    }
    seenTargets.add(key);
  });

  const seenInterpreters = new Set<string>();
  config.matrix.interpreters.forEach((interpreter, index) => {
    if (seenInterpreters.has(interpreter)) {
      errors.push(
        createError(
          "DUPLICATE_INTERPRETER",
          `Interpreter '${interpreter}' is listed more than once`,
          `/matrix/interpreters/${index}`
        )
      );
    }
    seenInterpreters.add(interpreter);
  });

  config.matrix.exclude.forEach((exclusion, index) => {
    if (
      exclusion.platform === undefined &&
      exclusion.arch === undefined &&
      exclusion.interpreter_version === undefined
    ) {
      errors.push(
        createError("EMPTY_EXCLUSION", "Exclusion must name at least one field", `/matrix/exclude/${index}`)
      );
    }
  });

  if (enumerateMatrix(config.matrix).length === 0) {
    errors.push(createError("EMPTY_MATRIX", "Matrix has no cells after exclusions", "/matrix"));
  }
}

function validateGate(config: ReleaseConfig, errors: ConfigValidationError[]): void {
  const reference = config.gate.reference;
  if (reference === undefined) return;

  const cells = enumerateMatrix(config.matrix);
  if (!cells.some((cell) => sameCell(cell, reference))) {
    errors.push(
      createError(
        "INVALID_GATE_REFERENCE",
        `Gate reference cell '${cellKey(reference)}' is not part of the matrix`,
        "/gate/reference"
      )
    );
  }
}

function validateBuild(config: ReleaseConfig, errors: ConfigValidationError[]): void {
  if (config.build.concurrency < 1) {
    errors.push(
      createError("INVALID_CONCURRENCY", "build.concurrency must be at least 1", "/build/concurrency")
    );
  }
}

function validateEndpoints(config: ReleaseConfig, errors: ConfigValidationError[]): void {
  const seen = new Set<string>();
  config.publish.endpoints.forEach((endpoint, index) => {
    if (seen.has(endpoint.name)) {
      errors.push(
        createError(
          "DUPLICATE_ENDPOINT",
          `Endpoint '${endpoint.name}' is defined more than once`,
          `/publish/endpoints/${index}/name`
        )
      );
    }
    seen.add(endpoint.name);

    // directory エンドポイントは認証情報を使わない
    if (endpoint.kind === "directory" && endpoint.credentials_env !== undefined) {
      errors.push(
        createError(
          "CREDENTIALS_UNSUPPORTED",
          `Endpoint '${endpoint.name}' of kind directory does not take credentials_env`,
          `/publish/endpoints/${index}/credentials_env`
        )
      );
    }
  });
}

/**
 * Run ロックはバージョンファイルの書き込みロックと別のパスでなければならない
 */
function validateLock(config: ReleaseConfig, errors: ConfigValidationError[]): void {
  const lockPath = path.resolve(config.lock.path);
  const reserved = [config.version_file, versionLockTarget(config.version_file)].map((p) => path.resolve(p));
  if (reserved.includes(lockPath)) {
    errors.push(
      createError(
        "LOCK_PATH_CONFLICT",
        `lock.path must differ from version_file and its write lock: ${config.lock.path}`,
        "/lock/path"
      )
    );
  }
}

function createError(code: string, message: string, path: string): ConfigValidationError {
  return { code, message, path };
}
