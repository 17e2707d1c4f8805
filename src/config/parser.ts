/**
 * Release 設定 YAML パーサー
 * 相対パスは設定ファイルのディレクトリを基準に解決する
 */

import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type {
  CommandSpec,
  DependencyName,
  DependencyPaths,
  EndpointConfig,
  ReleaseConfig,
} from "../types/index.js";
import { createCell } from "../matrix/matrix.js";
import { DEFAULT_INTERPRETER_PREFIX, DEFAULT_PLATFORM_TAG_OPTIONS } from "../matrix/naming.js";

/**
 * パースエラー
 */
export class ConfigParseError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ConfigParseError";
  }
}

export const DEFAULT_CONFIG_FILE = "release-gate.yaml";

const DEFAULT_STATE_DIR = ".release_gate";
const DEFAULT_CONCURRENCY = 4;
const DEFAULT_CELL_TIMEOUT_MS = 60 * 60 * 1000;
const DEFAULT_STALE_AFTER_MS = 6 * 60 * 60 * 1000;

// =============================================================================
// Zod スキーマ定義
// =============================================================================

const PlatformSchema = z.enum(["linux", "macos", "windows"]);
const ArchSchema = z.enum(["x86_64", "aarch64"]);

// YAML の 3.10 は数値 3.1 になるため、文字列のみ受け付ける
const InterpreterSchema = z
  .string({ invalid_type_error: "interpreter versions must be quoted strings" })
  .min(1);

const CellSchema = z.object({
  platform: PlatformSchema,
  arch: ArchSchema,
  interpreter_version: InterpreterSchema,
});

const ExclusionSchema = z
  .object({
    platform: PlatformSchema.optional(),
    arch: ArchSchema.optional(),
    interpreter_version: InterpreterSchema.optional(),
  })
  .strict();

const DependencySchema = z.union([
  z.string().min(1),
  z.object({
    path: z.string().min(1),
    expect: z.array(z.string().min(1)).default([]),
  }),
]);

const CommandSchema = z.array(z.string().min(1)).min(1);

const EndpointSchema = z.object({
  name: z.string().min(1),
  kind: z.literal("directory").default("directory"),
  path: z.string().min(1),
  required: z.boolean().default(false),
  on_existing: z.enum(["skip", "replace"]).default("skip"),
  credentials_env: z.string().min(1).optional(),
});

const ReleaseYamlSchema = z.object({
  package: z.object({
    name: z.string().min(1),
    interpreter_prefix: z.string().default(DEFAULT_INTERPRETER_PREFIX),
  }),
  source: z
    .object({
      revision: z.string().min(1).default("HEAD"),
      branch: z.string().min(1).default("main"),
    })
    .default({}),
  version_file: z.string().min(1).default(`${DEFAULT_STATE_DIR}/VERSION`),
  dependencies: z.object({
    native_lib: DependencySchema,
    toolchain: DependencySchema,
    solver: DependencySchema,
  }),
  matrix: z.object({
    platforms: z
      .array(z.object({ platform: PlatformSchema, arch: ArchSchema }))
      .min(1),
    interpreters: z.array(InterpreterSchema).min(1),
    exclude: z.array(ExclusionSchema).default([]),
  }),
  gate: z.object({
    contract_file: z.string().min(1),
    reference: CellSchema.optional(),
  }),
  build: z
    .object({
      command: CommandSchema.optional(),
      concurrency: z.number().int().default(DEFAULT_CONCURRENCY),
      cell_timeout_ms: z.number().int().positive().default(DEFAULT_CELL_TIMEOUT_MS),
      workspace_dir: z.string().min(1).default(`${DEFAULT_STATE_DIR}/workspaces`),
      keep_workspaces: z.boolean().default(false),
      platform_tags: z
        .object({
          manylinux: z.string().min(1).default(DEFAULT_PLATFORM_TAG_OPTIONS.manylinux),
          macos_min: z.string().min(1).default(DEFAULT_PLATFORM_TAG_OPTIONS.macos_min),
        })
        .default({}),
    })
    .default({}),
  check: z
    .object({
      command: CommandSchema.optional(),
    })
    .default({}),
  publish: z
    .object({
      block_on_optional_failure: z.boolean().default(false),
      endpoints: z.array(EndpointSchema).default([]),
    })
    .default({}),
  lock: z
    .object({
      path: z.string().min(1).default(`${DEFAULT_STATE_DIR}/release`),
      wait_ms: z.number().int().min(0).default(0),
      stale_after_ms: z.number().int().positive().default(DEFAULT_STALE_AFTER_MS),
    })
    .default({}),
  journal_dir: z.string().min(1).default(`${DEFAULT_STATE_DIR}/runs`),
});

type ReleaseYaml = z.infer<typeof ReleaseYamlSchema>;
type DependencyYaml = z.infer<typeof DependencySchema>;

// =============================================================================
// パース関数
// =============================================================================

export interface ParseConfigOptions {
  /** 相対パスの基準ディレクトリ（デフォルト: カレントディレクトリ） */
  baseDir?: string;
}

/**
 * YAML 文字列を ReleaseConfig にパースする
 * @throws ConfigParseError - パースまたはスキーマ検証の失敗時
 */
export function parseReleaseConfig(
  yaml: string,
  options: ParseConfigOptions = {}
): ReleaseConfig {
  let parsed: unknown;

  try {
    parsed = parseYaml(yaml);
  } catch (error) {
    throw new ConfigParseError("Invalid YAML syntax", error);
  }

  const result = ReleaseYamlSchema.safeParse(parsed);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ConfigParseError(`Invalid release config: ${errors}`);
  }

  return yamlToConfig(result.data, options.baseDir ?? process.cwd());
}

/**
 * ファイルから ReleaseConfig を読み込む
 * @throws ConfigParseError - 読み込みまたはパース失敗時
 */
export async function parseReleaseConfigFile(filePath: string): Promise<ReleaseConfig> {
  const fs = await import("node:fs/promises");

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigParseError(`Failed to read file: ${filePath}`, error);
  }

  return parseReleaseConfig(content, { baseDir: path.dirname(path.resolve(filePath)) });
}

function toCommand(value: string[] | undefined): CommandSpec | undefined {
  if (value === undefined) return undefined;
  const [command, ...args] = value;
  if (command === undefined) return undefined;
  return { command, args };
}

/**
 * パース結果を ReleaseConfig 型に変換
 * exactOptionalPropertyTypes に対応するため、undefined を除外
 */
function yamlToConfig(yaml: ReleaseYaml, baseDir: string): ReleaseConfig {
  const resolve = (p: string): string => path.resolve(baseDir, p);

  const dependencies: DependencyPaths = {
    native_lib: resolve(dependencyPath(yaml.dependencies.native_lib)),
    toolchain: resolve(dependencyPath(yaml.dependencies.toolchain)),
    solver: resolve(dependencyPath(yaml.dependencies.solver)),
  };

  const dependencyMarkers: Partial<Record<DependencyName, string[]>> = {};
  for (const name of ["native_lib", "toolchain", "solver"] as const) {
    const entry = yaml.dependencies[name];
    if (typeof entry !== "string" && entry.expect.length > 0) {
      dependencyMarkers[name] = entry.expect;
    }
  }

  const endpoints: EndpointConfig[] = yaml.publish.endpoints.map((e) => ({
    name: e.name,
    kind: e.kind,
    path: resolve(e.path),
    required: e.required,
    on_existing: e.on_existing,
    ...(e.credentials_env !== undefined && { credentials_env: e.credentials_env }),
  }));

  const buildCommand = toCommand(yaml.build.command);
  const checkCommand = toCommand(yaml.check.command);
  const reference = yaml.gate.reference;

  return {
    package: {
      name: yaml.package.name,
      interpreter_prefix: yaml.package.interpreter_prefix,
    },
    source: {
      revision: yaml.source.revision,
      branch: yaml.source.branch,
    },
    version_file: resolve(yaml.version_file),
    dependencies,
    dependency_markers: dependencyMarkers,
    matrix: {
      platforms: yaml.matrix.platforms.map((p) => ({ platform: p.platform, arch: p.arch })),
      interpreters: yaml.matrix.interpreters,
      exclude: yaml.matrix.exclude.map((x) => ({
        ...(x.platform !== undefined && { platform: x.platform }),
        ...(x.arch !== undefined && { arch: x.arch }),
        ...(x.interpreter_version !== undefined && { interpreter_version: x.interpreter_version }),
      })),
    },
    gate: {
      contract_file: resolve(yaml.gate.contract_file),
      ...(reference !== undefined && {
        reference: createCell(reference.platform, reference.arch, reference.interpreter_version),
      }),
    },
    build: {
      ...(buildCommand !== undefined && { command: buildCommand }),
      concurrency: yaml.build.concurrency,
      cell_timeout_ms: yaml.build.cell_timeout_ms,
      workspace_dir: resolve(yaml.build.workspace_dir),
      keep_workspaces: yaml.build.keep_workspaces,
      platform_tags: {
        manylinux: yaml.build.platform_tags.manylinux,
        macos_min: yaml.build.platform_tags.macos_min,
      },
    },
    check: {
      ...(checkCommand !== undefined && { command: checkCommand }),
    },
    publish: {
      block_on_optional_failure: yaml.publish.block_on_optional_failure,
      endpoints,
    },
    lock: {
      path: resolve(yaml.lock.path),
      wait_ms: yaml.lock.wait_ms,
      stale_after_ms: yaml.lock.stale_after_ms,
    },
    journal_dir: resolve(yaml.journal_dir),
  };
}

function dependencyPath(entry: DependencyYaml): string {
  return typeof entry === "string" ? entry : entry.path;
}
