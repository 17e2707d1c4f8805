#!/usr/bin/env node
/**
 * release-gate CLI
 * リリース Run の実行とバージョン・マトリクス・ジャーナルの参照
 */

import { parseReleaseConfigFile, ConfigParseError, DEFAULT_CONFIG_FILE } from "../config/parser.js";
import { validateReleaseConfig } from "../config/validator.js";
import { Logger, resolveLogLevel } from "../logging/logger.js";
import { VersionStore, VersionStoreError } from "../version/version-store.js";
import { cellKey, enumerateMatrix } from "../matrix/matrix.js";
import { canonicalArtifactName, platformTag } from "../matrix/naming.js";
import { DirectoryIndex } from "../publish/directory-index.js";
import type { PublishTarget } from "../publish/publisher.js";
import { CommandBuildTool } from "../collaborators/command-build-tool.js";
import { CommandConformanceChecker } from "../collaborators/command-checker.js";
import { ReleasePipeline } from "../pipeline/release-pipeline.js";
import { RunJournal, RunJournalError, isReleaseRunId } from "../pipeline/run-journal.js";
import type { ReleaseConfig, Trigger } from "../types/index.js";
import {
  CliError,
  getStringOption,
  parseArgs,
  requireStringOption,
  type OptionValue,
} from "./args.js";

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (!parsed.command || parsed.command === "help" || parsed.command === "--help" || parsed.command === "-h") {
    outputHelp();
    return;
  }

  try {
    switch (parsed.command) {
      case "run":
        await commandRun(parsed.options);
        break;
      case "show-version":
        await commandShowVersion(parsed.options);
        break;
      case "init-version":
        await commandInitVersion(parsed.options);
        break;
      case "list-matrix":
        await commandListMatrix(parsed.options);
        break;
      case "validate-config":
        await commandValidateConfig(parsed.options);
        break;
      case "show-run":
        await commandShowRun(parsed.options);
        break;
      default:
        throw new CliError("INVALID_INPUT", `Unknown command: ${parsed.command}`);
    }
  } catch (error) {
    if (error instanceof CliError) {
      outputError(error.code, error.message, error.details);
      process.exitCode = 1;
      return;
    }
    if (error instanceof VersionStoreError) {
      outputError(error.code, error.message);
      process.exitCode = 1;
      return;
    }
    if (error instanceof ConfigParseError) {
      outputError("INVALID_CONFIG", error.message);
      process.exitCode = 1;
      return;
    }
    if (error instanceof RunJournalError) {
      outputError("JOURNAL_ERROR", error.message);
      process.exitCode = 1;
      return;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    outputError("INTERNAL_ERROR", message);
    process.exitCode = 1;
  }
}

function outputJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function outputError(code: string, message: string, details?: unknown): void {
  const errorPayload: { error: { code: string; message: string; details?: unknown } } = {
    error: { code, message },
  };
  if (details !== undefined) {
    errorPayload.error.details = details;
  }
  outputJson(errorPayload);
}

function outputHelp(): void {
  outputJson({
    commands: {
      run: "Run the release pipeline (gate, build, collect, publish, advance)",
      "show-version": "Show the version record",
      "init-version": "Create the version file",
      "list-matrix": "List matrix cells with canonical names for the next version",
      "validate-config": "Validate the release configuration",
      "show-run": "Show the journal of a run",
    },
    options: {
      common: ["--config"],
      run: ["--revision", "--trigger", "--ref", "--triggered-by"],
      "init-version": ["--current"],
      "show-run": ["--run-id"],
    },
    env: {
      RELEASE_GATE_CONFIG: `Config file path (default: ${DEFAULT_CONFIG_FILE})`,
      RELEASE_GATE_LOG_LEVEL: "debug | info | warn | error (default: info)",
    },
  });
}

function resolveConfigPath(options: Record<string, OptionValue>): string {
  return (
    getStringOption(options, ["config"]) ??
    process.env.RELEASE_GATE_CONFIG ??
    DEFAULT_CONFIG_FILE
  );
}

/**
 * 設定を読み込み、整合性を検証する
 */
async function loadConfig(options: Record<string, OptionValue>): Promise<ReleaseConfig> {
  const configPath = resolveConfigPath(options);
  const config = await parseReleaseConfigFile(configPath);
  const validation = validateReleaseConfig(config);
  if (!validation.valid) {
    throw new CliError("INVALID_CONFIG", `Invalid release config: ${configPath}`, {
      errors: validation.errors,
    });
  }
  return config;
}

function parseTrigger(options: Record<string, OptionValue>): Trigger {
  const kind = getStringOption(options, ["trigger"]) ?? "manual";
  if (kind === "push") {
    return { kind: "push", ref: requireStringOption(options, ["ref"], "ref") };
  }
  if (kind === "manual") {
    const triggeredBy = getStringOption(options, ["triggered-by"]);
    return { kind: "manual", ...(triggeredBy !== undefined && { triggered_by: triggeredBy }) };
  }
  throw new CliError("INVALID_INPUT", `trigger must be 'push' or 'manual': ${kind}`);
}

async function commandRun(options: Record<string, OptionValue>): Promise<void> {
  const config = await loadConfig(options);
  const trigger = parseTrigger(options);
  const revision = getStringOption(options, ["revision"]);

  if (!config.build.command) {
    throw new CliError("INVALID_CONFIG", "build.command is required to run a release");
  }
  if (!config.check.command) {
    throw new CliError("INVALID_CONFIG", "check.command is required to run a release");
  }

  const targets: PublishTarget[] = config.publish.endpoints.map((endpoint) => ({
    endpoint,
    index: new DirectoryIndex({ rootDir: endpoint.path }),
  }));

  const pipeline = new ReleasePipeline({
    config,
    buildTool: new CommandBuildTool({ command: config.build.command }),
    checker: new CommandConformanceChecker({ command: config.check.command }),
    targets,
    logger: new Logger({ level: resolveLogLevel(process.env.RELEASE_GATE_LOG_LEVEL) }),
  });

  // Ctrl-C は Run の取り消しとして扱う
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const result = await pipeline.run({
      trigger,
      signal: controller.signal,
      ...(revision !== undefined && { sourceRevision: revision }),
    });
    outputJson(result);
    if (!result.success) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function commandShowVersion(options: Record<string, OptionValue>): Promise<void> {
  const config = await loadConfig(options);
  const store = new VersionStore({ filePath: config.version_file });
  outputJson(await store.read());
}

async function commandInitVersion(options: Record<string, OptionValue>): Promise<void> {
  const current = requireStringOption(options, ["current"], "current");
  const config = await loadConfig(options);
  const store = new VersionStore({ filePath: config.version_file });
  const record = await store.initialize(current);
  outputJson({ file: config.version_file, ...record });
}

async function commandListMatrix(options: Record<string, OptionValue>): Promise<void> {
  const config = await loadConfig(options);
  const record = await new VersionStore({ filePath: config.version_file }).read();
  const naming = {
    packageName: config.package.name,
    interpreterPrefix: config.package.interpreter_prefix,
  };

  const cells = enumerateMatrix(config.matrix).map((cell) => ({
    cell: cellKey(cell),
    platform: cell.platform,
    arch: cell.arch,
    interpreter_version: cell.interpreter_version,
    canonical_name: canonicalArtifactName(naming, record.next_version, cell),
    platform_tag: platformTag(cell, config.build.platform_tags),
  }));

  outputJson({ version: record.next_version, cells });
}

async function commandValidateConfig(options: Record<string, OptionValue>): Promise<void> {
  const configPath = resolveConfigPath(options);
  const config = await parseReleaseConfigFile(configPath);
  const validation = validateReleaseConfig(config);
  outputJson({ config: configPath, ...validation });
  if (!validation.valid) {
    process.exitCode = 1;
  }
}

async function commandShowRun(options: Record<string, OptionValue>): Promise<void> {
  const runId = requireStringOption(options, ["run-id"], "run_id");
  if (!isReleaseRunId(runId)) {
    throw new CliError("INVALID_INPUT", `Invalid run id: ${runId}`);
  }
  const config = await loadConfig(options);
  const journal = new RunJournal({ baseDir: config.journal_dir });
  if (!(await journal.exists(runId))) {
    throw new CliError("RUN_NOT_FOUND", `Run '${runId}' not found`);
  }
  outputJson({ run_id: runId, entries: await journal.readEntries(runId) });
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  outputError("INTERNAL_ERROR", message);
  process.exit(1);
});
