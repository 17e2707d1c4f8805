/**
 * Run Journal
 * Run ごとのステージ遷移を CSV に追記する（監査用）
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { PipelineStage, ReleaseRunId } from "../types/index.js";

/**
 * ジャーナルエラー
 */
export class RunJournalError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "RunJournalError";
  }
}

/**
 * CSV の 1 行
 */
export interface JournalEntry {
  /** ISO 8601 */
  timestamp: string;
  stage: PipelineStage;
  /** 遷移ごとに 1 ずつ増える（初期行は 1） */
  revision: number;
  /** "trigger:push" / "trigger:manual" / "enter" */
  event: string;
  /** failed 行の失敗理由 */
  reason: string;
  detail: string;
}

/**
 * CSV ヘッダー（固定順序）
 */
const HEADERS: readonly (keyof JournalEntry)[] = [
  "timestamp",
  "stage",
  "revision",
  "event",
  "reason",
  "detail",
];

const STAGES: readonly PipelineStage[] = [
  "pending",
  "reading_version",
  "checking_dependencies",
  "gating",
  "building",
  "collecting",
  "publishing",
  "advancing",
  "succeeded",
  "failed",
];

/**
 * デフォルトの保存ディレクトリ
 */
const DEFAULT_BASE_DIR = ".release_gate/runs";

export interface RunJournalOptions {
  baseDir?: string;
}

/**
 * append-only の Run ジャーナル
 */
export class RunJournal {
  private readonly baseDir: string;

  constructor(options: RunJournalOptions = {}) {
    this.baseDir = options.baseDir ?? DEFAULT_BASE_DIR;
  }

  private getFilePath(runId: ReleaseRunId): string {
    return path.join(this.baseDir, `${runId}.csv`);
  }

  /**
   * ジャーナルを作成し、初期エントリを書き込む
   */
  async createRun(runId: ReleaseRunId, initialEntry: JournalEntry): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const content = [HEADERS.join(","), toCsvLine(initialEntry)].join("\n") + "\n";

    try {
      // 既存ファイルは上書きしない
      await fs.writeFile(this.getFilePath(runId), content, { encoding: "utf-8", flag: "wx" });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "EEXIST") {
        throw new RunJournalError(`Run ${runId} already exists`);
      }
      throw new RunJournalError(`Failed to create journal: ${runId}`, error);
    }
  }

  /**
   * エントリを追加（append-only）
   */
  async appendEntry(runId: ReleaseRunId, entry: JournalEntry): Promise<void> {
    if (!(await this.exists(runId))) {
      throw new RunJournalError(`Run ${runId} does not exist`);
    }
    await fs.appendFile(this.getFilePath(runId), toCsvLine(entry) + "\n", "utf-8");
  }

  /**
   * 全エントリを読み込み
   */
  async readEntries(runId: ReleaseRunId): Promise<JournalEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.getFilePath(runId), "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw new RunJournalError(`Run ${runId} does not exist`);
      }
      throw new RunJournalError(`Failed to read journal: ${runId}`, error);
    }

    const rows = splitCsvRows(content.trim());
    // ヘッダー行をスキップ
    return rows
      .slice(1)
      .filter((row) => row.trim().length > 0)
      .map(fromCsvLine);
  }

  async getLatestEntry(runId: ReleaseRunId): Promise<JournalEntry | null> {
    const entries = await this.readEntries(runId);
    return entries[entries.length - 1] ?? null;
  }

  async exists(runId: ReleaseRunId): Promise<boolean> {
    try {
      await fs.access(this.getFilePath(runId));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 全 Run ID を一覧取得（UUIDv7 なので作成順）
   */
  async listRunIds(): Promise<ReleaseRunId[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.baseDir);
    } catch {
      return [];
    }

    const ids: ReleaseRunId[] = [];
    for (const file of files.sort()) {
      if (!file.endsWith(".csv")) continue;
      const id = file.slice(0, -4);
      if (isReleaseRunId(id)) ids.push(id);
    }
    return ids;
  }
}

export function isReleaseRunId(value: string): value is ReleaseRunId {
  return /^release-[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(value);
}

function isStage(value: string): value is PipelineStage {
  return STAGES.some((stage) => stage === value);
}

function toCsvLine(entry: JournalEntry): string {
  return HEADERS.map((header) => escapeCsvValue(String(entry[header]))).join(",");
}

function fromCsvLine(line: string): JournalEntry {
  const values = parseCsvLine(line);
  if (values.length !== HEADERS.length) {
    throw new RunJournalError(
      `Invalid CSV line: expected ${HEADERS.length} columns, got ${values.length}`
    );
  }

  const stage = values[1] ?? "";
  if (!isStage(stage)) {
    throw new RunJournalError(`Invalid stage in journal: ${stage}`);
  }

  return {
    timestamp: values[0] ?? "",
    stage,
    revision: parseInt(values[2] ?? "0", 10),
    event: values[3] ?? "",
    reason: values[4] ?? "",
    detail: values[5] ?? "",
  };
}

function escapeCsvValue(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * 論理行に分割（クォート内の改行は区切りとして扱わない）
 */
function splitCsvRows(content: string): string[] {
  const rows: string[] = [];
  let current = "";
  let inQuotes = false;

  for (const char of content) {
    if (char === '"') {
      inQuotes = !inQuotes;
      current += char;
    } else if (char === "\n" && !inQuotes) {
      rows.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  if (current) rows.push(current);

  return rows;
}

/**
 * CSV 行をパース（"" はクォート内の " として扱う）
 */
function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      values.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  values.push(current);
  return values;
}
