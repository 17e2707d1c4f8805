/**
 * 構造化ロガー
 * 1 行 1 JSON で stderr に出力する（stdout は CLI の結果出力に使う）
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  run_id?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  phase: string;
  message: string;
  run_id?: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  context?: LogContext;
}

export const stderrSink: LogSink = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * 環境変数 RELEASE_GATE_LOG_LEVEL からレベルを解決
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  if (value !== undefined && isLogLevel(value)) {
    return value;
  }
  return "info";
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? stderrSink;
    this.context = options.context ?? {};
  }

  /**
   * コンテキストを引き継いだ子ロガーを作成
   */
  child(context: LogContext): Logger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      context: { ...this.context, ...context },
    });
  }

  debug(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("debug", phase, message, data);
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("info", phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("warn", phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log("error", phase, message, data);
  }

  private log(
    level: LogLevel,
    phase: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const { run_id: runId, ...rest } = this.context;
    const merged = { ...rest, ...data };

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      phase,
      message,
    };
    if (typeof runId === "string") entry.run_id = runId;
    if (Object.keys(merged).length > 0) entry.data = merged;

    this.sink(entry);
  }
}

/**
 * 何も出力しないロガー（ライブラリ利用時のデフォルト）
 */
export const silentLogger = new Logger({ sink: () => {} });
