/**
 * CLI 引数のパース
 */

export type OptionValue = string | boolean | string[];

export interface ParsedArgs {
  command?: string;
  options: Record<string, OptionValue>;
  positionals: string[];
}

export class CliError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CliError";
  }
}

/**
 * `command --key value --key=value --flag` 形式をパースする
 * 同じキーが複数回指定された場合は配列になる
 */
export function parseArgs(args: string[]): ParsedArgs {
  const options: Record<string, OptionValue> = {};
  const positionals: string[] = [];
  let command: string | undefined;

  let i = 0;
  if (args[0] && !args[0].startsWith("-")) {
    command = args[0];
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf("=");
    if (eqIndex !== -1) {
      addOption(options, arg.slice(2, eqIndex), arg.slice(eqIndex + 1));
      continue;
    }

    const key = arg.slice(2);
    const next = args[i + 1];
    if (next && !next.startsWith("-")) {
      addOption(options, key, next);
      i++;
      continue;
    }

    addOption(options, key, true);
  }

  const parsed: ParsedArgs = {
    options,
    positionals,
    ...(command !== undefined && { command }),
  };
  return parsed;
}

function addOption(
  options: Record<string, OptionValue>,
  key: string,
  value: string | boolean
): void {
  const existing = options[key];
  if (existing === undefined) {
    options[key] = value;
    return;
  }
  if (Array.isArray(existing)) {
    if (typeof value === "string") {
      existing.push(value);
    }
    return;
  }
  if (typeof existing === "string" && typeof value === "string") {
    options[key] = [existing, value];
    return;
  }
  options[key] = value;
}

/**
 * 文字列オプションを取得（複数指定時は最後の値）
 */
export function getStringOption(
  options: Record<string, OptionValue>,
  keys: string[]
): string | undefined {
  for (const key of keys) {
    const value = options[key];
    if (typeof value === "string") {
      return value;
    }
    if (Array.isArray(value)) {
      const last = value[value.length - 1];
      if (typeof last === "string") {
        return last;
      }
    }
  }
  return undefined;
}

export function requireStringOption(
  options: Record<string, OptionValue>,
  keys: string[],
  label: string
): string {
  const value = getStringOption(options, keys);
  if (!value) {
    throw new CliError("INVALID_INPUT", `${label} is required`);
  }
  return value;
}
