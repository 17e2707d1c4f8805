/**
 * CLI 引数パースのテスト
 */

import { describe, it, expect } from "vitest";
import { CliError, getStringOption, parseArgs, requireStringOption } from "../src/cli/args.js";

describe("parseArgs", () => {
  it("should split the command, options and positionals", () => {
    const parsed = parseArgs(["run", "--trigger", "push", "--ref=refs/heads/main", "--dry", "extra"]);

    expect(parsed).toEqual({
      command: "run",
      options: { trigger: "push", ref: "refs/heads/main", dry: "extra" },
      positionals: [],
    });
  });

  it("should treat a flag followed by another option as boolean", () => {
    const parsed = parseArgs(["show-run", "--verbose", "--run-id", "release-1"]);

    expect(parsed.options).toEqual({ verbose: true, "run-id": "release-1" });
  });

  it("should collect repeated options into an array", () => {
    const parsed = parseArgs(["run", "--config", "a.yaml", "--config", "b.yaml"]);

    expect(parsed.options.config).toEqual(["a.yaml", "b.yaml"]);
    expect(getStringOption(parsed.options, ["config"])).toBe("b.yaml");
  });

  it("should have no command when the first argument is an option", () => {
    const parsed = parseArgs(["--config", "x.yaml"]);

    expect(parsed.command).toBeUndefined();
    expect(parsed.options).toEqual({ config: "x.yaml" });
  });
});

describe("requireStringOption", () => {
  it("should throw a CliError when the option is missing", () => {
    expect(() => requireStringOption({}, ["current"], "current")).toThrow(CliError);
    expect(() => requireStringOption({ current: true }, ["current"], "current")).toThrow(
      "current is required"
    );
  });
});
