import { describe, expect, it } from "vitest";
import { USAGE, parseCliArgs } from "../../main/ts/cli/args.js";
import { type CliIO, runCli } from "../../main/ts/cli/run.js";

interface Captured {
  io: CliIO;
  out: string[];
  err: string[];
}

const memoryIO = (files: Record<string, string>): Captured => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      fileExists: (filePath) => filePath in files,
      readFile: (filePath) => files[filePath] ?? "",
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
    },
  };
};

describe("parseCliArgs", () => {
  it("should default to printing both dumps", () => {
    expect(parseCliArgs([])).toEqual({
      file: undefined,
      showTokens: true,
      showAst: true,
      maxDepth: 256,
      contextLines: 0,
      help: false,
    });
  });

  it("should select a single dump", () => {
    expect(parseCliArgs(["--ast", "main.nano"])).toMatchObject({
      file: "main.nano",
      showTokens: false,
      showAst: true,
    });
  });

  it("should read numeric options in both spellings", () => {
    expect(parseCliArgs(["--max-depth", "10", "x.nano"])).toMatchObject({
      maxDepth: 10,
      file: "x.nano",
    });
    expect(parseCliArgs(["--max-depth=12", "--context=2"])).toMatchObject({
      maxDepth: 12,
      contextLines: 2,
    });
    expect(parseCliArgs(["--context", "3"]).contextLines).toBe(3);
  });

  it("should fall back to the environment, then the default", () => {
    const env = { NANO_MAX_DEPTH: "32" };
    expect(parseCliArgs([], env).maxDepth).toBe(32);
    expect(parseCliArgs(["--max-depth=8"], env).maxDepth).toBe(8);
    expect(parseCliArgs(["--max-depth=0"], env).maxDepth).toBe(32);
    expect(parseCliArgs([], { NANO_MAX_DEPTH: "abc" }).maxDepth).toBe(256);
  });

  it("should recognise help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--help"]).help).toBe(true);
  });
});

describe("runCli", () => {
  it("should print the token dump", () => {
    const { io, out, err } = memoryIO({ "/work/a.nano": "var x = 1 + 2" });

    expect(runCli(["--tokens", "/work/a.nano"], {}, io)).toBe(0);
    expect(out).toEqual([
      "var : keyword\nx : identifier\n= : operator\n1 : number\n+ : operator\n2 : number",
    ]);
    expect(err).toEqual([]);
  });

  it("should print the AST dump", () => {
    const { io, out } = memoryIO({ "/work/a.nano": "foo(1, 2)" });

    expect(runCli(["--ast", "/work/a.nano"], {}, io)).toBe(0);
    expect(out).toEqual(["Call foo\n  Number 1\n  Number 2"]);
  });

  it("should print both dumps by default", () => {
    const { io, out } = memoryIO({ "/work/a.nano": "x" });

    expect(runCli(["/work/a.nano"], {}, io)).toBe(0);
    expect(out).toEqual(["x : identifier", "Identifier x"]);
  });

  it("should print nothing for an empty file", () => {
    const { io, out } = memoryIO({ "/work/empty.nano": "" });

    expect(runCli(["/work/empty.nano"], {}, io)).toBe(0);
    expect(out).toEqual([]);
  });

  it("should fail on a missing file", () => {
    const { io, err } = memoryIO({});

    expect(runCli(["/work/missing.nano"], {}, io)).toBe(1);
    expect(err).toEqual(["Error: File not found: /work/missing.nano"]);
  });

  it("should print usage without a file", () => {
    const { io, err } = memoryIO({});

    expect(runCli([], {}, io)).toBe(1);
    expect(err).toEqual([USAGE]);
  });

  it("should print usage on request", () => {
    const { io, out } = memoryIO({});

    expect(runCli(["--help"], {}, io)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("should print the first error with a code frame", () => {
    const { io, out, err } = memoryIO({ "/work/bad.nano": 'var s = "abc' });

    expect(runCli(["/work/bad.nano"], {}, io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      '/work/bad.nano:1:9 error: Unterminated string literal\n1 | var s = "abc\n  |         ^',
    ]);
  });

  it("should apply the nesting limit from the environment", () => {
    const { io, err } = memoryIO({ "/work/deep.nano": "((1))" });

    expect(runCli(["/work/deep.nano"], { NANO_MAX_DEPTH: "3" }, io)).toBe(1);
    expect(err[0].split("\n")[0]).toBe(
      "/work/deep.nano:1:3 error: Nesting exceeds the maximum depth of 3"
    );
  });
});
