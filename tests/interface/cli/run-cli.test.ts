import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../../../src/cli/run";
import { ConfigManager } from "../../../src/infrastructure/config/config-manager";
import type { ILogger } from "../../../src/infrastructure/logging/logger";

const FILE_NAME = "rtl_dictionary.json";
const BANNER = "=".repeat(39);

const SAMPLE_DICTIONARY = {
  Prefixes: { pq_: "Placement Queue", mmu_: "Memory-management unit" },
  Suffixes: { _req: "Request line" },
};

describe("runCli", () => {
  let directory: string;
  let dictionaryPath: string;
  let lines: string[];
  let stdout: string;
  let stderr: string;
  let logger: ILogger & { error: ReturnType<typeof vi.fn> };

  function run(args: string[], config = new ConfigManager()): number {
    return runCli(["node", "rtl-meaning", ...args], {
      config,
      logger,
      sink: { write: (text) => lines.push(text) },
      programOutput: {
        writeOut: (text) => {
          stdout += text;
        },
        writeErr: (text) => {
          stderr += text;
        },
      },
    });
  }

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "rtl-meaning-cli-"));
    dictionaryPath = join(directory, FILE_NAME);
    writeFileSync(dictionaryPath, JSON.stringify(SAMPLE_DICTIONARY));
    lines = [];
    stdout = "";
    stderr = "";
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("prints the no-arguments error and reads nothing when called bare", () => {
    expect(run([])).toBe(0);
    expect(lines).toEqual(["\t***Error: No input arguments were specified."]);
  });

  it("explains a known prefix", () => {
    expect(run(["--prefix", "pq_", "--path_to_dict", directory])).toBe(0);
    expect(lines).toEqual([`\t***Info: Trying to read in ${dictionaryPath}`, "pq_: Placement Queue"]);
  });

  it("reports a suffix that is not in the dictionary", () => {
    expect(run(["--suffix", "_ack", "--path_to_dict", directory])).toBe(0);
    expect(lines[1]).toBe("\t***Info: The suffix _ack could not be found in rtl_dictionary.json");
  });

  it("lists the whole dictionary", () => {
    expect(run(["--list_all", "--path_to_dict", directory])).toBe(0);
    expect(lines[1]).toBe(
      `${BANNER}\n            Prefixes\n${BANNER}\n\n` +
        "pq_: Placement Queue\nmmu_: Memory-management unit\n" +
        `\n${BANNER}\n            Suffixes\n${BANNER}\n\n` +
        "_req: Request line\n",
    );
  });

  it("combines switches in one run by default", () => {
    expect(run(["--list_all", "--suffix", "_req", "--prefix", "mmu_", "--path_to_dict", directory])).toBe(0);
    expect(lines).toHaveLength(4);
    expect(lines.slice(1, 3)).toEqual(["mmu_: Memory-management unit", "_req: Request line"]);
  });

  it("refuses combined switches in exclusive mode without reading the file", () => {
    const config = new ConfigManager({ usage: { exclusiveSwitches: true } });

    expect(run(["--prefix", "pq_", "--list_all", "--path_to_dict", directory], config)).toBe(2);
    expect(lines).toEqual([
      "\t***Error: Only one switch (--prefix, --suffix, or --list_all) should be supplied at a time",
    ]);
  });

  it("allows a single switch in exclusive mode", () => {
    const config = new ConfigManager({ usage: { exclusiveSwitches: true } });

    expect(run(["--prefix", "pq_", "--path_to_dict", directory], config)).toBe(0);
    expect(lines[1]).toBe("pq_: Placement Queue");
  });

  it("uses the configured directory when no path is given", () => {
    const config = new ConfigManager({
      dictionary: { fileName: FILE_NAME, defaultDirectory: directory },
    });

    expect(run(["--prefix", "pq_"], config)).toBe(0);
    expect(lines).toEqual([`\t***Info: Trying to read in ${dictionaryPath}`, "pq_: Placement Queue"]);
  });

  it("falls back to the built-in dictionary when the file is empty", () => {
    writeFileSync(dictionaryPath, "");

    expect(run(["--prefix", "mmu_", "--suffix", "_ctrl", "--path_to_dict", directory])).toBe(0);
    expect(lines).toEqual([
      `\t***Info: Trying to read in ${dictionaryPath}`,
      `\t***Info: The file at ${dictionaryPath} is empty... creating the dictionary from scratch`,
      "mmu_: Indicates that the signal is coming from the memory-management unit.",
      "_ctrl: Indicates a control signal or a signal from a control block.",
    ]);
  });

  it("fails with exit code 1 when the dictionary file is missing", () => {
    rmSync(dictionaryPath);

    expect(run(["--prefix", "pq_", "--path_to_dict", directory])).toBe(1);
    expect(lines).toEqual([]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[0]).toContain(`Unable to read dictionary file at ${dictionaryPath}`);
  });

  it("finds and lists a __proto__ entry the file defines", () => {
    writeFileSync(
      dictionaryPath,
      '{"Prefixes": {"__proto__": "Prototype bus", "pq_": "Placement Queue"}, "Suffixes": {"_req": "Request line"}}',
    );

    expect(run(["--prefix", "__proto__", "--list_all", "--path_to_dict", directory])).toBe(0);
    expect(lines).toEqual([
      `\t***Info: Trying to read in ${dictionaryPath}`,
      "__proto__: Prototype bus",
      `${BANNER}\n            Prefixes\n${BANNER}\n\n` +
        "__proto__: Prototype bus\npq_: Placement Queue\n" +
        `\n${BANNER}\n            Suffixes\n${BANNER}\n\n` +
        "_req: Request line\n",
    ]);
  });

  it("skips lookups given an empty value", () => {
    expect(run(["--prefix", "", "--path_to_dict", directory])).toBe(0);
    expect(lines).toEqual([`\t***Info: Trying to read in ${dictionaryPath}`]);
  });

  it("prints help and exits cleanly", () => {
    expect(run(["--help"])).toBe(0);
    expect(stdout).toContain("--list_all");
    expect(stdout).toContain("--path_to_dict <value>");
    expect(lines).toEqual([]);
  });

  it("prints the version", () => {
    expect(run(["--version"])).toBe(0);
    expect(stdout).toBe("1.0.0\n");
  });

  it("rejects unknown switches with the parser's exit code", () => {
    expect(run(["--bogus"])).toBe(1);
    expect(stderr).toContain("unknown option '--bogus'");
    expect(lines).toEqual([]);
  });
});
