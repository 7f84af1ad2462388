// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { access, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect, type Exit } from "effect";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import { exitCodeFromExit } from "../../src/cli/exit";
import { cli } from "../../src/cli/index";
import { TestLayer, makeTempDir } from "../helpers/layers";

describe("trainset cli", () => {
  let dir = "";
  let cleanup: () => Promise<void> = async () => {};
  let stdout: string[] = [];
  let stderr: string[] = [];

  const at = (...segments: readonly string[]): string => join(dir, ...segments);

  /** Runs the CLI against the quiet config written in beforeAll. */
  const run = (command: string, ...args: readonly string[]): Promise<Exit.Exit<void, unknown>> =>
    Effect.runPromiseExit(
      cli(["node", "trainset", command, "-g", at("trainset.toml"), ...args]).pipe(
        Effect.provide(TestLayer)
      )
    );

  beforeAll(async () => {
    ({ dir, cleanup } = await makeTempDir("cli"));
    await writeFile(at("versions.txt"), "# supported\n4.7.6\n5.3\n");
    await writeFile(at("broken.txt"), "4.7.6\nfive\n");
    await writeFile(at("empty.txt"), "# nothing yet\n");
    await writeFile(at("job.yml"), "job ${VERSION}\n");
    await writeFile(at("upgrade.yml"), "up ${OLD_VERSION}->${VERSION}\n");
    await writeFile(
      at("trainset.toml"),
      [
        "[logging]",
        'level = "error"',
        "",
        "[output]",
        'ciFileName = "ci.yml"',
        `jobTemplate = "${at("job.yml")}"`,
        `upgradeTemplate = "${at("upgrade.yml")}"`,
        "",
      ].join("\n")
    );
  });

  afterAll(async () => {
    await cleanup();
  });

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: unknown) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("check", () => {
    test("prints each version with its kind and components", async () => {
      const exit = await run("check", "--json", at("versions.txt"));

      expect(exitCodeFromExit(exit)).toBe(0);
      expect(JSON.parse(stdout.join(""))).toEqual([
        { version: "4.7.6", kind: "normal", components: [4, 7, 6] },
        { version: "5.3", kind: "normal", components: [5, 3] },
      ]);
    });

    test("exits with MALFORMED_VERSION and reports the entry", async () => {
      const exit = await run("check", at("broken.txt"));

      expect(exitCodeFromExit(exit)).toBe(20);
      expect(stderr).toEqual([
        "✗ Malformed version 'five': expected N.N or N.N.N, optionally followed by a suffix\n",
      ]);
    });

    test("exits with EMPTY_VERSION_LIST for a file without versions", async () => {
      const exit = await run("check", at("empty.txt"));

      expect(exitCodeFromExit(exit)).toBe(21);
      expect(stderr).toEqual([`✗ No versions found in ${at("empty.txt")}\n`]);
    });
  });

  describe("sets", () => {
    test("prints one set when --set is given", async () => {
      const exit = await run("sets", "--set", "tot5", at("versions.txt"));

      expect(exitCodeFromExit(exit)).toBe(0);
      expect(stdout).toEqual(["tot5: 5.3\n"]);
    });

    test("prints every set as JSON", async () => {
      await run("sets", "--json", at("versions.txt"));

      expect(JSON.parse(stdout.join(""))).toEqual({
        all: ["4.7.6", "5.3"],
        all4: ["4.7.6"],
        all5: ["5.3"],
        tot: ["4.7.6", "5.3"],
        tot4: ["4.7.6"],
        tot5: ["5.3"],
      });
    });
  });

  describe("pairs", () => {
    test("prints every version with its upgrade sources", async () => {
      await run("pairs", at("versions.txt"));

      expect(stdout).toEqual(["4.7.6 <- (none)\n5.3 <- 4.7.6\n"]);
    });
  });

  describe("generate", () => {
    test("writes CI and JSON files for every set", async () => {
      const out = at("out");
      const exit = await run("generate", "--output-dir", out, at("versions.txt"));

      expect(exitCodeFromExit(exit)).toBe(0);
      expect(await readFile(join(out, "all", "ci.yml"), "utf8")).toBe("job 4.7.6\n\njob 5.3\n");
      expect(await readFile(join(out, "tot4", "ci.yml"), "utf8")).toBe("job 4.7.6\n");
      expect(await readFile(join(out, "multiver", "ci.yml"), "utf8")).toBe("up 4.7.6->5.3\n");
      expect(JSON.parse(await readFile(join(out, "tot5.json"), "utf8"))).toEqual([
        { version: "5.3" },
      ]);
      expect(JSON.parse(await readFile(join(out, "multiver.json"), "utf8"))).toEqual([
        { version: "5.3", old: "4.7.6" },
      ]);
    });

    test("--ci-file-name overrides the configured name", async () => {
      const out = at("renamed");
      await run(
        "generate",
        "--output-dir",
        out,
        "--ci-file-name",
        "pipeline.yml",
        at("versions.txt")
      );

      expect(await readFile(join(out, "all5", "pipeline.yml"), "utf8")).toBe("job 5.3\n");
    });

    test("--dry-run lists the planned files without writing", async () => {
      const out = at("dry");
      const exit = await run("generate", "--dry-run", "--output-dir", out, at("versions.txt"));

      expect(exitCodeFromExit(exit)).toBe(0);
      expect(stdout.join("").split("\n").slice(0, 3)).toEqual([
        join(out, "all", "ci.yml"),
        join(out, "all.json"),
        join(out, "all4", "ci.yml"),
      ]);
      await expect(access(out)).rejects.toThrow();
    });

    test("fails with FILE_READ_FAILED for a missing template", async () => {
      const exit = await run(
        "generate",
        "--dry-run",
        "--job-template",
        at("absent.yml"),
        at("versions.txt")
      );

      expect(exitCodeFromExit(exit)).toBe(30);
    });
  });

  test("exits with CONFIG_NOT_FOUND for a missing explicit config", async () => {
    const exit = await Effect.runPromiseExit(
      cli(["node", "trainset", "check", "-g", at("absent.toml"), at("versions.txt")]).pipe(
        Effect.provide(TestLayer)
      )
    );

    expect(exitCodeFromExit(exit)).toBe(10);
  });
});
