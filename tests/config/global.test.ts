// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { defaultGlobalConfig, loadGlobalConfigWithHome } from "../../src/config/loader";
import { ErrorCode } from "../../src/lib/errors";
import { makeTempDir, runTest } from "../helpers/layers";

describe("global config", () => {
  let dir = "";
  let cleanup: () => Promise<void> = async () => {};

  beforeAll(async () => {
    ({ dir, cleanup } = await makeTempDir("config"));
  });

  afterAll(async () => {
    await cleanup();
  });

  const writeConfig = async (name: string, content: string): Promise<string> => {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  };

  describe("defaultGlobalConfig", () => {
    test("fills every default", () => {
      expect(defaultGlobalConfig()).toEqual({
        logging: { level: "info", format: "pretty" },
        output: { dir: "version-sets", ciFileName: ".gitlab-ci.yml" },
      });
    });
  });

  describe("explicit path", () => {
    test("loads and parses valid TOML", async () => {
      const path = await writeConfig(
        "full.toml",
        `
[logging]
level = "debug"
format = "json"

[output]
dir = "ci/sets"
ciFileName = "pipeline.yml"
jobTemplate = "ci/job.yml"
`
      );

      const config = await runTest(loadGlobalConfigWithHome(path, "/nonexistent-home"));

      expect(config.logging).toEqual({ level: "debug", format: "json" });
      expect(config.output.dir).toBe("ci/sets");
      expect(config.output.ciFileName).toBe("pipeline.yml");
      expect(config.output.jobTemplate).toBe("ci/job.yml");
      expect(config.output.upgradeTemplate).toBeUndefined();
    });

    test("applies defaults for missing fields", async () => {
      const path = await writeConfig("partial.toml", '[logging]\nlevel = "warn"\n');

      const config = await runTest(loadGlobalConfigWithHome(path, "/nonexistent-home"));

      expect(config.logging).toEqual({ level: "warn", format: "pretty" });
      expect(config.output).toEqual({ dir: "version-sets", ciFileName: ".gitlab-ci.yml" });
    });

    test("fails with CONFIG_NOT_FOUND for a missing file", async () => {
      const error = await runTest(
        Effect.flip(loadGlobalConfigWithHome(join(dir, "absent.toml"), "/nonexistent-home"))
      );
      expect(error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
    });

    test("fails with CONFIG_PARSE_ERROR for malformed TOML", async () => {
      const path = await writeConfig("bad.toml", "this is not valid toml [[[");
      const error = await runTest(Effect.flip(loadGlobalConfigWithHome(path, "/nonexistent-home")));
      expect(error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
      expect(error.message).toContain(path);
    });

    test("fails with CONFIG_VALIDATION_ERROR for an unknown log level", async () => {
      const path = await writeConfig("invalid.toml", '[logging]\nlevel = "loud"\n');
      const error = await runTest(Effect.flip(loadGlobalConfigWithHome(path, "/nonexistent-home")));
      expect(error.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
      expect(error.message).toContain(`Configuration validation failed for ${path}:`);
    });

    test("rejects a CI file name containing a slash", async () => {
      const path = await writeConfig("slash.toml", '[output]\nciFileName = "ci/pipeline.yml"\n');
      const error = await runTest(Effect.flip(loadGlobalConfigWithHome(path, "/nonexistent-home")));
      expect(error.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
      expect(error.message).toContain("File name must not contain '/'");
    });
  });

  describe("search paths", () => {
    test("reads the config below HOME", async () => {
      const home = join(dir, "home");
      await mkdir(join(home, ".config", "trainset"), { recursive: true });
      await writeFile(
        join(home, ".config", "trainset", "trainset.toml"),
        '[output]\ndir = "from-home"\n'
      );

      const config = await runTest(loadGlobalConfigWithHome(undefined, home));

      expect(config.output.dir).toBe("from-home");
    });

    test("returns defaults when no file exists", async () => {
      const config = await runTest(loadGlobalConfigWithHome(undefined, join(dir, "empty-home")));
      expect(config).toEqual(defaultGlobalConfig());
    });

    test("fails when the file found is invalid", async () => {
      const home = join(dir, "broken-home");
      await mkdir(join(home, ".config", "trainset"), { recursive: true });
      await writeFile(join(home, ".config", "trainset", "trainset.toml"), "[[[");

      const error = await runTest(Effect.flip(loadGlobalConfigWithHome(undefined, home)));

      expect(error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    });
  });
});
