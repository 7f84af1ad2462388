// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { ensureDirectory, fileExists, readTextFile, writeTextFile } from "../../src/system/fs";
import { makeTempDir, runTest } from "../helpers/layers";

describe("fs", () => {
  let dir = "";
  let cleanup: () => Promise<void> = async () => {};

  beforeAll(async () => {
    ({ dir, cleanup } = await makeTempDir("fs"));
  });

  afterAll(async () => {
    await cleanup();
  });

  describe("writeTextFile and readTextFile", () => {
    test("writes and reads text file correctly", async () => {
      const path = join(dir, "test.txt");
      await runTest(writeTextFile(path, "tot5:\n  - 5.3\n"));

      expect(await runTest(readTextFile(path))).toBe("tot5:\n  - 5.3\n");
    });

    test("replaces existing content", async () => {
      const path = join(dir, "replace.txt");
      await writeFile(path, "old content that is longer");
      await runTest(writeTextFile(path, "new"));

      expect(await readFile(path, "utf8")).toBe("new");
    });

    test("handles unicode content", async () => {
      const path = join(dir, "unicode.txt");
      await runTest(writeTextFile(path, "✓ 世界"));

      expect(await runTest(readTextFile(path))).toBe("✓ 世界");
    });

    test("readTextFile fails with FILE_READ_FAILED for a missing file", async () => {
      const path = join(dir, "missing.txt");
      const error = await runTest(Effect.flip(readTextFile(path)));

      expect(error.code).toBe(ErrorCode.FILE_READ_FAILED);
      expect(error.message).toContain(path);
    });

    test("writeTextFile fails with FILE_WRITE_FAILED below a missing directory", async () => {
      const error = await runTest(Effect.flip(writeTextFile(join(dir, "no", "such", "f"), "x")));

      expect(error.code).toBe(ErrorCode.FILE_WRITE_FAILED);
    });
  });

  describe("ensureDirectory", () => {
    test("creates nested directories", async () => {
      const nested = join(dir, "a", "b", "c");
      await runTest(ensureDirectory(nested));

      expect(await runTest(fileExists(nested))).toBe(true);
    });

    test("succeeds when the directory exists", async () => {
      await runTest(ensureDirectory(dir));
      expect(await runTest(fileExists(dir))).toBe(true);
    });

    test("fails with DIRECTORY_CREATE_FAILED below a regular file", async () => {
      const file = join(dir, "plain-file");
      await writeFile(file, "");
      const error = await runTest(Effect.flip(ensureDirectory(join(file, "sub"))));

      expect(error.code).toBe(ErrorCode.DIRECTORY_CREATE_FAILED);
    });
  });

  describe("fileExists", () => {
    test("returns false for a missing path", async () => {
      expect(await runTest(fileExists(join(dir, "nope")))).toBe(false);
    });
  });
});
