// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version list files: one version per line, `#` starts a comment.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, pipe } from "effect";
import type { MalformedVersionError, SystemError } from "../lib/errors";
import { readTextFile } from "../system/fs";
import { parseVersions } from "./parse";
import type { ParsedVersion } from "./types";

const stripComment = (line: string): string => {
  const hash = line.indexOf("#");
  return hash === -1 ? line : line.slice(0, hash);
};

/** Raw version strings in file order. Blank and comment-only lines are skipped. */
export const parseVersionList = (text: string): readonly string[] =>
  pipe(
    text.split("\n"),
    Arr.map((line) => stripComment(line).trim()),
    Arr.filter((line) => line.length > 0)
  );

export const loadVersionList = (
  path: string
): Effect.Effect<readonly ParsedVersion[], SystemError | MalformedVersionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const text = yield* readTextFile(path);
    const versions = yield* parseVersions(parseVersionList(text));
    yield* Effect.logDebug(`Loaded ${versions.length} versions from ${path}`);
    return versions;
  });
