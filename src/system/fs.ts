// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over the @effect/platform FileSystem service.
 * Platform errors are mapped to SystemError so callers see one error
 * vocabulary; the Node implementation is provided at the CLI boundary.
 */

import { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import { ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";

/**
 * Read file contents as text.
 */
export const readTextFile = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* pipe(
      fs.readFileString(path),
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${path}: ${errorMessage(e)}`,
            ...causeOf(e),
          })
      )
    );
  });

/**
 * Write content to a file, replacing it if present.
 */
export const writeTextFile = (
  path: string,
  content: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* pipe(
      fs.writeFileString(path, content),
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.FILE_WRITE_FAILED,
            message: `Failed to write ${path}: ${errorMessage(e)}`,
            ...causeOf(e),
          })
      )
    );
  });

/**
 * Create a directory and its parents. Succeeds if it already exists.
 */
export const ensureDirectory = (
  path: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* pipe(
      fs.makeDirectory(path, { recursive: true }),
      Effect.mapError(
        (e): SystemError =>
          new SystemError({
            code: ErrorCode.DIRECTORY_CREATE_FAILED,
            message: `Failed to create directory ${path}: ${errorMessage(e)}`,
            ...causeOf(e),
          })
      )
    );
  });

/**
 * Check if a file exists. Unreadable locations count as absent.
 */
export const fileExists = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* pipe(
      fs.exists(path),
      Effect.orElseSucceed(() => false)
    );
  });
