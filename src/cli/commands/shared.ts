// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import {
  ErrorCode,
  GeneralError,
  type MalformedVersionError,
  type SystemError,
} from "../../lib/errors";
import { type ParsedVersion, loadVersionList } from "../../version";

/** Load the list for a command, rejecting a file with no versions in it. */
export const loadNonEmptyVersionList = (
  path: string
): Effect.Effect<
  readonly ParsedVersion[],
  GeneralError | SystemError | MalformedVersionError,
  FileSystem.FileSystem
> =>
  Effect.filterOrFail(
    loadVersionList(path),
    (versions) => versions.length > 0,
    () =>
      new GeneralError({
        code: ErrorCode.EMPTY_VERSION_LIST,
        message: `No versions found in ${path}`,
      })
  );

export const rawList = (versions: readonly ParsedVersion[]): string =>
  versions.map((v) => v.raw).join(" ");
