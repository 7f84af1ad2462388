// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Parse a version list and report how each entry was classified. Useful in
 * CI to reject a malformed list before any job is generated.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { TrainsetError } from "../../lib/errors";
import { logSuccess, writeOutput } from "../../lib/log";
import type { ParsedVersion } from "../../version";
import { loadNonEmptyVersionList } from "./shared";

export interface CheckOptions {
  readonly versionsFile: string;
  readonly format: LogFormat;
}

export const formatCheckLine = (v: ParsedVersion): string =>
  `${v.raw} ${v.kind} ${v.numericComponents.join(".")}`;

const formatCheckJson = (versions: readonly ParsedVersion[]): string =>
  JSON.stringify(
    versions.map((v) => ({ version: v.raw, kind: v.kind, components: v.numericComponents })),
    null,
    2
  );

export const executeCheck = (
  options: CheckOptions
): Effect.Effect<void, TrainsetError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const versions = yield* loadNonEmptyVersionList(options.versionsFile);

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(formatCheckJson(versions))),
      Match.when("pretty", () =>
        Effect.gen(function* () {
          yield* writeOutput(versions.map(formatCheckLine).join("\n"));
          yield* logSuccess(`${versions.length} versions are well-formed`);
        })
      ),
      Match.exhaustive
    );
  });
