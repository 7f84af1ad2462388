// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { TrainsetError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type ParsedVersion, type SliceName, buildSliceSet, sliceEntries } from "../../version";
import { loadNonEmptyVersionList, rawList } from "./shared";

export interface SetsOptions {
  readonly versionsFile: string;
  readonly set: Option.Option<SliceName>;
  readonly format: LogFormat;
}

type SliceEntry = readonly [SliceName, readonly ParsedVersion[]];

const formatSetsPretty = (entries: readonly SliceEntry[]): string =>
  entries.map(([name, versions]) => `${name}: ${rawList(versions)}`).join("\n");

const formatSetsJson = (entries: readonly SliceEntry[]): string =>
  JSON.stringify(
    Object.fromEntries(entries.map(([name, versions]) => [name, versions.map((v) => v.raw)])),
    null,
    2
  );

export const executeSets = (
  options: SetsOptions
): Effect.Effect<void, TrainsetError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const versions = yield* loadNonEmptyVersionList(options.versionsFile);
    const entries = pipe(
      sliceEntries(buildSliceSet(versions)),
      Arr.filter(([name]) =>
        Option.match(options.set, {
          onNone: (): boolean => true,
          onSome: (only): boolean => only === name,
        })
      )
    );

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(formatSetsJson(entries))),
      Match.when("pretty", () => writeOutput(formatSetsPretty(entries))),
      Match.exhaustive
    );
  });
