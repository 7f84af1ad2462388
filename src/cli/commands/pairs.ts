// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { TrainsetError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type UpgradePairing, buildUpgradePairs } from "../../version";
import { loadNonEmptyVersionList } from "./shared";

export interface PairsOptions {
  readonly versionsFile: string;
  readonly format: LogFormat;
}

export const formatPairLine = ({ version, olds }: UpgradePairing): string =>
  olds.length === 0
    ? `${version.raw} <- (none)`
    : `${version.raw} <- ${olds.map((old) => old.raw).join(", ")}`;

const formatPairsJson = (pairings: readonly UpgradePairing[]): string =>
  JSON.stringify(
    pairings.map(({ version, olds }) => ({
      version: version.raw,
      olds: olds.map((old) => old.raw),
    })),
    null,
    2
  );

export const executePairs = (
  options: PairsOptions
): Effect.Effect<void, TrainsetError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const pairings = buildUpgradePairs(yield* loadNonEmptyVersionList(options.versionsFile));

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(formatPairsJson(pairings))),
      Match.when("pretty", () => writeOutput(pairings.map(formatPairLine).join("\n"))),
      Match.exhaustive
    );
  });
