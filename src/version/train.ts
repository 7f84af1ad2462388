// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tip-of-train reduction: one release per train, the highest one.
 */

import { Array as Arr, Data, HashMap, Match, Option, pipe } from "effect";
import { VersionOrder, sortVersions } from "./order";
import { type ParsedVersion, type TrainKey, TrainVariant } from "./types";

export const trainKeyOf = (version: ParsedVersion): TrainKey =>
  Data.struct({
    major: version.major,
    minor: version.minor,
    variant: pipe(
      Match.value(version.kind),
      Match.when("nightly", (): TrainVariant => TrainVariant.Nightly()),
      Match.orElse((): TrainVariant => TrainVariant.Suffix({ suffix: version.suffix }))
    ),
  });

/** Running state: first-seen key order plus the current maximum per train. */
interface TrainTips {
  readonly keys: readonly TrainKey[];
  readonly tips: HashMap.HashMap<TrainKey, ParsedVersion>;
}

const emptyTips: TrainTips = { keys: [], tips: HashMap.empty() };

/** Later elements win ties, so the last of equal maxima is kept. */
const admit = (state: TrainTips, version: ParsedVersion): TrainTips => {
  const key = trainKeyOf(version);
  return Option.match(HashMap.get(state.tips, key), {
    onNone: (): TrainTips => ({
      keys: Arr.append(state.keys, key),
      tips: HashMap.set(state.tips, key, version),
    }),
    onSome: (current): TrainTips =>
      VersionOrder(version, current) >= 0
        ? { keys: state.keys, tips: HashMap.set(state.tips, key, version) }
        : state,
  });
};

/**
 * Keep the maximum of every train. The result is sorted ascending; trains
 * whose tips compare equal keep the order in which they were first seen.
 */
export const tipOfTrain = (versions: Iterable<ParsedVersion>): readonly ParsedVersion[] => {
  const { keys, tips } = Arr.reduce(Arr.fromIterable(versions), emptyTips, admit);
  return sortVersions(Arr.getSomes(Arr.map(keys, (key) => HashMap.get(tips, key))));
};
