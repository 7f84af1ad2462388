// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Upgrade pairing: for every release, the earlier releases it must be
 * qualified as an upgrade target from.
 *
 * A release is paired with
 * - the last release of the previous major (5.x only, from 4.x),
 * - the previous maintenance release of its own train,
 * - the tip of every earlier train in its own major.
 *
 * Pairing a release with the next sibling of its train (a downgrade test)
 * is deliberately not done.
 */

import { Array as Arr, Option, pipe } from "effect";
import { filterLower, filterMajor, filterMajorMinor } from "./filters";
import { VersionEquivalence, sortVersions } from "./order";
import { tipOfTrain } from "./train";
import type { ParsedVersion } from "./types";

/** Major whose releases are additionally paired with the last release of the major before it. */
export const MIGRATION_TARGET_MAJOR = 5;
export const MIGRATION_SOURCE_MAJOR = 4;

export interface UpgradePairing {
  readonly version: ParsedVersion;
  /** Deduplicated, ascending, never containing `version`. */
  readonly olds: readonly ParsedVersion[];
}

const lastOfPreviousMajor = (
  version: ParsedVersion,
  sorted: readonly ParsedVersion[]
): Option.Option<ParsedVersion> =>
  version.major === MIGRATION_TARGET_MAJOR
    ? Arr.last(filterMajor(MIGRATION_SOURCE_MAJOR, sorted))
    : Option.none();

const previousSibling = (
  version: ParsedVersion,
  sorted: readonly ParsedVersion[]
): Option.Option<ParsedVersion> =>
  pipe(filterMajorMinor([version.major, version.minor], sorted), (siblings) =>
    Arr.last(filterLower(version, siblings))
  );

const earlierTrainTips = (
  version: ParsedVersion,
  sorted: readonly ParsedVersion[]
): readonly ParsedVersion[] =>
  tipOfTrain(filterLower(version, filterMajor(version.major, sorted)));

const pairingFor =
  (sorted: readonly ParsedVersion[]) =>
  (version: ParsedVersion): UpgradePairing => {
    const candidates = [
      ...Option.toArray(lastOfPreviousMajor(version, sorted)),
      ...Option.toArray(previousSibling(version, sorted)),
      ...earlierTrainTips(version, sorted),
    ];
    const olds = pipe(
      candidates,
      // filterLower already excludes `version`; kept as an invariant of the result
      Arr.filter((old: ParsedVersion) => !VersionEquivalence(old, version)),
      Arr.dedupeWith(VersionEquivalence),
      sortVersions
    );
    return { version, olds };
  };

/** One pairing per input version, in input order. */
export const buildUpgradePairs = (
  versions: Iterable<ParsedVersion>
): readonly UpgradePairing[] => {
  const input = Arr.fromIterable(versions);
  return Arr.map(input, pairingFor(sortVersions(input)));
};

/** `raw -> olds' raws`. A version repeated in the input maps once. */
export const toRawMapping = (
  pairings: readonly UpgradePairing[]
): ReadonlyMap<string, readonly string[]> =>
  new Map(
    pairings.map(({ version, olds }) => [version.raw, olds.map((old) => old.raw)] as const)
  );
