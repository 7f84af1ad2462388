// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filters over version sequences. Each sorts its input ascending (stable,
 * so sorted input keeps its order) before selecting, and yields an empty
 * array for empty input.
 */

import { Array as Arr, pipe } from "effect";
import { isHigherThan, isLowerThan, sortVersions } from "./order";
import type { ParsedVersion } from "./types";

export type MajorMinor = readonly [major: number, minor: number];

/** Versions whose first numeric component is `major`, ascending. */
export const filterMajor = (
  major: number,
  versions: Iterable<ParsedVersion>
): readonly ParsedVersion[] =>
  pipe(
    sortVersions(versions),
    Arr.filter((v: ParsedVersion) => v.major === major)
  );

/** Versions in the given major.minor, ascending. */
export const filterMajorMinor = (
  [major, minor]: MajorMinor,
  versions: Iterable<ParsedVersion>
): readonly ParsedVersion[] =>
  pipe(
    sortVersions(versions),
    Arr.filter((v: ParsedVersion) => v.major === major && v.minor === minor)
  );

/** Versions strictly lower than `pivot`, ascending. */
export const filterLower = (
  pivot: ParsedVersion,
  versions: Iterable<ParsedVersion>
): readonly ParsedVersion[] => pipe(sortVersions(versions), Arr.filter(isLowerThan(pivot)));

/** Versions strictly higher than `pivot`, ascending. */
export const filterHigher = (
  pivot: ParsedVersion,
  versions: Iterable<ParsedVersion>
): readonly ParsedVersion[] => pipe(sortVersions(versions), Arr.filter(isHigherThan(pivot)));
