// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Total order and equality over parsed versions.
 *
 * Ordering looks only at `numericComponents`, compared pairwise with the
 * shorter sequence first when one is a prefix of the other. The suffix is
 * never consulted, so `5.4` and `5.4_ps` compare equal; sorting is stable
 * to keep such ties in input order.
 */

import { Array as Arr, Equivalence, Order } from "effect";
import type { ParsedVersion } from "./types";

export const VersionOrder: Order.Order<ParsedVersion> = Order.mapInput(
  Order.array(Order.number),
  (v: ParsedVersion): readonly number[] => v.numericComponents
);

/** Structural equality. `raw` determines every other field, so it is compared alone. */
export const VersionEquivalence: Equivalence.Equivalence<ParsedVersion> = Equivalence.mapInput(
  Equivalence.string,
  (v: ParsedVersion): string => v.raw
);

/**
 * Compare two versions for ordering.
 * Returns: -1 if a < b, 0 if a and b share numeric components, 1 if a > b.
 */
export const compareVersions = (a: ParsedVersion, b: ParsedVersion): -1 | 0 | 1 =>
  VersionOrder(a, b);

/** Sort ascending. Does not mutate the input. */
export const sortVersions = (versions: Iterable<ParsedVersion>): readonly ParsedVersion[] =>
  Arr.sort(versions, VersionOrder);

/** Sort descending (newest first). */
export const sortVersionsDesc = (versions: Iterable<ParsedVersion>): readonly ParsedVersion[] =>
  Arr.sort(versions, Order.reverse(VersionOrder));

export const isLowerThan =
  (pivot: ParsedVersion) =>
  (v: ParsedVersion): boolean =>
    Order.lessThan(VersionOrder)(v, pivot);

export const isHigherThan =
  (pivot: ParsedVersion) =>
  (v: ParsedVersion): boolean =>
    Order.greaterThan(VersionOrder)(v, pivot);
