// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The six named slices rendered for CI: everything, each supported major,
 * and the tip-of-train reduction of each.
 */

import { filterMajor } from "./filters";
import { sortVersions } from "./order";
import { tipOfTrain } from "./train";
import type { ParsedVersion } from "./types";

export const SLICE_NAMES = ["all", "all4", "all5", "tot", "tot4", "tot5"] as const;
export type SliceName = (typeof SLICE_NAMES)[number];

export type SliceSet = { readonly [K in SliceName]: readonly ParsedVersion[] };

export const buildSliceSet = (versions: Iterable<ParsedVersion>): SliceSet => {
  const all = sortVersions(versions);
  const all4 = filterMajor(4, all);
  const all5 = filterMajor(5, all);
  return {
    all,
    all4,
    all5,
    tot: tipOfTrain(all),
    tot4: tipOfTrain(all4),
    tot5: tipOfTrain(all5),
  };
};

/** Slices in `SLICE_NAMES` order. */
export const sliceEntries = (
  set: SliceSet
): readonly (readonly [SliceName, readonly ParsedVersion[]])[] =>
  SLICE_NAMES.map((name) => [name, set[name]] as const);
