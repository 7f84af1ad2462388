// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version model: parsing, ordering, filtering, tip-of-train reduction and
 * the derived slice and upgrade-pairing sets.
 */

export {
  type ParsedVersion,
  type TrainKey,
  TrainVariant,
  VERSION_KIND_VALUES,
  type VersionKind,
  makeParsedVersion,
} from "./types";
export {
  type NightlyStamp,
  VERSION_GRAMMAR,
  parseNightlyStamp,
  parseVersion,
  parseVersionOption,
  parseVersions,
} from "./parse";
export {
  VersionEquivalence,
  VersionOrder,
  compareVersions,
  isHigherThan,
  isLowerThan,
  sortVersions,
  sortVersionsDesc,
} from "./order";
export {
  type MajorMinor,
  filterHigher,
  filterLower,
  filterMajor,
  filterMajorMinor,
} from "./filters";
export { tipOfTrain, trainKeyOf } from "./train";
export {
  SLICE_NAMES,
  type SliceName,
  type SliceSet,
  buildSliceSet,
  sliceEntries,
} from "./slices";
export {
  MIGRATION_SOURCE_MAJOR,
  MIGRATION_TARGET_MAJOR,
  type UpgradePairing,
  buildUpgradePairs,
  toRawMapping,
} from "./upgrade";
export { loadVersionList, parseVersionList } from "./list";
