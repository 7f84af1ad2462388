// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Array as Arr } from "effect";
import type { ParsedVersion } from "../version/types";
import type { UpgradePairing } from "../version/upgrade";

export interface VersionEntry {
  readonly version: string;
}

export interface UpgradeEntry {
  readonly version: string;
  readonly old: string;
}

const toJson = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

export const versionEntries = (versions: readonly ParsedVersion[]): readonly VersionEntry[] =>
  versions.map((v) => ({ version: v.raw }));

/** One entry per (version, old) pair. */
export const upgradeEntries = (pairings: readonly UpgradePairing[]): readonly UpgradeEntry[] =>
  Arr.flatMap(pairings, ({ version, olds }) =>
    olds.map((old): UpgradeEntry => ({ version: version.raw, old: old.raw }))
  );

export const renderVersionJson = (versions: readonly ParsedVersion[]): string =>
  toJson(versionEntries(versions));

export const renderUpgradeJson = (pairings: readonly UpgradePairing[]): string =>
  toJson(upgradeEntries(pairings));
