// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Output planning. Decides every file's relative path and content up front
 * so that dry runs and real writes see exactly the same plan.
 */

import { Array as Arr } from "effect";
import { type SliceSet, sliceEntries } from "../version/slices";
import type { UpgradePairing } from "../version/upgrade";
import { renderUpgradeJson, renderVersionJson } from "./json";
import { renderJobs, renderUpgradeJobs } from "./template";

export const UPGRADE_SET_NAME = "multiver";

export interface OutputTemplates {
  readonly job: string;
  readonly upgradeJob: string;
}

export interface OutputLayout {
  /** File name of the CI configuration written inside each set directory. */
  readonly ciFileName: string;
}

export interface OutputFile {
  /** Slice or upgrade set the file belongs to. */
  readonly set: string;
  /** Relative to the output directory, always `/`-separated. */
  readonly relativePath: string;
  readonly content: string;
}

const setFiles = (
  name: string,
  layout: OutputLayout,
  ciContent: string,
  jsonContent: string
): readonly OutputFile[] => [
  { set: name, relativePath: `${name}/${layout.ciFileName}`, content: ciContent },
  { set: name, relativePath: `${name}.json`, content: jsonContent },
];

export const planOutputs = (
  slices: SliceSet,
  pairings: readonly UpgradePairing[],
  templates: OutputTemplates,
  layout: OutputLayout
): readonly OutputFile[] => [
  ...Arr.flatMap(sliceEntries(slices), ([name, versions]) =>
    setFiles(name, layout, renderJobs(templates.job, versions), renderVersionJson(versions))
  ),
  ...setFiles(
    UPGRADE_SET_NAME,
    layout,
    renderUpgradeJobs(templates.upgradeJob, pairings),
    renderUpgradeJson(pairings)
  ),
];
