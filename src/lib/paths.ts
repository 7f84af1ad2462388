// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized path constants.
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";

/** Package root: two levels above this module (src/lib). */
const PACKAGE_ROOT = fileURLToPath(new URL("../../", import.meta.url));

/** Job templates shipped with the package, used when none is configured. */
export const BUILTIN_TEMPLATES: {
  readonly job: string;
  readonly upgradeJob: string;
} = {
  job: join(PACKAGE_ROOT, "templates", "job.yml"),
  upgradeJob: join(PACKAGE_ROOT, "templates", "upgrade-job.yml"),
};

/** Config file locations tried in order when no explicit path is given. */
export const globalConfigSearchPaths = (home: string): readonly string[] => [
  join(home, ".config", "trainset", "trainset.toml"),
  "./trainset.toml",
];
