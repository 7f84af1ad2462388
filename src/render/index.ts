// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export {
  type UpgradeEntry,
  type VersionEntry,
  renderUpgradeJson,
  renderVersionJson,
  upgradeEntries,
  versionEntries,
} from "./json";
export {
  type OutputFile,
  type OutputLayout,
  type OutputTemplates,
  UPGRADE_SET_NAME,
  planOutputs,
} from "./outputs";
export {
  type TemplateVariables,
  expandTemplate,
  renderJobs,
  renderUpgradeJobs,
  upgradeVariables,
  versionSlug,
  versionVariables,
} from "./template";
