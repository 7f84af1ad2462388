// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `${NAME}` template expansion for CI job blocks.
 *
 * Only names present in the variable map are substituted. Anything else
 * in `${...}` form belongs to the CI system (`${CI_COMMIT_SHA}` and friends)
 * and passes through untouched. `$${NAME}` yields a literal `${NAME}`.
 */

import { Array as Arr, Option, pipe } from "effect";
import { isAlphaNum } from "../lib/char";
import { mapCharsToString } from "../lib/str";
import type { UpgradePairing } from "../version/upgrade";
import type { ParsedVersion } from "../version/types";

export type TemplateVariables = Readonly<Record<string, string>>;

const REFERENCE = /\$?\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const lookup = (variables: TemplateVariables, name: string): Option.Option<string> =>
  Object.hasOwn(variables, name) ? Option.fromNullable(variables[name]) : Option.none();

export const expandTemplate = (template: string, variables: TemplateVariables): string =>
  template.replace(REFERENCE, (match: string, name: string): string =>
    match.startsWith("$$")
      ? match.slice(1)
      : pipe(
          lookup(variables, name),
          Option.getOrElse(() => match)
        )
  );

/**
 * CI-safe job name fragment. Alphanumerics and `_` are kept and `.` becomes
 * `-`, so `5.3.2` and `5.3_2` stay distinct. Any other character becomes `_`.
 */
export const versionSlug: (raw: string) => string = mapCharsToString((c) =>
  isAlphaNum(c) || c === "_" ? c : c === "." ? "-" : "_"
);

export const versionVariables = (version: ParsedVersion): TemplateVariables => ({
  VERSION: version.raw,
  VERSION_SLUG: versionSlug(version.raw),
  VERSION_MAJOR: version.major.toString(),
  VERSION_MINOR: version.minor.toString(),
  VERSION_KIND: version.kind,
});

export const upgradeVariables = (version: ParsedVersion, old: ParsedVersion): TemplateVariables => ({
  ...versionVariables(version),
  OLD_VERSION: old.raw,
  OLD_VERSION_SLUG: versionSlug(old.raw),
});

/** Blocks are trimmed of trailing newlines and separated by one blank line. */
const joinBlocks = (blocks: readonly string[]): string =>
  Arr.isEmptyReadonlyArray(blocks)
    ? ""
    : `${blocks.map((block) => block.replace(/\n+$/, "")).join("\n\n")}\n`;

export const renderJobs = (template: string, versions: readonly ParsedVersion[]): string =>
  joinBlocks(versions.map((version) => expandTemplate(template, versionVariables(version))));

export const renderUpgradeJobs = (
  template: string,
  pairings: readonly UpgradePairing[]
): string =>
  joinBlocks(
    Arr.flatMap(pairings, ({ version, olds }) =>
      olds.map((old) => expandTemplate(template, upgradeVariables(version, old)))
    )
  );
