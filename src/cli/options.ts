// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared so every command spells and
 * describes them the same way.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import { Option } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";
import { SLICE_NAMES, type SliceName } from "../version/slices";

// Shared positional arguments

export const versionsFileArg: Args<string> = A.text({ name: "versions-file" }).pipe(
  A.withDescription("File listing one version per line (# starts a comment)")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly globalConfig: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  globalConfig: O.text("global-config").pipe(
    O.withAlias("g"),
    O.withDescription("Path to global configuration file"),
    O.optional
  ),
};

// Per-command options

export const setOption: Options<Option.Option<SliceName>> = O.choice("set", SLICE_NAMES).pipe(
  O.withDescription("Only show this version set"),
  O.optional
);

export const outputDir: Options<Option.Option<string>> = O.text("output-dir").pipe(
  O.withAlias("o"),
  O.withDescription("Directory the version sets are written to"),
  O.optional
);

export const jobTemplate: Options<Option.Option<string>> = O.text("job-template").pipe(
  O.withDescription("CI job template expanded once per version"),
  O.optional
);

export const upgradeTemplate: Options<Option.Option<string>> = O.text("upgrade-template").pipe(
  O.withDescription("CI job template expanded once per upgrade pair"),
  O.optional
);

export const ciFileName: Options<Option.Option<string>> = O.text("ci-file-name").pipe(
  O.withDescription("Name of the CI file written in each set directory"),
  O.optional
);

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("List the files that would be written without writing them")
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly globalConfig: Option.Option<string>;
}

/** --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  globals.json ? Option.some("json") : globals.format;
