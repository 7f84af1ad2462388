// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for trainset.toml.
 * Single source of truth for configuration structure and validation.
 */

import { Schema } from "effect";
import {
  CI_FILE_NAME_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  OUTPUT_DIR_DEFAULT,
} from "./field-values";

const nonEmpty = Schema.String.pipe(
  Schema.minLength(1, { message: (): string => "Must not be empty" })
);

/** A file name, not a path: the CI file is written inside each set directory. */
const fileName = nonEmpty.pipe(
  Schema.filter((s) => !s.includes("/") || "File name must not contain '/'")
);

export const loggingSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: () => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: () => LOG_FORMAT_DEFAULT,
  }),
});

export const outputSchema = Schema.Struct({
  dir: Schema.optionalWith(nonEmpty, { default: () => OUTPUT_DIR_DEFAULT }),
  ciFileName: Schema.optionalWith(fileName, { default: () => CI_FILE_NAME_DEFAULT }),
  jobTemplate: Schema.optional(nonEmpty),
  upgradeTemplate: Schema.optional(nonEmpty),
});

/**
 * Global configuration schema for trainset.toml
 */
export const globalConfigSchema = Schema.Struct({
  logging: Schema.optionalWith(loggingSchema, {
    default: () => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
  output: Schema.optionalWith(outputSchema, {
    default: () => ({ dir: OUTPUT_DIR_DEFAULT, ciFileName: CI_FILE_NAME_DEFAULT }),
  }),
});

export type GlobalConfig = Schema.Schema.Type<typeof globalConfigSchema>;
export type OutputConfig = GlobalConfig["output"];
