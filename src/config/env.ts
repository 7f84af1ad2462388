// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing reads the environment
 * until a Config is yielded at the CLI boundary. Settings that can also
 * come from a flag or the config file are Option-valued so an unset
 * variable is distinguishable from one set to the default.
 */

import { Config, ConfigProvider, type Option } from "effect";
import {
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

const ENV_PREFIX = "TRAINSET";

/**
 * HOME directory from environment.
 * Falls back to /root if not set (common in containerized environments).
 */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

/** TRAINSET_LOG_LEVEL */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> =
  Config.nested(Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")), ENV_PREFIX);

/** TRAINSET_LOG_FORMAT */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> =
  Config.nested(Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")), ENV_PREFIX);

/**
 * TRAINSET_DEBUG. When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  ENV_PREFIX
);

/** TRAINSET_OUTPUT_DIR */
export const OutputDirOptionConfig: Config.Config<Option.Option<string>> =
  Config.nested(Config.option(Config.nonEmptyString("OUTPUT_DIR")), ENV_PREFIX);

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  home: "HOME",
  logLevel: "TRAINSET_LOG_LEVEL",
  logFormat: "TRAINSET_LOG_FORMAT",
  debug: "TRAINSET_DEBUG",
  outputDir: "TRAINSET_OUTPUT_DIR",
} as const;

type EnvVarKey = keyof typeof envVarNames;

const envVarKeys: readonly EnvVarKey[] = ["home", "logLevel", "logFormat", "debug", "outputDir"];

export type TestConfigOverrides = {
  readonly [K in EnvVarKey]?: string;
};

/**
 * Create a ConfigProvider for testing. Only HOME is set unless overridden,
 * so Option-valued configs read as None by default.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const level = Effect.runSync(
 *   Effect.withConfigProvider(LogLevelOptionConfig, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([[envVarNames.home, "/home/testuser"]]);
  for (const key of envVarKeys) {
    const value = overrides[key];
    if (value !== undefined) {
      values.set(envVarNames[key], value);
    }
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
