// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are
 * parsed and validated in a single pass; syntax errors and schema
 * violations are reported with file path context. The global config
 * is searched for in ~/.config and ./, and an absent file yields
 * defaults. An explicit path must exist.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, type Schema, pipe } from "effect";
import * as TOML from "smol-toml";
import { ConfigError, ErrorCode, type SystemError, causeOf, errorMessage } from "../lib/errors";
import { globalConfigSearchPaths } from "../lib/paths";
import { decodeToEffect, decodeUnsafe } from "../lib/schema-utils";
import { fileExists, readTextFile } from "../system/fs";
import { HomeConfig } from "./env";
import { type GlobalConfig, globalConfigSchema } from "./schema";

export const loadTomlFile = <A, I = A>(
  filePath: string,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* pipe(
      fileExists(filePath),
      Effect.filterOrFail(
        (exists): exists is true => exists === true,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* readTextFile(filePath);

    const parsed = yield* Effect.try({
      try: (): unknown => TOML.parse(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });

    yield* Effect.logDebug(`Loaded configuration from ${filePath}`);
    return yield* decodeToEffect(schema, parsed, filePath);
  });

export const defaultGlobalConfig = (): GlobalConfig => decodeUnsafe(globalConfigSchema, {});

export const loadGlobalConfigWithHome = (
  configPath: string | undefined,
  home: string
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  pipe(
    Option.fromNullable(configPath),
    Option.match({
      // First existing default path wins; a broken file there still fails.
      onNone: (): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
        pipe(
          Effect.findFirst(globalConfigSearchPaths(home), fileExists),
          Effect.flatMap(
            Option.match({
              onNone: (): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
                Effect.succeed(defaultGlobalConfig()),
              onSome: (path): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
                loadTomlFile(path, globalConfigSchema),
            })
          )
        ),
      onSome: (path): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
        loadTomlFile(path, globalConfigSchema),
    })
  );

/** Returns default values if no config file is found. */
export const loadGlobalConfig = (
  configPath?: string
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const home = yield* Effect.orDie(HomeConfig);
    return yield* loadGlobalConfigWithHome(configPath, home);
  });
