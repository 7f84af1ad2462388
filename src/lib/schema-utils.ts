// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema decoding at the configuration boundary.
 */

import { Effect, Either, ParseResult, Schema } from "effect";
import { ConfigError, ErrorCode } from "./errors";

/**
 * Format Effect Schema parse error to a ConfigError.
 * Output format:
 *   Configuration validation failed for /path/to/file.toml:
 *   └─ ["output"]["ciFileName"]
 *      └─ Must not be empty
 */
export const formatSchemaError = (error: ParseResult.ParseError, context: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `Configuration validation failed for ${context}:\n${ParseResult.TreeFormatter.formatErrorSync(error)}`,
    path: context,
  });

/**
 * Decode unknown data synchronously, throwing on error.
 * Use only when input is known valid (e.g., empty object with defaults).
 */
export const decodeUnsafe = <A, I = A>(schema: Schema.Schema<A, I, never>, data: unknown): A =>
  Schema.decodeUnknownSync(schema)(data);

export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, ConfigError> =>
      Effect.fail(formatSchemaError(error, context)),
    onRight: (value): Effect.Effect<A, ConfigError> => Effect.succeed(value),
  });
