// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for trainset.
 * Every failure is a tagged error carrying a code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // Version (20-29)
  readonly MALFORMED_VERSION: 20;
  readonly EMPTY_VERSION_LIST: 21;

  // Filesystem (30-39)
  readonly FILE_READ_FAILED: 30;
  readonly FILE_WRITE_FAILED: 31;
  readonly DIRECTORY_CREATE_FAILED: 32;
}

/**
 * Error codes for all trainset operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  MALFORMED_VERSION: 20,
  EMPTY_VERSION_LIST: 21,

  FILE_READ_FAILED: 30,
  FILE_WRITE_FAILED: 31,
  DIRECTORY_CREATE_FAILED: 32,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralCode =
  | typeof ErrorCode.GENERAL_ERROR
  | typeof ErrorCode.INVALID_ARGS
  | typeof ErrorCode.EMPTY_VERSION_LIST;

type ConfigCode =
  | typeof ErrorCode.CONFIG_NOT_FOUND
  | typeof ErrorCode.CONFIG_PARSE_ERROR
  | typeof ErrorCode.CONFIG_VALIDATION_ERROR;

type SystemCode =
  | typeof ErrorCode.FILE_READ_FAILED
  | typeof ErrorCode.FILE_WRITE_FAILED
  | typeof ErrorCode.DIRECTORY_CREATE_FAILED;

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/**
 * A version string whose leading numeric prefix is not `N.N` or `N.N.N`.
 * Never recovered locally: every derived set may reference any version.
 */
export class MalformedVersionError extends Data.TaggedError("MalformedVersionError")<{
  readonly code: typeof ErrorCode.MALFORMED_VERSION;
  readonly message: string;
  readonly raw: string;
}> {}

export type TrainsetError = GeneralError | ConfigError | SystemError | MalformedVersionError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/** Type guard for error display routing. Trainset errors have exit codes; unknown errors get generic handling. */
export const isTrainsetError = (err: unknown): err is TrainsetError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spreadable `cause` field, present only when the caught value is an Error. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
