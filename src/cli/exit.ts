// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { ValidationError } from "@effect/cli";
import { Cause, Exit, Match, Option, pipe } from "effect";
import { ErrorCode, isTrainsetError, toExitCode } from "../lib/errors";

/** Process exit code for a finished run. Defects and interrupts exit 1. */
export const exitCodeFromExit = (exit: Exit.Exit<unknown, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => ErrorCode.GENERAL_ERROR,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isTrainsetError, (err) => toExitCode(err.code)),
            Match.when(ValidationError.isValidationError, () => ErrorCode.INVALID_ARGS),
            Match.orElse(() => ErrorCode.GENERAL_ERROR)
          ),
      }),
  });
