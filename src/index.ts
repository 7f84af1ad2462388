#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * trainset - version train slicing and upgrade pairing for CI
 *
 * The imperative shell: the only place the Effect runtime is started.
 */

import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, pipe } from "effect";
import { exitCodeFromExit } from "./cli/exit";
import { cli } from "./cli/index";

// Failures are already reported by the command runner or by @effect/cli.
NodeRuntime.runMain(pipe(cli(process.argv), Effect.provide(NodeContext.layer)), {
  disableErrorReporting: true,
  teardown: (exit, onExit) => onExit(exitCodeFromExit(exit)),
});
