// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger installation and error display so each command stays focused on
 * its logic.
 */

import { Command, type ValidationError } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { FileSystem, Path } from "@effect/platform";
import { Config, Effect, Match, Option, pipe } from "effect";
import {
  DebugModeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
  OutputDirOptionConfig,
} from "../config/env";
import type { LogFormat, LogLevel } from "../config/field-values";
import { loadGlobalConfig } from "../config/loader";
import { resolve, resolveOptional } from "../config/resolve";
import type { GlobalConfig } from "../config/schema";
import { TrainsetLoggerLive, colorize, detectColor } from "../lib/effect-logger";
import {
  ConfigError,
  ErrorCode,
  type SystemError,
  type TrainsetError,
  errorMessage,
  getErrorCodeName,
} from "../lib/errors";
import { BUILTIN_TEMPLATES } from "../lib/paths";
import { TRAINSET_VERSION } from "../lib/version";
import { executeCheck } from "./commands/check";
import { executeGenerate } from "./commands/generate";
import { executePairs } from "./commands/pairs";
import { executeSets } from "./commands/sets";
import {
  type GlobalOptions,
  ciFileName,
  dryRun,
  effectiveFormat,
  globalOptions,
  jobTemplate,
  outputDir,
  setOption,
  upgradeTemplate,
  versionsFileArg,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > config file. */
export interface CommandContext {
  readonly globalConfig: GlobalConfig;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
  /** TRAINSET_OUTPUT_DIR, consulted by commands that take --output-dir. */
  readonly envOutputDir: Option.Option<string>;
}

type CommandRequirements = FileSystem.FileSystem | Path.Path;

// Context resolution

const EnvSettingsConfig = Config.all({
  logLevel: LogLevelOptionConfig,
  logFormat: LogFormatOptionConfig,
  debug: DebugModeConfig,
  outputDir: OutputDirOptionConfig,
});

const readEnvSettings = pipe(
  EnvSettingsConfig,
  Effect.mapError(
    (e): ConfigError =>
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Invalid environment configuration: ${errorMessage(e)}`,
      })
  )
);

export const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const globalConfig = yield* loadGlobalConfig(Option.getOrUndefined(globals.globalConfig));
    const env = yield* readEnvSettings;

    const logLevel: LogLevel =
      globals.verbose || env.debug
        ? "debug"
        : resolve({
            cli: globals.logLevel,
            env: env.logLevel,
            toml: globalConfig.logging.level,
          });

    const format: LogFormat = resolve({
      cli: effectiveFormat(globals),
      env: env.logFormat,
      toml: globalConfig.logging.format,
    });

    return { globalConfig, format, logLevel, envOutputDir: env.outputDir };
  });

// Error display

/** Written directly rather than logged: it must appear even before a logger is installed. */
const displayError = (err: TrainsetError, format: LogFormat): Effect.Effect<void> =>
  Effect.sync(() =>
    pipe(
      Match.value(format),
      Match.when("json", () =>
        process.stdout.write(
          `${JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })}\n`
        )
      ),
      Match.when("pretty", () =>
        process.stderr.write(`${colorize("red", "✗", detectColor())} ${err.message}\n`)
      ),
      Match.exhaustive
    )
  );

// Command runner

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, TrainsetError, CommandRequirements>
): Effect.Effect<void, TrainsetError, CommandRequirements> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) =>
        displayError(
          err,
          Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty")
        )
      )
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => displayError(err, ctx.format)),
      Effect.provide(TrainsetLoggerLive({ level: ctx.logLevel, format: ctx.format }))
    );
  });

// Subcommand definitions

const checkCmd = Command.make(
  "check",
  { ...globalOptions, versionsFile: versionsFileArg },
  (args) =>
    runCommand(args, "check", (ctx) =>
      executeCheck({ versionsFile: args.versionsFile, format: ctx.format })
    )
).pipe(Command.withDescription("Parse a version list and show how each entry is classified"));

const setsCmd = Command.make(
  "sets",
  { ...globalOptions, versionsFile: versionsFileArg, set: setOption },
  (args) =>
    runCommand(args, "sets", (ctx) =>
      executeSets({ versionsFile: args.versionsFile, set: args.set, format: ctx.format })
    )
).pipe(Command.withDescription("Show the derived version sets (all, per major, tip-of-train)"));

const pairsCmd = Command.make(
  "pairs",
  { ...globalOptions, versionsFile: versionsFileArg },
  (args) =>
    runCommand(args, "pairs", (ctx) =>
      executePairs({ versionsFile: args.versionsFile, format: ctx.format })
    )
).pipe(Command.withDescription("Show the versions each release is upgrade-tested from"));

const generateCmd = Command.make(
  "generate",
  {
    ...globalOptions,
    versionsFile: versionsFileArg,
    outputDir,
    jobTemplate,
    upgradeTemplate,
    ciFileName,
    dryRun,
  },
  (args) =>
    runCommand(args, "generate", (ctx) => {
      const output = ctx.globalConfig.output;
      return executeGenerate({
        versionsFile: args.versionsFile,
        outputDir: resolve({ cli: args.outputDir, env: ctx.envOutputDir, toml: output.dir }),
        templates: {
          job: resolveOptional({
            cli: args.jobTemplate,
            toml: Option.fromNullable(output.jobTemplate),
            fallback: BUILTIN_TEMPLATES.job,
          }),
          upgradeJob: resolveOptional({
            cli: args.upgradeTemplate,
            toml: Option.fromNullable(output.upgradeTemplate),
            fallback: BUILTIN_TEMPLATES.upgradeJob,
          }),
        },
        ciFileName: Option.getOrElse(args.ciFileName, () => output.ciFileName),
        dryRun: args.dryRun,
        format: ctx.format,
      });
    })
).pipe(Command.withDescription("Write CI configuration and JSON for every version set"));

// Root command

const trainset = Command.make("trainset").pipe(
  Command.withDescription("Version train slicing and upgrade pairing for CI"),
  Command.withSubcommands([checkCmd, setsCmd, pairsCmd, generateCmd])
);

/** Takes the full argv; the first two entries (runtime and script) are skipped. */
export const cli: (
  args: readonly string[]
) => Effect.Effect<void, TrainsetError | ValidationError.ValidationError, CliApp.Environment> =
  Command.run(trainset, {
    name: "trainset",
    version: TRAINSET_VERSION,
  });
