// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Render every version set to CI configuration and JSON, then write the
 * files below the output directory. With --dry-run the planned paths are
 * printed and nothing is touched.
 */

import { type FileSystem, Path } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { TrainsetError } from "../../lib/errors";
import { createStepCounter, logSuccess, withSet, writeOutput } from "../../lib/log";
import { type OutputFile, type OutputTemplates, planOutputs } from "../../render";
import { ensureDirectory, readTextFile, writeTextFile } from "../../system/fs";
import { buildSliceSet, buildUpgradePairs } from "../../version";
import { loadNonEmptyVersionList } from "./shared";

export interface GenerateOptions {
  readonly versionsFile: string;
  readonly outputDir: string;
  /** Template file paths; contents are read at run time. */
  readonly templates: OutputTemplates;
  readonly ciFileName: string;
  readonly dryRun: boolean;
  readonly format: LogFormat;
}

const readTemplates = (
  paths: OutputTemplates
): Effect.Effect<OutputTemplates, TrainsetError, FileSystem.FileSystem> =>
  Effect.all({ job: readTextFile(paths.job), upgradeJob: readTextFile(paths.upgradeJob) });

const writeFile = (
  outputDir: string,
  file: OutputFile
): Effect.Effect<void, TrainsetError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const path = yield* Path.Path;
    const target = path.join(outputDir, file.relativePath);
    yield* ensureDirectory(path.dirname(target));
    yield* writeTextFile(target, file.content);
    yield* Effect.logDebug(`Wrote ${target}`);
  }).pipe(withSet(file.set));

const reportDryRun = (
  outputDir: string,
  files: readonly OutputFile[],
  format: LogFormat
): Effect.Effect<void, never, Path.Path> =>
  Effect.gen(function* () {
    const path = yield* Path.Path;
    const targets = files.map((file) => path.join(outputDir, file.relativePath));
    yield* pipe(
      Match.value(format),
      Match.when("json", () =>
        writeOutput(JSON.stringify({ dryRun: true, files: targets }, null, 2))
      ),
      Match.when("pretty", () => writeOutput(targets.join("\n"))),
      Match.exhaustive
    );
  });

export const executeGenerate = (
  options: GenerateOptions
): Effect.Effect<void, TrainsetError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const steps = yield* createStepCounter(4);

    yield* steps.next(`Loading versions from ${options.versionsFile}`);
    const versions = yield* loadNonEmptyVersionList(options.versionsFile);

    yield* steps.next("Reading job templates");
    const templates = yield* readTemplates(options.templates);

    yield* steps.next("Deriving version sets and upgrade pairs");
    const files = planOutputs(buildSliceSet(versions), buildUpgradePairs(versions), templates, {
      ciFileName: options.ciFileName,
    });

    return yield* Effect.if(options.dryRun, {
      onTrue: (): Effect.Effect<void, never, Path.Path> =>
        Effect.gen(function* () {
          yield* steps.next(`Planning ${files.length} files (dry run)`);
          yield* reportDryRun(options.outputDir, files, options.format);
        }),
      onFalse: (): Effect.Effect<void, TrainsetError, FileSystem.FileSystem | Path.Path> =>
        Effect.gen(function* () {
          yield* steps.next(`Writing ${files.length} files to ${options.outputDir}`);
          yield* Effect.forEach(files, (file) => writeFile(options.outputDir, file), {
            discard: true,
          });
          yield* logSuccess(`Generated ${versions.length} versions into ${options.outputDir}`);
        }),
    });
  });
