// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version string parsing, following the "parse, don't validate" pattern:
 * raw strings cross into the model here and nowhere else.
 *
 * Grammar: `D+ "." D+ ("." D+)?` then an arbitrary remainder (the suffix).
 * The maintenance component is taken whenever it is present, so "4.7.2.1"
 * is 4.7.2 with the special suffix ".1".
 */

import { Effect, Match, Option, pipe } from "effect";
import { isDigit, isLowerAlphaNum } from "../lib/char";
import { ErrorCode, MalformedVersionError } from "../lib/errors";
import { all, spanWhile } from "../lib/str";
import { type ParsedVersion, makeParsedVersion } from "./types";

export const VERSION_GRAMMAR = "N.N or N.N.N, optionally followed by a suffix";

// ─────────────────────────────────────────────────────────────────────────────
// Parsing Primitives (Internal)
// ─────────────────────────────────────────────────────────────────────────────

interface DigitRun {
  readonly value: number;
  readonly end: number;
}

interface NumericPrefix {
  readonly components: readonly [number, number, ...number[]];
  readonly end: number;
}

/** Digits starting at `from`. None when there is not at least one. */
const digitRun = (s: string, from: number): Option.Option<DigitRun> =>
  pipe(
    spanWhile(isDigit, from)(s),
    Option.liftPredicate((length) => length > 0),
    Option.map(
      (length): DigitRun => ({
        value: Number.parseInt(s.slice(from, from + length), 10),
        end: from + length,
      })
    )
  );

const dotThenDigits = (s: string, at: number): Option.Option<DigitRun> =>
  s.charAt(at) === "." ? digitRun(s, at + 1) : Option.none();

const parseNumericPrefix = (s: string): Option.Option<NumericPrefix> =>
  pipe(
    digitRun(s, 0),
    Option.flatMap((major) =>
      pipe(
        dotThenDigits(s, major.end),
        Option.map(
          (minor): NumericPrefix =>
            Option.match(dotThenDigits(s, minor.end), {
              onNone: (): NumericPrefix => ({
                components: [major.value, minor.value],
                end: minor.end,
              }),
              onSome: (maintenance): NumericPrefix => ({
                components: [major.value, minor.value, maintenance.value],
                end: maintenance.end,
              }),
            })
        )
      )
    )
  );

// ─────────────────────────────────────────────────────────────────────────────
// Nightly Build Stamps
// ─────────────────────────────────────────────────────────────────────────────

export interface NightlyStamp {
  readonly date: number;
  readonly time: number;
}

const isAllDigits: (s: string) => boolean = all(isDigit);
const isAllLowerAlphaNum: (s: string) => boolean = all(isLowerAlphaNum);

const isDigitsOfLength = (s: string, min: number, max: number): boolean =>
  s.length >= min && s.length <= max && isAllDigits(s);

/**
 * Split string into exactly 3 parts by delimiter.
 * Uses type guard for noUncheckedIndexedAccess compatibility.
 */
const splitExact3 = (s: string, delim: string): Option.Option<readonly [string, string, string]> =>
  pipe(
    s.split(delim),
    Option.liftPredicate(
      (parts): parts is [string, string, string] =>
        parts.length === 3 &&
        parts[0] !== undefined &&
        parts[1] !== undefined &&
        parts[2] !== undefined
    )
  );

/**
 * Parse `_DDDDDD.TTTTTT.hhhhhhhhhhhh`: a 6-digit date code, a 6 to 9 digit
 * time/build code and a 12-character lowercase alphanumeric hash.
 */
export const parseNightlyStamp = (suffix: string): Option.Option<NightlyStamp> =>
  pipe(
    suffix,
    Option.liftPredicate((s) => s.startsWith("_")),
    Option.flatMap((s) => splitExact3(s.slice(1), ".")),
    Option.filter(
      ([date, time, hash]) =>
        isDigitsOfLength(date, 6, 6) &&
        isDigitsOfLength(time, 6, 9) &&
        hash.length === 12 &&
        isAllLowerAlphaNum(hash)
    ),
    Option.map(
      ([date, time]): NightlyStamp => ({
        date: Number.parseInt(date, 10),
        time: Number.parseInt(time, 10),
      })
    )
  );

// ─────────────────────────────────────────────────────────────────────────────
// Parsing (Boundary: string -> ParsedVersion)
// ─────────────────────────────────────────────────────────────────────────────

const classify = (raw: string, prefix: NumericPrefix): ParsedVersion => {
  const suffix = raw.slice(prefix.end);
  return pipe(
    Match.value(suffix),
    Match.when("", () =>
      makeParsedVersion({ raw, numericComponents: prefix.components, suffix, kind: "normal" })
    ),
    Match.orElse(() =>
      Option.match(parseNightlyStamp(suffix), {
        onNone: (): ParsedVersion =>
          makeParsedVersion({ raw, numericComponents: prefix.components, suffix, kind: "special" }),
        onSome: ({ date, time }): ParsedVersion =>
          makeParsedVersion({
            raw,
            numericComponents: [...prefix.components, date, time],
            suffix,
            kind: "nightly",
          }),
      })
    )
  );
};

/** Components above `Number.MAX_SAFE_INTEGER` would compare inexactly. */
const hasSafeComponents = (prefix: NumericPrefix): boolean =>
  prefix.components.every(Number.isSafeInteger);

const malformed = (raw: string, reason: string): MalformedVersionError =>
  new MalformedVersionError({
    code: ErrorCode.MALFORMED_VERSION,
    message: `Malformed version '${raw}': ${reason}`,
    raw,
  });

/** Parse a raw version string. None if the numeric prefix is malformed or out of range. */
export const parseVersionOption = (raw: string): Option.Option<ParsedVersion> =>
  pipe(
    parseNumericPrefix(raw),
    Option.filter(hasSafeComponents),
    Option.map((prefix) => classify(raw, prefix))
  );

export const parseVersion = (raw: string): Effect.Effect<ParsedVersion, MalformedVersionError> =>
  Option.match(parseNumericPrefix(raw), {
    onNone: (): Effect.Effect<ParsedVersion, MalformedVersionError> =>
      Effect.fail(malformed(raw, `expected ${VERSION_GRAMMAR}`)),
    onSome: (prefix): Effect.Effect<ParsedVersion, MalformedVersionError> =>
      pipe(
        Effect.succeed(prefix),
        Effect.filterOrFail(hasSafeComponents, () =>
          malformed(raw, `numeric components must not exceed ${Number.MAX_SAFE_INTEGER}`)
        ),
        Effect.map((safe) => classify(raw, safe))
      ),
  });

/** Parse every entry, failing on the first malformed one. */
export const parseVersions = (
  raws: Iterable<string>
): Effect.Effect<readonly ParsedVersion[], MalformedVersionError> =>
  Effect.forEach(raws, parseVersion);
