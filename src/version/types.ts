// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The version model. A ParsedVersion is built once by the parser and never
 * mutated; every later stage only reads it.
 */

import { Data } from "effect";

// ─────────────────────────────────────────────────────────────────────────────
// Core Data Types
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION_KIND_VALUES = ["normal", "nightly", "special"] as const;

/**
 * - normal: no suffix
 * - nightly: suffix is a `_DDDDDD.DDDDDD[DDD].<12 lowercase alnum>` build stamp
 * - special: any other non-empty suffix (product variant tags and the like)
 */
export type VersionKind = (typeof VERSION_KIND_VALUES)[number];

export interface ParsedVersion {
  /** Original input, preserved verbatim for output. */
  readonly raw: string;
  /**
   * major, minor and optional maintenance from the numeric prefix. Nightly
   * builds carry their date and time codes as two trailing entries.
   */
  readonly numericComponents: readonly number[];
  /** Everything after the numeric prefix, including its leading separator. */
  readonly suffix: string;
  readonly kind: VersionKind;
  readonly major: number;
  readonly minor: number;
}

export const makeParsedVersion = (fields: {
  readonly raw: string;
  readonly numericComponents: readonly [number, number, ...number[]];
  readonly suffix: string;
  readonly kind: VersionKind;
}): ParsedVersion =>
  Object.freeze({
    raw: fields.raw,
    numericComponents: Object.freeze([...fields.numericComponents]),
    suffix: fields.suffix,
    kind: fields.kind,
    major: fields.numericComponents[0],
    minor: fields.numericComponents[1],
  });

// ─────────────────────────────────────────────────────────────────────────────
// Train Keys
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What separates trains inside one major.minor. All nightlies share a
 * train; every distinct suffix (the empty suffix of normal versions
 * included) is a train of its own. Tagged so a suffix spelled "nightly"
 * can never collide with the nightly variant.
 */
export type TrainVariant = Data.TaggedEnum<{
  Nightly: object;
  Suffix: { readonly suffix: string };
}>;

export const TrainVariant = Data.taggedEnum<TrainVariant>();

/** Structurally comparable, so it can key an Effect HashMap directly. */
export interface TrainKey {
  readonly major: number;
  readonly minor: number;
  readonly variant: TrainVariant;
}
