// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the character level. Uses `Array.from()` throughout
 * for correct Unicode surrogate pair handling (string indexing does not).
 * All multi argument functions are curried data-last for `pipe()` composition.
 */

import type { CharPred } from "./char";

export const chars = (s: string): readonly string[] => Array.from(s);

/** Lift a `CharPred` to operate on an entire string (every character must satisfy). */
export const all =
  (pred: CharPred) =>
  (s: string): boolean =>
    chars(s).every(pred);

/** Length of the leading run of characters satisfying `pred`, starting at `from`. */
export const spanWhile =
  (pred: CharPred, from = 0) =>
  (s: string): number => {
    const rest = chars(s).slice(from);
    const stop = rest.findIndex((c) => !pred(c));
    return stop === -1 ? rest.length : stop;
  };

export const mapCharsToString =
  (f: (c: string) => string) =>
  (s: string): string =>
    Array.from(s).map(f).join("");
