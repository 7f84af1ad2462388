// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  VersionEquivalence,
  compareVersions,
  sortVersions,
  sortVersionsDesc,
} from "../../src/version";
import { raws, v, vs } from "../helpers/versions";

describe("compareVersions", () => {
  test("compares components numerically", () => {
    expect(compareVersions(v("5.10"), v("5.9"))).toBe(1);
    expect(compareVersions(v("4.7.2"), v("5.0"))).toBe(-1);
  });

  test("orders a prefix before its extension", () => {
    expect(compareVersions(v("5.3"), v("5.3.0"))).toBe(-1);
    expect(compareVersions(v("5.3.0"), v("5.3"))).toBe(1);
  });

  test("ignores the suffix", () => {
    expect(compareVersions(v("5.4"), v("5.4_ps"))).toBe(0);
  });

  test("places a nightly after its release and before the next one", () => {
    const nightly = v("5.3.2_200407.032413.72dd81aef74b");
    expect(compareVersions(v("5.3.2"), nightly)).toBe(-1);
    expect(compareVersions(nightly, v("5.3.3"))).toBe(-1);
  });

  test("is antisymmetric", () => {
    const pairs = [
      ["4.7", "4.7.1"],
      ["5.3_ps", "5.3"],
      ["5.1.2", "4.9.9"],
    ] as const;
    for (const [a, b] of pairs) {
      expect(compareVersions(v(a), v(b)) + compareVersions(v(b), v(a))).toBe(0);
    }
  });

  test("is transitive across normal, special and nightly versions", () => {
    const chain = vs("4.7", "4.7.1_ps", "4.7.1_200407.032413.72dd81aef74b", "5.3");
    chain.forEach((lower, i) => {
      chain.slice(i + 1).forEach((higher) => {
        expect(compareVersions(lower, higher)).toBe(-1);
        expect(compareVersions(higher, lower)).toBe(1);
      });
    });
  });

  test("relates every pair one way", () => {
    const mixed = vs("5.3", "4.7.1_ps", "4.7.1", "4.7.1_200407.032413.72dd81aef74b", "4.7");
    for (const a of mixed) {
      for (const b of mixed) {
        const forward = compareVersions(a, b);
        expect([-1, 0, 1]).toContain(forward);
        expect(compareVersions(b, a) === -forward).toBe(true);
      }
    }
  });
});

describe("sortVersions", () => {
  test("sorts ascending", () => {
    expect(raws(sortVersions(vs("5.3", "4.7.1", "5.10", "4.7")))).toEqual([
      "4.7",
      "4.7.1",
      "5.3",
      "5.10",
    ]);
  });

  test("keeps input order among equal versions", () => {
    expect(raws(sortVersions(vs("5.4_ps", "5.3", "5.4", "5.4_b")))).toEqual([
      "5.3",
      "5.4_ps",
      "5.4",
      "5.4_b",
    ]);
  });

  test("does not mutate its input", () => {
    const input = vs("5.3", "4.7");
    sortVersions(input);
    expect(raws(input)).toEqual(["5.3", "4.7"]);
  });

  test("is idempotent", () => {
    const once = sortVersions(vs("5.3", "4.7.1", "5.3_ps", "4.7"));
    expect(raws(sortVersions(once))).toEqual(raws(once));
  });

  test("sortVersionsDesc puts the newest first", () => {
    expect(raws(sortVersionsDesc(vs("5.3", "4.7", "5.10")))).toEqual(["5.10", "5.3", "4.7"]);
  });
});

describe("VersionEquivalence", () => {
  test("treats separately parsed equal strings as equal", () => {
    expect(VersionEquivalence(v("5.3_ps"), v("5.3_ps"))).toBe(true);
  });

  test("distinguishes versions that only compare equal", () => {
    expect(VersionEquivalence(v("5.4"), v("5.4_ps"))).toBe(false);
    expect(VersionEquivalence(v("5.3"), v("5.3.0"))).toBe(false);
  });
});
