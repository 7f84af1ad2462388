// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { renderUpgradeJson, renderVersionJson, upgradeEntries } from "../../src/render";
import { buildUpgradePairs } from "../../src/version";
import { vs } from "../helpers/versions";

describe("renderVersionJson", () => {
  test("writes an indented array of version objects", () => {
    expect(renderVersionJson(vs("4.7", "5.3_ps"))).toBe(
      '[\n  {\n    "version": "4.7"\n  },\n  {\n    "version": "5.3_ps"\n  }\n]\n'
    );
  });

  test("writes an empty array for no versions", () => {
    expect(renderVersionJson([])).toBe("[]\n");
  });
});

describe("upgradeEntries", () => {
  test("flattens pairings into version/old pairs", () => {
    expect(upgradeEntries(buildUpgradePairs(vs("4.7.6", "5.1", "5.2")))).toEqual([
      { version: "5.1", old: "4.7.6" },
      { version: "5.2", old: "4.7.6" },
      { version: "5.2", old: "5.1" },
    ]);
  });
});

describe("renderUpgradeJson", () => {
  test("round-trips through JSON.parse", () => {
    const text = renderUpgradeJson(buildUpgradePairs(vs("5.1", "5.2")));
    expect(JSON.parse(text)).toEqual([{ version: "5.2", old: "5.1" }]);
    expect(text.endsWith("]\n")).toBe(true);
  });
});
