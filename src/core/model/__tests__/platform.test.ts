/**
 * Tests for platform identity and PlatformMap
 */

import { describe, it, expect } from "vitest";
import { PlatformMap, createPlatformData, describePlatform, samePlatform } from "../platform.js";

describe("PlatformData", () => {
  it("should compare structurally", () => {
    const a = createPlatformData("native", "native", ["linuxX64", "macosArm64"]);
    const b = createPlatformData("native", "native", ["linuxX64", "macosArm64"]);

    expect(a).not.toBe(b);
    expect(samePlatform(a, b)).toBe(true);
  });

  it("should treat different targets as different platforms", () => {
    const a = createPlatformData("native", "native", ["linuxX64"]);
    const b = createPlatformData("native", "native", ["macosArm64"]);

    expect(samePlatform(a, b)).toBe(false);
  });

  it("should treat targets as a set", () => {
    const a = createPlatformData("web", "js", ["browser", "node"]);
    const b = createPlatformData("web", "js", ["node", "browser", "node"]);

    expect(b.targets).toEqual(["browser", "node"]);
    expect(samePlatform(a, b)).toBe(true);
    expect(PlatformMap.of(a, 1).has(b)).toBe(true);
  });

  it("should describe name, kind and targets", () => {
    expect(describePlatform(createPlatformData("native", "native", ["linuxX64", "macosArm64"]))).toBe(
      "native/native [linuxX64, macosArm64]"
    );
    expect(describePlatform(createPlatformData("jvm", "jvm"))).toBe("jvm/jvm");
  });
});

describe("PlatformMap", () => {
  const jvm = createPlatformData("jvm", "jvm");
  const js = createPlatformData("js", "js");

  it("should look values up by an equal key", () => {
    const map = PlatformMap.of(jvm, "jvm docs");

    expect(map.get(createPlatformData("jvm", "jvm"))).toBe("jvm docs");
    expect(map.has(js)).toBe(false);
  });

  it("should keep the first entry for a repeated platform", () => {
    const map = PlatformMap.from([
      [jvm, "first"],
      [js, "js"],
      [createPlatformData("jvm", "jvm"), "second"],
    ]);

    expect(map.size).toBe(2);
    expect(map.get(jvm)).toBe("first");
  });

  it("should let the receiver win in a union and append new platforms", () => {
    const left = PlatformMap.of(jvm, "left");
    const right = PlatformMap.from([
      [js, "right js"],
      [jvm, "right jvm"],
    ]);

    const union = left.union(right);

    expect(union.entries()).toEqual([
      [jvm, "left"],
      [js, "right js"],
    ]);
  });

  it("should not modify the receiver", () => {
    const map = PlatformMap.of(jvm, 1);
    const extended = map.with(js, 2);

    expect(map.size).toBe(1);
    expect(extended.values()).toEqual([1, 2]);
  });

  it("should map and filter values", () => {
    const map = PlatformMap.from([
      [jvm, 1],
      [js, 2],
    ]);

    expect(map.map((value) => value * 10).values()).toEqual([10, 20]);
    expect(map.filter((_value, platform) => platform.platform === "js").platforms()).toEqual([js]);
  });

  it("should serialize keyed by platform description", () => {
    expect(JSON.parse(JSON.stringify(PlatformMap.of(jvm, { a: 1 })))).toEqual({ "jvm/jvm": { a: 1 } });
  });
});
