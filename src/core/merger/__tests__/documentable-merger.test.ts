/**
 * Tests for the default documentable merger
 */

import { describe, it, expect } from "vitest";
import { DefaultDocumentableMerger } from "../documentable-merger.js";
import { ConfigurationError, ErrorCode } from "../../errors.js";
import { createModule, createPackage, identityKey, isClasslike, type DModule } from "../../model/documentable.js";
import { createPlatformData } from "../../model/platform.js";
import { JS, JVM, classlike, member, singlePackageModule } from "../../__tests__/fixtures.js";

const merger = new DefaultDocumentableMerger();

function packageOf(module: DModule, name: string) {
  const pkg = module.children.find((child) => child.name === name);
  if (!pkg) throw new Error(`package ${name} missing`);
  return pkg;
}

describe("DefaultDocumentableMerger", () => {
  it("should raise ConfigurationError for an empty input", () => {
    try {
      merger.merge([]);
      expect.unreachable("merge should fail");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(ErrorCode.CONFIGURATION_NO_PLATFORMS);
      }
    }
  });

  it("should return a structurally equal module for a single input", () => {
    const module = singlePackageModule(JVM, "p", [
      classlike("C", "p", JVM, (dri) => [member("run", dri, JVM, { signature: "(): void" })]),
    ]);

    expect(merger.merge([module])).toEqual(module);
  });

  it("should merge a class present on two platforms into one node tagged for both", () => {
    const jvmModule = singlePackageModule(JVM, "p", [
      classlike("C", "p", JVM, (dri) => [member("jvmOnly", dri, JVM)]),
    ]);
    const jsModule = singlePackageModule(JS, "p", [classlike("C", "p", JS, (dri) => [member("jsOnly", dri, JS)])]);

    const merged = merger.merge([jvmModule, jsModule]);

    expect(merged.children).toHaveLength(1);
    const pkg = packageOf(merged, "p");
    expect(pkg.platforms.platforms()).toEqual([JVM, JS]);
    const classes = pkg.children.filter(isClasslike);
    expect(classes).toHaveLength(1);
    const [mergedClass] = classes;
    expect(mergedClass?.platforms.platforms()).toEqual([JVM, JS]);
    expect(mergedClass?.children.map((child) => child.name)).toEqual(["jvmOnly", "jsOnly"]);
    expect(mergedClass?.children.map((child) => child.platforms.platforms())).toEqual([[JVM], [JS]]);
  });

  it("should retain conflicting documentation per platform", () => {
    const jvmModule = singlePackageModule(JVM, "p", [
      classlike("C", "p", JVM, () => [], { documentation: "JVM text" }),
    ]);
    const jsModule = singlePackageModule(JS, "p", [classlike("C", "p", JS, () => [], { documentation: "JS text" })]);

    const merged = merger.merge([jvmModule, jsModule]);
    const node = packageOf(merged, "p").children[0];

    expect(node?.platforms.get(JVM)?.documentation).toBe("JVM text");
    expect(node?.platforms.get(JS)?.documentation).toBe("JS text");
  });

  it("should let the earlier input win for the same platform", () => {
    const first = singlePackageModule(JVM, "p", [classlike("C", "p", JVM, () => [], { documentation: "first" })]);
    const second = singlePackageModule(JVM, "p", [classlike("C", "p", JVM, () => [], { documentation: "second" })]);

    const node = packageOf(merger.merge([first, second]), "p").children[0];

    expect(node?.platforms.size).toBe(1);
    expect(node?.platforms.get(JVM)?.documentation).toBe("first");
  });

  it("should order children by first occurrence across inputs", () => {
    const jvmModule = singlePackageModule(JVM, "p", [classlike("B", "p", JVM), classlike("A", "p", JVM)]);
    const jsModule = singlePackageModule(JS, "p", [
      classlike("C", "p", JS),
      classlike("A", "p", JS),
      classlike("D", "p", JS),
    ]);

    const merged = merger.merge([jvmModule, jsModule]);

    expect(packageOf(merged, "p").children.map(identityKey)).toEqual(["p/B/", "p/A/", "p/C/", "p/D/"]);
  });

  it("should keep disjoint packages of different platforms", () => {
    const jvmModule = singlePackageModule(JVM, "jvm.only", [classlike("J", "jvm.only", JVM)]);
    const jsModule = singlePackageModule(JS, "js.only", [classlike("S", "js.only", JS)]);

    const merged = merger.merge([jvmModule, jsModule]);

    expect(merged.children.map((pkg) => pkg.name)).toEqual(["jvm.only", "js.only"]);
    expect(packageOf(merged, "js.only").platforms.platforms()).toEqual([JS]);
  });

  it("should keep overloads with different signatures apart", () => {
    const module = (platform: typeof JVM) =>
      singlePackageModule(platform, "p", [
        member("parse", { packageName: "p" }, platform, { signature: "(text: string): number" }),
        member("parse", { packageName: "p" }, platform, { signature: "(bytes: Uint8Array): number" }),
      ]);

    const merged = merger.merge([module(JVM), module(JS)]);

    expect(packageOf(merged, "p").children.map(identityKey)).toEqual([
      "p//parse(text: string): number",
      "p//parse(bytes: Uint8Array): number",
    ]);
  });

  it("should take module name and documentation from the first non-empty value", () => {
    const native = createPlatformData("native", "native");
    const modules = [
      createModule("", JVM, [createPackage("p", JVM, [])]),
      createModule("core", JS, [createPackage("p", JS, [])], "Core module"),
      createModule("other", native, [createPackage("p", native, [])], "Other text"),
    ];

    const merged = merger.merge(modules);

    expect(merged.name).toBe("core");
    expect(merged.documentation).toBe("Core module");
    expect(merged.platforms.platforms()).toEqual([JVM, JS, native]);
  });
});
