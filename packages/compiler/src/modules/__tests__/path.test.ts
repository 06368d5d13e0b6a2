import { describe, expect, it } from "vitest";
import { createBundledResourceLocator } from "../bundled.js";
import { createMemoryImportHost } from "../memory-host.js";
import { moduleCandidates, resolveModulePath } from "../path.js";
import { ModuleReference } from "../reference.js";

const CWD = "/work";

const resolveWith = ({
  files,
  reference,
  searchPaths,
  bundleRoot,
}: {
  files: Record<string, string>;
  reference: ModuleReference;
  searchPaths?: string[];
  bundleRoot?: string;
}) => {
  const host = createMemoryImportHost({ files, cwd: CWD });
  return resolveModulePath({
    reference,
    searchPaths,
    host,
    locateBundled: bundleRoot
      ? createBundledResourceLocator({ host, root: bundleRoot })
      : undefined,
  });
};

describe("moduleCandidates", () => {
  it("builds primary and parent-stripped candidates", () => {
    expect(moduleCandidates(ModuleReference.of("foo", "bar", "baz"))).toEqual({
      primary: "foo/bar/baz.x",
      parentStripped: "bar/baz.x",
    });
  });

  it("has no parent-stripped candidate for a single segment", () => {
    expect(moduleCandidates(ModuleReference.of("foo"))).toEqual({
      primary: "foo.x",
      parentStripped: undefined,
    });
  });

  it("maps reserved standard library names to the stdlib directory", () => {
    expect(moduleCandidates(ModuleReference.of("std"))).toEqual({
      primary: "stdlib/std.x",
    });
    expect(moduleCandidates(ModuleReference.of("float32")).primary).toBe(
      "stdlib/float32.x"
    );
  });

  it("treats stdlib names as ordinary segments inside longer references", () => {
    expect(moduleCandidates(ModuleReference.of("std", "io"))).toEqual({
      primary: "std/io.x",
      parentStripped: "io.x",
    });
  });
});

describe("resolveModulePath", () => {
  it("finds a module relative to the working directory", async () => {
    const result = await resolveWith({
      files: { "/work/a/b.x": "" },
      reference: ModuleReference.of("a", "b"),
    });
    expect(result).toEqual({
      found: true,
      filePath: "/work/a/b.x",
      attempted: ["/work/a/b.x"],
    });
  });

  it("prefers the working directory over search paths", async () => {
    const result = await resolveWith({
      files: { "/work/a/b.x": "", "/opt/libs/a/b.x": "" },
      reference: ModuleReference.of("a", "b"),
      searchPaths: ["/opt/libs"],
    });
    expect(result.found && result.filePath).toBe("/work/a/b.x");
  });

  it("falls back to search paths when the working directory has no match", async () => {
    const result = await resolveWith({
      files: { "/opt/libs/a/b.x": "" },
      reference: ModuleReference.of("a", "b"),
      searchPaths: ["/opt/libs"],
    });
    expect(result).toEqual({
      found: true,
      filePath: "/opt/libs/a/b.x",
      attempted: ["/work/a/b.x", "/work/b.x", "/opt/libs/a/b.x"],
    });
  });

  it("tries the parent-stripped candidate in the working directory before any search path", async () => {
    const result = await resolveWith({
      files: { "/work/mod.x": "", "/opt/first/pkg/mod.x": "" },
      reference: ModuleReference.of("pkg", "mod"),
      searchPaths: ["/opt/first"],
    });
    expect(result.found && result.filePath).toBe("/work/mod.x");
  });

  it("tries primary then parent-stripped at each search path before moving on", async () => {
    const result = await resolveWith({
      files: { "/opt/first/mod.x": "", "/opt/second/pkg/mod.x": "" },
      reference: ModuleReference.of("pkg", "mod"),
      searchPaths: ["/opt/first", "/opt/second"],
    });
    expect(result.found && result.filePath).toBe("/opt/first/mod.x");
  });

  it("reaches a parent-stripped match only after every earlier attempt failed", async () => {
    const result = await resolveWith({
      files: { "/opt/second/mod.x": "" },
      reference: ModuleReference.of("pkg", "mod"),
      searchPaths: ["/opt/first", "/opt/second"],
    });
    expect(result).toEqual({
      found: true,
      filePath: "/opt/second/mod.x",
      attempted: [
        "/work/pkg/mod.x",
        "/work/mod.x",
        "/opt/first/pkg/mod.x",
        "/opt/first/mod.x",
        "/opt/second/pkg/mod.x",
        "/opt/second/mod.x",
      ],
    });
  });

  it("consults bundled resources right after the working directory", async () => {
    const result = await resolveWith({
      files: { "/bundle/a/b.x": "", "/opt/libs/a/b.x": "" },
      reference: ModuleReference.of("a", "b"),
      searchPaths: ["/opt/libs"],
      bundleRoot: "/bundle",
    });
    expect(result).toEqual({
      found: true,
      filePath: "/bundle/a/b.x",
      attempted: ["/work/a/b.x", "/bundle/a/b.x"],
    });
  });

  it("reports every attempted path and the working directory on failure", async () => {
    const result = await resolveWith({
      files: {},
      reference: ModuleReference.of("a", "b"),
      searchPaths: ["/opt/libs", "vendor"],
      bundleRoot: "/bundle",
    });
    expect(result).toEqual({
      found: false,
      workingDirectory: "/work",
      attempted: [
        "/work/a/b.x",
        "/bundle/a/b.x",
        "/work/b.x",
        "/bundle/b.x",
        "/opt/libs/a/b.x",
        "/opt/libs/b.x",
        "/work/vendor/a/b.x",
        "/work/vendor/b.x",
      ],
    });
  });

  it("resolves std to the standard library path without search paths", async () => {
    const result = await resolveWith({
      files: { "/work/stdlib/std.x": "", "/work/std.x": "" },
      reference: ModuleReference.of("std"),
    });
    expect(result).toEqual({
      found: true,
      filePath: "/work/stdlib/std.x",
      attempted: ["/work/stdlib/std.x"],
    });
  });

  it("finds std among bundled resources", async () => {
    const result = await resolveWith({
      files: { "/bundle/stdlib/std.x": "", "/opt/libs/std.x": "" },
      reference: ModuleReference.of("std"),
      searchPaths: ["/opt/libs"],
      bundleRoot: "/bundle",
    });
    expect(result).toEqual({
      found: true,
      filePath: "/bundle/stdlib/std.x",
      attempted: ["/work/stdlib/std.x", "/bundle/stdlib/std.x"],
    });
  });

  it("never applies the general join to std", async () => {
    const result = await resolveWith({
      files: { "/opt/libs/std.x": "" },
      reference: ModuleReference.of("std"),
      searchPaths: ["/opt/libs"],
    });
    expect(result).toEqual({
      found: false,
      workingDirectory: "/work",
      attempted: ["/work/stdlib/std.x", "/opt/libs/stdlib/std.x"],
    });
  });
});
