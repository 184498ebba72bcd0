import { describe, expect, it } from "vitest";

import { fileSystemPath, fileSystemPathEquals, formatFileSystemPath, join } from "../path.ts";

describe("fileSystemPath", () => {
  it("normalizes the path", () => {
    expect(fileSystemPath("/app/./src/../lib/")).toEqual({ fs: "project", path: "/app/lib" });
    expect(fileSystemPath("/")).toEqual({ fs: "project", path: "/" });
  });

  it("keeps the filesystem name", () => {
    const path = fileSystemPath("/pkg", "virtual");
    expect(formatFileSystemPath(path)).toBe("virtual:/pkg");
    expect(Object.isFrozen(path)).toBe(true);
  });

  it("compares by filesystem and path", () => {
    expect(fileSystemPathEquals(fileSystemPath("/a"), fileSystemPath("/a/"))).toBe(true);
    expect(fileSystemPathEquals(fileSystemPath("/a"), fileSystemPath("/a", "other"))).toBe(false);
  });

  it("joins POSIX segments", () => {
    expect(join("/app", "node_modules", "pkg")).toBe("/app/node_modules/pkg");
  });
});
