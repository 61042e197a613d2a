import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { defaultCacheFile } from "../cache-paths.js";

describe("defaultCacheFile", () => {
  it("prefers PESCAN_CACHE_DIR", () => {
    expect(defaultCacheFile({ PESCAN_CACHE_DIR: "/srv/pescan", XDG_CACHE_HOME: "/xdg" }, "linux", "/home/analyst"))
      .toBe(join("/srv/pescan", "data.json"));
  });

  it("uses XDG_CACHE_HOME on Linux", () => {
    expect(defaultCacheFile({ XDG_CACHE_HOME: "/xdg" }, "linux", "/home/analyst"))
      .toBe(join("/xdg", "pescan", "data.json"));
  });

  it("falls back to ~/.cache on Linux", () => {
    expect(defaultCacheFile({}, "linux", "/home/analyst"))
      .toBe(join("/home/analyst", ".cache", "pescan", "data.json"));
  });

  it("uses ~/Library/Caches on macOS", () => {
    expect(defaultCacheFile({}, "darwin", "/Users/analyst"))
      .toBe(join("/Users/analyst", "Library", "Caches", "pescan", "data.json"));
  });

  it("uses LOCALAPPDATA on Windows", () => {
    expect(defaultCacheFile({ LOCALAPPDATA: "C:\\Users\\analyst\\AppData\\Local" }, "win32", ""))
      .toBe(join("C:\\Users\\analyst\\AppData\\Local", "pescan", "data.json"));
  });

  it("returns undefined without a usable base directory", () => {
    expect(defaultCacheFile({}, "win32", "C:\\Users\\analyst")).toBeUndefined();
    expect(defaultCacheFile({}, "linux", "")).toBeUndefined();
  });
});
