import { describe, it, expect } from "vitest";
import { CategoryStore } from "../category-store.js";
import { sampleManifest } from "../../__tests__/fixtures.js";

describe("CategoryStore", () => {
  const store = new CategoryStore(sampleManifest());

  it("exposes headers in stored order", () => {
    expect(store.headers).toEqual(["Injection", "Anti-Debugging", "Evasion"]);
  });

  it("counts every (category, name) pair", () => {
    expect(store.apiCount).toBe(7);
  });

  it("reports provenance", () => {
    expect(store.fetchedAt).toBe("2026-01-02T03:04:05.000Z");
    expect(store.source).toBe("https://malapi.test");
  });

  it("looks up metadata per category", () => {
    expect(store.getApi(0, "VirtualAllocEx")?.description).toBe("Allocates memory in another process");
    expect(store.getApi(2, "VirtualAllocEx")?.description).toBe("Reserves memory for unpacked code");
    expect(store.getApi(1, "VirtualAllocEx")).toBeUndefined();
    expect(store.getApi(9, "Sleep")).toBeUndefined();
  });

  it("locates a name in every category that lists it", () => {
    expect(store.locate("VirtualAllocEx").map((l) => [l.categoryIndex, l.header])).toEqual([
      [0, "Injection"],
      [2, "Evasion"],
    ]);
    expect(store.locate("virtualallocex")).toEqual([]);
  });

  it("returns the manifest it was built from", () => {
    expect(store.toManifest()).toEqual(sampleManifest());
  });
});
