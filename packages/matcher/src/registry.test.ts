import { describe, it, expect } from "vitest";
import { Registry, SessionLog } from "./registry.js";

const snapshot = [
  { sport: "basketball", canonical_team_name: "Kauno Zalgiris" },
  { sport: "Soccer", canonical_team_name: "Barcelona" },
  { sport: "basketball", canonical_team_name: "Boston Celtics" },
];

describe("Registry", () => {
  it("indexes names per category in insertion order", () => {
    const registry = new Registry(snapshot);
    expect(registry.size).toBe(3);
    expect(registry.lookup("basketball")).toEqual(["Kauno Zalgiris", "Boston Celtics"]);
    expect(registry.lookup(" SOCCER ")).toEqual(["Barcelona"]);
    expect(registry.lookup("hockey")).toEqual([]);
    expect(registry.categories()).toEqual(["basketball", "soccer"]);
  });

  it("round-trips its snapshot", () => {
    expect(new Registry(snapshot).toSnapshot()).toEqual(snapshot);
  });

  it("finds exact names ignoring case and spacing", () => {
    const registry = new Registry(snapshot);
    expect(registry.findExact("basketball", "  boston   CELTICS ")).toBe("Boston Celtics");
    expect(registry.findExact("soccer", "Boston Celtics")).toBeUndefined();
    expect(registry.findExact("basketball", "   ")).toBeUndefined();
  });

  it("stores added categories as keys and keeps the index in sync", () => {
    const registry = new Registry(snapshot);
    const entry = registry.add("  Ice   Hockey ", "Boston Bruins");
    expect(entry).toEqual({ category: "ice hockey", name: "Boston Bruins" });
    expect(registry.lookup("ice hockey")).toEqual(["Boston Bruins"]);
    expect(registry.toSnapshot().at(-1)).toEqual({ sport: "ice hockey", canonical_team_name: "Boston Bruins" });

    const indexed = registry.categories().flatMap((category) => registry.lookup(category));
    expect(indexed).toHaveLength(registry.size);
  });

  it("replaces its contents on load", () => {
    const registry = new Registry(snapshot);
    registry.load([{ sport: "hockey", canonical_team_name: "Boston Bruins" }]);
    expect(registry.size).toBe(1);
    expect(registry.lookup("basketball")).toEqual([]);
  });
});

describe("SessionLog", () => {
  it("records copies and resets", () => {
    const log = new SessionLog();
    const entry = { category: "soccer", name: "Barcelona" };
    log.record(entry);
    entry.name = "changed";
    expect(log.entries()).toEqual([{ category: "soccer", name: "Barcelona" }]);
    expect(log.size).toBe(1);
    log.reset();
    expect(log.entries()).toEqual([]);
  });
});
