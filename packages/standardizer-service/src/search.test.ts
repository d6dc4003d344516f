import { describe, it, expect } from "vitest";
import { searchTeams } from "./search.js";

const names = ["Boston Celtics", "Chicago Bulls", "Los Angeles Lakers"];

describe("searchTeams", () => {
  it("ranks an exact name first with full relevance", () => {
    const [first] = searchTeams(names, "Boston Celtics");
    expect(first).toEqual({ name: "Boston Celtics", relevance: 100 });
  });

  it("finds names from a fragment", () => {
    expect(searchTeams(names, "lakers").map((result) => result.name)).toContain("Los Angeles Lakers");
  });

  it("sorts by relevance", () => {
    const relevances = searchTeams(names, "bulls").map((result) => result.relevance);
    expect(relevances).toEqual([...relevances].sort((a, b) => b - a));
  });

  it("returns nothing for an empty query or category", () => {
    expect(searchTeams(names, "  ")).toEqual([]);
    expect(searchTeams([], "Boston")).toEqual([]);
  });
});
