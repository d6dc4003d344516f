import { describe, it, expect } from "vitest";
import { isJsonValue, jsonValueSchema, standardizeRequestSchema } from "./schemas.js";

describe("jsonValueSchema", () => {
  it("accepts parsed JSON and keeps every own key", () => {
    const document: unknown = JSON.parse('{"sport":"soccer","__proto__":{"home_team":"Barcelona"},"x":[1,null,true]}');
    const parsed = jsonValueSchema.safeParse(document);

    expect(parsed.success).toBe(true);
    if (!parsed.success) return;
    expect(parsed.data).toBe(document);
    expect(Object.keys(parsed.data ?? {})).toEqual(["sport", "__proto__", "x"]);
  });

  it("rejects values JSON cannot carry", () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue({ when: new Date(0) })).toBe(false);
    expect(isJsonValue([1, () => 1])).toBe(false);
    expect(jsonValueSchema.safeParse({ nested: { deep: [undefined] } }).success).toBe(false);
  });
});

describe("standardizeRequestSchema", () => {
  it("defaults auto_add to true", () => {
    expect(standardizeRequestSchema.parse({ team_name: "Barcelona", sport: " soccer " })).toEqual({
      team_name: "Barcelona",
      sport: "soccer",
      auto_add: true,
    });
  });
});
