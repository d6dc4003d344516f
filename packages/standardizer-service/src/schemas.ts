import { z } from "zod";
import type { JsonValue } from "@team-standardizer/shared";

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (typeof value !== "object" || Object.getPrototypeOf(value) !== Object.prototype) return false;
  return Object.values(value).every(isJsonValue);
}

// Checked in place rather than rebuilt, so every own key survives, "__proto__" included
export const jsonValueSchema = z.custom<JsonValue>(isJsonValue, { message: "Expected a JSON value" });

const teamName = z.string({ required_error: "team_name is required" });
const sport = z.string({ required_error: "sport is required" }).trim().min(1, "sport is required");

export const standardizeRequestSchema = z.object({
  team_name: teamName,
  sport,
  auto_add: z.boolean().default(true),
});

export const addTeamRequestSchema = z.object({
  team_name: teamName,
  sport,
  force: z.boolean().default(false),
});

export const thresholdsRequestSchema = z
  .object({
    matching_threshold: z.number().optional(),
    auto_add_threshold: z.number().optional(),
  })
  .refine((body) => body.matching_threshold !== undefined || body.auto_add_threshold !== undefined, {
    message: "Provide matching_threshold and/or auto_add_threshold",
  });

/** First issue of a failed parse, as `field: message`. */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
