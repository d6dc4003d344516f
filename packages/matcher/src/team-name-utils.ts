// src/team-name-utils.ts
//
// Dependency-free helpers for comparing names and categories as registry keys.

export function cleanTeamName(name: string): string {
  return String(name || "").replace(/\s+/g, " ").trim();
}

export function normalizeKeyPart(value: string): string {
  return cleanTeamName(value).toLowerCase();
}

export function makeEntryKey(category: string, name: string): string {
  return `${normalizeKeyPart(category)}::${normalizeKeyPart(name)}`;
}

export function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}
