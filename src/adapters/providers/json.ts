export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(source: JsonObject, field: string): string | null {
  const value = source[field];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function readObject(source: JsonObject, field: string): JsonObject | null {
  const value = source[field];
  return isJsonObject(value) ? value : null;
}

export function parseJsonObject(raw: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
