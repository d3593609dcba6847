import { createHash } from "node:crypto";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .filter((key) => value[key] !== undefined)
        .sort((a, b) => a.localeCompare(b))
        .map((key) => [key, normalize(value[key])]),
    );
  }
  return value;
}

/** Key-order independent digest, so equal requests fingerprint equally. */
export function fingerprintPayload(payload: unknown): string {
  return createHash("sha256").update(JSON.stringify(normalize(payload))).digest("hex");
}
