const SENSITIVE_KEYS = new Set([
  "token",
  "access_token",
  "password",
  "secret",
  "apikey",
  "api_key",
  "authorization",
]);

export const REDACTED = "[REDACTED]";

function isSensitive(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/** Deep copy with sensitive keys masked. Arrays and nested objects are walked. */
export function redactParams(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[key] = isSensitive(key) ? REDACTED : redactValue(v);
  }
  return out;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue);
  if (typeof value === "object" && value !== null) {
    return redactParams(Object.fromEntries(Object.entries(value)));
  }
  return value;
}
