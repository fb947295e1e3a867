/**
 * Minimal argument check against a tool's parameter schema: required
 * properties and primitive types. Extra properties pass through.
 */

import type { ArgumentIssue } from "../errors.js";
import type { JsonSchema, JsonSchemaProperty, JsonSchemaType } from "./interface.js";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function matchesType(value: unknown, type: JsonSchemaType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isPlainObject(value);
  }
}

function checkProperty(
  path: string,
  value: unknown,
  schema: JsonSchemaProperty,
  issues: ArgumentIssue[],
): void {
  if (schema.type && !matchesType(value, schema.type)) {
    issues.push({ path, message: `expected ${schema.type}` });
    return;
  }
  if (schema.enum && !schema.enum.some((e) => e === value)) {
    issues.push({ path, message: `must be one of ${schema.enum.join(", ")}` });
    return;
  }
  if (schema.items && Array.isArray(value)) {
    const items = schema.items;
    value.forEach((item, i) => checkProperty(`${path}[${i}]`, item, items, issues));
  }
}

export function validateArguments(schema: JsonSchema, args: unknown): ArgumentIssue[] {
  if (!isPlainObject(args)) {
    return [{ path: "", message: "arguments must be an object" }];
  }

  const issues: ArgumentIssue[] = [];
  for (const key of schema.required ?? []) {
    if (args[key] === undefined || args[key] === null) {
      issues.push({ path: key, message: "is required" });
    }
  }

  for (const [key, prop] of Object.entries(schema.properties)) {
    const value = args[key];
    // null is treated as "not provided" for optional parameters
    if (value === undefined || value === null) continue;
    checkProperty(key, value, prop, issues);
  }

  return issues;
}
