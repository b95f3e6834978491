/**
 * Shared type definitions
 */

/**
 * JSON-safe types
 *
 * Anything typed as JsonValue survives JSON.stringify/JSON.parse unchanged.
 */
export type JsonPrimitive = string | number | boolean | null;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Field-level validation problem
 */
export interface ConfigIssue {
  field: string;
  message: string;
}
