/** basic json primitive values */
export type JsonPrimitive = string | number | boolean | null;

/** json object with string keys */
export type JsonObject = { [key: string]: JsonValue };
/** json array containing any json values */
export type JsonArray = JsonValue[];
/** any valid json value */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/** any jsonifible valid json value including undefined, which is dropped on the wire */
export type JsonifibleValue =
  | JsonPrimitive
  | JsonifibleObject
  | JsonObject
  | Array<JsonPrimitive | JsonifibleObject>
  | undefined;

/** jsonifible object with string keys */
export type JsonifibleObject = { [key: string]: JsonifibleValue };

/**
 * checks whether a value is a plain json object (not an array nor null)
 * @param value value to inspect
 * @returns true when the value can be treated as a jsonifible object
 */
export function isJsonifibleObject(value: unknown): value is JsonifibleObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
