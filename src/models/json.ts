/**
 * JSON value model used for free-form metadata columns
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * String-keyed metadata map stored as a JSON object column
 */
export type JsonObject = { [key: string]: JsonValue };
