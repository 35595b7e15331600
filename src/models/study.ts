/**
 * Raw registry study documents
 *
 * Study documents arrive as semi-structured JSON trees whose shape varies by
 * registry deployment. Only the normalizer reads inside them.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * One study as received from the registry search or single-study endpoint
 */
export type RawStudyDocument = JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
