import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import { promises as fpm } from 'fs';
import { ZodType } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Implemented by every model that travels to or from the platform as JSON.
 */
export interface JsonSerializable {
  toJson(): JsonObject;
}

/**
 * Checks that a value is a plain JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and decodes a JSON file.
 *
 * @param filename path of the file to read
 *
 * @returns the decoded document
 *
 * @example
 * const ann = loadJsonFile('/data/ann/image_01.json');
 * console.log(ann.size); // { height: 800, width: 1067 }
 */
export function loadJsonFile(filename: string): JsonObject {
  if (existsSync(filename) && statSync(filename).isDirectory()) {
    throw new Error(`The path ${filename} is a directory, not a file.`);
  } else if (!existsSync(filename)) {
    throw new Error(`File with path ${filename} was not found.`);
  }
  const text = readFileSync(filename, { encoding: 'utf-8' });
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Can not decode json file with path ${filename}: ${reason}`);
  }
  if (!isJsonObject(parsed)) {
    throw new Error(`Json file with path ${filename} does not contain an object.`);
  }
  return parsed;
}

/**
 * Writes data to a file in JSON format.
 *
 * @param data the document to write
 * @param filename target file path
 * @param indent pretty-print indent level
 */
export function dumpJsonFile(data: JsonValue, filename: string, indent = 4): void {
  writeFileSync(filename, JSON.stringify(data, null, indent));
}

/**
 * Same as `dumpJsonFile`, without blocking the event loop.
 */
export async function dumpJsonFileAsync(
  data: JsonValue,
  filename: string,
  indent = 4
): Promise<void> {
  await fpm.writeFile(filename, JSON.stringify(data, null, indent));
}

/**
 * Flattens nested objects into a single level. Nested keys are joined with
 * `sep`; arrays are kept as values.
 *
 * @example
 * flattenJson({ a: { b: 1, c: { d: 2 } }, e: [1, 2] });
 * // { 'a.b': 1, 'a.c.d': 2, e: [1, 2] }
 */
export function flattenJson(data: JsonObject, sep = '.'): JsonObject {
  const output: JsonObject = {};

  const walk = (node: JsonObject, prefix: string) => {
    for (const key of Object.keys(node)) {
      const value = node[key];
      const name = prefix === '' ? key : `${prefix}${sep}${key}`;
      if (isJsonObject(value)) {
        walk(value, name);
      } else {
        output[name] = value;
      }
    }
  };

  walk(data, '');
  return output;
}

/**
 * Adds a prefix and/or a suffix to every key of an object.
 *
 * @example
 * modifyKeys({ '1': 'example', '3': 4 }, 'pr_', '_su'); // { pr_1_su: 'example', pr_3_su: 4 }
 */
export function modifyKeys<V>(
  data: Record<string, V>,
  prefix?: string,
  suffix?: string
): Record<string, V> {
  const output: Record<string, V> = {};
  for (const [key, value] of Object.entries(data)) {
    output[`${prefix ?? ''}${key}${suffix ?? ''}`] = value;
  }
  return output;
}

/**
 * Validates a document against a schema.
 *
 * @param data the document to validate
 * @param schema zod schema describing the expected shape
 * @param raiseError throw instead of returning `false`
 *
 * @returns whether the document matches the schema
 */
export function validateJson(data: unknown, schema: ZodType, raiseError = false): boolean {
  const result = schema.safeParse(data);
  if (result.success) {
    return true;
  }
  if (raiseError) {
    throw new Error('JSON data is invalid. See error message for more details.', {
      cause: result.error
    });
  }
  return false;
}
