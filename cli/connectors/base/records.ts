/**
 * Record extraction from a page body.
 *
 * Pointers take the form `$[*]` (the body is the array) or `$.items[*]`,
 * `$.data.items[*]` (walk object keys, then spread the array).
 */

import { DataError } from './errors.js';
import type { JsonObject } from './types.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parsePointer(pointer: string): string[] {
  const match = /^\$((?:\.[A-Za-z_][\w-]*)*)\[\*\]$/.exec(pointer);
  if (!match) {
    throw new DataError(`Unsupported records pointer "${pointer}": expected $[*] or $.key[*]`);
  }
  return match[1] ? match[1].slice(1).split('.') : [];
}

/**
 * Apply a records pointer to a response body.
 * An unresolvable path means the page has no records; anything other than an
 * array of objects at the end of the path is malformed.
 */
export function extractRecords(body: unknown, pointer: string): JsonObject[] {
  let value: unknown = body;
  for (const key of parsePointer(pointer)) {
    if (!isJsonObject(value)) return [];
    value = value[key];
  }

  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new DataError(`Expected an array at ${pointer}, got ${typeof value}`);
  }

  return value.map((item, index) => {
    if (!isJsonObject(item)) {
      throw new DataError(`Expected an object at ${pointer} index ${index}, got ${item === null ? 'null' : typeof item}`);
    }
    return item;
  });
}
