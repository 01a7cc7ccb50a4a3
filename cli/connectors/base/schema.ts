/**
 * Stream schemas: semantic field types and record conformance.
 *
 * Every field except the primary key is nullable and optional. Conformance
 * drops undeclared fields; a record that still fails validation is emitted
 * anyway and the failure is reported as a data-quality issue.
 */

import { z } from 'zod';
import type { JsonObject } from './types.js';

export const t = {
  key: () => z.string(),
  string: () => z.string().nullish(),
  email: () => z.email().nullish(),
  uri: () => z.url().nullish(),
  dateTime: () => z.iso.datetime({ offset: true }).nullish(),
  integer: () => z.int().nullish(),
  number: () => z.number().nullish(),
  boolean: () => z.boolean().nullish(),
  any: () => z.unknown().optional(),
  object: <S extends z.core.$ZodShape>(shape: S) => z.object(shape).nullish(),
  array: <T extends z.ZodType>(item: T) => z.array(item).nullish(),
  /** Non-null object, for array items. */
  item: <S extends z.core.$ZodShape>(shape: S) => z.object(shape),
};

export type StreamSchema = z.ZodObject;

export interface ConformResult {
  record: JsonObject;
  /** Human-readable validation failures, empty when the record conforms. */
  issues: string[];
}

export function formatIssue(issue: z.core.$ZodIssue): string {
  const path = issue.path.map(String).join('.');
  return `${path || '(root)'}: ${issue.message}`;
}

export function conformRecord(schema: StreamSchema, raw: JsonObject): ConformResult {
  const picked: JsonObject = {};
  for (const key of Object.keys(schema.shape)) {
    if (key in raw) picked[key] = raw[key];
  }

  const parsed = schema.safeParse(picked);
  if (parsed.success) {
    return { record: parsed.data, issues: [] };
  }
  return { record: picked, issues: parsed.error.issues.map(formatIssue) };
}

export function toJsonSchema(schema: StreamSchema): JsonObject {
  return { ...z.toJSONSchema(schema) };
}
