import { z } from 'zod';
import { PersistenceError } from '../errors';

export function toJson(value: unknown): string {
  return JSON.stringify(value);
}

/**
 * Parse a JSON text column and check it against the schema it was written with
 */
export function parseJsonColumn<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, column: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError(`Column ${column} holds invalid JSON`, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new PersistenceError(`Column ${column} failed validation: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

export function parseNullableJsonColumn<T>(
  text: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  column: string
): T | null {
  return text === null ? null : parseJsonColumn(text, schema, column);
}
