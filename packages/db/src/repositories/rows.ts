import type { z } from "zod";
import { DatabaseError } from "@sourcer/core";

/**
 * Validate a row returned by Supabase against its schema
 */
export function parseRow<T>(
  schema: z.ZodType<T>,
  data: unknown,
  table: string,
  operation: string
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new DatabaseError(`Malformed ${table} row: ${issues}`, table, operation);
  }
  return result.data;
}

export function parseRows<T>(
  schema: z.ZodType<T>,
  data: unknown,
  table: string,
  operation: string
): T[] {
  if (data === null || data === undefined) return [];
  if (!Array.isArray(data)) {
    throw new DatabaseError(`Expected a list of ${table} rows`, table, operation);
  }
  return data.map((row) => parseRow(schema, row, table, operation));
}
