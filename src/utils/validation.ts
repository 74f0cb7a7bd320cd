/**
 * Zod validation helpers
 *
 * @module utils/validation
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * Read a JSON file and validate its contents
 *
 * @throws ValidationError when the file is not JSON or does not match the schema
 */
export function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `${filePath}: invalid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }
  try {
    return validateInput(schema, parsed);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ValidationError(`${filePath}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Company folder names become file prefixes and collection names
 */
export const CompanyIdSchema = z
  .string()
  .trim()
  .min(1, 'Company name is required')
  .max(200)
  .refine((value) => !/[/\\]|\.\./.test(value), 'Company name must not contain path separators');
