/**
 * Validation utilities using TypeBox.
 *
 * Frames are checked against schemas compiled once at module load.
 */

import type { Static, TSchema } from 'typebox';
import { Compile } from 'typebox/compile';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Formatted errors for an invalid value, empty when valid */
  errors: (value: unknown) => string;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox schema into a validator.
 */
export function compileSchema<S extends TSchema>(schema: S): CompiledValidator<Static<S>> {
  const compiled = Compile(schema);

  return {
    check: (value: unknown): value is Static<S> => compiled.Check(value),
    errors: (value: unknown): string => formatErrors(compiled.Errors(value)),
  };
}
