/**
 * Message validation against named schemas.
 */

import type { ZodTypeAny } from 'zod';
import { SchemaNotFoundError } from './errors';

/**
 * Field errors keyed by dotted path. Errors about the message as a whole use `_root`.
 */
export type ValidationErrors = Record<string, string[]>;

export interface MessageValidator {
  /**
   * Checks a message against a registered schema.
   *
   * @returns true when the message is valid; otherwise the errors are available from getErrors()
   * @throws SchemaNotFoundError when no schema is registered under the name
   */
  validate(message: unknown, schemaName: string): boolean;
  getErrors(): ValidationErrors;
  registerSchema(schemaName: string, schema: ZodTypeAny): void;
  hasSchema(schemaName: string): boolean;
}

const ROOT_FIELD = '_root';

export class ZodMessageValidator implements MessageValidator {
  private schemas: Map<string, ZodTypeAny> = new Map();
  private errors: ValidationErrors = {};

  validate(message: unknown, schemaName: string): boolean {
    const schema = this.schemas.get(schemaName);
    if (! schema) {
      throw new SchemaNotFoundError(schemaName);
    }

    this.errors = {};

    const result = schema.safeParse(message);
    if (result.success) {
      return true;
    }

    for (const issue of result.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD;
      (this.errors[field] ??= []).push(issue.message);
    }

    return false;
  }

  getErrors(): ValidationErrors {
    return this.errors;
  }

  registerSchema(schemaName: string, schema: ZodTypeAny): void {
    this.schemas.set(schemaName, schema);
  }

  hasSchema(schemaName: string): boolean {
    return this.schemas.has(schemaName);
  }
}
