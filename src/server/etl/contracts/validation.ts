/**
 * Contract validation helpers
 *
 * Wrap zod parsing so boundary failures surface as `ContractValidationError`.
 */

import { ZodError, type ZodType } from 'zod';
import { ContractValidationError } from '../../types/errors.js';
import { indexDocumentSchema, processingContextSchema } from './schemas.js';
import type { IndexDocument, ProcessingContext } from './types.js';

/**
 * Format zod issues as `path: message` strings
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${path}: ${issue.message}`;
  });
}

function validateWith<T>(schema: ZodType<T>, contract: string, value: unknown, context?: Record<string, unknown>): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ContractValidationError(contract, formatZodIssues(parsed.error), context);
  }
  return parsed.data;
}

/**
 * @throws {ContractValidationError} if the context is incomplete or its timestamp is malformed
 */
export function validateProcessingContext(value: unknown): ProcessingContext {
  return validateWith(processingContextSchema, 'Processing context', value);
}

/**
 * @throws {ContractValidationError} if the document does not match the index schema
 */
export function validateIndexDocument(value: unknown, position?: number): IndexDocument {
  return validateWith(indexDocumentSchema, 'Index document', value, position === undefined ? undefined : { position });
}
