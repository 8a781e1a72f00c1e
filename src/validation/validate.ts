import { devAssert } from '../jsutils/devAssert';
import type { Maybe } from '../jsutils/Maybe';

import { ValidationError } from '../error/ValidationError';

import type { DocumentNode } from '../language/ast';
import { visit, visitInParallel } from '../language/visitor';

import type { GraphQLSchema } from '../type/schema';
import { assertValidSchema } from '../type/validate';

import { TypeInfo, visitWithTypeInfo } from '../utilities/TypeInfo';

import { specifiedRules } from './specifiedRules';
import type { ValidationRule } from './ValidationContext';
import { ValidationContext } from './ValidationContext';

const MAX_ERRORS_RULE = 'MaxErrorsRule';

class ValidationAbortedError extends Error {}

/**
 * Implements the "Validation" section of the GraphQL language: checks an
 * executable document against a schema.
 *
 * Validation runs synchronously, returning an array of encountered errors, or
 * an empty array if no errors were encountered and the document is valid.
 *
 * Every rule sees the whole document during one shared traversal and reports
 * into the same list, so the rules never depend on each other. The list is
 * sorted by the first location of each error, then by its message, which
 * makes the result independent of the order of `rules`. The document is
 * never modified.
 *
 * A list of specific validation rules may be provided. If not provided, the
 * default list of rules defined by the GraphQL language will be used.
 *
 * Once `maxErrors` errors have been collected, validation stops and an
 * additional error reports that the limit was reached.
 */
export function validate(
  schema: GraphQLSchema,
  documentAST: DocumentNode,
  rules: ReadonlyArray<ValidationRule> = specifiedRules,
  options?: { maxErrors?: number },
): ReadonlyArray<ValidationError> {
  devAssert(documentAST, 'Must provide document.');
  // If the schema used for validation is invalid, throw an error.
  assertValidSchema(schema);

  const maxErrors = options?.maxErrors ?? 100;
  const errors: Array<ValidationError> = [];
  let limitError: Maybe<ValidationError>;
  const typeInfo = new TypeInfo(schema);
  const context = new ValidationContext(
    schema,
    documentAST,
    typeInfo,
    (error) => {
      if (errors.length >= maxErrors) {
        limitError = new ValidationError(
          MAX_ERRORS_RULE,
          'Too many validation errors, error limit reached. Validation aborted.',
        );
        throw new ValidationAbortedError();
      }
      errors.push(error);
    },
  );

  // This uses a specialized visitor which runs multiple visitors in parallel,
  // while maintaining the visitor skip and break API.
  const visitor = visitInParallel(rules.map((rule) => rule(context)));

  // Visit the whole document with each instance of all provided rules.
  try {
    visit(documentAST, visitWithTypeInfo(typeInfo, visitor));
  } catch (e) {
    if (!(e instanceof ValidationAbortedError)) {
      throw e;
    }
  }

  const sorted = errors.sort(compareValidationErrors);
  return limitError ? [...sorted, limitError] : sorted;
}

function compareValidationErrors(
  a: ValidationError,
  b: ValidationError,
): number {
  const locA = a.locations?.[0];
  const locB = b.locations?.[0];
  if (locA === undefined || locB === undefined) {
    if (locA !== locB) {
      return locA === undefined ? -1 : 1;
    }
  } else if (locA.line !== locB.line) {
    return locA.line - locB.line;
  } else if (locA.column !== locB.column) {
    return locA.column - locB.column;
  }
  return compareStrings(a.message, b.message) || compareStrings(a.rule, b.rule);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
