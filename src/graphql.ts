import { isPromise } from './jsutils/isPromise';
import type { Maybe } from './jsutils/Maybe';
import type { PromiseOrValue } from './jsutils/PromiseOrValue';

import { isSyntaxError } from './error/syntaxError';

import type { ParseOptions } from './language/parser';
import { parse } from './language/parser';
import type { Source } from './language/source';

import type {
  GraphQLFieldResolver,
  GraphQLTypeResolver,
} from './type/definition';
import type { GraphQLSchema } from './type/schema';
import { validateSchema } from './type/validate';

import { validate } from './validation/validate';

import type { ExecutionResult } from './execution/execute';
import { execute } from './execution/execute';

/**
 * Runs a request end to end: checks the schema, parses `source`, validates
 * the document and executes the selected operation.
 *
 * A failure before execution produces a response with `errors` only.
 * `parseOptions` is handed to the parser unchanged, and `signal` aborts
 * fields that are still pending.
 */
export interface GraphQLArgs {
  schema: GraphQLSchema;
  source: string | Source;
  rootValue?: unknown;
  contextValue?: unknown;
  variableValues?: Maybe<{ readonly [variable: string]: unknown }>;
  operationName?: Maybe<string>;
  fieldResolver?: Maybe<GraphQLFieldResolver>;
  typeResolver?: Maybe<GraphQLTypeResolver>;
  signal?: Maybe<AbortSignal>;
  parseOptions?: ParseOptions;
}

export function graphql(args: GraphQLArgs): Promise<ExecutionResult> {
  // Always return a Promise for a consistent API.
  return new Promise((resolve) => resolve(graphqlImpl(args)));
}

/**
 * Same as `graphql`, for schemas whose resolvers never return a promise.
 * Throws if the result is still pending.
 */
export function graphqlSync(args: GraphQLArgs): ExecutionResult {
  const result = graphqlImpl(args);

  // Assert that the execution was synchronous.
  if (isPromise(result)) {
    throw new Error('GraphQL execution failed to complete synchronously.');
  }

  return result;
}

function graphqlImpl(args: GraphQLArgs): PromiseOrValue<ExecutionResult> {
  const {
    schema,
    source,
    rootValue,
    contextValue,
    variableValues,
    operationName,
    fieldResolver,
    typeResolver,
    signal,
    parseOptions,
  } = args;

  // Validate Schema
  const schemaValidationErrors = validateSchema(schema);
  if (schemaValidationErrors.length > 0) {
    return { errors: schemaValidationErrors };
  }

  // Parse
  let document;
  try {
    document = parse(source, parseOptions);
  } catch (syntaxError) {
    if (isSyntaxError(syntaxError)) {
      return { errors: [syntaxError] };
    }
    throw syntaxError;
  }

  // Validate
  const validationErrors = validate(schema, document);
  if (validationErrors.length > 0) {
    return { errors: validationErrors };
  }

  // Execute
  return execute({
    schema,
    document,
    rootValue,
    contextValue,
    variableValues,
    operationName,
    fieldResolver,
    typeResolver,
    signal,
  });
}
