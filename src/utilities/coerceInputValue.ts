import { didYouMean } from '../jsutils/didYouMean';
import { inspect } from '../jsutils/inspect';
import { invariant } from '../jsutils/invariant';
import { isIterableObject } from '../jsutils/isIterableObject';
import { isObjectLike } from '../jsutils/isObjectLike';
import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import { addPath, pathToArray } from '../jsutils/Path';
import { printPathArray } from '../jsutils/printPathArray';
import { suggestionList } from '../jsutils/suggestionList';

import { GraphQLError } from '../error/GraphQLError';
import { isGraphQLError } from '../error/isGraphQLError';

import type { TypeRef } from '../type/definition';
import {
  isInputObjectType,
  isLeafType,
  printTypeRef,
} from '../type/definition';
import type { GraphQLSchema } from '../type/schema';

type OnErrorCB = (
  path: ReadonlyArray<string | number>,
  invalidValue: unknown,
  error: GraphQLError,
) => void;

/**
 * Coerces a JavaScript value given a GraphQL Input Type.
 */
export function coerceInputValue(
  schema: GraphQLSchema,
  inputValue: unknown,
  type: TypeRef,
  onError: OnErrorCB = defaultOnError,
): unknown {
  return coerceInputValueImpl(schema, inputValue, type, onError, undefined);
}

function defaultOnError(
  path: ReadonlyArray<string | number>,
  invalidValue: unknown,
  error: GraphQLError,
): void {
  let errorPrefix = 'Invalid value ' + inspect(invalidValue);
  if (path.length > 0) {
    errorPrefix += ` at "value${printPathArray(path)}"`;
  }
  throw new GraphQLError(errorPrefix + ': ' + error.message, {
    originalError: error.originalError,
  });
}

function coerceInputValueImpl(
  schema: GraphQLSchema,
  inputValue: unknown,
  type: TypeRef,
  onError: OnErrorCB,
  path: Path | undefined,
): unknown {
  if (type.kind === 'NonNullTypeRef') {
    if (inputValue != null) {
      return coerceInputValueImpl(
        schema,
        inputValue,
        type.ofType,
        onError,
        path,
      );
    }
    onError(
      pathToArray(path),
      inputValue,
      new GraphQLError(
        `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
      ),
    );
    return;
  }

  if (inputValue == null) {
    // Explicitly return the value null.
    return null;
  }

  if (type.kind === 'ListTypeRef') {
    const itemType = type.ofType;
    if (isIterableObject(inputValue)) {
      return Array.from(inputValue, (itemValue, index) => {
        const itemPath = addPath(path, index, undefined);
        return coerceInputValueImpl(
          schema,
          itemValue,
          itemType,
          onError,
          itemPath,
        );
      });
    }
    // Lists accept a non-list value as a list of one.
    return [coerceInputValueImpl(schema, inputValue, itemType, onError, path)];
  }

  const namedType = schema.getType(type.name);

  if (isInputObjectType(namedType)) {
    if (!isObjectLike(inputValue)) {
      onError(
        pathToArray(path),
        inputValue,
        new GraphQLError(`Expected type "${namedType.name}" to be an object.`),
      );
      return;
    }

    const coercedValue: ObjMap<unknown> = {};
    const fieldDefs = namedType.getFields();

    for (const field of Object.values(fieldDefs)) {
      const fieldValue = inputValue[field.name];

      if (fieldValue === undefined) {
        if (field.defaultValue !== undefined) {
          coercedValue[field.name] = field.defaultValue;
        } else if (field.type.kind === 'NonNullTypeRef') {
          const typeStr = printTypeRef(field.type);
          onError(
            pathToArray(path),
            inputValue,
            new GraphQLError(
              `Field "${field.name}" of required type "${typeStr}" was not provided.`,
            ),
          );
        }
        continue;
      }

      coercedValue[field.name] = coerceInputValueImpl(
        schema,
        fieldValue,
        field.type,
        onError,
        addPath(path, field.name, namedType.name),
      );
    }

    // Ensure every provided field is defined.
    for (const fieldName of Object.keys(inputValue)) {
      if (fieldDefs[fieldName] === undefined) {
        const suggestions = suggestionList(
          fieldName,
          Object.keys(namedType.getFields()),
        );
        onError(
          pathToArray(path),
          inputValue,
          new GraphQLError(
            `Field "${fieldName}" is not defined by type "${namedType.name}".` +
              didYouMean(suggestions),
          ),
        );
      }
    }
    return coercedValue;
  }

  if (isLeafType(namedType)) {
    let parseResult: unknown;

    // Scalars and Enums determine if a input value is valid via parseValue(),
    // which can throw to indicate failure. If it throws, maintain a reference
    // to the original error.
    try {
      parseResult = namedType.parseValue(inputValue);
    } catch (error) {
      if (isGraphQLError(error)) {
        onError(pathToArray(path), inputValue, error);
      } else {
        const originalError =
          error instanceof Error ? error : new Error(String(error));
        onError(
          pathToArray(path),
          inputValue,
          new GraphQLError(
            `Expected type "${namedType.name}". ` + originalError.message,
            { originalError },
          ),
        );
      }
      return;
    }
    if (parseResult === undefined) {
      onError(
        pathToArray(path),
        inputValue,
        new GraphQLError(`Expected type "${namedType.name}".`),
      );
    }
    return parseResult;
  }
  /* c8 ignore next 3 */
  // Not reachable, all possible types have been considered.
  invariant(false, 'Unexpected input type: ' + printTypeRef(type));
}
