import { inspect } from '../jsutils/inspect';
import { invariant } from '../jsutils/invariant';
import { isIterableObject } from '../jsutils/isIterableObject';
import { isObjectLike } from '../jsutils/isObjectLike';
import { isPromise } from '../jsutils/isPromise';
import type { Maybe } from '../jsutils/Maybe';
import { memoize2 } from '../jsutils/memoize2';
import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import { addPath, pathToArray } from '../jsutils/Path';
import { promiseForObject } from '../jsutils/promiseForObject';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { promiseReduce } from '../jsutils/promiseReduce';

import type { GraphQLFormattedError } from '../error/GraphQLError';
import { GraphQLError } from '../error/GraphQLError';
import { locatedError } from '../error/locatedError';

import type {
  DocumentNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
} from '../language/ast';
import { OperationTypeNode } from '../language/ast';
import { Kind } from '../language/kinds';

import type {
  GraphQLAbstractType,
  GraphQLField,
  GraphQLFieldResolver,
  GraphQLLeafType,
  GraphQLObjectType,
  GraphQLResolveInfo,
  GraphQLTypeResolver,
  TypeRef,
} from '../type/definition';
import {
  isAbstractType,
  isLeafType,
  isObjectType,
  printTypeRef,
} from '../type/definition';
import type { GraphQLSchema } from '../type/schema';
import { assertValidSchema } from '../type/validate';

import type { FieldGroup, GroupedFieldSet } from './collectFields';
import { collectFields, collectSubfields } from './collectFields';
import { ErrorCollector } from './ErrorCollector';
import { getArgumentValues, getVariableValues } from './values';

/**
 * State shared by every field of one request. Built once by
 * `buildExecutionContext` and never replaced while the request runs.
 */
export interface ExecutionContext {
  schema: GraphQLSchema;
  fragments: ObjMap<FragmentDefinitionNode>;
  rootValue: unknown;
  contextValue: unknown;
  operation: OperationDefinitionNode;
  rootType: GraphQLObjectType;
  variableValues: { [variable: string]: unknown };
  fieldResolver: GraphQLFieldResolver;
  typeResolver: GraphQLTypeResolver;
  signal: AbortSignal | undefined;
  /** The request's single subscription to `signal`. */
  abortWatch: AbortWatch | undefined;
  errors: ErrorCollector;
  /**
   * Sub-field collection memoized per return type and field group, so that
   * every item of a list reuses one grouped field set.
   */
  collectSubfields: (
    returnType: GraphQLObjectType,
    fieldGroup: FieldGroup,
  ) => GroupedFieldSet;
}

/**
 * The response to a request. `errors` is present only when non-empty; `data`
 * is absent when the request failed before execution began.
 */
export interface ExecutionResult<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> {
  errors?: ReadonlyArray<GraphQLError>;
  data?: TData | null;
  extensions?: TExtensions;
}

export interface FormattedExecutionResult<
  TData = ObjMap<unknown>,
  TExtensions = ObjMap<unknown>,
> {
  errors?: ReadonlyArray<GraphQLFormattedError>;
  data?: TData | null;
  extensions?: TExtensions;
}

export interface ExecutionArgs {
  schema: GraphQLSchema;
  document: DocumentNode;
  rootValue?: unknown;
  contextValue?: unknown;
  variableValues?: Maybe<{ readonly [variable: string]: unknown }>;
  operationName?: Maybe<string>;
  fieldResolver?: Maybe<GraphQLFieldResolver>;
  typeResolver?: Maybe<GraphQLTypeResolver>;
  /**
   * Cancels the request. Fields that have not resolved when the signal
   * aborts complete with an "Execution aborted." field error.
   */
  signal?: Maybe<AbortSignal>;
}

/**
 * Carries a field error from a non-null position up to the nearest field
 * that can be nulled in its place.
 */
class PropagatedFieldError extends Error {
  readonly fieldError: GraphQLError;
  readonly path: Path;

  constructor(fieldError: GraphQLError, path: Path) {
    super(fieldError.message);
    this.name = 'PropagatedFieldError';
    this.fieldError = fieldError;
    this.path = path;
  }
}

export const EXECUTION_ABORTED = 'EXECUTION_ABORTED';

function abortedError(): GraphQLError {
  return new GraphQLError('Execution aborted.', {
    extensions: { code: EXECUTION_ABORTED },
  });
}

interface AbortWatch {
  /** Resolves once the signal aborts. Never rejects. */
  readonly aborted: Promise<undefined>;
  readonly release: () => void;
}

/**
 * Adds one `abort` listener for the whole request; every pending field races
 * against the same `aborted` promise. `release` removes the listener once the
 * request has settled.
 */
function watchSignal(signal: AbortSignal): AbortWatch {
  let release = (): void => undefined;
  const aborted = new Promise<undefined>((resolve) => {
    if (signal.aborted) {
      resolve(undefined);
      return;
    }
    const onAbort = () => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
    release = () => signal.removeEventListener('abort', onAbort);
  });
  return { aborted, release };
}

/**
 * Settles with `promise`, or rejects with an "Execution aborted." error as
 * soon as the request aborts, whichever happens first.
 */
function withAbort<T>(
  promise: Promise<T>,
  abortWatch: AbortWatch | undefined,
): Promise<T> {
  if (abortWatch === undefined) {
    return promise;
  }
  return Promise.race([
    promise.then((value) => ({ value })),
    abortWatch.aborted,
  ]).then((settled) => {
    if (settled === undefined) {
      throw abortedError();
    }
    return settled.value;
  });
}

/**
 * Executes one operation of an already validated document.
 *
 * The result is synchronous when every resolver is, and otherwise a promise
 * that always resolves. Request errors (an unknown operation, bad variables)
 * give a response with `errors` and no `data`.
 */
export function execute(args: ExecutionArgs): PromiseOrValue<ExecutionResult> {
  const exeContext = buildExecutionContext(args);

  if (!('schema' in exeContext)) {
    return { errors: exeContext };
  }

  return executeImpl(exeContext);
}

function executeImpl(
  exeContext: ExecutionContext,
): PromiseOrValue<ExecutionResult> {
  const { abortWatch } = exeContext;
  const response = executeRoot(exeContext);
  if (abortWatch === undefined) {
    return response;
  }
  if (isPromise(response)) {
    return response.finally(abortWatch.release);
  }
  abortWatch.release();
  return response;
}

function executeRoot(
  exeContext: ExecutionContext,
): PromiseOrValue<ExecutionResult> {
  // A field error nulls the nearest nullable field above it. One that
  // reaches the root nulls `data` itself.
  const { errors } = exeContext;
  try {
    const result = executeOperation(exeContext);
    if (isPromise(result)) {
      return result.then(
        (data) => buildResponse(data, errors.toArray()),
        (error: unknown) => {
          addRootError(errors, error);
          return buildResponse(null, errors.toArray());
        },
      );
    }
    return buildResponse(result, errors.toArray());
  } catch (error) {
    addRootError(errors, error);
    return buildResponse(null, errors.toArray());
  }
}

function addRootError(errors: ErrorCollector, error: unknown): void {
  if (error instanceof PropagatedFieldError) {
    errors.add(error.fieldError, error.path);
  } else {
    errors.add(locatedError(error, undefined), undefined);
  }
}

/**
 * Like `execute`, but throws if any resolver returned a promise.
 */
export function executeSync(args: ExecutionArgs): ExecutionResult {
  const result = execute(args);

  // Assert that the execution was synchronous.
  if (isPromise(result)) {
    throw new Error('GraphQL execution failed to complete synchronously.');
  }

  return result;
}

/**
 * Assembles `{ data, errors }`, leaving `errors` out when there are none.
 */
export function buildResponse(
  data: ObjMap<unknown> | null,
  errors: ReadonlyArray<GraphQLError>,
): ExecutionResult {
  return errors.length === 0 ? { data } : { data, errors };
}

/**
 * Converts a result into its JSON-serializable form.
 */
export function formatResult(
  result: ExecutionResult,
): FormattedExecutionResult {
  const formatted: {
    errors?: ReadonlyArray<GraphQLFormattedError>;
    data?: ObjMap<unknown> | null;
    extensions?: ObjMap<unknown>;
  } = {};
  if (result.data !== undefined) {
    formatted.data = result.data;
  }
  if (result.errors !== undefined) {
    formatted.errors = result.errors.map((error) => error.toJSON());
  }
  if (result.extensions !== undefined) {
    formatted.extensions = result.extensions;
  }
  return formatted;
}

/**
 * Selects the operation, coerces the variables and gathers the fragments.
 * Returns the request errors instead when any of that fails.
 *
 * @internal
 */
export function buildExecutionContext(
  args: ExecutionArgs,
): ReadonlyArray<GraphQLError> | ExecutionContext {
  const {
    schema,
    document,
    rootValue,
    contextValue,
    variableValues: rawVariableValues,
    operationName,
    fieldResolver,
    typeResolver,
    signal,
  } = args;

  assertValidSchema(schema);

  let operation: OperationDefinitionNode | undefined;
  const fragments: ObjMap<FragmentDefinitionNode> = Object.create(null);
  for (const definition of document.definitions) {
    switch (definition.kind) {
      case Kind.OPERATION_DEFINITION:
        if (operationName == null) {
          if (operation !== undefined) {
            return [
              new GraphQLError(
                'Must provide operation name if query contains multiple operations.',
              ),
            ];
          }
          operation = definition;
        } else if (definition.name?.value === operationName) {
          operation = definition;
        }
        break;
      case Kind.FRAGMENT_DEFINITION:
        fragments[definition.name.value] = definition;
        break;
    }
  }

  if (!operation) {
    if (operationName != null) {
      return [new GraphQLError(`Unknown operation named "${operationName}".`)];
    }
    return [new GraphQLError('Must provide an operation.')];
  }

  const rootType = schema.getRootType(operation.operation);
  if (rootType == null) {
    return [
      new GraphQLError(
        `Schema is not configured to execute ${operation.operation} operation.`,
        { nodes: operation },
      ),
    ];
  }

  const variableDefinitions = operation.variableDefinitions ?? [];

  const coercedVariableValues = getVariableValues(
    schema,
    variableDefinitions,
    rawVariableValues ?? {},
    { maxErrors: 50 },
  );

  if (coercedVariableValues.errors) {
    return coercedVariableValues.errors;
  }

  const variableValues = coercedVariableValues.coerced;

  return {
    schema,
    fragments,
    rootValue,
    contextValue,
    operation,
    rootType,
    variableValues,
    fieldResolver: fieldResolver ?? defaultFieldResolver,
    typeResolver: typeResolver ?? defaultTypeResolver,
    signal: signal ?? undefined,
    abortWatch: signal != null ? watchSignal(signal) : undefined,
    errors: new ErrorCollector(),
    collectSubfields: memoize2(
      (returnType: GraphQLObjectType, fieldGroup: FieldGroup) =>
        collectSubfields(
          schema,
          fragments,
          variableValues,
          returnType,
          fieldGroup,
        ),
    ),
  };
}

/**
 * Runs the root selection set: serially for a mutation, concurrently
 * otherwise.
 */
function executeOperation(
  exeContext: ExecutionContext,
): PromiseOrValue<ObjMap<unknown>> {
  const { operation, schema, fragments, variableValues, rootValue, rootType } =
    exeContext;

  const groupedFieldSet = collectFields(
    schema,
    fragments,
    variableValues,
    rootType,
    operation.selectionSet,
  );
  const path = undefined;

  switch (operation.operation) {
    case OperationTypeNode.QUERY:
      return executeFields(
        exeContext,
        rootType,
        rootValue,
        path,
        groupedFieldSet,
      );
    case OperationTypeNode.MUTATION:
      return executeFieldsSerially(
        exeContext,
        rootType,
        rootValue,
        path,
        groupedFieldSet,
      );
    case OperationTypeNode.SUBSCRIPTION:
      // Delivering a stream of events is left to the host; a subscription
      // executed here resolves its selection once against the root value.
      return executeFields(
        exeContext,
        rootType,
        rootValue,
        path,
        groupedFieldSet,
      );
  }
}

/**
 * Each field starts only after the previous one, including its whole
 * sub-tree, has completed.
 */
function executeFieldsSerially(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  groupedFieldSet: GroupedFieldSet,
): PromiseOrValue<ObjMap<unknown>> {
  const initialResults: ObjMap<unknown> = Object.create(null);
  return promiseReduce(
    Array.from(groupedFieldSet).entries(),
    (results, [ordinal, [responseName, fieldGroup]]) => {
      const fieldPath = addPath(path, responseName, parentType.name, ordinal);
      const result = executeField(
        exeContext,
        parentType,
        sourceValue,
        fieldGroup,
        fieldPath,
      );
      if (result === undefined) {
        return results;
      }
      if (isPromise(result)) {
        return result.then((resolvedResult) => {
          results[responseName] = resolvedResult;
          return results;
        });
      }
      results[responseName] = result;
      return results;
    },
    initialResults,
  );
}

/**
 * Starts every field before waiting on any of them. The returned promise
 * settles only once all started fields have settled.
 */
function executeFields(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  groupedFieldSet: GroupedFieldSet,
): PromiseOrValue<ObjMap<unknown>> {
  const results: ObjMap<unknown> = Object.create(null);
  let containsPromise = false;
  let ordinal = 0;

  try {
    for (const [responseName, fieldGroup] of groupedFieldSet) {
      const fieldPath = addPath(path, responseName, parentType.name, ordinal++);
      const result = executeField(
        exeContext,
        parentType,
        sourceValue,
        fieldGroup,
        fieldPath,
      );

      if (result !== undefined) {
        results[responseName] = result;
        if (isPromise(result)) {
          containsPromise = true;
        }
      }
    }
  } catch (error) {
    if (containsPromise) {
      // Wait for the fields already started before passing the error on.
      return promiseForObject(results).finally(() => {
        throw error;
      });
    }
    throw error;
  }

  return containsPromise ? promiseForObject(results) : results;
}

/**
 * Resolves one field and completes its value. A field error is recorded here
 * and the field nulled, unless the field is non-null, in which case the error
 * is rethrown for the parent to handle.
 */
function executeField(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  source: unknown,
  fieldGroup: FieldGroup,
  path: Path,
): PromiseOrValue<unknown> {
  const fieldName = fieldGroup[0].name.value;
  const fieldDef = exeContext.schema.getField(parentType, fieldName);
  if (!fieldDef) {
    return;
  }

  const returnType = fieldDef.type;
  const resolveFn = fieldDef.resolve ?? exeContext.fieldResolver;

  const info = buildResolveInfo(
    exeContext,
    fieldDef,
    fieldGroup,
    parentType,
    path,
  );

  try {
    if (exeContext.signal?.aborted === true) {
      throw abortedError();
    }

    const args = getArgumentValues(
      exeContext.schema,
      fieldDef,
      fieldGroup[0],
      exeContext.variableValues,
    );

    const result = resolveFn(source, args, exeContext.contextValue, info);

    if (isPromise(result)) {
      return completePromisedValue(
        exeContext,
        returnType,
        fieldGroup,
        info,
        path,
        result,
      );
    }

    const completed = completeValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      result,
    );

    if (isPromise(completed)) {
      return completed.then(undefined, (rawError: unknown) => {
        handleFieldError(rawError, exeContext, returnType, fieldGroup, path);
        return null;
      });
    }
    return completed;
  } catch (rawError) {
    handleFieldError(rawError, exeContext, returnType, fieldGroup, path);
    return null;
  }
}

/**
 * @internal
 */
export function buildResolveInfo(
  exeContext: ExecutionContext,
  fieldDef: GraphQLField,
  fieldGroup: FieldGroup,
  parentType: GraphQLObjectType,
  path: Path,
): GraphQLResolveInfo {
  return {
    fieldName: fieldDef.name,
    fieldNodes: fieldGroup,
    returnType: fieldDef.type,
    parentType,
    path,
    schema: exeContext.schema,
    fragments: exeContext.fragments,
    rootValue: exeContext.rootValue,
    operation: exeContext.operation,
    variableValues: exeContext.variableValues,
    signal: exeContext.signal,
  };
}

function handleFieldError(
  rawError: unknown,
  exeContext: ExecutionContext,
  returnType: TypeRef,
  fieldGroup: FieldGroup,
  path: Path,
): void {
  const propagated =
    rawError instanceof PropagatedFieldError
      ? rawError
      : new PropagatedFieldError(
          locatedError(rawError, fieldGroup, pathToArray(path)),
          path,
        );

  if (returnType.kind === 'NonNullTypeRef') {
    throw propagated;
  }

  exeContext.errors.add(propagated.fieldError, propagated.path);
}

/**
 * Shapes a resolved value to `returnType`: lists item by item, leaves through
 * `serialize`, and composite values through their sub-selections. A null in
 * a non-null position throws.
 */
function completeValue(
  exeContext: ExecutionContext,
  returnType: TypeRef,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
): PromiseOrValue<unknown> {
  if (result instanceof Error) {
    throw result;
  }

  if (returnType.kind === 'NonNullTypeRef') {
    const completed = completeValue(
      exeContext,
      returnType.ofType,
      fieldGroup,
      info,
      path,
      result,
    );
    if (completed === null) {
      throw new Error(
        `Cannot return null for non-nullable field ${info.parentType.name}.${info.fieldName}.`,
      );
    }
    return completed;
  }

  if (result == null) {
    return null;
  }

  if (returnType.kind === 'ListTypeRef') {
    return completeListValue(
      exeContext,
      returnType.ofType,
      fieldGroup,
      info,
      path,
      result,
    );
  }

  const namedType = exeContext.schema.getType(returnType.name);

  if (isLeafType(namedType)) {
    return completeLeafValue(namedType, result);
  }

  if (isAbstractType(namedType)) {
    return completeAbstractValue(
      exeContext,
      namedType,
      fieldGroup,
      info,
      path,
      result,
    );
  }

  if (isObjectType(namedType)) {
    return completeObjectValue(
      exeContext,
      namedType,
      fieldGroup,
      info,
      path,
      result,
    );
  }
  // The schema was validated, so the name resolves to an output type.
  invariant(
    false,
    'Cannot complete value of unexpected output type: ' +
      printTypeRef(returnType),
  );
}

async function completePromisedValue(
  exeContext: ExecutionContext,
  returnType: TypeRef,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: Promise<unknown>,
): Promise<unknown> {
  try {
    const resolved = await withAbort(result, exeContext.abortWatch);
    let completed = completeValue(
      exeContext,
      returnType,
      fieldGroup,
      info,
      path,
      resolved,
    );
    if (isPromise(completed)) {
      completed = await completed;
    }
    return completed;
  } catch (rawError) {
    handleFieldError(rawError, exeContext, returnType, fieldGroup, path);
    return null;
  }
}

/**
 * Completes every item, then waits for all of them before settling.
 */
function completeListValue(
  exeContext: ExecutionContext,
  itemType: TypeRef,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
): PromiseOrValue<ReadonlyArray<unknown>> {
  if (!isIterableObject(result)) {
    throw new GraphQLError(
      `Expected Iterable, but did not find one for field "${info.parentType.name}.${info.fieldName}".`,
    );
  }

  let containsPromise = false;
  const completedResults: Array<unknown> = [];
  let index = 0;
  try {
    for (const item of result) {
      const itemPath = addPath(path, index, undefined);

      if (
        completeListItemValue(
          item,
          completedResults,
          exeContext,
          itemType,
          fieldGroup,
          info,
          itemPath,
        )
      ) {
        containsPromise = true;
      }

      index++;
    }
  } catch (error) {
    if (containsPromise) {
      // Wait for the items already started before passing the error on.
      return Promise.allSettled(completedResults).finally(() => {
        throw error;
      });
    }
    throw error;
  }

  return containsPromise ? joinListItems(completedResults) : completedResults;
}

/**
 * Waits for every item of a list, then rejects with the first failed item
 * if any failed.
 */
function joinListItems(
  completedResults: ReadonlyArray<unknown>,
): Promise<ReadonlyArray<unknown>> {
  return Promise.allSettled(completedResults).then((settled) =>
    settled.map((outcome) => {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      return outcome.value;
    }),
  );
}

/**
 * Pushes the completed item onto `completedResults`. Returns whether it
 * pushed a promise.
 */
function completeListItemValue(
  item: unknown,
  completedResults: Array<unknown>,
  exeContext: ExecutionContext,
  itemType: TypeRef,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  itemPath: Path,
): boolean {
  if (isPromise(item)) {
    completedResults.push(
      completePromisedValue(
        exeContext,
        itemType,
        fieldGroup,
        info,
        itemPath,
        item,
      ),
    );

    return true;
  }

  try {
    const completedItem = completeValue(
      exeContext,
      itemType,
      fieldGroup,
      info,
      itemPath,
      item,
    );

    if (isPromise(completedItem)) {
      completedResults.push(
        completedItem.then(undefined, (rawError: unknown) => {
          handleFieldError(
            rawError,
            exeContext,
            itemType,
            fieldGroup,
            itemPath,
          );
          return null;
        }),
      );

      return true;
    }

    completedResults.push(completedItem);
  } catch (rawError) {
    handleFieldError(rawError, exeContext, itemType, fieldGroup, itemPath);
    completedResults.push(null);
  }

  return false;
}

/**
 * Serializes a scalar or enum value. `serialize` must not return null.
 */
function completeLeafValue(
  returnType: GraphQLLeafType,
  result: unknown,
): unknown {
  const serializedResult = returnType.serialize(result);
  if (serializedResult == null) {
    throw new Error(
      `Expected \`${inspect(returnType)}.serialize(${inspect(result)})\` to ` +
        `return non-nullable value, returned: ${inspect(serializedResult)}`,
    );
  }
  return serializedResult;
}

/**
 * Picks the runtime object type of an interface or union value, then
 * completes the value as that type.
 */
function completeAbstractValue(
  exeContext: ExecutionContext,
  returnType: GraphQLAbstractType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
): PromiseOrValue<ObjMap<unknown>> {
  const resolveTypeFn = returnType.resolveType ?? exeContext.typeResolver;
  const contextValue = exeContext.contextValue;
  const runtimeType = resolveTypeFn(result, contextValue, info, returnType);

  if (isPromise(runtimeType)) {
    return withAbort(runtimeType, exeContext.abortWatch).then(
      (resolvedRuntimeType) =>
        completeObjectValue(
          exeContext,
          ensureValidRuntimeType(
            resolvedRuntimeType,
            exeContext,
            returnType,
            fieldGroup,
            info,
            result,
          ),
          fieldGroup,
          info,
          path,
          result,
        ),
    );
  }

  return completeObjectValue(
    exeContext,
    ensureValidRuntimeType(
      runtimeType,
      exeContext,
      returnType,
      fieldGroup,
      info,
      result,
    ),
    fieldGroup,
    info,
    path,
    result,
  );
}

function ensureValidRuntimeType(
  runtimeTypeName: unknown,
  exeContext: ExecutionContext,
  returnType: GraphQLAbstractType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  result: unknown,
): GraphQLObjectType {
  if (runtimeTypeName == null) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}". Either the "${returnType.name}" type should provide a "resolveType" function or each possible type should provide an "isTypeOf" function.`,
      { nodes: fieldGroup },
    );
  }

  if (typeof runtimeTypeName !== 'string') {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}" with ` +
        `value ${inspect(result)}, received "${inspect(runtimeTypeName)}".`,
    );
  }

  const runtimeType = exeContext.schema.getType(runtimeTypeName);
  if (runtimeType == null) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" was resolved to a type "${runtimeTypeName}" that does not exist inside the schema.`,
      { nodes: fieldGroup },
    );
  }

  if (!isObjectType(runtimeType)) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" was resolved to a non-object type "${runtimeTypeName}".`,
      { nodes: fieldGroup },
    );
  }

  if (!exeContext.schema.isSubType(returnType, runtimeType)) {
    throw new GraphQLError(
      `Runtime Object type "${runtimeType.name}" is not a possible type for "${returnType.name}".`,
      { nodes: fieldGroup },
    );
  }

  return runtimeType;
}

/**
 * Runs the sub-selections of an object value, after checking `isTypeOf`
 * where the type defines one.
 */
function completeObjectValue(
  exeContext: ExecutionContext,
  returnType: GraphQLObjectType,
  fieldGroup: FieldGroup,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
): PromiseOrValue<ObjMap<unknown>> {
  if (returnType.isTypeOf) {
    const isTypeOf = returnType.isTypeOf(result, exeContext.contextValue, info);

    if (isPromise(isTypeOf)) {
      return withAbort(isTypeOf, exeContext.abortWatch).then(
        (resolvedIsTypeOf) => {
          if (!resolvedIsTypeOf) {
            throw invalidReturnTypeError(returnType, result, fieldGroup);
          }
          return collectAndExecuteSubfields(
            exeContext,
            returnType,
            fieldGroup,
            path,
            result,
          );
        },
      );
    }

    if (!isTypeOf) {
      throw invalidReturnTypeError(returnType, result, fieldGroup);
    }
  }

  return collectAndExecuteSubfields(
    exeContext,
    returnType,
    fieldGroup,
    path,
    result,
  );
}

function invalidReturnTypeError(
  returnType: GraphQLObjectType,
  result: unknown,
  fieldGroup: FieldGroup,
): GraphQLError {
  return new GraphQLError(
    `Expected value of type "${returnType.name}" but got: ${inspect(result)}.`,
    { nodes: fieldGroup },
  );
}

function collectAndExecuteSubfields(
  exeContext: ExecutionContext,
  returnType: GraphQLObjectType,
  fieldGroup: FieldGroup,
  path: Path,
  result: unknown,
): PromiseOrValue<ObjMap<unknown>> {
  const subFieldNodes = exeContext.collectSubfields(returnType, fieldGroup);
  return executeFields(exeContext, returnType, result, path, subFieldNodes);
}

/**
 * Used for abstract types without `resolveType`. Takes the value's
 * `__typename` when it is a string, and otherwise the first possible type
 * whose `isTypeOf` accepts the value.
 */
export const defaultTypeResolver: GraphQLTypeResolver = function (
  value,
  contextValue,
  info,
  abstractType,
) {
  if (isObjectLike(value) && typeof value.__typename === 'string') {
    return value.__typename;
  }

  const possibleTypes = info.schema.getPossibleTypes(abstractType);
  const promisedIsTypeOfResults: Array<PromiseOrValue<boolean>> = [];

  for (let i = 0; i < possibleTypes.length; i++) {
    const type = possibleTypes[i];

    if (type.isTypeOf) {
      const isTypeOfResult = type.isTypeOf(value, contextValue, info);

      if (isPromise(isTypeOfResult)) {
        promisedIsTypeOfResults[i] = isTypeOfResult;
      } else if (isTypeOfResult) {
        return type.name;
      }
    }
  }

  if (promisedIsTypeOfResults.length) {
    return Promise.all(promisedIsTypeOfResults).then((isTypeOfResults) => {
      for (let i = 0; i < isTypeOfResults.length; i++) {
        if (isTypeOfResults[i]) {
          return possibleTypes[i].name;
        }
      }
      return undefined;
    });
  }
  return undefined;
};

/**
 * Used for fields without `resolve`. Reads the source property named like
 * the field, calling it with `(args, contextValue, info)` when it is a method.
 */
export const defaultFieldResolver: GraphQLFieldResolver = function (
  source,
  args,
  contextValue,
  info,
) {
  if (isObjectLike(source)) {
    const property = source[info.fieldName];
    if (typeof property === 'function') {
      const result: unknown = property.call(source, args, contextValue, info);
      return result;
    }
    return property;
  }
  return undefined;
};
