import { inspect } from '../jsutils/inspect';
import { keyMap } from '../jsutils/keyMap';
import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap } from '../jsutils/ObjMap';
import { printPathArray } from '../jsutils/printPathArray';

import { GraphQLError } from '../error/GraphQLError';

import type {
  DirectiveNode,
  FieldNode,
  VariableDefinitionNode,
} from '../language/ast';
import { Kind } from '../language/kinds';
import { print } from '../language/printer';

import type { GraphQLArgument } from '../type/definition';
import { isInputType, printTypeRef } from '../type/definition';
import type { GraphQLDirective } from '../type/directives';
import type { GraphQLSchema } from '../type/schema';

import { coerceInputValue } from '../utilities/coerceInputValue';
import { typeFromAST } from '../utilities/typeFromAST';
import { valueFromAST } from '../utilities/valueFromAST';

type CoercedVariableValues =
  | { errors: ReadonlyArray<GraphQLError>; coerced?: never }
  | { coerced: { [variable: string]: unknown }; errors?: never };

/**
 * Coerces the raw variable inputs of a request against the operation's
 * variable definitions, filling in defaults. On failure returns the errors
 * instead: at most `maxErrors` of them, then one reporting the limit.
 *
 * @internal
 */
export function getVariableValues(
  schema: GraphQLSchema,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
  inputs: { readonly [variable: string]: unknown },
  options?: { maxErrors?: number },
): CoercedVariableValues {
  const errors: Array<GraphQLError> = [];
  const maxErrors = options?.maxErrors;
  const coerced = coerceVariableValues(
    schema,
    varDefNodes,
    inputs,
    (error) => {
      if (maxErrors != null && errors.length >= maxErrors) {
        throw new TooManyVariableErrors();
      }
      errors.push(error);
    },
  );

  if (coerced === undefined) {
    errors.push(
      new GraphQLError(
        'Too many errors processing variables, error limit reached. Execution aborted.',
      ),
    );
    return { errors };
  }
  if (errors.length === 0) {
    return { coerced };
  }
  return { errors };
}

class TooManyVariableErrors extends Error {}

function coerceVariableValues(
  schema: GraphQLSchema,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
  inputs: { readonly [variable: string]: unknown },
  onError: (error: GraphQLError) => void,
): { [variable: string]: unknown } | undefined {
  const coercedValues: { [variable: string]: unknown } = {};
  try {
    for (const varDefNode of varDefNodes) {
      coerceVariableValue(schema, varDefNode, inputs, coercedValues, onError);
    }
  } catch (error) {
    if (error instanceof TooManyVariableErrors) {
      return undefined;
    }
    throw error;
  }
  return coercedValues;
}

function coerceVariableValue(
  schema: GraphQLSchema,
  varDefNode: VariableDefinitionNode,
  inputs: { readonly [variable: string]: unknown },
  coercedValues: { [variable: string]: unknown },
  onError: (error: GraphQLError) => void,
): void {
  const varName = varDefNode.variable.name.value;
  const varType = typeFromAST(schema, varDefNode.type);
  if (varType === undefined || !isInputType(schema.getNamedType(varType))) {
    const varTypeStr = print(varDefNode.type);
    onError(
      new GraphQLError(
        `Variable "$${varName}" expected value of type "${varTypeStr}" which cannot be used as an input type.`,
        { nodes: varDefNode.type },
      ),
    );
    return;
  }

  if (!hasOwnProperty(inputs, varName)) {
    if (varDefNode.defaultValue) {
      coercedValues[varName] = valueFromAST(
        schema,
        varDefNode.defaultValue,
        varType,
      );
    } else if (varType.kind === 'NonNullTypeRef') {
      const varTypeStr = printTypeRef(varType);
      onError(
        new GraphQLError(
          `Variable "$${varName}" of required type "${varTypeStr}" was not provided.`,
          { nodes: varDefNode },
        ),
      );
    }
    return;
  }

  const value = inputs[varName];
  if (value === null && varType.kind === 'NonNullTypeRef') {
    const varTypeStr = printTypeRef(varType);
    onError(
      new GraphQLError(
        `Variable "$${varName}" of non-null type "${varTypeStr}" must not be null.`,
        { nodes: varDefNode },
      ),
    );
    return;
  }

  coercedValues[varName] = coerceInputValue(
    schema,
    value,
    varType,
    (path, invalidValue, error) => {
      let prefix =
        `Variable "$${varName}" got invalid value ` + inspect(invalidValue);
      if (path.length > 0) {
        prefix += ` at "${varName}${printPathArray(path)}"`;
      }
      onError(
        new GraphQLError(prefix + '; ' + error.message, {
          nodes: varDefNode,
          originalError: error.originalError,
        }),
      );
    },
  );
}

/**
 * Coerces the arguments written on a field or directive, taking variables
 * from `variableValues` and defaults from the definitions. Arguments neither
 * written nor defaulted are left out.
 *
 * @internal
 */
export function getArgumentValues(
  schema: GraphQLSchema,
  def: { readonly args: ReadonlyArray<GraphQLArgument> },
  node: FieldNode | DirectiveNode,
  variableValues?: Maybe<ObjMap<unknown>>,
): { [argument: string]: unknown } {
  const coercedValues: { [argument: string]: unknown } = {};

  const argumentNodes = node.arguments ?? [];
  const argNodeMap = keyMap(argumentNodes, (arg) => arg.name.value);

  for (const argDef of def.args) {
    const name = argDef.name;
    const argType = argDef.type;
    const argumentNode = argNodeMap[name];

    if (argumentNode === undefined) {
      if (argDef.defaultValue !== undefined) {
        coercedValues[name] = argDef.defaultValue;
      } else if (argType.kind === 'NonNullTypeRef') {
        throw new GraphQLError(
          `Argument "${name}" of required type "${printTypeRef(argType)}" ` +
            'was not provided.',
          { nodes: node },
        );
      }
      continue;
    }

    const valueNode = argumentNode.value;
    let isNull = valueNode.kind === Kind.NULL;

    if (valueNode.kind === Kind.VARIABLE) {
      const variableName = valueNode.name.value;
      if (
        variableValues == null ||
        !hasOwnProperty(variableValues, variableName)
      ) {
        if (argDef.defaultValue !== undefined) {
          coercedValues[name] = argDef.defaultValue;
        } else if (argType.kind === 'NonNullTypeRef') {
          throw new GraphQLError(
            `Argument "${name}" of required type "${printTypeRef(argType)}" ` +
              `was provided the variable "$${variableName}" which was not provided a runtime value.`,
            { nodes: valueNode },
          );
        }
        continue;
      }
      isNull = variableValues[variableName] == null;
    }

    if (isNull && argType.kind === 'NonNullTypeRef') {
      throw new GraphQLError(
        `Argument "${name}" of non-null type "${printTypeRef(argType)}" ` +
          'must not be null.',
        { nodes: valueNode },
      );
    }

    const coercedValue = valueFromAST(
      schema,
      valueNode,
      argType,
      variableValues,
    );
    if (coercedValue === undefined) {
      throw new GraphQLError(
        `Argument "${name}" has invalid value ${print(valueNode)}.`,
        { nodes: valueNode },
      );
    }
    coercedValues[name] = coercedValue;
  }
  return coercedValues;
}

/**
 * The coerced arguments of the first `directiveDef` on `node`, or undefined
 * when the node does not carry it.
 */
export function getDirectiveValues(
  schema: GraphQLSchema,
  directiveDef: GraphQLDirective,
  node: { readonly directives?: ReadonlyArray<DirectiveNode> },
  variableValues?: Maybe<ObjMap<unknown>>,
): undefined | { [argument: string]: unknown } {
  const directiveNode = node.directives?.find(
    (directive) => directive.name.value === directiveDef.name,
  );

  if (directiveNode) {
    return getArgumentValues(schema, directiveDef, directiveNode, variableValues);
  }
}

function hasOwnProperty(obj: object, prop: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, prop);
}
