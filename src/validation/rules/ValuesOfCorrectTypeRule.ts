import { didYouMean } from '../../jsutils/didYouMean';
import { keyMap } from '../../jsutils/keyMap';
import { suggestionList } from '../../jsutils/suggestionList';

import { isGraphQLError } from '../../error/isGraphQLError';
import { ValidationError } from '../../error/ValidationError';

import type { ValueNode } from '../../language/ast';
import { print } from '../../language/printer';
import type { ASTVisitor } from '../../language/visitor';

import {
  getNullableTypeRef,
  isInputObjectType,
  isLeafType,
  isRequiredInputField,
  printTypeRef,
} from '../../type/definition';

import type { ValidationContext } from '../ValidationContext';

/**
 * Value literals of correct type
 *
 * A GraphQL document is only valid if all value literals are of the type
 * expected at their position.
 */
export function ValuesOfCorrectTypeRule(
  context: ValidationContext,
): ASTVisitor {
  const schema = context.getSchema();
  return {
    ListValue(node) {
      // Note: TypeInfo will traverse into a list's item type, so look to the
      // parent input type to check if it is a list.
      const parentType = context.getParentInputType();
      const type = parentType ? getNullableTypeRef(parentType) : undefined;
      if (type?.kind !== 'ListTypeRef') {
        isValidValueNode(context, node);
        return false; // Don't traverse further.
      }
    },
    ObjectValue(node) {
      const inputType = context.getInputType();
      const type = inputType ? schema.getNamedType(inputType) : undefined;
      if (!isInputObjectType(type)) {
        isValidValueNode(context, node);
        return false; // Don't traverse further.
      }
      // Ensure every required field exists.
      const fieldNodeMap = keyMap(node.fields, (field) => field.name.value);
      for (const fieldDef of Object.values(type.getFields())) {
        const fieldNode = fieldNodeMap[fieldDef.name];
        if (!fieldNode && isRequiredInputField(fieldDef)) {
          const typeStr = printTypeRef(fieldDef.type);
          context.reportError(
            new ValidationError(
              'ValuesOfCorrectTypeRule',
              `Field "${type.name}.${fieldDef.name}" of required type "${typeStr}" was not provided.`,
              node,
            ),
          );
        }
      }
    },
    ObjectField(node) {
      const parentInputType = context.getParentInputType();
      const parentType = parentInputType
        ? schema.getNamedType(parentInputType)
        : undefined;
      const fieldType = context.getInputType();
      if (!fieldType && isInputObjectType(parentType)) {
        const suggestions = suggestionList(
          node.name.value,
          Object.keys(parentType.getFields()),
        );
        context.reportError(
          new ValidationError(
            'ValuesOfCorrectTypeRule',
            `Field "${node.name.value}" is not defined by type "${parentType.name}".` +
              didYouMean(suggestions),
            node,
          ),
        );
      }
    },
    NullValue(node) {
      const type = context.getInputType();
      if (type?.kind === 'NonNullTypeRef') {
        context.reportError(
          new ValidationError(
            'ValuesOfCorrectTypeRule',
            `Expected value of type "${printTypeRef(type)}", found ${print(
              node,
            )}.`,
            node,
          ),
        );
      }
    },
    EnumValue: (node) => isValidValueNode(context, node),
    IntValue: (node) => isValidValueNode(context, node),
    FloatValue: (node) => isValidValueNode(context, node),
    StringValue: (node) => isValidValueNode(context, node),
    BooleanValue: (node) => isValidValueNode(context, node),
  };
}

/**
 * Any value literal may be a valid representation of a Scalar, depending on
 * that scalar type.
 */
function isValidValueNode(context: ValidationContext, node: ValueNode): void {
  // Report any error at the full type expected by the location.
  const locationType = context.getInputType();
  if (!locationType) {
    return;
  }

  const type = context.getSchema().getNamedType(locationType);
  const typeStr = printTypeRef(locationType);

  if (!isLeafType(type)) {
    context.reportError(
      new ValidationError(
        'ValuesOfCorrectTypeRule',
        `Expected value of type "${typeStr}", found ${print(node)}.`,
        node,
      ),
    );
    return;
  }

  // Scalars and Enums determine if a literal value is valid via parseLiteral(),
  // which may throw or return undefined to indicate an invalid value.
  try {
    const parseResult = type.parseLiteral(node, undefined);
    if (parseResult === undefined) {
      context.reportError(
        new ValidationError(
          'ValuesOfCorrectTypeRule',
          `Expected value of type "${typeStr}", found ${print(node)}.`,
          node,
        ),
      );
    }
  } catch (error) {
    let message: string;
    if (isGraphQLError(error)) {
      message = error.message;
    } else {
      message =
        `Expected value of type "${typeStr}", found ${print(node)}; ` +
        (error instanceof Error ? error.message : String(error));
    }
    context.reportError(
      new ValidationError('ValuesOfCorrectTypeRule', message, node),
    );
  }
}
