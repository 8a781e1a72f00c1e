import { ValidationError } from '../../error/ValidationError';

import { print } from '../../language/printer';
import type { ASTVisitor } from '../../language/visitor';

import { isCompositeType } from '../../type/definition';

import { typeFromAST } from '../../utilities/typeFromAST';

import type { ValidationContext } from '../ValidationContext';

/**
 * Fragments on composite type
 *
 * Fragments use a type condition to determine if they apply, since fragments
 * can only be spread into a composite type (object, interface, or union), the
 * type condition must also be a composite type.
 */
export function FragmentsOnCompositeTypesRule(
  context: ValidationContext,
): ASTVisitor {
  const schema = context.getSchema();
  return {
    InlineFragment(node) {
      const typeCondition = node.typeCondition;
      if (typeCondition) {
        const type = typeFromAST(schema, typeCondition);
        if (type && !isCompositeType(schema.getNamedType(type))) {
          const typeStr = print(typeCondition);
          context.reportError(
            new ValidationError(
              'FragmentsOnCompositeTypesRule',
              `Fragment cannot condition on non composite type "${typeStr}".`,
              typeCondition,
            ),
          );
        }
      }
    },
    FragmentDefinition(node) {
      const type = typeFromAST(schema, node.typeCondition);
      if (type && !isCompositeType(schema.getNamedType(type))) {
        const typeStr = print(node.typeCondition);
        context.reportError(
          new ValidationError(
            'FragmentsOnCompositeTypesRule',
            `Fragment "${node.name.value}" cannot condition on non composite type "${typeStr}".`,
            node.typeCondition,
          ),
        );
      }
    },
  };
}
