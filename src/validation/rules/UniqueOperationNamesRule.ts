import type { ObjMap } from '../../jsutils/ObjMap';

import { ValidationError } from '../../error/ValidationError';

import type { NameNode } from '../../language/ast';
import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * Unique operation names
 *
 * A GraphQL document is only valid if all defined operations have unique names.
 */
export function UniqueOperationNamesRule(
  context: ValidationContext,
): ASTVisitor {
  const knownOperationNames: ObjMap<NameNode> = Object.create(null);
  return {
    OperationDefinition(node) {
      const operationName = node.name;
      if (operationName) {
        const knownName = knownOperationNames[operationName.value];
        if (knownName) {
          context.reportError(
            new ValidationError(
              'UniqueOperationNamesRule',
              `There can be only one operation named "${operationName.value}".`,
              [knownName, operationName],
            ),
          );
        } else {
          knownOperationNames[operationName.value] = operationName;
        }
      }
      return false;
    },
    FragmentDefinition: () => false,
  };
}
