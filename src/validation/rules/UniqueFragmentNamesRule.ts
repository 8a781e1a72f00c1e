import type { ObjMap } from '../../jsutils/ObjMap';

import { ValidationError } from '../../error/ValidationError';

import type { NameNode } from '../../language/ast';
import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * Unique fragment names
 *
 * A GraphQL document is only valid if all defined fragments have unique names.
 */
export function UniqueFragmentNamesRule(
  context: ValidationContext,
): ASTVisitor {
  const knownFragmentNames: ObjMap<NameNode> = Object.create(null);
  return {
    OperationDefinition: () => false,
    FragmentDefinition(node) {
      const fragmentName = node.name.value;
      const knownName = knownFragmentNames[fragmentName];
      if (knownName) {
        context.reportError(
          new ValidationError(
            'UniqueFragmentNamesRule',
            `There can be only one fragment named "${fragmentName}".`,
            [knownName, node.name],
          ),
        );
      } else {
        knownFragmentNames[fragmentName] = node.name;
      }
      return false;
    },
  };
}
