import type { Maybe } from '../../jsutils/Maybe';

import { ValidationError } from '../../error/ValidationError';

import type { FragmentSpreadNode } from '../../language/ast';
import type { ASTVisitor } from '../../language/visitor';

import type { GraphQLCompositeType } from '../../type/definition';
import { isCompositeType } from '../../type/definition';

import { doTypesOverlap } from '../../utilities/typeComparators';
import { typeFromAST } from '../../utilities/typeFromAST';

import type { ValidationContext } from '../ValidationContext';

/**
 * Possible fragment spread
 *
 * A fragment spread is only valid if the type condition could ever possibly
 * be true: if there is a non-empty intersection of the possible parent types,
 * and possible types which pass the type condition.
 */
export function PossibleFragmentSpreadsRule(
  context: ValidationContext,
): ASTVisitor {
  const schema = context.getSchema();
  return {
    InlineFragment(node) {
      const type = context.getType();
      const fragType = type ? schema.getNamedType(type) : undefined;
      const parentType = context.getParentType();
      if (
        isCompositeType(fragType) &&
        isCompositeType(parentType) &&
        !doTypesOverlap(schema, fragType.name, parentType.name)
      ) {
        context.reportError(
          new ValidationError(
            'PossibleFragmentSpreadsRule',
            `Fragment cannot be spread here as objects of type "${parentType.name}" can never be of type "${fragType.name}".`,
            node,
          ),
        );
      }
    },
    FragmentSpread(node) {
      const fragName = node.name.value;
      const fragType = getFragmentType(context, node);
      const parentType = context.getParentType();
      if (
        fragType &&
        parentType &&
        !doTypesOverlap(schema, fragType.name, parentType.name)
      ) {
        context.reportError(
          new ValidationError(
            'PossibleFragmentSpreadsRule',
            `Fragment "${fragName}" cannot be spread here as objects of type "${parentType.name}" can never be of type "${fragType.name}".`,
            node,
          ),
        );
      }
    },
  };
}

function getFragmentType(
  context: ValidationContext,
  node: FragmentSpreadNode,
): Maybe<GraphQLCompositeType> {
  const frag = context.getFragment(node.name.value);
  if (frag) {
    const schema = context.getSchema();
    const type = typeFromAST(schema, frag.typeCondition);
    const namedType = type ? schema.getNamedType(type) : undefined;
    if (isCompositeType(namedType)) {
      return namedType;
    }
  }
}
