import { ValidationError } from '../../error/ValidationError';

import type { ASTVisitor } from '../../language/visitor';

import { isLeafType, printTypeRef } from '../../type/definition';

import type { ValidationContext } from '../ValidationContext';

/**
 * Scalar leafs
 *
 * A GraphQL document is valid only if all leaf fields (fields without
 * sub selections) are of scalar or enum types.
 */
export function ScalarLeafsRule(context: ValidationContext): ASTVisitor {
  const schema = context.getSchema();
  return {
    Field(node) {
      const type = context.getType();
      const selectionSet = node.selectionSet;
      if (!type) {
        return;
      }
      const namedType = schema.getNamedType(type);
      if (namedType === undefined) {
        return;
      }
      const fieldName = node.name.value;
      const typeStr = printTypeRef(type);
      if (isLeafType(namedType)) {
        if (selectionSet) {
          context.reportError(
            new ValidationError(
              'ScalarLeafsRule',
              `Field "${fieldName}" must not have a selection since type "${typeStr}" has no subfields.`,
              selectionSet,
            ),
          );
        }
      } else if (!selectionSet) {
        context.reportError(
          new ValidationError(
            'ScalarLeafsRule',
            `Field "${fieldName}" of type "${typeStr}" must have a selection of subfields. Did you mean "${fieldName} { ... }"?`,
            node,
          ),
        );
      }
    },
  };
}
