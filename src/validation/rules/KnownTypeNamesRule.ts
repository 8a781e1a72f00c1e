import { didYouMean } from '../../jsutils/didYouMean';
import { suggestionList } from '../../jsutils/suggestionList';

import { ValidationError } from '../../error/ValidationError';

import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * Known type names
 *
 * A GraphQL document is only valid if referenced types (specifically
 * variable definitions and fragment conditions) are defined by the type schema.
 */
export function KnownTypeNamesRule(context: ValidationContext): ASTVisitor {
  const schema = context.getSchema();
  const typeNames = Object.keys(schema.getTypeMap());

  return {
    NamedType(node) {
      const typeName = node.name.value;
      if (schema.getType(typeName) === undefined) {
        const suggestedTypes = suggestionList(typeName, typeNames);
        context.reportError(
          new ValidationError(
            'KnownTypeNamesRule',
            `Unknown type "${typeName}".` + didYouMean(suggestedTypes),
            node,
          ),
        );
      }
    },
  };
}
