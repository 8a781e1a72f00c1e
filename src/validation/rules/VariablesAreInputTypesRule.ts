import { ValidationError } from '../../error/ValidationError';

import { print } from '../../language/printer';
import type { ASTVisitor } from '../../language/visitor';

import { isInputType } from '../../type/definition';

import { typeFromAST } from '../../utilities/typeFromAST';

import type { ValidationContext } from '../ValidationContext';

/**
 * Variables are input types
 *
 * A GraphQL operation is only valid if all the variables it defines are of
 * input types (scalar, enum, or input object).
 */
export function VariablesAreInputTypesRule(
  context: ValidationContext,
): ASTVisitor {
  const schema = context.getSchema();
  return {
    VariableDefinition(node) {
      const type = typeFromAST(schema, node.type);

      if (type !== undefined && !isInputType(schema.getNamedType(type))) {
        const variableName = node.variable.name.value;
        const typeName = print(node.type);

        context.reportError(
          new ValidationError(
            'VariablesAreInputTypesRule',
            `Variable "$${variableName}" cannot be non-input type "${typeName}".`,
            node.type,
          ),
        );
      }
    },
  };
}
