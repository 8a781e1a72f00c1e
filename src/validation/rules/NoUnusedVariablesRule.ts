import { ValidationError } from '../../error/ValidationError';

import type { VariableDefinitionNode } from '../../language/ast';
import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * No unused variables
 *
 * A GraphQL operation is only valid if all variables defined by an operation
 * are used, either directly or within a spread fragment.
 */
export function NoUnusedVariablesRule(context: ValidationContext): ASTVisitor {
  let variableDefs: Array<VariableDefinitionNode> = [];

  return {
    OperationDefinition: {
      enter() {
        variableDefs = [];
      },
      leave(operation) {
        const variableNameUsed = new Set<string>();
        const usages = context.getRecursiveVariableUsages(operation);

        for (const { node } of usages) {
          variableNameUsed.add(node.name.value);
        }

        for (const variableDef of variableDefs) {
          const variableName = variableDef.variable.name.value;
          if (!variableNameUsed.has(variableName)) {
            context.reportError(
              new ValidationError(
                'NoUnusedVariablesRule',
                operation.name
                  ? `Variable "$${variableName}" is never used in operation "${operation.name.value}".`
                  : `Variable "$${variableName}" is never used.`,
                variableDef,
              ),
            );
          }
        }
      },
    },
    VariableDefinition(def) {
      variableDefs.push(def);
    },
  };
}
