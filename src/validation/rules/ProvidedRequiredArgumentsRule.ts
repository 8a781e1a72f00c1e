import type { ObjMap } from '../../jsutils/ObjMap';

import { ValidationError } from '../../error/ValidationError';

import type { ASTVisitor } from '../../language/visitor';

import type { GraphQLArgument } from '../../type/definition';
import { isRequiredArgument, printTypeRef } from '../../type/definition';

import type { ValidationContext } from '../ValidationContext';

/**
 * Provided required arguments
 *
 * A field or directive is only valid if all required (non-null without a
 * default value) field arguments have been provided.
 */
export function ProvidedRequiredArgumentsRule(
  context: ValidationContext,
): ASTVisitor {
  const requiredArgsMap: ObjMap<ReadonlyArray<GraphQLArgument>> =
    Object.create(null);
  for (const directive of context.getSchema().getDirectives()) {
    requiredArgsMap[directive.name] = directive.args.filter(isRequiredArgument);
  }

  return {
    Field: {
      // Validate on leave to allow for deeper errors to appear first.
      leave(fieldNode) {
        const fieldDef = context.getFieldDef();
        if (!fieldDef) {
          return false;
        }

        const providedArgs = new Set(
          fieldNode.arguments?.map((arg) => arg.name.value),
        );
        for (const argDef of fieldDef.args) {
          if (!providedArgs.has(argDef.name) && isRequiredArgument(argDef)) {
            const argTypeStr = printTypeRef(argDef.type);
            context.reportError(
              new ValidationError(
                'ProvidedRequiredArgumentsRule',
                `Field "${fieldDef.name}" argument "${argDef.name}" of type "${argTypeStr}" is required, but it was not provided.`,
                fieldNode,
              ),
            );
          }
        }
      },
    },
    Directive: {
      // Validate on leave to allow for deeper errors to appear first.
      leave(directiveNode) {
        const directiveName = directiveNode.name.value;
        const requiredArgs = requiredArgsMap[directiveName];
        if (requiredArgs) {
          const argNodes = directiveNode.arguments ?? [];
          const argNodeMap = new Set(argNodes.map((arg) => arg.name.value));
          for (const argDef of requiredArgs) {
            if (!argNodeMap.has(argDef.name)) {
              const argType = printTypeRef(argDef.type);
              context.reportError(
                new ValidationError(
                  'ProvidedRequiredArgumentsRule',
                  `Directive "@${directiveName}" argument "${argDef.name}" of type "${argType}" is required, but it was not provided.`,
                  directiveNode,
                ),
              );
            }
          }
        }
      },
    },
  };
}
