import type { ObjMap } from '../../jsutils/ObjMap';

import { ValidationError } from '../../error/ValidationError';

import type { DirectiveNode } from '../../language/ast';
import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * Unique directive names per location
 *
 * A GraphQL document is only valid if all non-repeatable directives at
 * a given location are uniquely named.
 */
export function UniqueDirectivesPerLocationRule(
  context: ValidationContext,
): ASTVisitor {
  const uniqueDirectiveMap: ObjMap<boolean> = Object.create(null);

  for (const directive of context.getSchema().getDirectives()) {
    uniqueDirectiveMap[directive.name] = !directive.isRepeatable;
  }

  return {
    // Many different AST nodes may contain directives. Rather than listing
    // them all, just listen for entering any node, and check to see if it
    // defines any directives.
    enter(node) {
      if (!('directives' in node) || !node.directives) {
        return;
      }

      const knownDirectives: ObjMap<DirectiveNode> = Object.create(null);
      for (const directive of node.directives) {
        const directiveName = directive.name.value;

        if (uniqueDirectiveMap[directiveName]) {
          const seenDirective = knownDirectives[directiveName];
          if (seenDirective) {
            context.reportError(
              new ValidationError(
                'UniqueDirectivesPerLocationRule',
                `The directive "@${directiveName}" can only be used once at this location.`,
                [seenDirective, directive],
              ),
            );
          } else {
            knownDirectives[directiveName] = directive;
          }
        }
      }
    },
  };
}
