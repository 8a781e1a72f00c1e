import { didYouMean } from '../../jsutils/didYouMean';
import type { ObjMap } from '../../jsutils/ObjMap';
import { suggestionList } from '../../jsutils/suggestionList';

import { ValidationError } from '../../error/ValidationError';

import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * Known argument names
 *
 * A GraphQL field or directive is only valid if all supplied arguments are
 * defined by that field or directive.
 */
export function KnownArgumentNamesRule(context: ValidationContext): ASTVisitor {
  const directiveArgs: ObjMap<ReadonlyArray<string>> = Object.create(null);
  for (const directive of context.getSchema().getDirectives()) {
    directiveArgs[directive.name] = directive.args.map((arg) => arg.name);
  }

  return {
    Argument(argNode) {
      const argDef = context.getArgument();
      const fieldDef = context.getFieldDef();
      const parentType = context.getParentType();

      if (!argDef && fieldDef && parentType) {
        const argName = argNode.name.value;
        const knownArgsNames = fieldDef.args.map((arg) => arg.name);
        const suggestions = suggestionList(argName, knownArgsNames);
        context.reportError(
          new ValidationError(
            'KnownArgumentNamesRule',
            `Unknown argument "${argName}" on field "${parentType.name}.${fieldDef.name}".` +
              didYouMean(suggestions),
            argNode,
          ),
        );
      }
    },
    Directive(directiveNode) {
      const directiveName = directiveNode.name.value;
      const knownArgs = directiveArgs[directiveName];

      if (directiveNode.arguments && knownArgs) {
        for (const argNode of directiveNode.arguments) {
          const argName = argNode.name.value;
          if (!knownArgs.includes(argName)) {
            const suggestions = suggestionList(argName, knownArgs);
            context.reportError(
              new ValidationError(
                'KnownArgumentNamesRule',
                `Unknown argument "${argName}" on directive "@${directiveName}".` +
                  didYouMean(suggestions),
                argNode,
              ),
            );
          }
        }
      }

      return false;
    },
  };
}
