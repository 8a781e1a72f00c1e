import { invariant } from '../../jsutils/invariant';
import type { ObjMap } from '../../jsutils/ObjMap';

import { ValidationError } from '../../error/ValidationError';

import type { ASTNode } from '../../language/ast';
import { OperationTypeNode } from '../../language/ast';
import { DirectiveLocation } from '../../language/directiveLocation';
import { Kind } from '../../language/kinds';
import type { ASTVisitor } from '../../language/visitor';

import type { ValidationContext } from '../ValidationContext';

/**
 * Known directives
 *
 * A GraphQL document is only valid if all `@directives` are known by the
 * schema and legally positioned.
 */
export function KnownDirectivesRule(context: ValidationContext): ASTVisitor {
  const locationsMap: ObjMap<ReadonlyArray<DirectiveLocation>> =
    Object.create(null);

  for (const directive of context.getSchema().getDirectives()) {
    locationsMap[directive.name] = directive.locations;
  }

  return {
    Directive(node, parent) {
      const name = node.name.value;
      const locations = locationsMap[name];

      if (locations === undefined) {
        context.reportError(
          new ValidationError(
            'KnownDirectivesRule',
            `Unknown directive "@${name}".`,
            node,
          ),
        );
        return;
      }

      invariant(parent !== undefined, 'A directive is always owned by a node.');
      const candidateLocation = getDirectiveLocationForNode(parent);
      if (!locations.includes(candidateLocation)) {
        context.reportError(
          new ValidationError(
            'KnownDirectivesRule',
            `Directive "@${name}" may not be used on ${candidateLocation}.`,
            node,
          ),
        );
      }
    },
  };
}

function getDirectiveLocationForNode(appliedTo: ASTNode): DirectiveLocation {
  switch (appliedTo.kind) {
    case Kind.OPERATION_DEFINITION:
      return getDirectiveLocationForOperation(appliedTo.operation);
    case Kind.FIELD:
      return DirectiveLocation.FIELD;
    case Kind.FRAGMENT_SPREAD:
      return DirectiveLocation.FRAGMENT_SPREAD;
    case Kind.INLINE_FRAGMENT:
      return DirectiveLocation.INLINE_FRAGMENT;
    case Kind.FRAGMENT_DEFINITION:
      return DirectiveLocation.FRAGMENT_DEFINITION;
    case Kind.VARIABLE_DEFINITION:
      return DirectiveLocation.VARIABLE_DEFINITION;
  }
  invariant(false, 'Unexpected kind: ' + appliedTo.kind);
}

function getDirectiveLocationForOperation(
  operation: OperationTypeNode,
): DirectiveLocation {
  switch (operation) {
    case OperationTypeNode.QUERY:
      return DirectiveLocation.QUERY;
    case OperationTypeNode.MUTATION:
      return DirectiveLocation.MUTATION;
    case OperationTypeNode.SUBSCRIPTION:
      return DirectiveLocation.SUBSCRIPTION;
  }
}
