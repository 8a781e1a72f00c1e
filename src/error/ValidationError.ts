import type { ASTNode } from '../language/ast';

import { GraphQLError } from './GraphQLError';

/**
 * An error reported by a validation rule. `rule` is the name of the rule
 * that detected the problem, for example `NoFragmentCyclesRule`.
 */
export class ValidationError extends GraphQLError {
  readonly rule: string;

  constructor(
    rule: string,
    message: string,
    nodes?: ReadonlyArray<ASTNode> | ASTNode | null,
  ) {
    super(message, { nodes });
    this.name = 'ValidationError';
    this.rule = rule;
  }
}
