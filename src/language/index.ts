export { Source } from './source';

export { getLocation } from './location';
export type { SourceLocation } from './location';

export { Kind } from './kinds';

export { TokenKind } from './tokenKind';

export { Lexer, tokenize } from './lexer';

export { parse, parseValue, parseConstValue, parseType } from './parser';
export type { ParseOptions } from './parser';

export { print } from './printer';

export { visit, visitInParallel, BREAK } from './visitor';
export type { ASTVisitor, ASTVisitFn, VisitResult } from './visitor';

export { Location, Token, OperationTypeNode } from './ast';
export type {
  ASTNode,
  ASTKindToNode,
  // Each kind of AST node
  NameNode,
  DocumentNode,
  DefinitionNode,
  ExecutableDefinitionNode,
  OperationDefinitionNode,
  VariableDefinitionNode,
  VariableNode,
  SelectionSetNode,
  SelectionNode,
  FieldNode,
  ArgumentNode,
  ConstArgumentNode,
  FragmentSpreadNode,
  InlineFragmentNode,
  FragmentDefinitionNode,
  ValueNode,
  ConstValueNode,
  IntValueNode,
  FloatValueNode,
  StringValueNode,
  BooleanValueNode,
  NullValueNode,
  EnumValueNode,
  ListValueNode,
  ConstListValueNode,
  ObjectValueNode,
  ConstObjectValueNode,
  ObjectFieldNode,
  ConstObjectFieldNode,
  DirectiveNode,
  ConstDirectiveNode,
  TypeNode,
  NamedTypeNode,
  ListTypeNode,
  NonNullTypeNode,
} from './ast';

export { DirectiveLocation } from './directiveLocation';
