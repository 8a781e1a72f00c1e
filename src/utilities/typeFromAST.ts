import type { TypeNode } from '../language/ast';

import type { TypeRef } from '../type/definition';
import { typeRefFromAST } from '../type/definition';
import type { GraphQLSchema } from '../type/schema';

/**
 * Given a Schema and an AST node describing a type, return a TypeRef
 * corresponding to the type in that schema. For example, if provided the
 * parsed AST node for `[User]`, a TypeRef wrapping the name "User" will be
 * returned. If the schema does not define "User", returns undefined.
 */
export function typeFromAST(
  schema: GraphQLSchema,
  typeNode: TypeNode,
): TypeRef | undefined {
  const typeRef = typeRefFromAST(typeNode);
  return schema.getNamedType(typeRef) !== undefined ? typeRef : undefined;
}
