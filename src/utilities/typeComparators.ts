import type { TypeRef } from '../type/definition';
import {
  isAbstractType,
  isEqualTypeRef,
  isInterfaceType,
  isObjectType,
} from '../type/definition';
import type { GraphQLSchema } from '../type/schema';

/**
 * Provided two types, return true if the types are equal (invariant).
 */
export function isEqualType(typeA: TypeRef, typeB: TypeRef): boolean {
  return isEqualTypeRef(typeA, typeB);
}

/**
 * Provided a type and a super type, return true if the first type is either
 * equal or a subset of the second super type (covariant).
 */
export function isTypeSubTypeOf(
  schema: GraphQLSchema,
  maybeSubType: TypeRef,
  superType: TypeRef,
): boolean {
  // If superType is non-null, maybeSubType must also be non-null.
  if (superType.kind === 'NonNullTypeRef') {
    if (maybeSubType.kind === 'NonNullTypeRef') {
      return isTypeSubTypeOf(schema, maybeSubType.ofType, superType.ofType);
    }
    return false;
  }
  if (maybeSubType.kind === 'NonNullTypeRef') {
    // If superType is nullable, maybeSubType may be non-null or nullable.
    return isTypeSubTypeOf(schema, maybeSubType.ofType, superType);
  }

  // If superType type is a list, maybeSubType type must also be a list.
  if (superType.kind === 'ListTypeRef') {
    if (maybeSubType.kind === 'ListTypeRef') {
      return isTypeSubTypeOf(schema, maybeSubType.ofType, superType.ofType);
    }
    return false;
  }
  if (maybeSubType.kind === 'ListTypeRef') {
    // If superType is not a list, maybeSubType must also be not a list.
    return false;
  }

  // Both are named types: equal names, or the super type is abstract and
  // the subtype is one of its object or interface members.
  if (maybeSubType.name === superType.name) {
    return true;
  }
  const abstractType = schema.getType(superType.name);
  const subType = schema.getType(maybeSubType.name);
  return (
    isAbstractType(abstractType) &&
    (isInterfaceType(subType) || isObjectType(subType)) &&
    schema.isSubType(abstractType, subType)
  );
}

/**
 * Provided two composite types, determine if they "overlap". Two composite
 * types overlap when the Sets of possible concrete types for each intersect.
 *
 * This is often used to determine if a fragment of a given type could possibly
 * be visited in a context of another type.
 *
 * This function is commutative.
 */
export function doTypesOverlap(
  schema: GraphQLSchema,
  typeAName: string,
  typeBName: string,
): boolean {
  // Equivalent types overlap
  if (typeAName === typeBName) {
    return true;
  }

  const typeA = schema.getType(typeAName);
  const typeB = schema.getType(typeBName);

  if (isAbstractType(typeA)) {
    if (isAbstractType(typeB)) {
      // If both types are abstract, then determine if there is any intersection
      // between possible concrete types of each.
      return schema
        .getPossibleTypes(typeA)
        .some((type) => schema.isSubType(typeB, type));
    }
    // Determine if the latter type is a possible concrete type of the former.
    return isObjectType(typeB) && schema.isSubType(typeA, typeB);
  }

  if (isAbstractType(typeB)) {
    // Determine if the former type is a possible concrete type of the latter.
    return isObjectType(typeA) && schema.isSubType(typeB, typeA);
  }

  // Otherwise the types do not overlap.
  return false;
}
