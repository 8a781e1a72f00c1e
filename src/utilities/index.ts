// Produce the GraphQL query recommended for a full schema introspection.
export { getIntrospectionQuery } from './getIntrospectionQuery';
export type { IntrospectionOptions } from './getIntrospectionQuery';

// Gets the target Operation from a Document.
export { getOperationAST } from './getOperationAST';

// Track the type of each position while walking a document.
export { TypeInfo, visitWithTypeInfo } from './TypeInfo';

// Get the target type from a type node.
export { typeFromAST } from './typeFromAST';

// Create a JavaScript value from a GraphQL language AST with a type.
export { valueFromAST } from './valueFromAST';

// Create a GraphQL language AST from a JavaScript value.
export { astFromValue } from './astFromValue';

// Coerces a JavaScript value to a GraphQL type, or produces errors.
export { coerceInputValue } from './coerceInputValue';

// Comparators for types
export {
  isEqualType,
  isTypeSubTypeOf,
  doTypesOverlap,
} from './typeComparators';

// Static cache policy of an operation.
export { CacheControl, calculateCacheControl } from './cacheControl';
