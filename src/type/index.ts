export type { GraphQLSchemaConfig } from './schema';
export {
  /** Predicate */
  isSchema,
  /** Assertion */
  assertSchema,
  /** GraphQL Schema definition */
  GraphQLSchema,
} from './schema';

export type {
  NamedTypeRef,
  ListTypeRef,
  NonNullTypeRef,
  NullableTypeRef,
  TypeRef,
  TypeRefInput,
  GraphQLNamedType,
  GraphQLNamedInputType,
  GraphQLNamedOutputType,
  GraphQLLeafType,
  GraphQLCompositeType,
  GraphQLAbstractType,
  CacheControlScope,
  CacheControlHint,
  GraphQLResolveInfo,
  GraphQLFieldResolver,
  GraphQLIsTypeOfFn,
  GraphQLTypeResolver,
  GraphQLArgumentConfig,
  GraphQLFieldConfigArgumentMap,
  GraphQLFieldConfig,
  GraphQLFieldConfigMap,
  GraphQLArgument,
  GraphQLField,
  GraphQLFieldMap,
  GraphQLScalarSerializer,
  GraphQLScalarValueParser,
  GraphQLScalarLiteralParser,
  GraphQLScalarTypeConfig,
  GraphQLObjectTypeConfig,
  GraphQLInterfaceTypeConfig,
  GraphQLUnionTypeConfig,
  GraphQLEnumTypeConfig,
  GraphQLEnumValueConfig,
  GraphQLEnumValue,
  GraphQLInputObjectTypeConfig,
  GraphQLInputFieldConfig,
  GraphQLInputField,
  GraphQLInputFieldMap,
} from './definition';
export {
  /** Type references */
  named,
  list,
  nonNull,
  isNamedTypeRef,
  isListTypeRef,
  isNonNullTypeRef,
  typeRefFromAST,
  typeRefFromString,
  toTypeRef,
  printTypeRef,
  getNamedTypeName,
  getNullableTypeRef,
  isEqualTypeRef,
  /** Predicates */
  isScalarType,
  isObjectType,
  isInterfaceType,
  isUnionType,
  isEnumType,
  isInputObjectType,
  isNamedType,
  isInputType,
  isOutputType,
  isLeafType,
  isCompositeType,
  isAbstractType,
  isRequiredArgument,
  isRequiredInputField,
  /** Un-typed value conversion */
  valueFromASTUntyped,
  /** Definitions */
  GraphQLScalarType,
  GraphQLObjectType,
  GraphQLInterfaceType,
  GraphQLUnionType,
  GraphQLEnumType,
  GraphQLInputObjectType,
} from './definition';

export type { GraphQLDirectiveConfig } from './directives';
export {
  isDirective,
  GraphQLDirective,
  isSpecifiedDirective,
  specifiedDirectives,
  GraphQLIncludeDirective,
  GraphQLSkipDirective,
  GraphQLDeprecatedDirective,
  GraphQLSpecifiedByDirective,
  DEFAULT_DEPRECATION_REASON,
} from './directives';

export {
  isSpecifiedScalarType,
  specifiedScalarTypes,
  GraphQLInt,
  GraphQLFloat,
  GraphQLString,
  GraphQLBoolean,
  GraphQLID,
  GraphQLDecimal,
  GRAPHQL_MAX_INT,
  GRAPHQL_MIN_INT,
} from './scalars';

export {
  isIntrospectionType,
  introspectionTypes,
  __Schema,
  __Directive,
  __DirectiveLocation,
  __Type,
  __Field,
  __InputValue,
  __EnumValue,
  __TypeKind,
  TypeKind,
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
} from './introspection';

export { validateSchema, assertValidSchema } from './validate';

export { assertName } from './assertName';
