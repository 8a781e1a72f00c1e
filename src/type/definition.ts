import { devAssert } from '../jsutils/devAssert';
import { didYouMean } from '../jsutils/didYouMean';
import { inspect } from '../jsutils/inspect';
import { keyMap } from '../jsutils/keyMap';
import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap } from '../jsutils/ObjMap';
import type { Path } from '../jsutils/Path';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { suggestionList } from '../jsutils/suggestionList';

import { GraphQLError } from '../error/GraphQLError';

import type {
  FieldNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
  TypeNode,
  ValueNode,
} from '../language/ast';
import { Kind } from '../language/kinds';
import { parseType } from '../language/parser';
import { print } from '../language/printer';

import { assertName } from './assertName';
import type { GraphQLSchema } from './schema';

/**
 * Type references
 *
 * Fields and arguments never hold another type definition directly. They
 * name it, optionally wrapped in list and non-null modifiers, and the schema
 * resolves the name. Recursive types therefore need no thunks.
 */

export interface NamedTypeRef {
  readonly kind: 'NamedTypeRef';
  readonly name: string;
}

export interface ListTypeRef {
  readonly kind: 'ListTypeRef';
  readonly ofType: TypeRef;
}

export interface NonNullTypeRef {
  readonly kind: 'NonNullTypeRef';
  readonly ofType: NullableTypeRef;
}

export type NullableTypeRef = NamedTypeRef | ListTypeRef;

export type TypeRef = NullableTypeRef | NonNullTypeRef;

/**
 * Anything accepted where a type reference is configured: a `TypeRef` or
 * its SDL spelling, such as `"[String!]!"`.
 */
export type TypeRefInput = TypeRef | string;

export function named(name: string): NamedTypeRef {
  return Object.freeze({ kind: 'NamedTypeRef', name: assertName(name) });
}

export function list(ofType: TypeRefInput): ListTypeRef {
  return Object.freeze({ kind: 'ListTypeRef', ofType: toTypeRef(ofType) });
}

export function nonNull(ofType: TypeRefInput): NonNullTypeRef {
  const typeRef = toTypeRef(ofType);
  devAssert(
    typeRef.kind !== 'NonNullTypeRef',
    `Expected ${printTypeRef(typeRef)} to be a nullable type.`,
  );
  return Object.freeze({ kind: 'NonNullTypeRef', ofType: typeRef });
}

export function isNamedTypeRef(typeRef: TypeRef): typeRef is NamedTypeRef {
  return typeRef.kind === 'NamedTypeRef';
}

export function isListTypeRef(typeRef: TypeRef): typeRef is ListTypeRef {
  return typeRef.kind === 'ListTypeRef';
}

export function isNonNullTypeRef(typeRef: TypeRef): typeRef is NonNullTypeRef {
  return typeRef.kind === 'NonNullTypeRef';
}

/**
 * Converts a parsed type reference such as `[Int!]` into a `TypeRef`,
 * without checking that the named type exists anywhere.
 */
export function typeRefFromAST(typeNode: TypeNode): TypeRef {
  switch (typeNode.kind) {
    case Kind.NAMED_TYPE:
      return named(typeNode.name.value);
    case Kind.LIST_TYPE:
      return list(typeRefFromAST(typeNode.type));
    case Kind.NON_NULL_TYPE:
      return nonNull(typeRefFromAST(typeNode.type));
  }
}

export function typeRefFromString(typeString: string): TypeRef {
  return typeRefFromAST(parseType(typeString, { noLocation: true }));
}

export function toTypeRef(typeRef: TypeRefInput): TypeRef {
  return typeof typeRef === 'string' ? typeRefFromString(typeRef) : typeRef;
}

export function printTypeRef(typeRef: TypeRef): string {
  switch (typeRef.kind) {
    case 'NamedTypeRef':
      return typeRef.name;
    case 'ListTypeRef':
      return '[' + printTypeRef(typeRef.ofType) + ']';
    case 'NonNullTypeRef':
      return printTypeRef(typeRef.ofType) + '!';
  }
}

export function getNamedTypeName(typeRef: TypeRef): string {
  let unwrapped = typeRef;
  while (unwrapped.kind !== 'NamedTypeRef') {
    unwrapped = unwrapped.ofType;
  }
  return unwrapped.name;
}

export function getNullableTypeRef(typeRef: TypeRef): NullableTypeRef {
  return typeRef.kind === 'NonNullTypeRef' ? typeRef.ofType : typeRef;
}

export function isEqualTypeRef(typeA: TypeRef, typeB: TypeRef): boolean {
  if (typeA.kind === 'NamedTypeRef' || typeB.kind === 'NamedTypeRef') {
    return (
      typeA.kind === 'NamedTypeRef' &&
      typeB.kind === 'NamedTypeRef' &&
      typeA.name === typeB.name
    );
  }
  return (
    typeA.kind === typeB.kind && isEqualTypeRef(typeA.ofType, typeB.ofType)
  );
}

/**
 * These are all of the possible kinds of named types.
 */
export type GraphQLNamedType = GraphQLNamedInputType | GraphQLNamedOutputType;

export type GraphQLNamedInputType =
  | GraphQLScalarType
  | GraphQLEnumType
  | GraphQLInputObjectType;

export type GraphQLNamedOutputType =
  | GraphQLScalarType
  | GraphQLObjectType
  | GraphQLInterfaceType
  | GraphQLUnionType
  | GraphQLEnumType;

export type GraphQLLeafType = GraphQLScalarType | GraphQLEnumType;

export type GraphQLCompositeType =
  | GraphQLObjectType
  | GraphQLInterfaceType
  | GraphQLUnionType;

export type GraphQLAbstractType = GraphQLInterfaceType | GraphQLUnionType;

export function isScalarType(type: unknown): type is GraphQLScalarType {
  return type instanceof GraphQLScalarType;
}

export function isObjectType(type: unknown): type is GraphQLObjectType {
  return type instanceof GraphQLObjectType;
}

export function isInterfaceType(type: unknown): type is GraphQLInterfaceType {
  return type instanceof GraphQLInterfaceType;
}

export function isUnionType(type: unknown): type is GraphQLUnionType {
  return type instanceof GraphQLUnionType;
}

export function isEnumType(type: unknown): type is GraphQLEnumType {
  return type instanceof GraphQLEnumType;
}

export function isInputObjectType(
  type: unknown,
): type is GraphQLInputObjectType {
  return type instanceof GraphQLInputObjectType;
}

export function isNamedType(type: unknown): type is GraphQLNamedType {
  return (
    isScalarType(type) ||
    isObjectType(type) ||
    isInterfaceType(type) ||
    isUnionType(type) ||
    isEnumType(type) ||
    isInputObjectType(type)
  );
}

export function isInputType(type: unknown): type is GraphQLNamedInputType {
  return isScalarType(type) || isEnumType(type) || isInputObjectType(type);
}

export function isOutputType(type: unknown): type is GraphQLNamedOutputType {
  return (
    isScalarType(type) ||
    isObjectType(type) ||
    isInterfaceType(type) ||
    isUnionType(type) ||
    isEnumType(type)
  );
}

export function isLeafType(type: unknown): type is GraphQLLeafType {
  return isScalarType(type) || isEnumType(type);
}

export function isCompositeType(type: unknown): type is GraphQLCompositeType {
  return isObjectType(type) || isInterfaceType(type) || isUnionType(type);
}

export function isAbstractType(type: unknown): type is GraphQLAbstractType {
  return isInterfaceType(type) || isUnionType(type);
}

/**
 * Cache hints
 *
 * Fields and object-like types may declare how long their results stay
 * valid and whether they may be shared between users.
 */
export type CacheControlScope = 'PUBLIC' | 'PRIVATE';

export interface CacheControlHint {
  readonly maxAge?: number;
  readonly scope?: CacheControlScope;
}

/**
 * Scalar Type Definition
 *
 * The leaf values of any request and input values to arguments are
 * Scalars (or Enums) and are defined with a name and a series of functions
 * used to parse input from ast or variables and to ensure validity.
 *
 * If a type's serialize function returns `null` or does not return a value
 * (i.e. it returns `undefined`) then an error will be raised and a `null`
 * value will be returned in the response. A literal is parsed by running
 * `parseValue` over its plain value unless `parseLiteral` is given.
 *
 * Example:
 *
 * ```ts
 * const OddType = new GraphQLScalarType({
 *   name: 'Odd',
 *   serialize: oddValue,
 *   parseValue: oddValue,
 * });
 *
 * function oddValue(value: unknown): number {
 *   if (typeof value === 'number' && value % 2 === 1) {
 *     return value;
 *   }
 *   throw new GraphQLError(`Odd cannot represent value: ${inspect(value)}`);
 * }
 * ```
 */
export class GraphQLScalarType<TInternal = unknown, TExternal = TInternal> {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly specifiedByURL: Maybe<string>;
  readonly serialize: GraphQLScalarSerializer<TExternal>;
  readonly parseValue: GraphQLScalarValueParser<TInternal>;
  readonly parseLiteral: GraphQLScalarLiteralParser<TInternal>;

  constructor(
    config: Readonly<GraphQLScalarTypeConfig<TInternal, TExternal>>,
  ) {
    const parseValue = config.parseValue;

    this.name = assertName(config.name);
    this.description = config.description;
    this.specifiedByURL = config.specifiedByURL;
    this.serialize = config.serialize;
    this.parseValue = parseValue;
    this.parseLiteral =
      config.parseLiteral ??
      ((node, variables) => parseValue(valueFromASTUntyped(node, variables)));
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLScalarType';
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

export type GraphQLScalarSerializer<TExternal> = (
  outputValue: unknown,
) => TExternal;

export type GraphQLScalarValueParser<TInternal> = (
  inputValue: unknown,
) => TInternal;

export type GraphQLScalarLiteralParser<TInternal> = (
  valueNode: ValueNode,
  variables?: Maybe<ObjMap<unknown>>,
) => TInternal;

export interface GraphQLScalarTypeConfig<TInternal, TExternal> {
  name: string;
  description?: Maybe<string>;
  specifiedByURL?: Maybe<string>;
  /** Serializes an internal value to include in a response. */
  serialize: GraphQLScalarSerializer<TExternal>;
  /** Parses an externally provided value to use as an input. */
  parseValue: GraphQLScalarValueParser<TInternal>;
  /** Parses an externally provided literal value to use as an input. */
  parseLiteral?: GraphQLScalarLiteralParser<TInternal>;
}

/**
 * Produces the runtime value of a literal without any type information:
 * ints and floats become numbers, enums become their names, variables their
 * bound values.
 */
export function valueFromASTUntyped(
  valueNode: ValueNode,
  variables?: Maybe<ObjMap<unknown>>,
): unknown {
  switch (valueNode.kind) {
    case Kind.NULL:
      return null;
    case Kind.INT:
      return parseInt(valueNode.value, 10);
    case Kind.FLOAT:
      return parseFloat(valueNode.value);
    case Kind.STRING:
    case Kind.ENUM:
    case Kind.BOOLEAN:
      return valueNode.value;
    case Kind.LIST:
      return valueNode.values.map((node) =>
        valueFromASTUntyped(node, variables),
      );
    case Kind.OBJECT:
      return Object.fromEntries(
        valueNode.fields.map((field) => [
          field.name.value,
          valueFromASTUntyped(field.value, variables),
        ]),
      );
    case Kind.VARIABLE:
      return variables?.[valueNode.name.value];
  }
}

/**
 * Resolver signatures
 *
 * Callbacks take their types from method declarations, whose parameters
 * compare bivariantly: a type built for one source or context shape still
 * fits the schema's `GraphQLNamedType` union.
 */

export interface GraphQLResolveInfo {
  readonly fieldName: string;
  readonly fieldNodes: ReadonlyArray<FieldNode>;
  readonly returnType: TypeRef;
  readonly parentType: GraphQLObjectType;
  readonly path: Path;
  readonly schema: GraphQLSchema;
  readonly fragments: ObjMap<FragmentDefinitionNode>;
  readonly rootValue: unknown;
  readonly operation: OperationDefinitionNode;
  readonly variableValues: { readonly [variable: string]: unknown };
  /** Aborted when the host cancels the request. */
  readonly signal: AbortSignal | undefined;
}

interface FieldResolverHolder<TSource, TContext, TArgs> {
  resolve(
    source: TSource,
    args: TArgs,
    context: TContext,
    info: GraphQLResolveInfo,
  ): unknown;
}

interface IsTypeOfHolder<TSource, TContext> {
  isTypeOf(
    source: TSource,
    context: TContext,
    info: GraphQLResolveInfo,
  ): PromiseOrValue<boolean>;
}

interface TypeResolverHolder<TSource, TContext> {
  resolveType(
    value: TSource,
    context: TContext,
    info: GraphQLResolveInfo,
    abstractType: GraphQLAbstractType,
  ): PromiseOrValue<string | undefined>;
}

export type GraphQLFieldResolver<
  TSource = unknown,
  TContext = unknown,
  TArgs = ObjMap<unknown>,
> = FieldResolverHolder<TSource, TContext, TArgs>['resolve'];

export type GraphQLIsTypeOfFn<
  TSource = unknown,
  TContext = unknown,
> = IsTypeOfHolder<TSource, TContext>['isTypeOf'];

/**
 * Returns the name of the concrete object type of `value`.
 */
export type GraphQLTypeResolver<
  TSource = unknown,
  TContext = unknown,
> = TypeResolverHolder<TSource, TContext>['resolveType'];

/**
 * Fields and arguments
 */

export interface GraphQLArgumentConfig {
  description?: Maybe<string>;
  type: TypeRefInput;
  defaultValue?: unknown;
  deprecationReason?: Maybe<string>;
}

export type GraphQLFieldConfigArgumentMap = ObjMap<GraphQLArgumentConfig>;

export interface GraphQLFieldConfig<
  TSource = unknown,
  TContext = unknown,
  TArgs = ObjMap<unknown>,
> {
  description?: Maybe<string>;
  type: TypeRefInput;
  args?: GraphQLFieldConfigArgumentMap;
  resolve?: GraphQLFieldResolver<TSource, TContext, TArgs>;
  deprecationReason?: Maybe<string>;
  cacheControl?: CacheControlHint;
}

export type GraphQLFieldConfigMap<TSource, TContext> = ObjMap<
  GraphQLFieldConfig<TSource, TContext>
>;

export interface GraphQLArgument {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly type: TypeRef;
  readonly defaultValue: unknown;
  readonly deprecationReason: Maybe<string>;
}

export function isRequiredArgument(arg: GraphQLArgument): boolean {
  return isNonNullTypeRef(arg.type) && arg.defaultValue === undefined;
}

export interface GraphQLField<TSource = unknown, TContext = unknown> {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly type: TypeRef;
  readonly args: ReadonlyArray<GraphQLArgument>;
  readonly resolve: GraphQLFieldResolver<TSource, TContext> | undefined;
  readonly deprecationReason: Maybe<string>;
  readonly cacheControl: CacheControlHint | undefined;
}

export type GraphQLFieldMap<TSource = unknown, TContext = unknown> = ObjMap<
  GraphQLField<TSource, TContext>
>;

/**
 * @internal
 */
export function defineFieldMap<TSource, TContext>(
  typeName: string,
  fields: GraphQLFieldConfigMap<TSource, TContext>,
): GraphQLFieldMap<TSource, TContext> {
  const fieldMap: GraphQLFieldMap<TSource, TContext> = Object.create(null);
  for (const [fieldName, fieldConfig] of Object.entries(fields)) {
    devAssert(
      fieldConfig.resolve == null || typeof fieldConfig.resolve === 'function',
      `${typeName}.${fieldName} field resolver must be a function if ` +
        `provided, but got: ${inspect(fieldConfig.resolve)}.`,
    );
    fieldMap[fieldName] = Object.freeze({
      name: assertName(fieldName),
      description: fieldConfig.description,
      type: toTypeRef(fieldConfig.type),
      args: defineArguments(fieldConfig.args ?? {}),
      resolve: fieldConfig.resolve,
      deprecationReason: fieldConfig.deprecationReason,
      cacheControl: fieldConfig.cacheControl,
    });
  }
  return Object.freeze(fieldMap);
}

export function defineArguments(
  config: GraphQLFieldConfigArgumentMap,
): ReadonlyArray<GraphQLArgument> {
  return Object.entries(config).map(([argName, argConfig]) =>
    Object.freeze({
      name: assertName(argName),
      description: argConfig.description,
      type: toTypeRef(argConfig.type),
      defaultValue: argConfig.defaultValue,
      deprecationReason: argConfig.deprecationReason,
    }),
  );
}

/**
 * Object Type Definition
 *
 * Almost all of the types you define will be object types. Object types
 * have a name, but most importantly describe their fields. Fields name the
 * types they return, so a type may refer to itself:
 *
 * ```ts
 * const PersonType = new GraphQLObjectType({
 *   name: 'Person',
 *   fields: {
 *     name: { type: 'String' },
 *     bestFriend: { type: 'Person' },
 *   },
 * });
 * ```
 */
export class GraphQLObjectType<TSource = unknown, TContext = unknown> {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly isTypeOf: GraphQLIsTypeOfFn<TSource, TContext> | undefined;
  readonly cacheControl: CacheControlHint | undefined;
  readonly interfaces: ReadonlyArray<string>;

  private readonly _fields: GraphQLFieldMap<TSource, TContext>;

  constructor(config: Readonly<GraphQLObjectTypeConfig<TSource, TContext>>) {
    this.name = assertName(config.name);
    this.description = config.description;
    this.isTypeOf = config.isTypeOf;
    this.cacheControl = config.cacheControl;
    this.interfaces = Object.freeze([...(config.interfaces ?? [])]);
    this._fields = defineFieldMap(this.name, config.fields);

    devAssert(
      config.isTypeOf == null || typeof config.isTypeOf === 'function',
      `${this.name} must provide "isTypeOf" as a function, ` +
        `but got: ${inspect(config.isTypeOf)}.`,
    );
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLObjectType';
  }

  getFields(): GraphQLFieldMap<TSource, TContext> {
    return this._fields;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

export interface GraphQLObjectTypeConfig<TSource, TContext> {
  name: string;
  description?: Maybe<string>;
  /** Names of the interfaces this type implements. */
  interfaces?: ReadonlyArray<string>;
  fields: GraphQLFieldConfigMap<TSource, TContext>;
  isTypeOf?: GraphQLIsTypeOfFn<TSource, TContext>;
  cacheControl?: CacheControlHint;
}

/**
 * Interface Type Definition
 *
 * When a field can return one of a heterogeneous set of types, an Interface
 * type is used to describe what types are possible, what fields are in
 * common across all types, as well as a function to determine which type
 * is actually used when the field is resolved.
 */
export class GraphQLInterfaceType<TSource = unknown, TContext = unknown> {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly resolveType: GraphQLTypeResolver<TSource, TContext> | undefined;
  readonly cacheControl: CacheControlHint | undefined;
  readonly interfaces: ReadonlyArray<string>;

  private readonly _fields: GraphQLFieldMap<TSource, TContext>;

  constructor(
    config: Readonly<GraphQLInterfaceTypeConfig<TSource, TContext>>,
  ) {
    this.name = assertName(config.name);
    this.description = config.description;
    this.resolveType = config.resolveType;
    this.cacheControl = config.cacheControl;
    this.interfaces = Object.freeze([...(config.interfaces ?? [])]);
    this._fields = defineFieldMap(this.name, config.fields);

    devAssert(
      config.resolveType == null || typeof config.resolveType === 'function',
      `${this.name} must provide "resolveType" as a function, ` +
        `but got: ${inspect(config.resolveType)}.`,
    );
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLInterfaceType';
  }

  getFields(): GraphQLFieldMap<TSource, TContext> {
    return this._fields;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

export interface GraphQLInterfaceTypeConfig<TSource, TContext> {
  name: string;
  description?: Maybe<string>;
  interfaces?: ReadonlyArray<string>;
  fields: GraphQLFieldConfigMap<TSource, TContext>;
  /**
   * Optionally provide a custom type resolver function. If one is not
   * provided, the default implementation will call `isTypeOf` on each
   * implementing Object type.
   */
  resolveType?: GraphQLTypeResolver<TSource, TContext>;
  cacheControl?: CacheControlHint;
}

/**
 * Union Type Definition
 *
 * When a field can return one of a heterogeneous set of types, a Union type
 * is used to describe what types are possible as well as providing a
 * function to determine which type is actually used when the field is
 * resolved.
 *
 * ```ts
 * const PetType = new GraphQLUnionType({
 *   name: 'Pet',
 *   types: ['Dog', 'Cat'],
 *   resolveType(value) {
 *     return isObjectLike(value) && 'meows' in value ? 'Cat' : 'Dog';
 *   },
 * });
 * ```
 */
export class GraphQLUnionType<TSource = unknown, TContext = unknown> {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly resolveType: GraphQLTypeResolver<TSource, TContext> | undefined;
  readonly types: ReadonlyArray<string>;

  constructor(config: Readonly<GraphQLUnionTypeConfig<TSource, TContext>>) {
    this.name = assertName(config.name);
    this.description = config.description;
    this.resolveType = config.resolveType;
    this.types = Object.freeze([...config.types]);

    devAssert(
      config.resolveType == null || typeof config.resolveType === 'function',
      `${this.name} must provide "resolveType" as a function, ` +
        `but got: ${inspect(config.resolveType)}.`,
    );
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLUnionType';
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

export interface GraphQLUnionTypeConfig<TSource, TContext> {
  name: string;
  description?: Maybe<string>;
  /** Names of the member object types. */
  types: ReadonlyArray<string>;
  resolveType?: GraphQLTypeResolver<TSource, TContext>;
}

/**
 * Enum Type Definition
 *
 * Some leaf values of requests and input values are Enums. GraphQL
 * serializes Enum values as strings, however internally Enums can be
 * represented by any kind of type, often integers.
 *
 * ```ts
 * const RGBType = new GraphQLEnumType({
 *   name: 'RGB',
 *   values: {
 *     RED: { value: 0 },
 *     GREEN: { value: 1 },
 *     BLUE: { value: 2 },
 *   },
 * });
 * ```
 *
 * Note: If a value is not provided in a definition, the name of the enum
 * value will be used as its internal value.
 */
export class GraphQLEnumType {
  readonly name: string;
  readonly description: Maybe<string>;

  private readonly _values: ReadonlyArray<GraphQLEnumValue>;
  private readonly _valueLookup: ReadonlyMap<unknown, GraphQLEnumValue>;
  private readonly _nameLookup: ObjMap<GraphQLEnumValue>;

  constructor(config: Readonly<GraphQLEnumTypeConfig>) {
    this.name = assertName(config.name);
    this.description = config.description;

    this._values = Object.entries(config.values).map(
      ([valueName, valueConfig]) =>
        Object.freeze({
          name: assertEnumValueName(valueName),
          description: valueConfig.description,
          value:
            valueConfig.value !== undefined ? valueConfig.value : valueName,
          deprecationReason: valueConfig.deprecationReason,
        }),
    );
    this._valueLookup = new Map(
      this._values.map((enumValue) => [enumValue.value, enumValue]),
    );
    this._nameLookup = keyMap(this._values, (value) => value.name);
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLEnumType';
  }

  getValues(): ReadonlyArray<GraphQLEnumValue> {
    return this._values;
  }

  getValue(name: string): Maybe<GraphQLEnumValue> {
    return this._nameLookup[name];
  }

  serialize(outputValue: unknown): Maybe<string> {
    const enumValue = this._valueLookup.get(outputValue);
    if (enumValue === undefined) {
      throw new GraphQLError(
        `Enum "${this.name}" cannot represent value: ${inspect(outputValue)}`,
      );
    }
    return enumValue.name;
  }

  parseValue(inputValue: unknown): unknown {
    if (typeof inputValue !== 'string') {
      const valueStr = inspect(inputValue);
      throw new GraphQLError(
        `Enum "${this.name}" cannot represent non-string value: ${valueStr}.` +
          didYouMeanEnumValue(this, valueStr),
      );
    }

    const enumValue = this.getValue(inputValue);
    if (enumValue == null) {
      throw new GraphQLError(
        `Value "${inputValue}" does not exist in "${this.name}" enum.` +
          didYouMeanEnumValue(this, inputValue),
      );
    }
    return enumValue.value;
  }

  parseLiteral(
    valueNode: ValueNode,
    _variables?: Maybe<ObjMap<unknown>>,
  ): unknown {
    if (valueNode.kind !== Kind.ENUM) {
      const valueStr = print(valueNode);
      throw new GraphQLError(
        `Enum "${this.name}" cannot represent non-enum value: ${valueStr}.` +
          didYouMeanEnumValue(this, valueStr),
        { nodes: valueNode },
      );
    }

    const enumValue = this.getValue(valueNode.value);
    if (enumValue == null) {
      const valueStr = print(valueNode);
      throw new GraphQLError(
        `Value "${valueStr}" does not exist in "${this.name}" enum.` +
          didYouMeanEnumValue(this, valueStr),
        { nodes: valueNode },
      );
    }
    return enumValue.value;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

function didYouMeanEnumValue(
  enumType: GraphQLEnumType,
  unknownValueStr: string,
): string {
  const allNames = enumType.getValues().map((value) => value.name);
  const suggestedValues = suggestionList(unknownValueStr, allNames);

  return didYouMean('the enum value', suggestedValues);
}

function assertEnumValueName(name: string): string {
  if (name === 'true' || name === 'false' || name === 'null') {
    throw new GraphQLError(`Enum values cannot be named: ${name}`);
  }
  return assertName(name);
}

export interface GraphQLEnumTypeConfig {
  name: string;
  description?: Maybe<string>;
  values: ObjMap<GraphQLEnumValueConfig>;
}

export interface GraphQLEnumValueConfig {
  description?: Maybe<string>;
  value?: unknown;
  deprecationReason?: Maybe<string>;
}

export interface GraphQLEnumValue {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly value: unknown;
  readonly deprecationReason: Maybe<string>;
}

/**
 * Input Object Type Definition
 *
 * An input object defines a structured collection of fields which may be
 * supplied to a field argument.
 *
 * ```ts
 * const GeoPoint = new GraphQLInputObjectType({
 *   name: 'GeoPoint',
 *   fields: {
 *     lat: { type: 'Float!' },
 *     lon: { type: 'Float!' },
 *     alt: { type: 'Float', defaultValue: 0 },
 *   },
 * });
 * ```
 */
export class GraphQLInputObjectType {
  readonly name: string;
  readonly description: Maybe<string>;

  private readonly _fields: GraphQLInputFieldMap;

  constructor(config: Readonly<GraphQLInputObjectTypeConfig>) {
    this.name = assertName(config.name);
    this.description = config.description;

    const fieldMap: GraphQLInputFieldMap = Object.create(null);
    for (const [fieldName, fieldConfig] of Object.entries(config.fields)) {
      fieldMap[fieldName] = Object.freeze({
        name: assertName(fieldName),
        description: fieldConfig.description,
        type: toTypeRef(fieldConfig.type),
        defaultValue: fieldConfig.defaultValue,
        deprecationReason: fieldConfig.deprecationReason,
      });
    }
    this._fields = Object.freeze(fieldMap);
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLInputObjectType';
  }

  getFields(): GraphQLInputFieldMap {
    return this._fields;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.toString();
  }
}

export interface GraphQLInputObjectTypeConfig {
  name: string;
  description?: Maybe<string>;
  fields: ObjMap<GraphQLInputFieldConfig>;
}

export interface GraphQLInputFieldConfig {
  description?: Maybe<string>;
  type: TypeRefInput;
  defaultValue?: unknown;
  deprecationReason?: Maybe<string>;
}

export interface GraphQLInputField {
  readonly name: string;
  readonly description: Maybe<string>;
  readonly type: TypeRef;
  readonly defaultValue: unknown;
  readonly deprecationReason: Maybe<string>;
}

export function isRequiredInputField(field: GraphQLInputField): boolean {
  return isNonNullTypeRef(field.type) && field.defaultValue === undefined;
}

export type GraphQLInputFieldMap = ObjMap<GraphQLInputField>;
