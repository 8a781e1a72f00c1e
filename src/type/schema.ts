import { devAssert } from '../jsutils/devAssert';
import { inspect } from '../jsutils/inspect';
import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap, ReadOnlyObjMap } from '../jsutils/ObjMap';

import { OperationTypeNode } from '../language/ast';

import type {
  GraphQLAbstractType,
  GraphQLCompositeType,
  GraphQLField,
  GraphQLInterfaceType,
  GraphQLNamedType,
  GraphQLObjectType,
  TypeRef,
} from './definition';
import {
  getNamedTypeName,
  isInterfaceType,
  isObjectType,
  isUnionType,
} from './definition';
import type { GraphQLDirective } from './directives';
import { isDirective, specifiedDirectives } from './directives';
import {
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
  introspectionTypes,
} from './introspection';
import { specifiedScalarTypes } from './scalars';

/**
 * Test if the given value is a GraphQL schema.
 */
export function isSchema(schema: unknown): schema is GraphQLSchema {
  return schema instanceof GraphQLSchema;
}

export function assertSchema(schema: unknown): GraphQLSchema {
  if (!isSchema(schema)) {
    throw new Error(`Expected ${inspect(schema)} to be a GraphQL schema.`);
  }
  return schema;
}

/**
 * Schema Definition
 *
 * A Schema is created by supplying the root types of each type of operation,
 * query and mutation (optional), along with every other named type the
 * operations can reach. Types refer to each other by name, and the schema is
 * the arena that resolves those names. A schema is read-only once built and
 * may be shared by any number of concurrent requests.
 *
 * Example:
 *
 * ```ts
 * const MyAppSchema = new GraphQLSchema({
 *   query: MyAppQueryRootType,
 *   mutation: MyAppMutationRootType,
 *   types: [UserType, PostType],
 * });
 * ```
 *
 * The specified scalars and the introspection types are always part of the
 * arena. If `directives` is omitted, the specified directives (`@include`,
 * `@skip`, `@deprecated` and `@specifiedBy`) are used.
 */
export class GraphQLSchema {
  readonly description: Maybe<string>;

  private readonly _queryType: GraphQLObjectType;
  private readonly _mutationType: Maybe<GraphQLObjectType>;
  private readonly _subscriptionType: Maybe<GraphQLObjectType>;
  private readonly _directives: ReadonlyArray<GraphQLDirective>;
  private readonly _typeMap: ObjMap<GraphQLNamedType>;
  private readonly _subTypesMap: Map<string, Set<string>>;
  private readonly _possibleTypesMap: Map<string, Array<GraphQLObjectType>>;
  private readonly _implementationsMap: Map<string, InterfaceImplementations>;

  constructor(config: Readonly<GraphQLSchemaConfig>) {
    devAssert(
      isObjectType(config.query),
      `Schema query must be Object Type but got: ${inspect(config.query)}.`,
    );
    devAssert(
      !config.directives || Array.isArray(config.directives),
      '"directives" must be Array if provided but got: ' +
        `${inspect(config.directives)}.`,
    );
    devAssert(
      config.directives?.every(isDirective) !== false,
      '"directives" must only contain GraphQL directives.',
    );

    this.description = config.description;
    this._queryType = config.query;
    this._mutationType = config.mutation;
    this._subscriptionType = config.subscription;
    this._directives = Object.freeze([
      ...(config.directives ?? specifiedDirectives),
    ]);

    this._typeMap = Object.create(null);
    const addType = (namedType: GraphQLNamedType, replaceable: boolean) => {
      const existing = this._typeMap[namedType.name];
      if (existing === undefined) {
        this._typeMap[namedType.name] = namedType;
      } else if (existing !== namedType && !replaceable) {
        throw new Error(
          'Schema must contain uniquely named types but contains multiple ' +
            `types named "${namedType.name}".`,
        );
      }
    };

    for (const rootType of [
      config.query,
      config.mutation,
      config.subscription,
    ]) {
      if (rootType != null) {
        addType(rootType, false);
      }
    }
    for (const namedType of config.types ?? []) {
      addType(namedType, false);
    }
    for (const scalarType of specifiedScalarTypes) {
      addType(scalarType, true);
    }
    for (const introspectionType of introspectionTypes) {
      addType(introspectionType, false);
    }

    // Keep track of all subtypes and possible types of each abstract type.
    this._subTypesMap = new Map();
    this._possibleTypesMap = new Map();
    this._implementationsMap = new Map();

    const addSubType = (abstractName: string, subTypeName: string) => {
      let subTypes = this._subTypesMap.get(abstractName);
      if (!subTypes) {
        subTypes = new Set();
        this._subTypesMap.set(abstractName, subTypes);
      }
      subTypes.add(subTypeName);
    };
    const addPossibleType = (
      abstractName: string,
      possibleType: GraphQLObjectType,
    ) => {
      let possibleTypes = this._possibleTypesMap.get(abstractName);
      if (!possibleTypes) {
        possibleTypes = [];
        this._possibleTypesMap.set(abstractName, possibleTypes);
      }
      possibleTypes.push(possibleType);
    };
    const getImplementationsOf = (interfaceName: string) => {
      let implementations = this._implementationsMap.get(interfaceName);
      if (!implementations) {
        implementations = { objects: [], interfaces: [] };
        this._implementationsMap.set(interfaceName, implementations);
      }
      return implementations;
    };

    for (const namedType of Object.values(this._typeMap)) {
      if (isObjectType(namedType)) {
        for (const iface of namedType.interfaces) {
          addSubType(iface, namedType.name);
          addPossibleType(iface, namedType);
          getImplementationsOf(iface).objects.push(namedType);
        }
      } else if (isInterfaceType(namedType)) {
        for (const iface of namedType.interfaces) {
          addSubType(iface, namedType.name);
          getImplementationsOf(iface).interfaces.push(namedType);
        }
      } else if (isUnionType(namedType)) {
        for (const memberName of namedType.types) {
          const memberType = this._typeMap[memberName];
          addSubType(namedType.name, memberName);
          if (isObjectType(memberType)) {
            addPossibleType(namedType.name, memberType);
          }
        }
      }
    }

    Object.freeze(this);
  }

  get [Symbol.toStringTag]() {
    return 'GraphQLSchema';
  }

  getQueryType(): GraphQLObjectType {
    return this._queryType;
  }

  getMutationType(): Maybe<GraphQLObjectType> {
    return this._mutationType;
  }

  getSubscriptionType(): Maybe<GraphQLObjectType> {
    return this._subscriptionType;
  }

  getRootType(operation: OperationTypeNode): Maybe<GraphQLObjectType> {
    switch (operation) {
      case OperationTypeNode.QUERY:
        return this.getQueryType();
      case OperationTypeNode.MUTATION:
        return this.getMutationType();
      case OperationTypeNode.SUBSCRIPTION:
        return this.getSubscriptionType();
    }
  }

  getTypeMap(): ReadOnlyObjMap<GraphQLNamedType> {
    return this._typeMap;
  }

  getType(name: string): GraphQLNamedType | undefined {
    return this._typeMap[name];
  }

  /**
   * Resolves the type named by `typeRef` once list and non-null wrappers are
   * removed.
   */
  getNamedType(typeRef: TypeRef): GraphQLNamedType | undefined {
    return this.getType(getNamedTypeName(typeRef));
  }

  /**
   * The interfaces that `type` declares, skipping names the schema does not
   * define as interfaces.
   */
  getInterfaces(
    type: GraphQLObjectType | GraphQLInterfaceType,
  ): ReadonlyArray<GraphQLInterfaceType> {
    const interfaces: Array<GraphQLInterfaceType> = [];
    for (const ifaceName of type.interfaces) {
      const iface = this.getType(ifaceName);
      if (isInterfaceType(iface)) {
        interfaces.push(iface);
      }
    }
    return interfaces;
  }

  getPossibleTypes(
    abstractType: GraphQLAbstractType,
  ): ReadonlyArray<GraphQLObjectType> {
    return this._possibleTypesMap.get(abstractType.name) ?? [];
  }

  getImplementations(interfaceType: GraphQLInterfaceType): {
    readonly objects: ReadonlyArray<GraphQLObjectType>;
    readonly interfaces: ReadonlyArray<GraphQLInterfaceType>;
  } {
    return (
      this._implementationsMap.get(interfaceType.name) ?? {
        objects: [],
        interfaces: [],
      }
    );
  }

  isSubType(
    abstractType: GraphQLAbstractType,
    maybeSubType: GraphQLObjectType | GraphQLInterfaceType,
  ): boolean {
    return (
      this._subTypesMap.get(abstractType.name)?.has(maybeSubType.name) ??
      false
    );
  }

  /**
   * Looks up a field of a composite type, including the `__schema`,
   * `__type` and `__typename` meta-fields. `__schema` and `__type` are only
   * available on the query root type; `__typename` is available everywhere.
   */
  getField(
    parentType: GraphQLCompositeType,
    fieldName: string,
  ): GraphQLField | undefined {
    switch (fieldName) {
      case SchemaMetaFieldDef.name:
        return parentType === this.getQueryType()
          ? SchemaMetaFieldDef
          : undefined;
      case TypeMetaFieldDef.name:
        return parentType === this.getQueryType()
          ? TypeMetaFieldDef
          : undefined;
      case TypeNameMetaFieldDef.name:
        return TypeNameMetaFieldDef;
    }

    if (isUnionType(parentType)) {
      return undefined;
    }
    return parentType.getFields()[fieldName];
  }

  getDirectives(): ReadonlyArray<GraphQLDirective> {
    return this._directives;
  }

  getDirective(name: string): Maybe<GraphQLDirective> {
    return this.getDirectives().find((directive) => directive.name === name);
  }
}

interface InterfaceImplementations {
  objects: Array<GraphQLObjectType>;
  interfaces: Array<GraphQLInterfaceType>;
}

export interface GraphQLSchemaConfig {
  description?: Maybe<string>;
  query: GraphQLObjectType;
  mutation?: Maybe<GraphQLObjectType>;
  subscription?: Maybe<GraphQLObjectType>;
  types?: Maybe<ReadonlyArray<GraphQLNamedType>>;
  directives?: Maybe<ReadonlyArray<GraphQLDirective>>;
}
