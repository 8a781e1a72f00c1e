import { inspect } from '../jsutils/inspect';
import { invariant } from '../jsutils/invariant';
import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap } from '../jsutils/ObjMap';

import { DirectiveLocation } from '../language/directiveLocation';
import { print } from '../language/printer';

import { astFromValue } from '../utilities/astFromValue';

import type {
  GraphQLArgument,
  GraphQLEnumValue,
  GraphQLField,
  GraphQLInputField,
  GraphQLNamedType,
  TypeRef,
} from './definition';
import {
  GraphQLEnumType,
  GraphQLObjectType,
  defineFieldMap,
  isAbstractType,
  isEnumType,
  isInputObjectType,
  isInterfaceType,
  isObjectType,
  isScalarType,
  isUnionType,
  named,
} from './definition';
import type { GraphQLDirective } from './directives';
import type { GraphQLSchema } from './schema';

export const __Schema: GraphQLObjectType<GraphQLSchema> =
  new GraphQLObjectType<GraphQLSchema>({
    name: '__Schema',
    description:
      'A GraphQL Schema defines the capabilities of a GraphQL server. It exposes all available types and directives on the server, as well as the entry points for query, mutation, and subscription operations.',
    fields: {
      description: {
        type: 'String',
        resolve: (schema) => schema.description,
      },
      types: {
        description: 'A list of all types supported by this server.',
        type: '[__Type!]!',
        resolve: (schema): Array<TypeRef> =>
          Object.keys(schema.getTypeMap()).map(named),
      },
      queryType: {
        description: 'The type that query operations will be rooted at.',
        type: '__Type!',
        resolve: (schema) => named(schema.getQueryType().name),
      },
      mutationType: {
        description:
          'If this server supports mutation, the type that mutation operations will be rooted at.',
        type: '__Type',
        resolve: (schema) => namedOrNull(schema.getMutationType()),
      },
      subscriptionType: {
        description:
          'If this server support subscription, the type that subscription operations will be rooted at.',
        type: '__Type',
        resolve: (schema) => namedOrNull(schema.getSubscriptionType()),
      },
      directives: {
        description: 'A list of all directives supported by this server.',
        type: '[__Directive!]!',
        resolve: (schema) => schema.getDirectives(),
      },
    },
  });

function namedOrNull(type: Maybe<GraphQLNamedType>): TypeRef | null {
  return type == null ? null : named(type.name);
}

export const __Directive: GraphQLObjectType<GraphQLDirective> =
  new GraphQLObjectType<GraphQLDirective>({
    name: '__Directive',
    description:
      "A Directive provides a way to describe alternate runtime execution and type validation behavior in a GraphQL document.\n\nIn some cases, you need to provide options to alter GraphQL's execution behavior in ways field arguments will not suffice, such as conditionally including or skipping a field. Directives provide this by describing additional information to the executor.",
    fields: {
      name: {
        type: 'String!',
        resolve: (directive) => directive.name,
      },
      description: {
        type: 'String',
        resolve: (directive) => directive.description,
      },
      isRepeatable: {
        type: 'Boolean!',
        resolve: (directive) => directive.isRepeatable,
      },
      locations: {
        type: '[__DirectiveLocation!]!',
        resolve: (directive) => directive.locations,
      },
      args: {
        type: '[__InputValue!]!',
        args: {
          includeDeprecated: {
            type: 'Boolean',
            defaultValue: false,
          },
        },
        resolve: (directive, { includeDeprecated }) =>
          withoutDeprecated(directive.args, includeDeprecated),
      },
    },
  });

export const __DirectiveLocation: GraphQLEnumType = new GraphQLEnumType({
  name: '__DirectiveLocation',
  description:
    'A Directive can be adjacent to many parts of the GraphQL language, a __DirectiveLocation describes one such possible adjacencies.',
  values: {
    QUERY: {
      value: DirectiveLocation.QUERY,
      description: 'Location adjacent to a query operation.',
    },
    MUTATION: {
      value: DirectiveLocation.MUTATION,
      description: 'Location adjacent to a mutation operation.',
    },
    SUBSCRIPTION: {
      value: DirectiveLocation.SUBSCRIPTION,
      description: 'Location adjacent to a subscription operation.',
    },
    FIELD: {
      value: DirectiveLocation.FIELD,
      description: 'Location adjacent to a field.',
    },
    FRAGMENT_DEFINITION: {
      value: DirectiveLocation.FRAGMENT_DEFINITION,
      description: 'Location adjacent to a fragment definition.',
    },
    FRAGMENT_SPREAD: {
      value: DirectiveLocation.FRAGMENT_SPREAD,
      description: 'Location adjacent to a fragment spread.',
    },
    INLINE_FRAGMENT: {
      value: DirectiveLocation.INLINE_FRAGMENT,
      description: 'Location adjacent to an inline fragment.',
    },
    VARIABLE_DEFINITION: {
      value: DirectiveLocation.VARIABLE_DEFINITION,
      description: 'Location adjacent to a variable definition.',
    },
    SCHEMA: {
      value: DirectiveLocation.SCHEMA,
      description: 'Location adjacent to a schema definition.',
    },
    SCALAR: {
      value: DirectiveLocation.SCALAR,
      description: 'Location adjacent to a scalar definition.',
    },
    OBJECT: {
      value: DirectiveLocation.OBJECT,
      description: 'Location adjacent to an object type definition.',
    },
    FIELD_DEFINITION: {
      value: DirectiveLocation.FIELD_DEFINITION,
      description: 'Location adjacent to a field definition.',
    },
    ARGUMENT_DEFINITION: {
      value: DirectiveLocation.ARGUMENT_DEFINITION,
      description: 'Location adjacent to an argument definition.',
    },
    INTERFACE: {
      value: DirectiveLocation.INTERFACE,
      description: 'Location adjacent to an interface definition.',
    },
    UNION: {
      value: DirectiveLocation.UNION,
      description: 'Location adjacent to a union definition.',
    },
    ENUM: {
      value: DirectiveLocation.ENUM,
      description: 'Location adjacent to an enum definition.',
    },
    ENUM_VALUE: {
      value: DirectiveLocation.ENUM_VALUE,
      description: 'Location adjacent to an enum value definition.',
    },
    INPUT_OBJECT: {
      value: DirectiveLocation.INPUT_OBJECT,
      description: 'Location adjacent to an input object type definition.',
    },
    INPUT_FIELD_DEFINITION: {
      value: DirectiveLocation.INPUT_FIELD_DEFINITION,
      description: 'Location adjacent to an input object field definition.',
    },
  },
});

/**
 * `__Type` is resolved over type references, so list and non-null wrappers
 * are described without any objects of their own.
 */
export const __Type: GraphQLObjectType<TypeRef> =
  new GraphQLObjectType<TypeRef>({
    name: '__Type',
    description:
      'The fundamental unit of any GraphQL Schema is the type. There are many kinds of types in GraphQL as represented by the `__TypeKind` enum.\n\nDepending on the kind of a type, certain fields describe information about that type. Scalar types provide no information beyond a name, description and optional `specifiedByURL`, while Enum types provide their values. Object and Interface types provide the fields they describe. Abstract types, Union and Interface, provide the Object types possible at runtime. List and NonNull types compose other types.',
    fields: {
      kind: {
        type: '__TypeKind!',
        resolve(typeRef, _args, _context, { schema }) {
          switch (typeRef.kind) {
            case 'ListTypeRef':
              return TypeKind.LIST;
            case 'NonNullTypeRef':
              return TypeKind.NON_NULL;
            case 'NamedTypeRef':
              return namedTypeKind(getNamedType(schema, typeRef));
          }
        },
      },
      name: {
        type: 'String',
        resolve: (typeRef) =>
          typeRef.kind === 'NamedTypeRef' ? typeRef.name : null,
      },
      description: {
        type: 'String',
        resolve: (typeRef, _args, _context, { schema }) =>
          getNamedType(schema, typeRef)?.description,
      },
      specifiedByURL: {
        type: 'String',
        resolve(typeRef, _args, _context, { schema }) {
          const type = getNamedType(schema, typeRef);
          return isScalarType(type) ? type.specifiedByURL : null;
        },
      },
      fields: {
        type: '[__Field!]',
        args: {
          includeDeprecated: { type: 'Boolean', defaultValue: false },
        },
        resolve(typeRef, { includeDeprecated }, _context, { schema }) {
          const type = getNamedType(schema, typeRef);
          if (isObjectType(type) || isInterfaceType(type)) {
            return withoutDeprecated(
              Object.values(type.getFields()),
              includeDeprecated,
            );
          }
          return null;
        },
      },
      interfaces: {
        type: '[__Type!]',
        resolve(typeRef, _args, _context, { schema }) {
          const type = getNamedType(schema, typeRef);
          if (isObjectType(type) || isInterfaceType(type)) {
            return type.interfaces.map(named);
          }
          return null;
        },
      },
      possibleTypes: {
        type: '[__Type!]',
        resolve(typeRef, _args, _context, { schema }) {
          const type = getNamedType(schema, typeRef);
          if (isAbstractType(type)) {
            return schema
              .getPossibleTypes(type)
              .map((possibleType) => named(possibleType.name));
          }
          return null;
        },
      },
      enumValues: {
        type: '[__EnumValue!]',
        args: {
          includeDeprecated: { type: 'Boolean', defaultValue: false },
        },
        resolve(typeRef, { includeDeprecated }, _context, { schema }) {
          const type = getNamedType(schema, typeRef);
          if (isEnumType(type)) {
            return withoutDeprecated(type.getValues(), includeDeprecated);
          }
          return null;
        },
      },
      inputFields: {
        type: '[__InputValue!]',
        args: {
          includeDeprecated: { type: 'Boolean', defaultValue: false },
        },
        resolve(typeRef, { includeDeprecated }, _context, { schema }) {
          const type = getNamedType(schema, typeRef);
          if (isInputObjectType(type)) {
            return withoutDeprecated(
              Object.values(type.getFields()),
              includeDeprecated,
            );
          }
          return null;
        },
      },
      ofType: {
        type: '__Type',
        resolve: (typeRef) =>
          typeRef.kind === 'NamedTypeRef' ? null : typeRef.ofType,
      },
    },
  });

function getNamedType(
  schema: GraphQLSchema,
  typeRef: TypeRef,
): GraphQLNamedType | undefined {
  if (typeRef.kind !== 'NamedTypeRef') {
    return undefined;
  }
  const type = schema.getType(typeRef.name);
  invariant(type !== undefined, `Unknown type "${typeRef.name}".`);
  return type;
}

function namedTypeKind(type: GraphQLNamedType | undefined): TypeKind {
  if (isScalarType(type)) {
    return TypeKind.SCALAR;
  }
  if (isObjectType(type)) {
    return TypeKind.OBJECT;
  }
  if (isInterfaceType(type)) {
    return TypeKind.INTERFACE;
  }
  if (isUnionType(type)) {
    return TypeKind.UNION;
  }
  if (isEnumType(type)) {
    return TypeKind.ENUM;
  }
  if (isInputObjectType(type)) {
    return TypeKind.INPUT_OBJECT;
  }
  /* c8 ignore next 3 */
  // Not reachable, all possible types have been considered.
  invariant(false, `Unexpected type: "${inspect(type)}".`);
}

export const __Field: GraphQLObjectType<GraphQLField> =
  new GraphQLObjectType<GraphQLField>({
    name: '__Field',
    description:
      'Object and Interface types are described by a list of Fields, each of which has a name, potentially a list of arguments, and a return type.',
    fields: {
      name: {
        type: 'String!',
        resolve: (field) => field.name,
      },
      description: {
        type: 'String',
        resolve: (field) => field.description,
      },
      args: {
        type: '[__InputValue!]!',
        args: {
          includeDeprecated: {
            type: 'Boolean',
            defaultValue: false,
          },
        },
        resolve: (field, { includeDeprecated }) =>
          withoutDeprecated(field.args, includeDeprecated),
      },
      type: {
        type: '__Type!',
        resolve: (field) => field.type,
      },
      isDeprecated: {
        type: 'Boolean!',
        resolve: (field) => field.deprecationReason != null,
      },
      deprecationReason: {
        type: 'String',
        resolve: (field) => field.deprecationReason,
      },
    },
  });

export const __InputValue: GraphQLObjectType<
  GraphQLArgument | GraphQLInputField
> = new GraphQLObjectType<GraphQLArgument | GraphQLInputField>({
  name: '__InputValue',
  description:
    'Arguments provided to Fields or Directives and the input fields of an InputObject are represented as Input Values which describe their type and optionally a default value.',
  fields: {
    name: {
      type: 'String!',
      resolve: (inputValue) => inputValue.name,
    },
    description: {
      type: 'String',
      resolve: (inputValue) => inputValue.description,
    },
    type: {
      type: '__Type!',
      resolve: (inputValue) => inputValue.type,
    },
    defaultValue: {
      type: 'String',
      description:
        'A GraphQL-formatted string representing the default value for this input value.',
      resolve(inputValue, _args, _context, { schema }) {
        const { type, defaultValue } = inputValue;
        const valueAST = astFromValue(schema, defaultValue, type);
        return valueAST ? print(valueAST) : null;
      },
    },
    isDeprecated: {
      type: 'Boolean!',
      resolve: (field) => field.deprecationReason != null,
    },
    deprecationReason: {
      type: 'String',
      resolve: (obj) => obj.deprecationReason,
    },
  },
});

export const __EnumValue: GraphQLObjectType<GraphQLEnumValue> =
  new GraphQLObjectType<GraphQLEnumValue>({
    name: '__EnumValue',
    description:
      'One possible value for a given Enum. Enum values are unique values, not a placeholder for a string or numeric value. However an Enum value is returned in a JSON response as a string.',
    fields: {
      name: {
        type: 'String!',
        resolve: (enumValue) => enumValue.name,
      },
      description: {
        type: 'String',
        resolve: (enumValue) => enumValue.description,
      },
      isDeprecated: {
        type: 'Boolean!',
        resolve: (enumValue) => enumValue.deprecationReason != null,
      },
      deprecationReason: {
        type: 'String',
        resolve: (enumValue) => enumValue.deprecationReason,
      },
    },
  });

function withoutDeprecated<T extends { deprecationReason: Maybe<string> }>(
  items: ReadonlyArray<T>,
  includeDeprecated: unknown,
): ReadonlyArray<T> {
  return includeDeprecated === true
    ? items
    : items.filter((item) => item.deprecationReason == null);
}

export enum TypeKind {
  SCALAR = 'SCALAR',
  OBJECT = 'OBJECT',
  INTERFACE = 'INTERFACE',
  UNION = 'UNION',
  ENUM = 'ENUM',
  INPUT_OBJECT = 'INPUT_OBJECT',
  LIST = 'LIST',
  NON_NULL = 'NON_NULL',
}

export const __TypeKind: GraphQLEnumType = new GraphQLEnumType({
  name: '__TypeKind',
  description: 'An enum describing what kind of type a given `__Type` is.',
  values: {
    SCALAR: {
      value: TypeKind.SCALAR,
      description: 'Indicates this type is a scalar.',
    },
    OBJECT: {
      value: TypeKind.OBJECT,
      description:
        'Indicates this type is an object. `fields` and `interfaces` are valid fields.',
    },
    INTERFACE: {
      value: TypeKind.INTERFACE,
      description:
        'Indicates this type is an interface. `fields`, `interfaces`, and `possibleTypes` are valid fields.',
    },
    UNION: {
      value: TypeKind.UNION,
      description:
        'Indicates this type is a union. `possibleTypes` is a valid field.',
    },
    ENUM: {
      value: TypeKind.ENUM,
      description:
        'Indicates this type is an enum. `enumValues` is a valid field.',
    },
    INPUT_OBJECT: {
      value: TypeKind.INPUT_OBJECT,
      description:
        'Indicates this type is an input object. `inputFields` is a valid field.',
    },
    LIST: {
      value: TypeKind.LIST,
      description: 'Indicates this type is a list. `ofType` is a valid field.',
    },
    NON_NULL: {
      value: TypeKind.NON_NULL,
      description:
        'Indicates this type is a non-null. `ofType` is a valid field.',
    },
  },
});

/**
 * Meta-fields available on every composite type, resolved by the executor
 * like any other field.
 */
const metaFields: ObjMap<GraphQLField> = defineFieldMap<unknown, unknown>(
  'Meta',
  {
    __schema: {
      type: '__Schema!',
      description: 'Access the current type schema of this server.',
      resolve: (_source, _args, _context, { schema }) => schema,
    },
    __type: {
      type: '__Type',
      description: 'Request the type information of a single type.',
      args: {
        name: { type: 'String!' },
      },
      resolve(_source, { name }, _context, { schema }) {
        return typeof name === 'string' && schema.getType(name) !== undefined
          ? named(name)
          : null;
      },
    },
    __typename: {
      type: 'String!',
      description: 'The name of the current Object type at runtime.',
      resolve: (_source, _args, _context, { parentType }) => parentType.name,
    },
  },
);

export const SchemaMetaFieldDef: GraphQLField = metaFields.__schema;
export const TypeMetaFieldDef: GraphQLField = metaFields.__type;
export const TypeNameMetaFieldDef: GraphQLField = metaFields.__typename;

export const introspectionTypes: ReadonlyArray<GraphQLNamedType> =
  Object.freeze([
    __Schema,
    __Directive,
    __DirectiveLocation,
    __Type,
    __Field,
    __InputValue,
    __EnumValue,
    __TypeKind,
  ]);

export function isIntrospectionType(type: GraphQLNamedType): boolean {
  return introspectionTypes.some(({ name }) => type.name === name);
}
