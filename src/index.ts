/**
 * A GraphQL query pipeline: lexer and parser, schema model, validator,
 * executor and response assembly.
 *
 * ```ts
 * import { GraphQLObjectType, GraphQLSchema, graphql } from 'graphql-pipeline';
 *
 * const schema = new GraphQLSchema({
 *   query: new GraphQLObjectType({
 *     name: 'Query',
 *     fields: { hello: { type: 'String', resolve: () => 'world' } },
 *   }),
 * });
 *
 * graphql({ schema, source: '{ hello }' }).then((result) => {
 *   // { data: { hello: 'world' } }
 * });
 * ```
 *
 * @packageDocumentation
 */

/** The primary entry point into fulfilling a GraphQL request. */
export { graphql, graphqlSync } from './graphql';
export type { GraphQLArgs } from './graphql';

/** Create and operate on GraphQL type definitions and schema. */
export * from './type/index';

/** Parse and operate on GraphQL language source files. */
export * from './language/index';

/** Execute GraphQL queries. */
export * from './execution/index';

/** Validate GraphQL documents. */
export * from './validation/index';

/** Create, format, and print GraphQL errors. */
export * from './error/index';

/** Utilities for operating on GraphQL type schema and parsed sources. */
export * from './utilities/index';
