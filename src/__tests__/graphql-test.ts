import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectJSON } from '../__testUtils__/expectJSON';

import { GraphQLObjectType } from '../type/definition';
import { GraphQLSchema } from '../type/schema';

import { graphql, graphqlSync } from '../graphql';

interface User {
  id: number | null;
  name: string;
}

function userSchema(lookup: (id: number) => User | null | Promise<User | null>) {
  return new GraphQLSchema({
    query: new GraphQLObjectType({
      name: 'Query',
      fields: {
        user: {
          type: 'User',
          args: { id: { type: 'Int!' } },
          resolve: (_source, args: { id: number }) => lookup(args.id),
        },
        greeting: {
          type: 'String',
          resolve: (_source, _args, context: { name: string }) =>
            Promise.resolve(`hi ${context.name}`),
        },
      },
    }),
    types: [
      new GraphQLObjectType({
        name: 'User',
        fields: { id: { type: 'Int!' }, name: { type: 'String' } },
      }),
    ],
  });
}

const ann: User = { id: 1, name: 'Ann' };

describe('graphql', () => {
  it('runs a request from source text to response', async () => {
    const schema = userSchema((id) => (id === 1 ? ann : null));

    const found = await graphql({ schema, source: '{ user(id: 1) { id name } }' });
    const missing = await graphql({ schema, source: '{ user(id: 2) { id name } }' });

    expect(JSON.stringify(found)).to.equal(
      '{"data":{"user":{"id":1,"name":"Ann"}}}',
    );
    expect(JSON.stringify(missing)).to.equal('{"data":{"user":null}}');
  });

  it('bubbles a null non-null field to its parent', async () => {
    const schema = userSchema(() => Promise.resolve({ id: null, name: 'Ann' }));

    const result = await graphql({
      schema,
      source: '{ user(id: 1) { id name } }',
    });

    expectJSON(result).toDeepEqual({
      data: { user: null },
      errors: [
        {
          message: 'Cannot return null for non-nullable field User.id.',
          locations: [{ line: 1, column: 17 }],
          path: ['user', 'id'],
        },
      ],
    });
  });

  it('passes variables and the operation name through', async () => {
    const schema = userSchema((id) => ({ id, name: `user ${id}` }));

    const result = await graphql({
      schema,
      source:
        'query First { user(id: 1) { name } }\nquery Pick($id: Int!) { user(id: $id) { name } }',
      operationName: 'Pick',
      variableValues: { id: 7 },
    });

    expect(result).to.deep.equal({ data: { user: { name: 'user 7' } } });
  });

  it('keeps the context of concurrent requests apart', async () => {
    const schema = userSchema(() => null);

    const [first, second] = await Promise.all([
      graphql({ schema, source: '{ greeting }', contextValue: { name: 'Ann' } }),
      graphql({ schema, source: '{ greeting }', contextValue: { name: 'Bo' } }),
    ]);

    expect(first).to.deep.equal({ data: { greeting: 'hi Ann' } });
    expect(second).to.deep.equal({ data: { greeting: 'hi Bo' } });
  });

  it('answers introspection through the same pipeline', () => {
    const result = graphqlSync({
      schema: userSchema(() => null),
      source: '{ __type(name: "User") { name fields { name } } }',
    });

    expect(result).to.deep.equal({
      data: {
        __type: { name: 'User', fields: [{ name: 'id' }, { name: 'name' }] },
      },
    });
  });

  describe('request errors', () => {
    const schema = userSchema(() => ann);

    it('reports a parse error without data', async () => {
      const result = await graphql({
        schema,
        source: '{ user(id: 1) { id name }',
      });

      expect(result).to.not.have.property('data');
      expectJSON(result).toDeepEqual({
        errors: [
          {
            message: 'Syntax Error: Expected Name, found <EOF>.',
            locations: [{ line: 1, column: 26 }],
          },
        ],
      });
    });

    it('reports a lexical error without data', async () => {
      expectJSON(await graphql({ schema, source: '{ a ? }' })).toDeepEqual({
        errors: [
          {
            message: 'Syntax Error: Unexpected character: "?".',
            locations: [{ line: 1, column: 5 }],
          },
        ],
      });
    });

    it('honours parse options', async () => {
      const result = await graphql({
        schema,
        source: '{ user(id: 1) { id } }',
        parseOptions: { maxTokens: 3 },
      });

      expect(result.errors?.map((error) => error.message)).to.deep.equal([
        'Syntax Error: Document contains more than 3 tokens. Parsing aborted.',
      ]);
    });

    it('reports a document nested too deeply', async () => {
      const depth = 20000;
      const result = await graphql({
        schema,
        source: `{ user(id: ${'['.repeat(depth)}${']'.repeat(depth)}) { id } }`,
      });

      expect(result).to.not.have.property('data');
      expect(result.errors?.map((error) => error.message)).to.deep.equal([
        'Syntax Error: Document is nested more than 1000 levels deep. Parsing aborted.',
      ]);
    });

    it('reports every validation error at once', async () => {
      expectJSON(
        await graphql({ schema, source: '{ user { id } nope }' }),
      ).toDeepEqual({
        errors: [
          {
            message:
              'Field "user" argument "id" of type "Int!" is required, but it was not provided.',
            locations: [{ line: 1, column: 3 }],
          },
          {
            message: 'Cannot query field "nope" on type "Query".',
            locations: [{ line: 1, column: 15 }],
          },
        ],
      });
    });

    it('reports an invalid schema', async () => {
      const brokenSchema = new GraphQLSchema({
        query: new GraphQLObjectType({
          name: 'Query',
          fields: { broken: { type: '[Missing!]' } },
        }),
      });

      expectJSON(
        await graphql({ schema: brokenSchema, source: '{ broken }' }),
      ).toDeepEqual({
        errors: [
          {
            message:
              'The type of Query.broken must be Output Type but got: [Missing!] (type "Missing" is not defined).',
          },
        ],
      });
    });
  });

  it('refuses to run asynchronous resolvers synchronously', () => {
    expect(() =>
      graphqlSync({
        schema: userSchema(() => Promise.resolve(ann)),
        source: '{ user(id: 1) { id } }',
      }),
    ).to.throw('GraphQL execution failed to complete synchronously.');
  });
});
