import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectJSON } from '../../__testUtils__/expectJSON';
import { resolveOnNextTick } from '../../__testUtils__/resolveOnNextTick';

import { parse } from '../../language/parser';

import type { GraphQLResolveInfo } from '../../type/definition';
import { GraphQLObjectType } from '../../type/definition';
import { GraphQLSchema } from '../../type/schema';

import { execute, executeSync, formatResult } from '../execute';

interface User {
  id: number | null;
  name: string;
}

function userSchema(findUser: (id: number) => User | undefined) {
  return new GraphQLSchema({
    query: new GraphQLObjectType({
      name: 'Query',
      fields: {
        user: {
          type: 'User',
          args: { id: { type: 'Int!' } },
          resolve: (_source, args: { id: number }) => findUser(args.id),
        },
      },
    }),
    types: [
      new GraphQLObjectType({
        name: 'User',
        fields: {
          id: { type: 'Int!' },
          name: { type: 'String' },
        },
      }),
    ],
  });
}

describe('Execute: Handles basic execution tasks', () => {
  const document = parse('{ user(id: 1) { id name } }');

  it('resolves a selection into a tree of the same shape', () => {
    const schema = userSchema((id) =>
      id === 1 ? { id: 1, name: 'Ann' } : undefined,
    );

    const result = executeSync({ schema, document });
    expect(JSON.stringify(result)).to.equal(
      '{"data":{"user":{"id":1,"name":"Ann"}}}',
    );
  });

  it('nulls a nullable field whose resolver returns nothing', () => {
    const schema = userSchema(() => undefined);

    const result = executeSync({ schema, document });
    expect(JSON.stringify(result)).to.equal('{"data":{"user":null}}');
  });

  it('bubbles a null in a non-null field to the nearest nullable parent', () => {
    const schema = userSchema(() => ({ id: null, name: 'Ann' }));

    const result = executeSync({ schema, document });
    expect(JSON.stringify(result)).to.equal(
      '{"data":{"user":null},"errors":[{"message":"Cannot return null for non-nullable field User.id.","locations":[{"line":1,"column":17}],"path":["user","id"]}]}',
    );
  });

  it('keeps response keys in selection order, merging repeated keys', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          a: { type: 'String', resolve: () => 'A' },
          b: { type: 'String', resolve: () => 'B' },
          c: { type: 'String', resolve: () => 'C' },
        },
      }),
    });

    const result = executeSync({
      schema,
      document: parse('{ c a ... on Query { b c } first: a }'),
    });

    expect(result.data && Object.keys(result.data)).to.deep.equal([
      'c',
      'a',
      'b',
      'first',
    ]);
    expect(result).to.deep.equal({
      data: { c: 'C', a: 'A', b: 'B', first: 'A' },
    });
  });

  it('passes source, args, context and info to resolvers', () => {
    let seen:
      | {
          source: unknown;
          args: unknown;
          context: unknown;
          info: GraphQLResolveInfo;
        }
      | undefined;

    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          greeting: {
            type: 'String',
            args: {
              name: { type: 'String', defaultValue: 'world' },
              punctuation: { type: 'String' },
            },
            resolve(source, args: { name: string }, context, info) {
              seen = { source, args, context, info };
              return `hello ${args.name}`;
            },
          },
        },
      }),
    });
    const rootValue = { root: true };
    const contextValue = { user: 'test-user' };

    const result = executeSync({
      schema,
      document: parse('query Greet { hi: greeting }'),
      rootValue,
      contextValue,
    });

    expect(result).to.deep.equal({ data: { hi: 'hello world' } });
    expect(seen?.source).to.equal(rootValue);
    expect(seen?.args).to.deep.equal({ name: 'world' });
    expect(seen?.context).to.equal(contextValue);
    expect(seen?.info.fieldName).to.equal('greeting');
    expect(seen?.info.path).to.deep.equal({
      prev: undefined,
      key: 'hi',
      typename: 'Query',
      ordinal: 0,
    });
    expect(seen?.info.operation.name?.value).to.equal('Greet');
  });

  it('calls methods of the source with the default resolver', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          shout: { type: 'String', args: { word: { type: 'String!' } } },
          plain: { type: 'Int' },
        },
      }),
    });

    const rootValue = {
      plain: 7,
      shout(args: { word: string }) {
        return args.word.toUpperCase();
      },
    };

    const result = executeSync({
      schema,
      document: parse('{ shout(word: "hey") plain }'),
      rootValue,
    });

    expect(result).to.deep.equal({ data: { shout: 'HEY', plain: 7 } });
  });

  it('resolves asynchronous fields concurrently', async () => {
    const events: Array<string> = [];
    const slowField = (name: string) => ({
      type: 'String',
      async resolve() {
        events.push(`start ${name}`);
        await resolveOnNextTick();
        events.push(`end ${name}`);
        return name.toUpperCase();
      },
    });

    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: { a: slowField('a'), b: slowField('b') },
      }),
    });

    const result = await execute({ schema, document: parse('{ a b }') });

    expect(result).to.deep.equal({ data: { a: 'A', b: 'B' } });
    expect(events).to.deep.equal(['start a', 'start b', 'end a', 'end b']);
  });

  it('orders field errors by response position, not by completion time', async () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          a: {
            type: 'String',
            async resolve() {
              await resolveOnNextTick();
              await resolveOnNextTick();
              throw new Error('a failed');
            },
          },
          b: { type: 'String', resolve: () => 'B' },
          c: {
            type: 'String',
            resolve() {
              throw new Error('c failed');
            },
          },
        },
      }),
    });

    const result = await execute({ schema, document: parse('{ a b c }') });

    expectJSON(result).toDeepEqual({
      data: { a: null, b: 'B', c: null },
      errors: [
        {
          message: 'a failed',
          locations: [{ line: 1, column: 3 }],
          path: ['a'],
        },
        {
          message: 'c failed',
          locations: [{ line: 1, column: 7 }],
          path: ['c'],
        },
      ],
    });
  });

  it('orders list item errors by index', async () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          items: {
            type: '[Int]',
            resolve: () => [
              resolveOnNextTick().then(() => {
                throw new Error('first');
              }),
              2,
              Promise.reject(new Error('third')),
            ],
          },
        },
      }),
    });

    const result = await execute({ schema, document: parse('{ items }') });

    expectJSON(result).toDeepEqual({
      data: { items: [null, 2, null] },
      errors: [
        {
          message: 'first',
          locations: [{ line: 1, column: 3 }],
          path: ['items', 0],
        },
        {
          message: 'third',
          locations: [{ line: 1, column: 3 }],
          path: ['items', 2],
        },
      ],
    });
  });

  it('wraps thrown values that are not errors', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          broken: {
            type: 'String',
            resolve() {
              throw 'oops';
            },
          },
        },
      }),
    });

    const result = executeSync({ schema, document: parse('{ broken }') });

    expectJSON(result).toDeepEqual({
      data: { broken: null },
      errors: [
        {
          message: 'Unexpected error value: "oops"',
          locations: [{ line: 1, column: 3 }],
          path: ['broken'],
        },
      ],
    });
  });

  it('treats a returned error like a thrown one', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          returned: { type: 'String', resolve: () => new Error('returned') },
        },
      }),
    });

    const result = executeSync({ schema, document: parse('{ returned }') });

    expectJSON(result).toDeepEqual({
      data: { returned: null },
      errors: [
        {
          message: 'returned',
          locations: [{ line: 1, column: 3 }],
          path: ['returned'],
        },
      ],
    });
  });

  it('reports leaf values that cannot be serialized', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          count: { type: 'Int', resolve: () => 'many' },
          names: { type: 'String', resolve: () => ['a'] },
        },
      }),
    });

    const result = executeSync({ schema, document: parse('{ count names }') });

    expectJSON(result).toDeepEqual({
      data: { count: null, names: null },
      errors: [
        {
          message: 'Int cannot represent non-integer value: "many"',
          locations: [{ line: 1, column: 3 }],
          path: ['count'],
        },
        {
          message: 'String cannot represent value: ["a"]',
          locations: [{ line: 1, column: 9 }],
          path: ['names'],
        },
      ],
    });
  });

  it('reports a list field whose resolver returns a non-list', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: { tags: { type: '[String]', resolve: () => 'solo' } },
      }),
    });

    const result = executeSync({ schema, document: parse('{ tags }') });

    expectJSON(result).toDeepEqual({
      data: { tags: null },
      errors: [
        {
          message:
            'Expected Iterable, but did not find one for field "Query.tags".',
          locations: [{ line: 1, column: 3 }],
          path: ['tags'],
        },
      ],
    });
  });

  it('returns request errors without data', () => {
    const schema = userSchema(() => undefined);

    expectJSON(
      executeSync({
        schema,
        document: parse('query A { user(id: 1) { id } }'),
        operationName: 'B',
      }),
    ).toDeepEqual({ errors: [{ message: 'Unknown operation named "B".' }] });

    expectJSON(
      executeSync({
        schema,
        document: parse('query A { user(id: 1) { id } } query B { __typename }'),
      }),
    ).toDeepEqual({
      errors: [
        {
          message:
            'Must provide operation name if query contains multiple operations.',
        },
      ],
    });

    expectJSON(
      executeSync({
        schema,
        document: parse('mutation { user(id: 1) { id } }'),
      }),
    ).toDeepEqual({
      errors: [
        {
          message: 'Schema is not configured to execute mutation operation.',
          locations: [{ line: 1, column: 1 }],
        },
      ],
    });
  });

  it('selects the named operation', () => {
    const schema = userSchema(() => ({ id: 5, name: 'Eve' }));

    const result = executeSync({
      schema,
      document: parse('query A { user(id: 1) { id } } query B { __typename }'),
      operationName: 'B',
    });

    expect(result).to.deep.equal({ data: { __typename: 'Query' } });
  });

  it('throws from executeSync when a resolver is asynchronous', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          later: { type: 'String', resolve: () => Promise.resolve('x') },
        },
      }),
    });

    expect(() =>
      executeSync({ schema, document: parse('{ later }') }),
    ).to.throw('GraphQL execution failed to complete synchronously.');
  });

  it('refuses to run against an invalid schema', () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: { broken: { type: 'Nowhere' } },
      }),
    });

    expect(() =>
      executeSync({ schema, document: parse('{ broken }') }),
    ).to.throw(
      'The type of Query.broken must be Output Type but got: Nowhere (type "Nowhere" is not defined).',
    );
  });

  it('formats a result into plain JSON values', () => {
    const schema = userSchema(() => ({ id: null, name: 'Ann' }));
    const result = executeSync({
      schema,
      document: parse('{ user(id: 1) { id name } }'),
    });

    expect(formatResult(result)).to.deep.equal({
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
});
