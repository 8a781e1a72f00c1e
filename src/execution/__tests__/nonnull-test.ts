import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectJSON } from '../../__testUtils__/expectJSON';

import { parse } from '../../language/parser';

import { GraphQLObjectType } from '../../type/definition';
import { GraphQLSchema } from '../../type/schema';

import { execute, executeSync } from '../execute';

const syncError = new Error('sync');
const promiseError = new Error('promise');

type DataResolvers = { [field: string]: () => unknown };

const throwingData: DataResolvers = {
  sync() {
    throw syncError;
  },
  syncNonNull() {
    throw syncError;
  },
  promise() {
    return Promise.reject(promiseError);
  },
  promiseNonNull() {
    return Promise.reject(promiseError);
  },
  syncNest() {
    return throwingData;
  },
  syncNonNullNest() {
    return throwingData;
  },
  promiseNest() {
    return Promise.resolve(throwingData);
  },
};

const nullingData: DataResolvers = {
  sync: () => null,
  syncNonNull: () => null,
  promise: () => Promise.resolve(null),
  promiseNonNull: () => Promise.resolve(null),
  syncNest: () => nullingData,
  syncNonNullNest: () => nullingData,
  promiseNest: () => Promise.resolve(nullingData),
};

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'DataType',
    fields: {
      sync: { type: 'String' },
      syncNonNull: { type: 'String!' },
      promise: { type: 'String' },
      promiseNonNull: { type: 'String!' },
      syncNest: { type: 'DataType' },
      syncNonNullNest: { type: 'DataType!' },
      promiseNest: { type: 'DataType' },
    },
  }),
});

function run(query: string, rootValue: unknown) {
  return execute({ schema, document: parse(query), rootValue });
}

describe('Execute: handles non-nullable types', () => {
  describe('nulls a nullable field', () => {
    const query = '{ sync promise }';

    it('that returns null', async () => {
      expect(await run(query, nullingData)).to.deep.equal({
        data: { sync: null, promise: null },
      });
    });

    it('that throws', async () => {
      expectJSON(await run(query, throwingData)).toDeepEqual({
        data: { sync: null, promise: null },
        errors: [
          {
            message: syncError.message,
            path: ['sync'],
            locations: [{ line: 1, column: 3 }],
          },
          {
            message: promiseError.message,
            path: ['promise'],
            locations: [{ line: 1, column: 8 }],
          },
        ],
      });
    });
  });

  describe('nulls the parent of a non-null field', () => {
    const query = `
      {
        syncNest { syncNonNull }
        promiseNest { promiseNonNull }
      }
    `;

    it('that returns null', async () => {
      expectJSON(await run(query, nullingData)).toDeepEqual({
        data: { syncNest: null, promiseNest: null },
        errors: [
          {
            message:
              'Cannot return null for non-nullable field DataType.syncNonNull.',
            path: ['syncNest', 'syncNonNull'],
            locations: [{ line: 3, column: 20 }],
          },
          {
            message:
              'Cannot return null for non-nullable field DataType.promiseNonNull.',
            path: ['promiseNest', 'promiseNonNull'],
            locations: [{ line: 4, column: 23 }],
          },
        ],
      });
    });

    it('that throws', async () => {
      expectJSON(await run(query, throwingData)).toDeepEqual({
        data: { syncNest: null, promiseNest: null },
        errors: [
          {
            message: syncError.message,
            path: ['syncNest', 'syncNonNull'],
            locations: [{ line: 3, column: 20 }],
          },
          {
            message: promiseError.message,
            path: ['promiseNest', 'promiseNonNull'],
            locations: [{ line: 4, column: 23 }],
          },
        ],
      });
    });
  });

  it('bubbles through a chain of non-null fields', async () => {
    const query = `
      {
        syncNest {
          syncNonNullNest {
            syncNonNullNest { promiseNonNull }
          }
          sync
        }
      }
    `;

    expectJSON(await run(query, nullingData)).toDeepEqual({
      data: { syncNest: null },
      errors: [
        {
          message:
            'Cannot return null for non-nullable field DataType.promiseNonNull.',
          path: [
            'syncNest',
            'syncNonNullNest',
            'syncNonNullNest',
            'promiseNonNull',
          ],
          locations: [{ line: 5, column: 31 }],
        },
      ],
    });
  });

  it('records each error once when a non-null sibling nulls the parent', async () => {
    const query = `
      {
        syncNest {
          promise
          syncNonNull
        }
        sync
      }
    `;

    expectJSON(await run(query, throwingData)).toDeepEqual({
      data: { syncNest: null, sync: null },
      errors: [
        {
          message: promiseError.message,
          path: ['syncNest', 'promise'],
          locations: [{ line: 4, column: 11 }],
        },
        {
          message: syncError.message,
          path: ['syncNest', 'syncNonNull'],
          locations: [{ line: 5, column: 11 }],
        },
        {
          message: syncError.message,
          path: ['sync'],
          locations: [{ line: 7, column: 9 }],
        },
      ],
    });
  });

  it('nulls the whole response when a root non-null field fails', () => {
    expectJSON(
      executeSync({
        schema,
        document: parse('{ sync syncNonNull }'),
        rootValue: nullingData,
      }),
    ).toDeepEqual({
      data: null,
      errors: [
        {
          message:
            'Cannot return null for non-nullable field DataType.syncNonNull.',
          path: ['syncNonNull'],
          locations: [{ line: 1, column: 8 }],
        },
      ],
    });
  });

  it('nulls the whole response when an async root non-null field fails', async () => {
    expectJSON(await run('{ promiseNonNull }', throwingData)).toDeepEqual({
      data: null,
      errors: [
        {
          message: promiseError.message,
          path: ['promiseNonNull'],
          locations: [{ line: 1, column: 3 }],
        },
      ],
    });
  });

  describe('lists', () => {
    const listSchema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          nullableItems: { type: '[Int]', resolve: () => [1, null, 3] },
          nonNullItems: { type: '[Int!]', resolve: () => [1, null, 3] },
          nonNullList: { type: '[Int!]!', resolve: () => [1, null, 3] },
        },
      }),
    });

    it('keeps null items of a nullable item type', () => {
      expect(
        executeSync({
          schema: listSchema,
          document: parse('{ nullableItems }'),
        }),
      ).to.deep.equal({ data: { nullableItems: [1, null, 3] } });
    });

    it('nulls the list when a non-null item is null', () => {
      expectJSON(
        executeSync({
          schema: listSchema,
          document: parse('{ nonNullItems }'),
        }),
      ).toDeepEqual({
        data: { nonNullItems: null },
        errors: [
          {
            message:
              'Cannot return null for non-nullable field Query.nonNullItems.',
            path: ['nonNullItems', 1],
            locations: [{ line: 1, column: 3 }],
          },
        ],
      });
    });

    it('keeps bubbling past a non-null list', () => {
      expectJSON(
        executeSync({
          schema: listSchema,
          document: parse('{ nullableItems nonNullList }'),
        }),
      ).toDeepEqual({
        data: null,
        errors: [
          {
            message:
              'Cannot return null for non-nullable field Query.nonNullList.',
            path: ['nonNullList', 1],
            locations: [{ line: 1, column: 17 }],
          },
        ],
      });
    });
  });
});
