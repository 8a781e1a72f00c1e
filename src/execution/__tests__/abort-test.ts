import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectJSON } from '../../__testUtils__/expectJSON';
import { resolveOnNextTick } from '../../__testUtils__/resolveOnNextTick';

import { parse } from '../../language/parser';

import {
  GraphQLInterfaceType,
  GraphQLObjectType,
} from '../../type/definition';
import { GraphQLSchema } from '../../type/schema';

import { execute, executeSync } from '../execute';

function pending<T>(): Promise<T> {
  return new Promise(() => {
    // settles only through the abort signal
  });
}

describe('Execute: aborting a request', () => {
  it('reports unresolved fields as aborted and keeps finished ones', async () => {
    let seenSignal: AbortSignal | undefined;
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          fast: { type: 'String', resolve: () => 'done' },
          slow: {
            type: 'String',
            resolve(_source, _args, _context, info) {
              seenSignal = info.signal;
              return pending();
            },
          },
        },
      }),
    });
    const controller = new AbortController();

    const promise = execute({
      schema,
      document: parse('{ fast slow }'),
      signal: controller.signal,
    });
    controller.abort();

    expectJSON(await promise).toDeepEqual({
      data: { fast: 'done', slow: null },
      errors: [
        {
          message: 'Execution aborted.',
          locations: [{ line: 1, column: 8 }],
          path: ['slow'],
          extensions: { code: 'EXECUTION_ABORTED' },
        },
      ],
    });
    expect(seenSignal).to.equal(controller.signal);
    expect(seenSignal?.aborted).to.equal(true);
  });

  it('does not start fields once the signal has aborted', () => {
    const started: Array<string> = [];
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          a: {
            type: 'String',
            resolve() {
              started.push('a');
              return 'A';
            },
          },
        },
      }),
    });
    const controller = new AbortController();
    controller.abort();

    const result = executeSync({
      schema,
      document: parse('{ a }'),
      signal: controller.signal,
    });

    expectJSON(result).toDeepEqual({
      data: { a: null },
      errors: [
        {
          message: 'Execution aborted.',
          locations: [{ line: 1, column: 3 }],
          path: ['a'],
          extensions: { code: 'EXECUTION_ABORTED' },
        },
      ],
    });
    expect(started).to.deep.equal([]);
  });

  it('aborts nested fields and bubbles through non-null positions', async () => {
    const controller = new AbortController();
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          profile: {
            type: 'Profile',
            resolve: () => resolveOnNextTick().then(() => ({ name: 'Ann' })),
          },
        },
      }),
      types: [
        new GraphQLObjectType({
          name: 'Profile',
          fields: {
            name: { type: 'String' },
            avatar: {
              type: 'String!',
              resolve() {
                controller.abort();
                return pending();
              },
            },
          },
        }),
      ],
    });

    const result = await execute({
      schema,
      document: parse('{ profile { name avatar } }'),
      signal: controller.signal,
    });

    expectJSON(result).toDeepEqual({
      data: { profile: null },
      errors: [
        {
          message: 'Execution aborted.',
          locations: [{ line: 1, column: 18 }],
          path: ['profile', 'avatar'],
          extensions: { code: 'EXECUTION_ABORTED' },
        },
      ],
    });
  });

  it('aborts while the runtime type of a value is still pending', async () => {
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          fast: { type: 'String', resolve: () => 'done' },
          pet: { type: 'Pet', resolve: () => ({ name: 'Rex' }) },
          dog: { type: 'Dog', resolve: () => ({ name: 'Rex' }) },
        },
      }),
      types: [
        new GraphQLInterfaceType({
          name: 'Pet',
          fields: { name: { type: 'String' } },
          resolveType: () => pending<string>(),
        }),
        new GraphQLObjectType({
          name: 'Dog',
          interfaces: ['Pet'],
          fields: { name: { type: 'String' } },
          isTypeOf: () => pending<boolean>(),
        }),
      ],
    });
    const controller = new AbortController();

    const promise = execute({
      schema,
      document: parse('{ fast pet { name } dog { name } }'),
      signal: controller.signal,
    });
    controller.abort();

    expectJSON(await promise).toDeepEqual({
      data: { fast: 'done', pet: null, dog: null },
      errors: [
        {
          message: 'Execution aborted.',
          locations: [{ line: 1, column: 8 }],
          path: ['pet'],
          extensions: { code: 'EXECUTION_ABORTED' },
        },
        {
          message: 'Execution aborted.',
          locations: [{ line: 1, column: 21 }],
          path: ['dog'],
          extensions: { code: 'EXECUTION_ABORTED' },
        },
      ],
    });
  });

  it('adds a single abort listener per request', async () => {
    const size = 50;
    const schema = new GraphQLSchema({
      query: new GraphQLObjectType({
        name: 'Query',
        fields: {
          words: {
            type: '[String]',
            resolve: () =>
              Array.from({ length: size }, (_, i) =>
                resolveOnNextTick().then(() => `w${i}`),
              ),
          },
        },
      }),
    });
    const controller = new AbortController();
    const warnings: Array<string> = [];
    const onWarning = (warning: Error) => warnings.push(warning.name);

    process.on('warning', onWarning);
    try {
      // The same signal serves several requests in a row.
      for (let run = 0; run < 12; ++run) {
        const result = await execute({
          schema,
          document: parse('{ words }'),
          signal: controller.signal,
        });
        expect(result).to.deep.equal({
          data: { words: Array.from({ length: size }, (_, i) => `w${i}`) },
        });
      }
      await new Promise((resolve) => setImmediate(resolve));
    } finally {
      process.off('warning', onWarning);
    }

    expect(warnings).to.deep.equal([]);
  });
});
