import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectJSON } from '../../__testUtils__/expectJSON';
import { resolveOnNextTick } from '../../__testUtils__/resolveOnNextTick';

import { parse } from '../../language/parser';

import { GraphQLObjectType } from '../../type/definition';
import { GraphQLSchema } from '../../type/schema';

import { execute } from '../execute';

class Counter {
  value: number;
  readonly events: Array<string> = [];

  constructor(value: number) {
    this.value = value;
  }

  async add(amount: number): Promise<Counter> {
    this.events.push(`start ${amount}`);
    await resolveOnNextTick();
    this.value += amount;
    this.events.push(`end ${amount}`);
    return this;
  }

  failAfterTick(): Promise<Counter> {
    return resolveOnNextTick().then(() => {
      throw new Error(`Cannot change the counter from ${this.value}`);
    });
  }
}

const CounterType = new GraphQLObjectType<Counter>({
  name: 'Counter',
  fields: {
    value: { type: 'Int!' },
  },
});

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'Query',
    fields: { counter: { type: 'Counter' } },
  }),
  mutation: new GraphQLObjectType<Counter>({
    name: 'Mutation',
    fields: {
      add: {
        type: 'Counter',
        args: { amount: { type: 'Int!' } },
        resolve: (counter, args: { amount: number }) => counter.add(args.amount),
      },
      fail: {
        type: 'Counter',
        resolve: (counter) => counter.failAfterTick(),
      },
      failNonNull: {
        type: 'Counter!',
        resolve: (counter) => counter.failAfterTick(),
      },
    },
  }),
  types: [CounterType],
});

describe('Execute: Handles mutation execution ordering', () => {
  it('runs top-level mutation fields one after another', async () => {
    const counter = new Counter(0);
    const document = parse(`
      mutation {
        first: add(amount: 1) { value }
        second: add(amount: 2) { value }
        third: add(amount: 3) { value }
      }
    `);

    const result = await execute({ schema, document, rootValue: counter });

    expect(result).to.deep.equal({
      data: {
        first: { value: 1 },
        second: { value: 3 },
        third: { value: 6 },
      },
    });
    expect(counter.events).to.deep.equal([
      'start 1',
      'end 1',
      'start 2',
      'end 2',
      'start 3',
      'end 3',
    ]);
  });

  it('continues after a failed mutation field', async () => {
    const counter = new Counter(0);
    const document = parse(`
      mutation {
        first: add(amount: 1) { value }
        fail { value }
        second: add(amount: 2) { value }
      }
    `);

    const result = await execute({ schema, document, rootValue: counter });

    expectJSON(result).toDeepEqual({
      data: {
        first: { value: 1 },
        fail: null,
        second: { value: 3 },
      },
      errors: [
        {
          message: 'Cannot change the counter from 1',
          locations: [{ line: 4, column: 9 }],
          path: ['fail'],
        },
      ],
    });
  });

  it('nulls the response but keeps earlier side effects when a non-null mutation fails', async () => {
    const counter = new Counter(0);
    const document = parse(`
      mutation {
        first: add(amount: 5) { value }
        failNonNull { value }
        second: add(amount: 2) { value }
      }
    `);

    const result = await execute({ schema, document, rootValue: counter });

    expectJSON(result).toDeepEqual({
      data: null,
      errors: [
        {
          message: 'Cannot change the counter from 5',
          locations: [{ line: 4, column: 9 }],
          path: ['failNonNull'],
        },
      ],
    });
    expect(counter.events).to.deep.equal(['start 5', 'end 5']);
  });
});
