import { expect } from 'chai';
import { describe, it } from 'mocha';

import * as reference from 'graphql';

import { GraphQLObjectType } from '../type/definition';
import { GraphQLSchema } from '../type/schema';

import { graphql } from '../graphql';

const sdl = `
  type Query {
    user(id: ID!): User
    users: [User!]!
    tags(first: Int = 2): [String!]!
    scores: [Int!]
    broken: String
  }

  type User {
    id: ID!
    name: String
    email: String!
    friends: [User]
  }
`;

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'Query',
    fields: {
      user: { type: 'User', args: { id: { type: 'ID!' } } },
      users: { type: '[User!]!' },
      tags: { type: '[String!]!', args: { first: { type: 'Int', defaultValue: 2 } } },
      scores: { type: '[Int!]' },
      broken: { type: 'String' },
    },
  }),
  types: [
    new GraphQLObjectType({
      name: 'User',
      fields: {
        id: { type: 'ID!' },
        name: { type: 'String' },
        email: { type: 'String!' },
        friends: { type: '[User]' },
      },
    }),
  ],
});

class Person {
  constructor(
    readonly id: string,
    readonly name: string,
    readonly email: string | null,
    private readonly friendIds: ReadonlyArray<string>,
  ) {}

  friends(): Array<Person | null> {
    return this.friendIds.map((id) => people.get(id) ?? null);
  }
}

const people = new Map<string, Person>([
  ['1', new Person('1', 'Ann', 'ann@example.test', ['2'])],
  ['2', new Person('2', 'Bo', null, [])],
]);

const rootValue = {
  user: (args: { id: string }) => people.get(args.id) ?? null,
  users: () => Promise.resolve([...people.values()]),
  tags: (args: { first: number }) => ['a', 'b', 'c'].slice(0, args.first),
  scores: () => [1, null, 3],
  broken: () => {
    throw new Error('boom');
  },
};

const referenceSchema = reference.buildSchema(sdl);

async function expectSameResponse(
  source: string,
  variableValues?: { [variable: string]: unknown },
) {
  const [actual, expected] = await Promise.all([
    graphql({ schema, source, rootValue, variableValues }),
    reference.graphql({
      schema: referenceSchema,
      source,
      rootValue,
      variableValues,
    }),
  ]);

  expect(JSON.parse(JSON.stringify(actual))).to.deep.equal(
    JSON.parse(JSON.stringify(expected)),
  );
}

describe('Responses match the reference implementation', () => {
  it('for plain selections', () =>
    expectSameResponse('{ users { id name } }'));

  it('for variables and nested lists', () =>
    expectSameResponse(
      'query Q($id: ID!) { user(id: $id) { name friends { name } } }',
      { id: '1' },
    ));

  it('for a null non-null field', () =>
    expectSameResponse('{ user(id: "2") { name email } }'));

  it('for a null non-null list item', () => expectSameResponse('{ scores }'));

  it('for aliases and argument defaults', () =>
    expectSameResponse('{ tags a: tags(first: 3) }'));

  it('for a throwing resolver next to fragments', () =>
    expectSameResponse(
      '{ broken users { __typename ...F } } fragment F on User { id }',
    ));

  it('for skipped fields', () =>
    expectSameResponse(
      'query Q($skip: Boolean!) { users { id name @skip(if: $skip) } }',
      { skip: true },
    ));

  it('for a missing variable', () =>
    expectSameResponse('query Q($id: ID!) { user(id: $id) { name } }'));

  it('for validation errors', () =>
    expectSameResponse('{ user { name } nope }'));

  it('for a syntax error', () => expectSameResponse('{ users {'));
});
