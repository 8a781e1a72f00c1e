import { expect } from 'chai';
import { describe, it } from 'mocha';

import { dedent } from '../../__testUtils__/dedent';

import { parse, parseValue } from '../parser';
import { print } from '../printer';

describe('Printer', () => {
  it('prints the query shorthand', () => {
    expect(print(parse('query { a }'))).to.equal('{\n  a\n}');
    expect(print(parse('{a,b}'))).to.equal('{\n  a\n  b\n}');
  });

  it('round-trips a document', () => {
    const document = dedent`
      query Profile($id: ID! = "1", $flags: [String!]) @cached {
        me: user(id: $id) {
          name @include(if: true)
          ...UserFields
          ... on User {
            id
          }
        }
      }

      fragment UserFields on User {
        id
      }
    `;

    expect(print(parse(document))).to.equal(document);
  });

  it('normalizes spacing and drops commas', () => {
    const printed = print(
      parse('mutation   M{ like(story:123,tags:["a","b"]){ count } }'),
    );

    expect(printed).to.equal(dedent`
      mutation M {
        like(story: 123, tags: ["a", "b"]) {
          count
        }
      }
    `);
  });

  it('escapes string values', () => {
    expect(print(parseValue('"quote \\" and \\n newline"'))).to.equal(
      '"quote \\" and \\n newline"',
    );
    expect(print(parseValue('{a: null, b: [ENUM, 1.5]}'))).to.equal(
      '{a: null, b: [ENUM, 1.5]}',
    );
  });

  it('wraps long argument lists', () => {
    const printed = print(
      parse(
        '{ search(query: "a considerably longer search phrase", first: 10, after: "cursor-value") { id } }',
      ),
    );

    expect(printed).to.equal(dedent`
      {
        search(
          query: "a considerably longer search phrase"
          first: 10
          after: "cursor-value"
        ) {
          id
        }
      }
    `);
  });
});
