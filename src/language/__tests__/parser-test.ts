import { expect } from 'chai';
import { describe, it } from 'mocha';

import { dedent } from '../../__testUtils__/dedent';
import { expectJSON } from '../../__testUtils__/expectJSON';

import { isSyntaxError, ParseError } from '../../error/syntaxError';

import { Kind } from '../kinds';
import type { ParseOptions } from '../parser';
import { parse, parseConstValue, parseType, parseValue } from '../parser';
import { Source } from '../source';

function parseError(source: string, options?: ParseOptions): ParseError {
  try {
    parse(source, options);
  } catch (error) {
    expect(error).to.be.instanceOf(ParseError);
    if (error instanceof ParseError) {
      return error;
    }
  }
  throw new Error('Expected the parser to fail.');
}

describe('Parser', () => {
  it('parses a query shorthand', () => {
    const doc = parse('{ user(id: 1) { id } }', { noLocation: true });

    expectJSON(doc).toDeepEqual({
      kind: Kind.DOCUMENT,
      definitions: [
        {
          kind: Kind.OPERATION_DEFINITION,
          operation: 'query',
          name: undefined,
          variableDefinitions: [],
          directives: [],
          selectionSet: {
            kind: Kind.SELECTION_SET,
            selections: [
              {
                kind: Kind.FIELD,
                alias: undefined,
                name: { kind: Kind.NAME, value: 'user' },
                arguments: [
                  {
                    kind: Kind.ARGUMENT,
                    name: { kind: Kind.NAME, value: 'id' },
                    value: { kind: Kind.INT, value: '1' },
                  },
                ],
                directives: [],
                selectionSet: {
                  kind: Kind.SELECTION_SET,
                  selections: [
                    {
                      kind: Kind.FIELD,
                      alias: undefined,
                      name: { kind: Kind.NAME, value: 'id' },
                      arguments: [],
                      directives: [],
                      selectionSet: undefined,
                    },
                  ],
                },
              },
            ],
          },
        },
      ],
    });
  });

  it('records node locations', () => {
    const doc = parse('{ a }');
    expectJSON(doc).toDeepNestedProperty('loc', { start: 0, end: 5 });
    expectJSON(doc).toDeepNestedProperty(
      'definitions[0].selectionSet.selections[0].loc',
      { start: 2, end: 3 },
    );
  });

  it('parses named operations with variables and directives', () => {
    const doc = parse(
      dedent`
        query Profile($id: ID! = "1", $full: Boolean) @cached {
          me: user(id: $id) {
            name @include(if: $full)
          }
        }
      `,
      { noLocation: true },
    );

    const operation = doc.definitions[0];
    expect(operation.kind).to.equal(Kind.OPERATION_DEFINITION);
    expectJSON(operation).toDeepNestedProperty('name.value', 'Profile');
    expectJSON(operation).toDeepNestedProperty('variableDefinitions[0]', {
      kind: Kind.VARIABLE_DEFINITION,
      variable: {
        kind: Kind.VARIABLE,
        name: { kind: Kind.NAME, value: 'id' },
      },
      type: {
        kind: Kind.NON_NULL_TYPE,
        type: { kind: Kind.NAMED_TYPE, name: { kind: Kind.NAME, value: 'ID' } },
      },
      defaultValue: { kind: Kind.STRING, value: '1', block: false },
      directives: [],
    });
    expectJSON(operation).toDeepNestedProperty(
      'directives[0].name.value',
      'cached',
    );
    expectJSON(operation).toDeepNestedProperty(
      'selectionSet.selections[0].alias.value',
      'me',
    );
  });

  it('parses fragments and inline fragments', () => {
    const doc = parse(
      dedent`
        { ...UserFields ... on User { id } ... @skip(if: true) { name } }
        fragment UserFields on User { name }
      `,
      { noLocation: true },
    );

    expectJSON(doc).toDeepNestedProperty(
      'definitions[0].selectionSet.selections[0]',
      {
        kind: Kind.FRAGMENT_SPREAD,
        name: { kind: Kind.NAME, value: 'UserFields' },
        directives: [],
      },
    );
    expectJSON(doc).toDeepNestedProperty(
      'definitions[0].selectionSet.selections[1].typeCondition.name.value',
      'User',
    );
    expectJSON(doc).toDeepNestedProperty(
      'definitions[0].selectionSet.selections[2].typeCondition',
      undefined,
    );
    expect(doc.definitions[1].kind).to.equal(Kind.FRAGMENT_DEFINITION);
  });

  it('accepts `on` inside names other than fragment names', () => {
    expect(() => parse('{ on }')).to.not.throw();
    expect(() => parse('query on { a }')).to.not.throw();
  });

  it('rejects `on` as a fragment name', () => {
    expectJSON(parseError('fragment on on T { a }')).toDeepEqual({
      message: 'Syntax Error: Unexpected Name "on".',
      locations: [{ line: 1, column: 10 }],
    });
    expect(parseError('{ ...on }').message).to.equal(
      'Syntax Error: Expected Name, found "}".',
    );
  });

  it('rejects trailing tokens', () => {
    expectJSON(parseError('{ a } }')).toDeepEqual({
      message: 'Syntax Error: Unexpected "}".',
      locations: [{ line: 1, column: 7 }],
    });
  });

  it('reports unexpected end of input', () => {
    const error = parseError('{');
    expect(error.expected).to.equal('Name');
    expect(error.found).to.equal('<EOF>');
    expectJSON(error).toDeepEqual({
      message: 'Syntax Error: Expected Name, found <EOF>.',
      locations: [{ line: 1, column: 2 }],
    });
  });

  it('rejects type system definitions', () => {
    expect(parseError('type Query { a: Int }').message).to.equal(
      'Syntax Error: Unexpected Name "type".',
    );
  });

  it('rejects an anonymous operation alongside another operation', () => {
    const error = parseError('query A { a }\n{ b }');
    expect(error.expected).to.equal('a named operation');
    expectJSON(error).toDeepEqual({
      message:
        'Syntax Error: This anonymous operation must be the only defined operation.',
      locations: [{ line: 2, column: 1 }],
    });
  });

  it('allows one anonymous operation with fragments', () => {
    expect(() =>
      parse('{ ...F }\nfragment F on Query { a }'),
    ).to.not.throw();
    expect(() => parse('query A { a }\nquery B { b }')).to.not.throw();
  });

  it('limits the number of tokens', () => {
    expect(() => parse('{ a b c }', { maxTokens: 5 })).to.not.throw();

    expectJSON(parseError('{ a b c }', { maxTokens: 3 })).toDeepEqual({
      message:
        'Syntax Error: Document contains more than 3 tokens. Parsing aborted.',
      locations: [{ line: 1, column: 7 }],
    });
  });

  it('limits how deeply a document nests', () => {
    expect(() => parse('{ a { b } }', { maxDepth: 2 })).to.not.throw();

    expectJSON(parseError('{ a { b { c } } }', { maxDepth: 2 })).toDeepEqual({
      message:
        'Syntax Error: Document is nested more than 2 levels deep. Parsing aborted.',
      locations: [{ line: 1, column: 9 }],
    });
    expectJSON(parseError('{ a(x: [[1]]) }', { maxDepth: 2 })).toDeepEqual({
      message:
        'Syntax Error: Document is nested more than 2 levels deep. Parsing aborted.',
      locations: [{ line: 1, column: 9 }],
    });
    expectJSON(
      parseError('{ a(x: { y: { z: 1 } }) }', { maxDepth: 2 }),
    ).toDeepEqual({
      message:
        'Syntax Error: Document is nested more than 2 levels deep. Parsing aborted.',
      locations: [{ line: 1, column: 13 }],
    });
  });

  it('limits nesting by default', () => {
    const depth = 20000;
    const source = `{ a(x: ${'['.repeat(depth)}${']'.repeat(depth)}) }`;

    expect(parseError(source).message).to.equal(
      'Syntax Error: Document is nested more than 1000 levels deep. Parsing aborted.',
    );
  });

  it('rejects variables in constant positions', () => {
    expect(parseError('query Q($a: Int = $b) { a }').message).to.equal(
      'Syntax Error: Unexpected variable "$b" in constant value.',
    );
    expect(() => parseConstValue('$x')).to.throw(
      'Syntax Error: Unexpected variable "$x" in constant value.',
    );
  });

  it('reports errors from a named source', () => {
    const error = parseError('{ a(: 1) }');
    expect(error.message).to.equal('Syntax Error: Expected Name, found ":".');
    expect(String(error)).to.equal(
      'Syntax Error: Expected Name, found ":".\n\nRequest:1:5',
    );

    try {
      parse(new Source('{', 'Profile.graphql'));
    } catch (thrown) {
      expect(isSyntaxError(thrown)).to.equal(true);
      expect(String(thrown)).to.equal(
        'Syntax Error: Expected Name, found <EOF>.\n\nProfile.graphql:1:2',
      );
    }
  });

  it('parses values', () => {
    expectJSON(
      parseValue('[1, 2.5, "two", {three: true, four: null}, FIVE, $six]', {
        noLocation: true,
      }),
    ).toDeepEqual({
      kind: Kind.LIST,
      values: [
        { kind: Kind.INT, value: '1' },
        { kind: Kind.FLOAT, value: '2.5' },
        { kind: Kind.STRING, value: 'two', block: false },
        {
          kind: Kind.OBJECT,
          fields: [
            {
              kind: Kind.OBJECT_FIELD,
              name: { kind: Kind.NAME, value: 'three' },
              value: { kind: Kind.BOOLEAN, value: true },
            },
            {
              kind: Kind.OBJECT_FIELD,
              name: { kind: Kind.NAME, value: 'four' },
              value: { kind: Kind.NULL },
            },
          ],
        },
        { kind: Kind.ENUM, value: 'FIVE' },
        { kind: Kind.VARIABLE, name: { kind: Kind.NAME, value: 'six' } },
      ],
    });
  });

  it('parses types', () => {
    expectJSON(parseType('[Int!]!', { noLocation: true })).toDeepEqual({
      kind: Kind.NON_NULL_TYPE,
      type: {
        kind: Kind.LIST_TYPE,
        type: {
          kind: Kind.NON_NULL_TYPE,
          type: {
            kind: Kind.NAMED_TYPE,
            name: { kind: Kind.NAME, value: 'Int' },
          },
        },
      },
    });
    expect(() => parseType('Int!!')).to.throw(
      'Syntax Error: Expected <EOF>, found "!".',
    );
  });
});
