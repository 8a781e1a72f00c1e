import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { GraphQLError } from '../../error/GraphQLError';

import {
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLObjectType,
  list,
  named,
  nonNull,
} from '../../type/definition';
import type { TypeRef } from '../../type/definition';
import { GraphQLSchema } from '../../type/schema';

import { coerceInputValue } from '../coerceInputValue';

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'Query',
    fields: { unused: { type: 'String' } },
  }),
  types: [
    new GraphQLInputObjectType({
      name: 'Filter',
      fields: {
        term: { type: 'String!' },
        limit: { type: 'Int', defaultValue: 10 },
      },
    }),
    new GraphQLEnumType({
      name: 'Color',
      values: { RED: { value: 'r' }, BLUE: { value: 'b' } },
    }),
  ],
});

interface CoercionError {
  path: ReadonlyArray<string | number>;
  value: unknown;
  message: string;
}

function coerceWithErrors(inputValue: unknown, type: TypeRef) {
  const errors: Array<CoercionError> = [];
  const value = coerceInputValue(
    schema,
    inputValue,
    type,
    (path, invalidValue, error: GraphQLError) => {
      errors.push({ path, value: invalidValue, message: error.message });
    },
  );
  return { value, errors };
}

describe('coerceInputValue', () => {
  it('coerces scalars and enums', () => {
    expect(coerceInputValue(schema, 5, named('Int'))).to.equal(5);
    expect(coerceInputValue(schema, 'BLUE', named('Color'))).to.equal('b');
    expect(coerceInputValue(schema, null, named('Int'))).to.equal(null);
  });

  it('throws by default, naming the value and its path', () => {
    expect(() => coerceInputValue(schema, '5', named('Int'))).to.throw(
      'Invalid value "5": Int cannot represent non-integer value: "5"',
    );
    expect(() =>
      coerceInputValue(schema, { term: 'x', limit: 1.5 }, named('Filter')),
    ).to.throw(
      'Invalid value 1.5 at "value.limit": Int cannot represent non-integer value: 1.5',
    );
  });

  it('fills input object defaults', () => {
    expect(
      coerceWithErrors({ term: 'x' }, named('Filter')),
    ).to.deep.equal({ value: { term: 'x', limit: 10 }, errors: [] });
  });

  it('reports every problem of an input object', () => {
    const inputValue = { term: 1, zzz: true };

    expect(coerceWithErrors(inputValue, named('Filter')).errors).to.deep.equal([
      {
        path: ['term'],
        value: 1,
        message: 'String cannot represent a non string value: 1',
      },
      {
        path: [],
        value: inputValue,
        message: 'Field "zzz" is not defined by type "Filter".',
      },
    ]);
  });

  it('reports a missing required field', () => {
    expect(coerceWithErrors({}, named('Filter')).errors).to.deep.equal([
      {
        path: [],
        value: {},
        message: 'Field "term" of required type "String!" was not provided.',
      },
    ]);
  });

  it('coerces lists item by item', () => {
    expect(coerceWithErrors([1, 2], list('Int'))).to.deep.equal({
      value: [1, 2],
      errors: [],
    });
    expect(coerceWithErrors(3, list('Int'))).to.deep.equal({
      value: [3],
      errors: [],
    });
    expect(coerceWithErrors([1, '2'], list('Int')).errors).to.deep.equal([
      {
        path: [1],
        value: '2',
        message: 'Int cannot represent non-integer value: "2"',
      },
    ]);
  });

  it('rejects null for a non-null type', () => {
    expect(coerceWithErrors(null, nonNull('Int')).errors).to.deep.equal([
      {
        path: [],
        value: null,
        message: 'Expected non-nullable type "Int!" not to be null.',
      },
    ]);
  });
});
