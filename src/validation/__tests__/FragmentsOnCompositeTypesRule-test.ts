import { describe, it } from 'mocha';

import { FragmentsOnCompositeTypesRule } from '../rules/FragmentsOnCompositeTypesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(FragmentsOnCompositeTypesRule, queryStr);
}

describe('Validate: Fragments on composite types', () => {
  it('accepts object, interface and union conditions', () => {
    expectErrors(
      '{ pet { ... on Dog { barks } } }\nfragment P on Pet { name }\nfragment U on CatOrDog { __typename }',
    ).toDeepEqual([]);
  });

  it('reports an inline fragment on a scalar', () => {
    expectErrors('{ dog { ... on Boolean { x } } }').toDeepEqual([
      {
        message: 'Fragment cannot condition on non composite type "Boolean".',
        locations: [{ line: 1, column: 16 }],
      },
    ]);
  });

  it('reports a named fragment on a scalar', () => {
    expectErrors('fragment ScalarFragment on Boolean { bad }').toDeepEqual([
      {
        message:
          'Fragment "ScalarFragment" cannot condition on non composite type "Boolean".',
        locations: [{ line: 1, column: 28 }],
      },
    ]);
  });
});
