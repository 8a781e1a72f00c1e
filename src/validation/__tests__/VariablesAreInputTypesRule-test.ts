import { describe, it } from 'mocha';

import { VariablesAreInputTypesRule } from '../rules/VariablesAreInputTypesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(VariablesAreInputTypesRule, queryStr);
}

describe('Validate: Variables are input types', () => {
  it('accepts scalar, enum and input object variables', () => {
    expectErrors(
      'query Q($a: String, $b: [DogCommand!]!, $c: ComplexInput) { dog { name } }',
    ).toDeepEqual([]);
  });

  it('reports an output type used for a variable', () => {
    expectErrors('query Q($a: Dog) { dog { name } }').toDeepEqual([
      {
        message: 'Variable "$a" cannot be non-input type "Dog".',
        locations: [{ line: 1, column: 13 }],
      },
    ]);
  });
});
