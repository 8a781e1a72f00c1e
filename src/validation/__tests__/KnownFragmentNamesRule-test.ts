import { describe, it } from 'mocha';

import { KnownFragmentNamesRule } from '../rules/KnownFragmentNamesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(KnownFragmentNamesRule, queryStr);
}

describe('Validate: Known fragment names', () => {
  it('accepts spreads of defined fragments', () => {
    expectErrors(
      '{ dog { ...DogFields } }\nfragment DogFields on Dog { name }',
    ).toDeepEqual([]);
  });

  it('reports a spread of an undefined fragment', () => {
    expectErrors('{ dog { ...Missing } }').toDeepEqual([
      {
        message: 'Unknown fragment "Missing".',
        locations: [{ line: 1, column: 12 }],
      },
    ]);
  });
});
