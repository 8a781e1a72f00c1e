import { describe, it } from 'mocha';

import { NoUnusedFragmentsRule } from '../rules/NoUnusedFragmentsRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(NoUnusedFragmentsRule, queryStr);
}

describe('Validate: No unused fragments', () => {
  it('accepts fragments reached through other fragments', () => {
    expectErrors(
      '{ dog { ...A } }\nfragment A on Dog { ...B }\nfragment B on Dog { name }',
    ).toDeepEqual([]);
  });

  it('reports a fragment no operation reaches', () => {
    expectErrors(
      '{ dog { name } }\nfragment Unused on Dog { name }',
    ).toDeepEqual([
      {
        message: 'Fragment "Unused" is never used.',
        locations: [{ line: 2, column: 1 }],
      },
    ]);
  });
});
