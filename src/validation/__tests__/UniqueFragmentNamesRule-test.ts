import { describe, it } from 'mocha';

import { UniqueFragmentNamesRule } from '../rules/UniqueFragmentNamesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(UniqueFragmentNamesRule, queryStr);
}

describe('Validate: Unique fragment names', () => {
  it('reports two fragments with the same name', () => {
    expectErrors(
      'fragment F on Dog { name }\nfragment F on Dog { barks }',
    ).toDeepEqual([
      {
        message: 'There can be only one fragment named "F".',
        locations: [
          { line: 1, column: 10 },
          { line: 2, column: 10 },
        ],
      },
    ]);
  });
});
