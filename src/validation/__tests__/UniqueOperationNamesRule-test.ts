import { describe, it } from 'mocha';

import { UniqueOperationNamesRule } from '../rules/UniqueOperationNamesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(UniqueOperationNamesRule, queryStr);
}

describe('Validate: Unique operation names', () => {
  it('accepts differently named operations', () => {
    expectErrors(
      'query A { dog { name } }\nquery B { cat { name } }',
    ).toDeepEqual([]);
  });

  it('reports two operations with the same name', () => {
    expectErrors(
      'query Q { dog { name } }\nmutation Q { dog { name } }',
    ).toDeepEqual([
      {
        message: 'There can be only one operation named "Q".',
        locations: [
          { line: 1, column: 7 },
          { line: 2, column: 10 },
        ],
      },
    ]);
  });
});
