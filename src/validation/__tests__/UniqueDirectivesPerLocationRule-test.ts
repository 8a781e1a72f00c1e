import { describe, it } from 'mocha';

import { UniqueDirectivesPerLocationRule } from '../rules/UniqueDirectivesPerLocationRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(UniqueDirectivesPerLocationRule, queryStr);
}

describe('Validate: Directives are unique per location', () => {
  it('accepts the same directive in different locations', () => {
    expectErrors(
      '{ dog @skip(if: false) { name @skip(if: false) } }',
    ).toDeepEqual([]);
  });

  it('reports a repeated directive', () => {
    expectErrors('{ dog @skip(if: true) @skip(if: false) { name } }').toDeepEqual(
      [
        {
          message:
            'The directive "@skip" can only be used once at this location.',
          locations: [
            { line: 1, column: 7 },
            { line: 1, column: 23 },
          ],
        },
      ],
    );
  });
});
