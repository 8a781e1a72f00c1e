import { describe, it } from 'mocha';

import { UniqueInputFieldNamesRule } from '../rules/UniqueInputFieldNamesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(UniqueInputFieldNamesRule, queryStr);
}

describe('Validate: Unique input field names', () => {
  it('reports a repeated input object field', () => {
    expectErrors(
      '{ complicatedArgs { complexArgField(complexArg: { requiredField: true, requiredField: false }) } }',
    ).toDeepEqual([
      {
        message: 'There can be only one input field named "requiredField".',
        locations: [
          { line: 1, column: 51 },
          { line: 1, column: 72 },
        ],
      },
    ]);
  });
});
