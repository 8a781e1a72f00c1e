import { describe, it } from 'mocha';

import { VariablesInAllowedPositionRule } from '../rules/VariablesInAllowedPositionRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(VariablesInAllowedPositionRule, queryStr);
}

describe('Validate: Variables are in allowed positions', () => {
  it('accepts matching and stricter variable types', () => {
    expectErrors(
      'query Q($n: Int!) { complicatedArgs { intArgField(intArg: $n) } }',
    ).toDeepEqual([]);
    expectErrors(
      'query Q($n: Int!) { complicatedArgs { nonNullIntArgField(nonNullIntArg: $n) } }',
    ).toDeepEqual([]);
  });

  it('accepts a nullable variable with a default in a non-null position', () => {
    expectErrors(
      'query Q($n: Int = 1) { complicatedArgs { nonNullIntArgField(nonNullIntArg: $n) } }',
    ).toDeepEqual([]);
  });

  it('accepts a nullable variable for a non-null argument with a default', () => {
    expectErrors(
      'query Q($n: Int) { complicatedArgs { multipleOpts(opt2: $n) } }',
    ).toDeepEqual([]);
  });

  it('reports a nullable variable in a non-null position', () => {
    expectErrors(
      'query Q($n: Int) { complicatedArgs { nonNullIntArgField(nonNullIntArg: $n) } }',
    ).toDeepEqual([
      {
        message:
          'Variable "$n" of type "Int" used in position expecting type "Int!".',
        locations: [
          { line: 1, column: 9 },
          { line: 1, column: 72 },
        ],
      },
    ]);
  });

  it('reports a single value variable in a list position', () => {
    expectErrors(
      'query Q($s: String) { complicatedArgs { stringListArgField(stringListArg: $s) } }',
    ).toDeepEqual([
      {
        message:
          'Variable "$s" of type "String" used in position expecting type "[String]".',
        locations: [
          { line: 1, column: 9 },
          { line: 1, column: 75 },
        ],
      },
    ]);
  });
});
