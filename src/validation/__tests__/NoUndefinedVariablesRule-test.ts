import { describe, it } from 'mocha';

import { NoUndefinedVariablesRule } from '../rules/NoUndefinedVariablesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(NoUndefinedVariablesRule, queryStr);
}

describe('Validate: No undefined variables', () => {
  it('accepts variables defined by the operation', () => {
    expectErrors(
      'query Q($a: Int) { complicatedArgs { intArgField(intArg: $a) } }',
    ).toDeepEqual([]);
  });

  it('reports a variable the named operation does not define', () => {
    expectErrors(
      'query Q { complicatedArgs { intArgField(intArg: $a) } }',
    ).toDeepEqual([
      {
        message: 'Variable "$a" is not defined by operation "Q".',
        locations: [
          { line: 1, column: 49 },
          { line: 1, column: 1 },
        ],
      },
    ]);
  });

  it('reports a variable an anonymous operation does not define', () => {
    expectErrors('{ complicatedArgs { intArgField(intArg: $a) } }').toDeepEqual(
      [
        {
          message: 'Variable "$a" is not defined.',
          locations: [
            { line: 1, column: 41 },
            { line: 1, column: 1 },
          ],
        },
      ],
    );
  });

  it('follows fragment spreads', () => {
    expectErrors(
      'query Q { dog { ...F } }\nfragment F on Dog { doesKnowCommand(dogCommand: $cmd) }',
    ).toDeepEqual([
      {
        message: 'Variable "$cmd" is not defined by operation "Q".',
        locations: [
          { line: 2, column: 49 },
          { line: 1, column: 1 },
        ],
      },
    ]);
  });
});
