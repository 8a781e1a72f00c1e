import { describe, it } from 'mocha';

import { ScalarLeafsRule } from '../rules/ScalarLeafsRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(ScalarLeafsRule, queryStr);
}

describe('Validate: Scalar leafs', () => {
  it('accepts selections on composite fields only', () => {
    expectErrors('{ dog { name owner { name } } }').toDeepEqual([]);
  });

  it('reports a composite field without a selection', () => {
    expectErrors('{ dog }').toDeepEqual([
      {
        message:
          'Field "dog" of type "Dog" must have a selection of subfields. Did you mean "dog { ... }"?',
        locations: [{ line: 1, column: 3 }],
      },
    ]);
  });

  it('reports a selection on a leaf field', () => {
    expectErrors('{ dog { barks { sinceWhen } } }').toDeepEqual([
      {
        message:
          'Field "barks" must not have a selection since type "Boolean" has no subfields.',
        locations: [{ line: 1, column: 15 }],
      },
    ]);
  });
});
