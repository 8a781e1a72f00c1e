import { describe, it } from 'mocha';

import { KnownArgumentNamesRule } from '../rules/KnownArgumentNamesRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(KnownArgumentNamesRule, queryStr);
}

describe('Validate: Known argument names', () => {
  it('accepts declared field and directive arguments', () => {
    expectErrors(`
      {
        dog @include(if: true) {
          doesKnowCommand(dogCommand: SIT)
        }
        human(id: "1") { name }
      }
    `).toDeepEqual([]);
  });

  it('reports an undeclared field argument', () => {
    expectErrors('{ dog { doesKnowCommand(whoKnows: SIT) } }').toDeepEqual([
      {
        message: 'Unknown argument "whoKnows" on field "Dog.doesKnowCommand".',
        locations: [{ line: 1, column: 25 }],
      },
    ]);
  });

  it('suggests a close argument name', () => {
    expectErrors('{ human(ie: "1") { name } }').toDeepEqual([
      {
        message: 'Unknown argument "ie" on field "QueryRoot.human". Did you mean "id"?',
        locations: [{ line: 1, column: 9 }],
      },
    ]);
  });

  it('reports an undeclared directive argument', () => {
    expectErrors('{ dog @skip(unless: true) { name } }').toDeepEqual([
      {
        message: 'Unknown argument "unless" on directive "@skip".',
        locations: [{ line: 1, column: 13 }],
      },
    ]);
  });

  it('ignores arguments of unknown fields', () => {
    expectErrors('{ dog { unknownField(anything: 1) } }').toDeepEqual([]);
  });
});
