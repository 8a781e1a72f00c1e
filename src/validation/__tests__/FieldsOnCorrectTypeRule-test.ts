import { describe, it } from 'mocha';

import { FieldsOnCorrectTypeRule } from '../rules/FieldsOnCorrectTypeRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(FieldsOnCorrectTypeRule, queryStr);
}

function expectValid(queryStr: string) {
  expectErrors(queryStr).toDeepEqual([]);
}

describe('Validate: Fields on correct type', () => {
  it('accepts fields and meta fields that exist', () => {
    expectValid(`
      {
        dog { __typename name barks }
        pet { name ... on Cat { meows } }
        catOrDog { __typename ... on Dog { nickname } }
      }
    `);
  });

  it('reports an unknown field on an object type', () => {
    expectErrors('{ dog { meowVolume } }').toDeepEqual([
      {
        message: 'Cannot query field "meowVolume" on type "Dog".',
        locations: [{ line: 1, column: 9 }],
      },
    ]);
  });

  it('suggests a field name close to a typo', () => {
    expectErrors('{ dog { nam } }').toDeepEqual([
      {
        message: 'Cannot query field "nam" on type "Dog". Did you mean "name"?',
        locations: [{ line: 1, column: 9 }],
      },
    ]);
  });

  it('suggests an inline fragment on an implementing type', () => {
    expectErrors('{ pet { meows } }').toDeepEqual([
      {
        message:
          'Cannot query field "meows" on type "Pet". Did you mean to use an inline fragment on "Cat"?',
        locations: [{ line: 1, column: 9 }],
      },
    ]);
  });

  it('requires fragments to select fields of a union', () => {
    expectErrors('{ catOrDog { name } }').toDeepEqual([
      {
        message:
          'Cannot query field "name" on type "CatOrDog". Did you mean to use an inline fragment on "Pet", "Cat", or "Dog"?',
        locations: [{ line: 1, column: 14 }],
      },
    ]);
  });

  it('reports the field and skips its selections', () => {
    expectErrors('{ dog { unknownOwner { unknownName } } }').toDeepEqual([
      {
        message: 'Cannot query field "unknownOwner" on type "Dog".',
        locations: [{ line: 1, column: 9 }],
      },
    ]);
  });
});
