import { describe, it } from 'mocha';

import { ProvidedRequiredArgumentsRule } from '../rules/ProvidedRequiredArgumentsRule';

import { expectValidationErrors } from './harness';

function expectErrors(queryStr: string) {
  return expectValidationErrors(ProvidedRequiredArgumentsRule, queryStr);
}

describe('Validate: Provided required arguments', () => {
  it('accepts provided arguments and non-null arguments with defaults', () => {
    expectErrors(`
      {
        complicatedArgs {
          multipleReqs(req2: 2, req1: 1)
          multipleOpts
          intArgField
        }
      }
    `).toDeepEqual([]);
  });

  it('reports a missing required argument', () => {
    expectErrors('{ complicatedArgs { multipleReqs(req2: 1) } }').toDeepEqual([
      {
        message:
          'Field "multipleReqs" argument "req1" of type "Int!" is required, but it was not provided.',
        locations: [{ line: 1, column: 21 }],
      },
    ]);
  });

  it('reports every missing argument', () => {
    expectErrors('{ complicatedArgs { multipleReqs } }').toDeepEqual([
      {
        message:
          'Field "multipleReqs" argument "req1" of type "Int!" is required, but it was not provided.',
        locations: [{ line: 1, column: 21 }],
      },
      {
        message:
          'Field "multipleReqs" argument "req2" of type "Int!" is required, but it was not provided.',
        locations: [{ line: 1, column: 21 }],
      },
    ]);
  });

  it('reports a directive without its required argument', () => {
    expectErrors('{ dog @include { name } }').toDeepEqual([
      {
        message:
          'Directive "@include" argument "if" of type "Boolean!" is required, but it was not provided.',
        locations: [{ line: 1, column: 7 }],
      },
    ]);
  });
});
