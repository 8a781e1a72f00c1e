import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { ASTNode } from '../ast';
import { Kind } from '../kinds';
import { parse } from '../parser';
import type { ASTVisitor } from '../visitor';
import { BREAK, visit, visitInParallel } from '../visitor';

function describeNode(node: ASTNode): string {
  return node.kind === Kind.NAME ? `Name:${node.value}` : node.kind;
}

function recordVisits(visited: Array<string>): ASTVisitor {
  return {
    enter(node) {
      visited.push('enter ' + describeNode(node));
    },
    leave(node) {
      visited.push('leave ' + describeNode(node));
    },
  };
}

describe('Visitor', () => {
  it('visits nodes depth first in document order', () => {
    const visited: Array<string> = [];
    visit(parse('{ a(x: 1) }', { noLocation: true }), recordVisits(visited));

    expect(visited).to.deep.equal([
      'enter Document',
      'enter OperationDefinition',
      'enter SelectionSet',
      'enter Field',
      'enter Name:a',
      'leave Name:a',
      'enter Argument',
      'enter Name:x',
      'leave Name:x',
      'enter IntValue',
      'leave IntValue',
      'leave Argument',
      'leave Field',
      'leave SelectionSet',
      'leave OperationDefinition',
      'leave Document',
    ]);
  });

  it('skips children and the leave call when enter returns false', () => {
    const visited: Array<string> = [];
    const recorder = recordVisits(visited);
    visit(parse('{ a { b } c }', { noLocation: true }), {
      enter(node, parent, ancestors) {
        recorder.enter?.(node, parent, ancestors);
        if (node.kind === Kind.FIELD && node.name.value === 'a') {
          return false;
        }
      },
      leave: recorder.leave,
    });

    expect(visited).to.deep.equal([
      'enter Document',
      'enter OperationDefinition',
      'enter SelectionSet',
      'enter Field',
      'enter Field',
      'enter Name:c',
      'leave Name:c',
      'leave Field',
      'leave SelectionSet',
      'leave OperationDefinition',
      'leave Document',
    ]);
  });

  it('stops when a visit function returns BREAK', () => {
    const visited: Array<string> = [];
    visit(parse('{ a b c }', { noLocation: true }), {
      Name(node) {
        visited.push(node.value);
        if (node.value === 'b') {
          return BREAK;
        }
      },
    });

    expect(visited).to.deep.equal(['a', 'b']);
  });

  it('passes parent and ancestors to kind-specific visitors', () => {
    const doc = parse('{ a { b } }', { noLocation: true });
    const seen: Array<[string, string | undefined, Array<string>]> = [];

    visit(doc, {
      Field: {
        leave(node, parent, ancestors) {
          seen.push([
            node.name.value,
            parent?.kind,
            ancestors.map((ancestor) => ancestor.kind),
          ]);
        },
      },
    });

    expect(seen).to.deep.equal([
      [
        'b',
        Kind.SELECTION_SET,
        [
          Kind.DOCUMENT,
          Kind.OPERATION_DEFINITION,
          Kind.SELECTION_SET,
          Kind.FIELD,
          Kind.SELECTION_SET,
        ],
      ],
      [
        'a',
        Kind.SELECTION_SET,
        [Kind.DOCUMENT, Kind.OPERATION_DEFINITION, Kind.SELECTION_SET],
      ],
    ]);
  });

  it('never modifies the document', () => {
    const doc = parse('query Q($v: Int = 3) { a(x: $v) @skip(if: false) }');
    const before = JSON.stringify(doc);

    visit(doc, {
      enter() {
        return undefined;
      },
    });

    expect(JSON.stringify(doc)).to.equal(before);
  });

  it('runs visitors in parallel with independent skipping', () => {
    const first: Array<string> = [];
    const second: Array<string> = [];

    visit(
      parse('{ a { b } c }', { noLocation: true }),
      visitInParallel([
        {
          Field(node) {
            first.push(node.name.value);
            return false;
          },
        },
        {
          Field(node) {
            second.push(node.name.value);
            if (node.name.value === 'b') {
              return BREAK;
            }
          },
        },
      ]),
    );

    expect(first).to.deep.equal(['a', 'c']);
    expect(second).to.deep.equal(['a', 'b']);
  });
});
