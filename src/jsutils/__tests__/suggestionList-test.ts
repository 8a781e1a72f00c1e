import { expect } from 'chai';
import { describe, it } from 'mocha';

import { suggestionList } from '../suggestionList';

describe('suggestionList', () => {
  it('returns nothing without options', () => {
    expect(suggestionList('input', [])).to.deep.equal([]);
  });

  it('keeps options within the edit threshold', () => {
    expect(suggestionList('GREEM', ['GREEN', 'BLACK'])).to.deep.equal([
      'GREEN',
    ]);
  });

  it('counts a change of case as one edit', () => {
    expect(suggestionList('green', ['GREEN'])).to.deep.equal(['GREEN']);
  });

  it('counts a swap of adjacent characters as one edit', () => {
    expect(suggestionList('ab', ['ba'])).to.deep.equal(['ba']);
  });

  it('sorts by distance, then alphabetically', () => {
    expect(suggestionList('ab', ['ba', 'ab', 'ac'])).to.deep.equal([
      'ab',
      'ac',
      'ba',
    ]);
  });
});
