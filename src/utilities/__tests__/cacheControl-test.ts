import { expect } from 'chai';
import { describe, it } from 'mocha';

import { parse } from '../../language/parser';

import { GraphQLObjectType } from '../../type/definition';
import { GraphQLSchema } from '../../type/schema';

import { CacheControl, calculateCacheControl } from '../cacheControl';

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'Query',
    fields: {
      post: { type: 'Post', cacheControl: { maxAge: 60 } },
      me: { type: 'User', cacheControl: { scope: 'PRIVATE' } },
      plain: { type: 'String' },
    },
  }),
  types: [
    new GraphQLObjectType({
      name: 'Post',
      cacheControl: { maxAge: 120 },
      fields: { title: { type: 'String' }, author: { type: 'User' } },
    }),
    new GraphQLObjectType({
      name: 'User',
      cacheControl: { maxAge: 30 },
      fields: { name: { type: 'String' } },
    }),
  ],
});

function headerFor(
  query: string,
  variableValues?: { [variable: string]: unknown },
): string | undefined {
  return calculateCacheControl(
    schema,
    parse(query),
    undefined,
    variableValues,
  ).toHeader();
}

describe('CacheControl', () => {
  it('keeps the shorter declared age and the stricter scope', () => {
    const merged = new CacheControl({ maxAge: 50 })
      .merge({ maxAge: 20 })
      .merge({ scope: 'PRIVATE' });

    expect(merged.maxAge).to.equal(20);
    expect(merged.scope).to.equal('PRIVATE');
  });

  it('treats an age of 0 as undeclared', () => {
    expect(new CacheControl().merge({ maxAge: 5 }).maxAge).to.equal(5);
    expect(new CacheControl({ maxAge: 5 }).merge({}).maxAge).to.equal(5);
  });

  it('has no header without a max age', () => {
    expect(new CacheControl({ scope: 'PRIVATE' }).toHeader()).to.equal(
      undefined,
    );
    expect(new CacheControl({ maxAge: 9, scope: 'PRIVATE' }).toHeader()).to.equal(
      'max-age=9, private',
    );
  });
});

describe('calculateCacheControl', () => {
  it('takes hints from fields and from the types they select on', () => {
    expect(headerFor('{ post { title } }')).to.equal('max-age=60');
    expect(headerFor('{ post { title author { name } } }')).to.equal(
      'max-age=30',
    );
  });

  it('becomes private when any selected field is', () => {
    expect(headerFor('{ post { title } me { name } }')).to.equal(
      'max-age=30, private',
    );
  });

  it('ignores skipped fields', () => {
    const query =
      'query Q($noAuthor: Boolean!) { post { title author @skip(if: $noAuthor) { name } } }';

    expect(headerFor(query, { noAuthor: true })).to.equal('max-age=60');
    expect(headerFor(query, { noAuthor: false })).to.equal('max-age=30');
  });

  it('walks fragments', () => {
    expect(
      headerFor(
        '{ post { ...PostFields } }\nfragment PostFields on Post { author { name } }',
      ),
    ).to.equal('max-age=30');
  });

  it('falls back to no policy', () => {
    expect(headerFor('{ plain }')).to.equal(undefined);
    expect(headerFor('query Q($n: Boolean!) { post { title } }')).to.equal(
      undefined,
    );
    expect(
      calculateCacheControl(schema, parse('{ post { title } }'), 'Other')
        .maxAge,
    ).to.equal(0);
  });
});
