import { expect } from 'chai';
import { describe, it } from 'mocha';

import { parseType, parseValue } from '../../language/parser';

import {
  getNamedTypeName,
  getNullableTypeRef,
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLObjectType,
  isEqualTypeRef,
  isRequiredArgument,
  list,
  named,
  nonNull,
  printTypeRef,
  typeRefFromAST,
  typeRefFromString,
} from '../definition';

describe('Type references', () => {
  it('builds frozen references', () => {
    const ref = nonNull(list(nonNull('Int')));

    expect(ref).to.deep.equal({
      kind: 'NonNullTypeRef',
      ofType: {
        kind: 'ListTypeRef',
        ofType: {
          kind: 'NonNullTypeRef',
          ofType: { kind: 'NamedTypeRef', name: 'Int' },
        },
      },
    });
    expect(Object.isFrozen(ref)).to.equal(true);
    expect(Object.isFrozen(ref.ofType)).to.equal(true);
  });

  it('accepts the SDL spelling of a reference', () => {
    expect(typeRefFromString('[Int!]!')).to.deep.equal(
      nonNull(list(nonNull(named('Int')))),
    );
    expect(typeRefFromAST(parseType('[[ID]]'))).to.deep.equal(
      list(list('ID')),
    );
    expect(list('[String!]')).to.deep.equal(list(list(nonNull('String'))));
  });

  it('never wraps a non-null reference in another non-null', () => {
    expect(() => nonNull(nonNull('Int'))).to.throw(
      'Expected Int! to be a nullable type.',
    );
    expect(() => nonNull('Int!')).to.throw(
      'Expected Int! to be a nullable type.',
    );
  });

  it('rejects invalid names', () => {
    expect(() => named('')).to.throw('Expected name to be a non-empty string.');
    expect(() => named('bad-name')).to.throw(
      'Names must only contain [_a-zA-Z0-9] but "bad-name" does not.',
    );
    expect(() => named('1st')).to.throw(
      'Names must start with [_a-zA-Z] but "1st" does not.',
    );
  });

  it('prints references', () => {
    expect(printTypeRef(named('User'))).to.equal('User');
    expect(printTypeRef(nonNull(list(nonNull('User'))))).to.equal('[User!]!');
  });

  it('unwraps references', () => {
    const ref = typeRefFromString('[[User!]]!');
    expect(getNamedTypeName(ref)).to.equal('User');
    expect(getNullableTypeRef(ref)).to.deep.equal(
      typeRefFromString('[[User!]]'),
    );
    expect(getNullableTypeRef(named('User'))).to.deep.equal(named('User'));
  });

  it('compares references structurally', () => {
    expect(isEqualTypeRef(list('Int'), typeRefFromString('[Int]'))).to.equal(
      true,
    );
    expect(isEqualTypeRef(list('Int'), nonNull(list('Int')))).to.equal(false);
    expect(isEqualTypeRef(named('Int'), named('Float'))).to.equal(false);
    expect(isEqualTypeRef(list('Int'), named('Int'))).to.equal(false);
  });
});

describe('Type definitions', () => {
  it('defines object fields by reference', () => {
    const PersonType = new GraphQLObjectType({
      name: 'Person',
      interfaces: ['Node'],
      fields: {
        id: { type: 'ID!' },
        bestFriend: { type: named('Person') },
        friends: {
          type: '[Person!]',
          args: {
            first: { type: 'Int', defaultValue: 10 },
            after: { type: 'ID!' },
          },
        },
      },
    });

    const fields = PersonType.getFields();
    expect(Object.keys(fields)).to.deep.equal(['id', 'bestFriend', 'friends']);
    expect(fields.id.type).to.deep.equal(nonNull('ID'));
    expect(fields.bestFriend.type).to.deep.equal(named('Person'));
    expect(fields.friends.args.map((arg) => arg.name)).to.deep.equal([
      'first',
      'after',
    ]);
    expect(fields.friends.args.map(isRequiredArgument)).to.deep.equal([
      false,
      true,
    ]);
    expect(PersonType.interfaces).to.deep.equal(['Node']);
    expect(String(PersonType)).to.equal('Person');
    expect(JSON.stringify({ type: PersonType })).to.equal('{"type":"Person"}');
  });

  describe('enums', () => {
    const ColorType = new GraphQLEnumType({
      name: 'Color',
      values: {
        RED: { value: 0 },
        GREEN: { value: 1 },
        BLUE: {},
      },
    });

    it('serializes internal values to names', () => {
      expect(ColorType.serialize(0)).to.equal('RED');
      expect(ColorType.serialize('BLUE')).to.equal('BLUE');
      expect(() => ColorType.serialize(7)).to.throw(
        'Enum "Color" cannot represent value: 7',
      );
    });

    it('parses names to internal values', () => {
      expect(ColorType.parseValue('GREEN')).to.equal(1);
      expect(ColorType.parseLiteral(parseValue('RED'))).to.equal(0);
      expect(() => ColorType.parseValue('GREN')).to.throw(
        'Value "GREN" does not exist in "Color" enum. Did you mean the enum value "GREEN" or "RED"?',
      );
      expect(() => ColorType.parseLiteral(parseValue('"RED"'))).to.throw(
        'Enum "Color" cannot represent non-enum value: "RED". Did you mean the enum value "RED" or "GREEN"?',
      );
    });

    it('rejects reserved value names', () => {
      expect(
        () => new GraphQLEnumType({ name: 'Flag', values: { true: {} } }),
      ).to.throw('Enum values cannot be named: true');
    });
  });

  it('defines input object fields', () => {
    const PointType = new GraphQLInputObjectType({
      name: 'Point',
      fields: {
        x: { type: 'Float!' },
        y: { type: 'Float', defaultValue: 0 },
      },
    });

    const fields = PointType.getFields();
    expect(fields.x.type).to.deep.equal(nonNull('Float'));
    expect(fields.y.defaultValue).to.equal(0);
  });
});
