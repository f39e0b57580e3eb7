import { describe, expect, it } from 'vitest';
import { ContractViolationError } from '../../shared/errors';
import { SExprBuilder, isValidSymbol } from '../builder';
import { Coord } from '../coord';
import { list, num, str, sym } from '../sexpr';
import { serializeSExpression } from '../writer';

describe('SExprBuilder', () => {
  it('builds atoms of the right kind', () => {
    const node = SExprBuilder.create('x')
      .addValue('text')
      .addValue(2)
      .addSymbol('F.Cu')
      .addBool(true)
      .addBool(false)
      .build();
    expect(node).toEqual(list([sym('x'), str('text'), num(2), sym('F.Cu'), sym('yes'), sym('no')]));
  });

  it('writes lengths with their exact decimal text', () => {
    const at = new SExprBuilder('at').addMm(Coord.parse('1.27') ?? Coord.zero).addMm(Coord.fromMm(-2.5)).build();
    expect(serializeSExpression(at)).toBe('(at 1.27 -2.5)\n');
  });

  it('keeps explicit number text', () => {
    const node = new SExprBuilder('version').addNumber(1, '1.000').build();
    expect(serializeSExpression(node)).toBe('(version 1.000)\n');
  });

  it('nests children built by a callback', () => {
    const effects = new SExprBuilder('effects')
      .addChild('font', font => font.addChild('size', size => size.addValue(1).addValue(1)))
      .addSymbol('hide')
      .build();
    expect(serializeSExpression(effects)).toBe('(effects\n\t(font\n\t\t(size 1 1)\n\t)\n\thide\n)\n');
  });

  it('appends existing nodes verbatim', () => {
    const raw = list([sym('zone'), list([sym('net'), num(1, '1')])]);
    const board = new SExprBuilder('kicad_pcb').addChild(raw).addChildren([sym('a'), sym('b')]).build();
    expect(board.items[1]).toBe(raw);
    expect(board.items).toHaveLength(4);
  });

  it('rejects invalid tags and symbols', () => {
    expect(() => new SExprBuilder('')).toThrow(ContractViolationError);
    expect(() => new SExprBuilder('a b')).toThrow(ContractViolationError);
    const builder = new SExprBuilder('x');
    expect(() => builder.addSymbol('two words')).toThrow(ContractViolationError);
    expect(() => builder.addSymbol('"quoted"')).toThrow(ContractViolationError);
    expect(() => builder.addSymbol('(')).toThrow(ContractViolationError);
  });

  it('rejects non-finite numbers and non-numeric number text', () => {
    const builder = new SExprBuilder('x');
    expect(() => builder.addValue(Number.NaN)).toThrow(ContractViolationError);
    expect(() => builder.addValue(Number.POSITIVE_INFINITY)).toThrow(ContractViolationError);
    expect(() => builder.addNumber(1, 'one')).toThrow(ContractViolationError);
    expect(() => builder.addNumber(Number.NaN, '1')).toThrow(ContractViolationError);
  });

  it('rejects values of the wrong runtime type', () => {
    const builder = new SExprBuilder('x');
    expect(() => Reflect.apply(builder.addValue, builder, [true])).toThrow(ContractViolationError);
    expect(() => Reflect.apply(builder.addBool, builder, ['yes'])).toThrow(ContractViolationError);
    expect(() => Reflect.apply(builder.addMm, builder, [1.5])).toThrow(ContractViolationError);
    expect(() => Reflect.apply(builder.addChild, builder, [42])).toThrow(ContractViolationError);
  });

  it('cannot be used after build', () => {
    const builder = new SExprBuilder('x');
    builder.build();
    expect(() => builder.build()).toThrow(ContractViolationError);
    expect(() => builder.addValue(1)).toThrow(ContractViolationError);
  });

  it('names the operation in the error context', () => {
    try {
      new SExprBuilder('x').addSymbol('');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ContractViolationError);
      expect(error).toMatchObject({ code: 'CONTRACT_VIOLATION', context: { operation: 'SExprBuilder.addSymbol' } });
    }
  });
});

describe('isValidSymbol', () => {
  it('accepts bare identifiers only', () => {
    expect(isValidSymbol('F.Cu')).toBe(true);
    expect(isValidSymbol('${REFERENCE}')).toBe(true);
    expect(isValidSymbol('')).toBe(false);
    expect(isValidSymbol('a\tb')).toBe(false);
    expect(isValidSymbol('a)')).toBe(false);
  });
});
