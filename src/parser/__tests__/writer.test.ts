import { describe, expect, it } from 'vitest';
import { ContractViolationError } from '../../shared/errors';
import { SExprBuilder } from '../builder';
import { parseSExpression } from '../reader';
import { list, num, str, sym } from '../sexpr';
import { formatNumber, quoteString, serializeSExpression } from '../writer';

describe('serializeSExpression', () => {
  it('writes a parsed tree in the canonical layout', () => {
    const { root } = parseSExpression('(foo (bar 1.5 "x\\"y") baz)');
    expect(serializeSExpression(root, { preserveLayout: false })).toBe('(foo\n\t(bar 1.5 "x\\"y")\n\tbaz\n)\n');
    expect(serializeSExpression(root)).toBe('(foo (bar 1.5 "x\\"y") baz)\n');
  });

  it('writes a built pad on one line', () => {
    const pad = new SExprBuilder('pad').addValue('1').addSymbol('smd').addSymbol('circle').build();
    expect(serializeSExpression(pad)).toBe('(pad "1" smd circle)\n');
  });

  it('puts atoms that follow the first nested list on their own lines', () => {
    const node = list([sym('a'), sym('x'), list([sym('b')]), sym('y')]);
    expect(serializeSExpression(node)).toBe('(a x\n\t(b)\n\ty\n)\n');
  });

  it('honours the indent and newline options', () => {
    const node = list([sym('a'), list([sym('b'), num(1)])]);
    expect(serializeSExpression(node, { indent: '  ' })).toBe('(a\n  (b 1)\n)\n');
    expect(serializeSExpression(node, { newline: '\r\n' })).toBe('(a\r\n\t(b 1)\r\n)\r\n');
  });

  it('rejects an indent that is not whitespace', () => {
    expect(() => serializeSExpression(list([sym('a')]), { indent: '--' })).toThrow(ContractViolationError);
  });

  it('writes an empty list', () => {
    expect(serializeSExpression(list([]))).toBe('()\n');
  });

  it('reproduces the recorded layout and number text', () => {
    const text = '(a\n\t(b 1.000 -0.0)\n\n\t(c "q")\n)\n';
    expect(serializeSExpression(parseSExpression(text).root)).toBe(text);
  });

  it('is idempotent across parse and write cycles', () => {
    const text = '(kicad_pcb (version 20211014)\n  (net 0 "")\n  (net 1 "A \\"quoted\\" net")\n)\n';
    const once = serializeSExpression(parseSExpression(text).root, { indent: '  ' });
    const twice = serializeSExpression(parseSExpression(once).root, { indent: '  ' });
    expect(once).toBe(text);
    expect(twice).toBe(once);
  });

  it('recovers strings with quotes, backslashes and newlines', () => {
    for (const value of ['say "hi"', 'back\\slash', 'two\nlines', '\\"mixed\\"\n', 'back\\nslash', '']) {
      const text = serializeSExpression(list([sym('t'), str(value)]));
      const parsed = parseSExpression(text);
      expect(parsed.hasErrors).toBe(false);
      const atom = parsed.root.items[1];
      expect(atom.type === 'string' && atom.value).toBe(value);
    }
  });
});

describe('formatNumber', () => {
  it('writes integers without a point', () => {
    expect(formatNumber(2)).toBe('2');
    expect(formatNumber(-40)).toBe('-40');
    expect(formatNumber(20240108)).toBe('20240108');
    expect(formatNumber(1e21)).toBe('1000000000000000000000');
  });

  it('writes reals with at most six trimmed fractional digits', () => {
    expect(formatNumber(1.5)).toBe('1.5');
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(123.4567891)).toBe('123.456789');
    expect(formatNumber(1e-7)).toBe('0');
  });

  it('never writes negative zero', () => {
    expect(formatNumber(-0)).toBe('0');
    expect(formatNumber(-1e-7)).toBe('0');
  });

  it('rejects non-finite numbers', () => {
    expect(() => formatNumber(Number.NaN)).toThrow(ContractViolationError);
    expect(() => formatNumber(Number.NEGATIVE_INFINITY)).toThrow(ContractViolationError);
  });
});

describe('quoteString', () => {
  it('escapes only quotes and backslashes', () => {
    expect(quoteString('a"b\\c\nd')).toBe('"a\\"b\\\\c\nd"');
  });
});
