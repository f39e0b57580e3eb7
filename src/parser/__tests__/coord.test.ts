import { describe, expect, it } from 'vitest';
import { Coord, boundsOf, pointMm, unionRect } from '../coord';
import { formatNumber } from '../writer';
import { ContractViolationError } from '../../shared/errors';

describe('Coord', () => {
  it('parses decimal millimetre text exactly', () => {
    expect(Coord.parse('-1.27')?.nm).toBe(-1_270_000);
    expect(Coord.parse('.5')?.nm).toBe(500_000);
    expect(Coord.parse('+3')?.nm).toBe(3_000_000);
    expect(Coord.parse('0.000001')?.nm).toBe(1);
  });

  it('rounds digits past the sixth fractional place half away from zero', () => {
    expect(Coord.parse('1.0000005')?.nm).toBe(1_000_001);
    expect(Coord.parse('1.0000004')?.nm).toBe(1_000_000);
    expect(Coord.parse('-1.0000005')?.nm).toBe(-1_000_001);
  });

  it('rejects text that is not a plain decimal', () => {
    expect(Coord.parse('')).toBeUndefined();
    expect(Coord.parse('-')).toBeUndefined();
    expect(Coord.parse('1e3')).toBeUndefined();
    expect(Coord.parse('abc')).toBeUndefined();
  });

  it('formats back to the text it was parsed from', () => {
    for (const text of ['0', '1.27', '-0.254', '100.000001', '0.5', '-2540']) {
      const coord = Coord.parse(text);
      expect(coord?.toString()).toBe(text);
      expect(Coord.fromMm(Number(text)).toString()).toBe(text);
      expect(formatNumber(Coord.fromMm(Number(text)).toMm())).toBe(text);
    }
  });

  it('does not drift under repeated arithmetic', () => {
    const sum = Coord.fromMm(0.1).add(Coord.fromMm(0.2));
    expect(sum.equals(Coord.fromMm(0.3))).toBe(true);
    let c = Coord.parse('1.27');
    for (let i = 0; i < 1000 && c; i++) c = Coord.parse(c.toString());
    expect(c?.nm).toBe(1_270_000);
  });

  it('normalises negative zero', () => {
    expect(Object.is(Coord.fromMm(-0).nm, 0)).toBe(true);
    expect(Coord.parse('-0.0')?.toString()).toBe('0');
    expect(Coord.fromMm(1).sub(Coord.fromMm(1)).toString()).toBe('0');
  });

  it('scales and divides to the nearest nanometre', () => {
    expect(Coord.fromMm(1).mul(1.5).toString()).toBe('1.5');
    expect(Coord.fromNm(1).div(2).nm).toBe(1);
    expect(Coord.fromMm(0.875).div(2).toString()).toBe('0.4375');
    expect(Coord.fromMm(-2).abs().toString()).toBe('2');
    expect(Coord.fromMm(2).negate().toString()).toBe('-2');
  });

  it('orders on the integer', () => {
    const a = Coord.fromMm(1);
    const b = Coord.fromMm(1.000001);
    expect(a.compare(b)).toBe(-1);
    expect(b.compare(a)).toBe(1);
    expect(a.compare(Coord.parse('1.000000') ?? Coord.zero)).toBe(0);
    expect(Coord.min(a, b)).toBe(a);
    expect(Coord.max(a, b)).toBe(b);
    expect(Coord.zero.isZero()).toBe(true);
  });

  it('converts untrusted millimetres without throwing', () => {
    expect(Coord.tryFromMm(1.27)?.nm).toBe(1_270_000);
    expect(Object.is(Coord.tryFromMm(-0)?.nm, 0)).toBe(true);
    expect(Coord.tryFromMm(99999999999)).toBeUndefined();
    expect(Coord.tryFromMm(Number.NaN)).toBeUndefined();
  });

  it('throws on contract violations', () => {
    expect(() => Coord.fromNm(1.5)).toThrow(ContractViolationError);
    expect(() => Coord.fromMm(Number.NaN)).toThrow(ContractViolationError);
    expect(() => Coord.fromMm(Number.POSITIVE_INFINITY)).toThrow(ContractViolationError);
    expect(() => Coord.fromMm(1).div(0)).toThrow(ContractViolationError);
    expect(() => Coord.fromMm(1).mul(Number.NaN)).toThrow(ContractViolationError);
  });
});

describe('boundsOf', () => {
  it('returns undefined for no points', () => {
    expect(boundsOf([])).toBeUndefined();
  });

  it('spans all points', () => {
    const rect = boundsOf([pointMm(1, 5), pointMm(-2, 3), pointMm(4, -1)]);
    expect(rect?.min.x.toString()).toBe('-2');
    expect(rect?.min.y.toString()).toBe('-1');
    expect(rect?.max.x.toString()).toBe('4');
    expect(rect?.max.y.toString()).toBe('5');
  });

  it('unions rectangles, ignoring missing ones', () => {
    const a = boundsOf([pointMm(0, 0), pointMm(1, 1)]);
    const b = boundsOf([pointMm(2, -1), pointMm(3, 0)]);
    expect(unionRect(a, undefined)).toBe(a);
    expect(unionRect(undefined, b)).toBe(b);
    const union = unionRect(a, b);
    expect(union?.min.x.toString()).toBe('0');
    expect(union?.min.y.toString()).toBe('-1');
    expect(union?.max.x.toString()).toBe('3');
    expect(union?.max.y.toString()).toBe('1');
  });
});
