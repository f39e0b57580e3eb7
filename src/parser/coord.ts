/**
 * Fixed-point physical length.
 *
 * One unit is one nanometre, so any millimetre value with up to six fractional
 * digits is represented exactly. Comparisons always use the integer.
 */

import { ContractViolationError } from '../shared/errors';

const NM_PER_MM = 1_000_000;
const FRACTION_DIGITS = 6;
const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

function checkInteger(nm: number, operation: string): number {
  if (!Number.isSafeInteger(nm)) {
    throw new ContractViolationError(`Coord out of range: ${nm} nm`, { operation });
  }
  // normalise -0
  return nm === 0 ? 0 : nm;
}

export class Coord {
  static readonly zero = new Coord(0);

  private constructor(readonly nm: number) {
    Object.freeze(this);
  }

  static fromNm(nm: number): Coord {
    if (!Number.isInteger(nm)) {
      throw new ContractViolationError(`Coord.fromNm expects an integer, got ${nm}`, { operation: 'Coord.fromNm' });
    }
    return new Coord(checkInteger(nm, 'Coord.fromNm'));
  }

  static fromMm(mm: number): Coord {
    if (!Number.isFinite(mm)) {
      throw new ContractViolationError(`Coord.fromMm expects a finite number, got ${mm}`, { operation: 'Coord.fromMm' });
    }
    return new Coord(checkInteger(Math.round(mm * NM_PER_MM), 'Coord.fromMm'));
  }

  /** fromMm for untrusted values: undefined where fromMm would throw */
  static tryFromMm(mm: number): Coord | undefined {
    const nm = Math.round(mm * NM_PER_MM);
    if (!Number.isSafeInteger(nm)) return undefined;
    return new Coord(nm === 0 ? 0 : nm);
  }

  /**
   * Exact conversion of decimal millimetre text such as "-1.27" or ".5".
   * Digits past the sixth fractional place round half away from zero.
   * Returns undefined for anything that is not a plain decimal.
   */
  static parse(text: string): Coord | undefined {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) return undefined;
    const [, sign, whole, fraction = ''] = match;
    if (whole === '' && fraction === '') return undefined;

    let nm = Number(whole || '0') * NM_PER_MM + Number(fraction.slice(0, FRACTION_DIGITS).padEnd(FRACTION_DIGITS, '0'));
    if (fraction.length > FRACTION_DIGITS && fraction.charCodeAt(FRACTION_DIGITS) >= 53 /* '5' */) nm += 1;
    if (!Number.isSafeInteger(nm)) return undefined;
    return new Coord(sign === '-' && nm !== 0 ? -nm : nm);
  }

  toMm(): number {
    return this.nm / NM_PER_MM;
  }

  /** Exact decimal millimetres, trailing zeros trimmed */
  toString(): string {
    const magnitude = Math.abs(this.nm);
    const whole = Math.floor(magnitude / NM_PER_MM);
    const fraction = String(magnitude % NM_PER_MM).padStart(FRACTION_DIGITS, '0').replace(/0+$/, '');
    const sign = this.nm < 0 ? '-' : '';
    return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
  }

  add(other: Coord): Coord {
    return new Coord(checkInteger(this.nm + other.nm, 'Coord.add'));
  }

  sub(other: Coord): Coord {
    return new Coord(checkInteger(this.nm - other.nm, 'Coord.sub'));
  }

  mul(factor: number): Coord {
    if (!Number.isFinite(factor)) {
      throw new ContractViolationError(`Coord.mul expects a finite factor, got ${factor}`, { operation: 'Coord.mul' });
    }
    return new Coord(checkInteger(Math.round(this.nm * factor), 'Coord.mul'));
  }

  div(divisor: number): Coord {
    if (!Number.isFinite(divisor) || divisor === 0) {
      throw new ContractViolationError(`Coord.div expects a finite non-zero divisor, got ${divisor}`, { operation: 'Coord.div' });
    }
    return new Coord(checkInteger(Math.round(this.nm / divisor), 'Coord.div'));
  }

  negate(): Coord {
    return new Coord(checkInteger(-this.nm, 'Coord.negate'));
  }

  abs(): Coord {
    return this.nm < 0 ? this.negate() : this;
  }

  isZero(): boolean {
    return this.nm === 0;
  }

  compare(other: Coord): -1 | 0 | 1 {
    if (this.nm < other.nm) return -1;
    if (this.nm > other.nm) return 1;
    return 0;
  }

  equals(other: Coord): boolean {
    return this.nm === other.nm;
  }

  static min(a: Coord, b: Coord): Coord {
    return a.nm <= b.nm ? a : b;
  }

  static max(a: Coord, b: Coord): Coord {
    return a.nm >= b.nm ? a : b;
  }
}

export interface CoordPoint {
  readonly x: Coord;
  readonly y: Coord;
}

export interface CoordRect {
  readonly min: CoordPoint;
  readonly max: CoordPoint;
}

export function point(x: Coord, y: Coord): CoordPoint {
  return { x, y };
}

export function pointMm(x: number, y: number): CoordPoint {
  return { x: Coord.fromMm(x), y: Coord.fromMm(y) };
}

/** Bounding rectangle of a set of points, or undefined when empty */
export function boundsOf(points: readonly CoordPoint[]): CoordRect | undefined {
  if (points.length === 0) return undefined;
  let minX = points[0].x;
  let minY = points[0].y;
  let maxX = minX;
  let maxY = minY;
  for (let i = 1; i < points.length; i++) {
    const p = points[i];
    minX = Coord.min(minX, p.x);
    minY = Coord.min(minY, p.y);
    maxX = Coord.max(maxX, p.x);
    maxY = Coord.max(maxY, p.y);
  }
  return { min: { x: minX, y: minY }, max: { x: maxX, y: maxY } };
}

export function unionRect(a: CoordRect | undefined, b: CoordRect | undefined): CoordRect | undefined {
  if (!a) return b;
  if (!b) return a;
  return boundsOf([a.min, a.max, b.min, b.max]);
}
