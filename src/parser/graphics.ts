/**
 * Graphic primitives shared by footprints (fp_*) and boards (gr_*).
 */

import { Coord, type CoordPoint } from './coord';
import { SExprBuilder } from './builder';
import type { DiagnosticBag } from './diagnostics';
import { ChildEmitter, ChildOrder, ListReader, type EncodedValue } from './fidelity';
import {
  flagNode, pointNode, pointsNode, readFlag, readPoint, readPoints, readStroke,
  readTextField, readUuid, strokeNode, textNode, uuidNode,
  type Flag, type Stroke, type StrokeStyle, type Text, type Uuid,
} from './fields';
import { tagOf, type SList } from './sexpr';

// --- Types ---

export type GraphicShape = 'line' | 'rect' | 'circle' | 'arc' | 'poly';

export interface Graphic {
  type: 'graphic';
  /** e.g. fp_line, gr_circle */
  token: string;
  shape: GraphicShape;
  start?: CoordPoint;
  mid?: CoordPoint;
  center?: CoordPoint;
  end?: CoordPoint;
  points?: CoordPoint[];
  stroke?: EncodedValue<Stroke, StrokeStyle>;
  fill?: Text;
  layer?: Text;
  locked: Flag;
  uuid?: Uuid;
  order: ChildOrder;
}

const SHAPES: Readonly<Record<string, GraphicShape>> = {
  line: 'line',
  rect: 'rect',
  circle: 'circle',
  arc: 'arc',
  poly: 'poly',
};

export const GRAPHIC_FIELDS = ['locked', 'start', 'mid', 'center', 'end', 'pts', 'stroke', 'fill', 'layer', 'uuid'] as const;

/** Shape of a graphic tag with the given prefix, e.g. ("fp_arc", "fp_") -> "arc" */
export function graphicShapeOf(tag: string | undefined, prefix: 'fp_' | 'gr_'): GraphicShape | undefined {
  if (!tag?.startsWith(prefix)) return undefined;
  const name = tag.slice(prefix.length);
  return Object.prototype.hasOwnProperty.call(SHAPES, name) ? SHAPES[name] : undefined;
}

// --- Reading ---

function requiredPoints(shape: GraphicShape): readonly ('start' | 'center' | 'end' | 'points')[] {
  switch (shape) {
    case 'line':
    case 'rect':
    case 'arc':
      return ['start', 'end'];
    case 'circle':
      return ['center', 'end'];
    case 'poly':
      return ['points'];
  }
}

export function readGraphic(node: SList, shape: GraphicShape, diagnostics: DiagnosticBag, context: string): Graphic | undefined {
  const token = tagOf(node) ?? '';
  const reader = new ListReader(node, diagnostics, `${context} > ${token}`);
  const graphic: Graphic = {
    type: 'graphic',
    token,
    shape,
    locked: readFlag(reader, 'locked'),
    order: ChildOrder.empty,
  };

  const start = readPoint(reader, 'start');
  if (start) graphic.start = start;
  const mid = readPoint(reader, 'mid');
  if (mid) graphic.mid = mid;
  const center = readPoint(reader, 'center');
  if (center) graphic.center = center;
  const end = readPoint(reader, 'end');
  if (end) graphic.end = end;
  const points = readPoints(reader);
  if (points) graphic.points = points;

  const missing = requiredPoints(shape).filter(field => graphic[field] === undefined);
  if (missing.length > 0) {
    reader.warn(`${token} without ${missing.join(', ')}`);
    return undefined;
  }

  const stroke = readStroke(reader);
  if (stroke) graphic.stroke = stroke;
  const fill = readTextField(reader, 'fill');
  if (fill) graphic.fill = fill;
  const layer = readTextField(reader, 'layer');
  if (layer) graphic.layer = layer;
  const uuid = readUuid(reader);
  if (uuid) graphic.uuid = uuid;

  graphic.order = reader.order(1);
  return graphic;
}

// --- Building ---

export function buildGraphic(graphic: Graphic): SList {
  const emitter = new ChildEmitter();
  emitter.add('locked', flagNode('locked', graphic.locked));
  if (graphic.start) emitter.add('start', pointNode('start', graphic.start));
  if (graphic.mid) emitter.add('mid', pointNode('mid', graphic.mid));
  if (graphic.center) emitter.add('center', pointNode('center', graphic.center));
  if (graphic.end) emitter.add('end', pointNode('end', graphic.end));
  if (graphic.points) emitter.add('pts', pointsNode(graphic.points));
  if (graphic.stroke) emitter.add('stroke', strokeNode(graphic.stroke));
  if (graphic.fill) emitter.add('fill', textNode('fill', graphic.fill, 'symbol'));
  if (graphic.layer) emitter.add('layer', textNode('layer', graphic.layer));
  if (graphic.uuid) emitter.add('uuid', uuidNode(graphic.uuid));
  return new SExprBuilder(graphic.token).addChildren(emitter.arrange(graphic.order, GRAPHIC_FIELDS)).build();
}

// --- Geometry ---

/** Points that bound the graphic, stroke width excluded */
export function graphicExtent(graphic: Graphic): CoordPoint[] {
  const { start, mid, center, end, points } = graphic;
  if (graphic.shape === 'circle' && center && end) {
    const radius = Coord.fromMm(Math.hypot(end.x.toMm() - center.x.toMm(), end.y.toMm() - center.y.toMm()));
    return [
      { x: center.x.sub(radius), y: center.y.sub(radius) },
      { x: center.x.add(radius), y: center.y.add(radius) },
    ];
  }
  const extent: CoordPoint[] = [];
  for (const p of [start, mid, end]) {
    if (p) extent.push(p);
  }
  if (graphic.shape === 'arc' && start && mid && end) extent.push(...arcAxisExtremes(start, mid, end));
  if (points) extent.push(...points);
  return extent;
}

const TURN = 2 * Math.PI;

/** Angle in [0, 2π) */
function normalizeAngle(angle: number): number {
  const a = angle % TURN;
  return a < 0 ? a + TURN : a;
}

/**
 * Points where the arc through start, mid and end crosses the horizontal or
 * vertical line through its centre.
 */
function arcAxisExtremes(start: CoordPoint, mid: CoordPoint, end: CoordPoint): CoordPoint[] {
  const [ax, ay, bx, by, cx, cy] = [start.x, start.y, mid.x, mid.y, end.x, end.y].map(c => c.toMm());
  const d = 2 * (ax * (by - cy) + bx * (cy - ay) + cx * (ay - by));
  if (Math.abs(d) < 1e-12) return [];
  const a2 = ax * ax + ay * ay;
  const b2 = bx * bx + by * by;
  const c2 = cx * cx + cy * cy;
  const ux = (a2 * (by - cy) + b2 * (cy - ay) + c2 * (ay - by)) / d;
  const uy = (a2 * (cx - bx) + b2 * (ax - cx) + c2 * (bx - ax)) / d;
  const radius = Math.hypot(ax - ux, ay - uy);

  const from = Math.atan2(ay - uy, ax - ux);
  const through = Math.atan2(by - uy, bx - ux);
  const to = Math.atan2(cy - uy, cx - ux);
  const sweep = normalizeAngle(to - from);
  const counterClockwise = normalizeAngle(through - from) < sweep;
  const onArc = (angle: number): boolean => counterClockwise
    ? normalizeAngle(angle - from) <= sweep
    : normalizeAngle(angle - to) <= normalizeAngle(from - to);

  const candidates: [number, number, number][] = [
    [0, ux + radius, uy],
    [Math.PI / 2, ux, uy + radius],
    [Math.PI, ux - radius, uy],
    [3 * Math.PI / 2, ux, uy - radius],
  ];
  const extremes: CoordPoint[] = [];
  for (const [angle, x, y] of candidates) {
    if (!onArc(angle)) continue;
    const px = Coord.tryFromMm(x);
    const py = Coord.tryFromMm(y);
    if (px && py) extremes.push({ x: px, y: py });
  }
  return extremes;
}
