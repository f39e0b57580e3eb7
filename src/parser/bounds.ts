/**
 * Bounding boxes for footprints and boards.
 *
 * Rotation follows KiCad's convention for a Y-down canvas: a positive angle
 * turns counter-clockwise on screen.
 */

import { Coord, boundsOf, unionRect, type CoordPoint, type CoordRect } from './coord';
import { footprintGraphics, footprintPads, type Footprint, type Pad } from './footprintParser';
import { graphicExtent } from './graphics';
import { boardFootprints, boardGraphics, boardTracks, boardVias, type PcbBoard } from './pcbParser';

export function rotatePoint(p: CoordPoint, degrees: number): CoordPoint {
  if (degrees % 360 === 0) return p;
  const radians = (degrees * Math.PI) / 180;
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  const x = p.x.toMm();
  const y = p.y.toMm();
  return { x: Coord.fromMm(x * cos + y * sin), y: Coord.fromMm(-x * sin + y * cos) };
}

function translate(p: CoordPoint, by: CoordPoint): CoordPoint {
  return { x: p.x.add(by.x), y: p.y.add(by.y) };
}

/** Pad corners in footprint coordinates; pad angles in files include the footprint's own rotation */
function padCorners(pad: Pad, footprintAngle: number): CoordPoint[] {
  const center = { x: pad.at.x, y: pad.at.y };
  if (!pad.size) return [center];
  const hw = pad.size.w.div(2);
  const hh = pad.size.h.div(2);
  const angle = (pad.at.angle ?? 0) - footprintAngle;
  const corners: CoordPoint[] = [
    { x: hw.negate(), y: hh.negate() },
    { x: hw, y: hh.negate() },
    { x: hw, y: hh },
    { x: hw.negate(), y: hh },
  ];
  return corners.map(corner => translate(rotatePoint(corner, angle), center));
}

function footprintExtent(footprint: Footprint): CoordPoint[] {
  const angle = footprint.at?.angle ?? 0;
  const points: CoordPoint[] = [];
  for (const pad of footprintPads(footprint)) points.push(...padCorners(pad, angle));
  for (const graphic of footprintGraphics(footprint)) points.push(...graphicExtent(graphic));
  return points;
}

/** Pads and graphics in footprint coordinates */
export function footprintBounds(footprint: Footprint): CoordRect | undefined {
  return boundsOf(footprintExtent(footprint));
}

/** Footprint bounds rotated and translated onto the board */
export function placedFootprintBounds(footprint: Footprint): CoordRect | undefined {
  const { at } = footprint;
  const points = footprintExtent(footprint);
  if (!at) return boundsOf(points);
  const origin = { x: at.x, y: at.y };
  return boundsOf(points.map(p => translate(rotatePoint(p, at.angle ?? 0), origin)));
}

function expand(p: CoordPoint, margin: Coord): CoordPoint[] {
  return [
    { x: p.x.sub(margin), y: p.y.sub(margin) },
    { x: p.x.add(margin), y: p.y.add(margin) },
  ];
}

/** Tracks widened by half their width, vias by half their size, graphics and placed footprints */
export function boardBounds(board: PcbBoard): CoordRect | undefined {
  const points: CoordPoint[] = [];
  for (const track of boardTracks(board)) {
    const margin = track.width.div(2);
    points.push(...expand(track.start, margin), ...expand(track.end, margin));
  }
  for (const via of boardVias(board)) {
    points.push(...expand(via.at, via.size.div(2)));
  }
  for (const graphic of boardGraphics(board)) {
    points.push(...graphicExtent(graphic));
  }
  let rect = boundsOf(points);
  for (const footprint of boardFootprints(board)) {
    rect = unionRect(rect, placedFootprintBounds(footprint));
  }
  return rect;
}
