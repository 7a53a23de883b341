import type { Vec2 } from "./dragMath.js";
import { distance2, dot2, sub2 } from "./dragMath.js";

const EPSILON = 1e-9;

export type WalkDirection = -1 | 0 | 1;

export interface PolylineProjection {
  point: Vec2;
  segmentIndex: number;
  t: number;
  distanceSquared: number;
}

function normalize2(vec: Vec2): Vec2 | null {
  const length = Math.hypot(vec.x, vec.y);
  if (length < EPSILON) return null;
  return { x: vec.x / length, y: vec.y / length };
}

/** Stroke points farther than `minDistance` pixels from the last kept point are kept. */
export function acceptStrokePoint(last: Vec2 | undefined, candidate: Vec2, minDistance: number): boolean {
  return last === undefined || distance2(last, candidate) > minDistance;
}

/**
 * Normalized mean of the vectors from the first stroke point to every later
 * one. Null when the stroke never leaves its start point.
 */
export function meanStrokeDirection(points: readonly Vec2[]): Vec2 | null {
  if (points.length < 2) return null;
  const origin = points[0];
  let sumX = 0;
  let sumY = 0;
  for (let i = 1; i < points.length; i++) {
    sumX += (points[i].x - origin.x) / points.length;
    sumY += (points[i].y - origin.y) / points.length;
  }
  return normalize2({ x: sumX, y: sumY });
}

/**
 * Pick the time neighbour of the anchor whose screen direction best matches
 * the stroke. Neighbours that do not exist or point away from the stroke
 * never win; with no candidate left the walk direction is 0.
 */
export function resolveWalkDirection(
  direction: Vec2,
  anchor: Vec2,
  previous: Vec2 | null,
  next: Vec2 | null,
): WalkDirection {
  const score = (neighbour: Vec2 | null): number => {
    if (!neighbour) return Number.NEGATIVE_INFINITY;
    const toNeighbour = normalize2(sub2(neighbour, anchor));
    return toNeighbour ? dot2(direction, toNeighbour) : Number.NEGATIVE_INFINITY;
  };
  const backward = score(previous);
  const forward = score(next);
  if (backward <= 0 && forward <= 0) return 0;
  return forward >= backward ? 1 : -1;
}

/** First non-null position stepping from `from` by `step`, or null at the list's end. */
export function nearestScreenPosition(
  positions: readonly (Vec2 | null)[],
  from: number,
  step: -1 | 1,
): Vec2 | null {
  for (let index = from + step; index >= 0 && index < positions.length; index += step) {
    const position = positions[index];
    if (position) return position;
  }
  return null;
}

export interface StrokeRunInput {
  /** Screen position per key in time order; null where it could not be computed. */
  screenPositions: readonly (Vec2 | null)[];
  anchorIndex: number;
  direction: WalkDirection;
  target: Vec2;
  maxWorseSteps: number;
}

/**
 * Walk away from the anchor collecting keys while they approach `target`.
 * Keys that move away are held back; if a later key improves on the best
 * distance the held keys rejoin the run, otherwise the walk ends after
 * more than `maxWorseSteps` of them. Keys without a screen position are
 * stepped over and never join the run. Returns key indices in walk order.
 */
export function collectStrokeRun(input: StrokeRunInput): number[] {
  const run: number[] = [];
  if (input.direction === 0) return run;

  const pending: number[] = [];
  let best = Number.POSITIVE_INFINITY;
  for (
    let index = input.anchorIndex + input.direction;
    index >= 0 && index < input.screenPositions.length;
    index += input.direction
  ) {
    const screen = input.screenPositions[index];
    if (!screen) continue;
    const distance = distance2(screen, input.target);
    if (run.length === 0 || distance < best) {
      run.push(...pending, index);
      pending.length = 0;
      best = distance;
      continue;
    }
    pending.push(index);
    if (pending.length > input.maxWorseSteps) break;
  }
  return run;
}

export function polylineLength(points: readonly Vec2[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += distance2(points[i - 1], points[i]);
  }
  return total;
}

/**
 * Closest point on the polyline to `target`. Zero-length segments are
 * skipped; a stroke made only of coincident points yields its first point.
 */
export function closestPointOnPolyline(points: readonly Vec2[], target: Vec2): PolylineProjection | null {
  if (points.length === 0) return null;
  let best: PolylineProjection | null = null;
  for (let i = 0; i < points.length - 1; i++) {
    const a = points[i];
    const b = points[i + 1];
    const segment = sub2(b, a);
    const lengthSquared = dot2(segment, segment);
    if (lengthSquared < EPSILON) continue;
    const t = Math.min(1, Math.max(0, dot2(sub2(target, a), segment) / lengthSquared));
    const point = { x: a.x + segment.x * t, y: a.y + segment.y * t };
    const offset = sub2(target, point);
    const distanceSquared = dot2(offset, offset);
    if (!best || distanceSquared < best.distanceSquared) {
      best = { point, segmentIndex: i, t, distanceSquared };
    }
  }
  if (best) return best;
  const offset = sub2(target, points[0]);
  return { point: { ...points[0] }, segmentIndex: 0, t: 0, distanceSquared: dot2(offset, offset) };
}

/** Point at `distance` along the polyline, clamped to its ends. */
export function pointAtArcLength(points: readonly Vec2[], distance: number): Vec2 | null {
  if (points.length === 0) return null;
  let remaining = Math.max(0, distance);
  let lastValid = points[0];
  for (let i = 0; i < points.length - 1; i++) {
    const a = points[i];
    const b = points[i + 1];
    const length = distance2(a, b);
    if (length < EPSILON) continue;
    if (remaining <= length) {
      const t = remaining / length;
      return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
    }
    remaining -= length;
    lastValid = b;
  }
  return { ...lastValid };
}

/**
 * Arc-length targets for `count` keys spread along the stroke: key `i`
 * lands at `(i + 1) / count` of the total length.
 */
export function spreadArcLengths(points: readonly Vec2[], count: number): number[] {
  const total = polylineLength(points);
  const lengths: number[] = [];
  for (let i = 0; i < count; i++) {
    lengths.push(((i + 1) / count) * total);
  }
  return lengths;
}

export function spreadPointsOnPolyline(points: readonly Vec2[], count: number): Vec2[] {
  const result: Vec2[] = [];
  for (const length of spreadArcLengths(points, count)) {
    const point = pointAtArcLength(points, length);
    if (point) result.push(point);
  }
  return result;
}

/**
 * Stroke point index sampled for the `i`-th synthesized key out of `count`.
 * Index 0 is the anchor itself and is never sampled.
 */
export function freehandSampleIndex(i: number, count: number, pointCount: number): number {
  const raw = Math.ceil(((i + 1) * (pointCount - 1)) / (count + 1));
  return Math.min(pointCount - 1, Math.max(1, raw));
}
