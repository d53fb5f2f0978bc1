import type { Vec2 } from './types';

type Point = Readonly<Vec2>;

export interface SegmentProjection {
  point: Vec2;
  t: number;                // 0..1 along the segment when clamped
  distance: number;         // from the query point to `point`
}

export interface PolylineSample {
  position: Vec2;
  heading: number;
  s: number;                // arc length from the polyline start
}

/**
 * Euclidean distance between two points
 */
export function distance(a: Point, b: Point): number {
  const [ax, ay] = a;
  const [bx, by] = b;
  return Math.sqrt((ax - bx) ** 2 + (ay - by) ** 2);
}

/**
 * Heading of the direction from `from` to `to`, radians CCW from +x
 */
export function headingOf(from: Point, to: Point): number {
  return Math.atan2(to[1] - from[1], to[0] - from[0]);
}

/**
 * Wrap an angle into (-π, π]
 */
export function normalizeAngle(angle: number): number {
  let wrapped = angle;
  while (wrapped > Math.PI) wrapped -= 2 * Math.PI;
  while (wrapped <= -Math.PI) wrapped += 2 * Math.PI;
  return wrapped;
}

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function lerp(a: Point, b: Point, t: number): Vec2 {
  return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t];
}

/**
 * Project a point onto segment a-b.
 * With `clamp` off, `t` may leave 0..1 and the point lies on the carrying line.
 */
export function projectOnSegment(point: Point, a: Point, b: Point, clamp = true): SegmentProjection {
  const [px, py] = point;
  const [x1, y1] = a;
  const dx = b[0] - x1;
  const dy = b[1] - y1;
  const lengthSq = dx * dx + dy * dy;

  if (lengthSq === 0) {
    return { point: [x1, y1], t: 0, distance: distance(point, a) };
  }

  let t = ((px - x1) * dx + (py - y1) * dy) / lengthSq;
  if (clamp) {
    t = Math.max(0, Math.min(1, t));
  }
  const projected: Vec2 = [x1 + t * dx, y1 + t * dy];

  return { point: projected, t, distance: distance(point, projected) };
}

/**
 * Shift a point sideways relative to a heading; positive offsets go right
 */
export function offsetPoint(point: Point, heading: number, offset: number): Vec2 {
  if (offset === 0) return [point[0], point[1]];
  // Right-hand normal of (cos h, sin h)
  return [point[0] + Math.sin(heading) * offset, point[1] - Math.cos(heading) * offset];
}

export function polylineLength(polyline: readonly Point[]): number {
  let length = 0;
  for (let i = 0; i < polyline.length - 1; i++) {
    length += distance(polyline[i], polyline[i + 1]);
  }
  return length;
}

/**
 * Sample a polyline every `spacing` metres of arc length.
 * The first and last vertex are always part of the result.
 */
export function samplePolyline(polyline: readonly Point[], spacing: number): PolylineSample[] {
  const samples: PolylineSample[] = [];
  if (polyline.length < 2 || spacing <= 0) return samples;

  const total = polylineLength(polyline);
  let segment = 0;
  let segmentStart = 0;

  for (let k = 0; k * spacing < total - 1e-6; k++) {
    const s = k * spacing;
    while (segment < polyline.length - 2 && segmentStart + distance(polyline[segment], polyline[segment + 1]) <= s) {
      segmentStart += distance(polyline[segment], polyline[segment + 1]);
      segment++;
    }
    const a = polyline[segment];
    const b = polyline[segment + 1];
    const segLength = distance(a, b);
    const t = segLength > 0 ? (s - segmentStart) / segLength : 0;
    samples.push({ position: lerp(a, b, t), heading: headingOf(a, b), s });
  }

  const last = polyline.length - 1;
  samples.push({
    position: [polyline[last][0], polyline[last][1]],
    heading: headingOf(polyline[last - 1], polyline[last]),
    s: total,
  });

  return samples;
}
