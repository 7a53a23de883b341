export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Ray {
  origin: Vec3;
  direction: Vec3;
}

export interface PlaneEquation {
  normal: Vec3;
  constant: number;
}

const EPSILON = 1e-8;

export function dot3(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function add3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale3(vec: Vec3, factor: number): Vec3 {
  return { x: vec.x * factor, y: vec.y * factor, z: vec.z * factor };
}

export function length3(vec: Vec3): number {
  return Math.hypot(vec.x, vec.y, vec.z);
}

/** Unit vector, or null for a zero-length input. */
export function normalize3(vec: Vec3): Vec3 | null {
  const length = length3(vec);
  if (length < EPSILON) {
    return null;
  }
  return { x: vec.x / length, y: vec.y / length, z: vec.z / length };
}

export function sub2(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function dot2(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function distance2(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function createPlaneFromPointAndNormal(point: Vec3, normal: Vec3): PlaneEquation {
  const unit = normalize3(normal) ?? { x: 0, y: 1, z: 0 };
  return {
    normal: unit,
    constant: -dot3(unit, point),
  };
}

export function intersectRayWithPlane(ray: Ray, plane: PlaneEquation): Vec3 | null {
  const denom = dot3(plane.normal, ray.direction);
  if (Math.abs(denom) < EPSILON) {
    return null;
  }
  const t = -(dot3(plane.normal, ray.origin) + plane.constant) / denom;
  if (t < 0) {
    return null;
  }
  return add3(ray.origin, scale3(ray.direction, t));
}

export function computeDragDelta(startHit: Vec3, currentHit: Vec3): Vec3 {
  return sub3(currentHit, startHit);
}

/**
 * Move `point` by the drag between two rays, measured on the plane through
 * `point` facing `viewDirection`. The point keeps its depth along the view.
 */
export function dragPointOnViewPlane(point: Vec3, viewDirection: Vec3, startRay: Ray, currentRay: Ray): Vec3 | null {
  const plane = createPlaneFromPointAndNormal(point, viewDirection);
  const startHit = intersectRayWithPlane(startRay, plane);
  const currentHit = intersectRayWithPlane(currentRay, plane);
  if (!startHit || !currentHit) {
    return null;
  }
  return add3(point, computeDragDelta(startHit, currentHit));
}
