import type * as THREE from "three";
import type { AnimCurve, Axis, TangentSide, Vec3 } from "@keytrail/engine";
import { add3, length3, normalize3, readTangentComponent, scale3, sub3 } from "@keytrail/engine";
import { inverseTransformVector, rotateBetween, transformPoint } from "../math/matrix.js";

/** Local tangent component of one axis at one key. */
export function resolveTangentComponent(curve: AnimCurve | undefined, index: number | null, side: TangentSide): number {
  if (!curve || index === null) return 0;
  return readTangentComponent(curve, index, side);
}

/**
 * Handle endpoint stored on the curve, transformed directly:
 * `M(position - inTangent)` for the in side, `M(position + outTangent)` for
 * the out side.
 */
export function rawTangentHandle(parent: THREE.Matrix4, localPosition: Vec3, localTangent: Vec3, side: TangentSide): Vec3 {
  const offset = side === "in" ? scale3(localTangent, -1) : localTangent;
  return transformPoint(parent, add3(localPosition, offset));
}

export interface CurveHandleInput {
  weighted: boolean;
  /** Key position in display space. */
  position: Vec3;
  /** `rawTangentHandle` mapped into display space. */
  rawHandle: Vec3;
  /** Path position `tangentTimeDelta` before (in) or after (out) the key, in display space. */
  neighbour: Vec3 | null;
  localTangent: Vec3;
}

/**
 * Handle endpoint drawn for a key. Weighted curves draw the stored handle;
 * other curves take the direction from the path around the key and the
 * length from the stored tangent.
 */
export function curveTangentHandle(input: CurveHandleInput): Vec3 | null {
  if (input.weighted) {
    return { ...input.rawHandle };
  }
  if (!input.neighbour) {
    return null;
  }
  const direction = normalize3(sub3(input.neighbour, input.position)) ?? { x: 0, y: 0, z: 0 };
  return add3(input.position, scale3(direction, length3(input.localTangent)));
}

export interface TangentWriteInput {
  weighted: boolean;
  side: TangentSide;
  parent: THREE.Matrix4;
  /** World position of the key. */
  keyWorld: Vec3;
  /** Requested world position of the handle. */
  target: Vec3;
  /** Handle currently drawn, in world space. */
  currentHandle: Vec3;
  /** `rawTangentHandle` for the same side, in world space. */
  rawHandle: Vec3;
}

/**
 * Local offset (handle minus key, before the in-side negation) that puts
 * the handle at `target`. Non-weighted curves rotate the stored tangent by
 * the turn between the current and requested handle directions and scale it
 * by their length ratio. Null when the current handle has no length.
 */
export function localTangentForHandle(input: TangentWriteInput): Vec3 | null {
  if (input.weighted) {
    return inverseTransformVector(input.parent, sub3(input.target, input.keyWorld));
  }
  const requested = sub3(input.target, input.keyWorld);
  const current = sub3(input.currentHandle, input.keyWorld);
  const currentLength = length3(current);
  if (currentLength === 0) {
    return null;
  }
  const lengthRatio = length3(requested) / currentLength;
  const stored = sub3(input.rawHandle, input.keyWorld);
  const rotated = rotateBetween(stored, current, requested);
  return scale3(inverseTransformVector(input.parent, rotated), lengthRatio);
}
