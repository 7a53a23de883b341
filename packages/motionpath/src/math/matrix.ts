import * as THREE from "three";
import type { Vec3 } from "@keytrail/engine";

export function toVector3(vec: Vec3): THREE.Vector3 {
  return new THREE.Vector3(vec.x, vec.y, vec.z);
}

export function fromVector3(vec: THREE.Vector3): Vec3 {
  return { x: vec.x, y: vec.y, z: vec.z };
}

/** Point transform: linear part plus translation. */
export function transformPoint(matrix: THREE.Matrix4, point: Vec3): Vec3 {
  return fromVector3(toVector3(point).applyMatrix4(matrix));
}

/** Vector transform through the linear part only, without normalizing. */
export function transformVector(matrix: THREE.Matrix4, vec: Vec3): Vec3 {
  const linear = new THREE.Matrix3().setFromMatrix4(matrix);
  return fromVector3(toVector3(vec).applyMatrix3(linear));
}

export function invertMatrix(matrix: THREE.Matrix4): THREE.Matrix4 {
  return matrix.clone().invert();
}

export function inverseTransformPoint(matrix: THREE.Matrix4, point: Vec3): Vec3 {
  return transformPoint(invertMatrix(matrix), point);
}

export function inverseTransformVector(matrix: THREE.Matrix4, vec: Vec3): Vec3 {
  return transformVector(invertMatrix(matrix), vec);
}

/** `parent * translate(offset)`: the pivot offset is applied before the parent. */
export function composeOffset(parent: THREE.Matrix4, offset: Vec3): THREE.Matrix4 {
  const pivot = new THREE.Matrix4().makeTranslation(offset.x, offset.y, offset.z);
  return parent.clone().multiply(pivot);
}

/**
 * Shortest-arc rotation taking `from` onto `to`, applied to `vec`.
 * Zero-length directions leave `vec` untouched.
 */
export function rotateBetween(vec: Vec3, from: Vec3, to: Vec3): Vec3 {
  const a = toVector3(from);
  const b = toVector3(to);
  if (a.lengthSq() === 0 || b.lengthSq() === 0) {
    return { ...vec };
  }
  const rotation = new THREE.Quaternion().setFromUnitVectors(a.normalize(), b.normalize());
  return fromVector3(toVector3(vec).applyQuaternion(rotation));
}
