import * as THREE from "three";
import type { Vec3 } from "@keytrail/engine";
import { add3 } from "@keytrail/engine";
import { composeOffset } from "../math/matrix.js";

/** Hierarchy and pivot data of one tracked entity. Null means the data is missing. */
export interface TransformSource {
  parentMatrixAt(time: number): THREE.Matrix4 | null;
  rotatePivotAt(time: number): Vec3 | null;
  rotatePivotTranslateAt(time: number): Vec3 | null;
}

/** Raw per-frame inputs gathered before composing. Plain numbers only. */
export interface TransformInputs {
  parent: number[];
  pivot: Vec3;
}

const ZERO: Vec3 = { x: 0, y: 0, z: 0 };

export const identityTransformSource: TransformSource = {
  parentMatrixAt: () => null,
  rotatePivotAt: () => null,
  rotatePivotTranslateAt: () => null,
};

/** Source with a fixed parent matrix and pivot. */
export function staticTransformSource(parent: THREE.Matrix4, rotatePivot: Vec3 = ZERO, rotatePivotTranslate: Vec3 = ZERO): TransformSource {
  return {
    parentMatrixAt: () => parent.clone(),
    rotatePivotAt: () => ({ ...rotatePivot }),
    rotatePivotTranslateAt: () => ({ ...rotatePivotTranslate }),
  };
}

/** Source reading the parent world matrix of a three.js object. */
export function object3DTransformSource(object: THREE.Object3D): TransformSource {
  return {
    parentMatrixAt: () => {
      if (!object.parent) return null;
      object.parent.updateWorldMatrix(true, false);
      return object.parent.matrixWorld.clone();
    },
    rotatePivotAt: () => null,
    rotatePivotTranslateAt: () => null,
  };
}

export interface TransformResolverOptions {
  usePivots: boolean;
}

/**
 * Resolves the composed parent transform of one entity at one frame:
 * `parent * translate(rotatePivot + rotatePivotTranslate)` with pivots on,
 * the bare parent otherwise. Missing data resolves to identity.
 */
export class TransformResolver {
  private readonly source: TransformSource;
  private usePivots: boolean;

  constructor(source: TransformSource, options: TransformResolverOptions) {
    this.source = source;
    this.usePivots = options.usePivots;
  }

  setUsePivots(usePivots: boolean): void {
    this.usePivots = usePivots;
  }

  collect(time: number): TransformInputs {
    const parent = this.source.parentMatrixAt(time) ?? new THREE.Matrix4();
    let pivot = ZERO;
    if (this.usePivots) {
      pivot = add3(this.source.rotatePivotAt(time) ?? ZERO, this.source.rotatePivotTranslateAt(time) ?? ZERO);
    }
    return { parent: parent.toArray(), pivot };
  }

  compose(inputs: TransformInputs): THREE.Matrix4 {
    const parent = new THREE.Matrix4().fromArray(inputs.parent);
    return composeOffset(parent, inputs.pivot);
  }

  resolve(time: number): THREE.Matrix4 {
    return this.compose(this.collect(time));
  }
}
