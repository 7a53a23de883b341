import * as THREE from "three";
import type { Vec3 } from "@keytrail/engine";
import { transformPoint } from "../math/matrix.js";

/**
 * Camera world matrices over time. Null means the frame was never cached.
 * Returned matrices are only read.
 */
export interface CameraTrack {
  cameraMatrixAt(time: number): THREE.Matrix4 | null;
}

/** Per-frame store of camera world matrices. */
export class CameraCache implements CameraTrack {
  private readonly matrices = new Map<number, THREE.Matrix4>();

  set(time: number, matrix: THREE.Matrix4): void {
    this.matrices.set(time, matrix.clone());
  }

  cameraMatrixAt(time: number): THREE.Matrix4 | null {
    const matrix = this.matrices.get(time);
    return matrix ? matrix.clone() : null;
  }

  clear(): void {
    this.matrices.clear();
  }

  get size(): number {
    return this.matrices.size;
  }
}

/**
 * Maps world positions into the active display space and back. In camera
 * space a sample at time `t` is shown where it sits relative to the camera
 * at `t`, carried along with the camera as it is now.
 */
export interface DisplaySpaceBridge {
  readonly mode: "world" | "camera";
  toDisplay(world: Vec3, time: number): Vec3 | null;
  toWorld(display: Vec3, time: number): Vec3 | null;
}

export const worldSpaceBridge: DisplaySpaceBridge = {
  mode: "world",
  toDisplay: (world) => ({ ...world }),
  toWorld: (display) => ({ ...display }),
};

export function cameraSpaceBridge(track: CameraTrack, currentCamera: THREE.Matrix4): DisplaySpaceBridge {
  const current = currentCamera.clone();
  const currentInverse = current.clone().invert();

  return {
    mode: "camera",
    toDisplay(world, time) {
      const atTime = track.cameraMatrixAt(time);
      if (!atTime) return null;
      return transformPoint(current.clone().multiply(atTime.clone().invert()), world);
    },
    toWorld(display, time) {
      const atTime = track.cameraMatrixAt(time);
      if (!atTime) return null;
      return transformPoint(atTime.clone().multiply(currentInverse), display);
    },
  };
}
