import * as THREE from "three";
import type { Ray, Vec2, Vec3 } from "@keytrail/engine";
import { fromVector3, toVector3 } from "../math/matrix.js";

/**
 * Camera and screen collaborator. Screen coordinates are pixels with the
 * origin at the top-left corner, as in DOM pointer events.
 */
export interface Viewport {
  worldToScreen(point: Vec3): Vec2 | null;
  screenToWorldRay(x: number, y: number): Ray | null;
  cameraWorldMatrix(): THREE.Matrix4;
}

export interface ViewportSize {
  width: number;
  height: number;
}

const pointer = new THREE.Vector2();
const raycaster = new THREE.Raycaster();

/** Forward (-Z) axis of a camera world matrix. */
export function viewDirectionOf(cameraWorld: THREE.Matrix4): Vec3 {
  const forward = new THREE.Vector3();
  cameraWorld.extractBasis(new THREE.Vector3(), new THREE.Vector3(), forward);
  return fromVector3(forward.negate().normalize());
}

export class PerspectiveViewport implements Viewport {
  private readonly camera: THREE.PerspectiveCamera | THREE.OrthographicCamera;
  private size: ViewportSize;

  constructor(camera: THREE.PerspectiveCamera | THREE.OrthographicCamera, size: ViewportSize) {
    this.camera = camera;
    this.size = { ...size };
  }

  setSize(size: ViewportSize): void {
    this.size = { ...size };
  }

  worldToScreen(point: Vec3): Vec2 | null {
    this.camera.updateMatrixWorld();
    const ndc = toVector3(point).project(this.camera);
    if (!Number.isFinite(ndc.x) || !Number.isFinite(ndc.y) || ndc.z > 1) {
      return null;
    }
    return {
      x: ((ndc.x + 1) / 2) * this.size.width,
      y: ((1 - ndc.y) / 2) * this.size.height,
    };
  }

  screenToWorldRay(x: number, y: number): Ray | null {
    if (this.size.width <= 0 || this.size.height <= 0) {
      return null;
    }
    this.camera.updateMatrixWorld();
    pointer.x = (x / this.size.width) * 2 - 1;
    pointer.y = -(y / this.size.height) * 2 + 1;
    raycaster.setFromCamera(pointer, this.camera);
    return {
      origin: fromVector3(raycaster.ray.origin),
      direction: fromVector3(raycaster.ray.direction),
    };
  }

  cameraWorldMatrix(): THREE.Matrix4 {
    this.camera.updateMatrixWorld();
    return this.camera.matrixWorld.clone();
  }
}
