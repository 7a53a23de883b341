import type { Vec2, Vec3 } from "@keytrail/engine";
import { dragPointOnViewPlane, sub3 } from "@keytrail/engine";
import { viewDirectionOf, type Viewport } from "./viewport.js";

/**
 * World/screen conversions for drawing and editing. Screen drags are turned
 * back into world positions on the plane through the dragged point that
 * faces the camera, so the point keeps its depth.
 */
export class PathProjector {
  readonly viewport: Viewport;

  constructor(viewport: Viewport) {
    this.viewport = viewport;
  }

  worldToScreen(point: Vec3): Vec2 | null {
    return this.viewport.worldToScreen(point);
  }

  viewDirection(): Vec3 {
    return viewDirectionOf(this.viewport.cameraWorldMatrix());
  }

  screenToWorld(originalWorld: Vec3, originalScreen: Vec2, newScreen: Vec2): Vec3 | null {
    const startRay = this.viewport.screenToWorldRay(originalScreen.x, originalScreen.y);
    const currentRay = this.viewport.screenToWorldRay(newScreen.x, newScreen.y);
    if (!startRay || !currentRay) {
      return null;
    }
    return dragPointOnViewPlane(originalWorld, this.viewDirection(), startRay, currentRay);
  }

  screenDeltaToWorldDelta(originalWorld: Vec3, originalScreen: Vec2, newScreen: Vec2): Vec3 | null {
    const moved = this.screenToWorld(originalWorld, originalScreen, newScreen);
    return moved ? sub3(moved, originalWorld) : null;
  }
}
