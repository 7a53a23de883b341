import type { TangentSide, Vec2, Vec3 } from "@keytrail/engine";
import { distance2 } from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import type { PathProjector } from "../projection/pathProjector.js";

export const DEFAULT_PICK_RADIUS = 8;

export interface TangentPick {
  time: number;
  side: TangentSide;
}

function within(projector: PathProjector, point: Vec3 | null, screen: Vec2, radius: number): number | null {
  if (!point) return null;
  const projected = projector.worldToScreen(point);
  if (!projected) return null;
  const distance = distance2(projected, screen);
  return distance <= radius ? distance : null;
}

/** Time of the keyframe drawn nearest to `screen`, if any lies within `radius` pixels. */
export function pickKeyframe(
  entity: TrackedEntity,
  projector: PathProjector,
  screen: Vec2,
  radius = DEFAULT_PICK_RADIUS,
): number | null {
  let best: { time: number; distance: number } | null = null;
  for (const record of entity.keyframes().records) {
    const distance = within(projector, record.displayPosition, screen, radius);
    if (distance !== null && (!best || distance < best.distance)) {
      best = { time: record.time, distance };
    }
  }
  return best ? best.time : null;
}

/** Nearest visible tangent handle within `radius` pixels. */
export function pickTangentHandle(
  entity: TrackedEntity,
  projector: PathProjector,
  screen: Vec2,
  radius = DEFAULT_PICK_RADIUS,
): TangentPick | null {
  let best: (TangentPick & { distance: number }) | null = null;
  for (const record of entity.keyframes().records) {
    const candidates: [TangentSide, Vec3 | null][] = [
      ["in", record.showInTangent ? record.inTangentHandle : null],
      ["out", record.showOutTangent ? record.outTangentHandle : null],
    ];
    for (const [side, handle] of candidates) {
      const distance = within(projector, handle, screen, radius);
      if (distance !== null && (!best || distance < best.distance)) {
        best = { time: record.time, side, distance };
      }
    }
  }
  return best ? { time: best.time, side: best.side } : null;
}
