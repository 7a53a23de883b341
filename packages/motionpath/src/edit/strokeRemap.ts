import type { MotionPathSettings, Vec2, Vec3, WalkDirection } from "@keytrail/engine";
import {
  TRANSLATE_CHANNELS,
  closestPointOnPolyline,
  collectStrokeRun,
  meanStrokeDirection,
  nearestScreenPosition,
  resolveWalkDirection,
  sameTime,
  spreadPointsOnPolyline,
} from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import type { PathProjector } from "../projection/pathProjector.js";
import { CurveTransaction, type EditOutcome } from "./transaction.js";

export type StrokeMode = MotionPathSettings["strokeMode"];

export interface RemapTarget {
  time: number;
  originalScreen: Vec2;
  screen: Vec2;
  /** New world position; null when the display-space conversion failed. */
  world: Vec3 | null;
}

export interface StrokeRemapPlan {
  anchorTime: number;
  direction: WalkDirection;
  targets: RemapTarget[];
}

export interface StrokeRemapInput {
  entity: TrackedEntity;
  projector: PathProjector;
  anchorTime: number;
  points: readonly Vec2[];
  mode: StrokeMode;
  maxWorseSteps: number;
}

function screenOf(projector: PathProjector, display: Vec3 | null): Vec2 | null {
  return display ? projector.worldToScreen(display) : null;
}

/**
 * Work out where a run of existing keys goes after a stroke from the
 * anchor key. Nothing is written; null means no run was found.
 */
export function planStrokeRemap(input: StrokeRemapInput): StrokeRemapPlan | null {
  const { entity, projector, points } = input;
  if (points.length < 2) return null;

  const direction = meanStrokeDirection(points);
  if (!direction) return null;

  // Rotation-only keys carry no translation to reshape.
  const records = entity.keyframes().records.filter((record) => !record.rotationOnly);
  const anchorIndex = records.findIndex((record) => sameTime(record.time, input.anchorTime));
  if (anchorIndex < 0) return null;

  const displays = records.map((record) => record.displayPosition);
  const screens = displays.map((display) => screenOf(projector, display));
  const anchorScreen = screens[anchorIndex];
  if (!anchorScreen) return null;

  // Neighbours without a screen position are passed over, not treated as the end.
  const walk = resolveWalkDirection(
    direction,
    anchorScreen,
    nearestScreenPosition(screens, anchorIndex, -1),
    nearestScreenPosition(screens, anchorIndex, 1),
  );
  if (walk === 0) return null;

  const run = collectStrokeRun({
    screenPositions: screens,
    anchorIndex,
    direction: walk,
    target: points[points.length - 1],
    maxWorseSteps: input.maxWorseSteps,
  });
  if (run.length === 0) return null;

  const spread = input.mode === "spread" ? spreadPointsOnPolyline(points, run.length) : [];
  const bridge = entity.displayBridge();
  const targets: RemapTarget[] = [];
  run.forEach((index, order) => {
    const record = records[index];
    const originalScreen = screens[index];
    const display = displays[index];
    if (!originalScreen || !display) return;

    const screen =
      input.mode === "spread" ? spread[order] : closestPointOnPolyline(points, originalScreen)?.point;
    if (!screen) return;

    const movedDisplay = projector.screenToWorld(display, originalScreen, screen);
    const world = movedDisplay ? bridge.toWorld(movedDisplay, record.time) : null;
    targets.push({ time: record.time, originalScreen, screen, world });
  });

  return { anchorTime: input.anchorTime, direction: walk, targets };
}

/**
 * Re-key every resolved target: its translation keys are removed first so
 * tangents are recomputed, then added back at the new position. Targets
 * whose conversion failed keep their keys.
 */
export function applyStrokeRemap(entity: TrackedEntity, plan: StrokeRemapPlan, tx: CurveTransaction): number {
  const resolved = plan.targets.filter((target): target is RemapTarget & { world: Vec3 } => target.world !== null);
  for (let i = resolved.length - 1; i >= 0; i--) {
    entity.deleteKeyAtTime(resolved[i].time, tx, TRANSLATE_CHANNELS);
  }
  let written = 0;
  for (const target of resolved) {
    if (entity.addKeyAtTime(target.time, target.world, tx)) written += 1;
  }
  return written;
}

export function remapStroke(input: StrokeRemapInput, label = "Stroke Remap"): EditOutcome {
  const plan = planStrokeRemap(input);
  if (!plan) return { ok: false, reason: "no-run" };
  if (!plan.targets.some((target) => target.world !== null)) return { ok: false, reason: "no-resolved-targets" };

  const tx = new CurveTransaction(label);
  applyStrokeRemap(input.entity, plan, tx);
  return { ok: true, transaction: tx };
}
