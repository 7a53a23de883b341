import type { Logger, Vec2, Vec3 } from "@keytrail/engine";
import { freehandSampleIndex, silentLogger } from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import type { PathProjector } from "../projection/pathProjector.js";
import { CurveTransaction, type EditOutcome } from "./transaction.js";

export interface FreehandSample {
  time: number;
  pointIndex: number;
  screen: Vec2;
  /** Null when the display-space conversion failed for this time. */
  world: Vec3 | null;
}

export interface FreehandPlan {
  anchorTime: number;
  spacing: number;
  /** Last time the synthesized run covers. */
  end: number;
  samples: FreehandSample[];
}

export interface FreehandInput {
  entity: TrackedEntity;
  projector: PathProjector;
  anchorTime: number;
  points: readonly Vec2[];
  count: number;
  spacing: number;
  logger?: Logger;
}

export function freehandSpacing(spacing: number, logger: Logger = silentLogger): number {
  if (spacing > 0) return spacing;
  logger.warn("Frame spacing must be positive, using 1", { spacing });
  return 1;
}

/** Screen points sampled for `count` new keys, skipping the stroke start. */
export function previewSamplePoints(points: readonly Vec2[], count: number): Vec2[] {
  if (points.length < 2) return [];
  const samples: Vec2[] = [];
  for (let i = 0; i < count; i++) {
    samples.push(points[freehandSampleIndex(i, count, points.length)]);
  }
  return samples;
}

/**
 * Place `count` new keys after the anchor, `spacing` frames apart, on the
 * drawn stroke. Each sample keeps the anchor's depth. Null when the stroke
 * is too short or the anchor has no display position.
 */
export function planFreehand(input: FreehandInput): FreehandPlan | null {
  const logger = input.logger ?? silentLogger;
  const { entity, projector, points } = input;
  if (points.length < 2) {
    logger.warn("Stroke too short to place keys", { points: points.length });
    return null;
  }
  if (input.count < 1) return null;

  const spacing = freehandSpacing(input.spacing, logger);
  const anchorDisplay = entity.displayPositionAt(input.anchorTime, true);
  if (!anchorDisplay) return null;

  const bridge = entity.displayBridge();
  const samples: FreehandSample[] = [];
  for (let i = 0; i < input.count; i++) {
    const pointIndex = freehandSampleIndex(i, input.count, points.length);
    const time = input.anchorTime + (i + 1) * spacing;
    const display = projector.screenToWorld(anchorDisplay, points[0], points[pointIndex]);
    samples.push({
      time,
      pointIndex,
      screen: { ...points[pointIndex] },
      world: display ? bridge.toWorld(display, time) : null,
    });
  }

  return {
    anchorTime: input.anchorTime,
    spacing,
    end: input.anchorTime + input.count * spacing,
    samples,
  };
}

/** Clear `(anchor, end]` on every channel, then key each resolved sample. */
export function applyFreehand(entity: TrackedEntity, plan: FreehandPlan, tx: CurveTransaction): number {
  entity.deleteKeysInRange(plan.anchorTime, plan.end, tx);
  let written = 0;
  for (const sample of plan.samples) {
    if (sample.world && entity.addKeyAtTime(sample.time, sample.world, tx)) written += 1;
  }
  return written;
}

export function synthesizeFreehand(input: FreehandInput, label = "Freehand Keys"): EditOutcome {
  const plan = planFreehand(input);
  if (!plan) return { ok: false, reason: input.points.length < 2 ? "stroke-too-short" : "no-anchor" };
  if (!plan.samples.some((sample) => sample.world !== null)) return { ok: false, reason: "no-resolved-samples" };

  const tx = new CurveTransaction(label);
  applyFreehand(input.entity, plan, tx);
  return { ok: true, transaction: tx };
}
