import { describe, expect, it, vi } from "vitest";
import * as THREE from "three";
import { keyTimes, type AnimCurve, type Logger } from "@keytrail/engine";
import { CameraCache, cameraSpaceBridge } from "../projection/cameraSpace.js";
import { PathProjector } from "../projection/pathProjector.js";
import { keyedChannels, makeEntity, pathChannels, ScreenPlaneViewport } from "../testing/fakes.js";
import { freehandSpacing, planFreehand, previewSamplePoints, synthesizeFreehand } from "./freehand.js";

const projector = new PathProjector(new ScreenPlaneViewport());
const timesOf = (curve: AnimCurve | undefined) => (curve ? keyTimes(curve) : []);
const valuesOf = (curve: AnimCurve | undefined) => {
  const values: number[] = [];
  for (let i = 0; i < (curve?.numKeys() ?? 0); i++) values.push(curve?.valueOf(i) ?? Number.NaN);
  return values;
};

// Ten points starting on the anchor at (5, 0).
const stroke = Array.from({ length: 10 }, (_, i) => ({ x: 5 + i, y: 2 * i }));

function recordingLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function anchoredChannels() {
  return {
    ...pathChannels([
      [0, { x: 0, y: 0, z: 0 }],
      [5, { x: 5, y: 0, z: 0 }],
      [7, { x: 7, y: 0, z: 0 }],
    ]),
    ...keyedChannels({ rotateX: [[0, 0], [7, 90]] }),
  };
}

describe("planFreehand", () => {
  it("samples stroke points 3, 5 and 7 for three keys one frame apart", () => {
    const entity = makeEntity({ channels: anchoredChannels() });

    const plan = planFreehand({ entity, projector, anchorTime: 5, points: stroke, count: 3, spacing: 1 });

    expect(plan?.end).toBe(8);
    expect(plan?.samples.map((sample) => [sample.time, sample.pointIndex])).toEqual([
      [6, 3],
      [7, 5],
      [8, 7],
    ]);
    expect(plan?.samples.map((sample) => sample.world)).toEqual([
      { x: 8, y: 6, z: 0 },
      { x: 10, y: 10, z: 0 },
      { x: 12, y: 14, z: 0 },
    ]);
  });

  it("falls back to one frame for non-positive spacing", () => {
    const logger = recordingLogger();

    expect(freehandSpacing(0, logger)).toBe(1);
    expect(freehandSpacing(-2, logger)).toBe(1);
    expect(freehandSpacing(3, logger)).toBe(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("refuses a stroke with fewer than two points", () => {
    const channels = anchoredChannels();
    const entity = makeEntity({ channels });
    const logger = recordingLogger();

    const outcome = synthesizeFreehand({
      entity,
      projector,
      anchorTime: 5,
      points: [{ x: 5, y: 0 }],
      count: 3,
      spacing: 1,
      logger,
    });

    expect(outcome).toEqual({ ok: false, reason: "stroke-too-short" });
    expect(timesOf(channels.translateX)).toEqual([0, 5, 7]);
    expect(logger.warn).toHaveBeenCalledWith("Stroke too short to place keys", { points: 1 });
  });
});

describe("synthesizeFreehand", () => {
  it("replaces keys after the anchor with the sampled run", () => {
    const channels = anchoredChannels();
    const entity = makeEntity({ channels });

    const outcome = synthesizeFreehand({ entity, projector, anchorTime: 5, points: stroke, count: 3, spacing: 1 });

    expect(outcome.ok).toBe(true);
    expect(timesOf(channels.translateX)).toEqual([0, 5, 6, 7, 8]);
    expect(valuesOf(channels.translateX)).toEqual([0, 5, 8, 10, 12]);
    expect(valuesOf(channels.translateY)).toEqual([0, 0, 6, 10, 14]);
    expect(timesOf(channels.rotateX)).toEqual([0]);

    if (outcome.ok) outcome.transaction.rollback();
    expect(timesOf(channels.translateX)).toEqual([0, 5, 7]);
    expect(timesOf(channels.rotateX)).toEqual([0, 7]);
  });

  it("skips only the samples whose camera frame is missing", () => {
    const channels = anchoredChannels();
    const entity = makeEntity({ channels });
    const cameras = new CameraCache();
    for (let time = 0; time <= 10; time++) {
      if (time !== 7) cameras.set(time, new THREE.Matrix4());
    }
    entity.setDisplayBridge(cameraSpaceBridge(cameras, new THREE.Matrix4()));

    const outcome = synthesizeFreehand({ entity, projector, anchorTime: 5, points: stroke, count: 3, spacing: 1 });

    expect(outcome.ok).toBe(true);
    expect(timesOf(channels.translateX)).toEqual([0, 5, 6, 8]);
    expect(valuesOf(channels.translateX)).toEqual([0, 5, 8, 12]);
  });
});

describe("previewSamplePoints", () => {
  it("returns the points the synthesized keys would take", () => {
    expect(previewSamplePoints(stroke, 3)).toEqual([
      { x: 8, y: 6 },
      { x: 10, y: 10 },
      { x: 12, y: 14 },
    ]);
    expect(previewSamplePoints([{ x: 0, y: 0 }], 3)).toEqual([]);
  });
});
