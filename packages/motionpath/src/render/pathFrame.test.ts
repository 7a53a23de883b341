import { describe, expect, it } from "vitest";
import * as THREE from "three";
import { createSettings, type MotionPathSettingsInput } from "@keytrail/engine";
import { CameraCache, cameraSpaceBridge } from "../projection/cameraSpace.js";
import { createEntityRegistry } from "../state/entityRegistry.js";
import { keyedChannels, makeEntity, pathChannels, RecordingSink } from "../testing/fakes.js";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import { buildPathFrame, formatFrame, renderPathFrame, renderStrokePreview, scaleColor } from "./pathFrame.js";

const row = () =>
  pathChannels([
    [0, { x: 0, y: 0, z: 0 }],
    [10, { x: 10, y: 0, z: 0 }],
    [20, { x: 20, y: 0, z: 0 }],
  ]);

function passFor(entity: TrackedEntity, overrides: MotionPathSettingsInput, currentTime = 10) {
  const registry = createEntityRegistry(
    createSettings({
      playbackStart: 0,
      playbackEnd: 100,
      framesBack: 100,
      framesFront: 100,
      frameSize: 4,
      pathSize: 2,
      showTangents: false,
      ...overrides,
    }),
    { currentTime },
  );
  registry.add(entity);
  return registry.beginPass(entity.id);
}

describe("buildPathFrame", () => {
  it("samples the path over the window and marks the current frame", () => {
    const entity = makeEntity({ channels: row() });
    const snapshot = passFor(entity, { drawTimeInterval: 5 });

    const frame = buildPathFrame(entity, snapshot);

    expect(snapshot.window).toEqual({ start: 0, end: 20 });
    expect(frame.path).toHaveLength(1);
    expect(frame.path[0].points).toHaveLength(5);
    expect(frame.path[0].points[0]).toEqual({ x: 0, y: 0, z: 0 });
    expect(frame.path[0].points[4]).toEqual({ x: 20, y: 0, z: 0 });
    expect(frame.path[0].style).toEqual({ color: snapshot.settings.pathColor, size: 2 });
    expect(frame.currentFrame?.position).toEqual({ x: 10, y: 0, z: 0 });
    expect(frame.currentFrame?.style.size).toBeCloseTo(8.8);
  });

  it("splits the path where the camera frame is missing", () => {
    const entity = makeEntity({ channels: row() });
    const cameras = new CameraCache();
    for (let time = 0; time <= 20; time++) {
      if (time !== 10) cameras.set(time, new THREE.Matrix4());
    }
    const registry = createEntityRegistry(
      createSettings({ playbackStart: 0, playbackEnd: 100, framesBack: 100, framesFront: 100, drawTimeInterval: 5 }),
      { currentTime: 10 },
    );
    registry.add(entity);
    registry.setDisplayBridge(cameraSpaceBridge(cameras, new THREE.Matrix4()));

    const frame = buildPathFrame(entity, registry.beginPass(entity.id));

    expect(frame.path.map((line) => line.points.length)).toEqual([2, 2]);
    expect(frame.currentFrame).toBeNull();
    expect(frame.keys.map((key) => key.time)).toEqual([0, 20]);
  });

  it("retakes a pass whose window changed before the frame was built", () => {
    const entity = makeEntity({
      channels: pathChannels([
        [0, { x: 0, y: 0, z: 0 }],
        [10, { x: 10, y: 0, z: 0 }],
        [20, { x: 20, y: 0, z: 0 }],
        [30, { x: 30, y: 0, z: 0 }],
      ]),
    });
    const snapshot = passFor(entity, { drawTimeInterval: 5 });
    expect(snapshot.window).toEqual({ start: 0, end: 30 });

    entity.setDisplayTimeRange(20, 30);
    const frame = buildPathFrame(entity, snapshot);

    expect(frame.generation).toBe(entity.keyframes().generation);
    expect(frame.generation).not.toBe(snapshot.generation);
    expect(frame.path[0].points).toHaveLength(3);
    expect(frame.path[0].points[0]).toEqual({ x: 20, y: 0, z: 0 });
    expect(frame.path[0].points[2]).toEqual({ x: 30, y: 0, z: 0 });
    expect(frame.keys.map((key) => key.time)).toEqual([20, 30]);
  });

  it("alternates segment brightness by frame parity", () => {
    const entity = makeEntity({ channels: row() });
    const snapshot = passFor(entity, {
      framesBack: 1,
      framesFront: 1,
      alternatingFrames: true,
      pathColor: { r: 0.5, g: 0.5, b: 0.5 },
    });

    const frame = buildPathFrame(entity, snapshot);

    expect(frame.path).toHaveLength(2);
    expect(frame.path[0].points).toHaveLength(2);
    expect(frame.path[0].style.color.r).toBeCloseTo(0.7);
    expect(frame.path[1].style.color.r).toBeCloseTo(0.3);
  });

  it("colors keys by their keyed axes", () => {
    const entity = makeEntity({
      channels: keyedChannels({
        translateX: [
          [0, 0],
          [10, 10],
        ],
        translateY: [[0, 0]],
        rotateZ: [[5, 30]],
      }),
    });
    entity.selectAt(10);
    const snapshot = passFor(entity, {});

    const keys = buildPathFrame(entity, snapshot).keys;

    expect(keys.map((key) => [key.time, key.selected])).toEqual([
      [0, false],
      [5, false],
      [10, true],
    ]);
    expect(keys[0].slices).toEqual([
      { r: 1, g: 0, b: 0, a: 1 },
      { r: 0, g: 1, b: 0, a: 1 },
    ]);
    expect(keys[1].slices).toEqual([{ r: 0, g: 0, b: 1, a: 1 }]);
    expect(keys[0].size).toBe(6);
    expect(keys[2].size).toBeCloseTo(7.2);
  });

  it("drops rotation-only markers when rotation keys are hidden", () => {
    const entity = makeEntity({
      channels: keyedChannels({ translateX: [[0, 0], [10, 10]], rotateZ: [[5, 30]] }),
    });
    const snapshot = passFor(entity, { showRotationKeyframes: false });

    expect(buildPathFrame(entity, snapshot).keys.map((key) => key.time)).toEqual([0, 10]);
  });

  it("brightens a highlighted path", () => {
    const entity = makeEntity({ channels: row() });
    const snapshot = passFor(entity, {});

    const color = buildPathFrame(entity, snapshot, { highlighted: true }).path[0].style.color;

    expect(color.r).toBe(0);
    expect(color.g).toBeCloseTo(0.78);
    expect(color.b).toBe(1);
  });

  it("draws the visible tangent handles with the locked color", () => {
    const entity = makeEntity({ channels: row() });
    const snapshot = passFor(entity, { showTangents: true });

    const frame = buildPathFrame(entity, snapshot);

    expect(frame.tangents).toHaveLength(4);
    expect(frame.handles).toHaveLength(4);
    expect(frame.tangents[0].points[0]).toEqual({ x: 0, y: 0, z: 0 });
    expect(frame.tangents[0].style).toEqual({ color: snapshot.settings.tangentColor, size: 1 });
    expect(frame.handles[0].style.size).toBe(4);
  });

  it("labels keys and skips frame numbers that already carry one", () => {
    const entity = makeEntity({ channels: row() });
    const snapshot = passFor(entity, { showKeyframeNumbers: true, showFrameNumbers: true, drawFrameInterval: 5 });

    const labels = buildPathFrame(entity, snapshot).labels;

    expect(labels.map((label) => label.text)).toEqual(["0", "10", "20", "5", "15"]);
    expect(labels[0].style.size).toBe(14);
    expect(labels[3].style.size).toBe(11);
  });

  it("keeps every frame number when keys are hidden", () => {
    const entity = makeEntity({ channels: row() });
    const snapshot = passFor(entity, {
      showKeyframes: false,
      showKeyframeNumbers: true,
      showFrameNumbers: true,
      drawFrameInterval: 5,
    });

    const frame = buildPathFrame(entity, snapshot);

    expect(frame.keys).toEqual([]);
    expect(frame.labels.map((label) => label.text)).toEqual(["0", "10", "20", "0", "5", "10", "15", "20"]);
  });
});

describe("renderPathFrame", () => {
  it("draws keys last, backgrounds before markers", () => {
    const entity = makeEntity({ channels: row() });
    entity.selectAt(20);
    const sink = new RecordingSink();

    renderPathFrame(buildPathFrame(entity, passFor(entity, {})), sink);

    expect(sink.calls.map((call) => call.kind)).toEqual([
      "line",
      "point",
      "point",
      "point",
      "point",
      "marker",
      "marker",
      "point",
      "point",
      "marker",
    ]);
    const backgrounds = sink.ofKind("point").slice(1, 4);
    expect(backgrounds.map((call) => call.style.color)).toEqual([
      { r: 0, g: 0, b: 0, a: 1 },
      { r: 0, g: 0, b: 0, a: 1 },
      { r: 0, g: 0, b: 0, a: 1 },
    ]);
    expect(backgrounds[0].style.size).toBeCloseTo(7.2);
    expect(sink.ofKind("marker")[2].slices).toEqual([{ r: 1, g: 1, b: 1, a: 1 }]);
  });
});

describe("renderStrokePreview", () => {
  const settings = createSettings();
  const points = [
    { x: 0, y: 0 },
    { x: 5, y: 0 },
  ];

  it("outlines a reshaping stroke", () => {
    const sink = new RecordingSink();

    renderStrokePreview({ kind: "remap", points, keys: [] }, settings, sink);

    expect(sink.ofKind("screenLine").map((call) => call.style.size)).toEqual([4, 2]);
  });

  it("marks where freehand keys would land", () => {
    const sink = new RecordingSink();

    renderStrokePreview({ kind: "freehand", points, keys: [{ x: 5, y: 0 }] }, settings, sink);

    expect(sink.ofKind("screenLine")[0].style).toEqual({ color: settings.previewPathColor, size: 3 });
    expect(sink.ofKind("screenCircle").map((call) => [call.radius, call.style.size])).toEqual([
      [8, 0],
      [9, 1],
    ]);
  });

  it("ignores a single point", () => {
    const sink = new RecordingSink();

    renderStrokePreview({ kind: "freehand", points: [{ x: 0, y: 0 }], keys: [] }, settings, sink);

    expect(sink.calls).toEqual([]);
  });
});

describe("color helpers", () => {
  it("clamps scaled channels and keeps alpha", () => {
    expect(scaleColor({ r: 0.8, g: 0.5, b: 0, a: 0.4 }, 2)).toEqual({ r: 1, g: 1, b: 0, a: 0.4 });
  });

  it("prints whole frames without a fraction", () => {
    expect(formatFrame(12)).toBe("12");
    expect(formatFrame(12.5)).toBe("12.50");
  });
});
