import { describe, expect, it } from "vitest";
import { PathProjector } from "../projection/pathProjector.js";
import { makeEntity, pathChannels, ScreenPlaneViewport } from "../testing/fakes.js";
import { pickKeyframe, pickTangentHandle } from "./picking.js";

const projector = new PathProjector(new ScreenPlaneViewport());

const row = () =>
  makeEntity({
    channels: pathChannels([
      [0, { x: 0, y: 0, z: 0 }],
      [10, { x: 10, y: 0, z: 0 }],
      [20, { x: 20, y: 0, z: 0 }],
    ]),
  });

describe("pickKeyframe", () => {
  it("returns the nearest key within the radius", () => {
    const entity = row();

    expect(pickKeyframe(entity, projector, { x: 11, y: 1 })).toBe(10);
    expect(pickKeyframe(entity, projector, { x: 19, y: -3 })).toBe(20);
  });

  it("keeps the earlier key on a tie", () => {
    expect(pickKeyframe(row(), projector, { x: 15, y: 0 })).toBe(10);
  });

  it("misses outside the radius", () => {
    const entity = row();

    expect(pickKeyframe(entity, projector, { x: 40, y: 0 })).toBeNull();
    expect(pickKeyframe(entity, projector, { x: 15, y: 0 }, 4)).toBeNull();
  });
});

describe("pickTangentHandle", () => {
  it("finds the side of the handle under the pointer", () => {
    expect(pickTangentHandle(row(), projector, { x: 11.2, y: 0 })).toEqual({ time: 10, side: "out" });
    expect(pickTangentHandle(row(), projector, { x: 8.8, y: 0 })).toEqual({ time: 10, side: "in" });
  });

  it("ignores hidden handles", () => {
    const entity = row();
    entity.setDrawingEnd(20);

    expect(pickTangentHandle(entity, projector, { x: 11.2, y: 0 })).toBeNull();
  });
});
