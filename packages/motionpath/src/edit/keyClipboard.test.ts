import { describe, expect, it } from "vitest";
import { keyTimes, type AnimCurve } from "@keytrail/engine";
import { keyedChannels, makeEntity, pathChannels } from "../testing/fakes.js";
import { KeyClipboard } from "./keyClipboard.js";

const timesOf = (curve: AnimCurve | undefined) => (curve ? keyTimes(curve) : []);
const valuesOf = (curve: AnimCurve | undefined) => {
  const values: number[] = [];
  for (let i = 0; i < (curve?.numKeys() ?? 0); i++) values.push(curve?.valueOf(i) ?? Number.NaN);
  return values;
};

function source() {
  const entity = makeEntity({
    id: "source",
    channels: pathChannels([
      [0, { x: 0, y: 0, z: 0 }],
      [10, { x: 10, y: 0, z: 0 }],
      [20, { x: 20, y: 0, z: 0 }],
    ]),
  });
  entity.selectAt(10);
  entity.selectAt(20);
  return entity;
}

function destination() {
  const channels = pathChannels([
    [0, { x: 0, y: 0, z: 0 }],
    [40, { x: 5, y: 5, z: 0 }],
    [50, { x: 7, y: 7, z: 0 }],
    [60, { x: 9, y: 9, z: 0 }],
  ]);
  return { channels, entity: makeEntity({ id: "target", channels }) };
}

describe("KeyClipboard", () => {
  it("copies selected keys relative to the first", () => {
    const clipboard = new KeyClipboard();

    expect(clipboard.copy(source())).toBe(2);
    expect(clipboard.entries().map((key) => [key.offset, key.world])).toEqual([
      [0, { x: 10, y: 0, z: 0 }],
      [10, { x: 20, y: 0, z: 0 }],
    ]);
  });

  it("pastes at a time after clearing the span it covers", () => {
    const clipboard = new KeyClipboard();
    clipboard.copy(source());
    const { channels, entity } = destination();

    const outcome = clipboard.paste(entity, 40);

    expect(outcome.ok).toBe(true);
    expect(timesOf(channels.translateX)).toEqual([0, 40, 50, 60]);
    expect(valuesOf(channels.translateX)).toEqual([0, 10, 20, 9]);
    expect(valuesOf(channels.translateY)).toEqual([0, 0, 0, 9]);

    if (outcome.ok) outcome.transaction.rollback();
    expect(valuesOf(channels.translateX)).toEqual([0, 5, 7, 9]);
  });

  it("moves the run onto the current position when offsetting", () => {
    const clipboard = new KeyClipboard();
    clipboard.copy(source());
    const { channels, entity } = destination();

    clipboard.paste(entity, 40, { offset: true });

    expect(valuesOf(channels.translateX)).toEqual([0, 5, 15, 9]);
    expect(valuesOf(channels.translateY)).toEqual([0, 5, 5, 9]);
  });

  it("keys inner keys only on the axes they were copied from", () => {
    const from = makeEntity({
      channels: keyedChannels({
        translateX: [
          [0, 0],
          [5, 5],
          [10, 10],
        ],
        translateY: [
          [0, 0],
          [10, 0],
        ],
        translateZ: [
          [0, 0],
          [10, 0],
        ],
      }),
    });
    from.selectAll();
    const channels = pathChannels([[0, { x: 0, y: 0, z: 0 }]]);
    const to = makeEntity({ id: "target", channels });
    const clipboard = new KeyClipboard();
    clipboard.copy(from);

    clipboard.paste(to, 20);

    expect(timesOf(channels.translateX)).toEqual([0, 20, 25, 30]);
    expect(timesOf(channels.translateY)).toEqual([0, 20, 30]);
    expect(channels.translateX?.valueOf(2)).toBe(5);
  });

  it("reports an empty clipboard", () => {
    const clipboard = new KeyClipboard();
    const entity = makeEntity({ channels: pathChannels([[0, { x: 0, y: 0, z: 0 }]]) });

    expect(clipboard.copy(entity)).toBe(0);
    expect(clipboard.paste(entity, 5)).toEqual({ ok: false, reason: "empty-clipboard" });
  });
});
