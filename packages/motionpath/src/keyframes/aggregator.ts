import type * as THREE from "three";
import type { Axis, ChannelSet, DisplayWindow, Vec3 } from "@keytrail/engine";
import { AXES, hasTranslationKeys, rotateChannelFor, sameTime, translateChannelFor } from "@keytrail/engine";
import { transformPoint } from "../math/matrix.js";
import type { DisplaySpaceBridge } from "../projection/cameraSpace.js";
import { curveTangentHandle, rawTangentHandle, resolveTangentComponent } from "./tangentHandles.js";

export type AxisKeys = Record<Axis, number | null>;

/** Aggregated state of every channel keyed at one time. */
export interface KeyframeRecord {
  /** Position in time order within its window. */
  id: number;
  time: number;
  localPosition: Vec3;
  worldPosition: Vec3;
  /** Position in the active display space; null when the camera conversion failed. */
  displayPosition: Vec3 | null;
  /** Stored local tangent components. */
  inTangent: Vec3;
  outTangent: Vec3;
  /** Stored tangents transformed directly into world space. */
  inTangentWorld: Vec3;
  outTangentWorld: Vec3;
  /** Handles as drawn, in display space. Null when hidden or unavailable. */
  inTangentHandle: Vec3 | null;
  outTangentHandle: Vec3 | null;
  translationKeys: AxisKeys;
  rotationKeys: AxisKeys;
  rotationOnly: boolean;
  selected: boolean;
  tangentsLocked: boolean;
  showInTangent: boolean;
  showOutTangent: boolean;
}

/** Records of one aggregation pass. Rebuilt wholesale, never patched. */
export class KeyframeWindow {
  readonly generation: number;
  readonly records: readonly KeyframeRecord[];

  constructor(generation: number, records: KeyframeRecord[]) {
    this.generation = generation;
    this.records = records;
  }

  static empty(generation: number): KeyframeWindow {
    return new KeyframeWindow(generation, []);
  }

  get size(): number {
    return this.records.length;
  }

  at(id: number): KeyframeRecord | undefined {
    return this.records[id];
  }

  indexOf(time: number): number | null {
    const index = this.records.findIndex((record) => sameTime(record.time, time));
    return index >= 0 ? index : null;
  }

  recordAt(time: number): KeyframeRecord | undefined {
    const index = this.indexOf(time);
    return index === null ? undefined : this.records[index];
  }

  times(): number[] {
    return this.records.map((record) => record.time);
  }
}

/** Entity data the aggregator reads. */
export interface KeyframeSource {
  readonly channels: ChannelSet;
  isWeighted(): boolean;
  parentMatrixAt(time: number): THREE.Matrix4;
  /** Local translation; `direct` bypasses the position cache. */
  localPositionAt(time: number, direct: boolean): Vec3;
}

export interface AggregateOptions {
  window: DisplayWindow;
  /** End of the freehand draw in progress; null when not drawing. */
  drawingEnd: number | null;
  includeRotation: boolean;
  selectedTimes: readonly number[];
  bridge: DisplaySpaceBridge;
  tangentTimeDelta: number;
  generation: number;
}

interface Draft {
  time: number;
  translationKeys: AxisKeys;
  rotationKeys: AxisKeys;
  inTangent: Record<Axis, number>;
  outTangent: Record<Axis, number>;
  tangentsLocked: boolean;
}

function emptyKeys(): AxisKeys {
  return { x: null, y: null, z: null };
}

function draftAt(drafts: Map<number, Draft>, time: number): Draft {
  let draft = drafts.get(time);
  if (!draft) {
    draft = {
      time,
      translationKeys: emptyKeys(),
      rotationKeys: emptyKeys(),
      inTangent: { x: 0, y: 0, z: 0 },
      outTangent: { x: 0, y: 0, z: 0 },
      tangentsLocked: true,
    };
    drafts.set(time, draft);
  }
  return draft;
}

function otherAxes(axis: Axis): [Axis, Axis] {
  if (axis === "x") return ["y", "z"];
  if (axis === "y") return ["x", "z"];
  return ["x", "y"];
}

/**
 * Tangent visibility at the first (in) or last (out) key of each
 * translation channel: hidden when the other two axes have no key there, or
 * when they also start (or end) at that time.
 */
function applyEndTangentVisibility(
  source: KeyframeSource,
  drafts: Map<number, Draft>,
  window: DisplayWindow,
  show: Map<number, { in: boolean; out: boolean }>,
): void {
  const ends: Record<Axis, { first: number | null; last: number | null }> = {
    x: { first: null, last: null },
    y: { first: null, last: null },
    z: { first: null, last: null },
  };
  for (const axis of AXES) {
    const curve = source.channels[translateChannelFor(axis)];
    if (curve && curve.numKeys() > 0) {
      ends[axis] = { first: curve.timeOf(0), last: curve.timeOf(curve.numKeys() - 1) };
    }
  }

  const visible = (time: number, axis: Axis, edge: "first" | "last"): boolean | null => {
    if (time < window.start || time > window.end) return null;
    const draft = drafts.get(time);
    if (!draft) return null;
    const [a, b] = otherAxes(axis);
    const unkeyed = draft.translationKeys[a] === null && draft.translationKeys[b] === null;
    const sharedEdge = ends[a][edge] === time && ends[b][edge] === time;
    return !(unkeyed || sharedEdge);
  };

  for (const axis of AXES) {
    const { first, last } = ends[axis];
    if (first !== null) {
      const result = visible(first, axis, "first");
      const entry = show.get(first);
      if (result !== null && entry) entry.in = result;
    }
    if (last !== null) {
      const result = visible(last, axis, "last");
      const entry = show.get(last);
      if (result !== null && entry) entry.out = result;
    }
  }
}

/**
 * Merge the keys of the translation (and optionally rotation) channels in
 * the window into one record per keyed time. Entities without any
 * translation key produce an empty window.
 */
export function aggregateKeyframes(source: KeyframeSource, options: AggregateOptions): KeyframeWindow {
  const { channels } = source;
  if (!hasTranslationKeys(channels)) {
    return KeyframeWindow.empty(options.generation);
  }

  const start = options.window.start;
  const end = options.drawingEnd ?? options.window.end;
  const drafts = new Map<number, Draft>();
  const inRange = (time: number) => time >= start && time <= end;

  for (const axis of AXES) {
    const curve = channels[translateChannelFor(axis)];
    if (!curve) continue;
    for (let i = 0; i < curve.numKeys(); i++) {
      const time = curve.timeOf(i);
      if (!inRange(time)) continue;
      const draft = draftAt(drafts, time);
      draft.translationKeys[axis] = i;
      draft.inTangent[axis] = resolveTangentComponent(curve, i, "in");
      draft.outTangent[axis] = resolveTangentComponent(curve, i, "out");
      draft.tangentsLocked = draft.tangentsLocked && curve.tangentsLocked(i);
    }
  }

  if (options.includeRotation) {
    for (const axis of AXES) {
      const curve = channels[rotateChannelFor(axis)];
      if (!curve) continue;
      for (let i = 0; i < curve.numKeys(); i++) {
        const time = curve.timeOf(i);
        if (!inRange(time)) continue;
        draftAt(drafts, time).rotationKeys[axis] = i;
      }
    }
  }

  const ordered = [...drafts.values()].sort((a, b) => a.time - b.time);
  const show = new Map<number, { in: boolean; out: boolean }>();
  ordered.forEach((draft) => show.set(draft.time, { in: true, out: true }));
  applyEndTangentVisibility(source, drafts, options.window, show);

  const drawing = options.drawingEnd !== null;
  const weighted = source.isWeighted();
  const suppressHandles = weighted && options.bridge.mode === "camera";

  const records = ordered.map((draft, id): KeyframeRecord => {
    const rotationOnly = AXES.every((axis) => draft.translationKeys[axis] === null);
    const visibility = show.get(draft.time) ?? { in: true, out: true };
    const showInTangent = !drawing && !rotationOnly && visibility.in;
    const showOutTangent = !drawing && !rotationOnly && visibility.out;

    const parent = source.parentMatrixAt(draft.time);
    const localPosition = source.localPositionAt(draft.time, drawing);
    const worldPosition = transformPoint(parent, localPosition);
    const displayPosition = options.bridge.toDisplay(worldPosition, draft.time);
    const inTangent = { ...draft.inTangent };
    const outTangent = { ...draft.outTangent };
    const inTangentWorld = rawTangentHandle(parent, localPosition, inTangent, "in");
    const outTangentWorld = rawTangentHandle(parent, localPosition, outTangent, "out");

    const handle = (side: "in" | "out", visible: boolean): Vec3 | null => {
      if (!visible || suppressHandles || !displayPosition) return null;
      const raw = options.bridge.toDisplay(side === "in" ? inTangentWorld : outTangentWorld, draft.time);
      if (!raw) return null;
      let neighbour: Vec3 | null = null;
      if (!weighted) {
        const time = side === "in" ? draft.time - options.tangentTimeDelta : draft.time + options.tangentTimeDelta;
        const world = transformPoint(source.parentMatrixAt(time), source.localPositionAt(time, drawing));
        neighbour = options.bridge.toDisplay(world, time);
      }
      return curveTangentHandle({
        weighted,
        position: displayPosition,
        rawHandle: raw,
        neighbour,
        localTangent: side === "in" ? inTangent : outTangent,
      });
    };

    return {
      id,
      time: draft.time,
      localPosition,
      worldPosition,
      displayPosition,
      inTangent,
      outTangent,
      inTangentWorld,
      outTangentWorld,
      inTangentHandle: handle("in", showInTangent),
      outTangentHandle: handle("out", showOutTangent),
      translationKeys: { ...draft.translationKeys },
      rotationKeys: { ...draft.rotationKeys },
      rotationOnly,
      selected: options.selectedTimes.some((time) => sameTime(time, draft.time)),
      tangentsLocked: draft.tangentsLocked,
      showInTangent,
      showOutTangent,
    };
  });

  return new KeyframeWindow(options.generation, records);
}
