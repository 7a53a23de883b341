import * as THREE from "three";
import {
  CHANNEL_NAMES,
  KeyedCurve,
  createSettings,
  type ChannelName,
  type ChannelSet,
  type Color,
  type KeyedCurveOptions,
  type Ray,
  type Vec2,
  type Vec3,
} from "@keytrail/engine";
import { TrackedEntity, type TrackedEntityOptions } from "../entity/trackedEntity.js";
import type { Viewport } from "../projection/viewport.js";
import type { DrawItem, RenderCapability, RenderSink, RenderStyle } from "../render/sink.js";

/**
 * Orthographic view down -Z: world (x, y) lands on screen (x, y) and every
 * ray starts at z = 10.
 */
export class ScreenPlaneViewport implements Viewport {
  worldToScreen(point: Vec3): Vec2 {
    return { x: point.x, y: point.y };
  }

  screenToWorldRay(x: number, y: number): Ray {
    return { origin: { x, y, z: 10 }, direction: { x: 0, y: 0, z: -1 } };
  }

  cameraWorldMatrix(): THREE.Matrix4 {
    return new THREE.Matrix4().makeTranslation(0, 0, 10);
  }
}

/** Sink that records every call in order. */
export class RecordingSink implements RenderSink {
  readonly capability: RenderCapability;
  readonly calls: DrawItem[] = [];

  constructor(capability: RenderCapability = "immediate") {
    this.capability = capability;
  }

  line(points: Vec3[], style: RenderStyle): void {
    this.calls.push({ kind: "line", points, style });
  }

  point(position: Vec3, style: RenderStyle): void {
    this.calls.push({ kind: "point", position, style });
  }

  label(position: Vec3, text: string, style: RenderStyle): void {
    this.calls.push({ kind: "label", position, text, style });
  }

  marker(position: Vec3, slices: Color[], size: number): void {
    this.calls.push({ kind: "marker", position, slices, size });
  }

  screenLine(points: Vec2[], style: RenderStyle): void {
    this.calls.push({ kind: "screenLine", points, style });
  }

  screenCircle(center: Vec2, radius: number, style: RenderStyle): void {
    this.calls.push({ kind: "screenCircle", center, radius, style });
  }

  ofKind<K extends DrawItem["kind"]>(kind: K): Extract<DrawItem, { kind: K }>[] {
    return this.calls.filter((call): call is Extract<DrawItem, { kind: K }> => call.kind === kind);
  }
}

export type ChannelKeys = Partial<Record<ChannelName, [number, number][]>>;

/** Channels built from `[time, value]` pairs. */
export function keyedChannels(keys: ChannelKeys, options: KeyedCurveOptions = {}): ChannelSet {
  const channels: ChannelSet = {};
  for (const name of CHANNEL_NAMES) {
    const pairs = keys[name];
    if (!pairs) continue;
    channels[name] = new KeyedCurve(
      pairs.map(([time, value]) => ({ time, value })),
      options,
    );
  }
  return channels;
}

/** Translation channels keyed at each `[time, position]`. */
export function pathChannels(samples: [number, Vec3][], options: KeyedCurveOptions = {}): ChannelSet {
  return keyedChannels(
    {
      translateX: samples.map(([time, p]) => [time, p.x]),
      translateY: samples.map(([time, p]) => [time, p.y]),
      translateZ: samples.map(([time, p]) => [time, p.z]),
    },
    options,
  );
}

export function makeEntity(options: Partial<TrackedEntityOptions> & { channels: ChannelSet }): TrackedEntity {
  return new TrackedEntity({
    id: "ball",
    settings: createSettings({ playbackStart: 0, playbackEnd: 100, framesBack: 100, framesFront: 100 }),
    ...options,
  });
}
