import * as THREE from "three";
import {
  AXES,
  CHANNEL_NAMES,
  boundariesForTime,
  clampDisplayWindow,
  collectKeyRefsInRange,
  computeDisplayWindow,
  keyTimesAfter,
  sameTime,
  silentLogger,
  translateChannelFor,
  translationKeyedRange,
  type Axis,
  type ChannelName,
  type ChannelSet,
  type DisplayWindow,
  type KeyedRange,
  type Logger,
  type MotionPathSettings,
  type TangentSide,
  type TimeBoundaries,
  type Vec3,
} from "@keytrail/engine";
import { RangeCache, type ParallelFor } from "../cache/rangeCache.js";
import {
  TransformResolver,
  identityTransformSource,
  type TransformInputs,
  type TransformSource,
} from "../cache/transformResolver.js";
import type { CurveTransaction } from "../edit/transaction.js";
import { aggregateKeyframes, KeyframeWindow, type KeyframeSource } from "../keyframes/aggregator.js";
import { localTangentForHandle } from "../keyframes/tangentHandles.js";
import { inverseTransformPoint, inverseTransformVector, transformPoint } from "../math/matrix.js";
import { worldSpaceBridge, type DisplaySpaceBridge } from "../projection/cameraSpace.js";

const ZERO: Vec3 = { x: 0, y: 0, z: 0 };

export interface TrackedEntityOptions {
  id: string;
  name?: string;
  channels: ChannelSet;
  settings: MotionPathSettings;
  transform?: TransformSource;
  /** Motion driven by constraints: positions come from the parent transform alone. */
  constrained?: boolean;
  /** Translation used for axes without a channel. */
  restPosition?: Vec3;
  parallelFor?: ParallelFor;
  logger?: Logger;
}

/**
 * One object whose motion path is tracked. Owns its transform and position
 * caches, its display window, its key selection and the keyframe window
 * aggregated from its channels.
 */
export class TrackedEntity implements KeyframeSource {
  readonly id: string;
  readonly name: string;
  readonly channels: ChannelSet;
  readonly constrained: boolean;
  readonly transformCache: RangeCache<TransformInputs, THREE.Matrix4>;
  readonly positionCache: RangeCache<Vec3, Vec3>;

  private settings: MotionPathSettings;
  private readonly resolver: TransformResolver;
  private readonly restPosition: Vec3;
  private readonly logger: Logger;
  private window: DisplayWindow;
  private selected: number[] = [];
  private keyframeWindow: KeyframeWindow | null = null;
  private generation = 0;
  private drawingEnd: number | null = null;
  private bridge: DisplaySpaceBridge = worldSpaceBridge;

  constructor(options: TrackedEntityOptions) {
    this.id = options.id;
    this.name = options.name ?? options.id;
    this.channels = options.channels;
    this.constrained = options.constrained ?? false;
    this.settings = options.settings;
    this.restPosition = { ...(options.restPosition ?? ZERO) };
    this.logger = options.logger ?? silentLogger;
    this.window = { start: options.settings.playbackStart, end: options.settings.playbackEnd };

    this.resolver = new TransformResolver(options.transform ?? identityTransformSource, {
      usePivots: options.settings.usePivots,
    });
    this.transformCache = new RangeCache({
      name: `${this.name} transform`,
      collect: (time) => this.resolver.collect(time),
      compose: (inputs) => this.resolver.compose(inputs),
      parallelThreshold: options.settings.parallelThreshold,
      parallelFor: options.parallelFor,
      logger: this.logger,
    });
    this.positionCache = new RangeCache({
      name: `${this.name} position`,
      collect: (time) => this.readLocalPosition(time),
      compose: (position) => position,
      parallelThreshold: options.settings.parallelThreshold,
      logger: this.logger,
    });
  }

  updateSettings(settings: MotionPathSettings): void {
    const previous = this.settings;
    this.settings = settings;
    if (previous.usePivots !== settings.usePivots) {
      this.resolver.setUsePivots(settings.usePivots);
      this.transformCache.invalidate();
    }
    this.transformCache.setParallelism(settings.parallelThreshold);
    this.positionCache.setParallelism(settings.parallelThreshold);
    this.markKeyframesStale();
  }

  currentSettings(): MotionPathSettings {
    return this.settings;
  }

  isWeighted(): boolean {
    for (const axis of AXES) {
      const curve = this.channels[translateChannelFor(axis)];
      if (curve) return curve.isWeighted();
    }
    return false;
  }

  keyedRange(): KeyedRange | null {
    return translationKeyedRange(this.channels);
  }

  // Display window

  displayWindow(): DisplayWindow {
    return { ...this.window };
  }

  refreshDisplayWindow(currentTime: number): DisplayWindow {
    this.window = computeDisplayWindow(currentTime, this.settings, this.keyedRange());
    this.markKeyframesStale();
    return this.displayWindow();
  }

  setDisplayTimeRange(start: number, end: number): DisplayWindow {
    this.window = clampDisplayWindow(start, end, this.keyedRange(), {
      min: this.settings.playbackStart,
      max: this.settings.playbackEnd,
    });
    this.markKeyframesStale();
    return this.displayWindow();
  }

  setDisplayBridge(bridge: DisplaySpaceBridge): void {
    this.bridge = bridge;
    this.markKeyframesStale();
  }

  displayBridge(): DisplaySpaceBridge {
    return this.bridge;
  }

  /** Marks a freehand draw reaching `end`; null when the draw is over. */
  setDrawingEnd(end: number | null): void {
    this.drawingEnd = end;
    this.markKeyframesStale();
  }

  isDrawing(): boolean {
    return this.drawingEnd !== null;
  }

  // Caches

  ensureCaches(start = this.window.start, end = this.window.end): void {
    this.transformCache.ensureRange(start, end);
    this.positionCache.ensureRange(start, end);
  }

  /** Drop cached transforms and positions, e.g. after an out-of-band hierarchy change. */
  invalidate(): void {
    this.transformCache.invalidate();
    this.positionCache.invalidate();
    this.markKeyframesStale();
  }

  parentMatrixAt(time: number): THREE.Matrix4 {
    return this.transformCache.ensureAt(time).clone();
  }

  localPositionAt(time: number, direct = false): Vec3 {
    if (direct) return this.readLocalPosition(time);
    return { ...this.positionCache.ensureAt(time) };
  }

  worldPositionAt(time: number, direct = false): Vec3 {
    return transformPoint(this.parentMatrixAt(time), this.localPositionAt(time, direct));
  }

  displayPositionAt(time: number, direct = false): Vec3 | null {
    return this.bridge.toDisplay(this.worldPositionAt(time, direct), time);
  }

  // Keyframes

  keyframes(): KeyframeWindow {
    if (!this.keyframeWindow) {
      this.generation += 1;
      this.keyframeWindow = aggregateKeyframes(this, {
        window: this.window,
        drawingEnd: this.drawingEnd,
        includeRotation: this.settings.showRotationKeyframes,
        selectedTimes: this.selected,
        bridge: this.bridge,
        tangentTimeDelta: this.settings.tangentTimeDelta,
        generation: this.generation,
      });
    }
    return this.keyframeWindow;
  }

  keyTimes(): number[] {
    return this.keyframes().times();
  }

  boundariesForTime(time: number): TimeBoundaries {
    return boundariesForTime(this.keyTimes(), time);
  }

  // Selection

  selectedTimes(): number[] {
    return [...this.selected];
  }

  isSelected(time: number): boolean {
    return this.selected.some((selected) => sameTime(selected, time));
  }

  selectAt(time: number): void {
    if (this.isSelected(time)) return;
    this.selected = [...this.selected, time].sort((a, b) => a - b);
    this.markKeyframesStale();
  }

  deselectAt(time: number): void {
    this.selected = this.selected.filter((selected) => !sameTime(selected, time));
    this.markKeyframesStale();
  }

  toggleAt(time: number): void {
    if (this.isSelected(time)) this.deselectAt(time);
    else this.selectAt(time);
  }

  selectAll(): void {
    this.selected = this.keyTimes();
    this.markKeyframesStale();
  }

  invertSelection(): void {
    this.selected = this.keyTimes().filter((time) => !this.isSelected(time));
    this.markKeyframesStale();
  }

  deselectAll(): void {
    this.selected = [];
    this.markKeyframesStale();
  }

  // Key edits

  /** Move the translation keys at `time` so the sample lands on `world`. */
  setFrameWorldPosition(time: number, world: Vec3, tx: CurveTransaction): boolean {
    const local = inverseTransformPoint(this.parentMatrixAt(time), world);
    return this.writeExistingKeys(time, tx, (axis) => local[axis]);
  }

  /** Shift the translation keys at `time` by a world-space offset. */
  offsetWorldPosition(time: number, offset: Vec3, tx: CurveTransaction): boolean {
    const localOffset = inverseTransformVector(this.parentMatrixAt(time), offset);
    return this.writeExistingKeys(time, tx, (axis, value) => value + localOffset[axis]);
  }

  /**
   * Key the translation channels of `axes` at `time`. With a world position
   * the keys take its local equivalent; without one they keep the current
   * values.
   */
  addKeyAtTime(time: number, world: Vec3 | null, tx: CurveTransaction, axes: readonly Axis[] = AXES): boolean {
    const local = world ? inverseTransformPoint(this.parentMatrixAt(time), world) : this.readLocalPosition(time);
    tx.touch(this.curvesChanged);
    let changed = false;
    for (const axis of axes) {
      const curve = this.channels[translateChannelFor(axis)];
      if (!curve) continue;
      tx.addKey(curve, time, local[axis]);
      changed = true;
    }
    return changed;
  }

  deleteKeyAtTime(time: number, tx: CurveTransaction, names: readonly ChannelName[] = CHANNEL_NAMES): boolean {
    tx.touch(this.curvesChanged);
    let changed = false;
    for (const name of names) {
      const curve = this.channels[name];
      if (curve && tx.removeKey(curve, time)) changed = true;
    }
    return changed;
  }

  deleteKeysAfterTime(time: number, tx: CurveTransaction): number {
    tx.touch(this.curvesChanged);
    let removed = 0;
    for (const name of CHANNEL_NAMES) {
      const curve = this.channels[name];
      if (!curve) continue;
      for (const keyTime of keyTimesAfter(curve, time).reverse()) {
        if (tx.removeKey(curve, keyTime)) removed += 1;
      }
    }
    return removed;
  }

  /** Remove keys in `(start, end]` on the given channels. */
  deleteKeysInRange(start: number, end: number, tx: CurveTransaction, names: readonly ChannelName[] = CHANNEL_NAMES): number {
    tx.touch(this.curvesChanged);
    let removed = 0;
    for (const ref of collectKeyRefsInRange(this.channels, names, start, end)) {
      const curve = this.channels[ref.channel];
      if (curve && tx.removeKey(curve, ref.time)) removed += 1;
    }
    return removed;
  }

  /**
   * Drag the handle on `side` of the key at `time` to `target` (world
   * space). Axes without a translation key there are left untouched.
   */
  setTangentWorldPosition(time: number, side: TangentSide, target: Vec3, tx: CurveTransaction): boolean {
    const record = this.keyframes().recordAt(time);
    if (!record) return false;

    const weighted = this.isWeighted();
    const drawn = side === "in" ? record.inTangentHandle : record.outTangentHandle;
    const currentHandle = drawn ? this.bridge.toWorld(drawn, time) : null;
    if (!weighted && !currentHandle) return false;

    const local = localTangentForHandle({
      weighted,
      side,
      parent: this.parentMatrixAt(time),
      keyWorld: record.worldPosition,
      target,
      currentHandle: currentHandle ?? record.worldPosition,
      rawHandle: side === "in" ? record.inTangentWorld : record.outTangentWorld,
    });
    if (!local) return false;

    tx.touch(this.curvesChanged);
    let changed = false;
    for (const axis of AXES) {
      const curve = this.channels[translateChannelFor(axis)];
      if (record.translationKeys[axis] === null || !curve) continue;
      if (tx.setTangentComponent(curve, time, side, local[axis])) changed = true;
    }
    return changed;
  }

  private writeExistingKeys(
    time: number,
    tx: CurveTransaction,
    valueFor: (axis: Axis, current: number) => number,
  ): boolean {
    tx.touch(this.curvesChanged);
    let changed = false;
    for (const axis of AXES) {
      const curve = this.channels[translateChannelFor(axis)];
      if (!curve) continue;
      const index = curve.findKeyAt(time);
      if (index === null) continue;
      if (tx.setValue(curve, time, valueFor(axis, curve.valueOf(index)))) changed = true;
    }
    return changed;
  }

  private readLocalPosition(time: number): Vec3 {
    if (this.constrained) return { ...ZERO };
    const read = (axis: Axis) => {
      const curve = this.channels[translateChannelFor(axis)];
      return curve && curve.numKeys() > 0 ? curve.valueAt(time) : this.restPosition[axis];
    };
    return { x: read("x"), y: read("y"), z: read("z") };
  }

  private readonly curvesChanged = (): void => {
    this.positionCache.invalidate();
    this.markKeyframesStale();
  };

  private markKeyframesStale(): void {
    this.keyframeWindow = null;
  }
}
