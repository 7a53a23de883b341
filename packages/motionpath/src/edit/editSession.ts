import type { Logger, TangentSide, Vec2, Vec3 } from "@keytrail/engine";
import { KeytrailError, acceptStrokePoint, add3, silentLogger, sub3 } from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import type { PathProjector } from "../projection/pathProjector.js";
import type { EntityRegistry } from "../state/entityRegistry.js";
import { previewSamplePoints, synthesizeFreehand } from "./freehand.js";
import { remapStroke } from "./strokeRemap.js";
import { CurveTransaction, type EditOutcome } from "./transaction.js";
import type { UndoStack } from "./undoStack.js";

export type EditMode = "idle" | "key-drag" | "click-add" | "tangent-drag" | "stroke-remap" | "freehand";

/** `horizontal` keeps the anchor's height; `vertical` moves along Y only. */
export type AxisLock = "none" | "horizontal" | "vertical";

/** How a pressed key changes the selection before a drag. */
export type SelectionModifier = "replace" | "add" | "toggle" | "keep";

export interface StrokePreview {
  kind: "remap" | "freehand";
  points: Vec2[];
  /** Where the synthesized keys would land; empty while reshaping. */
  keys: Vec2[];
}

type Gesture =
  | {
      mode: "key-drag";
      tx: CurveTransaction;
      anchorDisplay: Vec3;
      startScreen: Vec2;
      lastDisplay: Vec3;
      axisLock: AxisLock;
    }
  | { mode: "click-add"; tx: CurveTransaction; entity: TrackedEntity; time: number; anchorDisplay: Vec3; startScreen: Vec2 }
  | {
      mode: "tangent-drag";
      tx: CurveTransaction;
      entity: TrackedEntity;
      time: number;
      side: TangentSide;
      handleDisplay: Vec3;
      startScreen: Vec2;
    }
  | { mode: "stroke-remap"; entity: TrackedEntity; anchorTime: number; points: Vec2[] }
  | { mode: "freehand"; entity: TrackedEntity; anchorTime: number; points: Vec2[] };

export interface EditSessionOptions {
  registry: EntityRegistry;
  projector: PathProjector;
  undo: UndoStack;
  logger?: Logger;
}

function lockAxis(point: Vec3, anchor: Vec3, lock: AxisLock): Vec3 {
  if (lock === "horizontal") return { ...point, y: anchor.y };
  if (lock === "vertical") return { x: anchor.x, y: point.y, z: anchor.z };
  return point;
}

/**
 * Pointer-driven editing of motion paths. One gesture at a time: a press
 * starts it, moves update it, and release commits it to the undo stack as
 * a single command. Cancel restores the curves as they were at the press.
 */
export class EditSession {
  private readonly registry: EntityRegistry;
  private readonly projector: PathProjector;
  private readonly undo: UndoStack;
  private readonly logger: Logger;
  private gesture: Gesture | null = null;

  constructor(options: EditSessionOptions) {
    this.registry = options.registry;
    this.projector = options.projector;
    this.undo = options.undo;
    this.logger = options.logger ?? silentLogger;
  }

  get mode(): EditMode {
    return this.gesture ? this.gesture.mode : "idle";
  }

  /**
   * Press on the key at `time`: update the selection, then drag every
   * selected key of every tracked entity along with it.
   */
  beginKeyDrag(input: {
    entityId: string;
    time: number;
    screen: Vec2;
    selection?: SelectionModifier;
    axisLock?: AxisLock;
  }): boolean {
    this.assertIdle();
    const entity = this.entity(input.entityId);
    const anchorDisplay = entity.keyframes().recordAt(input.time)?.displayPosition;
    if (!anchorDisplay) return false;

    this.modifySelection(entity, input.time, input.selection ?? "replace");
    this.gesture = {
      mode: "key-drag",
      tx: new CurveTransaction("Move Keys"),
      anchorDisplay,
      startScreen: { ...input.screen },
      lastDisplay: anchorDisplay,
      axisLock: input.axisLock ?? "none",
    };
    return true;
  }

  /**
   * Add a key at the current time under the pointer, keeping the depth of
   * the nearest earlier key (or later one when none precedes it). Moves
   * until release keep editing that key.
   */
  clickAdd(input: { entityId: string; screen: Vec2 }): EditOutcome {
    this.assertIdle();
    const entity = this.entity(input.entityId);
    const time = this.registry.currentTime();
    const bounds = entity.boundariesForTime(time);
    const anchorTime = bounds.before ?? bounds.after ?? time;

    const anchorDisplay = entity.displayPositionAt(anchorTime);
    const anchorScreen = anchorDisplay ? this.projector.worldToScreen(anchorDisplay) : null;
    if (!anchorDisplay || !anchorScreen) return { ok: false, reason: "anchor-off-screen" };

    const world = this.displayToWorld(entity, anchorDisplay, anchorScreen, input.screen, time);
    if (!world) return { ok: false, reason: "conversion-failed" };

    const tx = new CurveTransaction("Add Key");
    if (!entity.addKeyAtTime(time, world, tx)) return { ok: false, reason: "no-translation-channels" };

    this.gesture = { mode: "click-add", tx, entity, time, anchorDisplay, startScreen: anchorScreen };
    return { ok: true, transaction: tx };
  }

  beginTangentDrag(input: { entityId: string; time: number; side: TangentSide; screen: Vec2 }): boolean {
    this.assertIdle();
    const entity = this.entity(input.entityId);
    const record = entity.keyframes().recordAt(input.time);
    const handle = input.side === "in" ? record?.inTangentHandle : record?.outTangentHandle;
    if (!handle) return false;

    this.gesture = {
      mode: "tangent-drag",
      tx: new CurveTransaction("Edit Tangent"),
      entity,
      time: input.time,
      side: input.side,
      handleDisplay: handle,
      startScreen: { ...input.screen },
    };
    return true;
  }

  /**
   * Start collecting a stroke from the key at `time`. `remap` reshapes the
   * existing keys next to it; `freehand` lays new keys after it.
   */
  beginStroke(input: { entityId: string; time: number; screen: Vec2; kind: "remap" | "freehand" }): boolean {
    this.assertIdle();
    const entity = this.entity(input.entityId);
    if (!entity.keyframes().recordAt(input.time)) return false;

    entity.selectAt(input.time);
    if (input.kind === "freehand") entity.setDrawingEnd(input.time);
    this.gesture = {
      mode: input.kind === "remap" ? "stroke-remap" : "freehand",
      entity,
      anchorTime: input.time,
      points: [{ ...input.screen }],
    };
    return true;
  }

  /** Pointer moved. Returns whether anything changed. */
  update(screen: Vec2): boolean {
    const gesture = this.gesture;
    if (!gesture) return false;

    switch (gesture.mode) {
      case "key-drag": {
        const moved = this.projector.screenToWorld(gesture.anchorDisplay, gesture.startScreen, screen);
        if (!moved) return false;
        const next = lockAxis(moved, gesture.anchorDisplay, gesture.axisLock);
        const offset = sub3(next, gesture.lastDisplay);
        gesture.lastDisplay = next;
        return this.moveSelection(offset, gesture.tx);
      }
      case "click-add": {
        const world = this.displayToWorld(gesture.entity, gesture.anchorDisplay, gesture.startScreen, screen, gesture.time);
        return world ? gesture.entity.setFrameWorldPosition(gesture.time, world, gesture.tx) : false;
      }
      case "tangent-drag": {
        const target = this.displayToWorld(
          gesture.entity,
          gesture.handleDisplay,
          gesture.startScreen,
          screen,
          gesture.time,
        );
        return target ? gesture.entity.setTangentWorldPosition(gesture.time, gesture.side, target, gesture.tx) : false;
      }
      default: {
        const last = gesture.points[gesture.points.length - 1];
        if (!acceptStrokePoint(last, screen, this.registry.settings().strokeSampleDistance)) return false;
        gesture.points.push({ ...screen });
        return true;
      }
    }
  }

  /** Stroke collected so far, with the keys a freehand release would create. */
  preview(): StrokePreview | null {
    const gesture = this.gesture;
    if (!gesture || (gesture.mode !== "stroke-remap" && gesture.mode !== "freehand")) return null;
    const points = gesture.points.map((point) => ({ ...point }));
    const keys = gesture.mode === "freehand" ? previewSamplePoints(points, this.registry.settings().drawKeyframeCount) : [];
    return { kind: gesture.mode === "freehand" ? "freehand" : "remap", points, keys };
  }

  /** Finish the gesture and push its edits as one undoable command. */
  release(): EditOutcome {
    const gesture = this.gesture;
    this.gesture = null;
    if (!gesture) return { ok: false, reason: "idle" };

    const outcome = this.resolve(gesture);
    if (outcome.ok) {
      this.undo.pushExecuted(outcome.transaction.toUndoCommand());
      this.logger.debug("Edit committed", { label: outcome.transaction.label, edits: outcome.transaction.size });
    }
    return outcome;
  }

  cancel(): void {
    const gesture = this.gesture;
    this.gesture = null;
    if (!gesture) return;
    if ("tx" in gesture) {
      gesture.tx.rollback();
      return;
    }
    this.finishStroke(gesture.entity);
  }

  private resolve(gesture: Gesture): EditOutcome {
    if (gesture.mode === "stroke-remap" || gesture.mode === "freehand") {
      const settings = this.registry.settings();
      const outcome =
        gesture.mode === "stroke-remap"
          ? remapStroke({
              entity: gesture.entity,
              projector: this.projector,
              anchorTime: gesture.anchorTime,
              points: gesture.points,
              mode: settings.strokeMode,
              maxWorseSteps: settings.strokeMaxWorseSteps,
            })
          : synthesizeFreehand({
              entity: gesture.entity,
              projector: this.projector,
              anchorTime: gesture.anchorTime,
              points: gesture.points,
              count: settings.drawKeyframeCount,
              spacing: settings.drawFrameInterval,
              logger: this.logger,
            });
      this.finishStroke(gesture.entity);
      return outcome;
    }

    if (gesture.tx.isEmpty()) return { ok: false, reason: "no-change" };
    return { ok: true, transaction: gesture.tx };
  }

  private finishStroke(entity: TrackedEntity): void {
    entity.setDrawingEnd(null);
    entity.deselectAll();
    entity.refreshDisplayWindow(this.registry.currentTime());
  }

  private moveSelection(offset: Vec3, tx: CurveTransaction): boolean {
    let changed = false;
    for (const entity of this.registry.list()) {
      const bridge = entity.displayBridge();
      for (const time of entity.selectedTimes()) {
        const display = entity.displayPositionAt(time);
        const from = display ? bridge.toWorld(display, time) : null;
        const to = display ? bridge.toWorld(add3(display, offset), time) : null;
        if (!from || !to) continue;
        if (entity.offsetWorldPosition(time, sub3(to, from), tx)) changed = true;
      }
    }
    return changed;
  }

  private modifySelection(entity: TrackedEntity, time: number, modifier: SelectionModifier): void {
    switch (modifier) {
      case "toggle":
        entity.toggleAt(time);
        break;
      case "add":
        entity.selectAt(time);
        break;
      case "replace":
        if (entity.isSelected(time)) return;
        this.registry.deselectAll();
        entity.selectAt(time);
        break;
      case "keep":
        break;
    }
  }

  private displayToWorld(entity: TrackedEntity, anchor: Vec3, from: Vec2, to: Vec2, time: number): Vec3 | null {
    const moved = this.projector.screenToWorld(anchor, from, to);
    return moved ? entity.displayBridge().toWorld(moved, time) : null;
  }

  private entity(id: string): TrackedEntity {
    const entity = this.registry.get(id);
    if (!entity) throw new KeytrailError("unknown-entity", `No tracked entity with id "${id}"`);
    return entity;
  }

  private assertIdle(): void {
    if (this.gesture) {
      throw new KeytrailError("session-busy", `Cannot start a gesture while ${this.gesture.mode} is active`);
    }
  }
}
