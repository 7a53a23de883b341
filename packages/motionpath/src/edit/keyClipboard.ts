import type { Axis, TangentSide, Vec3 } from "@keytrail/engine";
import { AXES, TRANSLATE_CHANNELS, add3, sub3, translateChannelFor } from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import { inverseTransformVector } from "../math/matrix.js";
import { CurveTransaction, type EditOutcome } from "./transaction.js";

export interface CopiedKey {
  /** Time after the first copied key. */
  offset: number;
  world: Vec3;
  axes: Axis[];
  /** World-space handle offsets from the key. */
  inHandle: Vec3;
  outHandle: Vec3;
}

export interface PasteOptions {
  /** Move the pasted run so its first key lands on the entity's position at the paste time. */
  offset?: boolean;
  label?: string;
}

/**
 * Selected translation keys in world space, pasteable onto any entity at
 * any time. Keys keep their spacing and handles.
 */
export class KeyClipboard {
  private keys: CopiedKey[] = [];

  get size(): number {
    return this.keys.length;
  }

  isEmpty(): boolean {
    return this.keys.length === 0;
  }

  clear(): void {
    this.keys = [];
  }

  entries(): readonly CopiedKey[] {
    return this.keys;
  }

  /** Replace the contents with the entity's selected keys. Returns the count copied. */
  copy(entity: TrackedEntity): number {
    const records = entity
      .keyframes()
      .records.filter((record) => record.selected && !record.rotationOnly);
    if (records.length === 0) return 0;

    const first = records[0].time;
    this.keys = records.map((record) => ({
      offset: record.time - first,
      world: { ...record.worldPosition },
      axes: AXES.filter((axis) => record.translationKeys[axis] !== null),
      inHandle: sub3(record.inTangentWorld, record.worldPosition),
      outHandle: sub3(record.outTangentWorld, record.worldPosition),
    }));
    return this.keys.length;
  }

  /**
   * Paste at `time` after clearing translation keys in `(time, time + span]`.
   * The first and last keys are written on every axis; keys between them
   * only on the axes they were copied from.
   */
  paste(entity: TrackedEntity, time: number, options: PasteOptions = {}): EditOutcome {
    const keys = this.keys;
    if (keys.length === 0) return { ok: false, reason: "empty-clipboard" };

    const anchor = options.offset ? entity.worldPositionAt(time) : null;
    const last = keys.length - 1;
    const tx = new CurveTransaction(options.label ?? "Paste Keys");

    entity.deleteKeysInRange(time, time + keys[last].offset, tx, TRANSLATE_CHANNELS);

    const written = keys.map((key, i) => {
      const axes = i === 0 || i === last ? AXES : key.axes;
      const world = anchor ? add3(anchor, sub3(key.world, keys[0].world)) : key.world;
      entity.addKeyAtTime(time + key.offset, world, tx, axes);
      return axes;
    });

    keys.forEach((key, i) => {
      const at = time + key.offset;
      const parent = entity.parentMatrixAt(at);
      const sides: [TangentSide, Vec3][] = [];
      if (i !== 0) sides.push(["in", key.inHandle]);
      if (i !== last) sides.push(["out", key.outHandle]);
      for (const [side, handle] of sides) {
        const local = inverseTransformVector(parent, handle);
        for (const axis of written[i]) {
          const curve = entity.channels[translateChannelFor(axis)];
          if (curve) tx.setTangentComponent(curve, at, side, local[axis]);
        }
      }
    });

    if (tx.isEmpty()) return { ok: false, reason: "no-translation-channels" };
    return { ok: true, transaction: tx };
  }
}
