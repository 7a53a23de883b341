import { KeytrailError } from "../errors.js";
import type { AnimCurve, KeySnapshot, TangentRepr, TangentSide, TangentType } from "./types.js";

const TIME_EPSILON = 1e-6;

export interface KeyedCurveOptions {
  weighted?: boolean;
}

export interface KeyInit {
  time: number;
  value: number;
  inTangent?: TangentRepr;
  outTangent?: TangentRepr;
  tangentsLocked?: boolean;
  weightsLocked?: boolean;
}

/** Slope in value units per frame described by a stored tangent. */
export function tangentSlope(tangent: TangentRepr): number {
  if (tangent.kind === "weighted") {
    return Math.abs(tangent.x) < TIME_EPSILON ? 0 : tangent.y / tangent.x;
  }
  return Math.tan(tangent.angle);
}

function reprFromSlope(slope: number, weighted: boolean): TangentRepr {
  return weighted ? { kind: "weighted", x: 1, y: slope } : { kind: "angle", angle: Math.atan(slope), weight: 1 };
}

function convertRepr(tangent: TangentRepr, weighted: boolean): TangentRepr {
  if ((tangent.kind === "weighted") === weighted) {
    return { ...tangent };
  }
  return reprFromSlope(tangentSlope(tangent), weighted);
}

function hermite(t0: number, v0: number, m0: number, t1: number, v1: number, m1: number, t: number): number {
  const dt = t1 - t0;
  if (dt <= 0) return v0;
  const s = (t - t0) / dt;
  const s2 = s * s;
  const s3 = s2 * s;
  return (
    (2 * s3 - 3 * s2 + 1) * v0 +
    (s3 - 2 * s2 + s) * dt * m0 +
    (-2 * s3 + 3 * s2) * v1 +
    (s3 - s2) * dt * m1
  );
}

/**
 * In-memory animation curve. New keys get auto tangents (neighbour slope,
 * flat at the ends); tangents written through `setTangent` become fixed.
 */
export class KeyedCurve implements AnimCurve {
  private keys: KeySnapshot[] = [];
  private readonly weighted: boolean;

  constructor(keys: KeyInit[] = [], options: KeyedCurveOptions = {}) {
    this.weighted = options.weighted ?? false;
    for (const init of keys) {
      this.insert({
        time: init.time,
        value: init.value,
        inTangent: convertRepr(init.inTangent ?? reprFromSlope(0, this.weighted), this.weighted),
        outTangent: convertRepr(init.outTangent ?? reprFromSlope(0, this.weighted), this.weighted),
        inType: init.inTangent ? "fixed" : "auto",
        outType: init.outTangent ? "fixed" : "auto",
        tangentsLocked: init.tangentsLocked ?? true,
        weightsLocked: init.weightsLocked ?? true,
      });
    }
    this.refreshAutoTangents();
  }

  numKeys(): number {
    return this.keys.length;
  }

  timeOf(index: number): number {
    return this.keyAt(index).time;
  }

  valueOf(index: number): number {
    return this.keyAt(index).value;
  }

  valueAt(time: number): number {
    const keys = this.keys;
    if (keys.length === 0) return 0;
    if (time <= keys[0].time) return keys[0].value;
    const last = keys[keys.length - 1];
    if (time >= last.time) return last.value;

    for (let i = 0; i < keys.length - 1; i++) {
      const a = keys[i];
      const b = keys[i + 1];
      if (time >= a.time && time <= b.time) {
        if (a.outType === "linear" && b.inType === "linear") {
          const alpha = (time - a.time) / (b.time - a.time);
          return a.value + (b.value - a.value) * alpha;
        }
        return hermite(a.time, a.value, tangentSlope(a.outTangent), b.time, b.value, tangentSlope(b.inTangent), time);
      }
    }
    return last.value;
  }

  findKeyAt(time: number): number | null {
    const index = this.keys.findIndex((key) => Math.abs(key.time - time) < TIME_EPSILON);
    return index >= 0 ? index : null;
  }

  getTangent(index: number, side: TangentSide): TangentRepr {
    const key = this.keyAt(index);
    return { ...(side === "in" ? key.inTangent : key.outTangent) };
  }

  setTangent(index: number, side: TangentSide, tangent: TangentRepr): void {
    const key = this.keyAt(index);
    const next = convertRepr(tangent, this.weighted);
    if (key.tangentsLocked) {
      key.inTangent = { ...next };
      key.outTangent = { ...next };
      key.inType = "fixed";
      key.outType = "fixed";
      return;
    }
    if (side === "in") {
      key.inTangent = next;
      key.inType = "fixed";
    } else {
      key.outTangent = next;
      key.outType = "fixed";
    }
  }

  addKey(time: number, value: number): number {
    const index = this.insert({
      time,
      value,
      inTangent: reprFromSlope(0, this.weighted),
      outTangent: reprFromSlope(0, this.weighted),
      inType: "auto",
      outType: "auto",
      tangentsLocked: true,
      weightsLocked: true,
    });
    this.refreshAutoTangents();
    return index;
  }

  removeKey(index: number): void {
    this.keyAt(index);
    this.keys.splice(index, 1);
    this.refreshAutoTangents();
  }

  setValue(index: number, value: number): void {
    this.keyAt(index).value = value;
    this.refreshAutoTangents();
  }

  isWeighted(): boolean {
    return this.weighted;
  }

  tangentsLocked(index: number): boolean {
    return this.keyAt(index).tangentsLocked;
  }

  weightsLocked(index: number): boolean {
    return this.keyAt(index).weightsLocked;
  }

  setTangentsLocked(index: number, locked: boolean): void {
    this.keyAt(index).tangentsLocked = locked;
  }

  setTangentType(index: number, side: TangentSide, type: TangentType): void {
    const key = this.keyAt(index);
    if (side === "in") key.inType = type;
    else key.outType = type;
    this.refreshAutoTangents();
  }

  snapshotKey(index: number): KeySnapshot {
    const key = this.keyAt(index);
    return { ...key, inTangent: { ...key.inTangent }, outTangent: { ...key.outTangent } };
  }

  restoreKey(snapshot: KeySnapshot): number {
    const index = this.insert({
      ...snapshot,
      inTangent: convertRepr(snapshot.inTangent, this.weighted),
      outTangent: convertRepr(snapshot.outTangent, this.weighted),
    });
    this.refreshAutoTangents();
    return index;
  }

  private keyAt(index: number): KeySnapshot {
    const key = this.keys[index];
    if (!key) {
      throw new KeytrailError("key-out-of-range", `Key index ${index} is out of range (${this.keys.length} keys).`);
    }
    return key;
  }

  private insert(key: KeySnapshot): number {
    const existing = this.findKeyAt(key.time);
    if (existing !== null) {
      this.keys[existing] = key;
      return existing;
    }
    this.keys.push(key);
    this.keys.sort((a, b) => a.time - b.time);
    return this.keys.indexOf(key);
  }

  private refreshAutoTangents(): void {
    const keys = this.keys;
    for (let i = 0; i < keys.length; i++) {
      const key = keys[i];
      const prev = keys[i - 1];
      const next = keys[i + 1];
      let autoSlope = 0;
      if (prev && next) {
        autoSlope = (next.value - prev.value) / (next.time - prev.time);
      }
      if (key.inType === "auto") key.inTangent = reprFromSlope(autoSlope, this.weighted);
      if (key.outType === "auto") key.outTangent = reprFromSlope(autoSlope, this.weighted);
      if (key.inType === "flat") key.inTangent = reprFromSlope(0, this.weighted);
      if (key.outType === "flat") key.outTangent = reprFromSlope(0, this.weighted);
      if (key.inType === "linear") {
        const slope = prev ? (key.value - prev.value) / (key.time - prev.time) : 0;
        key.inTangent = reprFromSlope(slope, this.weighted);
      }
      if (key.outType === "linear") {
        const slope = next ? (next.value - key.value) / (next.time - key.time) : 0;
        key.outTangent = reprFromSlope(slope, this.weighted);
      }
    }
  }
}
