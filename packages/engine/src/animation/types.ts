export type TranslateChannel = "translateX" | "translateY" | "translateZ";
export type RotateChannel = "rotateX" | "rotateY" | "rotateZ";
export type ChannelName = TranslateChannel | RotateChannel;

export type Axis = "x" | "y" | "z";
export type TangentSide = "in" | "out";
export type TangentType = "auto" | "linear" | "flat" | "fixed";

export const TRANSLATE_CHANNELS: readonly TranslateChannel[] = ["translateX", "translateY", "translateZ"] as const;
export const ROTATE_CHANNELS: readonly RotateChannel[] = ["rotateX", "rotateY", "rotateZ"] as const;
export const CHANNEL_NAMES: readonly ChannelName[] = [...TRANSLATE_CHANNELS, ...ROTATE_CHANNELS];
export const AXES: readonly Axis[] = ["x", "y", "z"] as const;

/**
 * Tangent storage. Weighted curves keep an explicit (time, value) vector;
 * non-weighted curves keep an angle in radians and a scalar weight.
 */
export type TangentRepr =
  | { kind: "weighted"; x: number; y: number }
  | { kind: "angle"; angle: number; weight: number };

export interface KeySnapshot {
  time: number;
  value: number;
  inTangent: TangentRepr;
  outTangent: TangentRepr;
  inType: TangentType;
  outType: TangentType;
  tangentsLocked: boolean;
  weightsLocked: boolean;
}

/**
 * A sparse scalar animation curve. Key indices are positions in time order
 * and shift when keys are added or removed.
 */
export interface AnimCurve {
  numKeys(): number;
  timeOf(index: number): number;
  valueOf(index: number): number;
  valueAt(time: number): number;
  findKeyAt(time: number): number | null;
  getTangent(index: number, side: TangentSide): TangentRepr;
  setTangent(index: number, side: TangentSide, tangent: TangentRepr): void;
  addKey(time: number, value: number): number;
  removeKey(index: number): void;
  setValue(index: number, value: number): void;
  isWeighted(): boolean;
  tangentsLocked(index: number): boolean;
  weightsLocked(index: number): boolean;
  snapshotKey(index: number): KeySnapshot;
  restoreKey(snapshot: KeySnapshot): number;
}

export type ChannelSet = Partial<Record<ChannelName, AnimCurve>>;

export function axisOfChannel(channel: ChannelName): Axis {
  const last = channel.charAt(channel.length - 1);
  if (last === "X") return "x";
  if (last === "Y") return "y";
  return "z";
}

export function translateChannelFor(axis: Axis): TranslateChannel {
  if (axis === "x") return "translateX";
  if (axis === "y") return "translateY";
  return "translateZ";
}

export function rotateChannelFor(axis: Axis): RotateChannel {
  if (axis === "x") return "rotateX";
  if (axis === "y") return "rotateY";
  return "rotateZ";
}
