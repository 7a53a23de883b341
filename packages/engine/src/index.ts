export function createEngineVersion(): string {
  return "0.1.0";
}

export {
  add3,
  computeDragDelta,
  createPlaneFromPointAndNormal,
  distance2,
  dot2,
  dot3,
  dragPointOnViewPlane,
  intersectRayWithPlane,
  length3,
  normalize3,
  scale3,
  sub2,
  sub3,
} from "./dragMath.js";
export type { PlaneEquation, Ray, Vec2, Vec3 } from "./dragMath.js";
export {
  acceptStrokePoint,
  closestPointOnPolyline,
  collectStrokeRun,
  freehandSampleIndex,
  meanStrokeDirection,
  nearestScreenPosition,
  pointAtArcLength,
  polylineLength,
  resolveWalkDirection,
  spreadArcLengths,
  spreadPointsOnPolyline,
} from "./strokeMath.js";
export type { PolylineProjection, StrokeRunInput, WalkDirection } from "./strokeMath.js";
export { clampDisplayWindow, computeDisplayWindow, windowContains, windowFrames, windowSampleTimes } from "./displayWindow.js";
export type { DisplayWindow, WindowSettings } from "./displayWindow.js";
export {
  CURRENT_FRAME_SIZE_MULTIPLIER,
  KEYFRAME_SIZE_MULTIPLIER,
  MotionPathSettingsSchema,
  SELECTED_KEY_SIZE_MULTIPLIER,
  createSettings,
  settingsFromEnv,
  withSettings,
} from "./settings.js";
export type { Color, MotionPathSettings, MotionPathSettingsInput } from "./settings.js";
export { KeytrailError, isKeytrailError } from "./errors.js";
export type { KeytrailErrorCode } from "./errors.js";
export { createLogger, silentLogger } from "./logger.js";
export type { LogLevel, LogTarget, Logger, LoggerOptions } from "./logger.js";

// Animation
export type {
  AnimCurve,
  Axis,
  ChannelName,
  ChannelSet,
  KeySnapshot,
  RotateChannel,
  TangentRepr,
  TangentSide,
  TangentType,
  TranslateChannel,
} from "./animation/types.js";
export {
  AXES,
  CHANNEL_NAMES,
  ROTATE_CHANNELS,
  TRANSLATE_CHANNELS,
  axisOfChannel,
  rotateChannelFor,
  translateChannelFor,
} from "./animation/types.js";
export { KeyedCurve, tangentSlope } from "./animation/curve.js";
export type { KeyInit, KeyedCurveOptions } from "./animation/curve.js";
export { readTangentComponent, tangentComponent, tangentFromComponent } from "./animation/tangents.js";
export {
  boundariesForTime,
  collectKeyRefsInRange,
  hasTranslationKeys,
  keyTimes,
  keyTimesAfter,
  keyTimesInRange,
  sameTime,
  translationKeyedRange,
} from "./animation/ops.js";
export type { KeyRef, KeyedRange, TimeBoundaries } from "./animation/ops.js";
