import type { AnimCurve, ChannelName, ChannelSet } from "./types.js";
import { TRANSLATE_CHANNELS } from "./types.js";

const EPSILON = 1e-6;

export interface KeyRef {
  channel: ChannelName;
  time: number;
}

export interface TimeBoundaries {
  before: number | null;
  after: number | null;
}

export interface KeyedRange {
  min: number;
  max: number;
}

export function sameTime(a: number, b: number): boolean {
  return Math.abs(a - b) < EPSILON;
}

export function keyTimes(curve: AnimCurve): number[] {
  const times: number[] = [];
  for (let i = 0; i < curve.numKeys(); i++) {
    times.push(curve.timeOf(i));
  }
  return times;
}

/** Key times in `(start, end]`: the start key is the anchor and is kept. */
export function keyTimesInRange(curve: AnimCurve, start: number, end: number): number[] {
  return keyTimes(curve).filter((time) => time > start + EPSILON && time <= end + EPSILON);
}

export function keyTimesAfter(curve: AnimCurve, time: number): number[] {
  return keyTimes(curve).filter((keyTime) => keyTime > time + EPSILON);
}

/**
 * Refs for every key in `(start, end]` across the given channels, ordered
 * latest first so removals never disturb the indices still to be visited.
 */
export function collectKeyRefsInRange(channels: ChannelSet, names: readonly ChannelName[], start: number, end: number): KeyRef[] {
  const refs: KeyRef[] = [];
  for (const channel of names) {
    const curve = channels[channel];
    if (!curve) continue;
    for (const time of keyTimesInRange(curve, start, end)) {
      refs.push({ channel, time });
    }
  }
  return refs.sort((a, b) => b.time - a.time);
}

/**
 * Range spanned by the translation keys. Defined only when all three
 * translation channels exist and carry keys.
 */
export function translationKeyedRange(channels: ChannelSet): KeyedRange | null {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const name of TRANSLATE_CHANNELS) {
    const curve = channels[name];
    if (!curve || curve.numKeys() === 0) return null;
    min = Math.min(min, curve.timeOf(0));
    max = Math.max(max, curve.timeOf(curve.numKeys() - 1));
  }
  return { min: Math.trunc(min), max: Math.trunc(max) };
}

export function hasTranslationKeys(channels: ChannelSet): boolean {
  return TRANSLATE_CHANNELS.some((name) => (channels[name]?.numKeys() ?? 0) > 0);
}

/** Nearest distinct times strictly before and after `time`. */
export function boundariesForTime(times: readonly number[], time: number): TimeBoundaries {
  let before: number | null = null;
  let after: number | null = null;
  for (const candidate of times) {
    if (sameTime(candidate, time)) continue;
    if (candidate < time && (before === null || candidate > before)) before = candidate;
    if (candidate > time && (after === null || candidate < after)) after = candidate;
  }
  return { before, after };
}
