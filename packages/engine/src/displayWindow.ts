import type { KeyedRange } from "./animation/ops.js";

export interface DisplayWindow {
  start: number;
  end: number;
}

export interface WindowSettings {
  framesBack: number;
  framesFront: number;
  playbackStart: number;
  playbackEnd: number;
}

function clampInto(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Clamp a requested range to the playback bounds, then to the keyed range.
 * Inverted requests are swapped first. Each bound is clamped on its own, so a
 * request entirely outside the keys collapses onto the nearest keyed end.
 */
export function clampDisplayWindow(
  start: number,
  end: number,
  keyedRange: KeyedRange | null,
  playback?: KeyedRange,
): DisplayWindow {
  let lo = Math.min(start, end);
  let hi = Math.max(start, end);
  if (playback) {
    lo = clampInto(lo, playback.min, playback.max);
    hi = clampInto(hi, playback.min, playback.max);
  }
  if (keyedRange) {
    lo = clampInto(lo, keyedRange.min, keyedRange.max);
    hi = clampInto(hi, keyedRange.min, keyedRange.max);
  }
  return { start: lo, end: hi };
}

/** Window around the current time, `framesBack` before and `framesFront` after. */
export function computeDisplayWindow(currentTime: number, settings: WindowSettings, keyedRange: KeyedRange | null): DisplayWindow {
  return clampDisplayWindow(
    currentTime - settings.framesBack,
    currentTime + settings.framesFront,
    keyedRange,
    { min: settings.playbackStart, max: settings.playbackEnd },
  );
}

export function windowContains(window: DisplayWindow, time: number): boolean {
  return time >= window.start && time <= window.end;
}

/** Integer frames covered by the window, in ascending order. */
export function windowFrames(window: DisplayWindow): number[] {
  const frames: number[] = [];
  for (let frame = Math.ceil(window.start); frame <= Math.floor(window.end); frame++) {
    frames.push(frame);
  }
  return frames;
}

/**
 * Path sample times from the window start in steps of `interval`. The end
 * is included only when a step lands on it.
 */
export function windowSampleTimes(window: DisplayWindow, interval: number): number[] {
  if (interval <= 0) return [window.start];
  const times: number[] = [];
  for (let step = 0; window.start + step * interval <= window.end + 1e-9; step++) {
    times.push(window.start + step * interval);
  }
  return times;
}
