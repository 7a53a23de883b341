import {
  AXES,
  CURRENT_FRAME_SIZE_MULTIPLIER,
  KEYFRAME_SIZE_MULTIPLIER,
  SELECTED_KEY_SIZE_MULTIPLIER,
  sameTime,
  windowContains,
  windowSampleTimes,
  type Axis,
  type Color,
  type MotionPathSettings,
  type Vec3,
} from "@keytrail/engine";
import type { StrokePreview } from "../edit/editSession.js";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import type { KeyframeRecord } from "../keyframes/aggregator.js";
import { snapshotPass, type PassSnapshot } from "../state/entityRegistry.js";
import type { RenderSink, RenderStyle } from "./sink.js";

export const HIGHLIGHT_FACTOR = 1.3;
export const BACKGROUND_FACTOR = 1.2;
const ODD_FRAME_FACTOR = 1.4;
const EVEN_FRAME_FACTOR = 0.6;

const AXIS_COLORS: Record<Axis, Color> = {
  x: { r: 1, g: 0, b: 0, a: 1 },
  y: { r: 0, g: 1, b: 0, a: 1 },
  z: { r: 0, g: 0, b: 1, a: 1 },
};
const BLACK: Color = { r: 0, g: 0, b: 0, a: 1 };
const WHITE: Color = { r: 1, g: 1, b: 1, a: 1 };
const SELECTED_GLOW: Color = { r: 1, g: 1, b: 0, a: 0.5 };
const SELECTED_RING: Color = { r: 1, g: 0.8, b: 0, a: 0.8 };

export interface StyledLine {
  points: Vec3[];
  style: RenderStyle;
}

export interface StyledPoint {
  position: Vec3;
  style: RenderStyle;
}

export interface StyledLabel {
  position: Vec3;
  text: string;
  style: RenderStyle;
}

export interface KeyMarker {
  time: number;
  position: Vec3;
  size: number;
  /** Keyed translation axes, or rotation axes for rotation-only keys. */
  slices: Color[];
  selected: boolean;
}

/** Everything one redraw of an entity's path draws, in display space. */
export interface PathFrame {
  entityId: string;
  generation: number;
  path: StyledLine[];
  currentFrame: StyledPoint | null;
  tangents: StyledLine[];
  handles: StyledPoint[];
  labels: StyledLabel[];
  keys: KeyMarker[];
}

export interface PathFrameOptions {
  highlighted?: boolean;
}

export function scaleColor(color: Color, factor: number): Color {
  const channel = (value: number) => Math.min(1, Math.max(0, value * factor));
  return { r: channel(color.r), g: channel(color.g), b: channel(color.b), a: color.a };
}

/** Frame numbers print without a trailing fraction when whole. */
export function formatFrame(time: number): string {
  return Number.isInteger(time) ? String(time) : time.toFixed(2);
}

function pathLines(entity: TrackedEntity, snapshot: PassSnapshot, color: Color): StyledLine[] {
  const { settings, window } = snapshot;
  const times = windowSampleTimes(window, settings.drawTimeInterval);
  const positions = times.map((time) => entity.displayPositionAt(time));
  const lines: StyledLine[] = [];

  if (settings.alternatingFrames) {
    for (let i = 0; i + 1 < positions.length; i++) {
      const from = positions[i];
      const to = positions[i + 1];
      if (!from || !to) continue;
      const factor = Math.trunc(times[i]) % 2 === 1 ? ODD_FRAME_FACTOR : EVEN_FRAME_FACTOR;
      lines.push({ points: [from, to], style: { color: scaleColor(color, factor), size: settings.pathSize } });
    }
    return lines;
  }

  // A sample without a display position splits the path.
  let run: Vec3[] = [];
  const close = () => {
    if (run.length >= 2) lines.push({ points: run, style: { color, size: settings.pathSize } });
    run = [];
  };
  for (const position of positions) {
    if (position) {
      run.push(position);
    } else {
      close();
    }
  }
  close();
  return lines;
}

function tangentColor(settings: MotionPathSettings, weighted: boolean, record: KeyframeRecord): Color {
  if (weighted) return settings.weightedPathTangentColor;
  return record.tangentsLocked ? settings.tangentColor : settings.brokenTangentColor;
}

function markerSlices(record: KeyframeRecord, settings: MotionPathSettings, factor: number): Color[] {
  const translated = AXES.filter((axis) => record.translationKeys[axis] !== null);
  const rotated = settings.showRotationKeyframes ? AXES.filter((axis) => record.rotationKeys[axis] !== null) : [];
  const axes = translated.length > 0 ? translated : rotated;
  return axes.map((axis) => scaleColor(AXIS_COLORS[axis], factor));
}

function frameLabels(entity: TrackedEntity, snapshot: PassSnapshot, records: readonly KeyframeRecord[]): StyledLabel[] {
  const { settings, window } = snapshot;
  const labels: StyledLabel[] = [];
  const keyLabelTimes: number[] = [];

  if (settings.showKeyframeNumbers) {
    const style = { color: settings.keyframeLabelColor, size: settings.keyframeLabelSize };
    for (const record of records) {
      if (!record.displayPosition || !windowContains(window, record.time)) continue;
      labels.push({ position: record.displayPosition, text: formatFrame(record.time), style });
      keyLabelTimes.push(record.time);
    }
  }

  if (settings.showFrameNumbers) {
    const style = { color: settings.frameLabelColor, size: settings.frameLabelSize };
    const interval = Math.max(1, settings.drawFrameInterval);
    const frames = [window.start];
    for (let frame = window.start + interval; frame < window.end; frame += interval) frames.push(frame);
    if (window.end > window.start) frames.push(window.end);

    const keysLabelled = settings.showKeyframeNumbers && settings.showKeyframes;
    for (const frame of frames) {
      if (keysLabelled && keyLabelTimes.some((time) => sameTime(time, frame))) continue;
      const position = entity.displayPositionAt(frame);
      if (position) labels.push({ position, text: formatFrame(frame), style });
    }
  }
  return labels;
}

/**
 * Resolve one entity's path, keys, tangents and labels for a pass. Reads
 * positions through the caches the pass filled. A snapshot whose keyframe
 * generation is no longer current is taken again over the entity's present
 * window, so path and keys always come from the same window.
 */
export function buildPathFrame(entity: TrackedEntity, pass: PassSnapshot, options: PathFrameOptions = {}): PathFrame {
  const { generation } = entity.keyframes();
  const snapshot = generation === pass.generation ? pass : snapshotPass(entity, pass.settings, pass.currentTime);
  const { settings, window } = snapshot;
  const factor = options.highlighted ? HIGHLIGHT_FACTOR : 1;
  const weighted = entity.isWeighted();
  const records = entity.keyframes().records;

  const frame: PathFrame = {
    entityId: entity.id,
    generation: snapshot.generation,
    path: [],
    currentFrame: null,
    tangents: [],
    handles: [],
    labels: [],
    keys: [],
  };

  if (settings.showPath) {
    const base = weighted ? settings.weightedPathColor : settings.pathColor;
    frame.path = pathLines(entity, snapshot, scaleColor(base, factor));

    if (windowContains(window, snapshot.currentTime)) {
      const position = entity.displayPositionAt(snapshot.currentTime);
      if (position) {
        frame.currentFrame = {
          position,
          style: { color: settings.currentFrameColor, size: settings.frameSize * CURRENT_FRAME_SIZE_MULTIPLIER },
        };
      }
    }
  }

  if (settings.showTangents) {
    for (const record of records) {
      const origin = record.displayPosition;
      if (!origin) continue;
      const color = tangentColor(settings, weighted, record);
      const handles = [
        record.showInTangent ? record.inTangentHandle : null,
        record.showOutTangent ? record.outTangentHandle : null,
      ];
      for (const handle of handles) {
        if (!handle) continue;
        frame.tangents.push({ points: [origin, handle], style: { color, size: 1 } });
        frame.handles.push({ position: handle, style: { color, size: settings.frameSize } });
      }
    }
  }

  frame.labels = frameLabels(entity, snapshot, records);

  if (settings.showKeyframes) {
    const size = settings.frameSize * KEYFRAME_SIZE_MULTIPLIER;
    for (const record of records) {
      if (!record.displayPosition) continue;
      const slices = markerSlices(record, settings, factor);
      if (slices.length === 0) continue;
      frame.keys.push({
        time: record.time,
        position: record.displayPosition,
        size: record.selected ? size * SELECTED_KEY_SIZE_MULTIPLIER : size,
        slices,
        selected: record.selected,
      });
    }
  }

  return frame;
}

/** Draw order: path, current frame, tangents, labels, then keys on top. */
export function renderPathFrame(frame: PathFrame, sink: RenderSink): void {
  frame.path.forEach((line) => sink.line(line.points, line.style));
  if (frame.currentFrame) sink.point(frame.currentFrame.position, frame.currentFrame.style);
  frame.tangents.forEach((line) => sink.line(line.points, line.style));
  frame.handles.forEach((handle) => sink.point(handle.position, handle.style));
  frame.labels.forEach((label) => sink.label(label.position, label.text, label.style));

  for (const key of frame.keys) {
    sink.point(key.position, { color: BLACK, size: key.size * BACKGROUND_FACTOR });
  }
  for (const key of frame.keys) {
    if (key.selected) {
      sink.point(key.position, { color: SELECTED_GLOW, size: key.size * 1.4 });
      sink.point(key.position, { color: SELECTED_RING, size: key.size * 1.15 });
      sink.marker(key.position, [WHITE], key.size);
    } else {
      sink.marker(key.position, key.slices, key.size);
    }
  }
}

export const PREVIEW_KEY_RADIUS = 8;

/** Screen-space feedback for a stroke in progress. */
export function renderStrokePreview(preview: StrokePreview, settings: MotionPathSettings, sink: RenderSink): void {
  if (preview.points.length < 2) return;

  if (preview.kind === "remap") {
    sink.screenLine(preview.points, { color: { r: 0.2, g: 0.2, b: 0.2, a: 0.6 }, size: 4 });
    sink.screenLine(preview.points, { color: { ...WHITE, a: 0.95 }, size: 2 });
    return;
  }

  sink.screenLine(preview.points, { color: settings.previewPathColor, size: 3 });
  preview.keys.forEach((key) => {
    sink.screenCircle(key, PREVIEW_KEY_RADIUS, { color: settings.previewKeyframeColor, size: 0 });
    sink.screenCircle(key, PREVIEW_KEY_RADIUS + 1, { color: BLACK, size: 1 });
  });
}
