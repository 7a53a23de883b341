import { KEYFRAME_SIZE_MULTIPLIER, type Color, type MotionPathSettings, type Vec3 } from "@keytrail/engine";
import type { BufferPath } from "../buffer/bufferPath.js";
import type { DisplaySpaceBridge } from "../projection/cameraSpace.js";
import { scaleColor, type StyledLine, type StyledPoint } from "./pathFrame.js";
import type { RenderSink } from "./sink.js";

const BUFFER_ALPHA = 0.5;
const CURRENT_FRAME_FACTOR = 1.6;

export interface BufferFrame {
  name: string;
  path: StyledLine[];
  frames: StyledPoint[];
  keys: StyledPoint[];
  currentFrame: StyledPoint | null;
}

export interface BufferFrameContext {
  settings: MotionPathSettings;
  currentTime: number;
  bridge: DisplaySpaceBridge;
}

/** Buffer color, inverted while the path is selected. */
export function bufferColor(base: Color, selected: boolean): Color {
  if (!selected) return { ...base, a: BUFFER_ALPHA };
  return { r: 1 - base.r, g: 1 - base.g, b: 1 - base.b, a: BUFFER_ALPHA };
}

function frameAt(path: BufferPath, time: number): Vec3 | null {
  const index = time - path.startTime;
  if (!Number.isInteger(index) || index < 0 || index >= path.frames.length) return null;
  return path.frames[index];
}

/** Buffer path frames within `framesBack`/`framesFront` of the current time. */
export function buildBufferFrame(path: BufferPath, context: BufferFrameContext): BufferFrame {
  const { settings, currentTime, bridge } = context;
  const color = bufferColor(settings.bufferPathColor, path.selected);
  const start = Math.ceil(currentTime - settings.framesBack);
  const end = Math.floor(currentTime + settings.framesFront);
  const frame: BufferFrame = { name: path.name, path: [], frames: [], keys: [], currentFrame: null };

  let run: Vec3[] = [];
  const close = () => {
    if (settings.showPath && run.length >= 2) frame.path.push({ points: run, style: { color, size: settings.pathSize } });
    run = [];
  };
  for (let time = start; time <= end; time++) {
    const world = frameAt(path, time);
    const position = world ? bridge.toDisplay(world, time) : null;
    if (!position) {
      close();
      continue;
    }
    run.push(position);
    frame.frames.push({ position, style: { color, size: settings.frameSize } });
  }
  close();

  if (settings.showKeyframes) {
    for (const key of path.keys) {
      if (key.time < currentTime - settings.framesBack || key.time > currentTime + settings.framesFront) continue;
      const position = bridge.toDisplay(key.world, key.time);
      if (position) {
        frame.keys.push({ position, style: { color, size: settings.frameSize * KEYFRAME_SIZE_MULTIPLIER } });
      }
    }
  }

  const current = frameAt(path, Math.trunc(currentTime));
  const currentPosition = current ? bridge.toDisplay(current, currentTime) : null;
  if (currentPosition) {
    frame.currentFrame = {
      position: currentPosition,
      style: {
        color: { ...scaleColor(settings.currentFrameColor, 0.8), a: 0.7 },
        size: settings.frameSize * CURRENT_FRAME_FACTOR,
      },
    };
  }

  return frame;
}

export function renderBufferFrame(frame: BufferFrame, sink: RenderSink): void {
  frame.path.forEach((line) => sink.line(line.points, line.style));
  frame.frames.forEach((point) => sink.point(point.position, point.style));
  frame.keys.forEach((point) => sink.point(point.position, point.style));
  if (frame.currentFrame) sink.point(frame.currentFrame.position, frame.currentFrame.style);
}
