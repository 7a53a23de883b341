import { TRANSLATE_CHANNELS, keyTimes, sameTime, type MotionPathSettings, type Vec3 } from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";

export interface BufferKey {
  time: number;
  world: Vec3;
}

/**
 * Frozen copy of an entity's world path, kept for comparison while the
 * animation is edited. `frames[i]` is the position at `startTime + i`.
 */
export interface BufferPath {
  readonly name: string;
  readonly startTime: number;
  readonly frames: readonly Vec3[];
  readonly keys: readonly BufferKey[];
  selected: boolean;
}

function translationKeyTimes(entity: TrackedEntity): number[] {
  const times: number[] = [];
  for (const name of TRANSLATE_CHANNELS) {
    const curve = entity.channels[name];
    if (!curve) continue;
    for (const time of keyTimes(curve)) {
      if (!times.some((known) => sameTime(known, time))) times.push(time);
    }
  }
  return times.sort((a, b) => a - b);
}

/**
 * Sample the entity's world path on whole frames over the playback range,
 * widened to its keys. Constrained entities have no keys to show and cover
 * the playback range only.
 */
export function snapshotBufferPath(entity: TrackedEntity, settings: MotionPathSettings, name = entity.name): BufferPath {
  const times = entity.constrained ? [] : translationKeyTimes(entity);
  const first = times.length > 0 ? Math.min(times[0], settings.playbackStart) : settings.playbackStart;
  const last = times.length > 0 ? Math.max(times[times.length - 1], settings.playbackEnd) : settings.playbackEnd;
  const startTime = Math.floor(first);
  const endTime = Math.ceil(last);

  const frames: Vec3[] = [];
  for (let time = startTime; time <= endTime; time++) {
    frames.push(entity.worldPositionAt(time, true));
  }

  return {
    name,
    startTime,
    frames,
    keys: times.map((time) => ({ time, world: entity.worldPositionAt(time, true) })),
    selected: false,
  };
}

type Listener = () => void;

export interface BufferPathStore {
  add(path: BufferPath): number;
  /** Snapshot every entity, one buffer path each. */
  capture(entities: readonly TrackedEntity[], settings: MotionPathSettings): number;
  list(): readonly BufferPath[];
  count(): number;
  nameAt(index: number): string | null;
  deleteAt(index: number): boolean;
  deleteAll(): void;
  setSelected(index: number, selected: boolean): boolean;
  subscribe(fn: Listener): () => void;
}

export function createBufferPathStore(): BufferPathStore {
  let paths: BufferPath[] = [];
  const listeners = new Set<Listener>();

  function notify() {
    listeners.forEach((fn) => fn());
  }

  function validIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < paths.length;
  }

  return {
    add(path) {
      paths = [...paths, path];
      notify();
      return paths.length - 1;
    },

    capture(entities, settings) {
      if (entities.length === 0) return 0;
      paths = [...paths, ...entities.map((entity) => snapshotBufferPath(entity, settings))];
      notify();
      return entities.length;
    },

    list() {
      return paths;
    },

    count() {
      return paths.length;
    },

    nameAt(index) {
      return validIndex(index) ? paths[index].name : null;
    },

    deleteAt(index) {
      if (!validIndex(index)) return false;
      paths = paths.filter((_, i) => i !== index);
      notify();
      return true;
    },

    deleteAll() {
      if (paths.length === 0) return;
      paths = [];
      notify();
    },

    setSelected(index, selected) {
      if (!validIndex(index)) return false;
      paths = paths.map((path, i) => (i === index ? { ...path, selected } : path));
      notify();
      return true;
    },

    subscribe(fn) {
      listeners.add(fn);
      return () => {
        listeners.delete(fn);
      };
    },
  };
}
