import type { DisplayWindow, Logger, MotionPathSettings } from "@keytrail/engine";
import { KeytrailError, silentLogger } from "@keytrail/engine";
import type { TrackedEntity } from "../entity/trackedEntity.js";
import { worldSpaceBridge, type DisplaySpaceBridge } from "../projection/cameraSpace.js";

/**
 * Everything one redraw or edit pass reads from, taken at once so cached
 * transforms and keyframe records come from the same window.
 */
export interface PassSnapshot {
  entityId: string;
  settings: MotionPathSettings;
  currentTime: number;
  window: DisplayWindow;
  generation: number;
}

/** Fill the entity's caches over its display window and capture the pass. */
export function snapshotPass(entity: TrackedEntity, settings: MotionPathSettings, currentTime: number): PassSnapshot {
  const window = entity.displayWindow();
  entity.ensureCaches(window.start, window.end);
  return {
    entityId: entity.id,
    settings,
    currentTime,
    window,
    generation: entity.keyframes().generation,
  };
}

type Channel = "entities" | "windows" | "transforms";
type Listener = () => void;

export interface EntityRegistry {
  add(entity: TrackedEntity): void;
  remove(id: string): boolean;
  get(id: string): TrackedEntity | undefined;
  list(): TrackedEntity[];
  readonly size: number;
  clear(): void;

  settings(): MotionPathSettings;
  updateSettings(settings: MotionPathSettings): void;
  currentTime(): number;
  /** Move the playhead: every display window follows. */
  setCurrentTime(time: number): void;
  setDisplayBridge(bridge: DisplaySpaceBridge): void;
  displayBridge(): DisplaySpaceBridge;

  /** External world-matrix change: drop cached transforms before the next pass. */
  notifyWorldMatrixChanged(id?: string): void;
  beginPass(id: string): PassSnapshot;

  deselectAll(): void;
  selectedKeyCount(): number;

  subscribe(channel: Channel, fn: Listener): () => void;
}

export interface EntityRegistryOptions {
  currentTime?: number;
  logger?: Logger;
}

export function createEntityRegistry(initial: MotionPathSettings, options: EntityRegistryOptions = {}): EntityRegistry {
  const entities = new Map<string, TrackedEntity>();
  const logger = options.logger ?? silentLogger;
  let settings = initial;
  let time = options.currentTime ?? initial.playbackStart;
  let bridge: DisplaySpaceBridge = worldSpaceBridge;

  const listeners: Record<Channel, Set<Listener>> = {
    entities: new Set(),
    windows: new Set(),
    transforms: new Set(),
  };

  function notify(channel: Channel) {
    listeners[channel].forEach((fn) => fn());
  }

  function prepare(entity: TrackedEntity) {
    entity.updateSettings(settings);
    entity.setDisplayBridge(bridge);
    entity.refreshDisplayWindow(time);
  }

  function mustGet(id: string): TrackedEntity {
    const entity = entities.get(id);
    if (!entity) {
      throw new KeytrailError("unknown-entity", `No tracked entity with id "${id}"`);
    }
    return entity;
  }

  return {
    add(entity) {
      if (entities.has(entity.id) && entities.get(entity.id) !== entity) {
        throw new KeytrailError("entity-id-collision", `Entity id already tracked: ${entity.id}`);
      }
      entities.set(entity.id, entity);
      prepare(entity);
      notify("entities");
    },

    remove(id) {
      const removed = entities.delete(id);
      if (removed) notify("entities");
      return removed;
    },

    get(id) {
      return entities.get(id);
    },

    list() {
      return [...entities.values()];
    },

    get size() {
      return entities.size;
    },

    clear() {
      entities.clear();
      notify("entities");
    },

    settings() {
      return settings;
    },

    updateSettings(next) {
      settings = next;
      entities.forEach((entity) => {
        entity.updateSettings(next);
        entity.refreshDisplayWindow(time);
      });
      notify("windows");
    },

    currentTime() {
      return time;
    },

    setCurrentTime(next) {
      time = next;
      entities.forEach((entity) => entity.refreshDisplayWindow(next));
      notify("windows");
    },

    setDisplayBridge(next) {
      bridge = next;
      entities.forEach((entity) => entity.setDisplayBridge(next));
      notify("windows");
    },

    displayBridge() {
      return bridge;
    },

    notifyWorldMatrixChanged(id) {
      const targets = id === undefined ? [...entities.values()] : [mustGet(id)];
      targets.forEach((entity) => entity.invalidate());
      logger.debug("World matrix changed", { entities: targets.map((entity) => entity.id) });
      notify("transforms");
    },

    beginPass(id) {
      return snapshotPass(mustGet(id), settings, time);
    },

    deselectAll() {
      entities.forEach((entity) => entity.deselectAll());
    },

    selectedKeyCount() {
      let count = 0;
      entities.forEach((entity) => {
        count += entity.selectedTimes().length;
      });
      return count;
    },

    subscribe(channel, fn) {
      listeners[channel].add(fn);
      return () => {
        listeners[channel].delete(fn);
      };
    },
  };
}
