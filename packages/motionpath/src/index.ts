// Caches
export { RangeCache, sequentialFor } from "./cache/rangeCache.js";
export type { CacheRange, ParallelFor, RangeCacheOptions } from "./cache/rangeCache.js";
export { runScoped } from "./cache/scoped.js";
export {
  TransformResolver,
  identityTransformSource,
  object3DTransformSource,
  staticTransformSource,
} from "./cache/transformResolver.js";
export type { TransformInputs, TransformResolverOptions, TransformSource } from "./cache/transformResolver.js";

// Entities and keyframes
export { TrackedEntity } from "./entity/trackedEntity.js";
export type { TrackedEntityOptions } from "./entity/trackedEntity.js";
export { KeyframeWindow, aggregateKeyframes } from "./keyframes/aggregator.js";
export type { AggregateOptions, AxisKeys, KeyframeRecord, KeyframeSource } from "./keyframes/aggregator.js";
export {
  curveTangentHandle,
  localTangentForHandle,
  rawTangentHandle,
  resolveTangentComponent,
} from "./keyframes/tangentHandles.js";
export type { CurveHandleInput, TangentWriteInput } from "./keyframes/tangentHandles.js";

// Projection
export { PathProjector } from "./projection/pathProjector.js";
export { PerspectiveViewport, viewDirectionOf } from "./projection/viewport.js";
export type { Viewport, ViewportSize } from "./projection/viewport.js";
export { CameraCache, cameraSpaceBridge, worldSpaceBridge } from "./projection/cameraSpace.js";
export type { CameraTrack, DisplaySpaceBridge } from "./projection/cameraSpace.js";

// Editing
export { CurveTransaction } from "./edit/transaction.js";
export type { CurveEdit, EditOutcome } from "./edit/transaction.js";
export { createUndoStack } from "./edit/undoStack.js";
export type { UndoCommand, UndoStack } from "./edit/undoStack.js";
export { EditSession } from "./edit/editSession.js";
export type { AxisLock, EditMode, EditSessionOptions, SelectionModifier, StrokePreview } from "./edit/editSession.js";
export { applyStrokeRemap, planStrokeRemap, remapStroke } from "./edit/strokeRemap.js";
export type { RemapTarget, StrokeMode, StrokeRemapInput, StrokeRemapPlan } from "./edit/strokeRemap.js";
export { applyFreehand, freehandSpacing, planFreehand, previewSamplePoints, synthesizeFreehand } from "./edit/freehand.js";
export type { FreehandInput, FreehandPlan, FreehandSample } from "./edit/freehand.js";
export { DEFAULT_PICK_RADIUS, pickKeyframe, pickTangentHandle } from "./edit/picking.js";
export type { TangentPick } from "./edit/picking.js";
export { KeyClipboard } from "./edit/keyClipboard.js";
export type { CopiedKey, PasteOptions } from "./edit/keyClipboard.js";

// State
export { createEntityRegistry, snapshotPass } from "./state/entityRegistry.js";
export type { EntityRegistry, EntityRegistryOptions, PassSnapshot } from "./state/entityRegistry.js";
export { createBufferPathStore, snapshotBufferPath } from "./buffer/bufferPath.js";
export type { BufferKey, BufferPath, BufferPathStore } from "./buffer/bufferPath.js";

// Rendering
export { DrawListSink, SceneSink } from "./render/sink.js";
export type { DrawItem, RenderCapability, RenderSink, RenderStyle } from "./render/sink.js";
export {
  buildPathFrame,
  formatFrame,
  renderPathFrame,
  renderStrokePreview,
  scaleColor,
} from "./render/pathFrame.js";
export type { KeyMarker, PathFrame, PathFrameOptions, StyledLabel, StyledLine, StyledPoint } from "./render/pathFrame.js";
export { bufferColor, buildBufferFrame, renderBufferFrame } from "./render/bufferFrame.js";
export type { BufferFrame, BufferFrameContext } from "./render/bufferFrame.js";
