import type { AnimCurve, KeySnapshot, TangentRepr, TangentSide } from "@keytrail/engine";
import { tangentFromComponent } from "@keytrail/engine";
import type { UndoCommand } from "./undoStack.js";

export type CurveEdit =
  | { kind: "add"; curve: AnimCurve; previous: KeySnapshot | null; added: KeySnapshot }
  | { kind: "remove"; curve: AnimCurve; removed: KeySnapshot }
  | { kind: "replace"; curve: AnimCurve; before: KeySnapshot; after: KeySnapshot };

export type EditOutcome =
  | { ok: true; transaction: CurveTransaction }
  | { ok: false; reason: string };

type ChangeListener = () => void;

function removeAt(curve: AnimCurve, time: number): void {
  const index = curve.findKeyAt(time);
  if (index !== null) curve.removeKey(index);
}

/**
 * Batch of primitive curve edits. Edits apply as they are recorded; the
 * batch can be rolled back or handed to an undo stack as one command.
 */
export class CurveTransaction {
  readonly label: string;
  private readonly recorded: CurveEdit[] = [];
  private readonly listeners = new Set<ChangeListener>();

  constructor(label: string) {
    this.label = label;
  }

  get edits(): readonly CurveEdit[] {
    return this.recorded;
  }

  get size(): number {
    return this.recorded.length;
  }

  isEmpty(): boolean {
    return this.recorded.length === 0;
  }

  /** Register a callback run after every change made through this batch. */
  touch(listener: ChangeListener): void {
    this.listeners.add(listener);
  }

  addKey(curve: AnimCurve, time: number, value: number): number {
    const existing = curve.findKeyAt(time);
    const previous = existing === null ? null : curve.snapshotKey(existing);
    const index = curve.addKey(time, value);
    this.record({ kind: "add", curve, previous, added: curve.snapshotKey(index) });
    return index;
  }

  removeKey(curve: AnimCurve, time: number): boolean {
    const index = curve.findKeyAt(time);
    if (index === null) return false;
    const removed = curve.snapshotKey(index);
    curve.removeKey(index);
    this.record({ kind: "remove", curve, removed });
    return true;
  }

  setValue(curve: AnimCurve, time: number, value: number): boolean {
    const index = curve.findKeyAt(time);
    if (index === null) return false;
    const before = curve.snapshotKey(index);
    curve.setValue(index, value);
    this.record({ kind: "replace", curve, before, after: curve.snapshotKey(index) });
    return true;
  }

  setTangent(curve: AnimCurve, time: number, side: TangentSide, tangent: TangentRepr): boolean {
    const index = curve.findKeyAt(time);
    if (index === null) return false;
    const before = curve.snapshotKey(index);
    curve.setTangent(index, side, tangent);
    this.record({ kind: "replace", curve, before, after: curve.snapshotKey(index) });
    return true;
  }

  /**
   * Write a local tangent component at `time`. The in side is stored
   * negated. Curves with fewer than two keys are left alone.
   */
  setTangentComponent(curve: AnimCurve, time: number, side: TangentSide, value: number): boolean {
    const index = curve.findKeyAt(time);
    if (index === null || curve.numKeys() <= 1) return false;
    return this.setTangent(curve, time, side, tangentFromComponent(curve.getTangent(index, side), value, side));
  }

  /** Revert every recorded edit, newest first, and forget them. */
  rollback(): void {
    this.revert();
    this.recorded.length = 0;
  }

  toUndoCommand(): UndoCommand {
    return {
      label: this.label,
      do: () => this.replay(),
      undo: () => this.revert(),
    };
  }

  private record(edit: CurveEdit): void {
    this.recorded.push(edit);
    this.notify();
  }

  private notify(): void {
    this.listeners.forEach((listener) => listener());
  }

  private replay(): void {
    for (const edit of this.recorded) {
      if (edit.kind === "add") {
        edit.curve.restoreKey(edit.added);
      } else if (edit.kind === "remove") {
        removeAt(edit.curve, edit.removed.time);
      } else {
        edit.curve.restoreKey(edit.after);
      }
    }
    this.notify();
  }

  private revert(): void {
    for (let i = this.recorded.length - 1; i >= 0; i--) {
      const edit = this.recorded[i];
      if (edit.kind === "add") {
        removeAt(edit.curve, edit.added.time);
        if (edit.previous) edit.curve.restoreKey(edit.previous);
      } else if (edit.kind === "remove") {
        edit.curve.restoreKey(edit.removed);
      } else {
        edit.curve.restoreKey(edit.before);
      }
    }
    this.notify();
  }
}
