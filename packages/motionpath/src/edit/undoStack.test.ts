import { describe, expect, it, vi } from "vitest";
import { createUndoStack } from "./undoStack.js";

function command(label: string) {
  return { label, do: vi.fn(), undo: vi.fn() };
}

describe("createUndoStack", () => {
  it("runs pushed commands and reverts them in order", () => {
    const stack = createUndoStack();
    const first = command("Move Key");
    const second = command("Remap Stroke");

    stack.push(first);
    stack.push(second);

    expect(first.do).toHaveBeenCalledTimes(1);
    expect(stack.undoLabel()).toBe("Remap Stroke");
    expect(stack.undo()).toBe(second);
    expect(second.undo).toHaveBeenCalledTimes(1);
    expect(stack.undoLabel()).toBe("Move Key");
    expect(stack.redoLabel()).toBe("Remap Stroke");
  });

  it("reapplies undone commands on redo", () => {
    const stack = createUndoStack();
    const cmd = command("Paste Keys");
    stack.push(cmd);
    stack.undo();

    expect(stack.redo()).toBe(cmd);
    expect(cmd.do).toHaveBeenCalledTimes(2);
    expect(stack.canRedo()).toBe(false);
    expect(stack.redo()).toBeNull();
  });

  it("records already-applied commands without running them", () => {
    const stack = createUndoStack();
    const cmd = command("Drag");

    stack.pushExecuted(cmd);

    expect(cmd.do).not.toHaveBeenCalled();
    expect(stack.canUndo()).toBe(true);
  });

  it("drops the redo history on a new command", () => {
    const stack = createUndoStack();
    stack.push(command("a"));
    stack.undo();
    stack.push(command("b"));

    expect(stack.canRedo()).toBe(false);
    expect(stack.redoLabel()).toBeNull();
  });

  it("drops the oldest command past the depth limit", () => {
    const stack = createUndoStack(1);
    stack.push(command("a"));
    stack.push(command("b"));

    expect(stack.undo()?.label).toBe("b");
    expect(stack.canUndo()).toBe(false);
    expect(stack.undo()).toBeNull();
  });

  it("notifies subscribers until they unsubscribe", () => {
    const stack = createUndoStack();
    const listener = vi.fn();
    const unsubscribe = stack.subscribe(listener);

    stack.push(command("a"));
    stack.undo();
    stack.clear();
    unsubscribe();
    stack.push(command("b"));

    expect(listener).toHaveBeenCalledTimes(3);
    expect(stack.canUndo()).toBe(true);
  });
});
