export interface UndoCommand {
  label: string;
  do(): void;
  undo(): void;
}

type Listener = () => void;

const DEFAULT_MAX_DEPTH = 100;

export interface UndoStack {
  push(cmd: UndoCommand): void;
  /** Push a command whose edits are already applied (e.g. a finished drag). */
  pushExecuted(cmd: UndoCommand): void;
  undo(): UndoCommand | null;
  redo(): UndoCommand | null;
  canUndo(): boolean;
  canRedo(): boolean;
  /** Label of the command `undo()` would revert, for menu text. */
  undoLabel(): string | null;
  redoLabel(): string | null;
  clear(): void;
  subscribe(fn: Listener): () => void;
}

export function createUndoStack(maxDepth = DEFAULT_MAX_DEPTH): UndoStack {
  let undoStack: UndoCommand[] = [];
  let redoStack: UndoCommand[] = [];
  const listeners = new Set<Listener>();

  function notify() {
    listeners.forEach((fn) => fn());
  }

  function record(cmd: UndoCommand) {
    undoStack.push(cmd);
    if (undoStack.length > maxDepth) {
      undoStack.shift();
    }
    redoStack = [];
    notify();
  }

  return {
    push(cmd) {
      cmd.do();
      record(cmd);
    },

    pushExecuted(cmd) {
      record(cmd);
    },

    undo() {
      const cmd = undoStack.pop();
      if (!cmd) return null;
      cmd.undo();
      redoStack.push(cmd);
      notify();
      return cmd;
    },

    redo() {
      const cmd = redoStack.pop();
      if (!cmd) return null;
      cmd.do();
      undoStack.push(cmd);
      notify();
      return cmd;
    },

    canUndo() {
      return undoStack.length > 0;
    },

    canRedo() {
      return redoStack.length > 0;
    },

    undoLabel() {
      return undoStack.length > 0 ? undoStack[undoStack.length - 1].label : null;
    },

    redoLabel() {
      return redoStack.length > 0 ? redoStack[redoStack.length - 1].label : null;
    },

    clear() {
      undoStack = [];
      redoStack = [];
      notify();
    },

    subscribe(fn) {
      listeners.add(fn);
      return () => {
        listeners.delete(fn);
      };
    },
  };
}
