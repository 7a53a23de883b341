export type KeytrailErrorCode =
  | "invalid-settings"
  | "key-out-of-range"
  | "session-busy"
  | "unknown-entity"
  | "entity-id-collision";

export class KeytrailError extends Error {
  readonly code: KeytrailErrorCode;

  constructor(code: KeytrailErrorCode, message: string) {
    super(message);
    this.name = "KeytrailError";
    this.code = code;
  }
}

export function isKeytrailError(error: unknown): error is KeytrailError {
  return error instanceof KeytrailError;
}
