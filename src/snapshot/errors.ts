export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class SnapshotWriteError extends SnapshotError {
  constructor(
    public readonly path: string,
    cause?: Error,
  ) {
    super(`Failed to write ${path}: ${cause?.message ?? "unknown error"}`, cause);
  }
}

export class SnapshotReadError extends SnapshotError {
  constructor(
    public readonly path: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Failed to read snapshot ${path}: ${reason}`, cause);
  }
}
