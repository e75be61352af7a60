export interface FieldError {
  path: string;
  message: string;
}

export type StateErrorCode = "ALREADY_TRAINED" | "NOT_TRAINED" | "NO_TRAINING_DATA";

export class ClassifierError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Operation invoked in the wrong lifecycle phase. */
export class StateError extends ClassifierError {
  constructor(code: StateErrorCode, message: string) {
    super(code, message);
  }
}

export class InvalidArgumentError extends ClassifierError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class SnapshotError extends ClassifierError {
  constructor(readonly errors: FieldError[]) {
    super("INVALID_SNAPSHOT", `invalid snapshot: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}`);
  }
}
