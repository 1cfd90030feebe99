/** Raised while parsing or evaluating an unlock-condition expression. */
export class UnlockConditionError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly position: number
  ) {
    super(`${message} at position ${position} in "${source}"`);
    this.name = "UnlockConditionError";
  }
}

/** A persisted state file exists but cannot be read or does not match its schema. */
export class StateFileError extends Error {
  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Invalid state file ${path}: ${reason}`);
    this.name = "StateFileError";
  }
}
