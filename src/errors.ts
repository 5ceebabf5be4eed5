export class BoringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A sink asked to bind to a name the namespace never issued. */
export class NameNotFoundError extends BoringError {
  constructor(readonly pin: string) {
    super(`Sink ID '${pin}' not found in boring namespace`);
  }
}

export class InvalidSinkTargetError extends BoringError {
  constructor(readonly target: string) {
    super(`Can only add a module or component sink, got '${target}'`);
  }
}

/** Raised only by a recorder in strict mode. */
export class DuplicateSourceError extends BoringError {
  constructor(readonly pin: string) {
    super(`Source ID '${pin}' is already declared`);
  }
}

export class PlanError extends BoringError {}
